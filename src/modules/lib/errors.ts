// lib/errors.ts
// Error types raised by the sync pipeline. The orchestrator catches all of them
// at source scope; FetchError is carried inside results instead of thrown.

/**
 * The remote library session could not be opened or dropped mid-operation.
 * Operations that hit this may be retried after a session reset.
 */
export class LibraryConnectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LibraryConnectionError';
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * The library core answered a request with an error reply.
 *
 * @property {string} reply - The reply name sent by the core (e.g. "InvalidItemKey").
 */
export class LibraryBrowseError extends Error {
    reply: string;

    constructor(message: string, reply: string) {
        super(message);
        this.name = 'LibraryBrowseError';
        this.reply = reply;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * A named browse menu was not found while navigating a path.
 */
export class MenuNotFoundError extends Error {
    menu: string;

    constructor(menu: string) {
        super(`${menu} menu not found`);
        this.name = 'MenuNotFoundError';
        this.menu = menu;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

export type FetchErrorKind = 'http' | 'rate_limited' | 'network' | 'malformed';

/**
 * Failure of a best-effort secondary fetch (marketplace stats, release details).
 * Returned inside a FetchResult, never thrown past the adapter.
 */
export class FetchError extends Error {
    kind: FetchErrorKind;
    status?: number;
    subject: string;

    constructor(kind: FetchErrorKind, subject: string, message: string, status?: number) {
        super(message);
        this.name = 'FetchError';
        this.kind = kind;
        this.subject = subject;
        this.status = status;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * An export file could not be located or read as a whole.
 */
export class FileImportError extends Error {
    filePath: string | null;

    constructor(message: string, filePath: string | null = null) {
        super(message);
        this.name = 'FileImportError';
        this.filePath = filePath;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Controlled per-source failure. The message is recorded in the ledger as-is.
 */
export class SyncSourceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SyncSourceError';
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}
