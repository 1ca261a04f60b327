/**
 * MOO/1 framing used by the library core's WebSocket API.
 *
 * A frame is a text header block followed by an optional JSON body:
 *
 *   MOO/1 REQUEST com.roonlabs.browse:1/load
 *   Request-Id: 7
 *   Content-Length: 42
 *   Content-Type: application/json
 *
 *   {"hierarchy":"browse","offset":0,"count":100}
 */

export type MooVerb = 'REQUEST' | 'COMPLETE' | 'CONTINUE';

export interface MooMessage {
    verb: MooVerb;
    /** Service method for REQUEST, reply name (e.g. "Success") otherwise. */
    name: string;
    requestId: number;
    headers: Record<string, string>;
    body: unknown;
}

export class MooParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MooParseError';
    }
}

const FIRST_LINE = /^MOO\/1 (REQUEST|COMPLETE|CONTINUE) (.+)$/;

function isVerb(value: string): value is MooVerb {
    return value === 'REQUEST' || value === 'COMPLETE' || value === 'CONTINUE';
}

export function encodeMoo(verb: MooVerb, name: string, requestId: number, body?: unknown): Buffer {
    let header = `MOO/1 ${verb} ${name}\nRequest-Id: ${requestId}\n`;
    if (body === undefined) {
        return Buffer.from(header + '\n', 'utf8');
    }
    const payload = Buffer.from(JSON.stringify(body), 'utf8');
    header += `Content-Length: ${payload.length}\nContent-Type: application/json\n\n`;
    return Buffer.concat([Buffer.from(header, 'utf8'), payload]);
}

export function decodeMoo(data: Buffer | string): MooMessage {
    const buf = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    const split = buf.indexOf('\n\n');
    if (split < 0) {
        throw new MooParseError('Frame has no header terminator');
    }

    const lines = buf.subarray(0, split).toString('utf8').split('\n');
    const first = FIRST_LINE.exec(lines[0] ?? '');
    if (!first || !isVerb(first[1])) {
        throw new MooParseError(`Bad first line: ${lines[0] ?? ''}`);
    }

    const headers: Record<string, string> = {};
    for (const line of lines.slice(1)) {
        const idx = line.indexOf(':');
        if (idx <= 0) throw new MooParseError(`Bad header line: ${line}`);
        headers[line.slice(0, idx).trim()] = line.slice(idx + 1).trim();
    }

    const requestId = Number(headers['Request-Id']);
    if (!Number.isInteger(requestId)) {
        throw new MooParseError('Missing Request-Id header');
    }

    let body: unknown = null;
    const rest = buf.subarray(split + 2);
    if (rest.length > 0) {
        const declared = headers['Content-Length'] !== undefined ? Number(headers['Content-Length']) : rest.length;
        const text = rest.subarray(0, declared).toString('utf8');
        const contentType = headers['Content-Type'] ?? 'application/json';
        if (contentType === 'application/json') {
            try {
                body = JSON.parse(text);
            } catch {
                throw new MooParseError('Body is not valid JSON');
            }
        } else {
            body = text;
        }
    }

    return {verb: first[1], name: first[2].trim(), requestId, headers, body};
}
