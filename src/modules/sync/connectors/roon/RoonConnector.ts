/**
 * Remote Library Connector
 *
 * Owns at most one browse session at a time. The session is opened lazily on first
 * use, shared by the album and tag routines of a run, and closed by whoever owns the
 * connector (the orchestrator) at run end.
 *
 * Features:
 * - Menu navigation by title (root -> Library -> Albums / Tags)
 * - Offset pagination until the reported total or an empty page
 * - Bounded retry with session reset on connection failures
 */

import {BrowseClient, BrowseItem, BrowseResult} from './RoonTypes';
import {RoonSession, RoonSessionConfig} from './RoonSession';
import {LibraryConnectionError, MenuNotFoundError, SyncSourceError} from '../../../lib/errors';
import {errorMessage, sleep as defaultSleep} from '../../../lib/util';
import settings, {physicalTagList} from '../../../settings';
import type {PhysicalTagPair} from '../../../../types/CollectionTypes';

export const PLAY_TAG_ENTRY = 'Play Tag';
const DEFAULT_PAGE_SIZE = 100;

export type SessionFactory = () => Promise<BrowseClient>;

export interface RoonConnectorOptions {
    openSession?: SessionFactory;
    /** Attempts per operation, including the first. */
    retryAttempts?: number;
    retryDelayMs?: number;
    pageSize?: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface AlbumListing {
    reportedCount: number;
    items: BrowseItem[];
}

export function sessionConfigFromSettings(): RoonSessionConfig {
    const s = settings.value;
    return {
        host: s.roonHost,
        port: s.roonPort,
        tokenFile: s.roonTokenFile,
        timeoutMs: s.roonConnectTimeoutMs,
        extension: {
            extension_id: s.roonExtensionId,
            display_name: 'Music Collection Sync',
            display_version: '1.0.0',
            publisher: 'collection-sync',
            email: 'collection-sync@example.com',
        },
    };
}

export class RoonConnector {
    private session: BrowseClient | null = null;
    private readonly openSession: SessionFactory;
    private readonly retryAttempts: number;
    private readonly retryDelayMs: number;
    private readonly pageSize: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: RoonConnectorOptions = {}) {
        this.openSession = options.openSession ?? (() => RoonSession.open(sessionConfigFromSettings()));
        this.retryAttempts = Math.max(1, options.retryAttempts ?? settings.value.roonRetryAttempts);
        this.retryDelayMs = options.retryDelayMs ?? settings.value.roonRetryDelayMs;
        this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
        this.sleep = options.sleep ?? defaultSleep;
    }

    get isConnected(): boolean {
        return this.session !== null;
    }

    /**
     * Return the open session, connecting first if needed.
     */
    async acquire(): Promise<BrowseClient> {
        if (this.session) return this.session;
        const session = await this.openSession();
        console.log(`✅ Connected to library core: ${session.coreName}`);
        this.session = session;
        return session;
    }

    /**
     * Drop the current session. Close failures are logged; the session is gone either way.
     */
    async reset(): Promise<void> {
        const session = this.session;
        this.session = null;
        if (!session) return;
        try {
            await session.close();
        } catch (err) {
            console.warn(`⚠️  Error while closing library session: ${errorMessage(err)}`);
        }
    }

    async close(): Promise<void> {
        await this.reset();
    }

    /**
     * Run an operation against the session, reconnecting on connection failures.
     * Other errors propagate immediately.
     */
    async withReconnect<T>(label: string, op: (client: BrowseClient) => Promise<T>): Promise<T> {
        let lastError: LibraryConnectionError | undefined;
        for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
            try {
                const client = await this.acquire();
                return await op(client);
            } catch (err) {
                if (!(err instanceof LibraryConnectionError)) throw err;
                lastError = err;
                console.warn(`⚠️  ${label}: connection failed (attempt ${attempt}/${this.retryAttempts}): ${err.message}`);
                await this.reset();
                if (attempt < this.retryAttempts) {
                    await this.sleep(this.retryDelayMs);
                }
            }
        }
        throw new LibraryConnectionError(
            `${label} failed after ${this.retryAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
        );
    }

    /**
     * Browse from the root into each named child in turn. Titles must match exactly.
     * Returns the browse result of the last step.
     */
    async openMenu(client: BrowseClient, path: readonly string[]): Promise<BrowseResult> {
        let result = await client.browse({hierarchy: 'browse', pop_all: true});
        for (const name of path) {
            const page = await client.load({hierarchy: 'browse', offset: 0, count: this.pageSize});
            const key = page.items.find((item) => item.title === name)?.item_key;
            if (!key) {
                throw new MenuNotFoundError(name);
            }
            result = await client.browse({hierarchy: 'browse', item_key: key});
        }
        return result;
    }

    /**
     * Load every item of the current list. Stops at the reported total or at the first
     * empty page, whichever comes first; a short listing is not an error.
     */
    async loadAll(client: BrowseClient, total: number): Promise<BrowseItem[]> {
        const items: BrowseItem[] = [];
        let offset = 0;
        while (offset < total) {
            const page = await client.load({hierarchy: 'browse', offset, count: this.pageSize});
            if (page.items.length === 0) break;
            items.push(...page.items);
            offset += page.items.length;
        }
        return items;
    }

    async fetchAlbums(): Promise<AlbumListing> {
        return await this.withReconnect('Album listing', async (client) => {
            const albums = await this.openMenu(client, ['Library', 'Albums']);
            const reportedCount = albums.list?.count ?? 0;
            console.log(`📦 Library reports ${reportedCount} albums`);
            const items = await this.loadAll(client, reportedCount);
            return {reportedCount, items};
        });
    }

    /**
     * Members of the physical-format tags, as (album title, tag name) pairs.
     * Tag names are matched case-insensitively; the "Play Tag" action entry is dropped.
     */
    async fetchTaggedAlbums(tagNames: readonly string[] = physicalTagList()): Promise<PhysicalTagPair[]> {
        const wanted = new Set(tagNames.map((t) => t.toLowerCase()));
        return await this.withReconnect('Tag listing', async (client) => {
            const tagsMenu = await this.openMenu(client, ['Library', 'Tags']);
            const tags = await this.loadAll(client, tagsMenu.list?.count ?? this.pageSize);
            const targets = tags.filter((tag) => wanted.has(tag.title.toLowerCase()) && tag.item_key);
            if (targets.length === 0) {
                throw new SyncSourceError(`Tags not found: ${tagNames.join(', ')}`);
            }

            const pairs: PhysicalTagPair[] = [];
            for (const tag of targets) {
                const tagList = await client.browse({hierarchy: 'browse', item_key: tag.item_key ?? undefined});
                const members = await this.loadAll(client, tagList.list?.count ?? 0);
                for (const member of members) {
                    if (member.title === PLAY_TAG_ENTRY) continue;
                    pairs.push({title: member.title, tag: tag.title});
                }
                console.log(`📦 Tag "${tag.title}": ${members.length} entries`);
            }
            return pairs;
        });
    }
}
