/**
 * Marketplace Catalog Connector
 * REST client for the Discogs API
 *
 * Features:
 * - Paged collection and want-list listings (100 per page)
 * - Rate-limit handling: HTTP 429 waits the cool-down and retries the same page
 * - Partial results: any other failure stops paging and marks the listing incomplete
 * - Best-effort marketplace stats and release tracklists returned as FetchResult
 * - Fixed pacing after every request (pages and detail calls)
 *
 * Credentials:
 * - discogsToken: personal access token, sent as "Authorization: Discogs token=..."
 * - discogsUsername: owner of the collection and want-list
 */

import Joi from 'joi';
import {
    CollectionEntry,
    collectionEntrySchema,
    FetchResult,
    Listing,
    listingPageSchema,
    NamedEntry,
    releaseSchema,
    ReleasePayload,
    statsSchema,
    StatsPayload,
    TracklistEntry,
    WantEntry,
    wantEntrySchema,
} from './DiscogsTypes';
import {FetchError, SyncSourceError} from '../../../lib/errors';
import {errorMessage, parseDate, sleep as defaultSleep} from '../../../lib/util';
import settings from '../../../settings';
import type {
    CatalogItemRecord,
    CatalogTrackRecord,
    MarketplaceStats,
    WantlistRecord,
} from '../../../../types/CollectionTypes';

const DISCOGS_API_BASE = 'https://api.discogs.com';
const PAGE_SIZE = 100;
const UNKNOWN = 'Unknown';
const MEDIA_CONDITION_FIELD = 1;
const SLEEVE_CONDITION_FIELD = 2;

export interface DiscogsConnectorConfig {
    token?: string;
    username?: string;
    userAgent?: string;
    pageDelayMs?: number;
    detailDelayMs?: number;
    rateLimitCooldownMs?: number;
    /** Consecutive 429 replies tolerated on one page before the listing is given up. */
    maxRateLimitRetries?: number;
    sleep?: (ms: number) => Promise<void>;
}

export class DiscogsConnector {
    private readonly token: string;
    private readonly username: string;
    private readonly userAgent: string;
    private readonly pageDelayMs: number;
    private readonly detailDelayMs: number;
    private readonly cooldownMs: number;
    private readonly maxRateLimitRetries: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(config: DiscogsConnectorConfig = {}) {
        const s = settings.value;
        this.token = config.token ?? s.discogsToken;
        this.username = config.username ?? s.discogsUsername;
        this.userAgent = config.userAgent ?? s.discogsUserAgent;
        this.pageDelayMs = config.pageDelayMs ?? s.discogsPageDelayMs;
        this.detailDelayMs = config.detailDelayMs ?? s.discogsDetailDelayMs;
        this.cooldownMs = config.rateLimitCooldownMs ?? s.discogsRateLimitCooldownMs;
        this.maxRateLimitRetries = config.maxRateLimitRetries ?? 5;
        this.sleep = config.sleep ?? defaultSleep;
    }

    /**
     * Fail fast when the credentials are not configured.
     */
    assertConfigured(): void {
        if (!this.token || !this.username) {
            throw new SyncSourceError('Discogs token or username not configured');
        }
    }

    private get headers(): Record<string, string> {
        return {
            'Authorization': `Discogs token=${this.token}`,
            'User-Agent': this.userAgent,
        };
    }

    async fetchCollection(): Promise<Listing<CollectionEntry>> {
        const user = encodeURIComponent(this.username);
        return await this.fetchListing(`/users/${user}/collection/folders/0/releases`, 'releases', collectionEntrySchema);
    }

    async fetchWantlist(): Promise<Listing<WantEntry>> {
        const user = encodeURIComponent(this.username);
        return await this.fetchListing(`/users/${user}/wants`, 'wants', wantEntrySchema);
    }

    /**
     * Walk the pages of a listing. 429 retries the same page after the cool-down;
     * any other failure stops and returns what was collected so far.
     */
    private async fetchListing<T>(
        path: string,
        key: 'releases' | 'wants',
        itemSchema: Joi.ObjectSchema<T>,
    ): Promise<Listing<T>> {
        const items: T[] = [];
        let skipped = 0;
        let pages = 0;
        let page = 1;
        let rateLimited = 0;
        const incomplete = (): Listing<T> => ({items, complete: false, pages, skipped});

        while (true) {
            const params = new URLSearchParams({page: String(page), per_page: String(PAGE_SIZE)});
            let response: Response;
            try {
                response = await fetch(`${DISCOGS_API_BASE}${path}?${params.toString()}`, {headers: this.headers});
            } catch (err) {
                console.error(`❌ Network error on ${key} page ${page}: ${errorMessage(err)}`);
                return incomplete();
            }

            if (response.status === 429) {
                rateLimited++;
                if (rateLimited > this.maxRateLimitRetries) {
                    console.error(`❌ Still rate limited on ${key} page ${page}, giving up`);
                    return incomplete();
                }
                console.warn(`⚠️  Rate limited, waiting ${this.cooldownMs / 1000} seconds...`);
                await this.sleep(this.cooldownMs);
                continue;
            }
            rateLimited = 0;

            if (response.status !== 200) {
                console.error(`❌ API error: ${response.status} on ${key} page ${page}`);
                return incomplete();
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (err) {
                console.error(`❌ Unreadable ${key} page ${page}: ${errorMessage(err)}`);
                return incomplete();
            }
            const {error, value} = listingPageSchema.validate(body);
            if (error) {
                console.error(`❌ Malformed ${key} page ${page}: ${error.message}`);
                return incomplete();
            }

            pages = value.pagination.pages;
            for (const raw of value[key] ?? []) {
                const checked = itemSchema.validate(raw);
                if (checked.error) {
                    skipped++;
                    console.warn(`⚠️  Skipping malformed ${key} item on page ${page}: ${checked.error.message}`);
                    continue;
                }
                items.push(checked.value);
            }
            console.log(`  Fetched page ${page}/${pages} (${items.length} items)`);
            await this.sleep(this.pageDelayMs);

            if (page >= pages) break;
            page++;
        }

        return {items, complete: true, pages, skipped};
    }

    async fetchStats(releaseId: number): Promise<FetchResult<MarketplaceStats>> {
        const result = await this.fetchDetail(`/marketplace/stats/${releaseId}`, statsSchema, `stats ${releaseId}`);
        if (!result.ok) return result;
        return {ok: true, value: toMarketplaceStats(result.value)};
    }

    async fetchTracks(releaseId: number): Promise<FetchResult<CatalogTrackRecord[]>> {
        const result = await this.fetchDetail(`/releases/${releaseId}`, releaseSchema, `release ${releaseId}`);
        if (!result.ok) return result;
        return {ok: true, value: toTrackRecords(result.value)};
    }

    /**
     * One secondary call; a 429 is retried once after the cool-down.
     */
    private async fetchDetail<T>(path: string, schema: Joi.ObjectSchema<T>, subject: string): Promise<FetchResult<T>> {
        const first = await this.requestDetail(path, schema, subject);
        if (first.ok || first.error.kind !== 'rate_limited') return first;
        await this.sleep(this.cooldownMs);
        return await this.requestDetail(path, schema, subject);
    }

    private async requestDetail<T>(path: string, schema: Joi.ObjectSchema<T>, subject: string): Promise<FetchResult<T>> {
        const result = await this.attemptDetail(path, schema, subject);
        await this.sleep(this.detailDelayMs);
        return result;
    }

    private async attemptDetail<T>(path: string, schema: Joi.ObjectSchema<T>, subject: string): Promise<FetchResult<T>> {
        let response: Response;
        try {
            response = await fetch(`${DISCOGS_API_BASE}${path}`, {headers: this.headers});
        } catch (err) {
            return {ok: false, error: new FetchError('network', subject, errorMessage(err))};
        }

        if (response.status === 429) {
            return {ok: false, error: new FetchError('rate_limited', subject, 'Rate limited', 429)};
        }
        if (response.status !== 200) {
            return {ok: false, error: new FetchError('http', subject, `HTTP ${response.status}`, response.status)};
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            return {ok: false, error: new FetchError('malformed', subject, errorMessage(err), response.status)};
        }
        const {error, value} = schema.validate(body);
        if (error) {
            return {ok: false, error: new FetchError('malformed', subject, error.message, response.status)};
        }
        return {ok: true, value};
    }
}

function firstName(entries: NamedEntry[] | undefined): string | null {
    const name = entries?.[0]?.name;
    return name ? name : null;
}

function joinNames(entries: NamedEntry[] | undefined, withRole = false): string | null {
    if (!entries || entries.length === 0) return null;
    return entries
        .map((e) => (withRole && e.role ? `${e.name} (${e.role})` : e.name))
        .join(', ');
}

export function toMarketplaceStats(payload: StatsPayload): MarketplaceStats {
    return {
        lowestPrice: payload.lowest_price?.value ?? null,
        currency: payload.lowest_price?.currency ?? null,
        numForSale: payload.num_for_sale ?? null,
        blockedFromSale: payload.blocked_from_sale ?? false,
    };
}

/**
 * Tracklist rows of a release. Section headings are not tracks.
 */
export function toTrackRecords(release: ReleasePayload): CatalogTrackRecord[] {
    return (release.tracklist ?? [])
        .filter((t: TracklistEntry) => t.type_ !== 'heading')
        .map((t) => ({
            position: t.position || null,
            title: t.title || null,
            duration: t.duration || null,
            artists: joinNames(t.artists),
            extraArtists: joinNames(t.extraartists, true),
        }));
}

export function toCatalogItemRecord(entry: CollectionEntry): CatalogItemRecord {
    const basic = entry.basic_information;
    const note = (fieldId: number): string | null =>
        entry.notes?.find((n) => n.field_id === fieldId)?.value || null;
    return {
        releaseId: entry.id,
        instanceId: entry.instance_id ?? null,
        folderId: entry.folder_id ?? null,
        rating: entry.rating ?? null,
        artist: firstName(basic.artists) ?? UNKNOWN,
        title: basic.title || UNKNOWN,
        label: firstName(basic.labels),
        format: firstName(basic.formats),
        // 0 means "unknown year" upstream
        year: basic.year ? basic.year : null,
        dateAdded: parseDate(entry.date_added),
        thumbUrl: basic.thumb || null,
        coverImageUrl: basic.cover_image || null,
        mediaCondition: note(MEDIA_CONDITION_FIELD),
        sleeveCondition: note(SLEEVE_CONDITION_FIELD),
        stats: null,
    };
}

export function toWantlistRecord(entry: WantEntry): WantlistRecord {
    const basic = entry.basic_information;
    return {
        releaseId: entry.id,
        artist: firstName(basic.artists) ?? UNKNOWN,
        title: basic.title || UNKNOWN,
        label: firstName(basic.labels),
        format: firstName(basic.formats),
        year: basic.year ? basic.year : null,
        dateAdded: parseDate(entry.date_added),
        thumbUrl: basic.thumb || null,
        coverImageUrl: basic.cover_image || null,
        notes: entry.notes || null,
        stats: null,
    };
}
