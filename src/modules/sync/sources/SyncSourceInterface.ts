/**
 * Sync Source Contract
 * Every logical source (remote listing, export file, derived table) implements this.
 */

import type {RoonConnector} from '../connectors/roon/RoonConnector';
import type {DiscogsConnector} from '../connectors/discogs/DiscogsConnector';
import type {Settings} from '../../settings';
import type {SkipDecision} from '../SkipPolicy';
import {shouldSkipApiSource} from '../SkipPolicy';
import {getLedgerEntry} from '../../database/services/SyncLedgerService';
import {SOURCE_TYPES, SyncSourceId, SyncSourceType} from '../../../types/SyncEnums';

/**
 * Everything a source needs for one run. Connectors are shared by all sources of the run.
 */
export interface SyncContext {
    force: boolean;
    now: Date;
    settings: Settings;
    library: RoonConnector;
    catalog: DiscogsConnector;
    /** Sources that already completed successfully earlier in this run. */
    syncedThisRun: ReadonlySet<SyncSourceId>;
}

export interface SourceRunResult {
    /** Records written (or flagged, or indexed). */
    count: number;
    /** Unique keys seen more than once in the fetched data. */
    duplicates: string[];
    /** Non-fatal degradations and notes for the operator. */
    details: string[];
}

export interface SyncSource {
    readonly id: SyncSourceId;
    readonly type: SyncSourceType;
    readonly label: string;

    /**
     * Decide whether this source can be skipped. Never consulted when the run is forced.
     */
    shouldSkip(ctx: SyncContext): Promise<SkipDecision>;

    /**
     * Fetch, persist and report. Throwing marks the source as failed.
     */
    run(ctx: SyncContext): Promise<SourceRunResult>;
}

/**
 * Base class with the common bits
 */
export abstract class BaseSyncSource implements SyncSource {
    readonly type: SyncSourceType;

    protected constructor(readonly id: SyncSourceId, readonly label: string) {
        this.type = SOURCE_TYPES[id];
    }

    abstract shouldSkip(ctx: SyncContext): Promise<SkipDecision>;

    abstract run(ctx: SyncContext): Promise<SourceRunResult>;
}

/**
 * Remote sources are time-gated by the skip threshold.
 */
export abstract class ApiSyncSource extends BaseSyncSource {
    async shouldSkip(ctx: SyncContext): Promise<SkipDecision> {
        const ledger = await getLedgerEntry(this.id);
        return shouldSkipApiSource(ledger, ctx.force, ctx.settings.skipDays, ctx.now);
    }
}
