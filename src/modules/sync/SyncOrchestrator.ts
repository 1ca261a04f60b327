/**
 * Sync Orchestrator
 *
 * Runs the selected sources in fixed order, one at a time. Each source is isolated:
 * whatever it throws is recorded in the ledger as a failure and the run moves on.
 * run() itself never throws.
 */

import {SyncContext, SyncSource} from './sources/SyncSourceInterface';
import {createDefaultRegistry, SyncSourceRegistry} from './sources/SyncSourceRegistry';
import {RoonConnector} from './connectors/roon/RoonConnector';
import {DiscogsConnector} from './connectors/discogs/DiscogsConnector';
import {failureStatus, getLedgerEntry, recordSyncResult, STATUS_SUCCESS} from '../database/services/SyncLedgerService';
import {recordRunSnapshot} from '../database/services/SyncHistoryService';
import {errorMessage} from '../lib/util';
import settingsStore, {Settings} from '../settings';
import {SYNC_ORDER, SyncOutcome, SyncSourceId} from '../../types/SyncEnums';

export type SourceSelection = readonly SyncSourceId[] | 'all';

export interface RunOptions {
    sources?: SourceSelection;
    force?: boolean;
    /** Leave the library session open for a later run in the same process. */
    keepLibrarySession?: boolean;
}

export interface SourceReport {
    source: SyncSourceId;
    outcome: SyncOutcome;
    count: number;
    message: string;
    duplicates: string[];
    details: string[];
}

export interface RunReport {
    startedAt: Date;
    finishedAt: Date;
    full: boolean;
    forced: boolean;
    sources: SourceReport[];
    snapshotWritten: boolean;
}

export interface OrchestratorDeps {
    registry?: SyncSourceRegistry;
    library?: RoonConnector;
    catalog?: DiscogsConnector;
    settings?: Settings;
    clock?: () => Date;
}

/**
 * Expand a selection into the sources to run, in execution order.
 * Albums pull in tags; library tracks and the catalog collection pull in the track index.
 */
export function resolveSelection(selection: SourceSelection): SyncSourceId[] {
    if (selection === 'all') return [...SYNC_ORDER];

    const wanted = new Set(selection);
    if (wanted.has(SyncSourceId.LIBRARY_ALBUMS)) {
        wanted.add(SyncSourceId.LIBRARY_TAGS);
    }
    if (wanted.has(SyncSourceId.LIBRARY_TRACKS) || wanted.has(SyncSourceId.CATALOG_COLLECTION)) {
        wanted.add(SyncSourceId.TRACK_INDEX);
    }
    return SYNC_ORDER.filter((id) => wanted.has(id));
}

export class SyncOrchestrator {
    private readonly registry: SyncSourceRegistry;
    private readonly library: RoonConnector;
    private readonly catalog: DiscogsConnector;
    private readonly settings: Settings;
    private readonly clock: () => Date;

    constructor(deps: OrchestratorDeps = {}) {
        this.registry = deps.registry ?? createDefaultRegistry();
        this.library = deps.library ?? new RoonConnector();
        this.catalog = deps.catalog ?? new DiscogsConnector();
        this.settings = deps.settings ?? settingsStore.value;
        this.clock = deps.clock ?? (() => new Date());
    }

    async run(options: RunOptions = {}): Promise<RunReport> {
        const selection = options.sources ?? 'all';
        const full = selection === 'all';
        const force = options.force ?? false;
        const startedAt = this.clock();
        const reports: SourceReport[] = [];
        const synced = new Set<SyncSourceId>();

        console.log(`🔄 Music collection sync started ${startedAt.toISOString()}${force ? ' (forced)' : ''}`);

        try {
            for (const id of resolveSelection(selection)) {
                const source = this.registry.getById(id);
                if (!source) {
                    console.warn(`⚠️  No handler registered for ${id}`);
                    continue;
                }
                const ctx: SyncContext = {
                    force,
                    now: this.clock(),
                    settings: this.settings,
                    library: this.library,
                    catalog: this.catalog,
                    syncedThisRun: synced,
                };
                const report = await this.runSource(source, ctx);
                if (report.outcome === SyncOutcome.SYNCED) synced.add(id);
                reports.push(report);
            }
        } finally {
            if (!options.keepLibrarySession) {
                await this.library.close();
            }
        }

        let snapshotWritten = false;
        if (full) {
            try {
                await recordRunSnapshot(this.clock());
                snapshotWritten = true;
            } catch (err) {
                console.error(`❌ Could not record run snapshot: ${errorMessage(err)}`);
            }
        }

        const finishedAt = this.clock();
        printSummary(reports, finishedAt);
        return {startedAt, finishedAt, full, forced: force, sources: reports, snapshotWritten};
    }

    private async runSource(source: SyncSource, ctx: SyncContext): Promise<SourceReport> {
        console.log(`\n=== ${source.label} (${source.type}) ===`);
        const base: Pick<SourceReport, 'source' | 'duplicates' | 'details'> = {source: source.id, duplicates: [], details: []};

        try {
            if (!ctx.force) {
                const decision = await source.shouldSkip(ctx);
                if (decision.skip) {
                    console.log(`⏭  Skipping ${source.id}: ${decision.reason} (use --force to override)`);
                    const ledger = await getLedgerEntry(source.id);
                    return {...base, outcome: SyncOutcome.SKIPPED, count: ledger.recordsCount ?? 0, message: decision.reason};
                }
            }

            const result = await source.run(ctx);
            await recordSyncResult(source.id, result.count, STATUS_SUCCESS, this.clock());
            return {source: source.id, outcome: SyncOutcome.SYNCED, message: STATUS_SUCCESS, ...result};
        } catch (err) {
            const message = errorMessage(err);
            console.error(`❌ ${source.label} failed: ${message}`);
            try {
                await recordSyncResult(source.id, 0, failureStatus(message), this.clock());
            } catch (ledgerErr) {
                console.error(`❌ Could not record failure for ${source.id}: ${errorMessage(ledgerErr)}`);
            }
            return {...base, outcome: SyncOutcome.FAILED, count: 0, message};
        }
    }
}

function printSummary(reports: SourceReport[], finishedAt: Date): void {
    console.log(`\n📦 Sync finished ${finishedAt.toISOString()}`);
    for (const r of reports) {
        const icon = r.outcome === SyncOutcome.SYNCED ? '✅' : r.outcome === SyncOutcome.SKIPPED ? '⏭ ' : '❌';
        console.log(`  ${icon} ${r.source}: ${r.count} records (${r.message})`);
        for (const detail of r.details) {
            console.log(`      - ${detail}`);
        }
        if (r.duplicates.length > 0) {
            console.log(`      - ${r.duplicates.length} duplicate key(s): ${r.duplicates.slice(0, 10).join(', ')}`);
        }
    }
}
