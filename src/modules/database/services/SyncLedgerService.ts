import {AppDataSource} from '../dataSource';
import {SyncLedgerEntry} from '../entities/syncLedgerEntry/SyncLedgerEntry';
import {SOURCE_TYPES, SYNC_ORDER, SyncSourceId} from '../../../types/SyncEnums';
import {truncate} from '../../lib/util';

export const STATUS_SUCCESS = 'success';
const FAILURE_REASON_WIDTH = 50;
const STATUS_WIDTH = 100;

export function failureStatus(reason: string): string {
    return `failed: ${reason.slice(0, FAILURE_REASON_WIDTH)}`;
}

/**
 * Fetch the ledger row for a source, creating it on first use.
 */
export async function getLedgerEntry(source: SyncSourceId): Promise<SyncLedgerEntry> {
    const repo = AppDataSource.getRepository(SyncLedgerEntry);
    const existing = await repo.findOne({where: {sourceName: source}});
    if (existing) return existing;

    const entry = new SyncLedgerEntry();
    entry.sourceName = source;
    entry.sourceType = SOURCE_TYPES[source];
    entry.filePath = null;
    entry.lastSync = null;
    entry.lastSuccessAt = null;
    entry.recordsCount = null;
    entry.syncStatus = null;
    return await repo.save(entry);
}

export async function getAllLedgerEntries(): Promise<SyncLedgerEntry[]> {
    const entries: SyncLedgerEntry[] = [];
    for (const source of SYNC_ORDER) {
        entries.push(await getLedgerEntry(source));
    }
    return entries;
}

/**
 * Record the outcome of a sync attempt. lastSync moves on every attempt and drives
 * the skip rules; lastSuccessAt only moves on success and is informational.
 */
export async function recordSyncResult(
    source: SyncSourceId,
    count: number,
    status: string,
    at: Date = new Date(),
): Promise<SyncLedgerEntry> {
    const repo = AppDataSource.getRepository(SyncLedgerEntry);
    const entry = await getLedgerEntry(source);
    entry.lastSync = at;
    entry.recordsCount = count;
    entry.syncStatus = truncate(status, STATUS_WIDTH);
    if (status === STATUS_SUCCESS) {
        entry.lastSuccessAt = at;
    }
    entry.updatedAt = at;
    return await repo.save(entry);
}

export async function setFilePath(source: SyncSourceId, filePath: string): Promise<void> {
    const repo = AppDataSource.getRepository(SyncLedgerEntry);
    const entry = await getLedgerEntry(source);
    if (entry.filePath === filePath) return;
    entry.filePath = filePath;
    entry.updatedAt = new Date();
    await repo.save(entry);
}
