/**
 * Skip decisions for sync sources.
 *
 * Both rules read the time of the last attempt, failed or not.
 * API sources are time-gated: skipped while the last sync is younger than the threshold.
 * File sources are change-gated: skipped while the file has not been modified since the
 * last sync, however long ago that was.
 */

import {daysToMs} from '../lib/util';

export interface LedgerSnapshot {
    lastSync?: Date | null;
}

export interface SkipDecision {
    skip: boolean;
    reason: string;
}

export function shouldSkipApiSource(
    ledger: LedgerSnapshot | null,
    force: boolean,
    thresholdDays: number,
    now: Date = new Date(),
): SkipDecision {
    if (force) return {skip: false, reason: 'forced'};
    const last = ledger?.lastSync ?? null;
    if (!last) return {skip: false, reason: 'no previous sync'};

    const elapsed = now.getTime() - last.getTime();
    if (elapsed < daysToMs(thresholdDays)) {
        const days = Math.floor(elapsed / daysToMs(1));
        return {skip: true, reason: `last synced ${days} day(s) ago`};
    }
    return {skip: false, reason: 'threshold elapsed'};
}

export function shouldSkipFileSource(
    ledger: LedgerSnapshot | null,
    force: boolean,
    fileModifiedAt: Date | null,
): SkipDecision {
    if (force) return {skip: false, reason: 'forced'};
    const last = ledger?.lastSync ?? null;
    if (!last) return {skip: false, reason: 'no previous import'};
    if (!fileModifiedAt) return {skip: false, reason: 'file modification time unknown'};

    if (fileModifiedAt.getTime() <= last.getTime()) {
        return {skip: true, reason: 'file unchanged since last import'};
    }
    return {skip: false, reason: 'file changed since last import'};
}
