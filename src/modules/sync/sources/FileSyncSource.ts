import fs from 'node:fs';
import {BaseSyncSource, SourceRunResult, SyncContext} from './SyncSourceInterface';
import {shouldSkipFileSource, SkipDecision} from '../SkipPolicy';
import {fileModifiedAt} from '../connectors/files/exportFile';
import {getLedgerEntry, setFilePath} from '../../database/services/SyncLedgerService';
import {SyncSourceError} from '../../lib/errors';

/**
 * Export-file sources are change-gated: they import only when the file is newer than
 * the last successful import.
 *
 * The path comes from settings when configured there (and is then remembered in the
 * ledger); otherwise the path already stored in the ledger is used.
 */
export abstract class FileSyncSource extends BaseSyncSource {
    /** Path configured in settings, empty when unset. */
    protected abstract configuredPath(ctx: SyncContext): string;

    /** Read the file and replace the table. Returns the result for the run report. */
    protected abstract importFile(filePath: string, ctx: SyncContext): Promise<SourceRunResult>;

    /** Read-only: a skipped source leaves the ledger untouched. */
    async resolvePath(ctx: SyncContext): Promise<string | null> {
        const configured = this.configuredPath(ctx).trim();
        if (configured) return configured;
        const ledger = await getLedgerEntry(this.id);
        return ledger.filePath || null;
    }

    async shouldSkip(ctx: SyncContext): Promise<SkipDecision> {
        const filePath = await this.resolvePath(ctx);
        // Missing paths and files are reported by run().
        if (!filePath || !fs.existsSync(filePath)) {
            return {skip: false, reason: 'file unavailable'};
        }
        const ledger = await getLedgerEntry(this.id);
        return shouldSkipFileSource(ledger, ctx.force, await fileModifiedAt(filePath));
    }

    async run(ctx: SyncContext): Promise<SourceRunResult> {
        const filePath = await this.resolvePath(ctx);
        if (!filePath) {
            throw new SyncSourceError(`No file path configured for ${this.id}`);
        }
        if (!fs.existsSync(filePath)) {
            throw new SyncSourceError(`File not found: ${filePath}`);
        }
        await setFilePath(this.id, filePath);
        console.log(`  File: ${filePath}`);
        return await this.importFile(filePath, ctx);
    }
}
