import {FileSyncSource} from './FileSyncSource';
import {SourceRunResult, SyncContext} from './SyncSourceInterface';
import {readPlayHistoryJson} from '../connectors/files/PlayHistoryJsonReader';
import {replacePlayHistory} from '../../database/services/PlayHistoryService';
import {SyncSourceId} from '../../../types/SyncEnums';

export class PlayHistorySource extends FileSyncSource {
    constructor() {
        super(SyncSourceId.LIBRARY_PLAY_HISTORY, 'Play history (JSON export)');
    }

    protected configuredPath(ctx: SyncContext): string {
        return ctx.settings.playHistoryFile;
    }

    protected async importFile(filePath: string, ctx: SyncContext): Promise<SourceRunResult> {
        const {records, skipped} = await readPlayHistoryJson(filePath);
        const count = await replacePlayHistory(records, ctx.settings.commitBatchSize);
        console.log(`✅ Imported ${count} play history records`);
        return {
            count,
            duplicates: [],
            details: skipped > 0 ? [`${skipped} entr${skipped === 1 ? 'y' : 'ies'} skipped`] : [],
        };
    }
}
