import {FileSyncSource} from './FileSyncSource';
import {SourceRunResult, SyncContext} from './SyncSourceInterface';
import {readLibraryTracksCsv} from '../connectors/files/LibraryTrackCsvReader';
import {replaceLibraryTracks} from '../../database/services/LibraryTrackService';
import {SyncSourceId} from '../../../types/SyncEnums';

export class LibraryTracksSource extends FileSyncSource {
    constructor() {
        super(SyncSourceId.LIBRARY_TRACKS, 'Library tracks (CSV export)');
    }

    protected configuredPath(ctx: SyncContext): string {
        return ctx.settings.libraryTracksFile;
    }

    protected async importFile(filePath: string, ctx: SyncContext): Promise<SourceRunResult> {
        const {records, skipped} = await readLibraryTracksCsv(filePath);
        const count = await replaceLibraryTracks(records, ctx.settings.commitBatchSize);
        console.log(`✅ Imported ${count} library tracks`);
        return {
            count,
            duplicates: [],
            details: skipped > 0 ? [`${skipped} row(s) without a title skipped`] : [],
        };
    }
}
