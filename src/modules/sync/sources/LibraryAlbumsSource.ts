import {ApiSyncSource, SourceRunResult, SyncContext} from './SyncSourceInterface';
import {replaceLibraryAlbums} from '../../database/services/LibraryAlbumService';
import {SyncSourceError} from '../../lib/errors';
import {SyncSourceId} from '../../../types/SyncEnums';
import type {BrowseItem} from '../connectors/roon/RoonTypes';
import type {LibraryAlbumRecord} from '../../../types/CollectionTypes';

export function toLibraryAlbumRecord(item: BrowseItem): LibraryAlbumRecord {
    return {
        title: item.title,
        artist: item.subtitle ?? '',
        imageKey: item.image_key ?? null,
        itemKey: item.item_key ?? null,
    };
}

/**
 * Full album listing of the remote library, replacing the local table.
 */
export class LibraryAlbumsSource extends ApiSyncSource {
    constructor() {
        super(SyncSourceId.LIBRARY_ALBUMS, 'Library albums');
    }

    async run(ctx: SyncContext): Promise<SourceRunResult> {
        const listing = await ctx.library.fetchAlbums();
        if (listing.reportedCount === 0 || listing.items.length === 0) {
            throw new SyncSourceError('No albums found');
        }

        const details: string[] = [];
        if (listing.items.length < listing.reportedCount) {
            details.push(`listing ended early: ${listing.items.length} of ${listing.reportedCount} albums`);
        }

        const records = listing.items.map(toLibraryAlbumRecord);
        const {inserted, duplicates} = await replaceLibraryAlbums(records, ctx.settings.commitBatchSize);
        if (duplicates.length > 0) {
            console.warn(`⚠️  ${duplicates.length} repeated album key(s) skipped`);
        }
        console.log(`✅ Synced ${inserted} library albums`);
        return {count: inserted, duplicates, details};
    }
}
