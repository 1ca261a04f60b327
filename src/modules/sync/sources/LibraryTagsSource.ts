import {ApiSyncSource, SourceRunResult, SyncContext} from './SyncSourceInterface';
import {applyPhysicalTags, ensurePhysicalDupeColumns} from '../../database/services/LibraryAlbumService';
import {physicalTagList} from '../../settings';
import {SyncSourceId} from '../../../types/SyncEnums';
import type {SkipDecision} from '../SkipPolicy';

/**
 * Flags library albums that are also owned physically, from the physical-format tags.
 */
export class LibraryTagsSource extends ApiSyncSource {
    constructor() {
        super(SyncSourceId.LIBRARY_TAGS, 'Library physical tags');
    }

    // A fresh album table has every flag reset, so it always needs re-tagging.
    async shouldSkip(ctx: SyncContext): Promise<SkipDecision> {
        if (ctx.syncedThisRun.has(SyncSourceId.LIBRARY_ALBUMS)) {
            return {skip: false, reason: 'albums were just replaced'};
        }
        return await super.shouldSkip(ctx);
    }

    async run(ctx: SyncContext): Promise<SourceRunResult> {
        const details: string[] = [];
        const added = await ensurePhysicalDupeColumns();
        if (added.length > 0) {
            details.push(`added columns: ${added.join(', ')}`);
        }

        const pairs = await ctx.library.fetchTaggedAlbums(physicalTagList(ctx.settings));
        const flagged = await applyPhysicalTags(pairs);
        details.push(`${pairs.length} tagged title(s), ${flagged} album(s) flagged`);
        console.log(`✅ Flagged ${flagged} physical duplicates`);
        return {count: flagged, duplicates: [], details};
    }
}
