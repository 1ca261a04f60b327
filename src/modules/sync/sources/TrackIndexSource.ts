import {BaseSyncSource, SourceRunResult} from './SyncSourceInterface';
import {rebuildTrackIndex} from '../../database/services/TrackIndexService';
import {SyncSourceId} from '../../../types/SyncEnums';
import type {SkipDecision} from '../SkipPolicy';

/**
 * Derived title index over library and catalog tracks. Always rebuilt when selected.
 */
export class TrackIndexSource extends BaseSyncSource {
    constructor() {
        super(SyncSourceId.TRACK_INDEX, 'Track index');
    }

    async shouldSkip(): Promise<SkipDecision> {
        return {skip: false, reason: 'derived'};
    }

    async run(): Promise<SourceRunResult> {
        const stats = await rebuildTrackIndex();
        console.log(`✅ Track index rebuilt: ${stats.total} tracks, ${stats.distinctTitles} distinct titles`);
        return {count: stats.total, duplicates: [], details: [`${stats.distinctTitles} distinct titles`]};
    }
}
