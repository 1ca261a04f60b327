/**
 * Sync Source Registry
 * Lookup of source handlers by id
 */

import {SyncSource} from './SyncSourceInterface';
import {LibraryAlbumsSource} from './LibraryAlbumsSource';
import {LibraryTagsSource} from './LibraryTagsSource';
import {CatalogCollectionSource} from './CatalogCollectionSource';
import {CatalogWantlistSource} from './CatalogWantlistSource';
import {LibraryTracksSource} from './LibraryTracksSource';
import {PlayHistorySource} from './PlayHistorySource';
import {TrackIndexSource} from './TrackIndexSource';
import {SYNC_ORDER, SyncSourceId} from '../../../types/SyncEnums';

export class SyncSourceRegistry {
    private sources: Map<SyncSourceId, SyncSource> = new Map();

    /**
     * Register a source, replacing any earlier one with the same id
     */
    register(source: SyncSource): void {
        this.sources.set(source.id, source);
    }

    getById(id: SyncSourceId): SyncSource | undefined {
        return this.sources.get(id);
    }

    has(id: SyncSourceId): boolean {
        return this.sources.has(id);
    }

    /**
     * All registered sources in execution order
     */
    getAll(): SyncSource[] {
        const out: SyncSource[] = [];
        for (const id of SYNC_ORDER) {
            const source = this.sources.get(id);
            if (source) out.push(source);
        }
        return out;
    }
}

export function createDefaultRegistry(): SyncSourceRegistry {
    const registry = new SyncSourceRegistry();
    registry.register(new LibraryAlbumsSource());
    registry.register(new LibraryTagsSource());
    registry.register(new CatalogCollectionSource());
    registry.register(new CatalogWantlistSource());
    registry.register(new LibraryTracksSource());
    registry.register(new PlayHistorySource());
    registry.register(new TrackIndexSource());
    return registry;
}
