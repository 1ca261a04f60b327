/**
 * Enum types for sync sources and collection entities
 */

export enum SyncSourceId {
    LIBRARY_ALBUMS = 'remote-library-albums',
    LIBRARY_TAGS = 'remote-library-tags',
    LIBRARY_TRACKS = 'remote-library-tracks',
    LIBRARY_PLAY_HISTORY = 'remote-library-play-history',
    CATALOG_COLLECTION = 'catalog-collection',
    CATALOG_WANTLIST = 'catalog-wantlist',
    TRACK_INDEX = 'track-index',
}

export enum SyncSourceType {
    API = 'api',
    FILE = 'file',
    DERIVED = 'derived',
}

export enum SyncOutcome {
    SYNCED = 'synced',
    SKIPPED = 'skipped',
    FAILED = 'failed',
}

export enum TrackIndexSource {
    LIBRARY = 'library',
    CATALOG = 'catalog',
}

export enum ListeningSource {
    LIBRARY = 'library',
    CATALOG = 'catalog',
    BOTH = 'both',
}

/** Fixed execution order; upstream sources first. */
export const SYNC_ORDER: readonly SyncSourceId[] = [
    SyncSourceId.LIBRARY_ALBUMS,
    SyncSourceId.LIBRARY_TAGS,
    SyncSourceId.CATALOG_COLLECTION,
    SyncSourceId.CATALOG_WANTLIST,
    SyncSourceId.LIBRARY_TRACKS,
    SyncSourceId.LIBRARY_PLAY_HISTORY,
    SyncSourceId.TRACK_INDEX,
];

export const SOURCE_TYPES: Readonly<Record<SyncSourceId, SyncSourceType>> = {
    [SyncSourceId.LIBRARY_ALBUMS]: SyncSourceType.API,
    [SyncSourceId.LIBRARY_TAGS]: SyncSourceType.API,
    [SyncSourceId.LIBRARY_TRACKS]: SyncSourceType.FILE,
    [SyncSourceId.LIBRARY_PLAY_HISTORY]: SyncSourceType.FILE,
    [SyncSourceId.CATALOG_COLLECTION]: SyncSourceType.API,
    [SyncSourceId.CATALOG_WANTLIST]: SyncSourceType.API,
    [SyncSourceId.TRACK_INDEX]: SyncSourceType.DERIVED,
};

export function isSyncSourceId(value: string): value is SyncSourceId {
    return SYNC_ORDER.some((id) => id === value);
}
