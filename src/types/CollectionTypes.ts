/**
 * Normalized records handed from the source adapters to the store services.
 */

export interface LibraryAlbumRecord {
    title: string;
    artist: string;
    imageKey: string | null;
    itemKey: string | null;
}

/** Membership of an album title in a physical-format tag. */
export interface PhysicalTagPair {
    title: string;
    tag: string;
}

interface LibraryTrackFields {
    albumArtist: string | null;
    album: string | null;
    discNumber: number | null;
    trackNumber: number | null;
    title: string;
    trackArtists: string | null;
    composers: string | null;
    externalId: string | null;
    source: string | null;
}

export interface LibraryTrackRecord extends LibraryTrackFields {
    isDuplicate: boolean;
    isHidden: boolean;
    tags: string | null;
}

export interface PlayHistoryRecord extends LibraryTrackFields {
    playedAt: Date;
}

export interface MarketplaceStats {
    lowestPrice: number | null;
    currency: string | null;
    numForSale: number | null;
    blockedFromSale: boolean;
}

export interface CatalogTrackRecord {
    position: string | null;
    title: string | null;
    duration: string | null;
    artists: string | null;
    extraArtists: string | null;
}

interface ReleaseSummary {
    releaseId: number;
    artist: string;
    title: string;
    label: string | null;
    format: string | null;
    year: number | null;
    dateAdded: Date | null;
    thumbUrl: string | null;
    coverImageUrl: string | null;
    /** Absent when the stats lookup failed or was never attempted. */
    stats: MarketplaceStats | null;
}

export interface CatalogItemRecord extends ReleaseSummary {
    instanceId: number | null;
    folderId: number | null;
    rating: number | null;
    mediaCondition: string | null;
    sleeveCondition: string | null;
}

export interface WantlistRecord extends ReleaseSummary {
    notes: string | null;
}

export interface UpsertResult {
    id: number | null;
    created: boolean;
    wasDuplicateInsert: boolean;
}

export interface ReplaceResult<K> {
    inserted: number;
    duplicates: K[];
}
