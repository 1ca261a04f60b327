import {AppDataSource} from '../dataSource';
import {TrackIndexEntry} from '../entities/trackIndexEntry/TrackIndexEntry';
import {TrackIndexSource} from '../../../types/SyncEnums';

export interface TrackIndexStats {
    total: number;
    distinctTitles: number;
}

const COPY_LIBRARY_TRACKS = `
    INSERT INTO track_index (track_title, album, artist, source)
    SELECT t.track_title, t.album, t.album_artist, ?
    FROM library_tracks t
    WHERE t.track_title IS NOT NULL AND TRIM(t.track_title) <> ''
`;

const COPY_CATALOG_TRACKS = `
    INSERT INTO track_index (track_title, album, artist, source)
    SELECT t.track_title, c.album_title, c.artist, ?
    FROM catalog_tracks t
    INNER JOIN catalog_collection c ON c.id = t.collection_id
    WHERE t.track_title IS NOT NULL AND TRIM(t.track_title) <> ''
`;

/**
 * Drop and rebuild the flattened track index from both track tables.
 * Blank titles are left out.
 */
export async function rebuildTrackIndex(): Promise<TrackIndexStats> {
    await AppDataSource.transaction(async (manager) => {
        await manager.createQueryBuilder().delete().from(TrackIndexEntry).execute();
        await manager.query(COPY_LIBRARY_TRACKS, [TrackIndexSource.LIBRARY]);
        await manager.query(COPY_CATALOG_TRACKS, [TrackIndexSource.CATALOG]);
    });
    return await getTrackIndexStats();
}

/**
 * Distinct titles are compared case-insensitively.
 */
export async function getTrackIndexStats(): Promise<TrackIndexStats> {
    const repo = AppDataSource.getRepository(TrackIndexEntry);
    const total = await repo.count();
    const row: {cnt: string | number | null} | undefined = await repo
        .createQueryBuilder('ti')
        .select('COUNT(DISTINCT LOWER(ti.track_title))', 'cnt')
        .getRawOne();
    return {total, distinctTitles: Number(row?.cnt ?? 0)};
}

export async function searchTrackIndex(title: string, limit = 50): Promise<TrackIndexEntry[]> {
    return await AppDataSource.getRepository(TrackIndexEntry)
        .createQueryBuilder('ti')
        .where('LOWER(ti.track_title) LIKE :q', {q: `%${title.toLowerCase()}%`})
        .orderBy('ti.track_title', 'ASC')
        .limit(limit)
        .getMany();
}
