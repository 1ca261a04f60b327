import {AppDataSource} from '../dataSource';
import {PlayHistoryEntry} from '../entities/playHistoryEntry/PlayHistoryEntry';
import {deleteAll, insertInBatches} from '../bulk';
import {truncate} from '../../lib/util';
import type {PlayHistoryRecord} from '../../../types/CollectionTypes';

export async function replacePlayHistory(records: PlayHistoryRecord[], batchSize: number): Promise<number> {
    const at = new Date();
    const rows = records.map((r) => ({
        albumArtist: truncate(r.albumArtist, 300),
        album: truncate(r.album, 500),
        discNumber: r.discNumber,
        trackNumber: r.trackNumber,
        trackTitle: truncate(r.title, 500),
        trackArtists: truncate(r.trackArtists, 500),
        composers: truncate(r.composers, 500),
        externalId: truncate(r.externalId, 100),
        source: truncate(r.source, 50),
        playedAt: r.playedAt,
        createdAt: at,
    }));
    await deleteAll(PlayHistoryEntry);
    return await insertInBatches(PlayHistoryEntry, rows, batchSize);
}

export async function getPlayHistoryEntryById(id: number): Promise<PlayHistoryEntry | null> {
    return await AppDataSource.getRepository(PlayHistoryEntry).findOne({where: {id}});
}

/**
 * Correct the time of one play event. Returns false when the row does not exist.
 */
export async function setPlayedAt(id: number, at: Date): Promise<boolean> {
    const repo = AppDataSource.getRepository(PlayHistoryEntry);
    if (await repo.count({where: {id}}) === 0) return false;
    await repo.update({id}, {playedAt: at});
    return true;
}

export async function countPlayHistory(): Promise<number> {
    return await AppDataSource.getRepository(PlayHistoryEntry).count();
}

/**
 * Most played albums, by number of play events.
 */
export async function getAlbumPlayCounts(limit = 20): Promise<Array<{artist: string | null; album: string | null; plays: number}>> {
    const rows: Array<{artist: string | null; album: string | null; plays: string | number}> = await AppDataSource
        .getRepository(PlayHistoryEntry)
        .createQueryBuilder('p')
        .select('p.album_artist', 'artist')
        .addSelect('p.album', 'album')
        .addSelect('COUNT(*)', 'plays')
        .groupBy('p.album_artist')
        .addGroupBy('p.album')
        .orderBy('plays', 'DESC')
        .limit(limit)
        .getRawMany();
    return rows.map((r) => ({artist: r.artist, album: r.album, plays: Number(r.plays)}));
}
