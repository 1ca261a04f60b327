import {AppDataSource} from '../dataSource';
import {LibraryTrack} from '../entities/libraryTrack/LibraryTrack';
import {deleteAll, insertInBatches} from '../bulk';
import {truncate} from '../../lib/util';
import type {LibraryTrackRecord} from '../../../types/CollectionTypes';

export async function replaceLibraryTracks(records: LibraryTrackRecord[], batchSize: number): Promise<number> {
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
        isDuplicate: r.isDuplicate,
        isHidden: r.isHidden,
        tags: r.tags,
        createdAt: at,
    }));
    await deleteAll(LibraryTrack);
    return await insertInBatches(LibraryTrack, rows, batchSize);
}

export async function countLibraryTracks(): Promise<number> {
    return await AppDataSource.getRepository(LibraryTrack).count();
}
