import {AppDataSource} from '../dataSource';
import {SyncRunSnapshot} from '../entities/syncRunSnapshot/SyncRunSnapshot';
import {countLibraryAlbums} from './LibraryAlbumService';
import {countLibraryTracks} from './LibraryTrackService';
import {countPlayHistory} from './PlayHistoryService';
import {countCatalogTracks, countCollection, countWantlist} from './CatalogService';
import {getTrackIndexStats} from './TrackIndexService';
import {countListeningHistory} from './ListeningHistoryService';

export type TableCounts = Omit<SyncRunSnapshot, 'id' | 'syncDate'>;

export async function collectTableCounts(): Promise<TableCounts> {
    const trackIndex = await getTrackIndexStats();
    return {
        libraryAlbums: await countLibraryAlbums(),
        libraryTracks: await countLibraryTracks(),
        libraryPlayHistory: await countPlayHistory(),
        catalogCollection: await countCollection(),
        catalogTracks: await countCatalogTracks(),
        catalogWantlist: await countWantlist(),
        trackIndexTotal: trackIndex.total,
        trackIndexDistinct: trackIndex.distinctTitles,
        listeningHistory: await countListeningHistory(),
    };
}

/**
 * Append a snapshot of every table's row count.
 */
export async function recordRunSnapshot(at: Date = new Date()): Promise<SyncRunSnapshot> {
    const repo = AppDataSource.getRepository(SyncRunSnapshot);
    const snapshot = repo.create({...(await collectTableCounts()), syncDate: at});
    return await repo.save(snapshot);
}

export async function getRunSnapshots(limit = 30): Promise<SyncRunSnapshot[]> {
    return await AppDataSource.getRepository(SyncRunSnapshot).find({
        order: {syncDate: 'DESC', id: 'DESC'},
        take: limit,
    });
}
