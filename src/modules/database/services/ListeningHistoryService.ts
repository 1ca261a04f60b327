import {AppDataSource} from '../dataSource';
import {ListeningHistoryEntry} from '../entities/listeningHistoryEntry/ListeningHistoryEntry';
import {CatalogItem} from '../entities/catalogItem/CatalogItem';
import {LibraryAlbum} from '../entities/libraryAlbum/LibraryAlbum';
import {ListeningSource} from '../../../types/SyncEnums';
import {truncate} from '../../lib/util';

export interface RecordListenData {
    artist: string | null;
    album: string | null;
    source: ListeningSource;
    listenedAt?: Date;
    notes?: string | null;
    catalogItemId?: number | null;
    libraryAlbumId?: number | null;
}

/**
 * Append a listening event. When it points at an owned release, that release's
 * last-listened time moves forward as well.
 */
export async function recordListen(data: RecordListenData): Promise<ListeningHistoryEntry> {
    const listenedAt = data.listenedAt ?? new Date();
    return await AppDataSource.transaction(async (manager) => {
        const entry = new ListeningHistoryEntry();
        entry.artist = truncate(data.artist, 300);
        entry.album = truncate(data.album, 500);
        entry.source = data.source;
        entry.listenedAt = listenedAt;
        entry.notes = data.notes ?? null;
        entry.createdAt = new Date();

        if (data.catalogItemId) {
            const item = await manager.findOne(CatalogItem, {where: {id: data.catalogItemId}});
            entry.catalogItem = item;
            if (item && (!item.lastListened || item.lastListened < listenedAt)) {
                await manager.update(CatalogItem, {id: item.id}, {lastListened: listenedAt});
            }
        }
        if (data.libraryAlbumId) {
            entry.libraryAlbum = await manager.findOne(LibraryAlbum, {where: {id: data.libraryAlbumId}});
        }

        return await manager.save(entry);
    });
}

export async function getRecentListens(limit = 50): Promise<ListeningHistoryEntry[]> {
    return await AppDataSource.getRepository(ListeningHistoryEntry).find({
        order: {listenedAt: 'DESC', id: 'DESC'},
        take: limit,
    });
}

export async function countListeningHistory(): Promise<number> {
    return await AppDataSource.getRepository(ListeningHistoryEntry).count();
}
