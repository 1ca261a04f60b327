import {In} from 'typeorm';
import {AppDataSource} from '../dataSource';
import {CatalogItem} from '../entities/catalogItem/CatalogItem';
import {CatalogTrack} from '../entities/catalogTrack/CatalogTrack';
import {WantlistItem} from '../entities/wantlistItem/WantlistItem';
import {deleteAll, dedupeBy, insertInBatches} from '../bulk';
import {matchFields} from '../../sync/MatchKey';
import {chunk, truncate} from '../../lib/util';
import type {
    CatalogItemRecord,
    CatalogTrackRecord,
    ReplaceResult,
    UpsertResult,
    WantlistRecord,
} from '../../../types/CollectionTypes';

const MARKETPLACE_URL = 'https://www.discogs.com/sell/release';

/**
 * Insert or update one owned release, keyed by release id.
 *
 * Existing rows only get their mutable fields refreshed (marketplace stats, rating,
 * folder, conditions, images); identity and user-owned fields are left alone.
 * A release id already handled during this run is reported and not applied again.
 */
export async function upsertCollectionItem(
    record: CatalogItemRecord,
    seenThisRun: Set<number>,
): Promise<UpsertResult> {
    const repo = AppDataSource.getRepository(CatalogItem);
    let item = await repo.findOne({where: {releaseId: record.releaseId}});

    if (seenThisRun.has(record.releaseId)) {
        return {id: item?.id ?? null, created: false, wasDuplicateInsert: true};
    }
    seenThisRun.add(record.releaseId);

    const now = new Date();
    if (item) {
        item.numForSale = record.stats?.numForSale ?? null;
        item.lowestPrice = record.stats?.lowestPrice ?? null;
        item.rating = record.rating;
        item.folderId = record.folderId;
        item.mediaCondition = truncate(record.mediaCondition, 100);
        item.sleeveCondition = truncate(record.sleeveCondition, 100);
        item.thumbUrl = truncate(record.thumbUrl, 500);
        item.coverImageUrl = truncate(record.coverImageUrl, 500);
        item.updatedAt = now;
        item = await repo.save(item);
        return {id: item.id, created: false, wasDuplicateInsert: false};
    }

    item = new CatalogItem();
    item.releaseId = record.releaseId;
    item.instanceId = record.instanceId;
    item.folderId = record.folderId;
    item.artist = truncate(record.artist, 300);
    item.albumTitle = truncate(record.title, 500);
    item.label = truncate(record.label, 300);
    item.format = truncate(record.format, 100);
    item.year = record.year;
    item.dateAdded = record.dateAdded;
    item.rating = record.rating;
    Object.assign(item, matchFields(record.artist, record.title));
    item.numForSale = record.stats?.numForSale ?? null;
    item.lowestPrice = record.stats?.lowestPrice ?? null;
    item.thumbUrl = truncate(record.thumbUrl, 500);
    item.coverImageUrl = truncate(record.coverImageUrl, 500);
    item.mediaCondition = truncate(record.mediaCondition, 100);
    item.sleeveCondition = truncate(record.sleeveCondition, 100);
    item.lastListened = null;
    item.inCollection = false;
    item.notes = null;
    item.createdAt = now;
    item.updatedAt = now;
    item = await repo.save(item);
    return {id: item.id, created: true, wasDuplicateInsert: false};
}

/**
 * Replace the track list of one collection row.
 */
export async function replaceCatalogTracks(
    collectionId: number,
    releaseId: number,
    tracks: CatalogTrackRecord[],
): Promise<number> {
    const at = new Date();
    const rows = tracks.map((t) => ({
        collectionId,
        releaseId,
        position: truncate(t.position, 20),
        trackTitle: truncate(t.title, 500),
        duration: truncate(t.duration, 20),
        trackArtists: truncate(t.artists, 500),
        extraArtists: truncate(t.extraArtists, 500),
        createdAt: at,
    }));
    await AppDataSource.transaction(async (manager) => {
        await manager.delete(CatalogTrack, {collectionId});
        for (const part of chunk(rows, 100)) {
            await manager.insert(CatalogTrack, part);
        }
    });
    return rows.length;
}

/**
 * Remove owned releases that were not part of the latest complete listing.
 * Their tracks are deleted with them.
 */
export async function pruneCollection(keepReleaseIds: Iterable<number>): Promise<number> {
    const keep = new Set(keepReleaseIds);
    const repo = AppDataSource.getRepository(CatalogItem);
    const existing = await repo.find({select: {id: true, releaseId: true}});
    const stale = existing.filter((row) => !keep.has(row.releaseId)).map((row) => row.id);

    for (const ids of chunk(stale, 500)) {
        await AppDataSource.getRepository(CatalogTrack).delete({collectionId: In(ids)});
        await repo.delete({id: In(ids)});
    }
    return stale.length;
}

/**
 * Replace the whole want-list. A repeated release id is reported and only its first row kept.
 */
export async function replaceWantlist(records: WantlistRecord[], batchSize: number): Promise<ReplaceResult<number>> {
    const at = new Date();
    const {unique, duplicates} = dedupeBy(records, (r) => r.releaseId);
    const rows = unique.map((r) => {
        const numForSale = r.stats?.numForSale ?? 0;
        return {
            releaseId: r.releaseId,
            artist: truncate(r.artist, 300),
            albumTitle: truncate(r.title, 500),
            label: truncate(r.label, 300),
            format: truncate(r.format, 100),
            year: r.year,
            dateAdded: r.dateAdded,
            notes: r.notes,
            numForSale,
            lowestPrice: r.stats?.lowestPrice ?? null,
            available: numForSale > 0,
            marketplaceUrl: `${MARKETPLACE_URL}/${r.releaseId}`,
            thumbUrl: truncate(r.thumbUrl, 500),
            coverImageUrl: truncate(r.coverImageUrl, 500),
            createdAt: at,
            updatedAt: at,
        };
    });
    await deleteAll(WantlistItem);
    const inserted = await insertInBatches(WantlistItem, rows, batchSize);
    return {inserted, duplicates};
}

export async function getCollectionItemById(id: number): Promise<CatalogItem | null> {
    return await AppDataSource.getRepository(CatalogItem).findOne({where: {id}});
}

export async function getCollectionItemByReleaseId(releaseId: number): Promise<CatalogItem | null> {
    return await AppDataSource.getRepository(CatalogItem).findOne({where: {releaseId}});
}

export async function getTracksForCollectionItem(collectionId: number): Promise<CatalogTrack[]> {
    return await AppDataSource.getRepository(CatalogTrack).find({
        where: {collectionId},
        order: {id: 'ASC'},
    });
}

// Point updates for user-owned fields. Each returns false when the row does not exist.

async function updateUserFields(id: number, fields: Pick<Partial<CatalogItem>, 'lastListened' | 'inCollection' | 'notes'>): Promise<boolean> {
    const repo = AppDataSource.getRepository(CatalogItem);
    if (await repo.count({where: {id}}) === 0) return false;
    await repo.update({id}, fields);
    return true;
}

export async function setLastListened(id: number, at: Date | null): Promise<boolean> {
    return await updateUserFields(id, {lastListened: at});
}

export async function setInCollection(id: number, flag: boolean): Promise<boolean> {
    return await updateUserFields(id, {inCollection: flag});
}

export async function setNotes(id: number, notes: string | null): Promise<boolean> {
    return await updateUserFields(id, {notes});
}

export async function countCollection(): Promise<number> {
    return await AppDataSource.getRepository(CatalogItem).count();
}

export async function countCatalogTracks(): Promise<number> {
    return await AppDataSource.getRepository(CatalogTrack).count();
}

export async function countWantlist(): Promise<number> {
    return await AppDataSource.getRepository(WantlistItem).count();
}
