import {TableColumn} from 'typeorm';
import {AppDataSource} from '../dataSource';
import {LibraryAlbum} from '../entities/libraryAlbum/LibraryAlbum';
import {deleteAll, dedupeBy, insertInBatches} from '../bulk';
import {matchFields} from '../../sync/MatchKey';
import {truncate} from '../../lib/util';
import type {LibraryAlbumRecord, PhysicalTagPair, ReplaceResult} from '../../../types/CollectionTypes';

const TABLE = 'library_albums';

function toRow(record: LibraryAlbumRecord, at: Date) {
    return {
        albumTitle: truncate(record.title, 500) ?? '',
        artist: truncate(record.artist, 300),
        imageKey: truncate(record.imageKey, 100),
        itemKey: truncate(record.itemKey, 50),
        ...matchFields(record.artist, record.title),
        isPhysicalDupe: false,
        physicalTag: null,
        createdAt: at,
        updatedAt: at,
    };
}

/**
 * Replace the whole album table with a fresh listing.
 * A repeated item key within the listing is reported and only its first row kept.
 * Flag columns missing from an older table are added before anything is deleted.
 */
export async function replaceLibraryAlbums(
    records: LibraryAlbumRecord[],
    batchSize: number,
): Promise<ReplaceResult<string>> {
    const added = await ensurePhysicalDupeColumns();
    if (added.length > 0) {
        console.log(`🔧 Added missing album columns: ${added.join(', ')}`);
    }

    const at = new Date();
    const {unique, duplicates} = dedupeBy(records, (r) => truncate(r.itemKey, 50));
    await deleteAll(LibraryAlbum);
    const inserted = await insertInBatches(LibraryAlbum, unique.map((r) => toRow(r, at)), batchSize);
    return {inserted, duplicates};
}

/**
 * Add the physical-duplicate columns when an older table lacks them.
 * Returns the names of the columns that were created.
 */
export async function ensurePhysicalDupeColumns(): Promise<string[]> {
    const queryRunner = AppDataSource.createQueryRunner();
    const added: string[] = [];
    try {
        if (!(await queryRunner.hasColumn(TABLE, 'is_physical_dupe'))) {
            await queryRunner.addColumn(TABLE, new TableColumn({
                name: 'is_physical_dupe',
                type: 'boolean',
                default: false,
            }));
            added.push('is_physical_dupe');
        }
        if (!(await queryRunner.hasColumn(TABLE, 'physical_tag'))) {
            await queryRunner.addColumn(TABLE, new TableColumn({
                name: 'physical_tag',
                type: 'varchar',
                length: '50',
                isNullable: true,
            }));
            added.push('physical_tag');
        }
    } finally {
        await queryRunner.release();
    }
    return added;
}

/**
 * Reset every physical-duplicate flag, then flag albums whose title equals a tagged
 * title, ignoring case. Artist is not compared. Returns the number of flagged albums.
 */
export async function applyPhysicalTags(pairs: PhysicalTagPair[]): Promise<number> {
    await AppDataSource.transaction(async (manager) => {
        await manager.createQueryBuilder()
            .update(LibraryAlbum)
            .set({isPhysicalDupe: false, physicalTag: null})
            .execute();

        for (const pair of pairs) {
            await manager.createQueryBuilder()
                .update(LibraryAlbum)
                .set({isPhysicalDupe: true, physicalTag: truncate(pair.tag, 50), updatedAt: new Date()})
                .where('LOWER(album_title) = LOWER(:title)', {title: pair.title})
                .execute();
        }
    });

    return await AppDataSource.getRepository(LibraryAlbum).count({where: {isPhysicalDupe: true}});
}

export async function countLibraryAlbums(): Promise<number> {
    return await AppDataSource.getRepository(LibraryAlbum).count();
}

export async function getLibraryAlbumById(id: number): Promise<LibraryAlbum | null> {
    return await AppDataSource.getRepository(LibraryAlbum).findOne({where: {id}});
}

export async function getPhysicalDuplicates(): Promise<LibraryAlbum[]> {
    return await AppDataSource.getRepository(LibraryAlbum).find({
        where: {isPhysicalDupe: true},
        order: {artist: 'ASC', albumTitle: 'ASC'},
    });
}
