import {AppDataSource} from '../dataSource';
import {CatalogItem} from '../entities/catalogItem/CatalogItem';
import {LibraryAlbum} from '../entities/libraryAlbum/LibraryAlbum';
import {WantlistItem} from '../entities/wantlistItem/WantlistItem';
import {collectTableCounts, TableCounts} from './SyncHistoryService';

export interface CollectionOverview extends TableCounts {
    albumsInBoth: number;
    physicalDuplicates: number;
    collectionValue: number;
    wantlistAvailable: number;
}

type CountRow = {cnt: string | number | null} | undefined;

/**
 * Albums present in both collections, counted once per match key.
 */
export async function countAlbumsInBoth(): Promise<number> {
    const row: CountRow = await AppDataSource.getRepository(LibraryAlbum)
        .createQueryBuilder('la')
        .innerJoin(CatalogItem, 'cc', 'cc.match_key = la.match_key')
        .select('COUNT(DISTINCT la.match_key)', 'cnt')
        .getRawOne();
    return Number(row?.cnt ?? 0);
}

/**
 * Sum of the lowest marketplace price over owned releases that have one.
 */
export async function sumCollectionValue(): Promise<number> {
    const row: {total: string | number | null} | undefined = await AppDataSource.getRepository(CatalogItem)
        .createQueryBuilder('cc')
        .select('SUM(cc.lowest_price)', 'total')
        .where('cc.lowest_price IS NOT NULL')
        .getRawOne();
    const total = Number(row?.total ?? 0);
    return Math.round(total * 100) / 100;
}

/**
 * Owned releases whose match key equals a library album flagged as a physical duplicate.
 */
export async function getMarketplaceDuplicates(): Promise<CatalogItem[]> {
    return await AppDataSource.getRepository(CatalogItem)
        .createQueryBuilder('cc')
        .where(qb => {
            const sub = qb.subQuery()
                .select('la.match_key')
                .from(LibraryAlbum, 'la')
                .where('la.is_physical_dupe = 1')
                .getQuery();
            return `cc.match_key IN ${sub}`;
        })
        .orderBy('cc.artist', 'ASC')
        .addOrderBy('cc.album_title', 'ASC')
        .getMany();
}

export async function getCollectionOverview(): Promise<CollectionOverview> {
    const counts = await collectTableCounts();
    return {
        ...counts,
        albumsInBoth: await countAlbumsInBoth(),
        physicalDuplicates: await AppDataSource.getRepository(LibraryAlbum).count({where: {isPhysicalDupe: true}}),
        collectionValue: await sumCollectionValue(),
        wantlistAvailable: await AppDataSource.getRepository(WantlistItem).count({where: {available: true}}),
    };
}
