/**
 * Store tests for the track index, cross-collection statistics, listening history and run snapshots
 */

jest.mock('../../src/modules/database/dataSource', () => jest.requireActual('../util/db/sqlite-datasource.mock'));

import {closeDataSource, initDataSource, resetDatabase} from '../util/db/sqlite-datasource.mock';
import {applyPhysicalTags, replaceLibraryAlbums} from '../../src/modules/database/services/LibraryAlbumService';
import {replaceLibraryTracks} from '../../src/modules/database/services/LibraryTrackService';
import {
    getCollectionItemByReleaseId,
    replaceCatalogTracks,
    replaceWantlist,
    upsertCollectionItem,
} from '../../src/modules/database/services/CatalogService';
import {getTrackIndexStats, rebuildTrackIndex, searchTrackIndex} from '../../src/modules/database/services/TrackIndexService';
import {
    countAlbumsInBoth,
    getCollectionOverview,
    getMarketplaceDuplicates,
    sumCollectionValue,
} from '../../src/modules/database/services/CollectionStatsService';
import {getRecentListens, recordListen} from '../../src/modules/database/services/ListeningHistoryService';
import {getRunSnapshots, recordRunSnapshot} from '../../src/modules/database/services/SyncHistoryService';
import {ListeningSource, TrackIndexSource} from '../../src/types/SyncEnums';
import {albumRecord, catalogRecord, stats, trackRecord, wantRecord} from '../data/database/collectionData';

async function seedCollections(): Promise<void> {
    await replaceLibraryAlbums([
        albumRecord('Wish You Were Here', 'Pink Floyd', 'a1'),
        albumRecord('Wish You Were Here', 'Pink Floyd', 'a2'),
        albumRecord('Abbey Road', 'The Beatles', 'a3'),
    ], 1000);
    await upsertCollectionItem(catalogRecord(101, 'Pink Floyd', 'Wish You Were Here!', {stats: stats(24.5, 4)}), new Set());
    await upsertCollectionItem(catalogRecord(102, 'Beatles', 'Abbey Road', {stats: stats(10.25, 2)}), new Set());
    await upsertCollectionItem(catalogRecord(103, 'Nick Drake', 'Pink Moon'), new Set());
}

describe('collection statistics', () => {
    beforeAll(async () => {
        await initDataSource();
    });

    beforeEach(async () => {
        await resetDatabase();
    });

    afterAll(async () => {
        await closeDataSource();
    });

    describe('track index', () => {
        beforeEach(async () => {
            await replaceLibraryTracks([
                trackRecord('Shine On You Crazy Diamond', 'Wish You Were Here', 'Pink Floyd'),
                trackRecord('Welcome to the Machine', 'Wish You Were Here', 'Pink Floyd'),
                trackRecord('   ', 'Wish You Were Here', 'Pink Floyd'),
            ], 1000);
            const {id} = await upsertCollectionItem(catalogRecord(101, 'Pink Floyd', 'Wish You Were Here'), new Set());
            await replaceCatalogTracks(id ?? 0, 101, [
                {position: 'A1', title: 'shine on you crazy diamond', duration: null, artists: null, extraArtists: null},
                {position: 'B1', title: '', duration: null, artists: null, extraArtists: null},
                {position: 'B2', title: 'Have a Cigar', duration: null, artists: null, extraArtists: null},
            ]);
        });

        test('indexes non-blank titles of both track tables', async () => {
            const result = await rebuildTrackIndex();

            expect(result).toEqual({total: 4, distinctTitles: 3});
        });

        test('takes album and artist from the owning release for catalog tracks', async () => {
            await rebuildTrackIndex();

            const hits = await searchTrackIndex('cigar');

            expect(hits.map((h) => [h.trackTitle, h.album, h.artist, h.source])).toEqual([
                ['Have a Cigar', 'Wish You Were Here', 'Pink Floyd', TrackIndexSource.CATALOG],
            ]);
        });

        test('a rebuild replaces the previous index', async () => {
            await rebuildTrackIndex();
            await replaceLibraryTracks([], 1000);

            const result = await rebuildTrackIndex();

            expect(result).toEqual({total: 2, distinctTitles: 2});
            expect(await getTrackIndexStats()).toEqual({total: 2, distinctTitles: 2});
        });
    });

    describe('cross-collection matching', () => {
        beforeEach(seedCollections);

        test('counts an album present in both collections once', async () => {
            expect(await countAlbumsInBoth()).toBe(2);
        });

        test('sums the lowest prices of owned releases', async () => {
            expect(await sumCollectionValue()).toBe(34.75);
        });

        test('lists owned releases that are physical duplicates in the library', async () => {
            await applyPhysicalTags([{title: 'Wish You Were Here', tag: 'myCDs'}]);

            const dupes = await getMarketplaceDuplicates();

            expect(dupes.map((d) => d.releaseId)).toEqual([101]);
        });

        test('overview combines table counts and derived figures', async () => {
            await replaceWantlist([wantRecord(201, 'Pink Moon', stats(15, 3)), wantRecord(202, 'Bryter Layter')], 1000);

            const overview = await getCollectionOverview();

            expect(overview).toEqual({
                libraryAlbums: 3,
                libraryTracks: 0,
                libraryPlayHistory: 0,
                catalogCollection: 3,
                catalogTracks: 0,
                catalogWantlist: 2,
                trackIndexTotal: 0,
                trackIndexDistinct: 0,
                listeningHistory: 0,
                albumsInBoth: 2,
                physicalDuplicates: 0,
                collectionValue: 34.75,
                wantlistAvailable: 1,
            });
        });
    });

    describe('listening history', () => {
        beforeEach(seedCollections);

        test('moves the last-listened time of the owned release forward only', async () => {
            const item = await getCollectionItemByReleaseId(103);
            const later = new Date('2025-06-10T20:00:00Z');
            const earlier = new Date('2025-06-01T20:00:00Z');

            await recordListen({artist: 'Nick Drake', album: 'Pink Moon', source: ListeningSource.CATALOG, listenedAt: later, catalogItemId: item?.id});
            await recordListen({artist: 'Nick Drake', album: 'Pink Moon', source: ListeningSource.CATALOG, listenedAt: earlier, catalogItemId: item?.id});

            expect((await getCollectionItemByReleaseId(103))?.lastListened).toEqual(later);
            const recent = await getRecentListens();
            expect(recent.map((r) => r.listenedAt)).toEqual([later, earlier]);
            expect(recent[0].catalogItemId).toBe(item?.id);
        });

        test('records a listen without a linked release', async () => {
            const entry = await recordListen({artist: 'Sparklehorse', album: 'Good Morning Spider', source: ListeningSource.LIBRARY});

            expect(entry.id).toBeGreaterThan(0);
            const [stored] = await getRecentListens(1);
            expect([stored.artist, stored.album, stored.source]).toEqual(['Sparklehorse', 'Good Morning Spider', ListeningSource.LIBRARY]);
        });
    });

    describe('run snapshots', () => {
        test('stores the table counts at the given time', async () => {
            await seedCollections();
            const at = new Date('2025-06-15T12:00:00Z');

            await recordRunSnapshot(at);

            const [snapshot] = await getRunSnapshots();
            expect(snapshot.syncDate).toEqual(at);
            expect(snapshot.libraryAlbums).toBe(3);
            expect(snapshot.catalogCollection).toBe(3);
            expect(snapshot.catalogWantlist).toBe(0);
        });
    });
});
