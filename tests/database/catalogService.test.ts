/**
 * Store tests for the owned collection, its tracks and the want-list
 */

jest.mock('../../src/modules/database/dataSource', () => jest.requireActual('../util/db/sqlite-datasource.mock'));

import {closeDataSource, initDataSource, resetDatabase} from '../util/db/sqlite-datasource.mock';
import {
    countCatalogTracks,
    countCollection,
    countWantlist,
    getCollectionItemById,
    getCollectionItemByReleaseId,
    getTracksForCollectionItem,
    pruneCollection,
    replaceCatalogTracks,
    replaceWantlist,
    setInCollection,
    setLastListened,
    setNotes,
    upsertCollectionItem,
} from '../../src/modules/database/services/CatalogService';
import {catalogRecord, stats, wantRecord} from '../data/database/collectionData';

const darkSide = () => catalogRecord(101, 'Pink Floyd', 'The Dark Side of the Moon', {stats: stats(24.5, 12)});

describe('CatalogService', () => {
    beforeAll(async () => {
        await initDataSource();
    });

    beforeEach(async () => {
        await resetDatabase();
    });

    afterAll(async () => {
        await closeDataSource();
    });

    describe('upsertCollectionItem', () => {
        test('inserts a new release with match columns', async () => {
            const result = await upsertCollectionItem(darkSide(), new Set());

            expect(result.created).toBe(true);
            expect(result.wasDuplicateInsert).toBe(false);
            const item = await getCollectionItemByReleaseId(101);
            expect(item?.matchKey).toBe('pink floyd - dark side of the moon');
            expect(item?.artistNorm).toBe('pink floyd');
            expect(item?.lowestPrice).toBe(24.5);
            expect(item?.numForSale).toBe(12);
            expect(item?.inCollection).toBe(false);
        });

        test('a second sync updates in place and keeps user fields', async () => {
            const first = await upsertCollectionItem(darkSide(), new Set());
            const id = first.id ?? 0;
            const listened = new Date('2025-05-01T21:00:00Z');
            await setLastListened(id, listened);
            await setInCollection(id, true);
            await setNotes(id, 'gatefold, signed');

            const second = await upsertCollectionItem(
                catalogRecord(101, 'Pink Floyd', 'The Dark Side of the Moon', {rating: 5, stats: stats(19.99, 30)}),
                new Set(),
            );

            expect(second).toEqual({id, created: false, wasDuplicateInsert: false});
            expect(await countCollection()).toBe(1);
            const item = await getCollectionItemById(id);
            expect(item?.rating).toBe(5);
            expect(item?.lowestPrice).toBe(19.99);
            expect(item?.numForSale).toBe(30);
            expect(item?.lastListened).toEqual(listened);
            expect(item?.inCollection).toBe(true);
            expect(item?.notes).toBe('gatefold, signed');
        });

        test('reports a release id repeated within one run', async () => {
            const seen = new Set<number>();
            const first = await upsertCollectionItem(darkSide(), seen);

            const again = await upsertCollectionItem(
                catalogRecord(101, 'Pink Floyd', 'The Dark Side of the Moon', {rating: 1}),
                seen,
            );

            expect(again).toEqual({id: first.id, created: false, wasDuplicateInsert: true});
            expect((await getCollectionItemByReleaseId(101))?.rating).toBe(3);
        });

        test('clears stats when the lookup failed', async () => {
            await upsertCollectionItem(darkSide(), new Set());

            await upsertCollectionItem(catalogRecord(101, 'Pink Floyd', 'The Dark Side of the Moon'), new Set());

            const item = await getCollectionItemByReleaseId(101);
            expect(item?.lowestPrice).toBeNull();
            expect(item?.numForSale).toBeNull();
        });
    });

    describe('user field updates', () => {
        test('return false for unknown rows', async () => {
            expect(await setInCollection(4242, true)).toBe(false);
            expect(await setNotes(4242, 'x')).toBe(false);
        });
    });

    describe('replaceCatalogTracks', () => {
        test('replaces the tracks of one release', async () => {
            const {id} = await upsertCollectionItem(darkSide(), new Set());
            const collectionId = id ?? 0;
            await replaceCatalogTracks(collectionId, 101, [
                {position: 'A1', title: 'Old', duration: null, artists: null, extraArtists: null},
            ]);

            const count = await replaceCatalogTracks(collectionId, 101, [
                {position: 'A1', title: 'Speak to Me', duration: '1:30', artists: null, extraArtists: 'Alan Parsons (Engineer)'},
                {position: 'A2', title: 'Breathe', duration: '2:43', artists: 'Pink Floyd', extraArtists: null},
            ]);

            expect(count).toBe(2);
            const tracks = await getTracksForCollectionItem(collectionId);
            expect(tracks.map((t) => [t.position, t.trackTitle, t.extraArtists])).toEqual([
                ['A1', 'Speak to Me', 'Alan Parsons (Engineer)'],
                ['A2', 'Breathe', null],
            ]);
        });
    });

    describe('pruneCollection', () => {
        test('removes releases missing from the listing together with their tracks', async () => {
            const kept = await upsertCollectionItem(darkSide(), new Set());
            const gone = await upsertCollectionItem(catalogRecord(102, 'Pink Floyd', 'Animals'), new Set());
            await replaceCatalogTracks(kept.id ?? 0, 101, [{position: 'A1', title: 'Speak to Me', duration: null, artists: null, extraArtists: null}]);
            await replaceCatalogTracks(gone.id ?? 0, 102, [{position: 'A1', title: 'Dogs', duration: null, artists: null, extraArtists: null}]);

            const removed = await pruneCollection([101]);

            expect(removed).toBe(1);
            expect(await countCollection()).toBe(1);
            expect(await getCollectionItemByReleaseId(102)).toBeNull();
            expect(await countCatalogTracks()).toBe(1);
        });
    });

    describe('replaceWantlist', () => {
        test('replaces the table and keeps the first of repeated release ids', async () => {
            await replaceWantlist([wantRecord(1, 'Old entry')], 1000);

            const result = await replaceWantlist([
                wantRecord(201, 'Pink Moon', stats(15, 3)),
                wantRecord(202, 'Bryter Layter', stats(null, 0)),
                wantRecord(201, 'Pink Moon (again)'),
            ], 1);

            expect(result).toEqual({inserted: 2, duplicates: [201]});
            expect(await countWantlist()).toBe(2);
        });
    });
});
