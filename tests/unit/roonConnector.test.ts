/**
 * Unit tests for the library core connector
 * Navigation, pagination, reconnect and tag handling against an in-memory browse tree
 */

import {RoonConnector} from '../../src/modules/sync/connectors/roon/RoonConnector';
import {
    LibraryBrowseError,
    LibraryConnectionError,
    MenuNotFoundError,
    SyncSourceError,
} from '../../src/modules/lib/errors';
import {albumNodes, FakeBrowseClient, libraryTree} from '../mocks/FakeBrowseClient';
import {expectedTagPairs, paginationData, physicalTags} from '../data/connector/roonData';
import {instantSleep, verifyThrowsError} from '../keywords/sync/syncKeywords';

function connectorFor(...clients: FakeBrowseClient[]) {
    const openSession = jest.fn();
    for (const client of clients) openSession.mockResolvedValueOnce(client);
    const sleep = instantSleep();
    const connector = new RoonConnector({openSession, retryAttempts: 2, retryDelayMs: 2000, pageSize: 100, sleep});
    return {connector, openSession, sleep};
}

describe('RoonConnector', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('fetchAlbums', () => {
        test.each(paginationData)('$description', async ({albums, reportedCount, expectedItems, expectedOffsets}) => {
            const client = new FakeBrowseClient(libraryTree({albums: albumNodes(albums), albumsReportedCount: reportedCount}));
            const {connector} = connectorFor(client);

            const listing = await connector.fetchAlbums();

            expect(listing.items).toHaveLength(expectedItems);
            expect(listing.reportedCount).toBe(reportedCount ?? albums);
            // the first two loads read the root and Library menus
            expect(client.loads.slice(2).map((l) => l.offset)).toEqual(expectedOffsets);
        });

        test('navigates root, Library and Albums by exact title', async () => {
            const client = new FakeBrowseClient(libraryTree({albums: albumNodes(2)}));
            const {connector} = connectorFor(client);

            const listing = await connector.fetchAlbums();

            expect(client.browses).toEqual([
                {hierarchy: 'browse', pop_all: true},
                {hierarchy: 'browse', item_key: 'menu-library'},
                {hierarchy: 'browse', item_key: 'menu-albums'},
            ]);
            expect(listing.items[0]).toEqual({title: 'Album 1', subtitle: 'Artist 1', image_key: 'img-1', item_key: 'album-1'});
        });

        test('returns an empty listing when the core reports no albums', async () => {
            const {connector} = connectorFor(new FakeBrowseClient(libraryTree({albums: []})));

            const listing = await connector.fetchAlbums();

            expect(listing).toEqual({reportedCount: 0, items: []});
        });

        test('fails with MenuNotFoundError when the Albums menu is missing, without retrying', async () => {
            const {connector, openSession} = connectorFor(new FakeBrowseClient(libraryTree({withoutAlbums: true})));

            await expect(connector.fetchAlbums()).rejects.toBeInstanceOf(MenuNotFoundError);
            await verifyThrowsError(() => connector.fetchAlbums(), 'Albums menu not found');
            expect(openSession).toHaveBeenCalledTimes(1);
        });

        test('reconnects once after a connection failure', async () => {
            const first = new FakeBrowseClient(libraryTree({albums: albumNodes(3)}));
            first.failures.push(new LibraryConnectionError('socket closed'));
            const second = new FakeBrowseClient(libraryTree({albums: albumNodes(3)}));
            const {connector, openSession, sleep} = connectorFor(first, second);

            const listing = await connector.fetchAlbums();

            expect(listing.items).toHaveLength(3);
            expect(first.closed).toBe(true);
            expect(second.closed).toBe(false);
            expect(openSession).toHaveBeenCalledTimes(2);
            expect(sleep).toHaveBeenCalledTimes(1);
            expect(sleep).toHaveBeenCalledWith(2000);
        });

        test('gives up after two attempts', async () => {
            const failing = () => {
                const client = new FakeBrowseClient(libraryTree({albums: albumNodes(3)}));
                client.failures.push(new LibraryConnectionError('socket closed'));
                return client;
            };
            const {connector, openSession, sleep} = connectorFor(failing(), failing());

            await verifyThrowsError(() => connector.fetchAlbums(), 'Album listing failed after 2 attempts: socket closed');
            expect(openSession).toHaveBeenCalledTimes(2);
            expect(sleep).toHaveBeenCalledTimes(1);
            expect(connector.isConnected).toBe(false);
        });

        test('does not retry error replies from the core', async () => {
            const client = new FakeBrowseClient(libraryTree({albums: albumNodes(3)}));
            client.failures.push(new LibraryBrowseError('Browse failed: InvalidItemKey', 'InvalidItemKey'));
            const {connector, openSession, sleep} = connectorFor(client);

            await verifyThrowsError(() => connector.fetchAlbums(), 'Browse failed: InvalidItemKey');
            expect(openSession).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });
    });

    describe('fetchTaggedAlbums', () => {
        test('collects members of the physical tags, ignoring case and the Play Tag entry', async () => {
            const {connector} = connectorFor(new FakeBrowseClient(libraryTree({tags: physicalTags})));

            const pairs = await connector.fetchTaggedAlbums(['myCDs', 'mYLps']);

            expect(pairs).toEqual(expectedTagPairs);
        });

        test('fails when none of the tags exist', async () => {
            const {connector} = connectorFor(new FakeBrowseClient(libraryTree({tags: [physicalTags[2]]})));

            await expect(connector.fetchTaggedAlbums(['myCDs', 'mYLps'])).rejects.toBeInstanceOf(SyncSourceError);
            await verifyThrowsError(() => connector.fetchTaggedAlbums(['myCDs', 'mYLps']), 'Tags not found: myCDs, mYLps');
        });
    });

    describe('session lifetime', () => {
        test('shares one session between albums and tags until closed', async () => {
            const client = new FakeBrowseClient(libraryTree({albums: albumNodes(5), tags: physicalTags}));
            const {connector, openSession} = connectorFor(client);

            await connector.fetchAlbums();
            await connector.fetchTaggedAlbums(['myCDs']);
            expect(openSession).toHaveBeenCalledTimes(1);
            expect(connector.isConnected).toBe(true);

            await connector.close();
            expect(client.closed).toBe(true);
            expect(connector.isConnected).toBe(false);
        });

        test('close without a session is a no-op', async () => {
            const {connector, openSession} = connectorFor();

            await connector.close();

            expect(openSession).not.toHaveBeenCalled();
        });
    });
});
