/**
 * Unit tests for source selection and the source registry
 */

import {resolveSelection} from '../../src/modules/sync/SyncOrchestrator';
import {createDefaultRegistry} from '../../src/modules/sync/sources/SyncSourceRegistry';
import {SYNC_ORDER, SyncSourceId, SyncSourceType} from '../../src/types/SyncEnums';

describe('resolveSelection', () => {
    test.each([
        {description: 'all runs every source in order', selection: 'all' as const, expected: [...SYNC_ORDER]},
        {
            description: 'albums pull in tags',
            selection: [SyncSourceId.LIBRARY_ALBUMS],
            expected: [SyncSourceId.LIBRARY_ALBUMS, SyncSourceId.LIBRARY_TAGS],
        },
        {
            description: 'library tracks pull in the track index',
            selection: [SyncSourceId.LIBRARY_TRACKS],
            expected: [SyncSourceId.LIBRARY_TRACKS, SyncSourceId.TRACK_INDEX],
        },
        {
            description: 'the catalog collection pulls in the track index',
            selection: [SyncSourceId.CATALOG_COLLECTION],
            expected: [SyncSourceId.CATALOG_COLLECTION, SyncSourceId.TRACK_INDEX],
        },
        {
            description: 'a selection runs in fixed order whatever the input order',
            selection: [SyncSourceId.TRACK_INDEX, SyncSourceId.CATALOG_WANTLIST, SyncSourceId.LIBRARY_PLAY_HISTORY],
            expected: [SyncSourceId.CATALOG_WANTLIST, SyncSourceId.LIBRARY_PLAY_HISTORY, SyncSourceId.TRACK_INDEX],
        },
        {
            description: 'tags alone stay alone',
            selection: [SyncSourceId.LIBRARY_TAGS],
            expected: [SyncSourceId.LIBRARY_TAGS],
        },
    ])('$description', ({selection, expected}) => {
        expect(resolveSelection(selection)).toEqual(expected);
    });
});

describe('createDefaultRegistry', () => {
    test('registers one handler per source with its type', () => {
        const registry = createDefaultRegistry();

        expect(registry.getAll().map((s) => s.id)).toEqual([...SYNC_ORDER]);
        expect(registry.getById(SyncSourceId.LIBRARY_TRACKS)?.type).toBe(SyncSourceType.FILE);
        expect(registry.getById(SyncSourceId.CATALOG_WANTLIST)?.type).toBe(SyncSourceType.API);
        expect(registry.getById(SyncSourceId.TRACK_INDEX)?.type).toBe(SyncSourceType.DERIVED);
    });
});
