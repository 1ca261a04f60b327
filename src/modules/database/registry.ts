import 'reflect-metadata';

import {LibraryAlbum} from './entities/libraryAlbum/LibraryAlbum';
import {LibraryTrack} from './entities/libraryTrack/LibraryTrack';
import {PlayHistoryEntry} from './entities/playHistoryEntry/PlayHistoryEntry';
import {CatalogItem} from './entities/catalogItem/CatalogItem';
import {CatalogTrack} from './entities/catalogTrack/CatalogTrack';
import {WantlistItem} from './entities/wantlistItem/WantlistItem';
import {ListeningHistoryEntry} from './entities/listeningHistoryEntry/ListeningHistoryEntry';
import {TrackIndexEntry} from './entities/trackIndexEntry/TrackIndexEntry';
import {SyncLedgerEntry} from './entities/syncLedgerEntry/SyncLedgerEntry';
import {SyncRunSnapshot} from './entities/syncRunSnapshot/SyncRunSnapshot';
import {CreateCollectionTables1760000000000} from '../../migrations/1760000000000-CreateCollectionTables';

export const entities = [
    LibraryAlbum,
    LibraryTrack,
    PlayHistoryEntry,
    CatalogItem,
    CatalogTrack,
    WantlistItem,
    ListeningHistoryEntry,
    TrackIndexEntry,
    SyncLedgerEntry,
    SyncRunSnapshot,
];

export const migrations = [
    CreateCollectionTables1760000000000,
];
