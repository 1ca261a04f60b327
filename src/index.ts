import 'reflect-metadata';

export {default as settings, SettingsStore, physicalTagList} from './modules/settings';
export type {Settings} from './modules/settings';
export {AppDataSource, initDataSource, closeDataSource, createDataSourceOptions} from './modules/database/dataSource';

export * from './modules/lib/errors';
export * from './types/SyncEnums';
export * from './types/CollectionTypes';

export {normalize, matchKey, matchFields} from './modules/sync/MatchKey';
export {shouldSkipApiSource, shouldSkipFileSource} from './modules/sync/SkipPolicy';
export {SyncOrchestrator, resolveSelection} from './modules/sync/SyncOrchestrator';
export type {RunOptions, RunReport, SourceReport, SourceSelection} from './modules/sync/SyncOrchestrator';
export {SyncSourceRegistry, createDefaultRegistry} from './modules/sync/sources/SyncSourceRegistry';
export type {SyncSource, SyncContext, SourceRunResult} from './modules/sync/sources/SyncSourceInterface';
export {RoonConnector} from './modules/sync/connectors/roon/RoonConnector';
export {RoonSession} from './modules/sync/connectors/roon/RoonSession';
export {DiscogsConnector} from './modules/sync/connectors/discogs/DiscogsConnector';

// Read contract used by the query API
export * as collection from './modules/database/services/CatalogService';
export * as libraryAlbums from './modules/database/services/LibraryAlbumService';
export * as listening from './modules/database/services/ListeningHistoryService';
export * as stats from './modules/database/services/CollectionStatsService';
export * as trackIndex from './modules/database/services/TrackIndexService';
export * as ledger from './modules/database/services/SyncLedgerService';
export * as runHistory from './modules/database/services/SyncHistoryService';
export * as playHistory from './modules/database/services/PlayHistoryService';
