/**
 * Data Source Auto-Migration Tests
 *
 * Tests for the initDataSource function that auto-synchronizes fresh databases
 * and runs pending migrations on startup.
 */

import {
    emptyDatabaseResult,
    populatedDatabaseResult,
    appliedMigrations,
    noMigrations,
} from '../data/unit/dataSourceData';

// Mock settings before importing dataSource
jest.mock('../../src/modules/settings', () => ({
    __esModule: true,
    default: {
        value: {
            initialized: true,
            dbType: 'mysql',
            dbHost: 'localhost',
            dbPort: 3306,
            dbUser: 'root',
            dbPassword: 'test-secret',
            dbName: 'test_db',
        },
        read: jest.fn(),
    },
}));

// Mock the registry to avoid loading real entities/migrations
jest.mock('../../src/modules/database/registry', () => ({
    entities: [],
    migrations: [],
}));

// Mock TypeORM DataSource
const mockInitialize = jest.fn();
const mockSynchronize = jest.fn();
const mockRunMigrations = jest.fn();
const mockQuery = jest.fn();
const mockDestroy = jest.fn();
const mockDataSourceState = {isInitialized: false};

jest.mock('typeorm', () => ({
    DataSource: jest.fn().mockImplementation(() => ({
        initialize: mockInitialize,
        synchronize: mockSynchronize,
        runMigrations: mockRunMigrations,
        query: mockQuery,
        destroy: mockDestroy,
        get isInitialized() {
            return mockDataSourceState.isInitialized;
        },
    })),
}));

import {closeDataSource, createDataSourceOptions, initDataSource} from '../../src/modules/database/dataSource';

describe('createDataSourceOptions', () => {
    test('returns options from settings with synchronize disabled', () => {
        const options = createDataSourceOptions();

        expect(options.type).toBe('mysql');
        expect(options.host).toBe('localhost');
        expect(options.port).toBe(3306);
        expect(options.username).toBe('root');
        expect(options.password).toBe('test-secret');
        expect(options.database).toBe('test_db');
        expect(options.synchronize).toBe(false);
    });

    test('includes charset, timezone and dateStrings configuration', () => {
        const options = createDataSourceOptions();

        expect(options.charset).toBe('utf8mb4_unicode_ci');
        expect(options.timezone).toBe('Z');
        expect(options.dateStrings).toEqual(['DATE']);
    });

    test('includes entities and migrations from the registry', () => {
        const options = createDataSourceOptions();

        expect(options.entities).toEqual([]);
        expect(options.migrations).toEqual([]);
    });
});

describe('initDataSource', () => {
    beforeEach(() => {
        jest.clearAllMocks();
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        // clears the module-level initialized flag
        await closeDataSource();
        mockDataSourceState.isInitialized = false;
        jest.restoreAllMocks();
    });

    test('synchronizes schema on empty database then runs migrations', async () => {
        mockQuery.mockResolvedValueOnce(emptyDatabaseResult);
        mockRunMigrations.mockResolvedValueOnce(appliedMigrations);

        await initDataSource();

        expect(mockInitialize).toHaveBeenCalledTimes(1);
        expect(mockQuery).toHaveBeenCalledWith(
            expect.stringContaining('information_schema.tables')
        );
        expect(mockSynchronize).toHaveBeenCalledTimes(1);
        expect(mockRunMigrations).toHaveBeenCalledTimes(1);
        expect(console.log).toHaveBeenCalledWith('✅ Applied 1 migration(s): CreateCollectionTables1760000000000');
    });

    test('skips synchronize on populated database', async () => {
        mockQuery.mockResolvedValueOnce(populatedDatabaseResult);
        mockRunMigrations.mockResolvedValueOnce(noMigrations);

        await initDataSource();

        expect(mockInitialize).toHaveBeenCalledTimes(1);
        expect(mockSynchronize).not.toHaveBeenCalled();
        expect(mockRunMigrations).toHaveBeenCalledTimes(1);
        expect(console.log).toHaveBeenCalledWith('✅ Database is up to date, no pending migrations.');
    });

    test('initializes only once until closed', async () => {
        mockQuery.mockResolvedValue(populatedDatabaseResult);
        mockRunMigrations.mockResolvedValue(noMigrations);

        await initDataSource();
        await initDataSource();

        expect(mockInitialize).toHaveBeenCalledTimes(1);
    });

    test('closeDataSource destroys an initialized connection', async () => {
        mockQuery.mockResolvedValueOnce(populatedDatabaseResult);
        mockRunMigrations.mockResolvedValueOnce(noMigrations);
        await initDataSource();
        mockDataSourceState.isInitialized = true;

        await closeDataSource();

        expect(mockDestroy).toHaveBeenCalledTimes(1);
    });
});
