import {DataSource} from 'typeorm';
import type {MysqlConnectionOptions} from 'typeorm/driver/mysql/MysqlConnectionOptions';
import settings from '../settings';
import {entities, migrations} from "./registry";

export let AppDataSource: DataSource;
let initialized: boolean = false;

export function createDataSourceOptions(): MysqlConnectionOptions {
    return {
        type: settings.value.dbType,
        host: settings.value.dbHost,
        port: settings.value.dbPort,
        username: settings.value.dbUser,
        password: settings.value.dbPassword,
        database: settings.value.dbName,
        charset: 'utf8mb4_unicode_ci',
        timezone: 'Z',              // treat DATETIME as UTC
        dateStrings: ['DATE'],
        entities: entities,
        migrations: migrations,
        synchronize: false,
    };
}

export async function initDataSource() {
    if (initialized) {
        return;
    }

    if (!settings.value.initialized) {
        await settings.read();
    }

    AppDataSource = new DataSource(createDataSourceOptions());

    await AppDataSource.initialize();

    // On a fresh (empty) database, synchronize the schema from entities first
    // so that subsequent migrations run against real tables.
    const rows: Array<{cnt: string | number}> = await AppDataSource.query(
        "SELECT COUNT(*) AS cnt FROM information_schema.tables WHERE table_schema = DATABASE()"
    );
    const tableCount = Number(rows[0]?.cnt ?? 0);
    if (tableCount === 0) {
        console.log('📦 Empty database detected, synchronizing schema...');
        await AppDataSource.synchronize();
    }

    console.log('📦 Running pending migrations...');
    const applied = await AppDataSource.runMigrations();
    if (applied.length > 0) {
        console.log(`✅ Applied ${applied.length} migration(s): ${applied.map(m => m.name).join(', ')}`);
    } else {
        console.log('✅ Database is up to date, no pending migrations.');
    }

    initialized = true;
}

export async function closeDataSource() {
    if (AppDataSource?.isInitialized) {
        await AppDataSource.destroy();
    }
    initialized = false;
}
