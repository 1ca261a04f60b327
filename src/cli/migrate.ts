#!/usr/bin/env node
/**
 * Schema migration management for the collection database.
 *
 *   collection-migrate <command>
 *
 * Commands:
 *   run      Apply all pending migrations (default)
 *   revert   Revert the last applied migration
 *   show     Show migration status (pending / applied)
 */

import 'reflect-metadata';
import {DataSource} from 'typeorm';
import settings from '../modules/settings';
import {createDataSourceOptions} from '../modules/database/dataSource';
import {errorMessage} from '../modules/lib/util';

const USAGE = `
Usage: collection-migrate <command>

Commands:
  run      Apply all pending migrations (default)
  revert   Revert the last applied migration
  show     Show migration status (pending / applied)
`.trim();

export type MigrateCommand = 'run' | 'revert' | 'show';

export function parseMigrateCommand(arg: string | undefined): MigrateCommand | 'help' | null {
    const command = arg ?? 'run';
    if (command === '--help' || command === '-h') return 'help';
    if (command === 'run' || command === 'revert' || command === 'show') return command;
    return null;
}

async function executedMigrationNames(dataSource: DataSource): Promise<Set<string>> {
    try {
        const rows: Array<{name: string}> = await dataSource.query(`SELECT name FROM migrations ORDER BY id`);
        return new Set(rows.map((r) => r.name));
    } catch (err) {
        console.warn(`⚠️  Migrations table not readable, treating all as pending: ${errorMessage(err)}`);
        return new Set();
    }
}

async function main(): Promise<number> {
    const command = parseMigrateCommand(process.argv[2]);

    if (command === 'help') {
        console.log(USAGE);
        return 0;
    }
    if (command === null) {
        console.error(`Unknown command: "${process.argv[2]}"\n`);
        console.error(USAGE);
        return 1;
    }

    if (!settings.value.initialized) {
        await settings.read();
    }

    const dataSource = new DataSource(createDataSourceOptions());

    try {
        await dataSource.initialize();

        switch (command) {
            case 'run': {
                const applied = await dataSource.runMigrations();
                if (applied.length > 0) {
                    console.log(`✅ Applied ${applied.length} migration(s):`);
                    for (const m of applied) console.log(`   - ${m.name}`);
                } else {
                    console.log('✅ Database is up to date, no pending migrations.');
                }
                break;
            }

            case 'revert': {
                await dataSource.undoLastMigration();
                console.log('✅ Last migration reverted.');
                break;
            }

            case 'show': {
                const migrations = dataSource.migrations;
                const executedNames = await executedMigrationNames(dataSource);

                console.log('Migration status:');
                for (const m of migrations) {
                    const name = m.name ?? m.constructor.name;
                    const status = executedNames.has(name) ? '✅ applied' : '⏳ pending';
                    console.log(`  ${status}  ${name}`);
                }

                if (migrations.length === 0) {
                    console.log('  (no migrations registered)');
                }
                break;
            }
        }
        return 0;
    } catch (err) {
        console.error('❌ Migration failed:', err);
        return 1;
    } finally {
        if (dataSource.isInitialized) {
            await dataSource.destroy();
        }
    }
}

if (require.main === module) {
    main()
        .then((code) => process.exit(code))
        .catch((err: unknown) => {
            console.error('❌ Migration failed:', err);
            process.exit(1);
        });
}
