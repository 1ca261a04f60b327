#!/usr/bin/env node
/**
 * Run a collection sync.
 *
 *   collection-sync [--source <id> | --all] [--force] [--help]
 *
 * Exit code 0 once every requested source was attempted, whatever their outcome;
 * 1 for usage errors or when the database cannot be initialized.
 */

import 'reflect-metadata';
import settings from '../modules/settings';
import {closeDataSource, initDataSource} from '../modules/database/dataSource';
import {SyncOrchestrator} from '../modules/sync/SyncOrchestrator';
import {errorMessage} from '../modules/lib/util';
import {isSyncSourceId, SYNC_ORDER, SyncSourceId} from '../types/SyncEnums';

export const USAGE = `
Usage: collection-sync [--source <id> | --all] [--force] [--help]

Options:
  -s, --source <id>  Sync one source (repeatable)
  -a, --all          Sync every source (default)
  -f, --force        Ignore skip rules
  -h, --help         Show this help

Sources:
${SYNC_ORDER.map((id) => `  ${id}`).join('\n')}
`.trim();

export interface SyncArgs {
    sources: SyncSourceId[] | 'all';
    force: boolean;
    help: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export function parseSyncArgs(argv: readonly string[]): SyncArgs {
    const sources: SyncSourceId[] = [];
    let all = false;
    let force = false;
    let help = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--all':
            case '-a':
                all = true;
                break;
            case '--force':
            case '-f':
                force = true;
                break;
            case '--help':
            case '-h':
                help = true;
                break;
            case '--source':
            case '-s': {
                const value = argv[i + 1];
                if (value === undefined) throw new UsageError(`${arg} needs a source id`);
                if (!isSyncSourceId(value)) throw new UsageError(`Unknown source: ${value}`);
                if (!sources.includes(value)) sources.push(value);
                i++;
                break;
            }
            default:
                throw new UsageError(`Unknown argument: ${arg}`);
        }
    }

    if (all && sources.length > 0) {
        throw new UsageError('--all and --source cannot be combined');
    }
    return {sources: sources.length > 0 ? sources : 'all', force, help};
}

async function main(argv: readonly string[]): Promise<number> {
    let args: SyncArgs;
    try {
        args = parseSyncArgs(argv);
    } catch (err) {
        console.error(`❌ ${errorMessage(err)}\n`);
        console.error(USAGE);
        return 1;
    }
    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    try {
        await settings.read();
        await initDataSource();
    } catch (err) {
        console.error(`❌ Failed to connect to database: ${errorMessage(err)}`);
        return 1;
    }

    try {
        await new SyncOrchestrator().run({sources: args.sources, force: args.force});
        return 0;
    } finally {
        await closeDataSource();
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => process.exit(code))
        .catch((err: unknown) => {
            console.error('❌ Sync aborted:', err);
            process.exit(1);
        });
}
