/**
 * Bulk write helpers shared by the replace-policy services.
 */

import {EntityTarget, ObjectLiteral} from 'typeorm';
import type {QueryDeepPartialEntity} from 'typeorm/query-builder/QueryPartialEntity';
import {AppDataSource} from './dataSource';
import {chunk} from '../lib/util';

// Rows per INSERT statement; keeps bound parameters well under driver limits.
const STATEMENT_ROWS = 100;

/**
 * Delete every row of a table with a plain DELETE, so foreign-key actions fire.
 */
export async function deleteAll<T extends ObjectLiteral>(target: EntityTarget<T>): Promise<void> {
    await AppDataSource.createQueryBuilder().delete().from(target).execute();
}

/**
 * Insert rows, committing each batch of `batchSize` rows in its own transaction.
 * An interruption loses at most the batch in flight.
 */
export async function insertInBatches<T extends ObjectLiteral>(
    target: EntityTarget<T>,
    rows: QueryDeepPartialEntity<T>[],
    batchSize: number,
): Promise<number> {
    let inserted = 0;
    for (const batch of chunk(rows, batchSize)) {
        await AppDataSource.transaction(async (manager) => {
            for (const statement of chunk(batch, STATEMENT_ROWS)) {
                await manager.insert(target, statement);
            }
        });
        inserted += batch.length;
    }
    return inserted;
}

/**
 * Keep the first row per key; later rows with the same key are returned as duplicates.
 * Rows without a key are always kept.
 */
export function dedupeBy<T, K>(rows: readonly T[], keyOf: (row: T) => K | null | undefined): {unique: T[]; duplicates: K[]} {
    const seen = new Set<K>();
    const unique: T[] = [];
    const duplicates: K[] = [];
    for (const row of rows) {
        const key = keyOf(row);
        if (key === null || key === undefined) {
            unique.push(row);
            continue;
        }
        if (seen.has(key)) {
            duplicates.push(key);
            continue;
        }
        seen.add(key);
        unique.push(row);
    }
    return {unique, duplicates};
}
