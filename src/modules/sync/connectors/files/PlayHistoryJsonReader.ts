/**
 * Play history export: a JSON array of play events.
 */

import Joi from 'joi';
import {cellText, readExportFile} from './exportFile';
import {FileImportError} from '../../../lib/errors';
import {parseDate, toInt} from '../../../lib/util';
import type {PlayHistoryRecord} from '../../../../types/CollectionTypes';

type Cell = string | number | null;

export interface PlayExportEntry {
    'Album Artist'?: Cell;
    'Album'?: Cell;
    'Disc#'?: Cell;
    'Track#'?: Cell;
    'Title'?: Cell;
    'Track Artist(s)'?: Cell;
    'Composer(s)'?: Cell;
    'External Id'?: Cell;
    'Source'?: Cell;
    'Date'?: Cell;
    'Played At'?: Cell;
}

export interface PlayImport {
    records: PlayHistoryRecord[];
    /** Entries dropped for a missing title, a bad date or a bad shape. */
    skipped: number;
}

const cell = Joi.alternatives(Joi.string().allow(''), Joi.number()).allow(null);

export const playExportEntrySchema = Joi.object<PlayExportEntry>({
    'Album Artist': cell,
    'Album': cell,
    'Disc#': cell,
    'Track#': cell,
    'Title': cell,
    'Track Artist(s)': cell,
    'Composer(s)': cell,
    'External Id': cell,
    'Source': cell,
    'Date': cell,
    'Played At': cell,
}).unknown(true);

// Numbers are epoch milliseconds. A blank Date falls through to Played At.
function playedAt(entry: PlayExportEntry): Date | null {
    const raw = [entry['Date'], entry['Played At']].find((v) => typeof v === 'number' || cellText(v) !== null);
    if (typeof raw === 'number') return parseDate(new Date(raw));
    return parseDate(raw);
}

export function toPlayHistoryRecord(entry: PlayExportEntry): PlayHistoryRecord | null {
    const title = cellText(entry['Title']);
    const at = playedAt(entry);
    if (!title || !at) return null;
    return {
        albumArtist: cellText(entry['Album Artist']),
        album: cellText(entry['Album']),
        discNumber: toInt(entry['Disc#']),
        trackNumber: toInt(entry['Track#']),
        title,
        trackArtists: cellText(entry['Track Artist(s)']),
        composers: cellText(entry['Composer(s)']),
        externalId: cellText(entry['External Id']),
        source: cellText(entry['Source']),
        playedAt: at,
    };
}

export function parsePlayHistoryJson(text: string, filePath: string | null = null): PlayImport {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new FileImportError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, filePath);
    }
    if (!Array.isArray(parsed)) {
        throw new FileImportError('Play history must be a JSON array', filePath);
    }

    const records: PlayHistoryRecord[] = [];
    let skipped = 0;
    parsed.forEach((raw: unknown, index: number) => {
        const {error, value} = playExportEntrySchema.validate(raw);
        const record = error ? null : toPlayHistoryRecord(value);
        if (record) {
            records.push(record);
            return;
        }
        skipped++;
        console.warn(`⚠️  Skipping play entry #${index}: ${error ? error.message : 'missing title or unparseable date'}`);
    });
    return {records, skipped};
}

export async function readPlayHistoryJson(filePath: string): Promise<PlayImport> {
    const text = await readExportFile(filePath);
    return parsePlayHistoryJson(text, filePath);
}
