/**
 * Library tracks export (CSV, header row, UTF-8 with optional BOM).
 */

import Joi from 'joi';
import {parse} from 'csv-parse/sync';
import {cellText, readExportFile} from './exportFile';
import {FileImportError} from '../../../lib/errors';
import {parseYesNo, toInt} from '../../../lib/util';
import type {LibraryTrackRecord} from '../../../../types/CollectionTypes';

export interface TrackExportRow {
    'Album Artist'?: string;
    'Album'?: string;
    'Disc#'?: string;
    'Track#'?: string;
    'Title'?: string;
    'Track Artist(s)'?: string;
    'Composer(s)'?: string;
    'External Id'?: string;
    'Source'?: string;
    'Is Dup?'?: string;
    'Is Hidden?'?: string;
    'Tags'?: string;
}

export interface TrackImport {
    records: LibraryTrackRecord[];
    /** Rows dropped for lacking a title. */
    skipped: number;
}

const cell = Joi.string().allow('');

export const trackExportRowSchema = Joi.object<TrackExportRow>({
    'Album Artist': cell,
    'Album': cell,
    'Disc#': cell,
    'Track#': cell,
    'Title': cell,
    'Track Artist(s)': cell,
    'Composer(s)': cell,
    'External Id': cell,
    'Source': cell,
    'Is Dup?': cell,
    'Is Hidden?': cell,
    'Tags': cell,
}).unknown(true);

const rowsSchema = Joi.array<TrackExportRow[]>().items(trackExportRowSchema);

export function toLibraryTrackRecord(row: TrackExportRow): LibraryTrackRecord | null {
    const title = cellText(row['Title']);
    if (!title) return null;
    return {
        albumArtist: cellText(row['Album Artist']),
        album: cellText(row['Album']),
        discNumber: toInt(row['Disc#']),
        trackNumber: toInt(row['Track#']),
        title,
        trackArtists: cellText(row['Track Artist(s)']),
        composers: cellText(row['Composer(s)']),
        externalId: cellText(row['External Id']),
        source: cellText(row['Source']),
        isDuplicate: parseYesNo(row['Is Dup?']),
        isHidden: parseYesNo(row['Is Hidden?']),
        tags: cellText(row['Tags']),
    };
}

export function parseLibraryTracksCsv(text: string, filePath: string | null = null): TrackImport {
    let parsed: unknown;
    try {
        parsed = parse(text, {
            bom: true,
            columns: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
    } catch (err) {
        throw new FileImportError(`Invalid CSV: ${err instanceof Error ? err.message : String(err)}`, filePath);
    }

    const {error, value} = rowsSchema.validate(parsed);
    if (error) {
        throw new FileImportError(`Unexpected CSV content: ${error.message}`, filePath);
    }

    const records: LibraryTrackRecord[] = [];
    let skipped = 0;
    for (const row of value) {
        const record = toLibraryTrackRecord(row);
        if (record) {
            records.push(record);
        } else {
            skipped++;
        }
    }
    if (skipped > 0) {
        console.warn(`⚠️  Skipped ${skipped} track row(s) without a title`);
    }
    return {records, skipped};
}

export async function readLibraryTracksCsv(filePath: string): Promise<TrackImport> {
    const text = await readExportFile(filePath);
    return parseLibraryTracksCsv(text, filePath);
}
