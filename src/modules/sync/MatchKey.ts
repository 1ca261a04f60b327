/**
 * Normalization and cross-source matching
 *
 * Album-like rows from both collections carry a match key so that
 * "present in both" and "marketplace duplicate" become equality joins.
 */

import {truncate} from '../lib/util';

export const MATCH_KEY_WIDTH = 500;
export const ARTIST_NORM_WIDTH = 300;
export const TITLE_NORM_WIDTH = 500;

const LEADING_ARTICLE = 'the ';

/**
 * Lowercase, keep only [a-z0-9 ], collapse whitespace and drop one leading "the ".
 * Stored match keys were written this way, so "the the x" keeps its second article.
 */
export function normalize(s: string | null | undefined): string {
    if (!s) return '';
    const out = s
        .toLowerCase()
        .replace(/\s/g, ' ')
        .replace(/[^a-z0-9 ]/g, '')
        .replace(/ +/g, ' ')
        .trim();
    return out.startsWith(LEADING_ARTICLE) ? out.slice(LEADING_ARTICLE.length) : out;
}

export function matchKey(artist: string | null | undefined, title: string | null | undefined): string {
    const key = `${normalize(artist)} - ${normalize(title)}`;
    return key.length > MATCH_KEY_WIDTH ? key.slice(0, MATCH_KEY_WIDTH) : key;
}

export interface MatchFields {
    artistNorm: string | null;
    albumNorm: string | null;
    matchKey: string;
}

/** Denormalized matching columns for an album-like row. */
export function matchFields(artist: string | null | undefined, title: string | null | undefined): MatchFields {
    return {
        artistNorm: truncate(normalize(artist), ARTIST_NORM_WIDTH),
        albumNorm: truncate(normalize(title), TITLE_NORM_WIDTH),
        matchKey: matchKey(artist, title),
    };
}
