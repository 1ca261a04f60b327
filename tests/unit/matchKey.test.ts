/**
 * Unit tests for normalization and match keys
 */

import {matchFields, matchKey, normalize} from '../../src/modules/sync/MatchKey';
import {matchKeyData, normalizeData} from '../data/unit/matchKeyData';

describe('normalize', () => {
    test.each(normalizeData)('$description', ({input, expected}) => {
        expect(normalize(input)).toBe(expected);
    });

    test.each(normalizeData)('is idempotent: $description', ({input}) => {
        const once = normalize(input);
        expect(normalize(once)).toBe(once);
    });

    test('strips only one leading article', () => {
        expect(normalize('the the beatles')).toBe('the beatles');
        expect(normalize('The  The  Beatles')).toBe('the beatles');
        expect(normalize(normalize('the the beatles'))).toBe('beatles');
    });
});

describe('matchKey', () => {
    test.each(matchKeyData)('$description', ({artist, title, expected}) => {
        expect(matchKey(artist, title)).toBe(expected);
    });

    test('cuts long keys to 500 characters', () => {
        const key = matchKey('a'.repeat(600), 'Title');

        expect(key).toHaveLength(500);
        expect(key).toBe('a'.repeat(500));
    });
});

describe('matchFields', () => {
    test('returns the normalized columns and the key', () => {
        expect(matchFields('The Beatles', 'Abbey Road!')).toEqual({
            artistNorm: 'beatles',
            albumNorm: 'abbey road',
            matchKey: 'beatles - abbey road',
        });
    });

    test('cuts the artist column to 300 characters', () => {
        expect(matchFields('b'.repeat(400), 'x').artistNorm).toBe('b'.repeat(300));
    });
});
