import { describe, it, expect } from 'vitest';
import { decode } from '../../src/tzif/decode.js';
import { IncompleteDataError, InvalidMagicNumberError } from '../../src/tzif/errors.js';
import { buildTzif, JAPAN_BYTES } from '../helpers/tzif-builder.js';

// Every section present, including leap seconds and both flag arrays.
const FULL_BYTES = buildTzif({
    transitions: [
        { timestamp: 100, type: 0 },
        { timestamp: 200, type: 1 },
    ],
    types: [
        { offset: 0, nameOffset: 0 },
        { offset: 3600, isDst: true, nameOffset: 4 },
    ],
    abbreviations: 'STD\0DST\0',
    leapSeconds: [
        { timestamp: 78796800, count: 1 },
        { timestamp: 94694401, count: 2 },
    ],
    standardFlags: [1, 0],
    gmtFlags: [0, 1],
});

describe('Regression: Truncation Silent Success', () => {
    it('should throw for every truncated length, never return a partial zone', () => {
        for (let len = 0; len < JAPAN_BYTES.length; len++) {
            const truncated = JAPAN_BYTES.slice(0, len);
            const expected = len < 4 ? InvalidMagicNumberError : IncompleteDataError;
            expect(() => decode(truncated), `Failed at length ${len}/${JAPAN_BYTES.length}`).toThrow(expected);
        }
    });

    it('should throw for every truncated length of a file with every section', () => {
        expect(FULL_BYTES.length).toBe(94);
        for (let len = 0; len < FULL_BYTES.length; len++) {
            const truncated = FULL_BYTES.slice(0, len);
            const expected = len < 4 ? InvalidMagicNumberError : IncompleteDataError;
            expect(() => decode(truncated), `Failed at length ${len}/${FULL_BYTES.length}`).toThrow(expected);
        }
    });

    it('decodes the untruncated buffers', () => {
        expect(decode(JAPAN_BYTES).transitions).toHaveLength(8);

        const full = decode(FULL_BYTES);
        expect(full.leapSeconds).toHaveLength(2);
        expect(full.transitions).toHaveLength(1);
    });
});
