import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
    LIMIT_PROFILES, LimitedStructure, resolveLimits, verifyLimits,
} from '../src/tzif/limits.js';
import type { Limits } from '../src/tzif/limits.js';
import { LimitExceededError } from '../src/tzif/errors.js';
import { TzifVersion } from '../src/tzif/format.js';
import type { Header } from '../src/tzif/types.js';

const header = (over: Partial<Header> = {}): Header => ({
    version: TzifVersion.V1,
    numGmtFlags: 0,
    numStandardFlags: 0,
    numLeapSeconds: 0,
    numTransitions: 0,
    numLocalTimeTypes: 0,
    numAbbrChars: 0,
    ...over,
});

const genCount = fc.oneof(fc.integer({ min: 0, max: 6000 }), fc.integer({ min: 0, max: 0x7FFFFFFF }));
const genLimit = fc.option(fc.integer({ min: 0, max: 5000 }), { nil: null });

const genHeader = fc.record({
    numGmtFlags: genCount,
    numStandardFlags: genCount,
    numLeapSeconds: genCount,
    numTransitions: genCount,
    numLocalTimeTypes: genCount,
    numAbbrChars: genCount,
}).map(counts => header(counts));

const genLimits = fc.record({
    maxTransitions: genLimit,
    maxLocalTimeTypes: genLimit,
    maxAbbreviationChars: genLimit,
    maxLeapSeconds: genLimit,
});

function pairs(h: Header, l: Limits): [number, number | null][] {
    return [
        [h.numTransitions, l.maxTransitions],
        [h.numLocalTimeTypes, l.maxLocalTimeTypes],
        [h.numLeapSeconds, l.maxLeapSeconds],
        [h.numGmtFlags, l.maxLocalTimeTypes],
        [h.numStandardFlags, l.maxLocalTimeTypes],
        [h.numAbbrChars, l.maxAbbreviationChars],
    ];
}

function clampToLimits(h: Header, l: Limits): Header {
    const clamp = (v: number, max: number | null) => (max === null ? v : Math.min(v, max));
    return header({
        numTransitions: clamp(h.numTransitions, l.maxTransitions),
        numLocalTimeTypes: clamp(h.numLocalTimeTypes, l.maxLocalTimeTypes),
        numLeapSeconds: clamp(h.numLeapSeconds, l.maxLeapSeconds),
        numGmtFlags: clamp(h.numGmtFlags, l.maxLocalTimeTypes),
        numStandardFlags: clamp(h.numStandardFlags, l.maxLocalTimeTypes),
        numAbbrChars: clamp(h.numAbbrChars, l.maxAbbreviationChars),
    });
}

describe('Limits policy', () => {
    it('defines the sensible caps of tzfile.h', () => {
        expect(LIMIT_PROFILES.sensible).toEqual({
            maxTransitions: 2000,
            maxLocalTimeTypes: 256,
            maxAbbreviationChars: 50,
            maxLeapSeconds: 50,
        });
    });

    it('accepts any header under the unbounded profile', () => {
        fc.assert(fc.property(genHeader, h => {
            expect(() => verifyLimits(LIMIT_PROFILES.none, h)).not.toThrow();
        }));
    });

    it('succeeds iff every count is within its limit', () => {
        fc.assert(fc.property(genHeader, genLimits, (h, l) => {
            const within = pairs(h, l).every(([count, max]) => max === null || count <= max);
            let threw = false;
            try {
                verifyLimits(l, h);
            } catch (err) {
                expect(err).toBeInstanceOf(LimitExceededError);
                threw = true;
            }
            expect(threw).toBe(!within);
        }));
    });

    it('passes once every exceeded count is shrunk to its limit', () => {
        fc.assert(fc.property(genHeader, genLimits, (h, l) => {
            expect(() => verifyLimits(l, clampToLimits(h, l))).not.toThrow();
        }));
    });

    it('reports the first violated limit in check order, not the worst', () => {
        const h = header({ numTransitions: 2001, numLocalTimeTypes: 100_000, numAbbrChars: 1_000_000 });
        expect(() => verifyLimits(LIMIT_PROFILES.sensible, h)).toThrow(
            expect.objectContaining({ field: LimitedStructure.Transitions, requested: 2001, max: 2000 }),
        );
    });

    const overflowCases: [Partial<Header>, LimitedStructure, number, number][] = [
        [{ numLocalTimeTypes: 257 }, LimitedStructure.LocalTimeTypes, 257, 256],
        [{ numLeapSeconds: 51 }, LimitedStructure.LeapSeconds, 51, 50],
        [{ numGmtFlags: 300 }, LimitedStructure.GmtFlags, 300, 256],
        [{ numStandardFlags: 300 }, LimitedStructure.StandardFlags, 300, 256],
        [{ numAbbrChars: 51 }, LimitedStructure.AbbreviationChars, 51, 50],
    ];

    it.each(overflowCases)('names the overflowing field for %o', (over, field, requested, max) => {
        expect(() => verifyLimits(LIMIT_PROFILES.sensible, header(over))).toThrow(
            expect.objectContaining({ name: 'LimitExceededError', field, requested, max }),
        );
    });

    it('checks GMT flags before standard flags', () => {
        const h = header({ numGmtFlags: 1000, numStandardFlags: 1000 });
        expect(() => verifyLimits(LIMIT_PROFILES.sensible, h)).toThrow(
            expect.objectContaining({ field: LimitedStructure.GmtFlags }),
        );
    });

    it('resolves profile names and passes custom limits through', () => {
        expect(resolveLimits('none')).toBe(LIMIT_PROFILES.none);
        expect(resolveLimits()).toBe(LIMIT_PROFILES.sensible);
        const custom: Limits = { maxTransitions: 1, maxLocalTimeTypes: null, maxAbbreviationChars: null, maxLeapSeconds: null };
        expect(resolveLimits(custom)).toBe(custom);
    });
});
