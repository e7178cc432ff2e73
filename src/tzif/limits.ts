import { LimitExceededError } from './errors.js';
import type { Header } from './types.js';

/**
 * Which counted structure a limit applies to. Used for error reporting.
 */
export enum LimitedStructure {
    Transitions = 'transitions',
    LocalTimeTypes = 'local time types',
    LeapSeconds = 'leap seconds',
    GmtFlags = 'GMT flags',
    StandardFlags = 'standard time flags',
    AbbreviationChars = 'abbreviation chars',
}

/**
 * Maximum numbers of structures that may be loaded from a TZif file.
 *
 * The header declares each count as a u32, so a corrupt or crafted file can
 * ask for gigabytes of records. Counts are checked against these caps before
 * anything sized by them is allocated. `null` means no cap.
 */
export interface Limits {
    maxTransitions: number | null;
    maxLocalTimeTypes: number | null;
    /** Bytes, strictly. */
    maxAbbreviationChars: number | null;
    maxLeapSeconds: number | null;
}

/**
 * - `none`: no caps, for trusted input only
 * - `sensible`: the caps of the reference tzfile.h (default)
 */
export type LimitProfile = 'none' | 'sensible';

/** Frozen: the default profile is resolved by reference on every parse. */
export const LIMIT_PROFILES: Readonly<Record<LimitProfile, Readonly<Limits>>> = Object.freeze({
    none:     Object.freeze({ maxTransitions: null, maxLocalTimeTypes: null, maxAbbreviationChars: null, maxLeapSeconds: null }),
    sensible: Object.freeze({ maxTransitions: 2000, maxLocalTimeTypes: 256,  maxAbbreviationChars: 50,   maxLeapSeconds: 50 }),
});

export const DEFAULT_LIMIT_PROFILE: LimitProfile = 'sensible';

export function resolveLimits(limits: LimitProfile | Limits = DEFAULT_LIMIT_PROFILE): Readonly<Limits> {
    if (typeof limits === 'string') {
        const profile = LIMIT_PROFILES[limits];
        if (!profile) throw new TypeError(`Unknown limit profile: ${String(limits)}`);
        return profile;
    }
    return limits;
}

/**
 * Throws LimitExceededError for the first count over its cap. The order is
 * fixed: transitions, local time types, leap seconds, GMT flags, standard
 * flags, abbreviation chars. Flag arrays are capped by the type limit since
 * they hold one entry per type.
 */
export function verifyLimits(limits: Readonly<Limits>, header: Header): void {
    check(LimitedStructure.Transitions, header.numTransitions, limits.maxTransitions);
    check(LimitedStructure.LocalTimeTypes, header.numLocalTimeTypes, limits.maxLocalTimeTypes);
    check(LimitedStructure.LeapSeconds, header.numLeapSeconds, limits.maxLeapSeconds);
    check(LimitedStructure.GmtFlags, header.numGmtFlags, limits.maxLocalTimeTypes);
    check(LimitedStructure.StandardFlags, header.numStandardFlags, limits.maxLocalTimeTypes);
    check(LimitedStructure.AbbreviationChars, header.numAbbrChars, limits.maxAbbreviationChars);
}

function check(field: LimitedStructure, requested: number, max: number | null): void {
    if (max !== null && requested > max) {
        throw new LimitExceededError(field, requested, max);
    }
}
