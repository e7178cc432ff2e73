import type { TzifVersion } from './format.js';
import type { Limits, LimitProfile } from './limits.js';

export type TzifLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * What to do with a transition whose type index is outside the catalog.
 *
 * - `strict` (default): throw InvalidTypeIndexError
 * - `clamp`: resolve to local time type 0 and log a warning
 */
export type TypeIndexPolicy = 'strict' | 'clamp';

export type CookOptions = {
    /** Out-of-range type index handling (default 'strict'). */
    typeIndexPolicy?: TypeIndexPolicy;
    /** Optional logger hook; the library never writes to the console itself. */
    logger?: TzifLogger | null;
};

export type ParseOptions = {
    /** Optional logger hook for informational messages about the buffer. */
    logger?: TzifLogger | null;
};

export type DecodeOptions = CookOptions & {
    /** Limit profile name or custom limits. Default: 'sensible'. */
    limits?: LimitProfile | Limits;
};

// ── Raw stage ────────────────────────────────────────────────────────────────

export interface Header {
    version: TzifVersion;
    /** tzh_ttisutcnt */
    numGmtFlags: number;
    /** tzh_ttisstdcnt */
    numStandardFlags: number;
    /** tzh_leapcnt */
    numLeapSeconds: number;
    /** tzh_timecnt */
    numTransitions: number;
    /** tzh_typecnt */
    numLocalTimeTypes: number;
    /** tzh_charcnt */
    numAbbrChars: number;
}

export interface TransitionData {
    /** Seconds since the epoch at which the rules for computing local time change. */
    timestamp: number;
    /** Index into the local time types; not range-checked until cooking. */
    localTimeTypeIndex: number;
}

export interface LocalTimeTypeData {
    /** Seconds added to UTC. */
    offset: number;
    isDst: number;
    /** Start of the NUL-terminated abbreviation in the string pool. */
    nameOffset: number;
}

export interface LeapSecondData {
    timestamp: number;
    leapSecondCount: number;
}

/** The internal structure of a TZif file, with a minimum of interpretation. */
export interface TZData {
    header: Header;
    transitions: TransitionData[];
    timeInfo: LocalTimeTypeData[];
    leapSeconds: LeapSecondData[];
    strings: Uint8Array;
    standardFlags: Uint8Array;
    gmtFlags: Uint8Array;
    /** Bytes left after the v1 data block (the 64-bit copy in v2+ files). */
    trailingBytes: number;
}

// ── Cooked stage ─────────────────────────────────────────────────────────────

export enum TransitionType {
    Standard = 'Standard',
    Wall = 'Wall',
    UTC = 'UTC',
}

export interface LocalTimeType {
    readonly name: string;
    readonly offset: number;
    readonly isDst: boolean;
    readonly transitionType: TransitionType;
}

export interface Transition {
    readonly timestamp: number;
    readonly localTimeTypeIndex: number;
    /** Shared with every other transition naming the same index. */
    readonly localTimeType: LocalTimeType;
}

export interface LeapSecond {
    readonly timestamp: number;
    readonly leapSecondCount: number;
}

/** Parsed, interpreted contents of a TZif file. */
export interface ZoneData {
    /** Regime in effect before the first forward transition. */
    readonly base: LocalTimeType;
    readonly transitions: readonly Transition[];
    readonly localTimeTypes: readonly LocalTimeType[];
    readonly leapSeconds: readonly LeapSecond[];
}
