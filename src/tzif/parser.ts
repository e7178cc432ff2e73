/**
 * Structural parser for TZif files.
 *
 * Reads a byte buffer into a `TZData` record, doing a minimum of
 * interpretation: every value stays a plain number or byte array. Turning
 * these into a usable zone is the job of `cook()`.
 *
 * Layout (big-endian):
 *   [magic "TZif": 4] [reserved: 15] [version: 1]
 *   [gmt, standard, leap, transitions, types, chars: u32 × 6]
 *   [transition times: i32 × transitions] [transition types: u8 × transitions]
 *   [local time types: (i32, u8, u8) × types] [abbreviations: u8 × chars]
 *   [leap seconds: (i32, i32) × leap] [standard flags: u8 × standard]
 *   [gmt flags: u8 × gmt]
 *
 * Only the v1 (32-bit) data block is read; the 64-bit block of v2+ files is
 * left in place and reported through `trailingBytes`.
 */
import { ByteReader } from './byte-reader.js';
import { InvalidMagicNumberError, UnsupportedVersionError } from './errors.js';
import {
    RESERVED_SIZE, TzifVersion, isKnownVersion,
    TRANSITION_TIME_SIZE, TRANSITION_INDEX_SIZE, LOCAL_TIME_TYPE_SIZE,
    LEAP_SECOND_SIZE, FLAG_SIZE,
} from './format.js';
import { DEFAULT_LIMIT_PROFILE, resolveLimits, verifyLimits } from './limits.js';
import type { Limits, LimitProfile } from './limits.js';
import type {
    Header, TransitionData, LocalTimeTypeData, LeapSecondData, TZData,
    ParseOptions, TzifLogger,
} from './types.js';

const TZIF_MAGIC = new Uint8Array([0x54, 0x5A, 0x69, 0x66]); // "TZif"

/** A fresh copy of the four signature bytes. */
export function tzifMagic(): Uint8Array {
    return TZIF_MAGIC.slice();
}

export class TzifParser {
    private readonly reader: ByteReader;

    constructor(data: Uint8Array) {
        this.reader = new ByteReader(data);
    }

    get remaining(): number {
        return this.reader.remaining;
    }

    readMagic(): void {
        const magic = this.reader.getBytesUpTo(TZIF_MAGIC.length);
        if (magic.length !== TZIF_MAGIC.length || !magic.every((b, i) => b === TZIF_MAGIC[i])) {
            throw new InvalidMagicNumberError(magic);
        }
    }

    skipReserved(): void {
        this.reader.skip(RESERVED_SIZE, 'reserved header bytes');
    }

    readHeader(): Header {
        const versionByte = this.reader.getUint8();
        if (!isKnownVersion(versionByte)) {
            throw new UnsupportedVersionError(versionByte);
        }
        return {
            version:           versionByte,
            numGmtFlags:       this.reader.getUint32(),
            numStandardFlags:  this.reader.getUint32(),
            numLeapSeconds:    this.reader.getUint32(),
            numTransitions:    this.reader.getUint32(),
            numLocalTimeTypes: this.reader.getUint32(),
            numAbbrChars:      this.reader.getUint32(),
        };
    }

    /** All timestamps come first, then all type indices. */
    readTransitions(count: number): TransitionData[] {
        this.reader.ensure(count * (TRANSITION_TIME_SIZE + TRANSITION_INDEX_SIZE), 'transitions');

        const times: number[] = [];
        for (let i = 0; i < count; i++) {
            times.push(this.reader.getInt32());
        }

        const transitions: TransitionData[] = [];
        for (let i = 0; i < count; i++) {
            transitions.push({ timestamp: times[i], localTimeTypeIndex: this.reader.getUint8() });
        }
        return transitions;
    }

    readLocalTimeTypes(count: number): LocalTimeTypeData[] {
        this.reader.ensure(count * LOCAL_TIME_TYPE_SIZE, 'local time types');

        const types: LocalTimeTypeData[] = [];
        for (let i = 0; i < count; i++) {
            types.push({
                offset:     this.reader.getInt32(),
                isDst:      this.reader.getUint8(),
                nameOffset: this.reader.getUint8(),
            });
        }
        return types;
    }

    readLeapSeconds(count: number): LeapSecondData[] {
        this.reader.ensure(count * LEAP_SECOND_SIZE, 'leap seconds');

        const leaps: LeapSecondData[] = [];
        for (let i = 0; i < count; i++) {
            leaps.push({
                timestamp:       this.reader.getInt32(),
                leapSecondCount: this.reader.getInt32(),
            });
        }
        return leaps;
    }

    readOctets(count: number, what: string): Uint8Array {
        return this.reader.getBytes(count * FLAG_SIZE, what);
    }
}

/**
 * Parse a TZif buffer into its raw structures. Throws if the buffer is not
 * a TZif file, is truncated, or declares counts over `limits`.
 */
export function parse(
    data: Uint8Array,
    limits: LimitProfile | Limits = DEFAULT_LIMIT_PROFILE,
    options: ParseOptions = {},
): TZData {
    const logger: TzifLogger | null = options.logger ?? null;
    const parser = new TzifParser(data);
    parser.readMagic();
    parser.skipReserved();

    const header = parser.readHeader();
    verifyLimits(resolveLimits(limits), header);

    const transitions   = parser.readTransitions(header.numTransitions);
    const timeInfo      = parser.readLocalTimeTypes(header.numLocalTimeTypes);
    const strings       = parser.readOctets(header.numAbbrChars, 'abbreviation chars');
    const leapSeconds   = parser.readLeapSeconds(header.numLeapSeconds);
    const standardFlags = parser.readOctets(header.numStandardFlags, 'standard flags');
    const gmtFlags      = parser.readOctets(header.numGmtFlags, 'GMT flags');

    const trailingBytes = parser.remaining;
    if (trailingBytes > 0 && header.version !== TzifVersion.V1) {
        logger?.info?.(`TZif v${String.fromCharCode(header.version)}: ${trailingBytes} bytes of 64-bit data left unread`);
    }

    return {
        header,
        transitions,
        timeInfo,
        leapSeconds,
        strings,
        standardFlags,
        gmtFlags,
        trailingBytes,
    };
}
