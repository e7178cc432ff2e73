import { extractAbbreviation } from './abbreviations.js';
import { InvalidTypeIndexError, NoLocalTimeTypesError } from './errors.js';
import { TransitionType } from './types.js';
import type {
    CookOptions, LeapSecond, LocalTimeType, Transition, TypeIndexPolicy,
    TZData, TzifLogger, ZoneData,
} from './types.js';

const DEFAULT_COOK_OPTIONS: Required<CookOptions> = {
    typeIndexPolicy: 'strict',
    logger: null,
};

/**
 * Flag for type `index`, or false when the array is shorter than the
 * catalog. Files may carry no flags at all (count 0), so a short array is
 * read as "flag not set" rather than rejected.
 */
export function flagAt(flags: Uint8Array, index: number): boolean {
    return index < flags.length ? flags[index] !== 0 : false;
}

/**
 * Combine the two flags into a transition type. They live in separate
 * arrays at the end of the file, so this can only happen after parsing.
 */
export function flagsToTransitionType(standard: boolean, utc: boolean): TransitionType {
    if (utc) return TransitionType.UTC;
    if (standard) return TransitionType.Standard;
    return TransitionType.Wall;
}

/**
 * Catalog index to use for a transition's raw type index, per policy.
 * Throws InvalidTypeIndexError when no usable index exists.
 */
export function resolveTypeIndex(
    policy: TypeIndexPolicy,
    typeIndex: number,
    catalogSize: number,
    transitionIndex: number,
    logger: TzifLogger | null,
): number {
    if (typeIndex < catalogSize) return typeIndex;
    if (policy === 'clamp' && catalogSize > 0) {
        logger?.warn?.(`Transition ${transitionIndex}: type index ${typeIndex} out of range (${catalogSize} types), using 0`);
        return 0;
    }
    throw new InvalidTypeIndexError(transitionIndex, typeIndex, catalogSize);
}

/** Interpret a raw `TZData` record into a resolved zone. */
export function cook(tz: TZData, options: CookOptions = {}): ZoneData {
    const opts: Required<CookOptions> = { ...DEFAULT_COOK_OPTIONS, ...options };
    const { logger } = opts;
    const typeCount = tz.timeInfo.length;

    warnShortFlags(tz.standardFlags, typeCount, 'standard', logger);
    warnShortFlags(tz.gmtFlags, typeCount, 'GMT', logger);

    // First, build up the local time types...
    const localTimeTypes: LocalTimeType[] = [];
    for (let i = 0; i < typeCount; i++) {
        const ltt = tz.timeInfo[i];
        localTimeTypes.push(Object.freeze({
            name: extractAbbreviation(tz.strings, ltt.nameOffset, i),
            offset: ltt.offset,
            isDst: ltt.isDst !== 0,
            transitionType: flagsToTransitionType(flagAt(tz.standardFlags, i), flagAt(tz.gmtFlags, i)),
        }));
    }

    // ...then link each transition to the type it refers to.
    const transitions: Transition[] = tz.transitions.map((t, i) => {
        const index = resolveTypeIndex(opts.typeIndexPolicy, t.localTimeTypeIndex, localTimeTypes.length, i, logger);
        return Object.freeze({
            timestamp: t.timestamp,
            localTimeTypeIndex: index,
            localTimeType: localTimeTypes[index],
        });
    });

    const leapSeconds: LeapSecond[] = tz.leapSeconds.map(ls => Object.freeze({
        timestamp: ls.timestamp,
        leapSecondCount: ls.leapSecondCount,
    }));

    let base: LocalTimeType;
    const first = transitions.shift();
    if (first) {
        base = first.localTimeType;
    } else if (localTimeTypes.length > 0) {
        base = localTimeTypes[0];
    } else {
        throw new NoLocalTimeTypesError();
    }

    return Object.freeze({
        base,
        transitions: Object.freeze(transitions),
        localTimeTypes: Object.freeze(localTimeTypes),
        leapSeconds: Object.freeze(leapSeconds),
    });
}

function warnShortFlags(flags: Uint8Array, typeCount: number, label: string, logger: TzifLogger | null): void {
    if (flags.length > 0 && flags.length < typeCount) {
        logger?.warn?.(`${flags.length} ${label} flags for ${typeCount} local time types; missing entries read as false`);
    }
}
