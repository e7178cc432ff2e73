/**
 * TZif decoder public API
 *
 * @module tzif
 */

import { parse } from './tzif/parser.js';
import { cook } from './tzif/cook.js';
import { decode } from './tzif/decode.js';
import { decodeFile } from './tzif/file.js';
import { formatZone } from './tzif/dump.js';
import { LIMIT_PROFILES, verifyLimits } from './tzif/limits.js';

export { parse, tzifMagic, TzifParser } from './tzif/parser.js';
export { cook, flagAt, flagsToTransitionType, resolveTypeIndex } from './tzif/cook.js';
export { decode } from './tzif/decode.js';
export { decodeFile } from './tzif/file.js';
export { formatZone } from './tzif/dump.js';
export { extractAbbreviation, abbreviationBytes } from './tzif/abbreviations.js';
export { LIMIT_PROFILES, DEFAULT_LIMIT_PROFILE, LimitedStructure, resolveLimits, verifyLimits } from './tzif/limits.js';
export type { Limits, LimitProfile } from './tzif/limits.js';
export { TzifVersion } from './tzif/format.js';
export { TransitionType } from './tzif/types.js';
export type {
    Header, TransitionData, LocalTimeTypeData, LeapSecondData, TZData,
    LocalTimeType, Transition, LeapSecond, ZoneData,
    DecodeOptions, CookOptions, ParseOptions, TypeIndexPolicy, TzifLogger,
} from './tzif/types.js';
export {
    TzifError, InvalidMagicNumberError, UnsupportedVersionError, IncompleteDataError,
    LimitExceededError, InvalidTextError, NoLocalTimeTypesError, InvalidTypeIndexError,
} from './tzif/errors.js';

export const TZif = {
    /**
     * Reads the raw structures of a TZif buffer, enforcing size limits.
     */
    parse,

    /**
     * Resolves raw structures into a zone with shared local time types.
     */
    cook,

    /**
     * parse + cook with the sensible limits unless told otherwise.
     */
    decode,

    decodeFile,

    formatZone,

    verifyLimits,

    limits: LIMIT_PROFILES,
};

export default TZif;
