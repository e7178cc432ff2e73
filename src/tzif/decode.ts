import { cook } from './cook.js';
import { DEFAULT_LIMIT_PROFILE } from './limits.js';
import { parse } from './parser.js';
import type { DecodeOptions, ZoneData } from './types.js';

/** Parse and cook in one step. Limits default to the sensible profile. */
export function decode(data: Uint8Array, options: DecodeOptions = {}): ZoneData {
    const { limits = DEFAULT_LIMIT_PROFILE, ...cookOptions } = options;
    const raw = parse(data, limits, { logger: cookOptions.logger ?? null });
    return cook(raw, cookOptions);
}
