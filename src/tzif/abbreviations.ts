import { InvalidTextError } from './errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Bytes of the NUL-terminated name starting at `offset`. If the pool ends
 * before a NUL, the name is the rest of the pool; an offset at or past the
 * end gives an empty name.
 */
export function abbreviationBytes(pool: Uint8Array, offset: number): Uint8Array {
    if (offset >= pool.length) return new Uint8Array(0);
    const nul = pool.indexOf(0, offset);
    return pool.subarray(offset, nul === -1 ? pool.length : nul);
}

export function extractAbbreviation(pool: Uint8Array, offset: number, typeIndex: number): string {
    const bytes = abbreviationBytes(pool, offset);
    try {
        return utf8.decode(bytes);
    } catch (err: unknown) {
        throw new InvalidTextError(typeIndex, bytes.slice(), err);
    }
}
