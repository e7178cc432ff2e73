import { readFile } from 'node:fs/promises';
import { decode } from './decode.js';
import type { DecodeOptions, ZoneData } from './types.js';

/** Reads a whole compiled zone file and decodes it. */
export async function decodeFile(path: string, options: DecodeOptions = {}): Promise<ZoneData> {
    const bytes = await readFile(path);
    return decode(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), options);
}
