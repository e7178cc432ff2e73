export const RESERVED_SIZE = 15;

export enum TzifVersion {
    V1 = 0x00,
    V2 = 0x32, // '2'
    V3 = 0x33, // '3'
    V4 = 0x34, // '4'
}

// magic(4) + reserved(15) + version(1) + six u32 counts(24)
export const TZIF_HEADER_SIZE = 4 + RESERVED_SIZE + 1 + 6 * 4;

export const TRANSITION_TIME_SIZE = 4;
export const TRANSITION_INDEX_SIZE = 1;
export const LOCAL_TIME_TYPE_SIZE = 4 + 1 + 1; // offset(i32) + isDst(u8) + nameOffset(u8)
export const LEAP_SECOND_SIZE = 4 + 4;         // timestamp(i32) + count(i32)
export const FLAG_SIZE = 1;

export function isKnownVersion(byte: number): byte is TzifVersion {
    return byte === TzifVersion.V1
        || byte === TzifVersion.V2
        || byte === TzifVersion.V3
        || byte === TzifVersion.V4;
}
