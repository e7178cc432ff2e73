import type { LimitedStructure } from './limits.js';

export class TzifError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'TzifError';
    }
}

/** The first four bytes of the buffer were not `TZif`. */
export class InvalidMagicNumberError extends TzifError {
    constructor(public readonly actual: Uint8Array) {
        super(`Invalid magic number: expected 54 5a 69 66 ("TZif"), got ${hexBytes(actual)}`);
        this.name = 'InvalidMagicNumberError';
    }
}

export class UnsupportedVersionError extends TzifError {
    constructor(public readonly versionByte: number) {
        super(`Unsupported TZif version byte 0x${versionByte.toString(16).padStart(2, '0')}`);
        this.name = 'UnsupportedVersionError';
    }
}

/** The buffer ended before a read could complete. */
export class IncompleteDataError extends TzifError {
    constructor(
        public readonly what: string,
        public readonly needed: number,
        public readonly available: number,
        public readonly position: number,
    ) {
        super(`Unexpected end of data (${what}): needed ${needed} bytes at offset ${position}, ${available} available`);
        this.name = 'IncompleteDataError';
    }
}

export class LimitExceededError extends TzifError {
    constructor(
        public readonly field: LimitedStructure,
        public readonly requested: number,
        public readonly max: number,
    ) {
        super(`Too many ${field} (tried to read ${requested}, limit was ${max})`);
        this.name = 'LimitExceededError';
    }
}

export class InvalidTextError extends TzifError {
    constructor(
        public readonly typeIndex: number,
        public readonly bytes: Uint8Array,
        originalError?: unknown,
    ) {
        super(`Abbreviation of local time type ${typeIndex} is not valid UTF-8: ${hexBytes(bytes)}`, originalError);
        this.name = 'InvalidTextError';
    }
}

/** Neither a transition nor a local time type exists to act as the base regime. */
export class NoLocalTimeTypesError extends TzifError {
    constructor() {
        super('Read 0 transitions and 0 local time types: no base regime available');
        this.name = 'NoLocalTimeTypesError';
    }
}

export class InvalidTypeIndexError extends TzifError {
    constructor(
        public readonly transitionIndex: number,
        public readonly typeIndex: number,
        public readonly catalogSize: number,
    ) {
        super(`Transition ${transitionIndex} refers to local time type ${typeIndex}, but only ${catalogSize} exist`);
        this.name = 'InvalidTypeIndexError';
    }
}

function hexBytes(bytes: Uint8Array): string {
    if (bytes.length === 0) return '(no bytes)';
    return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(' ');
}
