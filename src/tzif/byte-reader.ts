import { IncompleteDataError } from './errors.js';

/**
 * Forward-only big-endian cursor over a byte buffer.
 * Every read either completes or throws IncompleteDataError.
 */
export class ByteReader {
    private readonly view: DataView;
    private pos: number = 0;

    constructor(private readonly data: Uint8Array) {
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get remaining(): number {
        return this.data.length - this.pos;
    }

    /** Fails unless `byteCount` more bytes are available. Does not advance. */
    ensure(byteCount: number, what: string): void {
        if (byteCount > this.remaining) {
            throw new IncompleteDataError(what, byteCount, this.remaining, this.pos);
        }
    }

    getUint8(): number {
        this.ensure(1, 'uint8');
        return this.data[this.pos++];
    }

    getUint32(): number {
        this.ensure(4, 'uint32');
        const val = this.view.getUint32(this.pos, false);
        this.pos += 4;
        return val;
    }

    getInt32(): number {
        this.ensure(4, 'int32');
        const val = this.view.getInt32(this.pos, false);
        this.pos += 4;
        return val;
    }

    /** Copies the next `count` bytes out of the buffer. */
    getBytes(count: number, what: string = 'bytes'): Uint8Array {
        this.ensure(count, what);
        const out = this.data.slice(this.pos, this.pos + count);
        this.pos += count;
        return out;
    }

    /** Reads up to `count` bytes, stopping early at the end of the buffer. */
    getBytesUpTo(count: number): Uint8Array {
        const n = Math.min(count, this.remaining);
        const out = this.data.slice(this.pos, this.pos + n);
        this.pos += n;
        return out;
    }

    skip(count: number, what: string): void {
        this.ensure(count, what);
        this.pos += count;
    }
}
