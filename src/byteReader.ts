// Sequential reader over a byte buffer.
//
// All multi-byte reads are little-endian. Reading past the end throws
// RangeError; declared lengths are never trusted beyond the bytes available.

/** Cursor over a Uint8Array. */
export class ByteReader {
  private readonly _data: Uint8Array;
  private _offset = 0;

  constructor(data: Uint8Array) {
    this._data = data;
  }

  /** Bytes left to read. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  hasRemaining(): boolean {
    return this._offset < this._data.length;
  }

  readUint8(): number {
    this.ensure(1, "u8");
    return this._data[this._offset++];
  }

  readUint16LE(): number {
    this.ensure(2, "u16");
    const view = new DataView(this._data.buffer, this._data.byteOffset, this._data.byteLength);
    const value = view.getUint16(this._offset, true);
    this._offset += 2;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length, "bytes");
    const bytes = this._data.slice(this._offset, this._offset + length);
    this._offset += length;
    return bytes;
  }

  /** Read everything up to the end. */
  readRest(): Uint8Array {
    return this.readBytes(this.remaining);
  }

  skip(length: number): void {
    this.ensure(length, "skip");
    this._offset += length;
  }

  /**
   * Split off the next `length` bytes as a reader of their own and advance
   * past them. The sub-reader is capped at the bytes actually available.
   */
  take(length: number): ByteReader {
    const end = this._offset + Math.min(length, this.remaining);
    const sub = new ByteReader(this._data.subarray(this._offset, end));
    this._offset = end;
    return sub;
  }

  private ensure(length: number, what: string): void {
    if (length < 0 || length > this.remaining) {
      throw new RangeError(
        `Buffer underflow reading ${what}: need ${length} bytes, have ${this.remaining}`,
      );
    }
  }
}
