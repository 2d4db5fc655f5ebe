// Bluetooth device address (BD_ADDR).
//
// Stored in over-the-air order, least significant octet first. Rendered most
// significant octet first: aa:bb:cc:dd:ee:ff.

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export const ADDRESS_LENGTH = 6;

const ADDRESS_PATTERN = /^[0-9a-fA-F]{2}(:[0-9a-fA-F]{2}){5}$/;

/** An immutable 6-byte device address. */
export class Address {
  private readonly _bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this._bytes = bytes;
  }

  /** Throws if `bytes` is not exactly 6 octets (integers 0-255). */
  static fromBytes(bytes: ArrayLike<number>): Address {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new Error(`Bluetooth address is ${ADDRESS_LENGTH} bytes, got ${bytes.length}`);
    }
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      const b = bytes[i];
      if (!Number.isInteger(b) || b < 0 || b > 0xff) {
        throw new RangeError(`Bluetooth address byte ${i} is not an octet: ${b}`);
      }
    }
    return new Address(Uint8Array.from(bytes));
  }

  static zero(): Address {
    return new Address(new Uint8Array(ADDRESS_LENGTH));
  }

  /** Parse the colon-separated form produced by toString(). */
  static parse(text: string): Address {
    if (!ADDRESS_PATTERN.test(text)) {
      throw new Error(`Invalid Bluetooth address: ${text}`);
    }
    return new Address(hexToBytes(text.split(":").join("")).reverse());
  }

  /** Stored bytes, for comparison and hashing. Read-only copy. */
  get bytes(): Readonly<Uint8Array> {
    return this._bytes.slice();
  }

  /** Copy of the stored bytes, in storage order. */
  toBytes(): Uint8Array {
    return this._bytes.slice();
  }

  equals(other: Address): boolean {
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      if (this._bytes[i] !== other._bytes[i]) return false;
    }
    return true;
  }

  toString(): string {
    const hex = bytesToHex(this._bytes.slice().reverse());
    return hex.match(/../g)?.join(":") ?? hex;
  }
}
