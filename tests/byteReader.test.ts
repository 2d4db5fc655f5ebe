import { ByteReader } from "../src";

describe("ByteReader", () => {
  test("sequential reads", () => {
    const reader = new ByteReader(new Uint8Array([0x01, 0x34, 0x12, 0xaa, 0xbb]));
    expect(reader.remaining).toBe(5);
    expect(reader.readUint8()).toBe(0x01);
    expect(reader.readUint16LE()).toBe(0x1234);
    expect(reader.readRest()).toEqual(new Uint8Array([0xaa, 0xbb]));
    expect(reader.hasRemaining()).toBe(false);
  });

  test("readBytes and skip", () => {
    const reader = new ByteReader(new Uint8Array([0x01, 0x02, 0x03, 0x04]));
    reader.skip(1);
    expect(reader.readBytes(2)).toEqual(new Uint8Array([0x02, 0x03]));
    expect(reader.remaining).toBe(1);
  });

  test("underflow throws RangeError", () => {
    const reader = new ByteReader(new Uint8Array([0x01]));
    expect(() => reader.readUint16LE()).toThrow(RangeError);
    expect(() => reader.readBytes(2)).toThrow("Buffer underflow reading bytes: need 2 bytes, have 1");
    expect(reader.readUint8()).toBe(0x01);
    expect(() => reader.readUint8()).toThrow(RangeError);
  });

  test("take advances past the taken bytes", () => {
    const reader = new ByteReader(new Uint8Array([0x01, 0x02, 0x03, 0x04]));
    const sub = reader.take(2);
    expect(sub.remaining).toBe(2);
    expect(reader.remaining).toBe(2);
    expect(reader.readUint8()).toBe(0x03);
    expect(sub.readUint8()).toBe(0x01);
  });

  test("take is capped at the bytes available", () => {
    const reader = new ByteReader(new Uint8Array([0xff, 0x34, 0x12]));
    reader.readUint8();
    const sub = reader.take(200);
    expect(sub.remaining).toBe(2);
    expect(reader.hasRemaining()).toBe(false);
    // Sub-reader over a non-zero byte offset
    expect(sub.readUint16LE()).toBe(0x1234);
  });

  test("sub-reader cannot read past its own bytes", () => {
    const reader = new ByteReader(new Uint8Array([0x01, 0x02, 0x03]));
    const sub = reader.take(1);
    sub.readUint8();
    expect(() => sub.readUint8()).toThrow(RangeError);
    expect(reader.readUint8()).toBe(0x02);
  });
});
