// EIR / Advertising Data decoder.
//
// Single pass over [length][data_type][data] structures. Each structure's
// data is read through its own bounded reader, so a type decoder can never
// run into the next structure; whatever it leaves unread is dropped.

import { ByteReader } from "./byteReader";
import { flagsFromByte } from "./eirFlags";
import {
  RepeatedFlagError,
  RepeatedNameError,
  UnexpectedDataLengthError,
  EirError,
} from "./eirErrors";
import { EirDataType, eirDataTypeFromValue, type EirRecord } from "./eirTypes";

export type EirParseResult = { ok: true; records: EirRecord[] } | { ok: false; error: EirError };

const textDecoder = new TextDecoder("utf-8", { ignoreBOM: true });

interface ParseState {
  records: EirRecord[];
  hasFlags: boolean;
  hasName: boolean;
  /** Index of the accumulated uuid16 record in `records`, or -1. */
  uuid16Index: number;
}

/**
 * Parse EIR / Advertising Data into records, in order of first appearance.
 *
 * Unknown data types are skipped. Throws an EirError subclass on malformed
 * input; a structure header cut off by the end of the buffer throws RangeError.
 * A FLAGS structure with no data octet throws UnexpectedDataLengthError(0).
 */
export function parseEir(input: Uint8Array | ByteReader): EirRecord[] {
  const buf = input instanceof ByteReader ? input : new ByteReader(input);
  const state: ParseState = { records: [], hasFlags: false, hasName: false, uuid16Index: -1 };

  while (buf.hasRemaining()) {
    const len = buf.readUint8();
    if (len === 0) {
      break; // End of significant data; the rest is padding
    }
    const rawType = buf.readUint8();
    const data = buf.take(len - 1);

    const dataType = eirDataTypeFromValue(rawType);
    if (dataType === null) {
      continue;
    }
    decodeStructure(state, dataType, data);
  }

  return state.records;
}

/** Like parseEir, but returns decode errors instead of throwing them. */
export function tryParseEir(input: Uint8Array | ByteReader): EirParseResult {
  try {
    return { ok: true, records: parseEir(input) };
  } catch (e) {
    if (e instanceof EirError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

function decodeStructure(state: ParseState, dataType: EirDataType, data: ByteReader): void {
  switch (dataType) {
    case EirDataType.FLAGS:
      if (state.hasFlags) {
        throw new RepeatedFlagError();
      }
      if (!data.hasRemaining()) {
        throw new UnexpectedDataLengthError(0);
      }
      state.hasFlags = true;
      state.records.push({ kind: "flags", flags: flagsFromByte(data.readUint8()) });
      return;

    case EirDataType.UUID16_INCOMPLETE:
    case EirDataType.UUID16_COMPLETE: {
      if (data.remaining % 2 !== 0) {
        throw new UnexpectedDataLengthError(data.remaining);
      }
      if (state.uuid16Index < 0) {
        state.uuid16Index = state.records.length;
        state.records.push({ kind: "uuid16", uuids: [] });
      }
      const record = state.records[state.uuid16Index];
      if (record.kind !== "uuid16") {
        throw new Error(`Record ${state.uuid16Index} is ${record.kind}, expected uuid16`);
      }
      while (data.hasRemaining()) {
        record.uuids.push(data.readUint16LE());
      }
      return;
    }

    case EirDataType.NAME_SHORT:
    case EirDataType.NAME_COMPLETE:
      if (state.hasName) {
        throw new RepeatedNameError();
      }
      state.hasName = true;
      state.records.push({
        kind: "name",
        name: textDecoder.decode(data.readRest()),
        complete: dataType === EirDataType.NAME_COMPLETE,
      });
      return;

    // Recognized, payload not decoded yet.
    case EirDataType.UUID32_INCOMPLETE:
    case EirDataType.UUID32_COMPLETE:
    case EirDataType.UUID128_INCOMPLETE:
    case EirDataType.UUID128_COMPLETE:
    case EirDataType.TX_POWER_LEVEL:
    case EirDataType.URI:
    case EirDataType.MANUFACTURER_SPECIFIC_DATA:
      return;

    default: {
      const unhandled: never = dataType;
      throw new Error(`Unhandled EIR data type: ${String(unhandled)}`);
    }
  }
}
