// EIR / Advertising Data encoder for the record kinds the decoder produces.

import { concatBytes } from "@noble/hashes/utils";
import { EIR_MAX_STRUCTURE_LENGTH, EirDataType, type EirRecord } from "./eirTypes";

const textEncoder = new TextEncoder();

function structure(dataType: EirDataType, data: Uint8Array): Uint8Array {
  const len = 1 + data.length;
  if (len > EIR_MAX_STRUCTURE_LENGTH) {
    throw new Error(`EIR structure too long: ${len} > ${EIR_MAX_STRUCTURE_LENGTH}`);
  }
  const bytes = new Uint8Array(1 + len);
  bytes[0] = len;
  bytes[1] = dataType;
  bytes.set(data, 2);
  return bytes;
}

function encodeUuid16List(uuids: number[]): Uint8Array {
  const data = new Uint8Array(uuids.length * 2);
  const view = new DataView(data.buffer);
  uuids.forEach((uuid, i) => {
    if (!Number.isInteger(uuid) || uuid < 0 || uuid > 0xffff) {
      throw new RangeError(`16-bit UUID out of range: ${uuid}`);
    }
    view.setUint16(i * 2, uuid, true); // little-endian
  });
  return data;
}

/**
 * Encode records as EIR structures, in order.
 *
 * uuid16 lists are written as complete lists. Throws for record kinds
 * that have no encoder yet.
 */
export function encodeEir(records: EirRecord[]): Uint8Array {
  const parts = records.map((record) => {
    switch (record.kind) {
      case "flags":
        return structure(EirDataType.FLAGS, new Uint8Array([record.flags & 0xff]));
      case "uuid16":
        return structure(EirDataType.UUID16_COMPLETE, encodeUuid16List(record.uuids));
      case "name":
        return structure(
          record.complete ? EirDataType.NAME_COMPLETE : EirDataType.NAME_SHORT,
          textEncoder.encode(record.name),
        );
      default:
        throw new Error(`Cannot encode EIR record kind: ${record.kind}`);
    }
  });
  return concatBytes(...parts);
}
