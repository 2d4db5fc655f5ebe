// Data type codes, flag bits, record shapes, and protocol constants for EIR /
// Advertising Data.
//
// EIR structure (octets):
// | length(1) | data_type(1) | data(length - 1) |
//
// A length of 0 marks the end of significant data; the rest is padding.
// Data type codes follow the Generic Access Profile assigned numbers.

/** EIR data type field (1 octet). */
export enum EirDataType {
  FLAGS = 0x01,
  UUID16_INCOMPLETE = 0x02,
  UUID16_COMPLETE = 0x03,
  UUID32_INCOMPLETE = 0x04,
  UUID32_COMPLETE = 0x05,
  UUID128_INCOMPLETE = 0x06,
  UUID128_COMPLETE = 0x07,
  NAME_SHORT = 0x08,
  NAME_COMPLETE = 0x09,
  TX_POWER_LEVEL = 0x0a,
  URI = 0x24,
  MANUFACTURER_SPECIFIC_DATA = 0xff,
}

/** Map an octet to its data type, or null if the code is not recognized. */
export function eirDataTypeFromValue(v: number): EirDataType | null {
  switch (v) {
    case 0x01:
      return EirDataType.FLAGS;
    case 0x02:
      return EirDataType.UUID16_INCOMPLETE;
    case 0x03:
      return EirDataType.UUID16_COMPLETE;
    case 0x04:
      return EirDataType.UUID32_INCOMPLETE;
    case 0x05:
      return EirDataType.UUID32_COMPLETE;
    case 0x06:
      return EirDataType.UUID128_INCOMPLETE;
    case 0x07:
      return EirDataType.UUID128_COMPLETE;
    case 0x08:
      return EirDataType.NAME_SHORT;
    case 0x09:
      return EirDataType.NAME_COMPLETE;
    case 0x0a:
      return EirDataType.TX_POWER_LEVEL;
    case 0x24:
      return EirDataType.URI;
    case 0xff:
      return EirDataType.MANUFACTURER_SPECIFIC_DATA;
    default:
      return null;
  }
}

/** Capability flag bits carried by the FLAGS structure. */
export enum EirFlag {
  LE_LIMITED_DISCOVERABLE = 1 << 0,
  LE_GENERAL_DISCOVERABLE = 1 << 1,
  BR_EDR_NOT_SUPPORTED = 1 << 2,
  CONTROLLER_SIMULTANEOUS_LE_BR_EDR = 1 << 3,
  HOST_SIMULTANEOUS_LE_BR_EDR = 1 << 4,
}

/** Bit set of EirFlag values. Holds recognized bits only. */
export type EirFlags = number;

/** Union of all recognized flag bits. */
export const EIR_FLAGS_MASK = 0x1f;

/** length(1) can cover at most data_type(1) + 254 data octets. */
export const EIR_MAX_STRUCTURE_LENGTH = 0xff;

export interface FlagsRecord {
  kind: "flags";
  flags: EirFlags;
}

export interface Uuid16Record {
  kind: "uuid16";
  uuids: number[];
}

export interface Uuid32Record {
  kind: "uuid32";
  uuids: number[];
}

export interface Uuid128Record {
  kind: "uuid128";
  uuids: bigint[];
}

export interface NameRecord {
  kind: "name";
  name: string;
  /** False when the device sent a shortened name. */
  complete: boolean;
}

export interface TxPowerLevelRecord {
  kind: "txPowerLevel";
  levels: number[];
}

export interface UriRecord {
  kind: "uri";
  uris: string[];
}

export interface ManufacturerSpecificData {
  companyIdentifierCode: number;
  data: Uint8Array;
}

export interface ManufacturerSpecificDataRecord {
  kind: "manufacturerSpecificData";
  entries: ManufacturerSpecificData[];
}

/**
 * One logical field decoded from an EIR buffer.
 *
 * The decoder currently produces `flags`, `uuid16` and `name`. The remaining
 * variants have named data type codes but their payloads are skipped.
 */
export type EirRecord =
  | FlagsRecord
  | Uuid16Record
  | Uuid32Record
  | Uuid128Record
  | NameRecord
  | TxPowerLevelRecord
  | UriRecord
  | ManufacturerSpecificDataRecord;
