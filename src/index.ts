// Pure TypeScript decoder for Bluetooth Extended Inquiry Response (EIR) and
// Advertising Data, with a device address value type.

export {
  EirDataType,
  eirDataTypeFromValue,
  EirFlag,
  EIR_FLAGS_MASK,
  EIR_MAX_STRUCTURE_LENGTH,
} from "./eirTypes";

export type {
  EirFlags,
  EirRecord,
  FlagsRecord,
  Uuid16Record,
  Uuid32Record,
  Uuid128Record,
  NameRecord,
  TxPowerLevelRecord,
  UriRecord,
  ManufacturerSpecificData,
  ManufacturerSpecificDataRecord,
} from "./eirTypes";

export { flagsFromByte, flagsOf, hasFlag, flagList } from "./eirFlags";

export {
  EirErrorKind,
  EirError,
  RepeatedFlagError,
  RepeatedNameError,
  UnexpectedDataLengthError,
  InvalidTextError,
} from "./eirErrors";

export { ByteReader } from "./byteReader";

export { parseEir, tryParseEir } from "./eirParser";
export type { EirParseResult } from "./eirParser";

export { encodeEir } from "./eirBuilder";

export { ADDRESS_LENGTH, Address } from "./address";
