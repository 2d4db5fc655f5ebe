// Capability flag helpers.

import { EIR_FLAGS_MASK, EirFlag, type EirFlags } from "./eirTypes";

const ALL_FLAGS: readonly EirFlag[] = [
  EirFlag.LE_LIMITED_DISCOVERABLE,
  EirFlag.LE_GENERAL_DISCOVERABLE,
  EirFlag.BR_EDR_NOT_SUPPORTED,
  EirFlag.CONTROLLER_SIMULTANEOUS_LE_BR_EDR,
  EirFlag.HOST_SIMULTANEOUS_LE_BR_EDR,
];

/** Decode a flags octet. Unrecognized bits are dropped. */
export function flagsFromByte(octet: number): EirFlags {
  return octet & EIR_FLAGS_MASK;
}

/** Combine flags into a bit set. */
export function flagsOf(...flags: EirFlag[]): EirFlags {
  return flags.reduce((acc, f) => acc | f, 0);
}

export function hasFlag(flags: EirFlags, flag: EirFlag): boolean {
  return (flags & flag) !== 0;
}

/** List the flags set in `flags`, lowest bit first. */
export function flagList(flags: EirFlags): EirFlag[] {
  return ALL_FLAGS.filter((f) => hasFlag(flags, f));
}
