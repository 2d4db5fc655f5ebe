// Decode errors for EIR data. Each one terminates the decode of a buffer.

export enum EirErrorKind {
  REPEATED_FLAG = "REPEATED_FLAG",
  REPEATED_NAME = "REPEATED_NAME",
  UNEXPECTED_DATA_LENGTH = "UNEXPECTED_DATA_LENGTH",
  INVALID_TEXT = "INVALID_TEXT",
}

export abstract class EirError extends Error {
  abstract readonly kind: EirErrorKind;

  constructor(message: string) {
    super(message);
    this.name = "EirError";
  }
}

/** A second FLAGS structure in one buffer. */
export class RepeatedFlagError extends EirError {
  readonly kind = EirErrorKind.REPEATED_FLAG;

  constructor() {
    super("More than one flag block found");
    this.name = "RepeatedFlagError";
  }
}

/** A second name structure (short or complete) in one buffer. */
export class RepeatedNameError extends EirError {
  readonly kind = EirErrorKind.REPEATED_NAME;

  constructor() {
    super("More than one name block found");
    this.name = "RepeatedNameError";
  }
}

/** A size-constrained payload of the wrong length. */
export class UnexpectedDataLengthError extends EirError {
  readonly kind = EirErrorKind.UNEXPECTED_DATA_LENGTH;
  readonly len: number;

  constructor(len: number) {
    super(`Unexpected data length: ${len}`);
    this.name = "UnexpectedDataLengthError";
    this.len = len;
  }
}

/** Text in a field that requires a valid encoding. */
export class InvalidTextError extends EirError {
  readonly kind = EirErrorKind.INVALID_TEXT;
  readonly field: string;

  constructor(field: string) {
    super(`Invalid text encoding in ${field}`);
    this.name = "InvalidTextError";
    this.field = field;
  }
}
