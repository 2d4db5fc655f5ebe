import {
  EirError,
  EirErrorKind,
  InvalidTextError,
  RepeatedFlagError,
  RepeatedNameError,
  UnexpectedDataLengthError,
} from "../src";

describe("EIR errors", () => {
  test("RepeatedFlagError", () => {
    const e = new RepeatedFlagError();
    expect(e).toBeInstanceOf(EirError);
    expect(e.kind).toBe(EirErrorKind.REPEATED_FLAG);
    expect(e.name).toBe("RepeatedFlagError");
    expect(e.message).toBe("More than one flag block found");
  });

  test("RepeatedNameError", () => {
    const e = new RepeatedNameError();
    expect(e.kind).toBe(EirErrorKind.REPEATED_NAME);
    expect(e.message).toBe("More than one name block found");
  });

  test("UnexpectedDataLengthError carries length", () => {
    const e = new UnexpectedDataLengthError(5);
    expect(e).toBeInstanceOf(Error);
    expect(e.kind).toBe(EirErrorKind.UNEXPECTED_DATA_LENGTH);
    expect(e.len).toBe(5);
    expect(e.message).toBe("Unexpected data length: 5");
  });

  test("InvalidTextError", () => {
    const e = new InvalidTextError("uri");
    expect(e.kind).toBe(EirErrorKind.INVALID_TEXT);
    expect(e.field).toBe("uri");
    expect(e.message).toBe("Invalid text encoding in uri");
  });
});
