"use strict";

export type OutOfBoundsError = {
  kind: "OutOfBounds";
  offset: number;
  length: number;
  available: number;
};

export type InvalidEncodingError = {
  kind: "InvalidEncoding";
  offset: number;
  length: number;
};

export type HeaderMismatchError = {
  kind: "HeaderMismatch";
  expected: string;
  actual: string;
};

export type TruncatedEntryError = {
  kind: "TruncatedEntry";
  // Start of the offending entry, relative to the status block.
  entryOffset: number;
  declaredLength: number;
  available: number;
};

export type AcpiDecodeError =
  | OutOfBoundsError
  | InvalidEncodingError
  | HeaderMismatchError
  | TruncatedEntryError;

export type AcpiDecodeErrorKind = AcpiDecodeError["kind"];

export type DecodeSuccess<T> = { ok: true; value: T };

/**
 * A failed decode. `partial` is set when the decoder got far enough to return
 * something useful, e.g. the entries of a status block that precede a
 * truncated one.
 */
export type DecodeFailure<T = never> = { ok: false; error: AcpiDecodeError; partial?: T };

export type DecodeResult<T, P = never> = DecodeSuccess<T> | DecodeFailure<P>;

export const succeed = <T>(value: T): DecodeSuccess<T> => ({ ok: true, value });

export const fail = (error: AcpiDecodeError): DecodeFailure => ({ ok: false, error });

export const failWithPartial = <T>(error: AcpiDecodeError, partial: T): DecodeFailure<T> => ({
  ok: false,
  error,
  partial
});

export const outOfBounds = (offset: number, length: number, available: number): DecodeFailure =>
  fail({ kind: "OutOfBounds", offset, length, available });

export const describeDecodeError = (error: AcpiDecodeError): string => {
  switch (error.kind) {
    case "OutOfBounds":
      return `Read of ${error.length} bytes at offset ${error.offset} is past the end of the ${error.available}-byte buffer`;
    case "InvalidEncoding":
      return `Bytes ${error.offset}..${error.offset + error.length} are not valid UTF-8 text`;
    case "HeaderMismatch":
      return `Wrong header signature: ${JSON.stringify(error.actual)} (expected ${error.expected})`;
    case "TruncatedEntry":
      return (
        `Error data entry at offset ${error.entryOffset} declares ${error.declaredLength} payload bytes ` +
        `but only ${error.available} bytes remain`
      );
  }
};
