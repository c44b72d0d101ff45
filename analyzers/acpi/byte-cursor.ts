"use strict";

import { bytesToHex, bytesToSpacedHex } from "../../binary-utils.js";
import { fail, outOfBounds, succeed } from "./errors.js";
import type { DecodeFailure, DecodeResult } from "./errors.js";

const UTF8_DECODER = new TextDecoder("utf-8", { fatal: true });
const GUID_SIZE = 16;

const checkRange = (bytes: Uint8Array, offset: number, length: number): DecodeFailure | null => {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
    return outOfBounds(offset, length, bytes.length);
  }
  if (offset + length > bytes.length) return outOfBounds(offset, length, bytes.length);
  return null;
};

const viewOf = (bytes: Uint8Array): DataView => new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export const readAscii = (bytes: Uint8Array, offset: number, length: number): DecodeResult<string> => {
  const rangeError = checkRange(bytes, offset, length);
  if (rangeError) return rangeError;
  try {
    return succeed(UTF8_DECODER.decode(bytes.subarray(offset, offset + length)));
  } catch (error) {
    if (error instanceof TypeError) return fail({ kind: "InvalidEncoding", offset, length });
    throw error;
  }
};

export const readInt32 = (bytes: Uint8Array, offset: number): DecodeResult<number> => {
  const rangeError = checkRange(bytes, offset, 4);
  if (rangeError) return rangeError;
  return succeed(viewOf(bytes).getInt32(offset, true));
};

export const readUint32 = (bytes: Uint8Array, offset: number): DecodeResult<number> => {
  const rangeError = checkRange(bytes, offset, 4);
  if (rangeError) return rangeError;
  return succeed(viewOf(bytes).getUint32(offset, true));
};

export const readByte = (bytes: Uint8Array, offset: number): DecodeResult<number> => {
  const rangeError = checkRange(bytes, offset, 1);
  if (rangeError) return rangeError;
  return succeed(viewOf(bytes).getUint8(offset));
};

export const readHex = (bytes: Uint8Array, offset: number, length: number): DecodeResult<string> => {
  const rangeError = checkRange(bytes, offset, length);
  if (rangeError) return rangeError;
  return succeed(bytesToSpacedHex(bytes.subarray(offset, offset + length)));
};

export const readBytes = (bytes: Uint8Array, offset: number, length: number): DecodeResult<Uint8Array> => {
  const rangeError = checkRange(bytes, offset, length);
  if (rangeError) return rangeError;
  return succeed(bytes.slice(offset, offset + length));
};

/**
 * Reads a GUID stored in its wire form (Data1, Data2 and Data3 little-endian,
 * Data4 as stored) and returns the 32 lowercase hex digits of its canonical
 * form without separators.
 */
export const readGuid = (bytes: Uint8Array, offset: number): DecodeResult<string> => {
  const rangeError = checkRange(bytes, offset, GUID_SIZE);
  if (rangeError) return rangeError;
  const dv = viewOf(bytes);
  const data1 = dv.getUint32(offset, true).toString(16).padStart(8, "0");
  const data2 = dv.getUint16(offset + 4, true).toString(16).padStart(4, "0");
  const data3 = dv.getUint16(offset + 6, true).toString(16).padStart(4, "0");
  const data4 = bytesToHex(bytes.subarray(offset + 8, offset + GUID_SIZE));
  return succeed(`${data1}${data2}${data3}${data4}`);
};

export const formatGuid = (canonical: string): string => {
  if (!/^[0-9a-f]{32}$/u.test(canonical)) return canonical;
  return [
    canonical.slice(0, 8),
    canonical.slice(8, 12),
    canonical.slice(12, 16),
    canonical.slice(16, 20),
    canonical.slice(20)
  ].join("-");
};
