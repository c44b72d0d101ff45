"use strict";

import {
  BERT_REGION_LENGTH_OFFSET,
  BERT_REGION_OFFSET,
  BERT_REGION_SIZE,
  BERT_SIGNATURE,
  BERT_TABLE_SIZE,
  HEADER_CHECKSUM_OFFSET,
  HEADER_CREATOR_ID_OFFSET,
  HEADER_CREATOR_ID_SIZE,
  HEADER_CREATOR_REVISION_OFFSET,
  HEADER_LENGTH_OFFSET,
  HEADER_OEM_ID_OFFSET,
  HEADER_OEM_ID_SIZE,
  HEADER_OEM_REVISION_OFFSET,
  HEADER_REVISION_OFFSET,
  HEADER_SIGNATURE_OFFSET,
  HEADER_SIGNATURE_SIZE,
  HEST_ERROR_SOURCE_COUNT_OFFSET,
  HEST_FIXED_SIZE,
  HEST_SIGNATURE
} from "./constants.js";
import { readAscii, readByte, readBytes, readHex, readInt32 } from "./byte-cursor.js";
import { fail, succeed } from "./errors.js";
import type { DecodeResult } from "./errors.js";
import type { AcpiTableHeader, AcpiTableSignature, BertRecord, HestRecord } from "./types.js";

const checkDeclaredLength = (header: AcpiTableHeader, fileSize: number, issues: string[]): void => {
  if (header.length !== fileSize) {
    issues.push(`Declared table length ${header.length} differs from the ${fileSize}-byte buffer.`);
  }
};

export const readTableSignature = (bytes: Uint8Array): DecodeResult<string> =>
  readAscii(bytes, HEADER_SIGNATURE_OFFSET, HEADER_SIGNATURE_SIZE);

/**
 * Decodes the 36-byte header every ACPI system description table starts with.
 * The signature is checked before any other field is read.
 */
export const decodeAcpiTableHeader = (
  bytes: Uint8Array,
  expectedSignature: AcpiTableSignature
): DecodeResult<AcpiTableHeader> => {
  const signature = readTableSignature(bytes);
  if (!signature.ok) return signature;
  if (signature.value !== expectedSignature) {
    return fail({ kind: "HeaderMismatch", expected: expectedSignature, actual: signature.value });
  }
  const length = readInt32(bytes, HEADER_LENGTH_OFFSET);
  if (!length.ok) return length;
  const revision = readByte(bytes, HEADER_REVISION_OFFSET);
  if (!revision.ok) return revision;
  const checksum = readByte(bytes, HEADER_CHECKSUM_OFFSET);
  if (!checksum.ok) return checksum;
  const oemId = readAscii(bytes, HEADER_OEM_ID_OFFSET, HEADER_OEM_ID_SIZE);
  if (!oemId.ok) return oemId;
  const oemRevision = readInt32(bytes, HEADER_OEM_REVISION_OFFSET);
  if (!oemRevision.ok) return oemRevision;
  const creatorId = readAscii(bytes, HEADER_CREATOR_ID_OFFSET, HEADER_CREATOR_ID_SIZE);
  if (!creatorId.ok) return creatorId;
  const creatorRevision = readInt32(bytes, HEADER_CREATOR_REVISION_OFFSET);
  if (!creatorRevision.ok) return creatorRevision;
  return succeed({
    signature: signature.value,
    length: length.value,
    revision: revision.value,
    checksum: checksum.value,
    oemId: oemId.value,
    oemRevision: oemRevision.value,
    creatorId: creatorId.value,
    creatorRevision: creatorRevision.value
  });
};

export const parseBert = (bytes: Uint8Array): DecodeResult<BertRecord> => {
  const header = decodeAcpiTableHeader(bytes, BERT_SIGNATURE);
  if (!header.ok) return header;
  const regionLength = readInt32(bytes, BERT_REGION_LENGTH_OFFSET);
  if (!regionLength.ok) return regionLength;
  const region = readHex(bytes, BERT_REGION_OFFSET, BERT_REGION_SIZE);
  if (!region.ok) return region;
  const hex = readHex(bytes, 0, BERT_TABLE_SIZE);
  if (!hex.ok) return hex;
  const issues: string[] = [];
  checkDeclaredLength(header.value, bytes.length, issues);
  return succeed<BertRecord>({
    kind: "BERT",
    header: header.value,
    bootErrorRegionLength: regionLength.value,
    bootErrorRegion: region.value,
    hex: hex.value,
    fileSize: bytes.length,
    issues
  });
};

// Hardware Error Source Structures after the fixed part are kept as bytes, not decoded.
export const parseHest = (bytes: Uint8Array): DecodeResult<HestRecord> => {
  const header = decodeAcpiTableHeader(bytes, HEST_SIGNATURE);
  if (!header.ok) return header;
  const errorSourceCount = readInt32(bytes, HEST_ERROR_SOURCE_COUNT_OFFSET);
  if (!errorSourceCount.ok) return errorSourceCount;
  const tail = readBytes(bytes, HEST_FIXED_SIZE, bytes.length - HEST_FIXED_SIZE);
  if (!tail.ok) return tail;
  const issues: string[] = [];
  checkDeclaredLength(header.value, bytes.length, issues);
  if (errorSourceCount.value > 0 && tail.value.length === 0) {
    issues.push(`Table declares ${errorSourceCount.value} error sources but carries no error source structures.`);
  }
  return succeed<HestRecord>({
    kind: "HEST",
    header: header.value,
    errorSourceCount: errorSourceCount.value,
    errorSourceStructures: tail.value,
    fileSize: bytes.length,
    issues
  });
};
