"use strict";

import { BERT_SIGNATURE, HEST_SIGNATURE } from "./constants.js";
import { fail } from "./errors.js";
import { parseBert, parseHest, readTableSignature } from "./table-header.js";
import type { DecodeResult } from "./errors.js";
import type { AcpiTableRecord } from "./types.js";

export { parseBert, parseHest, decodeAcpiTableHeader } from "./table-header.js";
export { parseGenericErrorStatusBlock, decodeErrorDataEntry } from "./status-block.js";
export { decodeSectionPayload, lookupSectionType, SECTION_TYPES } from "./section-types.js";
export { formatGuid, readAscii, readByte, readBytes, readGuid, readHex, readInt32 } from "./byte-cursor.js";
export { describeDecodeError } from "./errors.js";
export type { AcpiDecodeError, AcpiDecodeErrorKind, DecodeFailure, DecodeResult } from "./errors.js";
export type {
  AcpiTableHeader,
  AcpiTableRecord,
  AcpiTableSignature,
  BertRecord,
  BlockStatusBits,
  DecodedSectionField,
  EntryValidationBits,
  GenericErrorDataEntry,
  GenericErrorStatusBlock,
  HestRecord,
  SectionFieldDescriptor,
  SectionFieldKind,
  SectionPayload,
  SectionTypeSchema
} from "./types.js";

export const parseAcpiTable = (bytes: Uint8Array): DecodeResult<AcpiTableRecord> => {
  const signature = readTableSignature(bytes);
  if (!signature.ok) return signature;
  if (signature.value === BERT_SIGNATURE) return parseBert(bytes);
  if (signature.value === HEST_SIGNATURE) return parseHest(bytes);
  return fail({
    kind: "HeaderMismatch",
    expected: `${BERT_SIGNATURE}|${HEST_SIGNATURE}`,
    actual: signature.value
  });
};
