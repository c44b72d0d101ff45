"use strict";

import {
  BLOCK_SEVERITY_NAMES,
  BLOCK_STATUS_CORRECTABLE_VALID,
  BLOCK_STATUS_ENTRY_COUNT_MASK,
  BLOCK_STATUS_ENTRY_COUNT_SHIFT,
  BLOCK_STATUS_MULTIPLE_CORRECTABLE,
  BLOCK_STATUS_MULTIPLE_UNCORRECTABLE,
  BLOCK_STATUS_UNCORRECTABLE_VALID,
  ENTRY_ERROR_DATA_LENGTH_OFFSET,
  ENTRY_FLAGS_OFFSET,
  ENTRY_FRU_ID_OFFSET,
  ENTRY_FRU_ID_SIZE,
  ENTRY_FRU_TEXT_OFFSET,
  ENTRY_FRU_TEXT_SIZE,
  ENTRY_HEADER_SIZE,
  ENTRY_REVISION_OFFSET,
  ENTRY_REVISION_SIZE,
  ENTRY_SECTION_TYPE_OFFSET,
  ENTRY_SEVERITY_NAMES,
  ENTRY_SEVERITY_OFFSET,
  ENTRY_TIMESTAMP_OFFSET,
  ENTRY_TIMESTAMP_SIZE,
  ENTRY_VALIDATION_BITS_OFFSET,
  MAX_ISSUES,
  STATUS_BLOCK_DATA_LENGTH_OFFSET,
  STATUS_BLOCK_HEADER_SIZE,
  STATUS_BLOCK_RAW_DATA_LENGTH_OFFSET,
  STATUS_BLOCK_RAW_DATA_OFFSET_OFFSET,
  STATUS_BLOCK_SEVERITY_OFFSET,
  STATUS_BLOCK_STATUS_OFFSET,
  UNKNOWN_SECTION_NAME,
  VALIDATION_FRU_ID,
  VALIDATION_FRU_TEXT,
  VALIDATION_TIMESTAMP,
  describeSeverity
} from "./constants.js";
import { readAscii, readByte, readGuid, readHex, readInt32, readUint32 } from "./byte-cursor.js";
import { decodeSectionPayload, lookupSectionType } from "./section-types.js";
import { fail, failWithPartial, succeed } from "./errors.js";
import type { DecodeResult } from "./errors.js";
import type { BlockStatusBits, GenericErrorDataEntry, GenericErrorStatusBlock } from "./types.js";

export type DecodedEntry = {
  entry: GenericErrorDataEntry;
  consumedBytes: number;
};

const decodeBlockStatus = (value: number): BlockStatusBits => ({
  value,
  uncorrectableErrorValid: (value & BLOCK_STATUS_UNCORRECTABLE_VALID) !== 0,
  correctableErrorValid: (value & BLOCK_STATUS_CORRECTABLE_VALID) !== 0,
  multipleUncorrectableErrors: (value & BLOCK_STATUS_MULTIPLE_UNCORRECTABLE) !== 0,
  multipleCorrectableErrors: (value & BLOCK_STATUS_MULTIPLE_CORRECTABLE) !== 0,
  errorDataEntryCount: (value >>> BLOCK_STATUS_ENTRY_COUNT_SHIFT) & BLOCK_STATUS_ENTRY_COUNT_MASK
});

/**
 * Decodes the Generic Error Data Entry starting at `entryOffset`. `region`
 * ends where the entry region ends, so the payload may not run past it.
 */
export const decodeErrorDataEntry = (region: Uint8Array, entryOffset: number): DecodeResult<DecodedEntry> => {
  const at = (fieldOffset: number): number => entryOffset + fieldOffset;
  const sectionType = readGuid(region, at(ENTRY_SECTION_TYPE_OFFSET));
  if (!sectionType.ok) return sectionType;
  const severity = readInt32(region, at(ENTRY_SEVERITY_OFFSET));
  if (!severity.ok) return severity;
  const revision = readHex(region, at(ENTRY_REVISION_OFFSET), ENTRY_REVISION_SIZE);
  if (!revision.ok) return revision;
  const validationBits = readByte(region, at(ENTRY_VALIDATION_BITS_OFFSET));
  if (!validationBits.ok) return validationBits;
  const validationHex = readHex(region, at(ENTRY_VALIDATION_BITS_OFFSET), 1);
  if (!validationHex.ok) return validationHex;
  const flags = readHex(region, at(ENTRY_FLAGS_OFFSET), 1);
  if (!flags.ok) return flags;
  const errorDataLength = readInt32(region, at(ENTRY_ERROR_DATA_LENGTH_OFFSET));
  if (!errorDataLength.ok) return errorDataLength;
  const fruId = readHex(region, at(ENTRY_FRU_ID_OFFSET), ENTRY_FRU_ID_SIZE);
  if (!fruId.ok) return fruId;
  const fruText = readAscii(region, at(ENTRY_FRU_TEXT_OFFSET), ENTRY_FRU_TEXT_SIZE);
  if (!fruText.ok) return fruText;
  const timestamp = readHex(region, at(ENTRY_TIMESTAMP_OFFSET), ENTRY_TIMESTAMP_SIZE);
  if (!timestamp.ok) return timestamp;

  const payloadLength = errorDataLength.value;
  const payloadStart = at(ENTRY_HEADER_SIZE);
  const available = region.length - payloadStart;
  if (payloadLength < 0 || payloadLength > available) {
    return fail({ kind: "TruncatedEntry", entryOffset, declaredLength: payloadLength, available });
  }

  const schema = lookupSectionType(sectionType.value);
  const payload = decodeSectionPayload(schema, region.subarray(0, payloadStart + payloadLength), payloadStart);
  if (!payload.ok) return payload;

  return succeed({
    entry: {
      offset: entryOffset,
      sectionType: sectionType.value,
      sectionName: schema ? schema.name : UNKNOWN_SECTION_NAME,
      errorSeverity: severity.value,
      errorSeverityName: describeSeverity(ENTRY_SEVERITY_NAMES, severity.value),
      revision: revision.value,
      validationBits: validationHex.value,
      validation: {
        fruIdValid: (validationBits.value & VALIDATION_FRU_ID) !== 0,
        fruTextValid: (validationBits.value & VALIDATION_FRU_TEXT) !== 0,
        timestampValid: (validationBits.value & VALIDATION_TIMESTAMP) !== 0
      },
      flags: flags.value,
      errorDataLength: payloadLength,
      fruId: fruId.value,
      fruText: fruText.value,
      timestamp: timestamp.value,
      payload: payload.value
    },
    consumedBytes: ENTRY_HEADER_SIZE + payloadLength
  });
};

/**
 * Decodes a Generic Error Status Block and the entries that follow its header.
 * Entries are read back to back until fewer than one entry header's worth of
 * bytes is left in the data region. When an entry overruns the region the
 * failure carries the block with every entry decoded before it.
 */
export const parseGenericErrorStatusBlock = (
  bytes: Uint8Array
): DecodeResult<GenericErrorStatusBlock, GenericErrorStatusBlock> => {
  const blockStatusHex = readHex(bytes, STATUS_BLOCK_STATUS_OFFSET, 4);
  if (!blockStatusHex.ok) return blockStatusHex;
  const blockStatus = readUint32(bytes, STATUS_BLOCK_STATUS_OFFSET);
  if (!blockStatus.ok) return blockStatus;
  const rawDataOffset = readInt32(bytes, STATUS_BLOCK_RAW_DATA_OFFSET_OFFSET);
  if (!rawDataOffset.ok) return rawDataOffset;
  const rawDataLength = readInt32(bytes, STATUS_BLOCK_RAW_DATA_LENGTH_OFFSET);
  if (!rawDataLength.ok) return rawDataLength;
  const dataLength = readInt32(bytes, STATUS_BLOCK_DATA_LENGTH_OFFSET);
  if (!dataLength.ok) return dataLength;
  const severity = readInt32(bytes, STATUS_BLOCK_SEVERITY_OFFSET);
  if (!severity.ok) return severity;

  const issues: string[] = [];
  const pushIssue = (message: string): void => {
    if (issues.length >= MAX_ISSUES) return;
    issues.push(message);
  };

  const available = bytes.length - STATUS_BLOCK_HEADER_SIZE;
  const declared = Math.max(0, dataLength.value);
  if (dataLength.value < 0) pushIssue(`Data length ${dataLength.value} is negative; treating it as 0.`);
  if (declared > available) {
    pushIssue(`Data length ${declared} exceeds the ${available} bytes after the block header.`);
  }
  const regionEnd = STATUS_BLOCK_HEADER_SIZE + Math.min(declared, available);

  const block: GenericErrorStatusBlock = {
    blockStatus: blockStatusHex.value,
    blockStatusBits: decodeBlockStatus(blockStatus.value),
    rawDataOffset: rawDataOffset.value,
    rawDataLength: rawDataLength.value,
    dataLength: dataLength.value,
    errorSeverity: severity.value,
    errorSeverityName: describeSeverity(BLOCK_SEVERITY_NAMES, severity.value),
    entries: [],
    consumedBytes: 0,
    rawData: null,
    fileSize: bytes.length,
    issues
  };

  if (rawDataLength.value > 0) {
    const rawData = readHex(bytes, rawDataOffset.value, rawDataLength.value);
    if (rawData.ok) {
      block.rawData = rawData.value;
    } else {
      pushIssue(
        `Raw data (${rawDataLength.value} bytes at offset ${rawDataOffset.value}) lies outside the ${bytes.length}-byte buffer.`
      );
    }
  }

  const region = bytes.subarray(0, regionEnd);
  let cursor = STATUS_BLOCK_HEADER_SIZE;
  while (regionEnd - cursor >= ENTRY_HEADER_SIZE) {
    const decoded = decodeErrorDataEntry(region, cursor);
    if (!decoded.ok) {
      block.consumedBytes = cursor - STATUS_BLOCK_HEADER_SIZE;
      return failWithPartial(decoded.error, block);
    }
    block.entries.push(decoded.value.entry);
    cursor += decoded.value.consumedBytes;
  }
  block.consumedBytes = cursor - STATUS_BLOCK_HEADER_SIZE;

  const trailing = regionEnd - cursor;
  if (trailing > 0) {
    pushIssue(`${trailing} bytes after the last error data entry are too short for another entry.`);
  }
  const { errorDataEntryCount } = block.blockStatusBits;
  if (errorDataEntryCount !== 0 && errorDataEntryCount !== block.entries.length) {
    pushIssue(`Block status reports ${errorDataEntryCount} entries but ${block.entries.length} were decoded.`);
  }
  return succeed(block);
};
