"use strict";

import type { AcpiTableSignature } from "./types.js";

export const BERT_SIGNATURE: AcpiTableSignature = "BERT";
export const HEST_SIGNATURE: AcpiTableSignature = "HEST";

// ACPI table header offsets shared by every system description table.
export const HEADER_SIGNATURE_OFFSET = 0;
export const HEADER_SIGNATURE_SIZE = 4;
export const HEADER_LENGTH_OFFSET = 4;
export const HEADER_REVISION_OFFSET = 8;
export const HEADER_CHECKSUM_OFFSET = 9;
export const HEADER_OEM_ID_OFFSET = 10;
export const HEADER_OEM_ID_SIZE = 6;
export const HEADER_OEM_REVISION_OFFSET = 24;
export const HEADER_CREATOR_ID_OFFSET = 28;
export const HEADER_CREATOR_ID_SIZE = 4;
export const HEADER_CREATOR_REVISION_OFFSET = 32;

export const BERT_REGION_LENGTH_OFFSET = 36;
export const BERT_REGION_OFFSET = 40;
export const BERT_REGION_SIZE = 8;
export const BERT_TABLE_SIZE = 48;

export const HEST_ERROR_SOURCE_COUNT_OFFSET = 36;
export const HEST_FIXED_SIZE = 40;

export const STATUS_BLOCK_HEADER_SIZE = 20;
export const STATUS_BLOCK_STATUS_OFFSET = 0;
export const STATUS_BLOCK_RAW_DATA_OFFSET_OFFSET = 4;
export const STATUS_BLOCK_RAW_DATA_LENGTH_OFFSET = 8;
export const STATUS_BLOCK_DATA_LENGTH_OFFSET = 12;
export const STATUS_BLOCK_SEVERITY_OFFSET = 16;

export const ENTRY_HEADER_SIZE = 72;
export const ENTRY_SECTION_TYPE_OFFSET = 0;
export const ENTRY_SEVERITY_OFFSET = 16;
export const ENTRY_REVISION_OFFSET = 20;
export const ENTRY_REVISION_SIZE = 2;
export const ENTRY_VALIDATION_BITS_OFFSET = 22;
export const ENTRY_FLAGS_OFFSET = 23;
export const ENTRY_ERROR_DATA_LENGTH_OFFSET = 24;
export const ENTRY_FRU_ID_OFFSET = 28;
export const ENTRY_FRU_ID_SIZE = 16;
export const ENTRY_FRU_TEXT_OFFSET = 44;
export const ENTRY_FRU_TEXT_SIZE = 20;
export const ENTRY_TIMESTAMP_OFFSET = 64;
export const ENTRY_TIMESTAMP_SIZE = 8;

export const MAX_ISSUES = 200;

export const UNKNOWN_SECTION_NAME = "Unknown";

// Generic Error Status Block severities (ACPI "Error Severity" field).
export const BLOCK_SEVERITY_NAMES: readonly string[] = ["Recoverable", "Fatal", "Correctable", "None"];

// Generic Error Data Entry severities (UEFI section descriptor).
export const ENTRY_SEVERITY_NAMES: readonly string[] = ["Recoverable", "Fatal", "Corrected", "Informational"];

export const describeSeverity = (names: readonly string[], severity: number): string =>
  names[severity] ?? `unknown(${severity})`;

export const BLOCK_STATUS_UNCORRECTABLE_VALID = 0x1;
export const BLOCK_STATUS_CORRECTABLE_VALID = 0x2;
export const BLOCK_STATUS_MULTIPLE_UNCORRECTABLE = 0x4;
export const BLOCK_STATUS_MULTIPLE_CORRECTABLE = 0x8;
export const BLOCK_STATUS_ENTRY_COUNT_SHIFT = 4;
export const BLOCK_STATUS_ENTRY_COUNT_MASK = 0x3ff;

export const VALIDATION_FRU_ID = 0x1;
export const VALIDATION_FRU_TEXT = 0x2;
export const VALIDATION_TIMESTAMP = 0x4;
