"use strict";

export type AcpiTableSignature = "BERT" | "HEST";

export type AcpiTableHeader = {
  signature: string;
  length: number;
  revision: number;
  checksum: number;
  oemId: string;
  oemRevision: number;
  creatorId: string;
  creatorRevision: number;
};

export type BertRecord = {
  kind: "BERT";
  header: AcpiTableHeader;
  bootErrorRegionLength: number;
  // Physical address of the status block, kept as stored and never followed.
  bootErrorRegion: string;
  hex: string;
  fileSize: number;
  issues: string[];
};

export type HestRecord = {
  kind: "HEST";
  header: AcpiTableHeader;
  errorSourceCount: number;
  errorSourceStructures: Uint8Array;
  fileSize: number;
  issues: string[];
};

export type AcpiTableRecord = BertRecord | HestRecord;

export type SectionFieldKind = "byte" | "hex" | "string" | "int" | "guid";

export type SectionFieldDescriptor = {
  name: string;
  byteOffset: number;
  byteLength: number;
  kind: SectionFieldKind;
};

export type SectionTypeSchema = {
  name: string;
  fields: readonly SectionFieldDescriptor[];
};

export type DecodedSectionField =
  | { name: string; kind: "byte" | "int"; value: number }
  | { name: string; kind: "hex" | "string" | "guid"; value: string };

export type SectionPayload =
  | { kind: "decoded"; fields: DecodedSectionField[] }
  | { kind: "opaque"; hex: string };

export type EntryValidationBits = {
  fruIdValid: boolean;
  fruTextValid: boolean;
  timestampValid: boolean;
};

export type GenericErrorDataEntry = {
  // Start of the entry, relative to the status block.
  offset: number;
  sectionType: string;
  sectionName: string;
  errorSeverity: number;
  errorSeverityName: string;
  revision: string;
  validationBits: string;
  validation: EntryValidationBits;
  flags: string;
  errorDataLength: number;
  fruId: string;
  fruText: string;
  timestamp: string;
  payload: SectionPayload;
};

export type BlockStatusBits = {
  value: number;
  uncorrectableErrorValid: boolean;
  correctableErrorValid: boolean;
  multipleUncorrectableErrors: boolean;
  multipleCorrectableErrors: boolean;
  errorDataEntryCount: number;
};

export type GenericErrorStatusBlock = {
  blockStatus: string;
  blockStatusBits: BlockStatusBits;
  rawDataOffset: number;
  rawDataLength: number;
  dataLength: number;
  errorSeverity: number;
  errorSeverityName: string;
  entries: GenericErrorDataEntry[];
  consumedBytes: number;
  rawData: string | null;
  fileSize: number;
  issues: string[];
};
