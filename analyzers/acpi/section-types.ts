"use strict";

import { readByte, readAscii, readGuid, readHex, readInt32 } from "./byte-cursor.js";
import { bytesToSpacedHex } from "../../binary-utils.js";
import { succeed } from "./errors.js";
import type { DecodeResult } from "./errors.js";
import type {
  DecodedSectionField,
  SectionFieldDescriptor,
  SectionFieldKind,
  SectionPayload,
  SectionTypeSchema
} from "./types.js";

// Canonical GUIDs (Data1..Data4 as 32 hex digits) from the UEFI section descriptor table.
export const PROCESSOR_GENERIC_GUID = "9876ccad47b44bdbb65e16f193c4f3db";
export const PROCESSOR_IA32_X64_GUID = "dc3ea0b0a1444797b95b53fa242b6e1d";
export const PROCESSOR_IPF_GUID = "e429faf13cb711d4bca70080c73c8881";
export const PROCESSOR_ARM_GUID = "e19e3d16bc1111e49caac2051d5d46b0";
export const PLATFORM_MEMORY_GUID = "a5bc11146f644edeb8633e83ed7c83b1";
export const PCIE_GUID = "d995e954bbc1430fad91b44dcb3c6f35";
export const FIRMWARE_ERROR_RECORD_REFERENCE_GUID = "81212a9609ed499694718d729c8e69ed";
export const PCI_BUS_GUID = "c57539633b844095bf78eddad3f9c9dd";
export const DMAR_GENERIC_GUID = "eb5e4685ca664769b6a226068b001326";
export const VTD_DMAR_GUID = "71761d3732b245cda7d0b0fedd93e8cf";
export const IOMMU_DMAR_GUID = "036f84e17f37428ca79e575fdfaa84ec";

const nameOnly = (name: string): SectionTypeSchema => ({ name, fields: [] });

export const SECTION_TYPES: ReadonlyMap<string, SectionTypeSchema> = new Map<string, SectionTypeSchema>([
  [PROCESSOR_GENERIC_GUID, nameOnly("Processor Generic")],
  [PROCESSOR_IA32_X64_GUID, nameOnly("Processor Specific - IA32/X64")],
  [PROCESSOR_IPF_GUID, nameOnly("Processor Specific - IPF")],
  [PROCESSOR_ARM_GUID, nameOnly("Processor Specific - ARM")],
  [PLATFORM_MEMORY_GUID, nameOnly("Platform Memory")],
  [PCIE_GUID, nameOnly("PCIe")],
  [
    FIRMWARE_ERROR_RECORD_REFERENCE_GUID,
    {
      name: "Firmware Error Record Reference",
      fields: [
        { name: "firmware_error_record_type", byteOffset: 0, byteLength: 1, kind: "byte" },
        { name: "reserved", byteOffset: 1, byteLength: 7, kind: "hex" },
        { name: "record_identifier", byteOffset: 8, byteLength: 8, kind: "hex" }
      ]
    }
  ],
  [PCI_BUS_GUID, nameOnly("PCI/PCI-X Bus")],
  [DMAR_GENERIC_GUID, nameOnly("DMAr Generic")],
  [VTD_DMAR_GUID, nameOnly("Intel® VT for Directed I/O specific DMAr section")],
  [IOMMU_DMAR_GUID, nameOnly("IOMMU specific DMAr section")]
]);

export const lookupSectionType = (guid: string): SectionTypeSchema | null =>
  SECTION_TYPES.get(guid.toLowerCase()) ?? null;

type FieldDecoder = (
  bytes: Uint8Array,
  offset: number,
  field: SectionFieldDescriptor
) => DecodeResult<DecodedSectionField>;

const FIELD_DECODERS: Record<SectionFieldKind, FieldDecoder> = {
  byte: (bytes, offset, field) => {
    const read = readByte(bytes, offset);
    return read.ok ? succeed<DecodedSectionField>({ name: field.name, kind: "byte", value: read.value }) : read;
  },
  int: (bytes, offset, field) => {
    const read = readInt32(bytes, offset);
    return read.ok ? succeed<DecodedSectionField>({ name: field.name, kind: "int", value: read.value }) : read;
  },
  hex: (bytes, offset, field) => {
    const read = readHex(bytes, offset, field.byteLength);
    return read.ok ? succeed<DecodedSectionField>({ name: field.name, kind: "hex", value: read.value }) : read;
  },
  string: (bytes, offset, field) => {
    const read = readAscii(bytes, offset, field.byteLength);
    return read.ok ? succeed<DecodedSectionField>({ name: field.name, kind: "string", value: read.value }) : read;
  },
  guid: (bytes, offset, field) => {
    const read = readGuid(bytes, offset);
    return read.ok ? succeed<DecodedSectionField>({ name: field.name, kind: "guid", value: read.value }) : read;
  }
};

/**
 * Interprets the payload that runs from `payloadStart` to the end of `bytes`
 * through its schema. Schemas without field descriptors, and unknown section
 * types, yield the payload as a hex dump. Failure offsets count from the
 * start of `bytes`.
 */
export const decodeSectionPayload = (
  schema: SectionTypeSchema | null,
  bytes: Uint8Array,
  payloadStart = 0
): DecodeResult<SectionPayload> => {
  if (!schema || schema.fields.length === 0) {
    return succeed<SectionPayload>({ kind: "opaque", hex: bytesToSpacedHex(bytes.subarray(payloadStart)) });
  }
  const fields: DecodedSectionField[] = [];
  for (const descriptor of schema.fields) {
    const decoded = FIELD_DECODERS[descriptor.kind](bytes, payloadStart + descriptor.byteOffset, descriptor);
    if (!decoded.ok) return decoded;
    fields.push(decoded.value);
  }
  return succeed<SectionPayload>({ kind: "decoded", fields });
};
