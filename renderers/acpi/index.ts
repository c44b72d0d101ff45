"use strict";

import { formatGuid } from "../../analyzers/acpi/byte-cursor.js";
import { bytesToSpacedHex, chunkSpacedHex, stripTrailingNuls, toHex32 } from "../../binary-utils.js";
import type {
  AcpiTableRecord,
  GenericErrorDataEntry,
  GenericErrorStatusBlock,
  SectionPayload
} from "../../analyzers/acpi/types.js";

const HEX_BYTES_PER_ROW = 16;

const line = (label: string, value: string | number): string => `${label}: ${value}`;

export const labelFromFieldName = (name: string): string => {
  const spaced = name.replace(/_/g, " ");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
};

const banner = (title: string, rule: string): string[] => [rule, title, rule];

export const renderHexDump = (spacedHex: string): string => {
  const out = ["HEX data:"];
  chunkSpacedHex(spacedHex, HEX_BYTES_PER_ROW).forEach((row, index) => {
    out.push(`${index * HEX_BYTES_PER_ROW}.:\t${row}`);
  });
  return out.join("\n");
};

const renderIssues = (issues: string[]): string[] => {
  if (issues.length === 0) return [];
  return ["Issues:", ...issues.map(issue => `- ${issue}`)];
};

export const renderAcpiTable = (record: AcpiTableRecord, filename: string): string => {
  const { header } = record;
  const out = banner(`${header.signature} Table:`, "===========");
  out.push(line("Filename", filename));
  out.push(line("Header signature", header.signature));
  out.push(line("Length", header.length));
  out.push(line("Revision", header.revision));
  out.push(line("Checksum", header.checksum));
  out.push(line("Oem id", header.oemId));
  out.push(line("Oem revision", header.oemRevision));
  out.push(line("Creator id", header.creatorId));
  out.push(line("Creator revision", header.creatorRevision));
  if (record.kind === "BERT") {
    out.push(line("Boot error region length", record.bootErrorRegionLength));
    out.push(line("Boot error region", record.bootErrorRegion));
    out.push(renderHexDump(record.hex));
  } else {
    out.push(line("Error source count", record.errorSourceCount));
    out.push(line("Error source structures", `${record.errorSourceStructures.length} bytes (not decoded)`));
    if (record.errorSourceStructures.length) out.push(renderHexDump(bytesToSpacedHex(record.errorSourceStructures)));
  }
  out.push(...renderIssues(record.issues));
  return out.join("\n");
};

const renderPayload = (payload: SectionPayload): string[] => {
  if (payload.kind === "opaque") return [renderHexDump(payload.hex)];
  return payload.fields.map(field => line(labelFromFieldName(field.name), field.value));
};

export const renderErrorDataEntry = (entry: GenericErrorDataEntry, index: number): string => {
  const out = [`${index + 1}. error data entry`, "-------------------"];
  out.push(line("Section type", `${formatGuid(entry.sectionType)} (${entry.sectionName})`));
  out.push(line("Error severity", `${entry.errorSeverity} (${entry.errorSeverityName})`));
  out.push(line("Revision", entry.revision));
  out.push(line("Validation bits", entry.validationBits));
  out.push(line("Flags", entry.flags));
  out.push(line("Error data length", entry.errorDataLength));
  out.push(line("Fru id", entry.fruId));
  out.push(line("Fru text", stripTrailingNuls(entry.fruText)));
  out.push(line("Timestamp", entry.timestamp));
  out.push(...renderPayload(entry.payload));
  return out.join("\n");
};

export const renderStatusBlock = (block: GenericErrorStatusBlock, filename: string): string => {
  const out = banner("Generic Error Status Block:", "-----------");
  out.push(line("Filename", filename));
  out.push(line("Block status", `${block.blockStatus} (${toHex32(block.blockStatusBits.value, 8)})`));
  out.push(line("Raw data offset", block.rawDataOffset));
  out.push(line("Raw data length", block.rawDataLength));
  out.push(line("Data length", block.dataLength));
  out.push(line("Error severity", `${block.errorSeverity} (${block.errorSeverityName})`));
  out.push(line("Error data entries", block.entries.length));
  if (block.rawData) out.push(line("Raw data", block.rawData));
  block.entries.forEach((entry, index) => {
    out.push("");
    out.push(renderErrorDataEntry(entry, index));
  });
  out.push(...renderIssues(block.issues));
  return out.join("\n");
};
