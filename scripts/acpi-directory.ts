"use strict";

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";

import { parseBert, parseGenericErrorStatusBlock, parseHest } from "../analyzers/acpi/index.js";
import type {
  AcpiTableRecord,
  DecodeResult,
  GenericErrorStatusBlock
} from "../analyzers/acpi/index.js";

export type AcpiFileOutcome =
  | { path: string; kind: "table"; result: DecodeResult<AcpiTableRecord> }
  | { path: string; kind: "statusBlock"; result: DecodeResult<GenericErrorStatusBlock, GenericErrorStatusBlock> }
  | { path: string; kind: "unreadable"; message: string };

type FileRead = { ok: true; bytes: Uint8Array } | { ok: false; message: string };

const readWholeFile = async (path: string): Promise<FileRead> => {
  try {
    return { ok: true, bytes: await readFile(path) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
};

export const findBertFiles = async (directory: string): Promise<string[]> => {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.startsWith("BERT"))
    .map(entry => entry.name)
    .sort()
    .map(name => join(directory, name));
};

/**
 * Decodes every BERT table, the HEST table and the boot error region dump
 * found in an ACPI tables directory. A file that cannot be read or decoded is
 * reported in its outcome and does not stop the others.
 */
export const decodeAcpiDirectory = async (directory: string): Promise<AcpiFileOutcome[]> => {
  const info = await stat(directory).catch(() => null);
  if (!info?.isDirectory()) throw new Error(`Not a valid directory: ${directory}`);

  const bertFiles = await findBertFiles(directory);
  if (!bertFiles.length) throw new Error(`No BERT file in ${directory}`);

  const outcomes: AcpiFileOutcome[] = [];
  const tablePaths: Array<[string, (bytes: Uint8Array) => DecodeResult<AcpiTableRecord>]> = [
    ...bertFiles.map((path): [string, typeof parseBert] => [path, parseBert]),
    [join(directory, "HEST"), parseHest]
  ];
  for (const [path, decode] of tablePaths) {
    const read = await readWholeFile(path);
    outcomes.push(
      read.ok ? { path, kind: "table", result: decode(read.bytes) } : { path, kind: "unreadable", message: read.message }
    );
  }

  const dataPath = join(directory, "data", "BERT");
  const data = await readWholeFile(dataPath);
  outcomes.push(
    data.ok
      ? { path: dataPath, kind: "statusBlock", result: parseGenericErrorStatusBlock(data.bytes) }
      : { path: dataPath, kind: "unreadable", message: data.message }
  );
  return outcomes;
};
