"use strict";

import { describeDecodeError } from "../analyzers/acpi/index.js";
import { bytesToSpacedHex } from "../binary-utils.js";
import { renderAcpiTable, renderStatusBlock } from "../renderers/acpi/index.js";
import type { AcpiFileOutcome } from "./acpi-directory.js";

export const USAGE = [
  "usage: read-acpi-tables [-h] [--json] directory",
  "",
  "Decodes ACPI BERT and HEST tables and the BERT boot error region",
  "",
  "positional arguments:",
  "  directory   acpi tables location",
  "",
  "optional arguments:",
  "  -h, --help  show this help message and exit",
  "  --json      print decoded records as JSON"
].join("\n");

export type CliOptions =
  | { command: "help" }
  | { command: "decode"; directory: string; json: boolean };

export type CliArgsResult = { ok: true; options: CliOptions } | { ok: false; message: string };

export const parseCliArgs = (args: string[]): CliArgsResult => {
  let directory: string | null = null;
  let json = false;
  for (const arg of args) {
    switch (arg) {
      case "-h":
      case "--help":
        return { ok: true, options: { command: "help" } };
      case "--json":
        json = true;
        break;
      default:
        if (arg.startsWith("-")) return { ok: false, message: `Unknown option: ${arg}` };
        if (directory !== null) return { ok: false, message: `Unexpected argument: ${arg}` };
        directory = arg;
    }
  }
  if (directory === null) return { ok: false, message: "The directory argument is required" };
  return { ok: true, options: { command: "decode", directory, json } };
};

export type RenderedOutcome = {
  text: string | null;
  failure: string | null;
};

export const renderOutcome = (outcome: AcpiFileOutcome): RenderedOutcome => {
  if (outcome.kind === "unreadable") {
    return { text: null, failure: `${outcome.path}: ${outcome.message}` };
  }
  if (outcome.kind === "table") {
    const { result } = outcome;
    return result.ok
      ? { text: renderAcpiTable(result.value, outcome.path), failure: null }
      : { text: null, failure: `${outcome.path}: ${describeDecodeError(result.error)}` };
  }
  const { result } = outcome;
  if (result.ok) return { text: renderStatusBlock(result.value, outcome.path), failure: null };
  return {
    text: result.partial ? renderStatusBlock(result.partial, outcome.path) : null,
    failure: `${outcome.path}: ${describeDecodeError(result.error)}`
  };
};

const jsonReplacer = (_key: string, value: unknown): unknown =>
  value instanceof Uint8Array ? bytesToSpacedHex(value) : value;

export const outcomesToJson = (outcomes: AcpiFileOutcome[]): string => JSON.stringify(outcomes, jsonReplacer, 2);
