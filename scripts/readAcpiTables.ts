#!/usr/bin/env node
"use strict";

import { decodeAcpiDirectory } from "./acpi-directory.js";
import { USAGE, outcomesToJson, parseCliArgs, renderOutcome } from "./acpi-cli.js";

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`ERROR: ${parsed.message}`);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }
  if (parsed.options.command === "help") {
    console.log(USAGE);
    return;
  }

  const outcomes = await decodeAcpiDirectory(parsed.options.directory);
  if (parsed.options.json) {
    console.log(outcomesToJson(outcomes));
    return;
  }
  for (const outcome of outcomes) {
    const { text, failure } = renderOutcome(outcome);
    if (text) console.log(`${text}\n`);
    if (failure) console.warn(`WARNING: ${failure}`);
  }
}

void main().catch(error => {
  console.error(error instanceof Error ? `ERROR: ${error.message}` : error);
  process.exitCode = 1;
});
