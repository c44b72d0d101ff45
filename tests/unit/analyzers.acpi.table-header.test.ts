"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { parseAcpiTable, parseBert, parseHest } from "../../analyzers/acpi/index.js";
import { createBertTable, createHestTable } from "../fixtures/acpi-fixtures.js";
import { expectDefined } from "../helpers/expect-defined.js";

const BERT_HEX =
  "42 45 52 54 30 00 00 00 01 00 54 45 53 54 30 30 " +
  "00 00 00 00 00 00 00 00 01 00 00 00 54 45 53 54 " +
  "01 00 00 00 08 00 00 00 aa aa aa aa aa aa aa aa";

void test("parseBert decodes every header field of a 48-byte table", () => {
  const result = parseBert(createBertTable());
  assert.ok(result.ok);
  const bert = result.value;
  assert.strictEqual(bert.kind, "BERT");
  assert.deepStrictEqual(bert.header, {
    signature: "BERT",
    length: 48,
    revision: 1,
    checksum: 0,
    oemId: "TEST00",
    oemRevision: 1,
    creatorId: "TEST",
    creatorRevision: 1
  });
  assert.strictEqual(bert.bootErrorRegionLength, 8);
  assert.strictEqual(bert.bootErrorRegion, "aa aa aa aa aa aa aa aa");
  assert.strictEqual(bert.hex, BERT_HEX);
  assert.strictEqual(bert.fileSize, 48);
  assert.deepStrictEqual(bert.issues, []);
});

void test("parseBert values match the bytes at their documented offsets", () => {
  const bytes = createBertTable({ revision: 3, checksum: 0x5c, oemRevision: 0x01020304, creatorRevision: -1 });
  const result = parseBert(bytes);
  assert.ok(result.ok);
  const dv = new DataView(bytes.buffer);
  assert.strictEqual(result.value.header.revision, bytes[8]);
  assert.strictEqual(result.value.header.checksum, bytes[9]);
  assert.strictEqual(result.value.header.oemRevision, dv.getInt32(24, true));
  assert.strictEqual(result.value.header.creatorRevision, -1);
});

void test("parseBert rejects a table with another signature", () => {
  const result = parseBert(createHestTable(0));
  assert.deepStrictEqual(result, {
    ok: false,
    error: { kind: "HeaderMismatch", expected: "BERT", actual: "HEST" }
  });
});

void test("parseBert fails with OutOfBounds when the table is cut short", () => {
  const result = parseBert(createBertTable().subarray(0, 44));
  assert.deepStrictEqual(result, {
    ok: false,
    error: { kind: "OutOfBounds", offset: 40, length: 8, available: 44 }
  });
});

void test("parseBert reports a declared length that disagrees with the buffer", () => {
  const result = parseBert(createBertTable({ length: 64 }));
  assert.ok(result.ok);
  assert.deepStrictEqual(result.value.issues, ["Declared table length 64 differs from the 48-byte buffer."]);
});

void test("parseBert fails with InvalidEncoding for a non-UTF-8 OEM id", () => {
  const bytes = createBertTable();
  bytes[11] = 0xff;
  const result = parseBert(bytes);
  assert.deepStrictEqual(result, {
    ok: false,
    error: { kind: "InvalidEncoding", offset: 10, length: 6 }
  });
});

void test("parseHest keeps the error source structures as raw bytes", () => {
  const structures = new Uint8Array([0x09, 0x00, 0x01, 0x02]);
  const result = parseHest(createHestTable(1, structures));
  assert.ok(result.ok);
  const hest = result.value;
  assert.strictEqual(hest.kind, "HEST");
  assert.strictEqual(hest.header.signature, "HEST");
  assert.strictEqual(hest.header.length, 44);
  assert.strictEqual(hest.header.oemId, "OEMHST");
  assert.strictEqual(hest.header.creatorId, "ACPI");
  assert.strictEqual(hest.errorSourceCount, 1);
  assert.deepStrictEqual(Array.from(hest.errorSourceStructures), [0x09, 0x00, 0x01, 0x02]);
  assert.deepStrictEqual(hest.issues, []);
});

void test("parseHest notes error sources that are declared but absent", () => {
  const result = parseHest(createHestTable(2));
  assert.ok(result.ok);
  assert.strictEqual(result.value.errorSourceStructures.length, 0);
  assert.deepStrictEqual(result.value.issues, [
    "Table declares 2 error sources but carries no error source structures."
  ]);
});

void test("parseHest rejects BERT tables", () => {
  const result = parseHest(createBertTable());
  assert.strictEqual(result.ok, false);
  assert.deepStrictEqual(expectDefined(result.ok ? null : result.error), {
    kind: "HeaderMismatch",
    expected: "HEST",
    actual: "BERT"
  });
});

void test("parseAcpiTable routes by signature", () => {
  const bert = parseAcpiTable(createBertTable());
  assert.ok(bert.ok);
  assert.strictEqual(bert.value.kind, "BERT");

  const hest = parseAcpiTable(createHestTable(0));
  assert.ok(hest.ok);
  assert.strictEqual(hest.value.kind, "HEST");

  const other = createBertTable();
  other.set([0x46, 0x41, 0x43, 0x50], 0);
  assert.deepStrictEqual(parseAcpiTable(other), {
    ok: false,
    error: { kind: "HeaderMismatch", expected: "BERT|HEST", actual: "FACP" }
  });
});

void test("parseAcpiTable fails with OutOfBounds for buffers shorter than a signature", () => {
  assert.deepStrictEqual(parseAcpiTable(new Uint8Array([0x42, 0x45])), {
    ok: false,
    error: { kind: "OutOfBounds", offset: 0, length: 4, available: 2 }
  });
});
