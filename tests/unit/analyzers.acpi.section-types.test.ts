"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import {
  FIRMWARE_ERROR_RECORD_REFERENCE_GUID,
  PROCESSOR_GENERIC_GUID,
  SECTION_TYPES,
  decodeSectionPayload,
  lookupSectionType
} from "../../analyzers/acpi/section-types.js";
import type { SectionTypeSchema } from "../../analyzers/acpi/types.js";
import { guidToWire } from "../fixtures/acpi-fixtures.js";
import { expectDefined } from "../helpers/expect-defined.js";

void test("the registry names every known section type", () => {
  assert.strictEqual(SECTION_TYPES.size, 11);
  assert.strictEqual(lookupSectionType(PROCESSOR_GENERIC_GUID)?.name, "Processor Generic");
  assert.strictEqual(lookupSectionType("036f84e17f37428ca79e575fdfaa84ec")?.name, "IOMMU specific DMAr section");
  assert.strictEqual(lookupSectionType("00000000000000000000000000000000"), null);
});

void test("lookupSectionType accepts upper-case GUIDs", () => {
  assert.strictEqual(lookupSectionType("D995E954BBC1430FAD91B44DCB3C6F35")?.name, "PCIe");
});

void test("only the firmware error record reference carries field descriptors", () => {
  const withFields = [...SECTION_TYPES.values()].filter(schema => schema.fields.length > 0);
  assert.deepStrictEqual(
    withFields.map(schema => schema.name),
    ["Firmware Error Record Reference"]
  );
  const schema = expectDefined(lookupSectionType(FIRMWARE_ERROR_RECORD_REFERENCE_GUID));
  assert.deepStrictEqual(
    schema.fields.map(field => [field.name, field.byteOffset, field.byteLength, field.kind]),
    [
      ["firmware_error_record_type", 0, 1, "byte"],
      ["reserved", 1, 7, "hex"],
      ["record_identifier", 8, 8, "hex"]
    ]
  );
});

void test("decodeSectionPayload dispatches every field kind", () => {
  const schema: SectionTypeSchema = {
    name: "Test section",
    fields: [
      { name: "kind_byte", byteOffset: 0, byteLength: 1, kind: "byte" },
      { name: "count", byteOffset: 1, byteLength: 4, kind: "int" },
      { name: "label", byteOffset: 5, byteLength: 3, kind: "string" },
      { name: "bits", byteOffset: 8, byteLength: 2, kind: "hex" },
      { name: "owner", byteOffset: 10, byteLength: 16, kind: "guid" }
    ]
  };
  const payload = new Uint8Array(26);
  payload[0] = 0x81;
  new DataView(payload.buffer).setInt32(1, -5, true);
  payload.set([0x43, 0x50, 0x55], 5);
  payload.set([0x0f, 0xf0], 8);
  payload.set(guidToWire(FIRMWARE_ERROR_RECORD_REFERENCE_GUID), 10);

  assert.deepStrictEqual(decodeSectionPayload(schema, payload), {
    ok: true,
    value: {
      kind: "decoded",
      fields: [
        { name: "kind_byte", kind: "byte", value: 0x81 },
        { name: "count", kind: "int", value: -5 },
        { name: "label", kind: "string", value: "CPU" },
        { name: "bits", kind: "hex", value: "0f f0" },
        { name: "owner", kind: "guid", value: FIRMWARE_ERROR_RECORD_REFERENCE_GUID }
      ]
    }
  });
});

void test("decodeSectionPayload falls back to hex for missing or empty schemas", () => {
  const payload = new Uint8Array([0x01, 0x02, 0x03]);
  assert.deepStrictEqual(decodeSectionPayload(null, payload), {
    ok: true,
    value: { kind: "opaque", hex: "01 02 03" }
  });
  assert.deepStrictEqual(decodeSectionPayload(expectDefined(lookupSectionType(PROCESSOR_GENERIC_GUID)), payload), {
    ok: true,
    value: { kind: "opaque", hex: "01 02 03" }
  });
});

void test("decodeSectionPayload fails when a descriptor does not fit the payload", () => {
  const schema = expectDefined(lookupSectionType(FIRMWARE_ERROR_RECORD_REFERENCE_GUID));
  assert.deepStrictEqual(decodeSectionPayload(schema, new Uint8Array(10)), {
    ok: false,
    error: { kind: "OutOfBounds", offset: 8, length: 8, available: 10 }
  });
});
