"use strict";

import assert from "node:assert/strict";

// Narrows optional lookups (array slots, partial results) in tests.
export const expectDefined = <T>(value: T | null | undefined, label = "value"): T => {
  assert.ok(value !== null && value !== undefined, `Expected ${label} to be defined`);
  return value;
};
