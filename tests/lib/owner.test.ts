/**
 * tidewatch — tests/lib/owner.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { isOwner } from "../../src/lib/owner.js";

describe("isOwner", () => {
  it("matches ids from OWNER_IDS", () => {
    expect(isOwner("900000000000000001")).toBe(true);
    expect(isOwner("900000000000000002")).toBe(false);
  });
});
