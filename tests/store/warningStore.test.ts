/**
 * tidewatch — tests/store/warningStore.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import {
  addAction,
  addWarning,
  deleteAction,
  deleteReason,
  deleteWarning,
  getReason,
  getWarning,
  isDropAction,
  isExceedAction,
  listActions,
  listReasons,
  listWarnings,
  totalPoints,
  upsertReason,
  type Warning,
} from "../../src/store/warningStore.js";
import { resetDb } from "../utils/dbFixtures.js";

const GUILD = "100000000000000001";
const USER = "200000000000000001";

function warning(id: string, points: number, createdAt: number): Warning {
  return {
    id,
    guildId: GUILD,
    userId: USER,
    points,
    description: `warning ${id}`,
    moderatorId: "200000000000000002",
    createdAt,
  };
}

describe("warningStore", () => {
  beforeEach(resetDb);

  it("recognizes exceed and drop action names", () => {
    expect(isExceedAction("kick")).toBe(true);
    expect(isExceedAction("unmute")).toBe(false);
    expect(isDropAction("unmute")).toBe(true);
    expect(isDropAction("ban")).toBe(false);
  });

  describe("warnings", () => {
    it("lists in issue order and sums points", () => {
      addWarning(warning("3", 2, 200));
      addWarning(warning("1", 5, 100));
      addWarning(warning("2", 1, 200));

      expect(listWarnings(GUILD, USER).map((w) => w.id)).toEqual(["1", "2", "3"]);
      expect(totalPoints(GUILD, USER)).toBe(8);
      expect(totalPoints(GUILD, "200000000000000009")).toBe(0);
    });

    it("reads and deletes a single warning", () => {
      addWarning(warning("1", 5, 100));
      expect(getWarning(GUILD, USER, "1")).toEqual(warning("1", 5, 100));
      expect(deleteWarning(GUILD, USER, "1")).toBe(true);
      expect(deleteWarning(GUILD, USER, "1")).toBe(false);
      expect(getWarning(GUILD, USER, "1")).toBeNull();
    });
  });

  describe("reasons", () => {
    it("stores names lowercased and overwrites on re-register", () => {
      upsertReason(GUILD, { name: "Spam", points: 1, description: "Spamming" });
      upsertReason(GUILD, { name: "spam", points: 3, description: "Repeated spam" });

      expect(getReason(GUILD, "SPAM")).toEqual({ name: "spam", points: 3, description: "Repeated spam" });
    });

    it("lists by name and deletes case-insensitively", () => {
      upsertReason(GUILD, { name: "toxicity", points: 2, description: "Toxic" });
      upsertReason(GUILD, { name: "ads", points: 1, description: "Advertising" });

      expect(listReasons(GUILD).map((r) => r.name)).toEqual(["ads", "toxicity"]);
      expect(deleteReason(GUILD, "ADS")).toBe(true);
      expect(deleteReason(GUILD, "ads")).toBe(false);
    });
  });

  describe("actions", () => {
    it("refuses duplicate names", () => {
      expect(addAction(GUILD, { name: "kick", points: 5, exceedAction: "kick", dropAction: "none" })).toBe(true);
      expect(addAction(GUILD, { name: "kick", points: 9, exceedAction: "ban", dropAction: "none" })).toBe(false);
    });

    it("lists by points descending, then name", () => {
      addAction(GUILD, { name: "b-mute", points: 3, exceedAction: "mute", dropAction: "unmute" });
      addAction(GUILD, { name: "ban", points: 10, exceedAction: "ban", dropAction: "none" });
      addAction(GUILD, { name: "a-mute", points: 3, exceedAction: "mute", dropAction: "unmute" });

      expect(listActions(GUILD)).toEqual([
        { name: "ban", points: 10, exceedAction: "ban", dropAction: "none" },
        { name: "a-mute", points: 3, exceedAction: "mute", dropAction: "unmute" },
        { name: "b-mute", points: 3, exceedAction: "mute", dropAction: "unmute" },
      ]);
    });

    it("deletes by exact name", () => {
      addAction(GUILD, { name: "ban", points: 10, exceedAction: "ban", dropAction: "none" });
      expect(deleteAction(GUILD, "ban")).toBe(true);
      expect(deleteAction(GUILD, "ban")).toBe(false);
    });
  });
});
