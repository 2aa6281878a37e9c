/**
 * tidewatch — tests/commands/warn/warn.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { resolveWarnReason, warnRefusal } from "../../../src/commands/warn/warn.js";
import { upsertReason } from "../../../src/store/warningStore.js";
import { GUILD_ID, createMockGuild, createMockMember } from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const OWNER_ID = "200000000000000009";

describe("warnRefusal", () => {
  const guild = createMockGuild();
  const author = createMockMember(guild, { id: "200000000000000002", highestPosition: 5 });

  it("refuses yourself, bots and the owner", () => {
    expect(warnRefusal(author, author, OWNER_ID)).toBe("You cannot warn yourself.");
    expect(warnRefusal(author, createMockMember(guild, { id: "201", bot: true }), OWNER_ID)).toBe(
      "You cannot warn other bots."
    );
    expect(warnRefusal(author, createMockMember(guild, { id: OWNER_ID }), OWNER_ID)).toBe(
      "You cannot warn the server owner."
    );
  });

  it("refuses members at or above the author", () => {
    const peer = createMockMember(guild, { id: "202", highestPosition: 5 });
    expect(warnRefusal(author, peer, OWNER_ID)).toBe(
      "The person you're trying to warn is equal or higher than you in the discord hierarchy, you cannot warn them."
    );
  });

  it("lets the owner warn anyone", () => {
    const owner = createMockMember(guild, { id: OWNER_ID, highestPosition: 1 });
    const peer = createMockMember(guild, { id: "202", highestPosition: 5 });
    expect(warnRefusal(owner, peer, OWNER_ID)).toBeNull();
  });

  it("allows members below the author", () => {
    expect(warnRefusal(author, createMockMember(guild, { id: "203", highestPosition: 3 }), OWNER_ID)).toBeNull();
  });
});

describe("resolveWarnReason", () => {
  beforeEach(() => {
    resetDb();
    upsertReason(GUILD_ID, { name: "spam", points: 3, description: "Spamming" });
  });

  it("uses a registered reason and its points", () => {
    expect(resolveWarnReason(GUILD_ID, "Spam", 1, false)).toEqual({
      name: "spam",
      points: 3,
      description: "Spamming",
    });
  });

  it("builds a custom reason when allowed", () => {
    expect(resolveWarnReason(GUILD_ID, "being rude", 2, true)).toEqual({
      name: "custom",
      points: 2,
      description: "being rude",
    });
  });

  it("rejects unregistered reasons otherwise", () => {
    expect(resolveWarnReason(GUILD_ID, "being rude", 2, false)).toBeNull();
  });
});
