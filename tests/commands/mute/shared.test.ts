/**
 * tidewatch — tests/commands/mute/shared.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  auditReason,
  hasHave,
  memberNames,
  missingUsersLine,
  resolveMuteTime,
  targetError,
} from "../../../src/commands/mute/shared.js";
import { updateGuildSettings } from "../../../src/store/guildSettingsStore.js";
import { BOT_ID, GUILD_ID, createMockGuild, createMockMember, createMockUser } from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const NOW_SEC = 1_729_468_800;
const AUTHOR_ID = "200000000000000002";

describe("resolveMuteTime", () => {
  beforeEach(() => {
    resetDb();
    vi.useFakeTimers();
    vi.setSystemTime(NOW_SEC * 1000);
  });

  it("reads the time out of the reason", () => {
    expect(resolveMuteTime(GUILD_ID, "spam 2 hours")).toEqual({
      durationSeconds: 7200,
      until: NOW_SEC + 7200,
      reason: "spam",
      suffix: " for 2 hours",
    });
  });

  it("is indefinite without a time or a default", () => {
    expect(resolveMuteTime(GUILD_ID, "spam")).toEqual({
      durationSeconds: null,
      until: null,
      reason: "spam",
      suffix: "",
    });
  });

  it("falls back to the guild default time", () => {
    updateGuildSettings(GUILD_ID, { muteDefaultTime: 3600 });
    expect(resolveMuteTime(GUILD_ID, null)).toEqual({
      durationSeconds: 3600,
      until: NOW_SEC + 3600,
      reason: null,
      suffix: " for 1 hour",
    });
  });
});

describe("targetError", () => {
  it("needs at least one user", () => {
    expect(targetError([], BOT_ID, AUTHOR_ID, "mute")).toBe("Please provide at least one user to mute.");
  });

  it("refuses the bot and the author", () => {
    expect(targetError(["201", BOT_ID], BOT_ID, AUTHOR_ID, "mute")).toBe("You cannot mute me.");
    expect(targetError([AUTHOR_ID], BOT_ID, AUTHOR_ID, "unmute")).toBe("You cannot unmute yourself.");
  });

  it("accepts anyone else", () => {
    expect(targetError(["201", "202"], BOT_ID, AUTHOR_ID, "mute")).toBeNull();
  });
});

describe("auditReason", () => {
  const author = createMockUser({ id: AUTHOR_ID, tag: "moderator#0001" });

  it("names the moderator and the reason", () => {
    expect(auditReason(author, "spam")).toBe(
      "Action requested by moderator#0001 (ID 200000000000000002). Reason: spam"
    );
    expect(auditReason(author, null)).toBe("Action requested by moderator#0001 (ID 200000000000000002).");
  });

  it("fits the audit log limit", () => {
    const reason = auditReason(author, "x".repeat(600));
    expect(reason).toHaveLength(512);
    expect(reason.endsWith("...")).toBe(true);
  });
});

describe("reply helpers", () => {
  it("joins member tags", () => {
    const guild = createMockGuild();
    const members = [
      createMockMember(guild, { id: "201", tag: "first#0001" }),
      createMockMember(guild, { id: "202", tag: "second#0002" }),
    ];
    expect(memberNames(members)).toBe("first#0001 and second#0002");
  });

  it("agrees with the count", () => {
    expect(hasHave(1)).toBe("has");
    expect(hasHave(3)).toBe("have");
  });

  it("lists users who are not in the server", () => {
    expect(missingUsersLine([])).toBe("");
    expect(missingUsersLine(["201", "202"])).toBe("\nNot in this server: <@201> and <@202>");
  });
});
