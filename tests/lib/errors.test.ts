/**
 * tidewatch — tests/lib/errors.test.ts
 * WHAT: Error classification and the predicates built on it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  HttpError,
  MissingConfigError,
  classifyError,
  discordErrorCode,
  isRecoverable,
  shouldReportToSentry,
  userFriendlyMessage,
} from "../../src/lib/errors.js";
import { discordError } from "../utils/discordMocks.js";

describe("classifyError", () => {
  it("handles null and primitives", () => {
    expect(classifyError(null)).toEqual({ kind: "unknown", message: "Unknown error (null/undefined)" });
    expect(classifyError("boom")).toEqual({ kind: "unknown", message: "boom" });
  });

  it("maps missing config", () => {
    const classified = classifyError(new MissingConfigError("TENOR_API_KEY"));
    expect(classified.kind).toBe("config");
    expect(userFriendlyMessage(classified)).toBe("Configuration error: TENOR_API_KEY is not set.");
  });

  it("treats 5xx HTTP errors as network and 4xx as unknown", () => {
    const server = classifyError(new HttpError(503, "https://graphql.anilist.co/"));
    expect(server).toMatchObject({ kind: "network", code: "HTTP_503", host: "graphql.anilist.co" });
    expect(isRecoverable(server)).toBe(true);

    const client = classifyError(new HttpError(404, "https://graphql.anilist.co/"));
    expect(client.kind).toBe("unknown");
    expect(isRecoverable(client)).toBe(false);
  });

  it("maps Discord permission codes to permission errors", () => {
    const classified = classifyError(discordError(50013));
    expect(classified).toMatchObject({ kind: "permission", needed: ["Unknown"] });
    expect(shouldReportToSentry(classified)).toBe(false);
  });

  it("keeps other Discord codes with their status", () => {
    const classified = classifyError(discordError(10007, 404, "Unknown Member"));
    expect(classified).toMatchObject({ kind: "discord_api", code: 10007, httpStatus: 404 });
    expect(shouldReportToSentry(classified)).toBe(false);
    expect(isRecoverable(classified)).toBe(false);
  });

  it("names the first failing field of a zod error", () => {
    const result = z.object({ id: z.number() }).safeParse({ id: "x" });
    expect(result.success).toBe(false);
    if (result.success) return;
    const classified = classifyError(result.error);
    expect(classified).toMatchObject({ kind: "validation", field: "id" });
  });

  it("recognizes SQLite busy errors as recoverable", () => {
    const err = Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY", name: "SqliteError" });
    const classified = classifyError(err);
    expect(classified).toMatchObject({ kind: "db_error", code: "SQLITE_BUSY" });
    expect(isRecoverable(classified)).toBe(true);
    expect(userFriendlyMessage(classified)).toBe("Database is temporarily busy. Please try again.");
  });

  it("unwraps undici fetch failures", () => {
    const err = new TypeError("fetch failed", { cause: Object.assign(new Error("reset"), { code: "ECONNRESET" }) });
    expect(classifyError(err)).toMatchObject({ kind: "network", code: "ECONNRESET" });
  });

  it("reports unknown errors to Sentry", () => {
    expect(shouldReportToSentry(classifyError(new Error("x")))).toBe(true);
  });
});

describe("discordErrorCode", () => {
  it("returns the numeric code or null", () => {
    expect(discordErrorCode(discordError(50001))).toBe(50001);
    expect(discordErrorCode(new Error("nope"))).toBeNull();
  });
});
