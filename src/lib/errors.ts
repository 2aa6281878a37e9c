/**
 * tidewatch — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Enables specific recovery strategies and better observability
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10003) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { DiscordAPIError } from "discord.js";
import { ZodError } from "zod";

// ===== Error Type Definitions =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite). SQLITE_BUSY/LOCKED are transient; constraint
 * errors are logic bugs; CORRUPT/NOTADB are fatal.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
  table?: string;
}

/**
 * Discord API errors. Discord uses numeric codes, not HTTP status, to
 * identify specific failures (10003 Unknown Channel, 10007 Unknown Member,
 * 10062 Unknown Interaction, 50013 Missing Permissions...).
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Validation errors (user input, upstream payload shape) */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
}

/** Permission errors (Discord permissions) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/**
 * Network errors (transient): system errors, aborted/timed out fetches and
 * upstream HTTP 5xx.
 */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Configuration errors */
export interface ConfigError extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | ValidationError
  | PermissionError
  | NetworkError
  | ConfigError
  | UnknownError;

// ===== Typed errors raised by our own code =====

/**
 * Non-2xx response from a third-party HTTP API.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, message?: string) {
    super(message ?? `HTTP ${status} from ${url}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

/**
 * A feature needs an env var that isn't set.
 */
export class MissingConfigError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`${key} is not configured`);
    this.name = "MissingConfigError";
    this.key = key;
  }
}

// ===== Error Classification =====

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own typed errors, SQLite,
 * Discord, zod, then Node network errors, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }
  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const cause = err instanceof Error ? err : undefined;
  const rawMessage = readProp(err, "message");
  const message = typeof rawMessage === "string" ? rawMessage : String(err);
  const code = readProp(err, "code");
  const name = readProp(err, "name");

  if (err instanceof MissingConfigError) {
    return { kind: "config", key: err.key, message, cause };
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) {
      return { kind: "network", code: `HTTP_${err.status}`, host: safeHost(err.url), message, cause };
    }
    return { kind: "unknown", message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    const sql = readProp(err, "sql");
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      sql: typeof sql === "string" ? sql : undefined,
      table: extractTableFromSql(typeof sql === "string" ? sql : undefined),
      cause,
    };
  }

  if (err instanceof DiscordAPIError) {
    if (err.code === 50013 || err.code === 50001) {
      return {
        kind: "permission",
        needed: err.code === 50001 ? ["ViewChannel"] : ["Unknown"],
        message,
        cause,
      };
    }
    return {
      kind: "discord_api",
      code: typeof err.code === "number" ? err.code : Number(err.code),
      httpStatus: err.status,
      method: err.method,
      path: err.url,
      message,
      cause,
    };
  }

  if (err instanceof ZodError) {
    const first = err.issues[0];
    return {
      kind: "validation",
      field: first ? first.path.join(".") || "payload" : "payload",
      message: first?.message ?? message,
      cause,
    };
  }

  if (name === "AbortError" || name === "TimeoutError") {
    return { kind: "network", code: "ETIMEDOUT", message, cause };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    const host = readProp(err, "hostname") ?? readProp(err, "host");
    return {
      kind: "network",
      code,
      host: typeof host === "string" ? host : undefined,
      message,
      cause,
    };
  }

  // undici wraps socket failures as TypeError("fetch failed") with the real error in cause
  if (err instanceof TypeError && message === "fetch failed") {
    const inner = readProp(err, "cause");
    const innerCode = inner && typeof inner === "object" ? readProp(inner, "code") : undefined;
    return {
      kind: "network",
      code: typeof innerCode === "string" ? innerCode : "FETCH_FAILED",
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Numeric Discord error code, or null when err isn't a DiscordAPIError.
 */
export function discordErrorCode(err: unknown): number | null {
  if (err instanceof DiscordAPIError && typeof err.code === "number") {
    return err.code;
  }
  return null;
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth retrying).
 *
 * Discord rate limits (429) are handled inside discord.js, not here.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

/**
 * Check if error should be reported to Sentry. Sentry should mean
 * "something is broken", not "Discord had a hiccup".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (3s window)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
        10007, // Unknown member
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "validation":
    case "permission":
    case "config":
      return false;

    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, sql: err.sql?.slice(0, 100), table: err.table };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "permission":
      return { ...base, neededPerms: err.needed };

    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for display
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") {
        return "Database is temporarily busy. Please try again.";
      }
      return "A database error occurred.";

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try the command again.";
      }
      return "Discord API error occurred.";

    case "network":
      return "The service I tried to reach isn't responding. Please try again later.";

    case "permission":
      return "I don't have permission to do that.";

    case "validation":
      return `Invalid ${err.field}: ${err.message}`;

    case "config":
      return `Configuration error: ${err.key} is not set.`;

    default:
      return "An unexpected error occurred.";
  }
}

// ===== Internal Helpers =====

function extractTableFromSql(sql: string | undefined): string | undefined {
  if (!sql) return undefined;
  const match = sql.match(/(?:FROM|INTO|UPDATE|JOIN)\s+(\w+)/i);
  return match?.[1];
}

function safeHost(url: string): string | undefined {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
}
