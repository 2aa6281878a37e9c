/**
 * tidewatch — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: Events must never crash the bot; every failure gets logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.GuildMemberAdd, wrapEvent("guildMemberAdd", async (member) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { runWithCtx } from "./reqctx.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Channel-update handlers may wait on a bulk unmute to finish, so the default
 * is generous. Override per handler where needed.
 */
const DEFAULT_EVENT_TIMEOUT_MS = 30_000;

/**
 * Wrap an event handler with error protection and a timeout.
 * The returned handler never rejects.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    const contextIds = extractEventContext(args);
    try {
      await runWithCtx({ cmd: eventName, kind: "event", guildId: contextIds.guildId ?? null }, () =>
        Promise.race([
          Promise.resolve(handler(...args)),
          new Promise<void>((_, reject) => {
            timer = setTimeout(
              () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
              timeoutMs
            );
          }),
        ])
      );
    } catch (err) {
      const classified = classifyError(err);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
      }
      // Never re-throw: an unhandled rejection here would take the process down.
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

type EventContext = { guildId?: string; userId?: string; channelId?: string; entityId?: string };

function stringProp(obj: object, key: string): string | undefined {
  const value: unknown = key in obj ? Reflect.get(obj, key) : undefined;
  return typeof value === "string" ? value : undefined;
}

/**
 * Pull common identifiers (guild/user/channel) from polymorphic event payloads.
 */
function extractEventContext(args: unknown[]): EventContext {
  const context: EventContext = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = stringProp(arg, "guildId");
    if (guildId) context.guildId = guildId;

    const guild: unknown = "guild" in arg ? Reflect.get(arg, "guild") : undefined;
    if (guild && typeof guild === "object") {
      const id = stringProp(guild, "id");
      if (id) context.guildId = id;
    }

    const id = stringProp(arg, "id");
    if (id && !context.entityId) context.entityId = id;

    const user: unknown = "user" in arg ? Reflect.get(arg, "user") : undefined;
    if (user && typeof user === "object") {
      const userId = stringProp(user, "id");
      if (userId) context.userId = userId;
    }

    const channelId = stringProp(arg, "channelId");
    if (channelId) context.channelId = channelId;
  }

  return context;
}
