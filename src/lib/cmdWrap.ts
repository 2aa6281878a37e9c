/**
 * tidewatch — src/lib/cmdWrap.ts
 * WHAT: Helpers that standardize the interaction lifecycle: tracing, step logging, error replies, safe defers/replies.
 * WHY: Discord has a strict 3-second window for first responses; wrapping commands keeps that consistent.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 interactions: https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction response rules: https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ButtonInteraction,
  type Message,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

/**
 * A "phase" is a label for where we are in command execution.
 * "it crashed in phase 'unmute_channels'" beats "it crashed somewhere in /unmute".
 */
type Phase = string;

export type InstrumentedInteraction = ChatInputCommandInteraction | ButtonInteraction;

/**
 * Context object passed to wrapped command handlers.
 */
export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase (e.g., "validate", "db_write", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): "slash" | "button" {
  return "commandName" in interaction ? "slash" : "button";
}

/**
 * REST metadata from a DiscordAPIError for logging; null for anything else
 * so callers can spread safely. Request bodies are redacted and truncated.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body?.json) {
    try {
      bodySnippet = redact(JSON.stringify(body.json));
    } catch {
      bodySnippet = "[unserializable]";
    }
  } else if (body?.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

/**
 * wrapCommand
 * WHAT: Decorates a command handler with tracing, step logging and error replies.
 * WHY: Keeps brittle interaction handling out of individual commands.
 * RETURNS: A handler compatible with the command registry.
 * THROWS: Never to caller; errors are caught, logged, and surfaced to the user ephemerally.
 */
export function wrapCommand<I extends InstrumentedInteraction>(
  name: string,
  fn: CommandExecutor<I>
) {
  return async (interaction: I) => {
    const traceId = reqCtx().traceId ?? newTraceId();
    const kind = inferKind(interaction);

    await runWithCtx(
      { traceId, cmd: name, kind, userId: interaction.user.id, guildId: interaction.guildId },
      async () => {
        const startedAt = Date.now();
        let phase: Phase = "enter";

        const commandCtx: CommandContext<I> = {
          interaction,
          step: (newPhase: Phase) => {
            phase = newPhase;
            logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
            addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
            setTag("phase", phase);
          },
          currentPhase: () => phase,
          traceId,
        };

        logger.info(
          {
            evt: "cmd_start",
            traceId,
            cmd: name,
            kind,
            userId: interaction.user.id,
            guildId: interaction.guildId ?? "dm",
          },
          "command start"
        );

        setTag("cmd", name);
        setTag("traceId", traceId);
        setContext("discord", {
          userId: interaction.user.id,
          guildId: interaction.guildId ?? "dm",
          channelId: interaction.channelId ?? null,
        });

        try {
          await fn(commandCtx);
          logger.info(
            { evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt },
            "command ok"
          );
        } catch (error) {
          const classified = classifyError(error);
          logger.error(
            {
              evt: "cmd_error",
              traceId,
              cmd: name,
              kind,
              phase,
              ...errorContext(classified),
              err: error,
            },
            `command error: ${classified.message}`
          );
          setTag("errorKind", classified.kind);

          if (shouldReportToSentry(classified)) {
            captureException(error, { cmd: name, phase, traceId, errorKind: classified.kind });
          }

          try {
            await replyOrEdit(interaction, {
              content: `${userFriendlyMessage(classified)}\nTrace: \`${traceId}\``,
              components: [],
              embeds: [],
            });
          } catch (replyErr) {
            logger.error(
              { err: replyErr, traceId, evt: "cmd_error_reply_fail" },
              "Failed to post error reply"
            );
          }
        }
      }
    );
  };
}

/**
 * ensureDeferred
 * WHAT: First-time acknowledgement with deferReply if we haven't replied yet.
 * WHY: Anything touching many channels or a third-party API can blow the 3s window.
 * THROWS: Re-throws non-10062 errors; 10062 (expired) is logged and skipped.
 */
export async function ensureDeferred(
  interaction: InstrumentedInteraction,
  opts: { ephemeral?: boolean } = {}
): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  const ephemeral = opts.ephemeral ?? true;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.debug({ evt: "cmd_deferred", traceId: reqCtx().traceId, ephemeral }, "[cmd] deferred reply");
  } catch (err) {
    const meta = discordRestMeta(err);
    const code = err instanceof DiscordAPIError ? err.code : undefined;
    const logPayload = { evt: "cmd_defer_fail", traceId: reqCtx().traceId, code, ...(meta ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply to an interaction, handling the deferred/replied state.
 *
 * Replies default to ephemeral; public output has to opt in with
 * `{ ephemeral: false }`. The first call after a defer fills the deferred
 * reply (its visibility sticks); later calls become follow-ups.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: Omit<InteractionReplyOptions, "flags">,
  opts: { ephemeral?: boolean } = {}
): Promise<Message | undefined> {
  const ephemeral = opts.ephemeral ?? true;
  try {
    if (interaction.deferred && !interaction.replied) {
      return await interaction.editReply(payload);
    }
    if (interaction.replied) {
      return await interaction.followUp(
        ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload
      );
    }
    await interaction.reply(ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload);
    return await interaction.fetchReply();
  } catch (err) {
    const meta = discordRestMeta(err);
    const code = err instanceof DiscordAPIError ? err.code : undefined;
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, ...(meta ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return undefined;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return undefined;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
