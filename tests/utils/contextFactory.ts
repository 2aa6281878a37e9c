/**
 * tidewatch — tests/utils/contextFactory.ts
 * WHAT: Factory for creating CommandContext objects for testing.
 * WHY: Commands receive a structured context; tests need to provide the same shape.
 * USAGE:
 *  const ctx = createTestCommandContext(typed);
 *  await execute(ctx);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext, InstrumentedInteraction } from "../../src/lib/cmdWrap.js";

/**
 * @example
 * const ctx = createTestCommandContext(typed);
 * await execute(ctx);
 * expect(ctx.currentPhase()).toBe("update");
 */
export function createTestCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I,
  options: { traceId?: string; onStep?: (phase: string) => void } = {}
): CommandContext<I> {
  const traceId = options.traceId ?? "test-trace-123";
  let currentPhase = "enter";

  return {
    interaction,
    step: (phase: string) => {
      currentPhase = phase;
      options.onStep?.(phase);
    },
    currentPhase: () => currentPhase,
    traceId,
  };
}
