/**
 * tidewatch — src/features/warnings/thresholds.ts
 * WHAT: Picks the warn action a points change triggers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { WarnAction } from "../../store/warningStore.js";

function byPointsDesc(actions: readonly WarnAction[]): WarnAction[] {
  return [...actions].sort((a, b) => b.points - a.points);
}

/**
 * Highest action whose threshold the new total meets.
 */
export function exceededAction(actions: readonly WarnAction[], total: number): WarnAction | null {
  return byPointsDesc(actions).find((action) => total >= action.points) ?? null;
}

/**
 * Highest action that was met before a removal and isn't any more.
 */
export function droppedAction(
  actions: readonly WarnAction[],
  before: number,
  after: number
): WarnAction | null {
  return byPointsDesc(actions).find((action) => before >= action.points && after < action.points) ?? null;
}
