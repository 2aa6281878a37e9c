/**
 * tidewatch — src/lib/owner.ts
 * WHAT: Bot-owner override list.
 * WHY: Owners pass role-hierarchy checks, may edit any case, and skip the osu! tracking cap.
 * DOCS:
 *  - Environment: OWNER_IDS as comma-separated user IDs
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env } from "./env.js";

// Parsed once at module load. Keep this list minimal.
const ownerIds = env.OWNER_IDS
  ? env.OWNER_IDS.split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  : [];

export function isOwner(userId: string): boolean {
  return ownerIds.includes(userId);
}
