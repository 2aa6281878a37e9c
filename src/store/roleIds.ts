/**
 * tidewatch — src/store/roleIds.ts
 * WHAT: JSON role-id list columns shared by the poll and raffle tables.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { logger } from "../lib/logger.js";

const roleIdsSchema = z.array(z.string().regex(/^\d+$/));

export function encodeRoleIds(roleIds: readonly string[]): string {
  return JSON.stringify(roleIds);
}

/**
 * A broken column reads as "no restriction" so the poll or raffle stays usable.
 */
export function decodeRoleIds(raw: string, messageId: string): string[] {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, messageId }, "[store] role_ids is not valid JSON");
    return [];
  }
  const parsed = roleIdsSchema.safeParse(value);
  if (!parsed.success) {
    logger.warn({ messageId, issues: parsed.error.issues.length }, "[store] role_ids failed validation");
    return [];
  }
  return parsed.data;
}
