/**
 * tidewatch — src/commands/warn/index.ts
 * WHAT: Barrel for /warn, /warnings and /unwarn.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export { warnData, executeWarn } from "./warn.js";
export { warningsData, executeWarnings } from "./warnings.js";
export { unwarnData, executeUnwarn } from "./unwarn.js";
