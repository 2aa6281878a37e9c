/**
 * tidewatch — scripts/deploy-commands.ts
 * WHAT: Bulk overwrite slash commands, guild-scoped when GUILD_ID is set, global otherwise.
 * WHY: Guild commands update instantly during development; global ones take up to an hour.
 * FLOWS: buildCommands() → REST PUT → print registered names
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { z } from "zod";
import { buildCommands } from "../src/commands/buildCommands.js";
import { env } from "../src/lib/env.js";
import { closeDatabase } from "../src/db/db.js";

const registeredSchema = z.array(z.object({ id: z.string(), name: z.string() }));

async function main(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const commands = buildCommands();
  const route = env.GUILD_ID
    ? Routes.applicationGuildCommands(env.CLIENT_ID, env.GUILD_ID)
    : Routes.applicationCommands(env.CLIENT_ID);
  const scope = env.GUILD_ID ? `guild ${env.GUILD_ID}` : "global";

  console.log(`[deploy] putting ${commands.length} commands (${scope})...`);
  const result = registeredSchema.parse(await rest.put(route, { body: commands }));
  console.log(`[deploy] registered: ${result.map((cmd) => cmd.name).join(", ")}`);
}

main()
  .then(() => {
    closeDatabase();
  })
  .catch((err: unknown) => {
    console.error("[deploy] failed:", err);
    closeDatabase();
    process.exitCode = 1;
  });
