import { checkConnection } from "../../db/connection.js";
import { TABLES, getTableStats } from "../../db/migrate.js";
import { withCore } from "../utils/core.js";
import { displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create tables and indexes that do not exist yet")
    .action(async () => {
      await withCore("Running migration...", async (core, spinner) => {
        await core.schema.ensure();
        spinner.succeed(
          `Schema ready on ${core.database.dialect} (${core.database.target})`
        );
        displayTableStats(await getTableStats(core.database.db));
      });
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      await withCore("Checking database connection...", async (core, spinner) => {
        const connected = await checkConnection(core.database.db);
        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase: ${core.database.target}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(
          `\nDatabase: ${core.database.target} (${core.database.dialect})`
        );

        const existing = new Set(
          (await core.database.db.introspection.getTables()).map(
            (table) => table.name
          )
        );
        const missing = TABLES.filter((table) => !existing.has(table));
        if (missing.length > 0) {
          console.log(
            `\nSchema: missing ${missing.join(", ")} (run 'db migrate')`
          );
          return;
        }

        console.log("\nTable statistics:");
        displayTableStats(await getTableStats(core.database.db));
      });
    });
}
