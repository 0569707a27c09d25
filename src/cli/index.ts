#!/usr/bin/env node

/**
 * campus-feed CLI
 *
 * Syncs school meals, schedules, timetables, weather and river water
 * temperature into the local cache and reads them back.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerRefreshCommand } from "./commands/refresh.js";
import { registerShowCommand } from "./commands/show.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("campus-feed")
  .description("School and campus data cache: sync, refresh and inspect")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerRefreshCommand(program);
registerStatusCommand(program);
registerShowCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
