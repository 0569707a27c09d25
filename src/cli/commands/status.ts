import { withCore } from "../utils/core.js";
import { displayCacheHealth } from "../utils/display.js";

import type { Command } from "commander";

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show whether cached timetable, weather and water data are usable")
    .action(async () => {
      await withCore("Checking cache...", async (core, spinner) => {
        const health = await core.checkCacheHealth();
        spinner.stop();
        displayCacheHealth(health);
      });
    });
}
