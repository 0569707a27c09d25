import { parseCount, requireDate } from "../utils/args.js";
import { withCore } from "../utils/core.js";
import { printWarning } from "../utils/display.js";

import type { SyncRangeResult } from "../../services/sync/index.js";
import type { Command } from "commander";

function describeRange(result: SyncRangeResult): string {
  return `Synced ${result.start}..${result.end}: ${String(result.meals)} meals, ${String(result.schedules)} schedule days, ${String(result.timetables)} timetable days`;
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Fetch upstream data and store it")
    .addHelpText(
      "after",
      `
EXAMPLES:
  campus-feed sync range 2024-03-04 2024-03-08
  campus-feed sync window --before 3 --after 7
  campus-feed sync weather
  campus-feed sync water
`
    );

  // sync range
  sync
    .command("range <start> <end>")
    .description("Sync meals, schedules and timetables for a date range")
    .action(async (start: string, end: string) => {
      await withCore(`Syncing ${start}..${end}...`, async (core, spinner) => {
        const result = await core.syncRange(
          requireDate(start, "start"),
          requireDate(end, "end")
        );
        spinner.succeed(describeRange(result));
      });
    });

  // sync window
  sync
    .command("window")
    .description("Sync a window of days around a date (default: today in Korea)")
    .option("-c, --center <date>", "Center date (YYYY-MM-DD)")
    .option("-b, --before <days>", "Days before the center")
    .option("-a, --after <days>", "Days after the center")
    .action(
      async (options: { center?: string; before?: string; after?: string }) => {
        await withCore("Syncing window...", async (core, spinner) => {
          const result = await core.syncWindow({
            center:
              options.center === undefined
                ? undefined
                : requireDate(options.center, "--center"),
            daysBefore:
              options.before === undefined
                ? undefined
                : parseCount(options.before, "--before"),
            daysAfter:
              options.after === undefined
                ? undefined
                : parseCount(options.after, "--after"),
          });
          spinner.succeed(describeRange(result));
        });
      }
    );

  // sync weather
  sync
    .command("weather")
    .description("Sync the latest weather forecast snapshot")
    .action(async () => {
      await withCore("Syncing weather...", async (core, spinner) => {
        const stored = await core.syncWeather();
        if (stored === null) {
          spinner.stop();
          printWarning("Upstream returned no usable forecast");
          return;
        }
        spinner.succeed(
          `Stored weather for ${stored.timestamp.toISOString()}: ${stored.sky}, ${String(stored.temperature ?? "N/A")}°C`
        );
      });
    });

  // sync water
  sync
    .command("water")
    .description("Sync the latest river water temperature")
    .action(async () => {
      await withCore("Syncing water temperature...", async (core, spinner) => {
        const stored = await core.syncWaterTemperature();
        if (stored === null) {
          spinner.stop();
          printWarning("Upstream returned no usable measurement");
          return;
        }
        spinner.succeed(
          `Stored water temperature for ${stored.timestamp.toISOString()}: ${String(stored.temperatureC)}°C`
        );
      });
    });
}
