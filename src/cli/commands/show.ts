import { todayKst } from "../../utils/time.js";
import { parseCount, requireDate } from "../utils/args.js";
import { withCore } from "../utils/core.js";
import {
  displayMeals,
  displaySchedules,
  displayTimetable,
  displayWaterTemperature,
  displayWeather,
  printWarning,
} from "../utils/display.js";

import type { Command } from "commander";

interface FreshOption {
  fresh?: boolean;
}

// ============================================================================
// Show Commands
// ============================================================================

export function registerShowCommand(program: Command): void {
  const show = program
    .command("show")
    .description("Read stored records")
    .addHelpText(
      "after",
      `
With --fresh, a missing or stale record is refreshed from upstream first,
waiting a few seconds at most before falling back to what is stored.
`
    );

  // show meals
  show
    .command("meals [start] [end]")
    .description("Show meals for a date or range (default: today)")
    .option("-f, --fresh", "Refresh a single missing day first")
    .action(
      async (
        start: string | undefined,
        end: string | undefined,
        options: FreshOption
      ) => {
        await withCore("Loading meals...", async (core, spinner) => {
          const from = requireDate(start ?? todayKst(), "start");
          const to = requireDate(end ?? from, "end");
          if (options.fresh === true && from === to) {
            await core.ensureFresh("meal", from);
          }
          const meals = await core.getMealsInRange(from, to);
          spinner.stop();
          displayMeals(meals);
        });
      }
    );

  // show schedule
  show
    .command("schedule [start] [end]")
    .description("Show academic calendar events for a date or range")
    .option("-f, --fresh", "Refresh a single missing day first")
    .action(
      async (
        start: string | undefined,
        end: string | undefined,
        options: FreshOption
      ) => {
        await withCore("Loading schedule...", async (core, spinner) => {
          const from = requireDate(start ?? todayKst(), "start");
          const to = requireDate(end ?? from, "end");
          if (options.fresh === true && from === to) {
            await core.ensureFresh("schedule", from);
          }
          const schedules = await core.getSchedulesInRange(from, to);
          spinner.stop();
          displaySchedules(schedules);
        });
      }
    );

  // show timetable
  show
    .command("timetable [date]")
    .description("Show one grade's timetable for a day (default: today)")
    .option("-g, --grade <n>", "Grade to show", "1")
    .option("-f, --fresh", "Refresh a missing day first")
    .action(
      async (
        date: string | undefined,
        options: FreshOption & { grade: string }
      ) => {
        await withCore("Loading timetable...", async (core, spinner) => {
          const day = requireDate(date ?? todayKst(), "date");
          const grade = parseCount(options.grade, "--grade");
          const stored =
            options.fresh === true
              ? await core.ensureFresh("timetable", day)
              : await core.getTimetable(day);
          spinner.stop();
          if (stored === null) {
            printWarning(`No timetable stored for ${day}`);
          }
          displayTimetable(day, core.denseTimetable(stored?.lessons ?? null), grade);
        });
      }
    );

  // show weather
  show
    .command("weather")
    .description("Show the most recent weather snapshot")
    .option("-f, --fresh", "Refresh first when older than the max age")
    .action(async (options: FreshOption) => {
      await withCore("Loading weather...", async (core, spinner) => {
        const weather =
          options.fresh === true
            ? await core.ensureFresh("weather")
            : await core.getWeatherRecent();
        spinner.stop();
        if (weather === null) {
          printWarning("No weather snapshot stored");
          return;
        }
        displayWeather(weather);
      });
    });

  // show water
  show
    .command("water")
    .description("Show the most recent water temperature")
    .option("-f, --fresh", "Refresh first when older than the max age")
    .action(async (options: FreshOption) => {
      await withCore("Loading water temperature...", async (core, spinner) => {
        const water =
          options.fresh === true
            ? await core.ensureFresh("water")
            : await core.getWaterTemperatureRecent();
        spinner.stop();
        if (water === null) {
          printWarning("No water temperature stored");
          return;
        }
        displayWaterTemperature(water);
      });
    });
}
