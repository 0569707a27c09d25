/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStats } from "../../db/migrate.js";
import type { CacheHealth, CacheStatus } from "../../services/sync/index.js";
import type {
  Lessons,
  StoredMeal,
  StoredSchedule,
  StoredWaterTemperature,
  StoredWeather,
} from "../../types/index.js";

function formatValue(value: number | null, unit = ""): string {
  return value === null ? chalk.gray("N/A") : `${String(value)}${unit}`;
}

/**
 * Display row counts per table
 */
export function displayTableStats(stats: TableStats[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
    colWidths: [24, 10],
  });
  for (const row of stats) {
    table.push([row.table_name, String(row.row_count)]);
  }
  console.log(table.toString());
}

/**
 * Display meals keyed by date
 */
export function displayMeals(meals: Record<string, StoredMeal>): void {
  const entries = Object.values(meals);
  if (entries.length === 0) {
    console.log(chalk.yellow("No meals stored for this range"));
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("Date"), chalk.cyan("Menu"), chalk.cyan("Kcal")],
    colWidths: [12, 50, 10],
    wordWrap: true,
  });
  for (const meal of entries) {
    const menu = meal.menus
      .map((item) =>
        item.allergies.length > 0
          ? `${item.name} ${chalk.gray(`(${item.allergies.join(".")})`)}`
          : item.name
      )
      .join("\n");
    table.push([chalk.green(meal.date), menu, formatValue(meal.calories)]);
  }
  console.log(table.toString());
}

/**
 * Display schedule summaries keyed by date
 */
export function displaySchedules(
  schedules: Record<string, StoredSchedule>
): void {
  const entries = Object.values(schedules);
  if (entries.length === 0) {
    console.log(chalk.yellow("No schedule entries stored for this range"));
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("Date"), chalk.cyan("Events")],
    colWidths: [12, 60],
    wordWrap: true,
  });
  for (const schedule of entries) {
    table.push([
      chalk.green(schedule.date),
      schedule.summary ?? chalk.gray("(none)"),
    ]);
  }
  console.log(table.toString());
}

/**
 * Display one grade of a timetable, classes as columns and periods as rows
 */
export function displayTimetable(
  date: string,
  lessons: Lessons,
  grade: number
): void {
  const classes = lessons[String(grade)] ?? {};
  const classIds = Object.keys(classes);

  console.log(chalk.bold(`\nTimetable ${date}, grade ${String(grade)}\n`));
  if (classIds.length === 0) {
    console.log(chalk.yellow("No classes configured"));
    return;
  }

  const periods = Math.max(
    0,
    ...classIds.map((id) => (classes[id] ?? []).length)
  );
  const table = new CliTable3({
    head: [chalk.cyan("#"), ...classIds.map((id) => chalk.cyan(`${id}반`))],
  });
  for (let period = 0; period < periods; period++) {
    table.push([
      String(period + 1),
      ...classIds.map((id) => classes[id]?.[period] ?? ""),
    ]);
  }
  console.log(table.toString());
  if (periods === 0) {
    console.log(chalk.gray("No lessons stored"));
  }
}

export function displayWeather(weather: StoredWeather): void {
  console.log(chalk.bold.underline("\nWeather\n"));
  console.log(`  Slot:          ${weather.timestamp.toISOString()} (hour ${String(weather.firstHour)})`);
  console.log(`  Sky:           ${weather.sky}`);
  console.log(`  Precipitation: ${weather.precipitationType}`);
  console.log(`  Temperature:   ${formatValue(weather.temperature, "°C")}`);
  console.log(
    `  Min / Max:     ${formatValue(weather.temperatureMin, "°C")} / ${formatValue(weather.temperatureMax, "°C")}`
  );
  console.log(`  Rain chance:   ${formatValue(weather.precipitationProbability, "%")}`);
  console.log(`  Humidity:      ${formatValue(weather.humidity, "%")}`);
  console.log();
}

export function displayWaterTemperature(water: StoredWaterTemperature): void {
  console.log(chalk.bold.underline("\nWater temperature\n"));
  console.log(`  Measured:    ${water.timestamp.toISOString()}`);
  console.log(`  Temperature: ${String(water.temperatureC)}°C`);
  console.log();
}

function colorStatus(status: CacheStatus): string {
  switch (status) {
    case "Valid":
      return chalk.green(status);
    case "Expired":
      return chalk.yellow(status);
    case "NotFound":
      return chalk.red(status);
  }
}

/**
 * Display cache health per category
 */
export function displayCacheHealth(health: CacheHealth): void {
  const table = new CliTable3({
    head: [chalk.cyan("Category"), chalk.cyan("Status")],
    colWidths: [20, 12],
  });
  table.push(["timetable", colorStatus(health.timetable)]);
  table.push(["weather", colorStatus(health.weather)]);
  table.push(["water temperature", colorStatus(health.waterTemperature)]);
  console.log(table.toString());
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
