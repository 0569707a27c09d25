/**
 * Canonical Store - idempotent persistence for normalized records
 *
 * Date-keyed categories (meals, schedules, timetables) hold one row per
 * calendar date; snapshot categories (weather, water) one row per observed
 * instant. Upserts overwrite every field except `created_at`, so replaying
 * the same payload leaves a row unchanged.
 */

import { dbLogger } from "../../logger.js";
import { StoreError } from "../../errors.js";
import { dayRangeBounds } from "../../utils/time.js";

import {
  mealFromRow,
  mealToRow,
  scheduleFromRow,
  scheduleToRow,
  timetableFromRow,
  timetableToRow,
  waterFromRow,
  waterToRow,
  weatherFromRow,
  weatherToRow,
} from "./codec.js";

import type { Database } from "../../db/types.js";
import type { SchemaInitializer } from "../../db/migrate.js";
import type {
  MealRecord,
  ScheduleRecord,
  StoredMeal,
  StoredSchedule,
  StoredTimetable,
  StoredWaterTemperature,
  StoredWeather,
  TimetableRecord,
  WaterTemperatureSnapshot,
  WeatherSnapshot,
} from "../../types/index.js";
import type { Kysely } from "kysely";

const log = dbLogger.child({ component: "store" });

function requireRow<T>(
  row: T | null | undefined,
  table: string,
  key: string
): T {
  if (row === undefined || row === null) {
    throw new StoreError(`Row ${key} missing from ${table} after upsert`, table);
  }
  return row;
}

export class CanonicalStore {
  constructor(
    private db: Kysely<Database>,
    private schema: SchemaInitializer,
    private now: () => Date = () => new Date()
  ) {}

  // ==========================================================================
  // Meals
  // ==========================================================================

  async upsertMeal(record: MealRecord): Promise<StoredMeal> {
    await this.schema.ensure();
    const row = mealToRow(record, this.now());
    await this.db
      .insertInto("meals")
      .values(row)
      .onConflict((oc) =>
        oc.column("date").doUpdateSet((eb) => ({
          day_start: eb.ref("excluded.day_start"),
          menus: eb.ref("excluded.menus"),
          menus_plain: eb.ref("excluded.menus_plain"),
          calories: eb.ref("excluded.calories"),
          source_hash: eb.ref("excluded.source_hash"),
        }))
      )
      .execute();
    log.debug({ table: "meals", date: record.date }, "Upserted");
    return requireRow(await this.getMeal(record.date), "meals", record.date);
  }

  async getMeal(date: string): Promise<StoredMeal | null> {
    await this.schema.ensure();
    const row = await this.db
      .selectFrom("meals")
      .selectAll()
      .where("date", "=", date)
      .executeTakeFirst();
    return row ? mealFromRow(row) : null;
  }

  async getMealsInRange(
    start: string,
    end: string
  ): Promise<Record<string, StoredMeal>> {
    await this.schema.ensure();
    const result: Record<string, StoredMeal> = {};
    if (start > end) {
      return result;
    }
    const { from, until } = dayRangeBounds(start, end);
    const rows = await this.db
      .selectFrom("meals")
      .selectAll()
      .where("day_start", ">=", from)
      .where("day_start", "<", until)
      .orderBy("date")
      .execute();
    for (const row of rows) {
      result[row.date] = mealFromRow(row);
    }
    return result;
  }

  // ==========================================================================
  // Schedules
  // ==========================================================================

  async upsertSchedule(record: ScheduleRecord): Promise<StoredSchedule> {
    await this.schema.ensure();
    const row = scheduleToRow(record, this.now());
    await this.db
      .insertInto("schedules")
      .values(row)
      .onConflict((oc) =>
        oc.column("date").doUpdateSet((eb) => ({
          day_start: eb.ref("excluded.day_start"),
          entries: eb.ref("excluded.entries"),
          summary: eb.ref("excluded.summary"),
        }))
      )
      .execute();
    log.debug({ table: "schedules", date: record.date }, "Upserted");
    return requireRow(
      await this.getSchedule(record.date),
      "schedules",
      record.date
    );
  }

  async getSchedule(date: string): Promise<StoredSchedule | null> {
    await this.schema.ensure();
    const row = await this.db
      .selectFrom("schedules")
      .selectAll()
      .where("date", "=", date)
      .executeTakeFirst();
    return row ? scheduleFromRow(row) : null;
  }

  async getSchedulesInRange(
    start: string,
    end: string
  ): Promise<Record<string, StoredSchedule>> {
    await this.schema.ensure();
    const result: Record<string, StoredSchedule> = {};
    if (start > end) {
      return result;
    }
    const { from, until } = dayRangeBounds(start, end);
    const rows = await this.db
      .selectFrom("schedules")
      .selectAll()
      .where("day_start", ">=", from)
      .where("day_start", "<", until)
      .orderBy("date")
      .execute();
    for (const row of rows) {
      result[row.date] = scheduleFromRow(row);
    }
    return result;
  }

  // ==========================================================================
  // Timetables
  // ==========================================================================

  async upsertTimetable(record: TimetableRecord): Promise<StoredTimetable> {
    await this.schema.ensure();
    const row = timetableToRow(record, this.now());
    await this.db
      .insertInto("timetables")
      .values(row)
      .onConflict((oc) =>
        oc.column("date").doUpdateSet((eb) => ({
          day_start: eb.ref("excluded.day_start"),
          lessons: eb.ref("excluded.lessons"),
        }))
      )
      .execute();
    log.debug({ table: "timetables", date: record.date }, "Upserted");
    return requireRow(
      await this.getTimetable(record.date),
      "timetables",
      record.date
    );
  }

  async getTimetable(date: string): Promise<StoredTimetable | null> {
    await this.schema.ensure();
    const row = await this.db
      .selectFrom("timetables")
      .selectAll()
      .where("date", "=", date)
      .executeTakeFirst();
    return row ? timetableFromRow(row) : null;
  }

  async getTimetablesInRange(
    start: string,
    end: string
  ): Promise<Record<string, StoredTimetable>> {
    await this.schema.ensure();
    const result: Record<string, StoredTimetable> = {};
    if (start > end) {
      return result;
    }
    const { from, until } = dayRangeBounds(start, end);
    const rows = await this.db
      .selectFrom("timetables")
      .selectAll()
      .where("day_start", ">=", from)
      .where("day_start", "<", until)
      .orderBy("date")
      .execute();
    for (const row of rows) {
      result[row.date] = timetableFromRow(row);
    }
    return result;
  }

  // ==========================================================================
  // Weather
  // ==========================================================================

  async upsertWeather(snapshot: WeatherSnapshot): Promise<StoredWeather> {
    await this.schema.ensure();
    const row = weatherToRow(snapshot, this.now());
    await this.db
      .insertInto("weather_snapshots")
      .values(row)
      .onConflict((oc) =>
        oc.column("observed_at").doUpdateSet((eb) => ({
          temperature: eb.ref("excluded.temperature"),
          temperature_min: eb.ref("excluded.temperature_min"),
          temperature_max: eb.ref("excluded.temperature_max"),
          sky: eb.ref("excluded.sky"),
          precipitation_type: eb.ref("excluded.precipitation_type"),
          precipitation_probability: eb.ref(
            "excluded.precipitation_probability"
          ),
          humidity: eb.ref("excluded.humidity"),
          first_hour: eb.ref("excluded.first_hour"),
        }))
      )
      .execute();

    const stored = await this.db
      .selectFrom("weather_snapshots")
      .selectAll()
      .where("observed_at", "=", row.observed_at)
      .executeTakeFirst();
    return weatherFromRow(
      requireRow(stored, "weather_snapshots", row.observed_at)
    );
  }

  async getWeatherRecent(): Promise<StoredWeather | null> {
    await this.schema.ensure();
    const row = await this.db
      .selectFrom("weather_snapshots")
      .selectAll()
      .orderBy("observed_at", "desc")
      .limit(1)
      .executeTakeFirst();
    return row ? weatherFromRow(row) : null;
  }

  // ==========================================================================
  // Water temperature
  // ==========================================================================

  async upsertWaterTemperature(
    snapshot: WaterTemperatureSnapshot
  ): Promise<StoredWaterTemperature> {
    await this.schema.ensure();
    const row = waterToRow(snapshot, this.now());
    await this.db
      .insertInto("water_temperatures")
      .values(row)
      .onConflict((oc) =>
        oc.column("observed_at").doUpdateSet((eb) => ({
          temperature_c: eb.ref("excluded.temperature_c"),
        }))
      )
      .execute();

    const stored = await this.db
      .selectFrom("water_temperatures")
      .selectAll()
      .where("observed_at", "=", row.observed_at)
      .executeTakeFirst();
    return waterFromRow(
      requireRow(stored, "water_temperatures", row.observed_at)
    );
  }

  async getWaterTemperatureRecent(): Promise<StoredWaterTemperature | null> {
    await this.schema.ensure();
    const row = await this.db
      .selectFrom("water_temperatures")
      .selectAll()
      .orderBy("observed_at", "desc")
      .limit(1)
      .executeTakeFirst();
    return row ? waterFromRow(row) : null;
  }
}
