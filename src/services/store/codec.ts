/**
 * Row ↔ record mapping for the canonical store.
 *
 * JSON columns are validated on the way out; a stored value that no longer
 * matches its schema raises a StoreError rather than leaking a bad shape.
 */

import { Value } from "@sinclair/typebox/value";

import { StoreError } from "../../errors.js";
import {
  LessonsSchema,
  MealMenuListSchema,
  ScheduleEntryListSchema,
  StringListSchema,
  type MealRecord,
  type ScheduleRecord,
  type StoredMeal,
  type StoredSchedule,
  type StoredTimetable,
  type StoredWaterTemperature,
  type StoredWeather,
  type TimetableRecord,
  type WaterTemperatureSnapshot,
  type WeatherSnapshot,
} from "../../types/index.js";
import { dayStartUtc } from "../../utils/time.js";

import type {
  MealRow,
  NewMealRow,
  NewScheduleRow,
  NewTimetableRow,
  NewWaterTemperatureRow,
  NewWeatherSnapshotRow,
  ScheduleRow,
  TableName,
  TimetableRow,
  WaterTemperatureRow,
  WeatherSnapshotRow,
} from "../../db/types.js";
import type { Static, TSchema } from "@sinclair/typebox";

function decodeJson<T extends TSchema>(
  schema: T,
  text: string,
  table: TableName,
  column: string
): Static<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StoreError(`${table}.${column} is not valid JSON`, table, error);
  }
  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    throw new StoreError(
      `${table}.${column} has an unexpected shape${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
      table
    );
  }
  return parsed;
}

// ============================================================================
// Meals
// ============================================================================

export function mealToRow(record: MealRecord, createdAt: Date): NewMealRow {
  return {
    date: record.date,
    day_start: dayStartUtc(record.date),
    menus: JSON.stringify(record.menus),
    menus_plain: JSON.stringify(record.menusPlain),
    calories: record.calories,
    source_hash: record.sourceHash,
    created_at: createdAt.toISOString(),
  };
}

export function mealFromRow(row: MealRow): StoredMeal {
  return {
    date: row.date,
    menus: decodeJson(MealMenuListSchema, row.menus, "meals", "menus"),
    menusPlain: decodeJson(StringListSchema, row.menus_plain, "meals", "menus_plain"),
    calories: row.calories,
    sourceHash: row.source_hash,
    createdAt: new Date(row.created_at),
  };
}

// ============================================================================
// Schedules
// ============================================================================

export function scheduleToRow(
  record: ScheduleRecord,
  createdAt: Date
): NewScheduleRow {
  return {
    date: record.date,
    day_start: dayStartUtc(record.date),
    entries: record.entries === null ? null : JSON.stringify(record.entries),
    summary: record.summary,
    created_at: createdAt.toISOString(),
  };
}

export function scheduleFromRow(row: ScheduleRow): StoredSchedule {
  return {
    date: row.date,
    entries:
      row.entries === null
        ? null
        : decodeJson(ScheduleEntryListSchema, row.entries, "schedules", "entries"),
    summary: row.summary,
    createdAt: new Date(row.created_at),
  };
}

// ============================================================================
// Timetables
// ============================================================================

export function timetableToRow(
  record: TimetableRecord,
  createdAt: Date
): NewTimetableRow {
  return {
    date: record.date,
    day_start: dayStartUtc(record.date),
    lessons: JSON.stringify(record.lessons),
    created_at: createdAt.toISOString(),
  };
}

export function timetableFromRow(row: TimetableRow): StoredTimetable {
  return {
    date: row.date,
    lessons: decodeJson(LessonsSchema, row.lessons, "timetables", "lessons"),
    createdAt: new Date(row.created_at),
  };
}

// ============================================================================
// Snapshots
// ============================================================================

export function weatherToRow(
  snapshot: WeatherSnapshot,
  createdAt: Date
): NewWeatherSnapshotRow {
  return {
    observed_at: snapshot.timestamp.toISOString(),
    temperature: snapshot.temperature,
    temperature_min: snapshot.temperatureMin,
    temperature_max: snapshot.temperatureMax,
    sky: snapshot.sky,
    precipitation_type: snapshot.precipitationType,
    precipitation_probability: snapshot.precipitationProbability,
    humidity: snapshot.humidity,
    first_hour: snapshot.firstHour,
    created_at: createdAt.toISOString(),
  };
}

export function weatherFromRow(row: WeatherSnapshotRow): StoredWeather {
  return {
    timestamp: new Date(row.observed_at),
    temperature: row.temperature,
    temperatureMin: row.temperature_min,
    temperatureMax: row.temperature_max,
    sky: row.sky,
    precipitationType: row.precipitation_type,
    precipitationProbability: row.precipitation_probability,
    humidity: row.humidity,
    firstHour: row.first_hour,
    createdAt: new Date(row.created_at),
  };
}

export function waterToRow(
  snapshot: WaterTemperatureSnapshot,
  createdAt: Date
): NewWaterTemperatureRow {
  return {
    observed_at: snapshot.timestamp.toISOString(),
    temperature_c: snapshot.temperatureC,
    created_at: createdAt.toISOString(),
  };
}

export function waterFromRow(row: WaterTemperatureRow): StoredWaterTemperature {
  return {
    timestamp: new Date(row.observed_at),
    temperatureC: row.temperature_c,
    createdAt: new Date(row.created_at),
  };
}
