import type { Insertable, Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================
//
// Timestamps are ISO-8601 UTC strings and structured fields are JSON text, so
// one schema serves both PostgreSQL and SQLite. ISO strings of a fixed width
// sort chronologically, which the range and "most recent" queries rely on.

/**
 * meals - one school lunch per day
 */
export interface MealsTable {
  date: string;
  /** Midnight UTC of `date`, the range-query column */
  day_start: string;
  /** JSON: `{ name, allergies }[]` */
  menus: string;
  /** JSON: `string[]` */
  menus_plain: string;
  calories: number | null;
  source_hash: string | null;
  created_at: string;
}

/**
 * schedules - academic calendar events grouped per day
 */
export interface SchedulesTable {
  date: string;
  day_start: string;
  /** JSON: `{ name, grades }[]`, null when the day has no events */
  entries: string | null;
  summary: string | null;
  created_at: string;
}

/**
 * timetables - grade → class → subjects per day
 */
export interface TimetablesTable {
  date: string;
  day_start: string;
  /** JSON: `Record<grade, Record<class, string[]>>` */
  lessons: string;
  created_at: string;
}

/**
 * weather_snapshots - one row per representative forecast slot
 */
export interface WeatherSnapshotsTable {
  observed_at: string;
  temperature: number | null;
  temperature_min: number | null;
  temperature_max: number | null;
  sky: string;
  precipitation_type: string;
  precipitation_probability: number | null;
  humidity: number | null;
  first_hour: number;
  created_at: string;
}

/**
 * water_temperatures - averaged river temperature per measurement time
 */
export interface WaterTemperaturesTable {
  observed_at: string;
  temperature_c: number;
  created_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  meals: MealsTable;
  schedules: SchedulesTable;
  timetables: TimetablesTable;
  weather_snapshots: WeatherSnapshotsTable;
  water_temperatures: WaterTemperaturesTable;
}

export type TableName = keyof Database;

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type MealRow = Selectable<MealsTable>;
export type NewMealRow = Insertable<MealsTable>;

export type ScheduleRow = Selectable<SchedulesTable>;
export type NewScheduleRow = Insertable<SchedulesTable>;

export type TimetableRow = Selectable<TimetablesTable>;
export type NewTimetableRow = Insertable<TimetablesTable>;

export type WeatherSnapshotRow = Selectable<WeatherSnapshotsTable>;
export type NewWeatherSnapshotRow = Insertable<WeatherSnapshotsTable>;

export type WaterTemperatureRow = Selectable<WaterTemperaturesTable>;
export type NewWaterTemperatureRow = Insertable<WaterTemperaturesTable>;
