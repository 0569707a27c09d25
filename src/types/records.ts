/**
 * Canonical record shapes.
 *
 * Each schema doubles as the validator for JSON columns read back from the
 * store, so a record type is always the `Static` of its schema.
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Meals
// ============================================================================

export const MealMenuItemSchema = Type.Object({
  name: Type.String(),
  allergies: Type.Array(Type.Integer({ minimum: 1, maximum: 18 })),
});

export type MealMenuItem = Static<typeof MealMenuItemSchema>;

export const MealMenuListSchema = Type.Array(MealMenuItemSchema);

export const StringListSchema = Type.Array(Type.String());

export interface MealRecord {
  /** ISO date key, `YYYY-MM-DD` */
  date: string;
  menus: MealMenuItem[];
  menusPlain: string[];
  calories: number | null;
  sourceHash: string | null;
}

// ============================================================================
// Schedule
// ============================================================================

export const ScheduleEntrySchema = Type.Object({
  name: Type.String(),
  grades: Type.Array(Type.Integer({ minimum: 1, maximum: 6 })),
});

export type ScheduleEntry = Static<typeof ScheduleEntrySchema>;

export const ScheduleEntryListSchema = Type.Array(ScheduleEntrySchema);

export interface ScheduleRecord {
  date: string;
  /** `null` means no events that day */
  entries: ScheduleEntry[] | null;
  summary: string | null;
}

// ============================================================================
// Timetable
// ============================================================================

/** grade → class → subjects in period order */
export const LessonsSchema = Type.Record(
  Type.String(),
  Type.Record(Type.String(), Type.Array(Type.String()))
);

export type Lessons = Static<typeof LessonsSchema>;

export interface TimetableRecord {
  date: string;
  lessons: Lessons;
}

// ============================================================================
// Point-in-time snapshots
// ============================================================================

export interface WeatherSnapshot {
  /** UTC instant of the representative forecast slot */
  timestamp: Date;
  temperature: number | null;
  temperatureMin: number | null;
  temperatureMax: number | null;
  sky: string;
  precipitationType: string;
  precipitationProbability: number | null;
  humidity: number | null;
  /** Local hour of the representative slot */
  firstHour: number;
}

export interface WaterTemperatureSnapshot {
  timestamp: Date;
  temperatureC: number;
}

// ============================================================================
// Stored wrappers
// ============================================================================

/** A record as read back from the store */
export type Stored<T> = T & { createdAt: Date };

export type StoredMeal = Stored<MealRecord>;
export type StoredSchedule = Stored<ScheduleRecord>;
export type StoredTimetable = Stored<TimetableRecord>;
export type StoredWeather = Stored<WeatherSnapshot>;
export type StoredWaterTemperature = Stored<WaterTemperatureSnapshot>;

// ============================================================================
// Categories
// ============================================================================

export type DateCategory = "meal" | "schedule" | "timetable";
export type SnapshotCategory = "weather" | "water";
export type Category = DateCategory | SnapshotCategory;

export interface CategoryRecordMap {
  meal: StoredMeal;
  schedule: StoredSchedule;
  timetable: StoredTimetable;
  weather: StoredWeather;
  water: StoredWaterTemperature;
}

export function isDateCategory(category: Category): category is DateCategory {
  return (
    category === "meal" || category === "schedule" || category === "timetable"
  );
}
