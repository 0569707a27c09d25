/**
 * Sync Orchestrator - drives the source adapters and writes into the store
 *
 * Retry budget lives entirely in the HTTP client; a failed batch here is
 * logged with its range and rethrown for the caller to retry or ignore.
 */

import { SyncError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { addDays, isDateKey, todayKst } from "../../utils/time.js";

import type { SchoolDataSource } from "../../scraper/neis.js";
import type { WaterTemperatureSource } from "../../scraper/water.js";
import type { WeatherSource } from "../../scraper/weather.js";
import type {
  AdapterResult,
  MealRecord,
  ScheduleRecord,
  StoredWaterTemperature,
  StoredWeather,
  TimetableRecord,
} from "../../types/index.js";
import type { CanonicalStore } from "../store/canonical-store.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncSources {
  school: SchoolDataSource;
  weather: WeatherSource;
  water: WaterTemperatureSource;
}

export interface SyncRangeResult {
  start: string;
  end: string;
  meals: number;
  schedules: number;
  timetables: number;
}

export interface SyncWindowOptions {
  center?: string;
  daysBefore?: number;
  daysAfter?: number;
}

export interface SchoolData {
  meals: AdapterResult<MealRecord[]>;
  schedules: AdapterResult<ScheduleRecord[]>;
  timetables: AdapterResult<TimetableRecord[]>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Fetch all three school categories concurrently. The calls share no state,
 * so the first rejection is the batch's failure.
 */
export async function fetchSchoolData(
  source: SchoolDataSource,
  start: string,
  end: string
): Promise<SchoolData> {
  const [meals, schedules, timetables] = await Promise.all([
    source.fetchMeals(start, end),
    source.fetchSchedules(start, end),
    source.fetchTimetables(start, end),
  ]);
  return { meals, schedules, timetables };
}

function recordsOf<T>(result: AdapterResult<T[]>): T[] {
  return result.kind === "found" ? result.value : [];
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator {
  constructor(
    private store: CanonicalStore,
    private sources: SyncSources,
    private clock: () => Date = () => new Date(),
    private windowDefaults: { daysBefore: number; daysAfter: number } = {
      daysBefore: 10,
      daysAfter: 10,
    }
  ) {}

  /**
   * Sync meals, schedules and timetables for the inclusive date range.
   */
  async syncRange(start: string, end: string): Promise<SyncRangeResult> {
    const range = { start, end };
    if (!isDateKey(start) || !isDateKey(end)) {
      throw new SyncError(`Invalid date range ${start}..${end}`, {
        operation: "syncRange",
        range,
      });
    }
    if (start > end) {
      throw new SyncError(`Range start ${start} is after end ${end}`, {
        operation: "syncRange",
        range,
      });
    }

    const startedAt = Date.now();
    try {
      const data = await fetchSchoolData(this.sources.school, start, end);

      // Writes stay sequential and in a fixed order
      const meals = recordsOf(data.meals);
      for (const record of meals) {
        await this.store.upsertMeal(record);
      }
      const schedules = recordsOf(data.schedules);
      for (const record of schedules) {
        await this.store.upsertSchedule(record);
      }
      const timetables = recordsOf(data.timetables);
      for (const record of timetables) {
        await this.store.upsertTimetable(record);
      }

      const result = {
        start,
        end,
        meals: meals.length,
        schedules: schedules.length,
        timetables: timetables.length,
      };
      syncLogger.info(
        { ...result, durationMs: Date.now() - startedAt },
        "School data synced"
      );
      return result;
    } catch (error) {
      syncLogger.error({ start, end, error }, "School data sync failed");
      throw new SyncError(
        `Sync of ${start}..${end} failed: ${errorMessage(error)}`,
        { operation: "syncRange", range, cause: error }
      );
    }
  }

  /**
   * Sync a window of days around `center` (today in Korea by default).
   */
  syncWindow(options: SyncWindowOptions = {}): Promise<SyncRangeResult> {
    const center = options.center ?? todayKst(this.clock());
    const before = options.daysBefore ?? this.windowDefaults.daysBefore;
    const after = options.daysAfter ?? this.windowDefaults.daysAfter;
    return this.syncRange(addDays(center, -before), addDays(center, after));
  }

  async syncWeather(): Promise<StoredWeather | null> {
    try {
      const result = await this.sources.weather.fetchLatest(this.clock());
      if (result.kind !== "found") {
        syncLogger.warn(
          {
            category: "weather",
            reason: result.kind === "malformed" ? result.reason : "no data",
          },
          "No weather snapshot to store"
        );
        return null;
      }
      const stored = await this.store.upsertWeather(result.value);
      syncLogger.info(
        { observedAt: stored.timestamp.toISOString() },
        "Weather synced"
      );
      return stored;
    } catch (error) {
      syncLogger.error({ category: "weather", error }, "Weather sync failed");
      throw new SyncError(`Weather sync failed: ${errorMessage(error)}`, {
        operation: "syncWeather",
        cause: error,
      });
    }
  }

  async syncWaterTemperature(): Promise<StoredWaterTemperature | null> {
    try {
      const result = await this.sources.water.fetchLatest();
      if (result.kind !== "found") {
        syncLogger.warn(
          {
            category: "water",
            reason: result.kind === "malformed" ? result.reason : "no data",
          },
          "No water temperature snapshot to store"
        );
        return null;
      }
      const stored = await this.store.upsertWaterTemperature(result.value);
      syncLogger.info(
        {
          observedAt: stored.timestamp.toISOString(),
          temperatureC: stored.temperatureC,
        },
        "Water temperature synced"
      );
      return stored;
    } catch (error) {
      syncLogger.error(
        { category: "water", error },
        "Water temperature sync failed"
      );
      throw new SyncError(
        `Water temperature sync failed: ${errorMessage(error)}`,
        { operation: "syncWaterTemperature", cause: error }
      );
    }
  }
}
