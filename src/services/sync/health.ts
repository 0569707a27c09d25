/**
 * Cache health - whether each cached category is usable right now
 */

import { todayKst } from "../../utils/time.js";

import type { CanonicalStore } from "../store/canonical-store.js";

export type CacheStatus = "Valid" | "Expired" | "NotFound";

export interface CacheHealth {
  timetable: CacheStatus;
  weather: CacheStatus;
  waterTemperature: CacheStatus;
}

export interface CacheHealthLimits {
  timetableMaxAgeMs: number;
  weatherMaxAgeMs: number;
  waterMaxAgeMs: number;
}

function statusOf(
  reference: Date | undefined,
  now: Date,
  maxAgeMs: number
): CacheStatus {
  if (reference === undefined) {
    return "NotFound";
  }
  return now.getTime() - reference.getTime() <= maxAgeMs ? "Valid" : "Expired";
}

/**
 * Today's timetable is judged by when it was stored; snapshots by the
 * instant they describe.
 */
export async function checkCacheHealth(
  store: CanonicalStore,
  limits: CacheHealthLimits,
  now: Date = new Date()
): Promise<CacheHealth> {
  const [timetable, weather, water] = await Promise.all([
    store.getTimetable(todayKst(now)),
    store.getWeatherRecent(),
    store.getWaterTemperatureRecent(),
  ]);

  return {
    timetable: statusOf(timetable?.createdAt, now, limits.timetableMaxAgeMs),
    weather: statusOf(weather?.timestamp, now, limits.weatherMaxAgeMs),
    waterTemperature: statusOf(water?.timestamp, now, limits.waterMaxAgeMs),
  };
}
