import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { FetchError } from "../../../../src/errors.js";
import {
  BackgroundTasks,
  FreshnessGuard,
  SyncOrchestrator,
} from "../../../../src/services/sync/index.js";
import { empty, found } from "../../../../src/types/index.js";
import { createClock, createTestStore } from "../../../mocks/db.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";
import type { SchoolDataSource } from "../../../../src/scraper/neis.js";
import type { WaterTemperatureSource } from "../../../../src/scraper/water.js";
import type { WeatherSource } from "../../../../src/scraper/weather.js";
import type { CanonicalStore } from "../../../../src/services/store/index.js";
import type {
  AdapterResult,
  MealRecord,
  WeatherSnapshot,
} from "../../../../src/types/index.js";

const DAY = "2024-03-04";

function lunch(date: string): MealRecord {
  return {
    date,
    menus: [{ name: "카레라이스", allergies: [2, 5] }],
    menusPlain: ["카레라이스"],
    calories: 720,
    sourceHash: null,
  };
}

function forecast(iso: string, temperature: number): WeatherSnapshot {
  return {
    timestamp: new Date(iso),
    temperature,
    temperatureMin: null,
    temperatureMax: null,
    sky: "☀ 맑음",
    precipitationType: "❌ 없음",
    precipitationProbability: 0,
    humidity: 45,
    firstHour: 12,
  };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function createSources() {
  return {
    school: {
      fetchMeals: vi.fn<SchoolDataSource["fetchMeals"]>((start) =>
        Promise.resolve(found([lunch(start)]))
      ),
      fetchSchedules: vi.fn<SchoolDataSource["fetchSchedules"]>(() =>
        Promise.resolve(empty())
      ),
      fetchTimetables: vi.fn<SchoolDataSource["fetchTimetables"]>(() =>
        Promise.resolve(empty())
      ),
    },
    weather: {
      fetchLatest: vi.fn<WeatherSource["fetchLatest"]>(() =>
        Promise.resolve(found(forecast("2024-03-04T03:00:00.000Z", 7)))
      ),
    },
    water: {
      fetchLatest: vi.fn<WaterTemperatureSource["fetchLatest"]>(() =>
        Promise.resolve(empty())
      ),
    },
  };
}

describe("services/sync/freshness", () => {
  // ============================================================================
  // BackgroundTasks
  // ============================================================================

  describe("BackgroundTasks", () => {
    it("should run at most one task per key", async () => {
      const tasks = new BackgroundTasks(4);
      const gate = deferred<undefined>();
      const factory = vi.fn(() => gate.promise);

      const first = tasks.spawn("school:2024-03-04", factory);
      const second = tasks.spawn("school:2024-03-04", factory);

      expect(second).toBe(first);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(tasks.size).toBe(1);

      gate.resolve(undefined);
      await tasks.drain();
      expect(tasks.size).toBe(0);
      expect(tasks.has("school:2024-03-04")).toBe(false);
    });

    it("should refuse new tasks past the limit", async () => {
      const tasks = new BackgroundTasks(1);
      const gate = deferred<undefined>();

      expect(tasks.spawn("a", () => gate.promise)).not.toBeNull();
      expect(tasks.spawn("b", () => Promise.resolve())).toBeNull();

      gate.resolve(undefined);
      await tasks.drain();
      expect(tasks.spawn("b", () => Promise.resolve())).not.toBeNull();
      await tasks.drain();
    });

    it("should absorb task failures", async () => {
      const tasks = new BackgroundTasks(2);
      const handle = tasks.spawn("weather", () =>
        Promise.reject(new Error("upstream down"))
      );

      await expect(handle).resolves.toBeUndefined();
      expect(tasks.size).toBe(0);
    });

    it("should absorb a factory that throws synchronously", async () => {
      const tasks = new BackgroundTasks(2);
      const handle = tasks.spawn("weather", () => {
        throw new Error("not started");
      });

      await expect(handle).resolves.toBeUndefined();
    });

    it("should track adopted promises past the limit", async () => {
      const tasks = new BackgroundTasks(1);
      const gate = deferred<undefined>();
      void tasks.spawn("a", () => Promise.resolve());
      void tasks.adopt("b", gate.promise);

      expect(tasks.size).toBe(2);
      gate.resolve(undefined);
      await tasks.drain();
      expect(tasks.size).toBe(0);
    });
  });

  // ============================================================================
  // FreshnessGuard
  // ============================================================================

  describe("FreshnessGuard", () => {
    let handle: DatabaseHandle;
    let store: CanonicalStore;
    let sources: ReturnType<typeof createSources>;
    let background: BackgroundTasks;
    let guard: FreshnessGuard;

    beforeEach(() => {
      const clock = createClock("2024-03-04T03:00:00.000Z");
      ({ handle, store } = createTestStore(clock.now));
      sources = createSources();
      background = new BackgroundTasks(8);
      const orchestrator = new SyncOrchestrator(store, sources, clock.now);
      guard = new FreshnessGuard(
        store,
        orchestrator,
        background,
        { weatherMaxAgeMs: 60 * 60_000, waterMaxAgeMs: 76 * 60_000 },
        clock.now
      );
    });

    afterEach(async () => {
      await background.drain();
      await handle.close();
    });

    it("should return a cached record without syncing", async () => {
      await store.upsertMeal(lunch(DAY));

      const result = await guard.ensureFresh("meal", DAY);

      expect(result?.menusPlain).toEqual(["카레라이스"]);
      expect(sources.school.fetchMeals).not.toHaveBeenCalled();
    });

    it("should sync a missing day and return it when done in time", async () => {
      const result = await guard.ensureFresh("meal", DAY, 1000);

      expect(result?.date).toBe(DAY);
      expect(sources.school.fetchMeals).toHaveBeenCalledWith(DAY, DAY);
      expect(background.size).toBe(0);
    });

    it("should return null when upstream has nothing for the day", async () => {
      await expect(guard.ensureFresh("schedule", DAY, 1000)).resolves.toBeNull();
    });

    it("should hand a slow sync to the background and return immediately", async () => {
      const slow = deferred<AdapterResult<MealRecord[]>>();
      sources.school.fetchMeals.mockReturnValueOnce(slow.promise);

      const result = await guard.ensureFresh("meal", DAY, 20);

      expect(result).toBeNull();
      expect(background.has(`school:${DAY}`)).toBe(true);

      slow.resolve(found([lunch(DAY)]));
      await background.drain();

      expect((await store.getMeal(DAY))?.date).toBe(DAY);
      expect(sources.school.fetchMeals).toHaveBeenCalledTimes(1);
    });

    it("should retry a transient failure in the background", async () => {
      sources.school.fetchMeals.mockRejectedValueOnce(
        new FetchError("neis.meals request failed", {
          label: "neis.meals",
          url: "https://neis.example.test/hub/mealServiceDietInfo",
          attempts: 3,
          status: 503,
        })
      );

      const result = await guard.ensureFresh("meal", DAY, 1000);
      expect(result).toBeNull();

      await background.drain();
      expect(sources.school.fetchMeals).toHaveBeenCalledTimes(2);
      expect((await store.getMeal(DAY))?.date).toBe(DAY);
    });

    it("should not retry a rejected request", async () => {
      sources.school.fetchMeals.mockRejectedValueOnce(
        new FetchError("neis.meals request failed", {
          label: "neis.meals",
          url: "https://neis.example.test/hub/mealServiceDietInfo",
          attempts: 1,
          status: 401,
        })
      );

      await expect(guard.ensureFresh("meal", DAY, 1000)).resolves.toBeNull();
      expect(background.size).toBe(0);
      await background.drain();
      expect(sources.school.fetchMeals).toHaveBeenCalledTimes(1);
    });

    it("should retry a transport failure in the background", async () => {
      sources.school.fetchMeals.mockRejectedValueOnce(
        new FetchError("neis.meals request failed", {
          label: "neis.meals",
          url: "https://neis.example.test/hub/mealServiceDietInfo",
          attempts: 3,
          status: null,
        })
      );

      await guard.ensureFresh("meal", DAY, 1000);
      await background.drain();
      expect(sources.school.fetchMeals).toHaveBeenCalledTimes(2);
    });

    it("should not retry a non-transient failure", async () => {
      sources.school.fetchMeals.mockRejectedValueOnce(new Error("bad payload"));

      await expect(guard.ensureFresh("meal", DAY, 1000)).resolves.toBeNull();
      expect(background.size).toBe(0);
      expect(sources.school.fetchMeals).toHaveBeenCalledTimes(1);
    });

    it("should serve fresh weather from the store", async () => {
      await store.upsertWeather(forecast("2024-03-04T02:30:00.000Z", 4));

      const result = await guard.ensureFresh("weather");

      expect(result?.temperature).toBe(4);
      expect(sources.weather.fetchLatest).not.toHaveBeenCalled();
    });

    it("should refresh stale weather", async () => {
      await store.upsertWeather(forecast("2024-03-04T01:00:00.000Z", 4));

      const result = await guard.ensureFresh("weather", undefined, 1000);

      expect(result?.temperature).toBe(7);
      expect(result?.timestamp).toEqual(new Date("2024-03-04T03:00:00.000Z"));
    });

    it("should return the stale snapshot when the refresh times out", async () => {
      await store.upsertWeather(forecast("2024-03-04T01:00:00.000Z", 4));
      const slow = deferred<AdapterResult<WeatherSnapshot>>();
      sources.weather.fetchLatest.mockReturnValueOnce(slow.promise);

      const result = await guard.ensureFresh("weather", undefined, 20);

      expect(result?.temperature).toBe(4);
      slow.resolve(found(forecast("2024-03-04T03:00:00.000Z", 7)));
      await background.drain();
      expect((await store.getWeatherRecent())?.temperature).toBe(7);
    });

    it("should return null water when nothing is stored or fetched", async () => {
      await expect(guard.ensureFresh("water", undefined, 1000)).resolves.toBeNull();
    });

    it("should require a date key for date categories", async () => {
      await expect(guard.ensureFresh("timetable", "today")).rejects.toThrow(
        TypeError
      );
    });
  });
});
