import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { StoreError } from "../../../../src/errors.js";
import { createClock, createTestStore } from "../../../mocks/db.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";
import type { CanonicalStore } from "../../../../src/services/store/index.js";
import type { MealRecord } from "../../../../src/types/index.js";

function meal(date: string, names: string[] = ["쌀밥"]): MealRecord {
  return {
    date,
    menus: names.map((name) => ({ name, allergies: [5, 6] })),
    menusPlain: names,
    calories: 650.5,
    sourceHash: `hash-${date}`,
  };
}

describe("services/store/canonical-store", () => {
  let handle: DatabaseHandle;
  let store: CanonicalStore;
  let clock: ReturnType<typeof createClock>;

  beforeEach(() => {
    clock = createClock("2024-03-04T00:00:00.000Z");
    ({ handle, store } = createTestStore(clock.now));
  });

  afterEach(async () => {
    await handle.close();
  });

  // ============================================================================
  // Upserts
  // ============================================================================

  describe("upsertMeal", () => {
    it("should return the stored record with its creation time", async () => {
      const stored = await store.upsertMeal(meal("2024-03-04"));

      expect(stored).toEqual({
        ...meal("2024-03-04"),
        createdAt: new Date("2024-03-04T00:00:00.000Z"),
      });
    });

    it("should overwrite fields but keep createdAt", async () => {
      await store.upsertMeal(meal("2024-03-04"));
      clock.advance(60_000);

      const updated = await store.upsertMeal(
        meal("2024-03-04", ["잡곡밥", "미역국"])
      );

      expect(updated.menusPlain).toEqual(["잡곡밥", "미역국"]);
      expect(updated.createdAt).toEqual(new Date("2024-03-04T00:00:00.000Z"));
      expect(await store.getMealsInRange("2024-03-04", "2024-03-04")).toEqual({
        "2024-03-04": updated,
      });
    });

    it("should raise StoreError when the row cannot be read back", async () => {
      vi.spyOn(store, "getMeal").mockResolvedValueOnce(null);

      await expect(store.upsertMeal(meal("2024-03-04"))).rejects.toBeInstanceOf(
        StoreError
      );
    });

    it("should be idempotent for the same payload", async () => {
      const first = await store.upsertMeal(meal("2024-03-04"));
      clock.advance(3_600_000);
      const second = await store.upsertMeal(meal("2024-03-04"));

      expect(second).toEqual(first);
    });
  });

  describe("upsertSchedule", () => {
    it("should store a day without events as null entries", async () => {
      const stored = await store.upsertSchedule({
        date: "2024-03-05",
        entries: null,
        summary: null,
      });

      expect(stored.entries).toBeNull();
      expect(await store.getSchedule("2024-03-05")).toEqual(stored);
    });

    it("should round-trip grouped entries", async () => {
      const record = {
        date: "2024-03-04",
        entries: [{ name: "입학식", grades: [1] }],
        summary: "입학식(1학년)",
      };
      await store.upsertSchedule(record);

      expect(await store.getSchedule("2024-03-04")).toEqual({
        ...record,
        createdAt: new Date("2024-03-04T00:00:00.000Z"),
      });
    });
  });

  describe("upsertTimetable", () => {
    it("should keep lessons keyed by grade and class", async () => {
      const lessons = { "1": { "1": ["국어", "수학"], "2": ["영어"] } };
      await store.upsertTimetable({ date: "2024-03-04", lessons });

      const stored = await store.getTimetable("2024-03-04");
      expect(stored?.lessons).toEqual(lessons);
    });

    it("should raise StoreError when the row cannot be read back", async () => {
      vi.spyOn(store, "getTimetable").mockResolvedValueOnce(null);
      vi.spyOn(store, "getSchedule").mockResolvedValueOnce(null);

      await expect(
        store.upsertTimetable({ date: "2024-03-04", lessons: {} })
      ).rejects.toBeInstanceOf(StoreError);
      await expect(
        store.upsertSchedule({ date: "2024-03-04", entries: null, summary: null })
      ).rejects.toBeInstanceOf(StoreError);
    });
  });

  // ============================================================================
  // Reads
  // ============================================================================

  describe("point reads", () => {
    it("should return null for a missing key", async () => {
      expect(await store.getMeal("2024-01-01")).toBeNull();
      expect(await store.getSchedule("2024-01-01")).toBeNull();
      expect(await store.getTimetable("2024-01-01")).toBeNull();
    });
  });

  describe("range reads", () => {
    beforeEach(async () => {
      for (const date of ["2023-12-31", "2024-01-01", "2024-01-02", "2024-01-04"]) {
        await store.upsertMeal(meal(date));
      }
    });

    it("should include both ends of a single-day range", async () => {
      const meals = await store.getMealsInRange("2024-01-01", "2024-01-01");
      expect(Object.keys(meals)).toEqual(["2024-01-01"]);
    });

    it("should return only stored keys, without placeholders", async () => {
      const meals = await store.getMealsInRange("2024-01-01", "2024-01-05");
      expect(Object.keys(meals)).toEqual([
        "2024-01-01",
        "2024-01-02",
        "2024-01-04",
      ]);
    });

    it("should return an empty mapping when start is after end", async () => {
      expect(await store.getMealsInRange("2024-01-02", "2024-01-01")).toEqual({});
      expect(await store.getSchedulesInRange("2024-01-02", "2024-01-01")).toEqual({});
      expect(await store.getTimetablesInRange("2024-01-02", "2024-01-01")).toEqual({});
    });

    it("should return an empty mapping for a range with no records", async () => {
      expect(await store.getSchedulesInRange("2024-01-01", "2024-01-31")).toEqual({});
    });
  });

  describe("snapshots", () => {
    const weather = {
      temperature: 1,
      temperatureMin: -2,
      temperatureMax: 8,
      sky: "☀ 맑음",
      precipitationType: "❌ 없음",
      precipitationProbability: 0,
      humidity: 40,
      firstHour: 9,
    };

    it("should return the most recent weather snapshot", async () => {
      await store.upsertWeather({
        ...weather,
        timestamp: new Date("2024-03-05T00:00:00.000Z"),
      });
      await store.upsertWeather({
        ...weather,
        timestamp: new Date("2024-03-04T00:00:00.000Z"),
        temperature: 5,
      });

      const recent = await store.getWeatherRecent();
      expect(recent?.timestamp).toEqual(new Date("2024-03-05T00:00:00.000Z"));
      expect(recent?.temperature).toBe(1);
    });

    it("should keep one weather row per timestamp", async () => {
      const timestamp = new Date("2024-03-04T00:00:00.000Z");
      await store.upsertWeather({ ...weather, timestamp });
      const updated = await store.upsertWeather({
        ...weather,
        timestamp,
        temperature: null,
      });

      expect(updated.temperature).toBeNull();
      const count = await handle.db
        .selectFrom("weather_snapshots")
        .select((eb) => eb.fn.countAll<number>().as("count"))
        .executeTakeFirst();
      expect(Number(count?.count)).toBe(1);
    });

    it("should return null when no water temperature is stored", async () => {
      expect(await store.getWaterTemperatureRecent()).toBeNull();
      expect(await store.getWeatherRecent()).toBeNull();
    });

    it("should store and return water temperatures", async () => {
      await store.upsertWaterTemperature({
        timestamp: new Date("2024-03-04T05:00:00.000Z"),
        temperatureC: 19,
      });
      await store.upsertWaterTemperature({
        timestamp: new Date("2024-03-04T06:00:00.000Z"),
        temperatureC: 19.25,
      });

      expect(await store.getWaterTemperatureRecent()).toEqual({
        timestamp: new Date("2024-03-04T06:00:00.000Z"),
        temperatureC: 19.25,
        createdAt: new Date("2024-03-04T00:00:00.000Z"),
      });
    });
  });

  describe("stored data validation", () => {
    it("should raise StoreError for a corrupted JSON column", async () => {
      await store.upsertMeal(meal("2024-03-04"));
      await handle.db
        .updateTable("meals")
        .set({ menus: '[{"name": 42}]' })
        .where("date", "=", "2024-03-04")
        .execute();

      await expect(store.getMeal("2024-03-04")).rejects.toBeInstanceOf(
        StoreError
      );
    });
  });
});
