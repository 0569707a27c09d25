/**
 * Weather adapter for the KMA short-term forecast ("village forecast").
 *
 * Forecast batches are published eight times a day and become available
 * about ten minutes after the hour. One forecast slot of the latest batch is
 * reduced to a {@link WeatherSnapshot}.
 */

import { Value } from "@sinclair/typebox/value";

import { httpLogger } from "../logger.js";
import {
  empty,
  found,
  malformed,
  type AdapterResult,
  type WeatherSnapshot,
} from "../types/index.js";
import {
  KmaHeaderSchema,
  KmaItemSchema,
  KmaItemsSchema,
  type KmaItem,
} from "../types/upstream.js";
import {
  addDays,
  fromCompactDate,
  kstToUtc,
  toCompactDate,
  toKst,
} from "../utils/time.js";

import type { HttpClient } from "./client.js";

// ============================================================================
// Code tables
// ============================================================================

export const SKY_LABELS: Readonly<Record<string, string>> = {
  "1": "☀ 맑음",
  "3": "🌥️ 구름 많음",
  "4": "☁ 흐림",
};

export const PRECIPITATION_LABELS: Readonly<Record<string, string>> = {
  "0": "❌ 없음",
  "1": "🌧️ 비",
  "2": "🌨️ 비/눈",
  "3": "🌨️ 눈",
  "4": "🚿 소나기",
};

export const UNKNOWN_SKY_LABEL = "Unknown";
export const UNKNOWN_PRECIPITATION_LABEL = "⚠ 오류";

/** Batch hours, latest first */
const BATCH_HOURS = [23, 20, 17, 14, 11, 8, 5, 2] as const;
const BATCH_DELAY_MINUTES = 10;
const REPRESENTATIVE_TIME = "0900";
const EVENING_HOUR = 17;

// ============================================================================
// Types
// ============================================================================

export interface ForecastBatch {
  /** `YYYYMMDD` */
  baseDate: string;
  /** `HHMM` */
  baseTime: string;
}

export interface WeatherSource {
  fetchLatest(now?: Date): Promise<AdapterResult<WeatherSnapshot>>;
}

export interface WeatherOptions {
  apiKey: string;
  nx: number;
  ny: number;
  baseUrl: string;
}

// ============================================================================
// Batch and slot selection
// ============================================================================

/**
 * Latest batch already published at `now`. Before the first batch of the
 * day is out, the previous day's last batch is used.
 */
export function selectForecastBatch(now: Date): ForecastBatch {
  const local = toKst(now);
  const published = (hour: number): boolean =>
    local.hour > hour ||
    (local.hour === hour && local.minute >= BATCH_DELAY_MINUTES);

  const hour = BATCH_HOURS.find(published);
  if (hour === undefined) {
    return {
      baseDate: toCompactDate(addDays(local.date, -1)),
      baseTime: "2300",
    };
  }
  return {
    baseDate: toCompactDate(local.date),
    baseTime: `${String(hour).padStart(2, "0")}00`,
  };
}

/**
 * Pick the temperature entry that stands for the whole batch: today's 09:00,
 * tomorrow's 09:00 in the evening, or else the first temperature entry.
 */
export function selectRepresentativeSlot(
  items: readonly KmaItem[],
  now: Date
): KmaItem | null {
  const local = toKst(now);
  const temperatures = items.filter((item) => item.category === "TMP");

  const today = toCompactDate(local.date);
  const atNine = (day: string) =>
    temperatures.find(
      (item) => item.fcstDate === day && item.fcstTime === REPRESENTATIVE_TIME
    );

  let slot = atNine(today);
  if (slot === undefined && local.hour >= EVENING_HOUR) {
    slot = atNine(toCompactDate(addDays(local.date, 1)));
  }
  return slot ?? temperatures[0] ?? null;
}

function parseReading(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reduce a forecast batch to one snapshot, or `empty` when the batch has no
 * temperature entry at all.
 */
export function buildWeatherSnapshot(
  items: readonly KmaItem[],
  now: Date
): AdapterResult<WeatherSnapshot> {
  const slot = selectRepresentativeSlot(items, now);
  if (slot === null) {
    return empty();
  }

  const date = fromCompactDate(slot.fcstDate);
  const timeMatch = /^(\d{2})(\d{2})$/.exec(slot.fcstTime);
  if (date === null || timeMatch === null) {
    return malformed(
      `unreadable forecast slot ${slot.fcstDate} ${slot.fcstTime}`
    );
  }
  const hour = Number(timeMatch[1]);
  const minute = Number(timeMatch[2]);

  const valueAt = (category: string): string | undefined => {
    const match = items.find(
      (item) =>
        item.fcstDate === slot.fcstDate &&
        item.fcstTime === slot.fcstTime &&
        item.category === category
    );
    return match === undefined ? undefined : String(match.fcstValue);
  };

  // Daily extremes are published on their own slots (TMN ~06h, TMX ~15h)
  let minimum: string | undefined;
  let maximum: string | undefined;
  for (const item of items) {
    if (item.fcstDate !== slot.fcstDate) {
      continue;
    }
    if (item.category === "TMN") {
      minimum = String(item.fcstValue);
    } else if (item.category === "TMX") {
      maximum = String(item.fcstValue);
    }
  }

  return found({
    timestamp: kstToUtc(date, hour, minute),
    temperature: parseReading(valueAt("TMP")),
    temperatureMin: parseReading(minimum),
    temperatureMax: parseReading(maximum),
    sky: SKY_LABELS[valueAt("SKY") ?? ""] ?? UNKNOWN_SKY_LABEL,
    precipitationType:
      PRECIPITATION_LABELS[valueAt("PTY") ?? ""] ?? UNKNOWN_PRECIPITATION_LABEL,
    precipitationProbability: parseReading(valueAt("POP")),
    humidity: parseReading(valueAt("REH")),
    firstHour: hour,
  });
}

/**
 * Pull the forecast items out of a KMA response.
 */
export function extractForecastItems(payload: unknown): AdapterResult<KmaItem[]> {
  if (Value.Check(KmaHeaderSchema, payload)) {
    const code = payload.response.header?.resultCode;
    if (code !== undefined && code !== "00") {
      httpLogger.warn(
        { resultCode: code, resultMsg: payload.response.header?.resultMsg },
        "KMA returned a non-success result"
      );
      return empty();
    }
  }

  if (!Value.Check(KmaItemsSchema, payload)) {
    return malformed("missing response.body.items.item");
  }

  const items = payload.response.body.items.item.filter(
    (item): item is KmaItem => Value.Check(KmaItemSchema, item)
  );
  return items.length > 0 ? found(items) : empty();
}

// ============================================================================
// Adapter
// ============================================================================

export class WeatherAdapter implements WeatherSource {
  constructor(
    private http: HttpClient,
    private options: WeatherOptions
  ) {}

  async fetchLatest(now: Date = new Date()): Promise<AdapterResult<WeatherSnapshot>> {
    const batch = selectForecastBatch(now);

    const payload = await this.http.getJson(this.options.baseUrl, {
      params: {
        serviceKey: this.options.apiKey,
        pageNo: "1",
        numOfRows: "1000",
        dataType: "JSON",
        base_date: batch.baseDate,
        base_time: batch.baseTime,
        nx: String(this.options.nx),
        ny: String(this.options.ny),
      },
      timeoutMs: 10_000,
      retries: 2,
      backoffSeconds: 0.5,
      label: "kma.weather",
    });

    const items = extractForecastItems(payload);
    if (items.kind !== "found") {
      if (items.kind === "malformed") {
        httpLogger.warn({ reason: items.reason, ...batch }, "Malformed KMA payload");
      }
      return items;
    }

    const snapshot = buildWeatherSnapshot(items.value, now);
    if (snapshot.kind === "malformed") {
      httpLogger.warn({ reason: snapshot.reason, ...batch }, "Unusable forecast batch");
    }
    return snapshot;
  }
}
