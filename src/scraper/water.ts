/**
 * River water temperature adapter (Seoul open data, `WPOSInformationTime`).
 */

import { Value } from "@sinclair/typebox/value";

import { httpLogger } from "../logger.js";
import {
  empty,
  found,
  malformed,
  type AdapterResult,
  type WaterTemperatureSnapshot,
} from "../types/index.js";
import {
  WaterResponseSchema,
  WaterRowSchema,
  type WaterRow,
} from "../types/upstream.js";
import { fromCompactDate, kstToUtc } from "../utils/time.js";

import type { HttpClient } from "./client.js";

/** Most recent measurements across stations */
const BATCH_SIZE = 5;

export interface WaterTemperatureSource {
  fetchLatest(): Promise<AdapterResult<WaterTemperatureSnapshot>>;
}

export interface WaterOptions {
  token: string;
  baseUrl: string;
}

function parseTemperature(value: WaterRow["WATT"]): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Average the numeric readings of a batch. The first row is the most recent
 * and supplies the timestamp; non-numeric readings are skipped.
 */
export function buildWaterSnapshot(
  rows: readonly unknown[]
): AdapterResult<WaterTemperatureSnapshot> {
  const first = rows[0];
  if (first === undefined) {
    return empty();
  }
  if (!Value.Check(WaterRowSchema, first)) {
    return malformed("first row has an unexpected shape");
  }

  const date = fromCompactDate(first.YMD ?? "");
  const time = /^(\d{1,2}):(\d{2})$/.exec((first.HR ?? "").trim());
  if (date === null || time === null) {
    return malformed(`unreadable measurement time ${first.YMD ?? "?"} ${first.HR ?? "?"}`);
  }

  const readings: number[] = [];
  for (const row of rows) {
    if (!Value.Check(WaterRowSchema, row)) {
      continue;
    }
    const reading = parseTemperature(row.WATT);
    if (reading !== null) {
      readings.push(reading);
    }
  }

  if (readings.length === 0) {
    return empty();
  }

  const average = readings.reduce((sum, value) => sum + value, 0) / readings.length;
  return found({
    timestamp: kstToUtc(date, Number(time[1]), Number(time[2])),
    temperatureC: roundTo(average, 2),
  });
}

export class WaterTemperatureAdapter implements WaterTemperatureSource {
  constructor(
    private http: HttpClient,
    private options: WaterOptions
  ) {}

  async fetchLatest(): Promise<AdapterResult<WaterTemperatureSnapshot>> {
    const url = `${this.options.baseUrl}/${encodeURIComponent(this.options.token)}/json/WPOSInformationTime/1/${String(BATCH_SIZE)}/`;

    const payload = await this.http.getJson(url, {
      timeoutMs: 5000,
      retries: 2,
      backoffSeconds: 0.5,
      label: "seoul.water",
    });

    if (!Value.Check(WaterResponseSchema, payload)) {
      httpLogger.warn("Malformed water temperature payload");
      return malformed("missing WPOSInformationTime.row");
    }

    const snapshot = buildWaterSnapshot(payload.WPOSInformationTime.row);
    if (snapshot.kind === "malformed") {
      httpLogger.warn({ reason: snapshot.reason }, "Unusable water temperature batch");
    }
    return snapshot;
  }
}
