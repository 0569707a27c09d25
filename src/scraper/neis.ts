/**
 * School data adapter for the NEIS open API: meals, academic schedule and
 * class timetables.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";

import { Value } from "@sinclair/typebox/value";

import { httpLogger } from "../logger.js";
import {
  empty,
  found,
  malformed,
  type AdapterResult,
  type Lessons,
  type MealMenuItem,
  type MealRecord,
  type ScheduleEntry,
  type ScheduleRecord,
  type TimetableRecord,
} from "../types/index.js";
import {
  JsonObjectSchema,
  NeisMealRowSchema,
  NeisResultSchema,
  NeisScheduleRowSchema,
  NeisServiceSchema,
  NeisTimetableRowSchema,
  type NeisMealRow,
  type NeisScheduleRow,
  type NeisTimetableRow,
} from "../types/upstream.js";
import { fromCompactDate, toCompactDate } from "../utils/time.js";

import type { HttpClient } from "./client.js";
import type { TimetableKind } from "../config.js";
import type { TSchema, Static } from "@sinclair/typebox";

// ============================================================================
// Constants
// ============================================================================

const ALLERGY_PATTERN = /(\d+)\./g;
const TRAILING_MARKERS = /[ #&*+,\-.=@_]+$/;
const NOTABLE_MARKER = "⭐";

/** Upstream reports this closure both as a schedule event and a lesson */
const SATURDAY_CLOSURE = "토요휴업일";

const NO_DATA_CODE = "INFO-200";
const TIMETABLE_PAGE_SIZE = 1000;
const TIMETABLE_MAX_PAGES = 50;

const GRADE_FLAGS = [
  ["ONE_GRADE_EVENT_YN", 1],
  ["TW_GRADE_EVENT_YN", 2],
  ["THREE_GRADE_EVENT_YN", 3],
  ["FR_GRADE_EVENT_YN", 4],
  ["FIV_GRADE_EVENT_YN", 5],
  ["SIX_GRADE_EVENT_YN", 6],
] as const;

// ============================================================================
// Types
// ============================================================================

export interface SchoolDataSource {
  fetchMeals(start: string, end: string): Promise<AdapterResult<MealRecord[]>>;
  fetchSchedules(
    start: string,
    end: string
  ): Promise<AdapterResult<ScheduleRecord[]>>;
  fetchTimetables(
    start: string,
    end: string
  ): Promise<AdapterResult<TimetableRecord[]>>;
}

export interface NeisOptions {
  apiKey: string;
  officeCode: string;
  schoolCode: string;
  timetableKind: TimetableKind;
  baseUrl: string;
  notableKeywords: string[];
}

// ============================================================================
// Keyword list
// ============================================================================

/**
 * Read the notable-menu keyword file, one keyword per line. A missing file
 * yields no keywords.
 */
export function loadNotableKeywords(path: string): string[] {
  if (!existsSync(path)) {
    httpLogger.debug({ path }, "Notable menu keyword file not found");
    return [];
  }
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Split one menu line into its display name and allergy codes.
 *
 * Codes are digits followed by a period (`5.`); only 1..18 count as
 * allergy codes, but every such marker is removed from the name.
 */
export function parseMenuLine(
  line: string,
  notableKeywords: readonly string[] = []
): MealMenuItem | null {
  const allergies: number[] = [];
  for (const match of line.matchAll(ALLERGY_PATTERN)) {
    const code = Number(match[1]);
    if (code >= 1 && code <= 18) {
      allergies.push(code);
    }
  }

  let name = line
    .replace(ALLERGY_PATTERN, "")
    .replaceAll("()", "")
    .trim()
    .replace(TRAILING_MARKERS, "");

  if (name === "") {
    return null;
  }
  if (notableKeywords.some((keyword) => name.includes(keyword))) {
    name = `${NOTABLE_MARKER}${name}`;
  }
  return { name, allergies };
}

/**
 * `"812.4 Kcal"` → `812.4`; anything else → `null`
 */
export function parseCalories(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const numeric = value.replaceAll(" Kcal", "").trim();
  if (numeric === "") {
    return null;
  }
  const parsed = Number(numeric);
  return Number.isFinite(parsed) ? parsed : null;
}

export function buildMealRecords(
  rows: readonly NeisMealRow[],
  notableKeywords: readonly string[] = []
): MealRecord[] {
  const records: MealRecord[] = [];

  for (const row of rows) {
    const date = fromCompactDate(row.MLSV_YMD);
    if (date === null) {
      httpLogger.warn({ value: row.MLSV_YMD }, "Skipping meal row with bad date");
      continue;
    }

    const rawMenu = row.DDISH_NM ?? "";
    const menus: MealMenuItem[] = [];
    for (const line of rawMenu.replaceAll("<br/>", "\n").split("\n")) {
      const item = parseMenuLine(line, notableKeywords);
      if (item !== null) {
        menus.push(item);
      }
    }

    records.push({
      date,
      menus,
      menusPlain: menus.map((item) => item.name),
      calories: parseCalories(row.CAL_INFO),
      sourceHash: createHash("sha256")
        .update(`${rawMenu}\n${row.CAL_INFO ?? ""}`)
        .digest("hex"),
    });
  }

  return records;
}

export function formatScheduleSummary(entries: readonly ScheduleEntry[]): string | null {
  const summary = entries
    .map((entry) =>
      entry.grades.length > 0
        ? `${entry.name}(${entry.grades.map((grade) => `${String(grade)}학년`).join(", ")})`
        : entry.name
    )
    .join("\n")
    .replaceAll("()", "");
  return summary === "" ? null : summary;
}

export function buildScheduleRecords(
  rows: readonly NeisScheduleRow[]
): ScheduleRecord[] {
  const grouped = new Map<string, ScheduleEntry[]>();

  for (const row of rows) {
    const name = row.EVENT_NM.trim();
    if (name === SATURDAY_CLOSURE) {
      continue;
    }
    const date = fromCompactDate(row.AA_YMD);
    if (date === null) {
      httpLogger.warn({ value: row.AA_YMD }, "Skipping schedule row with bad date");
      continue;
    }

    const grades = GRADE_FLAGS.filter(([flag]) => row[flag] === "Y").map(
      ([, grade]) => grade
    );

    const entries = grouped.get(date) ?? [];
    entries.push({ name, grades });
    grouped.set(date, entries);
  }

  return [...grouped.entries()].map(([date, entries]) => ({
    date,
    entries: entries.length > 0 ? entries : null,
    summary: formatScheduleSummary(entries),
  }));
}

function toInteger(value: string | number | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Accumulates paginated timetable rows into date → grade → class → subjects.
 */
export class TimetableAccumulator {
  private days = new Map<string, Map<number, Map<number, string[]>>>();

  add(row: NeisTimetableRow): boolean {
    const subject = row.ITRT_CNTNT;
    if (
      row.CLASS_NM === undefined ||
      row.CLASS_NM === null ||
      row.CLASS_NM === "" ||
      row.GRADE === undefined ||
      row.GRADE === null ||
      row.GRADE === "" ||
      subject === undefined ||
      subject === null ||
      subject === "" ||
      subject === SATURDAY_CLOSURE
    ) {
      return false;
    }

    const classNo = toInteger(row.CLASS_NM);
    const grade = toInteger(row.GRADE);
    const date = fromCompactDate(row.ALL_TI_YMD);
    // Grade and class numbers start at 1; zero means the field is unset
    if (!classNo || !grade || date === null) {
      return false;
    }

    let grades = this.days.get(date);
    if (!grades) {
      grades = new Map();
      this.days.set(date, grades);
    }
    let classes = grades.get(grade);
    if (!classes) {
      classes = new Map();
      grades.set(grade, classes);
    }
    const subjects = classes.get(classNo) ?? [];
    subjects.push(subject);
    classes.set(classNo, subjects);
    return true;
  }

  records(): TimetableRecord[] {
    return [...this.days.entries()].map(([date, grades]) => {
      const lessons: Lessons = {};
      for (const grade of [...grades.keys()].sort((a, b) => a - b)) {
        const classes = grades.get(grade) ?? new Map<number, string[]>();
        const classMap: Record<string, string[]> = {};
        for (const classNo of [...classes.keys()].sort((a, b) => a - b)) {
          classMap[String(classNo)] = classes.get(classNo) ?? [];
        }
        lessons[String(grade)] = classMap;
      }
      return { date, lessons };
    });
  }
}

/**
 * Fill a stored timetable out to every configured grade/class pair, so
 * absent classes read as empty lists.
 */
export function denseTimetable(
  lessons: Lessons | null | undefined,
  numGrades: number,
  numClasses: number
): Lessons {
  const dense: Lessons = {};
  for (let grade = 1; grade <= numGrades; grade++) {
    const stored = lessons?.[String(grade)] ?? {};
    const classes: Record<string, string[]> = {};
    for (let classNo = 1; classNo <= numClasses; classNo++) {
      classes[String(classNo)] = [...(stored[String(classNo)] ?? [])];
    }
    dense[String(grade)] = classes;
  }
  return dense;
}

// ============================================================================
// Payload helpers
// ============================================================================

/**
 * Pull the row list out of a NEIS service response.
 */
export function extractServiceRows(
  payload: unknown,
  service: string
): AdapterResult<unknown[]> {
  if (!Value.Check(JsonObjectSchema, payload)) {
    return malformed("response is not a JSON object");
  }

  const root = payload[service];
  if (root === undefined) {
    if (Value.Check(NeisResultSchema, payload)) {
      return payload.RESULT.CODE === NO_DATA_CODE
        ? empty()
        : malformed(
            `${payload.RESULT.CODE}: ${payload.RESULT.MESSAGE ?? "unknown result"}`
          );
    }
    return malformed(`missing ${service} section`);
  }

  if (!Value.Check(NeisServiceSchema, root)) {
    return malformed(`unexpected ${service} structure`);
  }

  const rows = root.flatMap((block) => block.row ?? []);
  return rows.length > 0 ? found(rows) : empty();
}

function validRows<T extends TSchema>(
  schema: T,
  rows: unknown[],
  service: string
): Static<T>[] {
  const valid = rows.filter((row): row is Static<T> => Value.Check(schema, row));
  if (valid.length < rows.length) {
    httpLogger.warn(
      { service, skipped: rows.length - valid.length },
      "Skipping rows with unexpected shape"
    );
  }
  return valid;
}

function logUnusable(
  service: string,
  result: { kind: "empty" } | { kind: "malformed"; reason: string }
): void {
  if (result.kind === "malformed") {
    httpLogger.warn({ service, reason: result.reason }, "Malformed NEIS payload");
  } else {
    httpLogger.debug({ service }, "NEIS returned no rows");
  }
}

// ============================================================================
// Adapter
// ============================================================================

export class NeisAdapter implements SchoolDataSource {
  constructor(
    private http: HttpClient,
    private options: NeisOptions
  ) {}

  private commonParams(): Record<string, string> {
    return {
      KEY: this.options.apiKey,
      Type: "json",
      ATPT_OFCDC_SC_CODE: this.options.officeCode,
      SD_SCHUL_CODE: this.options.schoolCode,
    };
  }

  private get(
    service: string,
    params: Record<string, string>,
    label: string
  ): Promise<unknown> {
    return this.http.getJson(`${this.options.baseUrl}/${service}`, {
      params: { ...this.commonParams(), ...params },
      timeoutMs: 10_000,
      retries: 2,
      backoffSeconds: 0.5,
      label,
    });
  }

  async fetchMeals(
    start: string,
    end: string
  ): Promise<AdapterResult<MealRecord[]>> {
    const service = "mealServiceDietInfo";
    const payload = await this.get(
      service,
      {
        MMEAL_SC_CODE: "2",
        MLSV_FROM_YMD: toCompactDate(start),
        MLSV_TO_YMD: toCompactDate(end),
      },
      "neis.meals"
    );

    const rows = extractServiceRows(payload, service);
    if (rows.kind !== "found") {
      logUnusable(service, rows);
      return rows;
    }

    const records = buildMealRecords(
      validRows(NeisMealRowSchema, rows.value, service),
      this.options.notableKeywords
    );
    return records.length > 0 ? found(records) : empty();
  }

  async fetchSchedules(
    start: string,
    end: string
  ): Promise<AdapterResult<ScheduleRecord[]>> {
    const service = "SchoolSchedule";
    const payload = await this.get(
      service,
      { AA_FROM_YMD: toCompactDate(start), AA_TO_YMD: toCompactDate(end) },
      "neis.schedule"
    );

    const rows = extractServiceRows(payload, service);
    if (rows.kind !== "found") {
      logUnusable(service, rows);
      return rows;
    }

    const records = buildScheduleRecords(
      validRows(NeisScheduleRowSchema, rows.value, service)
    );
    return records.length > 0 ? found(records) : empty();
  }

  async fetchTimetables(
    start: string,
    end: string
  ): Promise<AdapterResult<TimetableRecord[]>> {
    const service = `${this.options.timetableKind}Timetable`;
    const accumulator = new TimetableAccumulator();

    for (let page = 1; page <= TIMETABLE_MAX_PAGES; page++) {
      const payload = await this.get(
        service,
        {
          pSize: String(TIMETABLE_PAGE_SIZE),
          pIndex: String(page),
          TI_FROM_YMD: toCompactDate(start),
          TI_TO_YMD: toCompactDate(end),
        },
        "neis.timetable"
      );

      const rows = extractServiceRows(payload, service);
      if (rows.kind !== "found") {
        // A bad first page means nothing usable; a bad later page ends paging
        if (page === 1) {
          logUnusable(service, rows);
          return rows;
        }
        if (rows.kind === "malformed") {
          logUnusable(service, rows);
        }
        break;
      }

      for (const row of validRows(NeisTimetableRowSchema, rows.value, service)) {
        accumulator.add(row);
      }

      if (rows.value.length < TIMETABLE_PAGE_SIZE) {
        break;
      }
      if (page === TIMETABLE_MAX_PAGES) {
        httpLogger.warn(
          { service, pages: page },
          "Timetable page limit reached, stopping"
        );
      }
    }

    const records = accumulator.records();
    return records.length > 0 ? found(records) : empty();
  }
}
