import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Environment Schema
// ============================================================================

const TimetableKindSchema = Type.Union(
  [Type.Literal("els"), Type.Literal("mis"), Type.Literal("his")],
  { default: "his" }
);

export type TimetableKind = Static<typeof TimetableKindSchema>;

/**
 * Environment variables read by the application. Values arrive as strings and
 * are converted to the declared types before validation.
 */
export const EnvSchema = Type.Object({
  DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  DB_PATH: Type.String({ default: "./data/campus-feed.db" }),

  NEIS_API_KEY: Type.String({ default: "" }),
  NEIS_OFFICE_CODE: Type.String({ default: "" }),
  NEIS_SCHOOL_CODE: Type.String({ default: "" }),
  NEIS_TIMETABLE_KIND: TimetableKindSchema,
  NEIS_BASE_URL: Type.String({ default: "https://open.neis.go.kr/hub" }),
  NUM_OF_GRADES: Type.Integer({ minimum: 1, maximum: 12, default: 3 }),
  NUM_OF_CLASSES: Type.Integer({ minimum: 1, maximum: 40, default: 10 }),

  KMA_API_KEY: Type.String({ default: "" }),
  KMA_NX: Type.Integer({ default: 60 }),
  KMA_NY: Type.Integer({ default: 127 }),
  KMA_BASE_URL: Type.String({
    default:
      "https://apis.data.go.kr/1360000/VilageFcstInfoService_2.0/getVilageFcst",
  }),

  SEOUL_DATA_TOKEN: Type.String({ default: "" }),
  SEOUL_DATA_BASE_URL: Type.String({
    default: "http://openapi.seoul.go.kr:8088",
  }),

  NOTABLE_MENU_FILE: Type.String({ default: "data/notable-menus.txt" }),

  // Node timers overflow past 2^31 - 1 ms (about 35 791 minutes)
  REFRESH_INTERVAL_MINUTES: Type.Number({
    exclusiveMinimum: 0,
    maximum: 35_000,
    default: 180,
  }),
  REFRESH_DAYS_BEFORE: Type.Integer({ minimum: 0, default: 10 }),
  REFRESH_DAYS_AFTER: Type.Integer({ minimum: 0, default: 10 }),

  WEATHER_MAX_AGE_MINUTES: Type.Number({ exclusiveMinimum: 0, default: 60 }),
  WATER_MAX_AGE_MINUTES: Type.Number({ exclusiveMinimum: 0, default: 76 }),
  TIMETABLE_MAX_AGE_HOURS: Type.Number({ exclusiveMinimum: 0, default: 3 }),

  BACKGROUND_TASK_LIMIT: Type.Integer({ minimum: 1, default: 32 }),
});

export type Env = Static<typeof EnvSchema>;

// ============================================================================
// Application Config
// ============================================================================

export interface AppConfig {
  database: { url?: string; sqlitePath: string };
  neis: {
    apiKey: string;
    officeCode: string;
    schoolCode: string;
    timetableKind: TimetableKind;
    baseUrl: string;
    numGrades: number;
    numClasses: number;
    notableMenuFile: string;
  };
  weather: { apiKey: string; nx: number; ny: number; baseUrl: string };
  water: { token: string; baseUrl: string };
  refresh: { intervalMs: number; daysBefore: number; daysAfter: number };
  freshness: {
    weatherMaxAgeMs: number;
    waterMaxAgeMs: number;
    timetableMaxAgeMs: number;
    backgroundTaskLimit: number;
  };
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Build the application config from an environment map.
 *
 * Empty strings are treated as unset so `.env` placeholders fall back to
 * defaults. Throws {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));

  if (!Value.Check(EnvSchema, candidate)) {
    const issues = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.slice(1) || "(root)"}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  return toAppConfig(candidate);
}

function toAppConfig(env: Env): AppConfig {
  return {
    database: { url: env.DATABASE_URL, sqlitePath: env.DB_PATH },
    neis: {
      apiKey: env.NEIS_API_KEY,
      officeCode: env.NEIS_OFFICE_CODE,
      schoolCode: env.NEIS_SCHOOL_CODE,
      timetableKind: env.NEIS_TIMETABLE_KIND,
      baseUrl: env.NEIS_BASE_URL,
      numGrades: env.NUM_OF_GRADES,
      numClasses: env.NUM_OF_CLASSES,
      notableMenuFile: env.NOTABLE_MENU_FILE,
    },
    weather: {
      apiKey: env.KMA_API_KEY,
      nx: env.KMA_NX,
      ny: env.KMA_NY,
      baseUrl: env.KMA_BASE_URL,
    },
    water: { token: env.SEOUL_DATA_TOKEN, baseUrl: env.SEOUL_DATA_BASE_URL },
    refresh: {
      intervalMs: env.REFRESH_INTERVAL_MINUTES * MINUTE_MS,
      daysBefore: env.REFRESH_DAYS_BEFORE,
      daysAfter: env.REFRESH_DAYS_AFTER,
    },
    freshness: {
      weatherMaxAgeMs: env.WEATHER_MAX_AGE_MINUTES * MINUTE_MS,
      waterMaxAgeMs: env.WATER_MAX_AGE_MINUTES * MINUTE_MS,
      timetableMaxAgeMs: env.TIMETABLE_MAX_AGE_HOURS * HOUR_MS,
      backgroundTaskLimit: env.BACKGROUND_TASK_LIMIT,
    },
  };
}
