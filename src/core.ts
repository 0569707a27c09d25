/**
 * Process context: one database handle, store, orchestrator, guard,
 * background supervisor and refresher, built at startup and closed together.
 */

import { closeDatabase, createDatabase, type DatabaseHandle } from "./db/connection.js";
import { SchemaInitializer } from "./db/migrate.js";
import { logger } from "./logger.js";
import { HttpClient } from "./scraper/client.js";
import {
  NeisAdapter,
  denseTimetable,
  loadNotableKeywords,
} from "./scraper/neis.js";
import { WaterTemperatureAdapter } from "./scraper/water.js";
import { WeatherAdapter } from "./scraper/weather.js";
import { CanonicalStore } from "./services/store/index.js";
import {
  BackgroundTasks,
  FreshnessGuard,
  PeriodicRefresher,
  SyncOrchestrator,
  checkCacheHealth,
  type CacheHealth,
  type SyncSources,
} from "./services/sync/index.js";

import type { AppConfig } from "./config.js";
import type { Lessons } from "./types/index.js";

export interface CoreDeps {
  /** Defaults to a handle built from `config.database` */
  database?: DatabaseHandle;
  /** Defaults to the NEIS, KMA and Seoul adapters over one HTTP client */
  sources?: Partial<SyncSources>;
  http?: HttpClient;
  clock?: () => Date;
}

export interface Core {
  config: AppConfig;
  database: DatabaseHandle;
  schema: SchemaInitializer;
  store: CanonicalStore;
  orchestrator: SyncOrchestrator;
  guard: FreshnessGuard;
  background: BackgroundTasks;
  refresher: PeriodicRefresher;

  syncRange: SyncOrchestrator["syncRange"];
  syncWindow: SyncOrchestrator["syncWindow"];
  syncWeather: SyncOrchestrator["syncWeather"];
  syncWaterTemperature: SyncOrchestrator["syncWaterTemperature"];

  getMeal: CanonicalStore["getMeal"];
  getSchedule: CanonicalStore["getSchedule"];
  getTimetable: CanonicalStore["getTimetable"];
  getMealsInRange: CanonicalStore["getMealsInRange"];
  getSchedulesInRange: CanonicalStore["getSchedulesInRange"];
  getTimetablesInRange: CanonicalStore["getTimetablesInRange"];
  getWeatherRecent: CanonicalStore["getWeatherRecent"];
  getWaterTemperatureRecent: CanonicalStore["getWaterTemperatureRecent"];

  ensureFresh: FreshnessGuard["ensureFresh"];
  checkCacheHealth(now?: Date): Promise<CacheHealth>;
  /** Stored lessons padded out to every configured grade and class */
  denseTimetable(lessons: Lessons | null): Lessons;
  startRefresher(): void;
  close(): Promise<void>;
}

function defaultSources(config: AppConfig, http: HttpClient): SyncSources {
  return {
    school: new NeisAdapter(http, {
      apiKey: config.neis.apiKey,
      officeCode: config.neis.officeCode,
      schoolCode: config.neis.schoolCode,
      timetableKind: config.neis.timetableKind,
      baseUrl: config.neis.baseUrl,
      notableKeywords: loadNotableKeywords(config.neis.notableMenuFile),
    }),
    weather: new WeatherAdapter(http, config.weather),
    water: new WaterTemperatureAdapter(http, config.water),
  };
}

export function createCore(config: AppConfig, deps: CoreDeps = {}): Core {
  const clock = deps.clock ?? (() => new Date());
  const database = deps.database ?? createDatabase(config.database);
  const http = deps.http ?? new HttpClient();

  const sources: SyncSources = {
    ...defaultSources(config, http),
    ...deps.sources,
  };

  const schema = new SchemaInitializer(database.db);
  const store = new CanonicalStore(database.db, schema, clock);
  const orchestrator = new SyncOrchestrator(store, sources, clock, {
    daysBefore: config.refresh.daysBefore,
    daysAfter: config.refresh.daysAfter,
  });
  const background = new BackgroundTasks(
    config.freshness.backgroundTaskLimit
  );
  const guard = new FreshnessGuard(
    store,
    orchestrator,
    background,
    {
      weatherMaxAgeMs: config.freshness.weatherMaxAgeMs,
      waterMaxAgeMs: config.freshness.waterMaxAgeMs,
    },
    clock
  );
  const refresher = new PeriodicRefresher({
    name: "school-window",
    intervalMs: config.refresh.intervalMs,
    task: () => orchestrator.syncWindow(),
  });

  let closing: Promise<void> | null = null;

  return {
    config,
    database,
    schema,
    store,
    orchestrator,
    guard,
    background,
    refresher,

    syncRange: (start, end) => orchestrator.syncRange(start, end),
    syncWindow: (options) => orchestrator.syncWindow(options),
    syncWeather: () => orchestrator.syncWeather(),
    syncWaterTemperature: () => orchestrator.syncWaterTemperature(),

    getMeal: (date) => store.getMeal(date),
    getSchedule: (date) => store.getSchedule(date),
    getTimetable: (date) => store.getTimetable(date),
    getMealsInRange: (start, end) => store.getMealsInRange(start, end),
    getSchedulesInRange: (start, end) => store.getSchedulesInRange(start, end),
    getTimetablesInRange: (start, end) =>
      store.getTimetablesInRange(start, end),
    getWeatherRecent: () => store.getWeatherRecent(),
    getWaterTemperatureRecent: () => store.getWaterTemperatureRecent(),

    ensureFresh: guard.ensureFresh.bind(guard),
    checkCacheHealth: (now) =>
      checkCacheHealth(
        store,
        {
          timetableMaxAgeMs: config.freshness.timetableMaxAgeMs,
          weatherMaxAgeMs: config.freshness.weatherMaxAgeMs,
          waterMaxAgeMs: config.freshness.waterMaxAgeMs,
        },
        now ?? clock()
      ),
    denseTimetable: (lessons) =>
      denseTimetable(lessons, config.neis.numGrades, config.neis.numClasses),
    startRefresher: () => {
      refresher.start();
    },
    close: () => {
      closing ??= (async () => {
        await refresher.stop();
        await background.drain();
        await closeDatabase(database);
        logger.debug("Core closed");
      })();
      return closing;
    },
  };
}
