export { createCore, type Core, type CoreDeps } from "./core.js";
export { loadConfig, type AppConfig, type TimetableKind } from "./config.js";
export {
  ConfigError,
  FetchError,
  StoreError,
  SyncError,
  isTransientSyncFailure,
} from "./errors.js";
export { logger } from "./logger.js";

export {
  HttpClient,
  computeRetryDelay,
  type GetJsonOptions,
  type HttpClientDeps,
} from "./scraper/client.js";
export {
  NeisAdapter,
  denseTimetable,
  parseMenuLine,
  type SchoolDataSource,
} from "./scraper/neis.js";
export { WeatherAdapter, type WeatherSource } from "./scraper/weather.js";
export {
  WaterTemperatureAdapter,
  type WaterTemperatureSource,
} from "./scraper/water.js";

export { createDatabase, type DatabaseHandle } from "./db/connection.js";
export { SchemaInitializer, createSchema } from "./db/migrate.js";
export { CanonicalStore } from "./services/store/index.js";
export * from "./services/sync/index.js";
export * from "./types/index.js";
