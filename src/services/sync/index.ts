// Sync Services - Re-exports
export {
  SyncOrchestrator,
  fetchSchoolData,
  type SchoolData,
  type SyncRangeResult,
  type SyncSources,
  type SyncWindowOptions,
} from "./orchestrator.js";
export {
  BackgroundTasks,
  FreshnessGuard,
  DEFAULT_DATE_MAX_WAIT_MS,
  DEFAULT_SNAPSHOT_MAX_WAIT_MS,
  type FreshnessOptions,
} from "./freshness.js";
export { PeriodicRefresher, type RefresherOptions } from "./refresher.js";
export {
  checkCacheHealth,
  type CacheHealth,
  type CacheHealthLimits,
  type CacheStatus,
} from "./health.js";
