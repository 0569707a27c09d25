/**
 * Freshness Guard - serve fresh, else refresh within a deadline, else serve
 * what is cached and finish the refresh in the background.
 */

import { errorMessage, isTransientSyncFailure } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { isDateKey } from "../../utils/time.js";

import type { SyncOrchestrator } from "./orchestrator.js";
import type {
  Category,
  CategoryRecordMap,
  StoredMeal,
  StoredSchedule,
  StoredTimetable,
  StoredWaterTemperature,
  StoredWeather,
} from "../../types/index.js";
import type { CanonicalStore } from "../store/canonical-store.js";

const log = syncLogger.child({ component: "freshness" });

export const DEFAULT_DATE_MAX_WAIT_MS = 3000;
export const DEFAULT_SNAPSHOT_MAX_WAIT_MS = 2000;

// ============================================================================
// Background supervisor
// ============================================================================

/**
 * Owns unattended sync work. At most one spawned task runs per key, and no
 * more than `maxTasks` run at once; failures are logged here so no task
 * rejects unobserved.
 */
export class BackgroundTasks {
  private byKey = new Map<string, Promise<void>>();
  private inFlight = new Set<Promise<void>>();

  constructor(private maxTasks: number) {}

  get size(): number {
    return this.inFlight.size;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  /**
   * Start `factory` under `key` unless a task for the key is already
   * running (that task is returned) or the supervisor is full (`null`).
   */
  spawn(key: string, factory: () => Promise<unknown>): Promise<void> | null {
    const existing = this.byKey.get(key);
    if (existing) {
      return existing;
    }
    if (this.inFlight.size >= this.maxTasks) {
      log.warn(
        { key, limit: this.maxTasks },
        "Background task limit reached, not spawning"
      );
      return null;
    }

    let started: Promise<unknown>;
    try {
      started = factory();
    } catch (error) {
      started = Promise.reject(error);
    }
    return this.track(key, started);
  }

  /**
   * Take over a promise that is already running. It is tracked even past the
   * task limit, since it cannot be stopped.
   */
  adopt(key: string, running: Promise<unknown>): Promise<void> {
    return this.track(key, running);
  }

  /** Wait for every tracked task to settle */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private track(key: string, running: Promise<unknown>): Promise<void> {
    const startedAt = Date.now();
    const task: Promise<void> = running.then(
      () => {
        log.debug({ key, durationMs: Date.now() - startedAt }, "Background task done");
      },
      (error: unknown) => {
        log.error({ key, error }, "Background task failed");
      }
    );

    this.inFlight.add(task);
    if (!this.byKey.has(key)) {
      this.byKey.set(key, task);
    }

    void task.finally(() => {
      this.inFlight.delete(task);
      if (this.byKey.get(key) === task) {
        this.byKey.delete(key);
      }
    });
    return task;
  }
}

// ============================================================================
// Guard
// ============================================================================

export interface FreshnessOptions {
  weatherMaxAgeMs: number;
  waterMaxAgeMs: number;
  dateMaxWaitMs?: number;
  snapshotMaxWaitMs?: number;
}

interface GuardPlan<T> {
  category: Category;
  /** Supervisor key; categories refreshed by the same sync share it */
  taskKey: string;
  maxWaitMs: number;
  read: () => Promise<T | null>;
  isFresh: (record: T) => boolean;
  sync: () => Promise<unknown>;
}

type RefreshOutcome =
  | { status: "done" }
  | { status: "failed"; error: unknown }
  | { status: "timeout" };

export class FreshnessGuard {
  constructor(
    private store: CanonicalStore,
    private orchestrator: SyncOrchestrator,
    private background: BackgroundTasks,
    private options: FreshnessOptions,
    private clock: () => Date = () => new Date()
  ) {}

  ensureFresh(
    category: "meal",
    key: string,
    maxWaitMs?: number
  ): Promise<StoredMeal | null>;
  ensureFresh(
    category: "schedule",
    key: string,
    maxWaitMs?: number
  ): Promise<StoredSchedule | null>;
  ensureFresh(
    category: "timetable",
    key: string,
    maxWaitMs?: number
  ): Promise<StoredTimetable | null>;
  ensureFresh(
    category: "weather",
    key?: string,
    maxWaitMs?: number
  ): Promise<StoredWeather | null>;
  ensureFresh(
    category: "water",
    key?: string,
    maxWaitMs?: number
  ): Promise<StoredWaterTemperature | null>;
  ensureFresh(
    category: Category,
    key?: string,
    maxWaitMs?: number
  ): Promise<CategoryRecordMap[Category] | null>;
  async ensureFresh(
    category: Category,
    key?: string,
    maxWaitMs?: number
  ): Promise<CategoryRecordMap[Category] | null> {
    switch (category) {
      case "meal":
        return this.guard(
          this.datePlan(category, key, maxWaitMs, (date) =>
            this.store.getMeal(date)
          )
        );
      case "schedule":
        return this.guard(
          this.datePlan(category, key, maxWaitMs, (date) =>
            this.store.getSchedule(date)
          )
        );
      case "timetable":
        return this.guard(
          this.datePlan(category, key, maxWaitMs, (date) =>
            this.store.getTimetable(date)
          )
        );
      case "weather":
        return this.guard({
          category,
          taskKey: "weather",
          maxWaitMs:
            maxWaitMs ??
            this.options.snapshotMaxWaitMs ??
            DEFAULT_SNAPSHOT_MAX_WAIT_MS,
          read: () => this.store.getWeatherRecent(),
          isFresh: (record) =>
            this.withinAge(record.timestamp, this.options.weatherMaxAgeMs),
          sync: () => this.orchestrator.syncWeather(),
        });
      case "water":
        return this.guard({
          category,
          taskKey: "water",
          maxWaitMs:
            maxWaitMs ??
            this.options.snapshotMaxWaitMs ??
            DEFAULT_SNAPSHOT_MAX_WAIT_MS,
          read: () => this.store.getWaterTemperatureRecent(),
          isFresh: (record) =>
            this.withinAge(record.timestamp, this.options.waterMaxAgeMs),
          sync: () => this.orchestrator.syncWaterTemperature(),
        });
    }
  }

  private datePlan<T>(
    category: Category,
    key: string | undefined,
    maxWaitMs: number | undefined,
    read: (date: string) => Promise<T | null>
  ): GuardPlan<T> {
    if (key === undefined || !isDateKey(key)) {
      throw new TypeError(
        `${category} requires a YYYY-MM-DD key, got ${String(key)}`
      );
    }
    return {
      category,
      // meals, schedules and timetables of one day come from one sync
      taskKey: `school:${key}`,
      maxWaitMs:
        maxWaitMs ?? this.options.dateMaxWaitMs ?? DEFAULT_DATE_MAX_WAIT_MS,
      read: () => read(key),
      isFresh: () => true,
      sync: () => this.orchestrator.syncRange(key, key),
    };
  }

  private withinAge(timestamp: Date, maxAgeMs: number): boolean {
    return this.clock().getTime() - timestamp.getTime() <= maxAgeMs;
  }

  private async guard<T>(plan: GuardPlan<T>): Promise<T | null> {
    const before = await plan.read();
    if (before !== null && plan.isFresh(before)) {
      return before;
    }

    const refresh = plan.sync();
    const outcome = await this.raceDeadline(refresh, plan.maxWaitMs);

    switch (outcome.status) {
      case "done":
        return plan.read();

      case "timeout":
        log.warn(
          {
            category: plan.category,
            key: plan.taskKey,
            maxWaitMs: plan.maxWaitMs,
          },
          "Refresh exceeded deadline, continuing in background"
        );
        void this.background.adopt(plan.taskKey, refresh);
        return before;

      case "failed":
        if (isTransientSyncFailure(outcome.error)) {
          log.warn(
            {
              category: plan.category,
              key: plan.taskKey,
              reason: errorMessage(outcome.error),
            },
            "Refresh failed transiently, retrying in background"
          );
          void this.background.spawn(plan.taskKey, plan.sync);
        } else {
          log.error(
            { category: plan.category, key: plan.taskKey, error: outcome.error },
            "Refresh failed"
          );
        }
        return before;
    }
  }

  private async raceDeadline(
    refresh: Promise<unknown>,
    maxWaitMs: number
  ): Promise<RefreshOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const settled = refresh.then(
      (): RefreshOutcome => ({ status: "done" }),
      (error: unknown): RefreshOutcome => ({ status: "failed", error })
    );
    const deadline = new Promise<RefreshOutcome>((resolve) => {
      timer = setTimeout(() => {
        resolve({ status: "timeout" });
      }, maxWaitMs);
    });

    try {
      return await Promise.race([settled, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
