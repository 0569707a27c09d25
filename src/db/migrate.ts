import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database, TableName } from "./types.js";

// ============================================================================
// Schema
// ============================================================================

export const TABLES: readonly TableName[] = [
  "meals",
  "schedules",
  "timetables",
  "weather_snapshots",
  "water_temperatures",
];

/**
 * Create tables and indexes if they do not exist yet. Primary keys carry the
 * one-record-per-key guarantee for each category.
 */
export async function createSchema(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("meals")
    .ifNotExists()
    .addColumn("date", "text", (col) => col.primaryKey())
    .addColumn("day_start", "text", (col) => col.notNull())
    .addColumn("menus", "text", (col) => col.notNull())
    .addColumn("menus_plain", "text", (col) => col.notNull())
    .addColumn("calories", "double precision")
    .addColumn("source_hash", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("schedules")
    .ifNotExists()
    .addColumn("date", "text", (col) => col.primaryKey())
    .addColumn("day_start", "text", (col) => col.notNull())
    .addColumn("entries", "text")
    .addColumn("summary", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("timetables")
    .ifNotExists()
    .addColumn("date", "text", (col) => col.primaryKey())
    .addColumn("day_start", "text", (col) => col.notNull())
    .addColumn("lessons", "text", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("weather_snapshots")
    .ifNotExists()
    .addColumn("observed_at", "text", (col) => col.primaryKey())
    .addColumn("temperature", "double precision")
    .addColumn("temperature_min", "double precision")
    .addColumn("temperature_max", "double precision")
    .addColumn("sky", "text", (col) => col.notNull())
    .addColumn("precipitation_type", "text", (col) => col.notNull())
    .addColumn("precipitation_probability", "double precision")
    .addColumn("humidity", "double precision")
    .addColumn("first_hour", "integer", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("water_temperatures")
    .ifNotExists()
    .addColumn("observed_at", "text", (col) => col.primaryKey())
    .addColumn("temperature_c", "double precision", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  for (const table of ["meals", "schedules", "timetables"] as const) {
    await db.schema
      .createIndex(`${table}_day_start_idx`)
      .ifNotExists()
      .on(table)
      .column("day_start")
      .execute();
  }
}

// ============================================================================
// One-shot initializer
// ============================================================================

/**
 * Runs {@link createSchema} once per process. Concurrent first callers share
 * the same in-flight run; a failed run is forgotten so the next caller
 * retries. Once ready, `ensure()` resolves without touching the database.
 */
export class SchemaInitializer {
  private ready = false;
  private pending: Promise<void> | null = null;

  constructor(
    private db: Kysely<Database>,
    private migrate: (db: Kysely<Database>) => Promise<void> = createSchema
  ) {}

  get isReady(): boolean {
    return this.ready;
  }

  ensure(): Promise<void> {
    if (this.ready) {
      return Promise.resolve();
    }
    this.pending ??= this.run();
    return this.pending;
  }

  private async run(): Promise<void> {
    try {
      await this.migrate(this.db);
      this.ready = true;
      dbLogger.info({ tables: TABLES.length }, "Database schema ready");
    } catch (error) {
      dbLogger.error({ error }, "Schema initialization failed");
      throw error;
    } finally {
      this.pending = null;
    }
  }
}

// ============================================================================
// Statistics
// ============================================================================

export interface TableStats {
  table_name: TableName;
  row_count: number;
}

/**
 * Row counts per table, for the CLI
 */
export async function getTableStats(db: Kysely<Database>): Promise<TableStats[]> {
  const stats: TableStats[] = [];
  for (const table of TABLES) {
    const result = await db
      .selectFrom(table)
      .select(sql<number>`count(*)`.as("count"))
      .executeTakeFirst();
    stats.push({ table_name: table, row_count: Number(result?.count ?? 0) });
  }
  return stats;
}
