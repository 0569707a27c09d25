import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";
import type { AppConfig } from "../config.js";

const { Pool } = pg;

// ============================================================================
// Types
// ============================================================================

export type DialectName = "postgres" | "sqlite";

/**
 * The process-wide database handle. Built once at startup and passed to
 * every component that needs it.
 */
export interface DatabaseHandle {
  db: Kysely<Database>;
  dialect: DialectName;
  /** Connection target for display, password masked */
  target: string;
  close(): Promise<void>;
}

// ============================================================================
// Construction
// ============================================================================

function createPostgres(url: string): DatabaseHandle {
  const poolConfig: pg.PoolConfig = {
    connectionString: url,
    max: 20, // Maximum pool connections
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  };
  const pool = new Pool(poolConfig);
  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle PostgreSQL client error");
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return {
    db,
    dialect: "postgres",
    target: maskDatabaseUrl(url),
    // db.destroy() also ends the pool
    close: () => db.destroy(),
  };
}

function createSqlite(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(path) }),
  });

  return {
    db,
    dialect: "sqlite",
    target: path,
    close: () => db.destroy(),
  };
}

/**
 * PostgreSQL when a `DATABASE_URL` is configured, otherwise a SQLite file.
 */
export function createDatabase(config: AppConfig["database"]): DatabaseHandle {
  const handle =
    config.url !== undefined
      ? createPostgres(config.url)
      : createSqlite(config.sqlitePath);

  dbLogger.debug(
    { dialect: handle.dialect, target: handle.target },
    "Database handle created"
  );
  return handle;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database connection check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(handle: DatabaseHandle): Promise<void> {
  try {
    await handle.close();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get a database URL for display, with password masked
 */
export function maskDatabaseUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.password !== "") {
    parsed.password = "****";
  }
  return parsed.toString();
}
