import Database, { type Database as DatabaseType } from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger";
import { runMigrations } from "./migrations";

const DEFAULT_POOL_SIZE = 4;
const MEMORY_PATH = ":memory:";

class ConnectionPool {
  private connections: DatabaseType[] = [];
  private available: DatabaseType[] = [];
  private initialized = false;

  constructor(
    private readonly dbPath: string,
    private readonly maxSize: number,
  ) {}

  initialize(): void {
    if (this.initialized) {
      return;
    }

    for (let i = 0; i < this.maxSize; i++) {
      const conn = new Database(this.dbPath);
      this.setupConnection(conn);
      this.connections.push(conn);
      this.available.push(conn);
    }

    const primary = this.connections[0];
    if (primary) {
      runMigrations(primary);
    }
    this.initialized = true;
    logger.info({ poolSize: this.maxSize, dbPath: this.dbPath }, "Database connection pool ready");
  }

  private setupConnection(conn: DatabaseType): void {
    if (this.dbPath !== MEMORY_PATH) {
      conn.pragma("journal_mode = WAL");
    }
    conn.pragma("synchronous = NORMAL");
    conn.pragma("foreign_keys = ON");
    conn.pragma("busy_timeout = 5000");
  }

  acquire(): DatabaseType {
    if (!this.initialized) {
      throw new Error("Connection pool not initialized");
    }
    const conn = this.available.pop();
    if (conn) {
      return conn;
    }
    const fallback = this.connections[0];
    if (!fallback) {
      throw new Error("Connection pool is empty");
    }
    logger.warn("All database connections in use, reusing primary connection with busy timeout");
    return fallback;
  }

  release(conn: DatabaseType): void {
    if (!this.connections.includes(conn) || this.available.includes(conn)) {
      return;
    }
    this.available.push(conn);
  }

  close(): void {
    for (const conn of this.connections) {
      conn.close();
    }
    this.connections = [];
    this.available = [];
    this.initialized = false;
  }
}

let pool: ConnectionPool | null = null;

export function isDbInitialized(): boolean {
  return pool !== null;
}

/**
 * Opens the database and runs migrations. An in-memory database is only
 * visible to the connection that created it, so it always gets a pool of one.
 */
export function initDb(path: string, poolSize: number = DEFAULT_POOL_SIZE): void {
  if (pool) {
    pool.close();
    pool = null;
  }

  if (path !== MEMORY_PATH) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  pool = new ConnectionPool(path, path === MEMORY_PATH ? 1 : Math.max(1, poolSize));
  pool.initialize();
}

export function withConnection<T>(fn: (conn: DatabaseType) => T): T {
  if (!pool) {
    throw new Error("Database not initialized");
  }
  const conn = pool.acquire();
  try {
    return fn(conn);
  } finally {
    pool.release(conn);
  }
}

export function closeDb(): void {
  pool?.close();
  pool = null;
}
