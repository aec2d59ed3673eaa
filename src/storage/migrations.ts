import type { Database as DatabaseType } from "better-sqlite3";
import { logger } from "../logger";

const SCHEMA_VERSION = 1;

export function runMigrations(conn: DatabaseType): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS bindings (
      agent_id TEXT NOT NULL,
      platform TEXT NOT NULL CHECK (platform IN ('discord', 'telegram')),
      credentials_json TEXT NOT NULL,
      desired_state TEXT NOT NULL CHECK (desired_state IN ('enabled', 'disabled')),
      version INTEGER NOT NULL,
      deleted INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (agent_id, platform)
    );
  `);

  conn.exec(`
    CREATE TABLE IF NOT EXISTS dead_letters (
      id TEXT PRIMARY KEY,
      agent_id TEXT NOT NULL,
      platform TEXT NOT NULL,
      external_chat_id TEXT NOT NULL,
      external_message_id TEXT NOT NULL,
      envelope_json TEXT NOT NULL,
      reason TEXT NOT NULL,
      attempts INTEGER NOT NULL,
      last_error TEXT,
      created_at TEXT NOT NULL
    );
  `);

  conn.exec(
    `CREATE INDEX IF NOT EXISTS idx_dead_letters_agent ON dead_letters (agent_id, platform, created_at)`,
  );

  const current = conn.pragma("user_version", { simple: true });
  if (typeof current === "number" && current < SCHEMA_VERSION) {
    conn.pragma(`user_version = ${SCHEMA_VERSION}`);
    logger.info({ from: current, to: SCHEMA_VERSION }, "Database schema migrated");
  }
}
