/**
 * Schema bootstrap (idempotent - safe to call on every startup).
 *
 * Mirrors schema.ts. There is no migration tooling; new columns need a
 * matching statement here.
 */

import { type Client } from "@libsql/client";
import { logger } from "../middleware/logging.js";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    platform_user_id TEXT NOT NULL UNIQUE,
    chat_id TEXT NOT NULL,
    display_name TEXT,
    api_key TEXT NOT NULL UNIQUE,
    created_at INTEGER NOT NULL,
    last_active INTEGER NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    is_muted INTEGER NOT NULL DEFAULT 0,
    message_count INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS users_api_key_idx ON users(api_key);

  CREATE TABLE IF NOT EXISTS processes (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    external_id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'started',
    started_at INTEGER NOT NULL,
    ended_at INTEGER,
    last_heartbeat_at INTEGER,
    metadata TEXT,
    parent_process_id TEXT
  );
  CREATE INDEX IF NOT EXISTS processes_user_id_idx ON processes(user_id);
  CREATE INDEX IF NOT EXISTS processes_external_id_idx ON processes(external_id);

  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    process_id TEXT REFERENCES processes(id),
    kind TEXT NOT NULL DEFAULT 'message',
    message TEXT NOT NULL,
    metadata TEXT,
    created_at INTEGER NOT NULL,
    delivered INTEGER NOT NULL DEFAULT 0,
    delivered_at INTEGER
  );
  CREATE INDEX IF NOT EXISTS notifications_user_id_idx ON notifications(user_id);
  CREATE INDEX IF NOT EXISTS notifications_process_id_idx ON notifications(process_id);
`;

export async function initializeSchema(client: Client): Promise<void> {
  try {
    await client.executeMultiple(SCHEMA_SQL);
    logger.info("Database schema initialized");
  } catch (error) {
    logger.error("Failed to initialize database schema", error as Error);
    throw error;
  }
}
