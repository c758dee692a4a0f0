import { drizzle } from "drizzle-orm/libsql";
import { createClient, type Client } from "@libsql/client";
import * as schema from "./schema.js";
import { getDatabaseUrl } from "../config/app.js";

// Lazy initialization: env vars must be read at call time, not import time,
// so tests can point DATABASE_URL at an in-memory database first.
let _client: Client | null = null;
function getClient(): Client {
  if (!_client) {
    _client = createClient({ url: getDatabaseUrl() });
  }
  return _client;
}

type DbType = ReturnType<typeof drizzle<typeof schema>>;
let _db: DbType | null = null;
function getDb(): DbType {
  if (!_db) {
    _db = drizzle(getClient(), { schema });
  }
  return _db;
}

// Proxy-based lazy db: looks like a direct drizzle instance but defers creation
export const db: DbType = new Proxy({} as DbType, {
  get(_target, prop, receiver) {
    return Reflect.get(getDb(), prop, receiver);
  },
});

/** Close the underlying client (graceful shutdown). */
function closeDb(): void {
  _client?.close();
  _client = null;
  _db = null;
}

export { getClient, closeDb };

export * from "./schema.js";
