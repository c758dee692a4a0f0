import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";

export type ProcessStatus = "started" | "running" | "completed" | "error";
export type NotificationKind = "message" | "process_started" | "process_ended";

/** Free-form JSON metadata attached to processes and notifications. */
export type Metadata = Record<string, unknown>;

/**
 * users: One row per chat-platform user.
 * Created on the first /start; the API key is replaced on /revoke. Never hard-deleted.
 */
export const users = sqliteTable("users", {
  id: text("id").primaryKey(),

  /** Chat platform's user id (Telegram user id as text) */
  platformUserId: text("platform_user_id").notNull().unique(),

  /** Chat the bot delivers notifications to */
  chatId: text("chat_id").notNull(),

  displayName: text("display_name"),

  apiKey: text("api_key").notNull().unique(),

  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  lastActive: integer("last_active", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),

  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),

  /** Muted users still get notifications persisted, just not delivered */
  isMuted: integer("is_muted", { mode: "boolean" }).notNull().default(false),

  messageCount: integer("message_count").notNull().default(0),
}, (table) => ({
  apiKeyIdx: index("users_api_key_idx").on(table.apiKey),
}));

/**
 * processes: Tracked units of external work (a script run, a training job).
 * Status: started → running* → completed | error
 */
export const processes = sqliteTable("processes", {
  id: text("id").primaryKey(),

  userId: text("user_id").notNull().references(() => users.id),

  /** Identifier chosen by the client library */
  externalId: text("external_id").notNull().unique(),

  name: text("name").notNull(),

  status: text("status").$type<ProcessStatus>().notNull().default("started"),

  startedAt: integer("started_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),

  /** Set exactly once, by EndProcess */
  endedAt: integer("ended_at", { mode: "timestamp_ms" }),

  lastHeartbeatAt: integer("last_heartbeat_at", { mode: "timestamp_ms" }),

  metadata: text("metadata", { mode: "json" }).$type<Metadata>(),

  parentProcessId: text("parent_process_id"),
}, (table) => ({
  userIdx: index("processes_user_id_idx").on(table.userId),
  externalIdx: index("processes_external_id_idx").on(table.externalId),
}));

/**
 * notifications: One row per message destined for a user's chat.
 * Delivered asynchronously by the delivery worker; `delivered` flips at most once.
 */
export const notifications = sqliteTable("notifications", {
  id: text("id").primaryKey(),

  userId: text("user_id").notNull().references(() => users.id),

  processId: text("process_id").references(() => processes.id),

  kind: text("kind").$type<NotificationKind>().notNull().default("message"),

  message: text("message").notNull(),

  metadata: text("metadata", { mode: "json" }).$type<Metadata>(),

  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),

  delivered: integer("delivered", { mode: "boolean" }).notNull().default(false),

  deliveredAt: integer("delivered_at", { mode: "timestamp_ms" }),
}, (table) => ({
  userIdx: index("notifications_user_id_idx").on(table.userId),
  processIdx: index("notifications_process_id_idx").on(table.processId),
}));

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Process = typeof processes.$inferSelect;
export type NewProcess = typeof processes.$inferInsert;
export type Notification = typeof notifications.$inferSelect;
export type NewNotification = typeof notifications.$inferInsert;
