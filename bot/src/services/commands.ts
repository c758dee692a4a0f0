/**
 * Chat command handlers. Each takes the sender's identity and resolves to
 * the HTML reply; the grammY wiring lives in telegram.ts.
 */

import { config } from "../config.js";
import * as backend from "./backendClient.js";
import { escapeHtml } from "./render.js";

export interface CommandUser {
  platformUserId: string;
  chatId: string;
  displayName?: string;
}

export const COMMANDS = [
  { command: "start", description: "Get your API key" },
  { command: "revoke", description: "Generate a new API key" },
  { command: "status", description: "Check connection status" },
  { command: "mute", description: "Pause notifications" },
  { command: "unmute", description: "Resume notifications" },
  { command: "help", description: "Show usage" },
] as const;

export const UNAVAILABLE_REPLY =
  "⚠️ Sorry, the notification service is unavailable right now. Please try again in a moment.";

export const NOT_REGISTERED_REPLY = "❌ <b>Not registered</b>\n\nUse /start to get your API key.";

function commandList(): string {
  return COMMANDS.map(({ command, description }) => `/${command} - ${description}`).join("\n");
}

function exportLine(apiKey: string): string {
  return `<pre>export EXPERIMENT_BOT_KEY=${escapeHtml(apiKey)}</pre>`;
}

/** "2026-03-01T10:00:00.000Z" → "2026-03-01 10:00 UTC" */
export function formatTimestamp(iso: string): string {
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) return escapeHtml(iso);
  return `${parsed.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export async function startCommand(user: CommandUser): Promise<string> {
  const result = await backend.registerUser(user);
  if (!result.ok) return UNAVAILABLE_REPLY;

  const key = escapeHtml(result.data.apiKey);
  return [
    `🤖 <b>${escapeHtml(config.appName)} is ready!</b>`,
    "",
    `Your API key: <code>${key}</code>`,
    "",
    "<b>Quick setup:</b>",
    exportLine(result.data.apiKey),
    "",
    "<b>Usage:</b>",
    [
      "<pre>",
      'import { ExperimentClient } from "@runnotify/client";',
      "",
      "const client = ExperimentClient.fromEnv();",
      'await client.notify("Hello from my experiment!");',
      "</pre>",
    ].join("\n"),
    "",
    "<b>Commands:</b>",
    commandList(),
    "",
    "Keep this key secure! 🔒",
  ].join("\n");
}

export async function revokeCommand(user: CommandUser): Promise<string> {
  const result = await backend.revokeKey(user.platformUserId);
  if (!result.ok) {
    return result.status === 404 ? NOT_REGISTERED_REPLY : UNAVAILABLE_REPLY;
  }

  return [
    "🔄 <b>API Key Revoked</b>",
    "",
    `Your new API key: <code>${escapeHtml(result.data.apiKey)}</code>`,
    "",
    "Update your environment variable:",
    exportLine(result.data.apiKey),
  ].join("\n");
}

export async function statusCommand(user: CommandUser): Promise<string> {
  const result = await backend.getUserStatus(user.platformUserId);
  if (!result.ok) {
    return result.status === 404 ? NOT_REGISTERED_REPLY : UNAVAILABLE_REPLY;
  }

  const status = result.data;
  return [
    "📊 <b>Connection Status</b>",
    "",
    status.active ? "✅ <b>Active</b>" : "⛔ <b>Inactive</b>",
    `API Key: <code>${escapeHtml(status.apiKeyPreview)}</code>`,
    `Created: ${formatTimestamp(status.createdAt)}`,
    `Last Active: ${formatTimestamp(status.lastActive)}`,
    `Notifications: ${status.messageCount}`,
    `Open processes: ${status.openProcesses}`,
    "",
    status.muted
      ? "🔕 Notifications are muted. Use /unmute to resume."
      : "Ready to receive notifications! 🚀",
  ].join("\n");
}

async function setMuted(user: CommandUser, muted: boolean): Promise<string> {
  const result = await backend.setMuted(user.platformUserId, muted);
  if (!result.ok) {
    return result.status === 404 ? NOT_REGISTERED_REPLY : UNAVAILABLE_REPLY;
  }
  return result.data.muted
    ? "🔕 Notifications muted. They are still recorded; use /unmute to resume delivery."
    : "🔔 Notifications resumed.";
}

export function muteCommand(user: CommandUser): Promise<string> {
  return setMuted(user, true);
}

export function unmuteCommand(user: CommandUser): Promise<string> {
  return setMuted(user, false);
}

export function helpCommand(): string {
  return [
    `🤖 <b>${escapeHtml(config.appName)}</b> sends you a message when your scripts and experiments report in.`,
    "",
    "<b>Commands:</b>",
    commandList(),
  ].join("\n");
}
