/**
 * Turns a forwarded delivery job into Telegram HTML messages.
 *
 * Output is a list of chunks, each at most TELEGRAM_MAX_MESSAGE_LENGTH
 * characters and each valid HTML on its own (tags never straddle chunks).
 */

import type { DeliveryJob } from "./deliveryJob.js";

export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

const METADATA_VALUE_MAX = 200;
const METADATA_KEY_MAX = 64;
const METADATA_MAX_ENTRIES = 20;
const ERROR_MESSAGE_MAX = 500;

/** Rendered separately from the bullet list. */
const ERROR_KEYS = new Set(["errorType", "errorMessage", "traceback"]);
const HIDDEN_KEYS = new Set(["durationSeconds"]);

type Block =
  | { kind: "html"; html: string }
  | { kind: "text"; text: string; pre: boolean };

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** 3723 → "1h 2m 3s"; sub-10s fractions keep one decimal ("2.5s"). */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return "0s";
  if (seconds < 10 && !Number.isInteger(seconds)) return `${seconds.toFixed(1)}s`;

  const total = Math.round(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;

  if (h > 0) return `${h}h ${m}m ${s}s`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function stringifyValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
}

/** Strings as-is, everything else JSON-encoded; capped at 200 characters. */
export function formatMetadataValue(value: unknown): string {
  return truncate(stringifyValue(value), METADATA_VALUE_MAX);
}

function html(markup: string): Block {
  return { kind: "html", html: markup };
}

function headerBlocks(job: DeliveryJob): Block[] {
  const proc = job.process;
  if (job.kind === "message" || !proc) {
    return [html("🔔 <b>Notification</b>")];
  }

  const name = escapeHtml(proc.name);
  const blocks: Block[] = [];
  if (job.kind === "process_started") {
    blocks.push(html(`🚀 <b>Process started:</b> ${name}`));
  } else if (proc.status === "error") {
    blocks.push(html(`❌ <b>Process failed:</b> ${name}`));
  } else {
    blocks.push(html(`✅ <b>Process completed:</b> ${name}`));
  }

  blocks.push(html(`ID: <code>${escapeHtml(proc.processId)}</code>`));
  if (proc.durationSeconds !== undefined) {
    blocks.push(html(`⏱ Duration: ${formatDuration(proc.durationSeconds)}`));
  }
  return blocks;
}

function metadataBlocks(metadata: Record<string, unknown>): Block[] {
  const entries = Object.entries(metadata).filter(
    ([key]) => !ERROR_KEYS.has(key) && !HIDDEN_KEYS.has(key),
  );
  const shown = entries.slice(0, METADATA_MAX_ENTRIES);

  const blocks = shown.map(([key, value]) =>
    html(`• <b>${escapeHtml(truncate(key, METADATA_KEY_MAX))}</b>: ${escapeHtml(formatMetadataValue(value))}`),
  );
  if (entries.length > shown.length) {
    blocks.push(html(`… and ${entries.length - shown.length} more`));
  }
  return blocks;
}

function errorBlocks(metadata: Record<string, unknown>): Block[] {
  const { errorType, errorMessage, traceback } = metadata;
  if (errorType === undefined && errorMessage === undefined && traceback === undefined) {
    return [];
  }

  const type = typeof errorType === "string" ? errorType : "Error";
  const message = errorMessage === undefined ? "" : stringifyValue(errorMessage);
  const blocks: Block[] = [
    html(`<b>${escapeHtml(truncate(type, METADATA_KEY_MAX))}</b>: ${escapeHtml(truncate(message, ERROR_MESSAGE_MAX))}`),
  ];
  if (typeof traceback === "string" && traceback.trim()) {
    blocks.push({ kind: "text", text: traceback.trimEnd(), pre: true });
  }
  return blocks;
}

function wrap(escaped: string, pre: boolean): string {
  return pre ? `<pre>${escaped}</pre>` : escaped;
}

/** Split raw text so that each escaped, wrapped piece fits in `limit`. */
function splitText(text: string, pre: boolean, limit: number): string[] {
  const budget = limit - (pre ? "<pre></pre>".length : 0);
  const pieces: string[] = [];
  let current = "";

  for (const char of text) {
    const escaped = escapeHtml(char);
    if (current.length + escaped.length > budget) {
      pieces.push(wrap(current, pre));
      current = "";
    }
    current += escaped;
  }
  if (current) pieces.push(wrap(current, pre));
  return pieces;
}

/**
 * Lines are joined with "\n"; an empty line separates sections. Chunks
 * break only between lines unless a single text block is itself too long.
 */
function packChunks(blocks: Block[], limit: number): string[] {
  const lines = blocks.flatMap((block) => {
    if (block.kind === "html") return [block.html];
    const rendered = wrap(escapeHtml(block.text), block.pre);
    return rendered.length <= limit ? [rendered] : splitText(block.text, block.pre, limit);
  });

  const chunks: string[] = [];
  let current = "";
  for (const line of lines) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > limit && current) {
      chunks.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }
  chunks.push(current);

  return chunks
    .map((chunk) => chunk.replace(/^\n+|\n+$/g, ""))
    .filter((chunk) => chunk.length > 0);
}

export function renderNotification(job: DeliveryJob, limit = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  const sections: Block[][] = [headerBlocks(job)];

  if (job.kind === "message" || !job.process) {
    sections.push([{ kind: "text", text: job.message, pre: false }]);
  }

  if (job.metadata) {
    sections.push(metadataBlocks(job.metadata));
    sections.push(errorBlocks(job.metadata));
  }

  const blocks = sections
    .filter((section) => section.length > 0)
    .flatMap((section, i) => (i === 0 ? section : [html(""), ...section]));

  return packChunks(blocks, limit);
}
