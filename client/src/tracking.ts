/**
 * Scoped process tracking.
 *
 * trackProcess() reports start, then end on every exit path: `completed`
 * when the body returns, `error` with the error's type, message and stack
 * tail when it throws. The body's own error is always rethrown unchanged,
 * and a backend that is down never prevents the body from running.
 */

import type { ExperimentClient, StartProcessOptions } from "./client.js";
import type { Metadata } from "./metadata.js";

export const TRACEBACK_MAX_CHARS = 2000;
export const ERROR_MESSAGE_MAX_CHARS = 1000;

export type TrackOptions = StartProcessOptions;

export interface ProcessHandle {
  /** null when the backend did not accept the start */
  readonly processId: string | null;
  notify(message: string, metadata?: Metadata): Promise<boolean>;
  heartbeat(metadata?: Metadata): Promise<boolean>;
  /** Track a nested process whose parent is this one. */
  child<T>(options: TrackOptions, body: (handle: ProcessHandle) => T | Promise<T>): Promise<T>;
}

type TrackingClient = Pick<ExperimentClient, "startProcess" | "endProcess" | "notify" | "heartbeat">;

function truncateMessage(message: string): string {
  return message.length > ERROR_MESSAGE_MAX_CHARS
    ? `${message.slice(0, ERROR_MESSAGE_MAX_CHARS - 1)}…`
    : message;
}

/** Error fields for an `error` end. Sized to stay well inside the backend's metadata limit. */
export function errorMetadata(error: unknown): Metadata {
  if (!(error instanceof Error)) {
    return { errorType: "Error", errorMessage: truncateMessage(String(error)) };
  }
  const errorType = error.name !== "Error" ? error.name : error.constructor.name || "Error";
  return {
    errorType,
    errorMessage: truncateMessage(error.message),
    traceback: (error.stack ?? `${errorType}: ${error.message}`).slice(-TRACEBACK_MAX_CHARS),
  };
}

function createHandle(client: TrackingClient, processId: string | null): ProcessHandle {
  return {
    processId,
    notify: (message, metadata) =>
      client.notify(message, processId ? { processId, ...metadata } : metadata),
    heartbeat: (metadata) => client.heartbeat(processId ?? undefined, metadata),
    child: (options, body) =>
      trackProcess(client, { ...options, parentId: processId ?? options.parentId }, body),
  };
}

export async function trackProcess<T>(
  client: TrackingClient,
  options: TrackOptions,
  body: (handle: ProcessHandle) => T | Promise<T>,
): Promise<T> {
  const startedAt = Date.now();
  const elapsed = () => Math.max(0, (Date.now() - startedAt) / 1000);

  const processId = await client.startProcess(options);
  const handle = createHandle(client, processId);

  let result: T;
  try {
    result = await body(handle);
  } catch (error) {
    if (processId) {
      await client.endProcess(processId, "error", {
        ...errorMetadata(error),
        durationSeconds: elapsed(),
      });
    }
    throw error;
  }

  if (processId) {
    await client.endProcess(processId, "completed", { durationSeconds: elapsed() });
  }
  return result;
}

export type TrackedOptions = Omit<TrackOptions, "name" | "processId"> & { name?: string };

/**
 * Wrap `fn` so every call runs inside trackProcess(). Each call gets its own
 * process id; the name defaults to the function's name.
 */
export function tracked<A extends unknown[], R>(
  client: TrackingClient,
  options: TrackedOptions,
  fn: (...args: A) => R | Promise<R>,
): (...args: A) => Promise<R> {
  const name = options.name ?? (fn.name || "anonymous");
  return (...args: A) => trackProcess(client, { ...options, name }, () => fn(...args));
}
