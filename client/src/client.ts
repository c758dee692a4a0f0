/**
 * HTTP client for the notification backend.
 *
 * Every call is non-throwing: HTTP errors and transport failures are logged
 * through the configured logger and reported as `false` / `null`, so a
 * notification problem never takes down the script that sent it.
 *
 * Auth: the API key from the bot's /start reply, sent as a Bearer token.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { collectEnvironmentMetadata, mergeMetadata, type Metadata } from "./metadata.js";

export const DEFAULT_API_URL = "http://localhost:3001";
export const DEFAULT_TIMEOUT_MS = 10_000;

export const API_KEY_ENV = "EXPERIMENT_BOT_KEY";
export const API_URL_ENV = "EXPERIMENT_BOT_API_URL";

export interface ClientLogger {
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface ClientConfig {
  apiKey: string;
  /** Backend base URL, e.g. "http://localhost:3001" */
  apiUrl?: string;
  timeoutMs?: number;
  logger?: ClientLogger;
  /** Attach hostname, platform, pid and friends to every notify (default: true) */
  collectMetadata?: boolean;
  fetch?: typeof fetch;
}

export type ProcessStatus = "completed" | "error";

export interface StartProcessOptions {
  name: string;
  /** Generated when omitted */
  processId?: string;
  metadata?: Metadata;
  /** processId of an enclosing process */
  parentId?: string;
}

export interface EndProcessResult {
  processId: string;
  status: ProcessStatus;
  durationSeconds: number;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const LOG_PREFIX = "[runnotify]";

export const consoleLogger: ClientLogger = {
  warn: (message, meta) => console.warn(`${LOG_PREFIX} ${message}`, ...(meta ? [meta] : [])),
  error: (message, meta) => console.error(`${LOG_PREFIX} ${message}`, ...(meta ? [meta] : [])),
};

const endProcessSchema = z.object({
  data: z.object({
    processId: z.string(),
    status: z.enum(["completed", "error"]),
    durationSeconds: z.number(),
  }),
});

type RequestOutcome = { ok: true; response: Response } | { ok: false };

export class ExperimentClient {
  private apiUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private logger: ClientLogger;
  private collectMetadata: boolean;
  private fetchImpl?: typeof fetch;

  constructor(config: ClientConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError(
        `API key is required. Set ${API_KEY_ENV} or pass apiKey (send /start to the bot to get one).`,
      );
    }
    this.apiKey = config.apiKey;
    this.apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? consoleLogger;
    this.collectMetadata = config.collectMetadata ?? true;
    this.fetchImpl = config.fetch;
  }

  /** Build a client from EXPERIMENT_BOT_KEY / EXPERIMENT_BOT_API_URL. */
  static fromEnv(overrides: Partial<ClientConfig> = {}): ExperimentClient {
    return new ExperimentClient({
      ...overrides,
      apiKey: overrides.apiKey ?? process.env[API_KEY_ENV] ?? "",
      apiUrl: overrides.apiUrl ?? process.env[API_URL_ENV] ?? DEFAULT_API_URL,
    });
  }

  get baseUrl(): string {
    return this.apiUrl;
  }

  private async request(operation: string, method: string, path: string, body?: unknown): Promise<RequestOutcome> {
    const doFetch = this.fetchImpl ?? fetch;
    try {
      const response = await doFetch(`${this.apiUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        this.logger.warn(`${operation} failed`, { status: response.status, body: text });
        return { ok: false };
      }
      return { ok: true, response };
    } catch (error) {
      this.logger.error(`${operation} failed`, { error: error instanceof Error ? error.message : String(error) });
      return { ok: false };
    }
  }

  // ── Notifications ───────────────────────────────────────────────────

  /** Send a message to the key owner's chat. Caller metadata wins over collected fields. */
  async notify(message: string, metadata?: Metadata): Promise<boolean> {
    const merged = mergeMetadata(this.collectMetadata ? collectEnvironmentMetadata() : undefined, metadata);
    const result = await this.request("notify", "POST", "/api/notify", {
      message,
      metadata: merged ?? null,
    });
    return result.ok;
  }

  /** Check that the API key is valid and the backend reachable. */
  async validateConnection(): Promise<boolean> {
    const result = await this.request("validateConnection", "GET", "/api/validate");
    return result.ok;
  }

  // ── Processes ───────────────────────────────────────────────────────

  /** Resolves to the process id, or null if the backend did not accept it. */
  async startProcess(options: StartProcessOptions): Promise<string | null> {
    const processId = options.processId ?? randomUUID();
    const result = await this.request("startProcess", "POST", "/api/process/start", {
      processId,
      name: options.name,
      metadata: options.metadata,
      parentId: options.parentId,
    });
    return result.ok ? processId : null;
  }

  async endProcess(processId: string, status: ProcessStatus, metadata?: Metadata): Promise<EndProcessResult | null> {
    const result = await this.request("endProcess", "POST", "/api/process/end", {
      processId,
      status,
      metadata,
    });
    if (!result.ok) return null;

    try {
      return endProcessSchema.parse(await result.response.json()).data;
    } catch (error) {
      this.logger.warn("endProcess returned an unexpected body", { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }

  /** Refresh last-active; with a processId also stamps that process. */
  async heartbeat(processId?: string, metadata?: Metadata): Promise<boolean> {
    const result = await this.request("heartbeat", "POST", "/api/process/heartbeat", {
      processId,
      metadata,
    });
    return result.ok;
  }
}
