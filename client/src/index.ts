export {
  ExperimentClient,
  ConfigurationError,
  consoleLogger,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  API_KEY_ENV,
  API_URL_ENV,
} from "./client.js";
export type {
  ClientConfig,
  ClientLogger,
  EndProcessResult,
  ProcessStatus,
  StartProcessOptions,
} from "./client.js";
export { trackProcess, tracked, errorMetadata, TRACEBACK_MAX_CHARS, ERROR_MESSAGE_MAX_CHARS } from "./tracking.js";
export type { ProcessHandle, TrackOptions, TrackedOptions } from "./tracking.js";
export { withProgress } from "./progress.js";
export type { ProgressOptions, ProgressUpdate } from "./progress.js";
export { collectEnvironmentMetadata, mergeMetadata } from "./metadata.js";
export type { Metadata } from "./metadata.js";
export { setupInstructions } from "./setup.js";
