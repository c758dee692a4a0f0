import type { ExperimentClient } from "./client.js";

export interface ProgressOptions {
  /** Label used in the notification text (default: "Progress") */
  name?: string;
  /** Overrides the length/size read from the iterable */
  total?: number;
  /** Report cadence when the total is known (default: 10) */
  everyPercent?: number;
  /** Report cadence when it is not (default: 100) */
  everyN?: number;
}

export interface ProgressUpdate {
  iteration: number;
  total?: number;
  percent?: number;
}

function knownTotal(iterable: unknown): number | undefined {
  if (typeof iterable === "string") return iterable.length;
  if (typeof iterable !== "object" || iterable === null) return undefined;
  if ("length" in iterable && typeof iterable.length === "number") return iterable.length;
  if ("size" in iterable && typeof iterable.size === "number") return iterable.size;
  return undefined;
}

function progressMessage(name: string, update: ProgressUpdate): string {
  if (update.total === undefined || update.percent === undefined) {
    return `${name}: ${update.iteration} items`;
  }
  return `${name}: ${update.iteration}/${update.total} (${update.percent}%)`;
}

/**
 * Re-yields every item of `iterable` and sends a progress notification at
 * the configured cadence. notify() never throws, so a failed report does
 * not interrupt the loop.
 */
export async function* withProgress<T>(
  client: Pick<ExperimentClient, "notify">,
  iterable: Iterable<T> | AsyncIterable<T>,
  options: ProgressOptions = {},
): AsyncGenerator<T, void, undefined> {
  const name = options.name ?? "Progress";
  const total = options.total ?? knownTotal(iterable);
  const everyPercent = options.everyPercent ?? 10;
  const everyN = options.everyN ?? 100;
  if (!(everyPercent > 0 && Number.isFinite(everyPercent))) {
    throw new RangeError(`everyPercent must be a positive number, got ${everyPercent}`);
  }
  if (!(Number.isInteger(everyN) && everyN > 0)) {
    throw new RangeError(`everyN must be a positive integer, got ${everyN}`);
  }

  let iteration = 0;
  let nextPercent = everyPercent;

  for await (const item of iterable) {
    yield item;
    iteration += 1;

    let update: ProgressUpdate | null = null;
    if (total !== undefined && total > 0) {
      const percent = Math.round((iteration / total) * 1000) / 10;
      if (percent >= nextPercent) {
        update = { iteration, total, percent };
        nextPercent = (Math.floor(percent / everyPercent) + 1) * everyPercent;
      }
    } else if (iteration % everyN === 0) {
      update = { iteration };
    }

    if (update) {
      await client.notify(progressMessage(name, update), { ...update });
    }
  }
}
