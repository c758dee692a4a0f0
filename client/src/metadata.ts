import { hostname } from "node:os";
import { basename } from "node:path";

export type Metadata = Record<string, unknown>;

/** Describes the machine and script a notification comes from. */
export function collectEnvironmentMetadata(): Metadata {
  const metadata: Metadata = {
    hostname: hostname(),
    platform: process.platform,
    pid: process.pid,
    nodeVersion: process.version,
    cwd: process.cwd(),
  };
  const script = process.argv[1];
  if (script) metadata.script = basename(script);
  return metadata;
}

/** Later sources win on key collisions. */
export function mergeMetadata(...sources: Array<Metadata | undefined>): Metadata | undefined {
  const merged: Metadata = {};
  let any = false;
  for (const source of sources) {
    if (!source) continue;
    Object.assign(merged, source);
    any = true;
  }
  return any ? merged : undefined;
}
