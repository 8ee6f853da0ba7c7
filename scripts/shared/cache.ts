import { existsSync } from "fs";
import { join } from "path";
import type { ResourceKey } from "./types.js";

export interface CacheResolution {
  useCache: boolean;
  path: string;
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_.-]/g, "_");
}

export function cacheArtifactPath(outputDir: string, key: ResourceKey): string {
  return join(
    outputDir,
    key.mode,
    safeSegment(key.language),
    `${safeSegment(key.resource)}.csv`,
  );
}

export function translationArtifactPath(
  translationsDir: string,
  key: ResourceKey,
): string {
  return join(
    translationsDir,
    key.mode,
    safeSegment(key.language),
    `${safeSegment(key.resource)}.json`,
  );
}

/**
 * Existence is the only freshness signal: no TTL, no checksum.
 * A forced download never reuses the artifact.
 */
export function resolveCache(
  outputDir: string,
  key: ResourceKey,
  forceDownload: boolean,
): CacheResolution {
  const path = cacheArtifactPath(outputDir, key);
  if (forceDownload) {
    return { useCache: false, path };
  }
  return { useCache: existsSync(path), path };
}

/** Transifex tells strings apart by key and context together. */
export function recordIdentity(record: { key: string; context: string }): string {
  return JSON.stringify([record.key, record.context]);
}

/**
 * Merges by `(key, context)`. Previous entries keep their position and are
 * replaced by an incoming entry with the same identity; new identities are
 * appended in incoming order. An identity repeated within `incoming`
 * resolves to its last entry.
 */
export function mergeRecords<T extends { key: string; context: string }>(
  previous: readonly T[],
  incoming: readonly T[],
): T[] {
  const latest = new Map<string, T>();
  for (const record of incoming) {
    latest.set(recordIdentity(record), record);
  }

  const merged: T[] = [];
  const seen = new Set<string>();

  for (const record of [...previous, ...incoming]) {
    const id = recordIdentity(record);
    if (seen.has(id)) continue;
    seen.add(id);
    merged.push(latest.get(id) ?? record);
  }

  return merged;
}
