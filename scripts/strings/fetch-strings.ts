import { resolveCache } from "../shared/cache.js";
import { writeStringRecords } from "../shared/csv.js";
import { errorMessage } from "../shared/errors.js";
import type { StringSource } from "../shared/transifex-client.js";
import type { Mode, ResourceKey } from "../shared/types.js";

export interface FetchStringsOptions {
  source: StringSource;
  outputDir: string;
  keys: readonly ResourceKey[];
  forceDownload: boolean;
}

export interface FetchedKey {
  key: ResourceKey;
  path: string;
  origin: "cache" | "remote";
  /** Records written; null when the cached artifact was reused unread. */
  count: number | null;
}

export interface FailedKey {
  key: ResourceKey;
  error: string;
}

export interface FetchReport {
  completed: FetchedKey[];
  failed: FailedKey[];
}

/** Resources outer, languages inner, both in configuration order. */
export function buildResourceKeys(
  resources: readonly string[],
  languages: readonly string[],
  mode: Mode,
): ResourceKey[] {
  return resources.flatMap((resource) =>
    languages.map((language) => ({ resource, language, mode })),
  );
}

export function keyLabel(key: ResourceKey): string {
  return `${key.resource} (${key.language})`;
}

export async function fetchStrings(
  options: FetchStringsOptions,
): Promise<FetchReport> {
  const { source, outputDir, keys, forceDownload } = options;
  const report: FetchReport = { completed: [], failed: [] };

  for (let i = 0; i < keys.length; i++) {
    const key = keys[i];
    const prefix = `[${i + 1}/${keys.length}] ${keyLabel(key)}`;
    const { useCache, path } = resolveCache(outputDir, key, forceDownload);

    if (useCache) {
      console.log(`${prefix} — using cached ${key.mode} strings: ${path}`);
      report.completed.push({ key, path, origin: "cache", count: null });
      continue;
    }

    try {
      const records = await source.listStrings(key);
      writeStringRecords(path, records);
      console.log(`${prefix} — fetched ${records.length} string(s) → ${path}`);
      report.completed.push({ key, path, origin: "remote", count: records.length });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`${prefix} — FAILED: ${message}`);
      report.failed.push({ key, error: message });
    }
  }

  return report;
}
