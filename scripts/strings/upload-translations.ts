import { translationArtifactPath } from "../shared/cache.js";
import { errorMessage } from "../shared/errors.js";
import { loadTranslationArtifact } from "../shared/translation-store.js";
import type { TranslationSink } from "../shared/transifex-client.js";
import type { ResourceKey, TranslationResult } from "../shared/types.js";
import { keyLabel, type FailedKey } from "./fetch-strings.js";

export type UploadExitPolicy = "any" | "all";

export interface UploadTranslationsOptions {
  sink: TranslationSink;
  translationsDir: string;
  keys: readonly ResourceKey[];
}

export interface UploadFailure {
  key: ResourceKey;
  stringKey: string;
  error: string;
}

export interface UploadSummary {
  pushed: number;
  failed: number;
  skipped: number;
  failures: UploadFailure[];
  /** Keys whose output artifact could not be read. */
  failedKeys: FailedKey[];
}

async function pushResult(
  sink: TranslationSink,
  key: ResourceKey,
  result: TranslationResult,
): Promise<"pushed" | "skipped"> {
  switch (result.status) {
    case "translated":
      await sink.updateTranslation(
        key.resource,
        key.language,
        { key: result.key, context: result.context },
        result.translation,
      );
      return "pushed";
    case "approved":
      await sink.reviewTranslation(key.resource, key.language, {
        key: result.key,
        context: result.context,
      });
      return "pushed";
    case "rejected":
      return "skipped";
  }
}

/**
 * Writes translate-step results back to Transifex. Each record stands
 * alone: a failure is logged and earlier successes are not rolled back.
 */
export async function uploadTranslations(
  options: UploadTranslationsOptions,
): Promise<UploadSummary> {
  const { sink, translationsDir, keys } = options;
  const summary: UploadSummary = {
    pushed: 0,
    failed: 0,
    skipped: 0,
    failures: [],
    failedKeys: [],
  };

  for (const key of keys) {
    const label = keyLabel(key);
    const path = translationArtifactPath(translationsDir, key);

    let results: TranslationResult[];
    try {
      const artifact = loadTranslationArtifact(path);
      if (!artifact) {
        console.log(`${label} — skipped (no translations at ${path})`);
        continue;
      }
      results = artifact.results;
    } catch (error) {
      const message = errorMessage(error);
      console.error(`${label} — FAILED: ${message}`);
      summary.failedKeys.push({ key, error: message });
      continue;
    }

    console.log();
    console.log(`=== Uploading ${results.length} result(s) for ${label} ===`);

    for (let i = 0; i < results.length; i++) {
      const result = results[i];
      const prefix = `[${i + 1}/${results.length}] ${result.key}`;
      try {
        const outcome = await pushResult(sink, key, result);
        if (outcome === "pushed") {
          summary.pushed++;
          console.log(
            `${prefix} — ${result.status === "approved" ? "marked as reviewed" : "updated"}`,
          );
        } else {
          summary.skipped++;
          console.log(`${prefix} — skipped (${result.status})`);
        }
      } catch (error) {
        const message = errorMessage(error);
        summary.failed++;
        summary.failures.push({ key, stringKey: result.key, error: message });
        console.error(`${prefix} — FAILED: ${message}`);
      }
    }
  }

  return summary;
}

/**
 * `any`: exit 1 when any upload failed.
 * `all`: exit 1 only when uploads were attempted and none succeeded.
 * An unreadable output artifact counts as a failure under both.
 */
export function uploadExitCode(
  summary: UploadSummary,
  policy: UploadExitPolicy,
): number {
  const failures = summary.failed + summary.failedKeys.length;
  if (failures === 0) {
    return 0;
  }
  if (policy === "any") {
    return 1;
  }
  return summary.pushed === 0 ? 1 : 0;
}
