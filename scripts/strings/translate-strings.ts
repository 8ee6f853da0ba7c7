import { existsSync } from "fs";
import { cacheArtifactPath, translationArtifactPath } from "../shared/cache.js";
import { readStringRecords } from "../shared/csv.js";
import { errorMessage } from "../shared/errors.js";
import { saveTranslationResults } from "../shared/translation-store.js";
import { StringTranslator, type ChatModel } from "../shared/translator.js";
import type {
  ResourceKey,
  StringRecord,
  TranslationResult,
} from "../shared/types.js";
import { keyLabel, type FailedKey } from "./fetch-strings.js";

export interface TranslateStringsOptions {
  model: ChatModel;
  outputDir: string;
  translationsDir: string;
  keys: readonly ResourceKey[];
  now?: () => Date;
}

export interface TranslatedKey {
  key: ResourceKey;
  path: string;
  processed: number;
  failed: number;
  skipped: number;
}

export interface TranslateReport {
  completed: TranslatedKey[];
  failed: FailedKey[];
  /** Keys with no cached strings to work from. */
  missing: ResourceKey[];
}

async function processRecord(
  translator: StringTranslator,
  key: ResourceKey,
  record: StringRecord,
  processedAt: string,
): Promise<TranslationResult> {
  const base = {
    key: record.key,
    source: record.source,
    context: record.context,
    processedAt,
  };

  if (key.mode === "untranslated") {
    const translation = await translator.translate(record);
    return { ...base, translation, status: "translated" };
  }

  const verdict = await translator.review(record);
  return {
    ...base,
    translation: record.translation,
    status: verdict.approved ? "approved" : "rejected",
    explanation: verdict.explanation,
  };
}

/**
 * Runs every cached record through the language model, one at a time and
 * in file order. A failed record is logged and left out of the output;
 * the remaining records still run.
 */
export async function translateStrings(
  options: TranslateStringsOptions,
): Promise<TranslateReport> {
  const { model, outputDir, translationsDir, keys } = options;
  const now = options.now ?? (() => new Date());
  const report: TranslateReport = { completed: [], failed: [], missing: [] };
  const translators = new Map<string, StringTranslator>();

  for (const key of keys) {
    const label = keyLabel(key);
    const inputPath = cacheArtifactPath(outputDir, key);
    if (!existsSync(inputPath)) {
      console.log(`${label} — skipped (no cached ${key.mode} strings)`);
      report.missing.push(key);
      continue;
    }

    let records: StringRecord[];
    try {
      records = readStringRecords(inputPath);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`${label} — FAILED to read ${inputPath}: ${message}`);
      report.failed.push({ key, error: message });
      continue;
    }

    console.log();
    console.log(`=== ${label}: ${records.length} ${key.mode} string(s) ===`);

    let translator = translators.get(key.language);
    if (!translator) {
      translator = new StringTranslator(model, key.language);
      translators.set(key.language, translator);
    }

    const results: TranslationResult[] = [];
    let failed = 0;
    let skipped = 0;

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      const prefix = `[${i + 1}/${records.length}] ${record.key}`;

      if (key.mode === "unreviewed" && record.translation.trim() === "") {
        console.warn(`${prefix} — skipped (no translation to review)`);
        skipped++;
        continue;
      }

      try {
        const result = await processRecord(
          translator,
          key,
          record,
          now().toISOString(),
        );
        results.push(result);
        console.log(`${prefix} — ${result.status}`);
      } catch (error) {
        console.error(`${prefix} — FAILED: ${errorMessage(error)}`);
        failed++;
      }
    }

    const outputPath = translationArtifactPath(translationsDir, key);
    try {
      saveTranslationResults(outputPath, key, results);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`${label} — FAILED to save ${outputPath}: ${message}`);
      report.failed.push({ key, error: message });
      continue;
    }

    report.completed.push({
      key,
      path: outputPath,
      processed: results.length,
      failed,
      skipped,
    });
  }

  return report;
}
