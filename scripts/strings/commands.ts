import type { SyncConfig } from "../shared/config.js";
import type { ProjectApi } from "../shared/transifex-client.js";
import {
  loadResourceConfigs,
  matchResources,
} from "../shared/transifex-config.js";
import type { ChatModel } from "../shared/translator.js";
import type { Mode, ResourceKey } from "../shared/types.js";
import {
  buildResourceKeys,
  fetchStrings,
  type FetchReport,
} from "./fetch-strings.js";
import { translateStrings, type TranslateReport } from "./translate-strings.js";
import {
  uploadExitCode,
  uploadTranslations,
  type UploadExitPolicy,
  type UploadSummary,
} from "./upload-translations.js";

export interface FetchCommandOptions {
  mode: Mode;
  forceDownload: boolean;
}

export interface TranslateCommandOptions extends FetchCommandOptions {
  updateTransifex: boolean;
  failOn: UploadExitPolicy;
}

export interface UpdateCommandOptions {
  mode: Mode;
  failOn: UploadExitPolicy;
}

/**
 * Lists project resources and crosses them with the target languages.
 * Errors here are top-level: they propagate and end the run.
 */
export async function selectResourceKeys(
  api: ProjectApi,
  config: SyncConfig,
  mode: Mode,
): Promise<ResourceKey[]> {
  const resources = await api.listResources();
  console.log(`Found ${resources.length} resources in ${config.transifex.project}`);

  const configs = loadResourceConfigs(config.paths.transifexConfig);
  const selection = matchResources(resources, configs);

  if (configs === null) {
    console.log(`No ${config.paths.transifexConfig} found, processing every resource`);
  }
  for (const resource of selection.unmatchedResources) {
    console.warn(`No configuration found for ${resource.name} in ${config.paths.transifexConfig}`);
  }
  for (const unmatched of selection.unmatchedConfigs) {
    console.warn(`Configured resource ${unmatched.name} not found in the project`);
  }
  for (const { resource, config: fileConfig } of selection.resources) {
    const target = fileConfig
      ? ` (${fileConfig.format}: ${fileConfig.pathExpression})`
      : "";
    console.log(`  ${resource.name} → ${resource.slug}${target}`);
  }

  return buildResourceKeys(
    selection.resources.map(({ resource }) => resource.slug),
    config.targetLanguages,
    mode,
  );
}

function printFetchSummary(report: FetchReport): void {
  const fromCache = report.completed.filter((c) => c.origin === "cache").length;
  console.log();
  console.log(`=== Fetch Summary ===`);
  console.log(`Downloaded:       ${report.completed.length - fromCache}`);
  console.log(`From cache:       ${fromCache}`);
  console.log(`Failed:           ${report.failed.length}`);
  for (const { key, error } of report.failed) {
    console.log(`  ${key.resource} (${key.language}): ${error}`);
  }
}

function printTranslateSummary(report: TranslateReport): void {
  const totals = report.completed.reduce(
    (acc, c) => ({
      processed: acc.processed + c.processed,
      failed: acc.failed + c.failed,
      skipped: acc.skipped + c.skipped,
    }),
    { processed: 0, failed: 0, skipped: 0 },
  );
  console.log();
  console.log(`=== Translate Summary ===`);
  console.log(`Keys processed:   ${report.completed.length}`);
  console.log(`Keys not cached:  ${report.missing.length}`);
  console.log(`Keys failed:      ${report.failed.length}`);
  console.log(`Records done:     ${totals.processed}`);
  console.log(`Records skipped:  ${totals.skipped}`);
  console.log(`Records failed:   ${totals.failed}`);
}

function printUploadSummary(summary: UploadSummary, exitCode: number): void {
  console.log();
  console.log(`=== Upload Summary ===`);
  console.log(`Pushed:           ${summary.pushed}`);
  console.log(`Skipped:          ${summary.skipped}`);
  console.log(`Failed:           ${summary.failed + summary.failedKeys.length}`);
  if (exitCode === 0 && summary.failed > 0) {
    console.warn(`Some uploads failed; see the log above`);
  }
}

async function fetchStep(
  api: ProjectApi,
  config: SyncConfig,
  options: FetchCommandOptions,
): Promise<FetchReport> {
  console.log(`=== Fetch ${options.mode} strings ===`);
  console.log(`Languages:      ${config.targetLanguages.join(", ")}`);
  console.log(`Output dir:     ${config.paths.outputDir}`);
  console.log(`Force download: ${options.forceDownload}`);
  console.log();

  const keys = await selectResourceKeys(api, config, options.mode);
  console.log();

  const report = await fetchStrings({
    source: api,
    outputDir: config.paths.outputDir,
    keys,
    forceDownload: options.forceDownload,
  });
  printFetchSummary(report);
  return report;
}

/** Failures on single keys are reported in the summary, not in the exit code. */
export async function runFetchCommand(
  api: ProjectApi,
  config: SyncConfig,
  options: FetchCommandOptions,
): Promise<number> {
  await fetchStep(api, config, options);
  return 0;
}

export async function runTranslateCommand(
  api: ProjectApi,
  model: ChatModel,
  config: SyncConfig,
  options: TranslateCommandOptions,
): Promise<number> {
  const fetched = await fetchStep(api, config, options);

  console.log();
  console.log(`=== Translate ${options.mode} strings (${config.openai.model}) ===`);
  const report = await translateStrings({
    model,
    outputDir: config.paths.outputDir,
    translationsDir: config.paths.translationsDir,
    keys: fetched.completed.map(({ key }) => key),
  });
  printTranslateSummary(report);

  if (!options.updateTransifex) {
    return 0;
  }

  const summary = await uploadTranslations({
    sink: api,
    translationsDir: config.paths.translationsDir,
    keys: report.completed.map(({ key }) => key),
  });
  const exitCode = uploadExitCode(summary, options.failOn);
  printUploadSummary(summary, exitCode);
  return exitCode;
}

export async function runUpdateCommand(
  api: ProjectApi,
  config: SyncConfig,
  options: UpdateCommandOptions,
): Promise<number> {
  console.log(`=== Update Transifex from ${config.paths.translationsDir} ===`);
  const keys = await selectResourceKeys(api, config, options.mode);

  const summary = await uploadTranslations({
    sink: api,
    translationsDir: config.paths.translationsDir,
    keys,
  });
  const exitCode = uploadExitCode(summary, options.failOn);
  printUploadSummary(summary, exitCode);
  return exitCode;
}
