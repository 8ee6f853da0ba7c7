import { readFileSync, existsSync } from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import type { TransifexResource } from "./types.js";

export interface ResourceFileConfig {
  name: string;
  type: "file" | "dir";
  format: string;
  pathExpression: string;
}

export interface ResourceSelection {
  resources: Array<{ resource: TransifexResource; config: ResourceFileConfig | null }>;
  unmatchedConfigs: ResourceFileConfig[];
  unmatchedResources: TransifexResource[];
}

const FilterSchema = z.object({
  filter_type: z.enum(["file", "dir"]),
  file_format: z.string(),
  source_file: z.string().optional(),
  source_file_dir: z.string().optional(),
  translation_files_expression: z.string(),
});

const TransifexYamlSchema = z.object({
  git: z.object({ filters: z.array(FilterSchema) }),
});

/**
 * Reads `git.filters` from transifex.yml. The resource name is the second
 * segment of the source path, e.g. `translations/frontend-app-account/src/...`
 * names `frontend-app-account`. Returns null when the file is absent.
 */
export function loadResourceConfigs(path: string): ResourceFileConfig[] | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`${path}: ${errorMessage(error)}`);
  }

  const parsed = TransifexYamlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${path}: expected a git.filters list`);
  }

  const configs: ResourceFileConfig[] = [];
  for (const filter of parsed.data.git.filters) {
    const sourcePath =
      filter.filter_type === "dir" ? filter.source_file_dir : filter.source_file;
    const parts = (sourcePath ?? "").split("/");
    if (parts.length <= 2) {
      console.warn(`[transifex.yml] skipped filter with source "${sourcePath ?? ""}"`);
      continue;
    }
    configs.push({
      name: parts[1],
      type: filter.filter_type,
      format: filter.file_format,
      pathExpression: filter.translation_files_expression,
    });
  }
  return configs;
}

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[_.]/g, "-");
}

export function nameVariations(resourceName: string): string[] {
  const base = resourceName.split(".")[0];
  const normalized = base.toLowerCase().replace(/_/g, "-");
  const variations = [base, normalized];

  if (normalized.includes("/")) {
    const parts = normalized.split("/");
    variations.push(...parts);
    variations.push(
      ...parts.filter((p) => p.includes("-input")).map((p) => p.split("-input")[0]),
    );
  }
  if (normalized.endsWith("-js")) {
    variations.push(normalized.slice(0, -3));
  }
  return variations;
}

/**
 * Orders project resources the way transifex.yml lists them. Without a
 * configuration every resource is kept in API order.
 */
export function matchResources(
  resources: readonly TransifexResource[],
  configs: readonly ResourceFileConfig[] | null,
): ResourceSelection {
  if (configs === null) {
    return {
      resources: resources.map((resource) => ({ resource, config: null })),
      unmatchedConfigs: [],
      unmatchedResources: [],
    };
  }

  const lookup = new Map<string, ResourceFileConfig>();
  for (const config of configs) {
    const normalized = normalizeName(config.name);
    if (!lookup.has(normalized)) lookup.set(normalized, config);
    const baseKey = normalized.split("-input")[0];
    if (!lookup.has(baseKey)) lookup.set(baseKey, config);
  }

  const byConfig = new Map<ResourceFileConfig, TransifexResource[]>();
  const unmatchedResources: TransifexResource[] = [];

  for (const resource of resources) {
    const match = nameVariations(resource.name)
      .map((variation) => lookup.get(normalizeName(variation)))
      .find((config) => config !== undefined);
    if (!match) {
      unmatchedResources.push(resource);
      continue;
    }
    byConfig.set(match, [...(byConfig.get(match) ?? []), resource]);
  }

  const selection: ResourceSelection = {
    resources: [],
    unmatchedConfigs: [],
    unmatchedResources,
  };
  for (const config of configs) {
    const matched = byConfig.get(config);
    if (!matched) {
      selection.unmatchedConfigs.push(config);
      continue;
    }
    for (const resource of matched) {
      selection.resources.push({ resource, config });
    }
  }
  return selection;
}
