import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://rest.api.transifex.com";
export const DEFAULT_MODEL = "gpt-4o-mini";

const LANGUAGE_CODE = /^[A-Za-z]{2,3}([_-][A-Za-z0-9]+)*$/;

// Empty strings in .env files count as unset.
const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const required = () => z.preprocess(blankAsUndefined, z.string());
const withDefault = (fallback: string) =>
  z.preprocess(blankAsUndefined, z.string().default(fallback));

const EnvSchema = z.object({
  TRANSIFEX_API_TOKEN: required(),
  TRANSIFEX_ORGANIZATION: required(),
  TRANSIFEX_PROJECT: required(),
  TARGET_LANGUAGES: required(),
  OPENAI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  OPENAI_MODEL: withDefault(DEFAULT_MODEL),
  TRANSIFEX_BASE_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default(DEFAULT_BASE_URL),
  ),
  OUTPUT_DIR: withDefault("output"),
  TRANSLATIONS_DIR: withDefault("translations"),
  TRANSIFEX_CONFIG: withDefault("transifex.yml"),
});

export interface SyncConfig {
  readonly transifex: {
    readonly apiToken: string;
    readonly organization: string;
    readonly project: string;
    readonly baseUrl: string;
  };
  readonly targetLanguages: readonly string[];
  readonly openai: {
    readonly apiKey: string | undefined;
    readonly model: string;
  };
  readonly paths: {
    readonly outputDir: string;
    readonly translationsDir: string;
    readonly transifexConfig: string;
  };
}

export function parseLanguages(value: string): string[] {
  const languages = value
    .split(",")
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);

  if (languages.length === 0) {
    throw new ConfigError("TARGET_LANGUAGES must list at least one language");
  }

  const invalid = languages.filter((lang) => !LANGUAGE_CODE.test(lang));
  if (invalid.length > 0) {
    throw new ConfigError(
      `TARGET_LANGUAGES contains invalid language codes: ${invalid.join(", ")}`,
    );
  }

  return [...new Set(languages)];
}

/**
 * Builds the configuration once at startup. Stages receive the result
 * as an argument and never read the environment themselves.
 */
export function loadConfig(env: NodeJS.ProcessEnv): SyncConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const names = [
      ...new Set(parsed.error.issues.map((issue) => issue.path.join("."))),
    ];
    throw new ConfigError(
      `Missing or invalid environment variables: ${names.join(", ")}`,
    );
  }

  const vars = parsed.data;

  return {
    transifex: {
      apiToken: vars.TRANSIFEX_API_TOKEN,
      organization: vars.TRANSIFEX_ORGANIZATION,
      project: vars.TRANSIFEX_PROJECT,
      baseUrl: vars.TRANSIFEX_BASE_URL.replace(/\/+$/, ""),
    },
    targetLanguages: parseLanguages(vars.TARGET_LANGUAGES),
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
    },
    paths: {
      outputDir: vars.OUTPUT_DIR,
      translationsDir: vars.TRANSLATIONS_DIR,
      transifexConfig: vars.TRANSIFEX_CONFIG,
    },
  };
}

export function requireOpenAIKey(config: SyncConfig): string {
  if (!config.openai.apiKey) {
    throw new ConfigError(
      "OPENAI_API_KEY env var is required for translate. " +
        "Create a .env file or export it before running.",
    );
  }
  return config.openai.apiKey;
}
