import { readFileSync, writeFileSync, mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { ParseError, errorMessage } from "./errors.js";
import { MODES } from "./types.js";
import type {
  ResourceKey,
  TranslationArtifact,
  TranslationResult,
} from "./types.js";

const TranslationArtifactSchema = z.object({
  version: z.literal(1),
  resource: z.string(),
  language: z.string(),
  mode: z.enum(MODES),
  results: z.array(
    z.object({
      key: z.string(),
      source: z.string(),
      translation: z.string(),
      context: z.string(),
      status: z.enum(["translated", "approved", "rejected"]),
      explanation: z.string().optional(),
      processedAt: z.string(),
    }),
  ),
});

export function loadTranslationArtifact(
  path: string,
): TranslationArtifact | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ParseError(
      `${path} is not valid JSON: ${errorMessage(error)}`,
    );
  }

  const parsed = TranslationArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(`${path} is not a translation artifact`);
  }
  return parsed.data;
}

/**
 * Writes the results of the latest run, replacing whatever the artifact
 * held before. Results from earlier runs are never carried over.
 */
export function saveTranslationResults(
  path: string,
  key: ResourceKey,
  results: readonly TranslationResult[],
): TranslationArtifact {
  const artifact: TranslationArtifact = {
    version: 1,
    resource: key.resource,
    language: key.language,
    mode: key.mode,
    results: [...results],
  };

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(artifact, null, 2));
  return artifact;
}
