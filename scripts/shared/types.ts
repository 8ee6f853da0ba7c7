export const MODES = ["untranslated", "unreviewed"] as const;

export type Mode = (typeof MODES)[number];

/** One unit of work: a Transifex resource slug in one target language. */
export interface ResourceKey {
  resource: string;
  language: string;
  mode: Mode;
}

export interface StringRecord {
  resource: string;
  key: string;
  source: string;
  translation: string;
  context: string;
}

export type TranslationStatus = "translated" | "approved" | "rejected";

export interface TranslationResult {
  key: string;
  source: string;
  translation: string;
  context: string;
  status: TranslationStatus;
  explanation?: string;
  processedAt: string;
}

export interface TranslationArtifact {
  version: 1;
  resource: string;
  language: string;
  mode: Mode;
  results: TranslationResult[];
}

export interface TransifexResource {
  id: string;
  slug: string;
  name: string;
}
