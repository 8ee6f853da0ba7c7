import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParseError } from "./errors.js";
import {
  loadTranslationArtifact,
  saveTranslationResults,
} from "./translation-store.js";
import type { ResourceKey, TranslationResult } from "./types.js";

const key: ResourceKey = { resource: "app", language: "ar", mode: "untranslated" };

function result(stringKey: string, translation: string): TranslationResult {
  return {
    key: stringKey,
    source: stringKey.toUpperCase(),
    translation,
    context: "",
    status: "translated",
    processedAt: "2024-05-01T00:00:00.000Z",
  };
}

describe("translation store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "store-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null for a missing artifact", () => {
    expect(loadTranslationArtifact(join(dir, "none.json"))).toBeNull();
  });

  it("writes an artifact, creating directories", () => {
    const path = join(dir, "untranslated", "ar", "app.json");
    saveTranslationResults(path, key, [result("save", "حفظ")]);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({
      version: 1,
      resource: "app",
      language: "ar",
      mode: "untranslated",
      results: [result("save", "حفظ")],
    });
  });

  it("writes an empty artifact when there are no results", () => {
    const path = join(dir, "app.json");
    saveTranslationResults(path, key, []);

    expect(loadTranslationArtifact(path)?.results).toEqual([]);
  });

  it("replaces the results of an earlier run", () => {
    const path = join(dir, "app.json");
    saveTranslationResults(path, key, [result("a", "1"), result("b", "2")]);
    saveTranslationResults(path, key, [result("c", "3")]);

    expect(loadTranslationArtifact(path)?.results.map((r) => [r.key, r.translation])).toEqual([
      ["c", "3"],
    ]);
  });

  it("is unchanged by saving the same results twice", () => {
    const path = join(dir, "app.json");
    saveTranslationResults(path, key, [result("a", "1")]);
    const first = readFileSync(path, "utf-8");
    saveTranslationResults(path, key, [result("a", "1")]);

    expect(readFileSync(path, "utf-8")).toBe(first);
  });

  it("rejects invalid JSON", () => {
    const path = join(dir, "app.json");
    writeFileSync(path, "{ not json");

    expect(() => loadTranslationArtifact(path)).toThrow(ParseError);
  });

  it("rejects JSON of the wrong shape", () => {
    const path = join(dir, "app.json");
    writeFileSync(path, JSON.stringify({ version: 2, results: [] }));

    expect(() => loadTranslationArtifact(path)).toThrow(`${path} is not a translation artifact`);
  });
});
