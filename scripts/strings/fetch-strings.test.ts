import { existsSync, mkdtempSync, readFileSync, rmSync, statSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { cacheArtifactPath } from "../shared/cache.js";
import { readStringRecords } from "../shared/csv.js";
import { TransifexApiError } from "../shared/errors.js";
import type { StringSource } from "../shared/transifex-client.js";
import type { ResourceKey, StringRecord } from "../shared/types.js";
import { buildResourceKeys, fetchStrings } from "./fetch-strings.js";

const HEADER = "Resource,String Key,Source String,Translation,Context";

function record(key: string, source: string): StringRecord {
  return { resource: "app", key, source, translation: "", context: "" };
}

function fakeSource(byLanguage: Record<string, StringRecord[]>) {
  const listStrings = vi.fn(async (key: ResourceKey) => {
    const records = byLanguage[key.language];
    if (!records) throw new TransifexApiError(500, "boom");
    return records;
  });
  const source: StringSource = { listStrings };
  return { source, listStrings };
}

describe("buildResourceKeys", () => {
  it("crosses resources with languages, resources outermost", () => {
    expect(buildResourceKeys(["app", "emails"], ["ar", "fa"], "unreviewed")).toEqual([
      { resource: "app", language: "ar", mode: "unreviewed" },
      { resource: "app", language: "fa", mode: "unreviewed" },
      { resource: "emails", language: "ar", mode: "unreviewed" },
      { resource: "emails", language: "fa", mode: "unreviewed" },
    ]);
  });
});

describe("fetchStrings", () => {
  let dir: string;
  const keys = buildResourceKeys(["app"], ["ar", "fa"], "untranslated");

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fetch-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes one CSV per key, empty when nothing is pending", async () => {
    const { source } = fakeSource({
      ar: [record("a", "A"), record("b", "B"), record("c", "C")],
      fa: [],
    });

    const report = await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });

    expect(report.failed).toEqual([]);
    expect(report.completed.map((c) => [c.key.language, c.origin, c.count])).toEqual([
      ["ar", "remote", 3],
      ["fa", "remote", 0],
    ]);
    expect(readStringRecords(cacheArtifactPath(dir, keys[0]))).toHaveLength(3);
    expect(readFileSync(cacheArtifactPath(dir, keys[1]), "utf-8")).toBe(`${HEADER}\n`);
  });

  it("reuses cached artifacts without calling the API", async () => {
    const { source, listStrings } = fakeSource({ ar: [record("a", "A")], fa: [] });
    await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });
    const first = readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8");
    listStrings.mockClear();

    const report = await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });

    expect(listStrings).not.toHaveBeenCalled();
    expect(readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8")).toBe(first);
    expect(report.completed.map((c) => c.origin)).toEqual(["cache", "cache"]);
    expect(report.completed.map((c) => c.count)).toEqual([null, null]);
  });

  it("writes the same artifact again on a forced download", async () => {
    const { source } = fakeSource({ ar: [record("a", "A, with comma")], fa: [] });
    await fetchStrings({ source, outputDir: dir, keys, forceDownload: true });
    const first = readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8");

    await fetchStrings({ source, outputDir: dir, keys, forceDownload: true });

    expect(readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8")).toBe(first);
  });

  it("always downloads when forced", async () => {
    const { source, listStrings } = fakeSource({ ar: [record("a", "A")], fa: [] });
    await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });
    listStrings.mockClear();

    await fetchStrings({ source, outputDir: dir, keys, forceDownload: true });

    expect(listStrings).toHaveBeenCalledTimes(2);
  });

  it("produces identical artifacts when run twice", async () => {
    const { source } = fakeSource({ ar: [record("a", "A, with comma")], fa: [] });
    await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });
    const first = readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8");

    await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });

    expect(readFileSync(cacheArtifactPath(dir, keys[0]), "utf-8")).toBe(first);
  });

  it("records a failed key and carries on with the next", async () => {
    const { source } = fakeSource({ fa: [record("x", "X")] });

    const report = await fetchStrings({ source, outputDir: dir, keys, forceDownload: false });

    expect(report.failed).toEqual([
      { key: keys[0], error: "Transifex request failed (500): boom" },
    ]);
    expect(report.completed.map((c) => c.key)).toEqual([keys[1]]);
    expect(existsSync(cacheArtifactPath(dir, keys[0]))).toBe(false);
    expect(statSync(cacheArtifactPath(dir, keys[1])).isFile()).toBe(true);
  });
});
