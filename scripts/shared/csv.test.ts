import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readStringRecords, writeStringRecords } from "./csv.js";
import { ParseError } from "./errors.js";
import type { StringRecord } from "./types.js";

describe("string record CSV", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "csv-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads back what it wrote, including quotes, commas and newlines", () => {
    const records: StringRecord[] = [
      {
        resource: "app",
        key: "greeting",
        source: 'Say "hello", {name}',
        translation: "",
        context: "home page",
      },
      {
        resource: "app",
        key: "footer.note",
        source: "Line one\nLine two",
        translation: "سطر واحد\nسطر اثنان",
        context: "",
      },
    ];
    const path = join(dir, "untranslated", "ar", "app.csv");

    writeStringRecords(path, records);

    expect(readStringRecords(path)).toEqual(records);
  });

  it("writes the header row first", () => {
    const path = join(dir, "app.csv");
    writeStringRecords(path, [
      { resource: "app", key: "k", source: "s", translation: "t", context: "c" },
    ]);

    const [header, row] = readFileSync(path, "utf-8").split("\n");
    expect(header).toBe("Resource,String Key,Source String,Translation,Context");
    expect(row).toBe("app,k,s,t,c");
  });

  it("reads an empty list back as empty", () => {
    const path = join(dir, "empty.csv");
    writeStringRecords(path, []);

    expect(readStringRecords(path)).toEqual([]);
  });

  it("overwrites earlier content", () => {
    const path = join(dir, "app.csv");
    writeStringRecords(path, [
      { resource: "app", key: "old", source: "Old", translation: "", context: "" },
    ]);
    writeStringRecords(path, [
      { resource: "app", key: "new", source: "New", translation: "", context: "" },
    ]);

    expect(readStringRecords(path).map((r) => r.key)).toEqual(["new"]);
  });

  it("fills in missing Translation and Context columns", () => {
    const path = join(dir, "legacy.csv");
    writeFileSync(path, "Resource,String Key,Source String\napp,k,Hello\n");

    expect(readStringRecords(path)).toEqual([
      { resource: "app", key: "k", source: "Hello", translation: "", context: "" },
    ]);
  });

  it("reads a file saved with a byte order mark", () => {
    const path = join(dir, "bom.csv");
    writeFileSync(
      path,
      "\uFEFFResource,String Key,Source String,Translation,Context\napp,k,s,t,c\n",
    );

    expect(readStringRecords(path)).toEqual([
      { resource: "app", key: "k", source: "s", translation: "t", context: "c" },
    ]);
  });

  it("rejects files without string keys", () => {
    const path = join(dir, "bad.csv");
    writeFileSync(path, "Name,Value\na,b\n");

    expect(() => readStringRecords(path)).toThrow(ParseError);
  });
});
