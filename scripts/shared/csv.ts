import { readFileSync, writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { ParseError } from "./errors.js";
import type { StringRecord } from "./types.js";

const COLUMNS = [
  { key: "resource", header: "Resource" },
  { key: "key", header: "String Key" },
  { key: "source", header: "Source String" },
  { key: "translation", header: "Translation" },
  { key: "context", header: "Context" },
] as const satisfies ReadonlyArray<{ key: keyof StringRecord; header: string }>;

export function writeStringRecords(
  path: string,
  records: readonly StringRecord[],
): void {
  mkdirSync(dirname(path), { recursive: true });
  const csvText = stringify(
    records.map((record) => ({ ...record })),
    {
      header: true,
      columns: COLUMNS.map(({ key, header }) => ({ key, header })),
    },
  );
  writeFileSync(path, csvText, "utf-8");
}

export function readStringRecords(path: string): StringRecord[] {
  const csvText = readFileSync(path, "utf-8");
  const rows: Record<string, string>[] = parse(csvText, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  return rows.map((row, index) => {
    const key = row["String Key"];
    const source = row["Source String"];
    if (key === undefined || source === undefined) {
      throw new ParseError(
        `${path}: row ${index + 1} is missing "String Key" or "Source String"`,
      );
    }

    return {
      resource: row["Resource"] ?? "",
      key,
      source,
      translation: row["Translation"] ?? "",
      context: row["Context"] ?? "",
    };
  });
}
