import { existsSync, readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import type { CsvRecord, CsvTable } from "../types/anime";

export function parseCsv(content: string): CsvTable | null {
  const parsed: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    // an unclosed quote drops that record only
    skip_records_with_error: true,
    on_skip: (error) => {
      console.warn(`Skipped malformed CSV record: ${error ? error.message : "unreadable record"}`);
      return undefined;
    },
  });

  if (!Array.isArray(parsed) || parsed.length === 0) return null;

  const records: CsvRecord[] = parsed.map((record) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? "")) : []
  );

  const [header, ...rows] = records;
  if (!header || header.length === 0) return null;

  return { header, rows };
}

/**
 * Reads a UTF-8 CSV (BOM tolerated). Returns null when the file has no header row.
 * Throws when the file does not exist.
 */
export function readCsv(path: string): CsvTable | null {
  if (!existsSync(path)) {
    throw new Error(`Input file not found: ${path}`);
  }
  return parseCsv(readFileSync(path, "utf-8"));
}

export function padRecord(record: CsvRecord, width: number): CsvRecord {
  return Array.from({ length: width }, (_, i) => record[i] ?? "");
}
