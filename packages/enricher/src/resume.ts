import { existsSync } from "node:fs";
import { type CsvTable, readCsv } from "@anime-csv/core";

export const IMAGE_COLUMN = "image";

/** Collects `id -> image` pairs where both cells are non-empty. */
export function collectKnownImages(
  table: CsvTable,
  idColumn: string,
  known: Map<string, string> = new Map()
): Map<string, string> {
  const idIndex = table.header.indexOf(idColumn);
  const imageIndex = table.header.indexOf(IMAGE_COLUMN);
  if (idIndex < 0 || imageIndex < 0) return known;

  for (const row of table.rows) {
    const id = (row[idIndex] ?? "").trim();
    const image = (row[imageIndex] ?? "").trim();
    if (id && image && !known.has(id)) {
      known.set(id, image);
    }
  }
  return known;
}

/** Reads the image values written by a previous run, if its output file exists. */
export function loadPreviousOutput(outputPath: string, idColumn: string): Map<string, string> {
  if (!existsSync(outputPath)) return new Map();

  const table = readCsv(outputPath);
  return table ? collectKnownImages(table, idColumn) : new Map();
}
