import { closeSync, fsyncSync, openSync, renameSync, writeSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { readCsv } from "@anime-csv/core";
import { stringify } from "csv-stringify/sync";
import type { ImageFetcher } from "../fetcher";
import type { Pacer } from "../pacer";
import { collectKnownImages, loadPreviousOutput } from "../resume";
import { placeImage, planOutputColumns } from "./columns";

export const DEFAULT_ID_COLUMN = "MAL_ID";
export const DEFAULT_SAVE_EVERY = 50;

export interface EnrichOptions {
  inputPath: string;
  outputPath?: string;
  idColumn?: string;
  saveEvery?: number;
  fetcher: ImageFetcher;
  pacer: Pacer;
  onProgress?: (current: number, total: number) => void;
}

export interface EnrichResult {
  outputPath: string;
  rows: number;
  reused: number;
  fetched: number;
  missing: number;
}

export function defaultOutputPath(inputPath: string): string {
  const ext = extname(inputPath);
  return join(dirname(inputPath), `${basename(inputPath, ext)}_with_images${ext}`);
}

/**
 * Writes a copy of the input CSV with an `image` column. Images already present in a
 * previous output (or in the input) are reused without a lookup. The copy is written to
 * `<output>.tmp` and renamed over the output once every row is done.
 */
export async function enrichCsv(options: EnrichOptions): Promise<EnrichResult> {
  const idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;
  const saveEvery = Math.max(1, options.saveEvery ?? DEFAULT_SAVE_EVERY);
  const outputPath = options.outputPath ?? defaultOutputPath(options.inputPath);

  const table = readCsv(options.inputPath);
  if (!table) {
    throw new Error(`Input CSV is empty: ${options.inputPath}`);
  }

  const layout = planOutputColumns(table.header, idColumn);
  const known = loadPreviousOutput(outputPath, idColumn);
  if (known.size > 0) {
    console.log(`Found existing output ${outputPath}. Reusing ${known.size} image values.`);
  }
  collectKnownImages(table, idColumn, known);

  const idIndex = table.header.indexOf(idColumn);
  const result: EnrichResult = { outputPath, rows: 0, reused: 0, fetched: 0, missing: 0 };
  const tempPath = `${outputPath}.tmp`;
  const fd = openSync(tempPath, "w");

  try {
    writeSync(fd, stringify([layout.header]));

    for (const row of table.rows) {
      const id = idIndex < 0 ? "" : (row[idIndex] ?? "").trim();
      let image = known.get(id) ?? "";

      if (image) {
        result.reused += 1;
      } else if (id) {
        image = (await options.fetcher.fetchImageUrl(id)) ?? "";
        await options.pacer.pause();
        if (image) {
          known.set(id, image);
          result.fetched += 1;
        }
      }

      if (!image) {
        result.missing += 1;
      }

      writeSync(fd, stringify([placeImage(row, table.header.length, layout, image)]));
      result.rows += 1;

      if (result.rows % saveEvery === 0) {
        fsyncSync(fd);
        console.log(`Saved progress: ${result.rows} rows`);
        options.onProgress?.(result.rows, table.rows.length);
      }
    }

    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }

  renameSync(tempPath, outputPath);
  return result;
}
