#!/usr/bin/env tsx
import { resolve } from "node:path";
import { defaultDatabasePath, getConfig } from "./config";
import { importCsv } from "./pipeline/import";

const args = process.argv.slice(2);

function printUsage(): void {
  console.log(`
anime-import <anime.csv> [anime.db]

Loads the CSV into a SQLite database with Anime, Genres and AnimeGenres tables.
The tables are dropped and rebuilt on every run.

Arguments:
  anime.csv   Input CSV (required)
  anime.db    Output database (default: anime.db beside the CSV)

Environment:
  IMPORT_COMMIT_EVERY   Rows per commit (default: 500)
`);
}

function main(): void {
  const [csvArg, dbArg] = args;
  if (!csvArg || csvArg === "help" || csvArg === "--help") {
    printUsage();
    return;
  }

  const csvPath = resolve(csvArg);
  const dbPath = dbArg ? resolve(dbArg) : defaultDatabasePath(csvPath);
  const config = getConfig();

  console.log(`CSV: ${csvPath}`);
  console.log(`DB : ${dbPath}`);

  const result = importCsv({ csvPath, dbPath, commitEvery: config.commitEvery });

  console.log("\nImport complete");
  console.log(`Rows in Anime: ${result.rowCount}`);
  console.log(`Genres: ${result.genreCount}, links: ${result.linkCount}`);
  if (result.skipped.length > 0) {
    console.log(`Skipped rows: ${result.skipped.length}`);
  }
}

try {
  main();
} catch (err) {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
