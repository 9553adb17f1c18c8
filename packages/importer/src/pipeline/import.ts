import {
  type AnimeInsert,
  type ColumnMap,
  type CsvRecord,
  describeColumns,
  readCsv,
  readField,
  resolveColumns,
} from "@anime-csv/core";
import { parseGenres } from "../genres/parser";
import { parseExternalId, toAnimeInsert } from "../normalize/fields";
import {
  type AnimeStore,
  type ImportDatabase,
  countRows,
  createAnimeStore,
  createDatabase,
  initializeSchema,
} from "../sqlite/builder";

export const DEFAULT_COMMIT_EVERY = 500;

export interface ImportOptions {
  csvPath: string;
  dbPath: string;
  commitEvery?: number;
  onProgress?: (inserted: number) => void;
}

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface ImportResult {
  inserted: number;
  skipped: SkippedRow[];
  rowCount: number;
  genreCount: number;
  linkCount: number;
  columns: ColumnMap;
}

interface BatchState {
  inserted: number;
  uncommitted: number;
  skipped: SkippedRow[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function beginIfIdle(db: ImportDatabase): void {
  if (!db.inTransaction) db.exec("BEGIN");
}

function commitIfOpen(db: ImportDatabase): void {
  if (db.inTransaction) db.exec("COMMIT");
}

function persistRow(store: AnimeStore, record: AnimeInsert, genres: string[]): number {
  const animeId = store.insertAnime(record);
  for (const genre of genres) {
    store.linkGenre(animeId, store.ensureGenre(genre));
  }
  return animeId;
}

function skip(state: BatchState, line: number, reason: string): void {
  state.skipped.push({ line, reason });
  console.warn(`Row ${line} skipped: ${reason}`);
}

/**
 * Rebuilds the Anime/Genres/AnimeGenres tables at `dbPath` from the CSV at `csvPath`.
 *
 * The input is validated before the database is opened, so a missing or empty CSV
 * leaves any existing database untouched. Rows are committed every `commitEvery`
 * inserts; a row that fails is rolled back on its own and the import continues.
 */
export function importCsv(options: ImportOptions): ImportResult {
  const commitEvery = Math.max(1, options.commitEvery ?? DEFAULT_COMMIT_EVERY);

  const table = readCsv(options.csvPath);
  if (!table) {
    throw new Error(`Input CSV is empty: ${options.csvPath}`);
  }

  const columns = resolveColumns(table.header);
  console.log("Detected CSV columns:");
  for (const line of describeColumns(table.header, columns)) {
    console.log(` - ${line}`);
  }

  const db = createDatabase(options.dbPath);

  try {
    initializeSchema(db);
    const store = createAnimeStore(db);
    const importRow = db.transaction(persistRow);
    const state: BatchState = { inserted: 0, uncommitted: 0, skipped: [] };

    beginIfIdle(db);

    table.rows.forEach((row: CsvRecord, index) => {
      const line = index + 1;
      const externalId = parseExternalId(readField(row, columns, "externalId"));
      if (!externalId.ok) {
        skip(state, line, externalId.reason);
        return;
      }

      try {
        const record = toAnimeInsert(row, columns, externalId.value);
        importRow(store, record, parseGenres(readField(row, columns, "genres")));
      } catch (error) {
        skip(state, line, errorMessage(error));
        // some SQLite errors abort the whole transaction, not just the savepoint
        beginIfIdle(db);
        return;
      }

      state.inserted += 1;
      state.uncommitted += 1;

      if (state.uncommitted >= commitEvery) {
        commitIfOpen(db);
        state.uncommitted = 0;
        console.log(`Inserted ${state.inserted}`);
        options.onProgress?.(state.inserted);
        beginIfIdle(db);
      }
    });

    commitIfOpen(db);

    const counts = countRows(db);
    return {
      inserted: state.inserted,
      skipped: state.skipped,
      rowCount: counts.anime,
      genreCount: counts.genres,
      linkCount: counts.links,
      columns,
    };
  } finally {
    if (db.inTransaction) db.exec("ROLLBACK");
    db.close();
  }
}
