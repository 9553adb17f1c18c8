import Database from "better-sqlite3";
import type { AnimeInsert } from "@anime-csv/core";
import { DROP_SCHEMA, SCHEMA } from "./schema";

export type ImportDatabase = Database.Database;

export interface AnimeStore {
  insertAnime(record: AnimeInsert): number;
  ensureGenre(name: string): number;
  linkGenre(animeId: number, genreId: number): boolean;
}

export interface TableCounts {
  anime: number;
  genres: number;
  links: number;
}

export function createDatabase(path: string): ImportDatabase {
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  return db;
}

/**
 * Drops and recreates the Anime, Genres and AnimeGenres tables.
 * Any data previously held in them is lost.
 */
export function initializeSchema(db: ImportDatabase): void {
  db.exec(DROP_SCHEMA);
  db.exec(SCHEMA);
}

export function listTables(db: ImportDatabase): string[] {
  const rows = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();
  return rows.map((r) => r.name);
}

export function createAnimeStore(db: ImportDatabase): AnimeStore {
  const insertAnime = db.prepare<[number, string, string, string, string, number | null, number | null, string, string]>(`
    INSERT INTO Anime
      (mal_id, image, title, release_date, synopsis, score, episodes, studio, theme)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertGenre = db.prepare<[string]>("INSERT OR IGNORE INTO Genres (name) VALUES (?)");
  const selectGenre = db.prepare<[string], { genre_id: number }>(
    "SELECT genre_id FROM Genres WHERE name = ?"
  );
  const insertLink = db.prepare<[number, number]>(
    "INSERT OR IGNORE INTO AnimeGenres (anime_id, genre_id) VALUES (?, ?)"
  );

  return {
    insertAnime(record) {
      const result = insertAnime.run(
        record.externalId,
        record.image,
        record.title,
        record.releaseDate,
        record.synopsis,
        record.score,
        record.episodes,
        record.studio,
        record.theme
      );
      return Number(result.lastInsertRowid);
    },

    ensureGenre(name) {
      insertGenre.run(name);
      const row = selectGenre.get(name);
      if (!row) {
        throw new Error(`Genre "${name}" missing after insert`);
      }
      return row.genre_id;
    },

    linkGenre(animeId, genreId) {
      return insertLink.run(animeId, genreId).changes > 0;
    },
  };
}

export function countRows(db: ImportDatabase): TableCounts {
  const count = (table: "Anime" | "Genres" | "AnimeGenres"): number =>
    db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

  return {
    anime: count("Anime"),
    genres: count("Genres"),
    links: count("AnimeGenres"),
  };
}
