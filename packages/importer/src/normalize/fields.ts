import {
  type AnimeInsert,
  type ColumnMap,
  type CsvRecord,
  firstDigitRun,
  readField,
} from "@anime-csv/core";

export type ExternalIdResult = { ok: true; value: number } | { ok: false; reason: string };

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Plain decimal or exponent notation only; hex, NaN and Infinity are rejected. */
export function parseReal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/** Truncates toward zero; null when the result would not bind to SQLite as an exact INTEGER. */
function toInteger(value: number): number | null {
  // -0 stored as 0
  const integer = Math.trunc(value) + 0;
  return Number.isSafeInteger(integer) ? integer : null;
}

export function parseEpisodes(text: string): number | null {
  if (!text) return null;

  const real = parseReal(text);
  if (real !== null) return toInteger(real);

  const digits = firstDigitRun(text);
  return digits === null ? null : toInteger(Number.parseInt(digits, 10));
}

export function parseScore(text: string): number | null {
  if (!text) return null;
  return parseReal(text);
}

export function parseExternalId(text: string): ExternalIdResult {
  const trimmed = text.trim();
  if (!trimmed) {
    return { ok: false, reason: "missing external id" };
  }

  const value = parseReal(trimmed);
  if (value === null) {
    return { ok: false, reason: `unparseable external id "${trimmed}"` };
  }

  const integer = toInteger(value);
  if (integer === null) {
    return { ok: false, reason: `external id out of range "${trimmed}"` };
  }

  return { ok: true, value: integer };
}

export function toAnimeInsert(row: CsvRecord, columns: ColumnMap, externalId: number): AnimeInsert {
  return {
    externalId,
    image: readField(row, columns, "image"),
    title: readField(row, columns, "title"),
    releaseDate: readField(row, columns, "releaseDate"),
    synopsis: readField(row, columns, "synopsis"),
    score: parseScore(readField(row, columns, "score")),
    episodes: parseEpisodes(readField(row, columns, "episodes")),
    studio: readField(row, columns, "studio"),
    theme: readField(row, columns, "theme"),
  };
}
