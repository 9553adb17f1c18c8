import { collapseLineBreaks, unwrapQuotes } from "@anime-csv/core";

export type GenreParseResult = { parsed: true; genres: string[] } | { parsed: false };

export interface GenreStrategy {
  name: string;
  parse(text: string): GenreParseResult;
}

const UNPARSED: GenreParseResult = { parsed: false };

function cleanNames(values: string[]): string[] {
  return values.map((v) => v.trim()).filter((v) => v.length > 0);
}

function elementText(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** Handles list literals such as `['Action', 'Drama']` by reading them as JSON. */
export const listLiteralStrategy: GenreStrategy = {
  name: "list-literal",
  parse(text) {
    let value: unknown;
    try {
      value = JSON.parse(text.replaceAll("'", '"'));
    } catch {
      return UNPARSED;
    }

    if (!Array.isArray(value)) return UNPARSED;
    return { parsed: true, genres: cleanNames(value.map(elementText)) };
  },
};

export const tokenScanStrategy: GenreStrategy = {
  name: "token-scan",
  parse(text) {
    return { parsed: true, genres: cleanNames(text.match(/[A-Za-z0-9\s-]+/g) ?? []) };
  },
};

export const GENRE_STRATEGIES: readonly GenreStrategy[] = [listLiteralStrategy, tokenScanStrategy];

export function parseGenres(
  raw: string,
  strategies: readonly GenreStrategy[] = GENRE_STRATEGIES
): string[] {
  const collapsed = collapseLineBreaks(raw).trim();
  if (!collapsed || collapsed === "[]") return [];

  const text = unwrapQuotes(collapsed);
  for (const strategy of strategies) {
    const result = strategy.parse(text);
    if (result.parsed) return result.genres;
  }
  return [];
}
