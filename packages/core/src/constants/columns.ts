import type { CanonicalField, ColumnMap } from "../types/anime";

/**
 * Accepted header spellings per canonical field, highest priority first.
 * Matching is case-insensitive against the trimmed header text.
 */
export const COLUMN_SYNONYMS: Readonly<Record<CanonicalField, readonly string[]>> = {
  externalId: ["mal_id", "mal id", "id"],
  image: ["image"],
  title: ["title", "name"],
  releaseDate: ["release", "release_date", "aired"],
  synopsis: ["synopsis", "description"],
  score: ["score", "rating"],
  episodes: ["episodes", "eps"],
  studio: ["studio", "studios"],
  theme: ["theme", "themes"],
  genres: ["genre", "genres"],
};

export const CANONICAL_FIELDS: readonly CanonicalField[] = [
  "externalId",
  "image",
  "title",
  "releaseDate",
  "synopsis",
  "score",
  "episodes",
  "studio",
  "theme",
  "genres",
];

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

export function resolveColumns(header: string[]): ColumnMap {
  // a later header with the same normalized text replaces an earlier one
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const key = normalizeHeader(name);
    if (key) positions.set(key, index);
  });

  const locate = (field: CanonicalField): number | null => {
    for (const synonym of COLUMN_SYNONYMS[field]) {
      const index = positions.get(synonym);
      if (index !== undefined) return index;
    }
    return null;
  };

  return {
    externalId: locate("externalId"),
    image: locate("image"),
    title: locate("title"),
    releaseDate: locate("releaseDate"),
    synopsis: locate("synopsis"),
    score: locate("score"),
    episodes: locate("episodes"),
    studio: locate("studio"),
    theme: locate("theme"),
    genres: locate("genres"),
  };
}

export function readField(row: string[], columns: ColumnMap, field: CanonicalField): string {
  const index = columns[field];
  if (index === null) return "";
  return row[index] ?? "";
}

export function describeColumns(header: string[], columns: ColumnMap): string[] {
  return CANONICAL_FIELDS.map((field) => {
    const index = columns[field];
    return index === null ? `${field}: (absent)` : `${field} <- ${header[index]?.trim() ?? ""}`;
  });
}
