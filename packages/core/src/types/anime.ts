export type CanonicalField =
  | "externalId"
  | "image"
  | "title"
  | "releaseDate"
  | "synopsis"
  | "score"
  | "episodes"
  | "studio"
  | "theme"
  | "genres";

/** A CSV row, one cell per header column. */
export type CsvRecord = string[];

export interface CsvTable {
  header: string[];
  rows: CsvRecord[];
}

export type ColumnMap = Record<CanonicalField, number | null>;

export interface AnimeInsert {
  externalId: number;
  image: string;
  title: string;
  releaseDate: string;
  synopsis: string;
  score: number | null;
  episodes: number | null;
  studio: string;
  theme: string;
}
