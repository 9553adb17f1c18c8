export const DROP_SCHEMA = `
DROP TABLE IF EXISTS AnimeGenres;
DROP TABLE IF EXISTS Genres;
DROP TABLE IF EXISTS Anime;
`;

export const SCHEMA = `
-- One row per imported CSV record
CREATE TABLE Anime (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  mal_id INTEGER,
  image TEXT,
  title TEXT,
  release_date TEXT,
  synopsis TEXT,
  score REAL,
  episodes INTEGER,
  studio TEXT,
  theme TEXT
);

-- Genre lookup, one row per distinct name
CREATE TABLE Genres (
  genre_id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT UNIQUE
);

-- Many-to-many link
CREATE TABLE AnimeGenres (
  anime_id INTEGER,
  genre_id INTEGER,
  PRIMARY KEY (anime_id, genre_id),
  FOREIGN KEY (anime_id) REFERENCES Anime(id),
  FOREIGN KEY (genre_id) REFERENCES Genres(genre_id)
);
`;
