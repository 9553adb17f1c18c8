import { describe, test, expect } from "vitest";
import { resolveColumns } from "@anime-csv/core";
import { parseEpisodes, parseExternalId, parseReal, parseScore, toAnimeInsert } from "./fields";

describe("parseReal", () => {
  test("parses integers, decimals and exponents", () => {
    expect(parseReal("12")).toBe(12);
    expect(parseReal(" 8.25 ")).toBe(8.25);
    expect(parseReal(".5")).toBe(0.5);
    expect(parseReal("1e3")).toBe(1000);
    expect(parseReal("-3")).toBe(-3);
  });

  test("rejects text that is not a plain number", () => {
    expect(parseReal("")).toBeNull();
    expect(parseReal("0x10")).toBeNull();
    expect(parseReal("NaN")).toBeNull();
    expect(parseReal("Infinity")).toBeNull();
    expect(parseReal("12 eps")).toBeNull();
  });
});

describe("parseEpisodes", () => {
  test("parses whole numbers", () => {
    expect(parseEpisodes("12")).toBe(12);
  });

  test("truncates decimal counts", () => {
    expect(parseEpisodes("12.0")).toBe(12);
    expect(parseEpisodes("24.9")).toBe(24);
  });

  test("falls back to the first digit run", () => {
    expect(parseEpisodes("12 eps")).toBe(12);
    expect(parseEpisodes("approx. 26 episodes")).toBe(26);
  });

  test("treats counts too large for an integer column as absent", () => {
    expect(parseEpisodes("1e30")).toBeNull();
    expect(parseEpisodes("99999999999999999999 eps")).toBeNull();
  });

  test("returns null when nothing numeric is present", () => {
    expect(parseEpisodes("unknown")).toBeNull();
    expect(parseEpisodes("")).toBeNull();
  });
});

describe("parseScore", () => {
  test("parses floating point scores", () => {
    expect(parseScore("8.5")).toBe(8.5);
  });

  test("does not scan for digits", () => {
    expect(parseScore("N/A")).toBeNull();
    expect(parseScore("8.5/10")).toBeNull();
  });

  test("returns null for empty text", () => {
    expect(parseScore("")).toBeNull();
  });
});

describe("parseExternalId", () => {
  test("accepts integers and truncates decimals", () => {
    expect(parseExternalId("21")).toEqual({ ok: true, value: 21 });
    expect(parseExternalId(" 5114.0 ")).toEqual({ ok: true, value: 5114 });
  });

  test("rejects blank ids", () => {
    expect(parseExternalId("  ")).toEqual({ ok: false, reason: "missing external id" });
  });

  test("rejects ids too large for an integer column", () => {
    expect(parseExternalId("1e20")).toEqual({ ok: false, reason: 'external id out of range "1e20"' });
    expect(parseExternalId("9007199254740993")).toEqual({
      ok: false,
      reason: 'external id out of range "9007199254740993"',
    });
  });

  test("rejects non-numeric ids", () => {
    expect(parseExternalId("abc")).toEqual({ ok: false, reason: 'unparseable external id "abc"' });
  });
});

describe("toAnimeInsert", () => {
  test("maps resolved columns and coerces numbers", () => {
    const columns = resolveColumns([
      "MAL_ID",
      "Name",
      "Aired",
      "Rating",
      "Eps",
      "Studios",
      "Description",
      "image",
    ]);
    const row = ["1", "Cowboy Bebop", "Apr 1998", "8.75", "26 eps", "Sunrise", "Bounty hunters.", "http://x/1.jpg"];

    expect(toAnimeInsert(row, columns, 1)).toEqual({
      externalId: 1,
      image: "http://x/1.jpg",
      title: "Cowboy Bebop",
      releaseDate: "Apr 1998",
      synopsis: "Bounty hunters.",
      score: 8.75,
      episodes: 26,
      studio: "Sunrise",
      theme: "",
    });
  });

  test("stores missing numeric fields as null", () => {
    const columns = resolveColumns(["id", "score", "episodes"]);

    const record = toAnimeInsert(["3", "N/A", "?"], columns, 3);

    expect(record.score).toBeNull();
    expect(record.episodes).toBeNull();
  });
});
