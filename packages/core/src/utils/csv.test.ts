import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { padRecord, parseCsv, readCsv } from "./csv";

describe("parseCsv", () => {
  test("splits header from rows", () => {
    const table = parseCsv("MAL_ID,Title\n1,Cowboy Bebop\n2,Trigun\n");

    expect(table?.header).toEqual(["MAL_ID", "Title"]);
    expect(table?.rows).toEqual([
      ["1", "Cowboy Bebop"],
      ["2", "Trigun"],
    ]);
  });

  test("keeps quoted commas and line breaks inside a cell", () => {
    const table = parseCsv('id,Genres\n1,"[\'Action\',\n \'Drama\']"\n');

    expect(table?.rows[0]).toEqual(["1", "['Action',\n 'Drama']"]);
  });

  test("strips a leading byte order mark", () => {
    const table = parseCsv("\uFEFFMAL_ID,Title\n1,X\n");
    expect(table?.header[0]).toBe("MAL_ID");
  });

  test("tolerates rows of uneven width", () => {
    const table = parseCsv("a,b,c\n1\n1,2,3,4\n");
    expect(table?.rows).toEqual([["1"], ["1", "2", "3", "4"]]);
  });

  test("skips blank lines", () => {
    const table = parseCsv("a,b\n\n1,2\n\n");
    expect(table?.rows).toEqual([["1", "2"]]);
  });

  test("keeps the rows before a record with an unclosed quote", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const table = parseCsv('a,b\n1,2\n3,"x\n');

    expect(table?.rows).toEqual([["1", "2"]]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  test("returns null for empty content", () => {
    expect(parseCsv("")).toBeNull();
  });

  test("returns a table with no rows for a header-only file", () => {
    expect(parseCsv("a,b\n")).toEqual({ header: ["a", "b"], rows: [] });
  });
});

describe("readCsv", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "anime-csv-core-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a file from disk", () => {
    const path = join(dir, "in.csv");
    writeFileSync(path, "MAL_ID\n5\n");

    expect(readCsv(path)).toEqual({ header: ["MAL_ID"], rows: [["5"]] });
  });

  test("throws for a missing file", () => {
    const path = join(dir, "missing.csv");
    expect(() => readCsv(path)).toThrow(`Input file not found: ${path}`);
  });
});

describe("padRecord", () => {
  test("pads short records and truncates long ones", () => {
    expect(padRecord(["1"], 3)).toEqual(["1", "", ""]);
    expect(padRecord(["1", "2", "3"], 2)).toEqual(["1", "2"]);
  });
});
