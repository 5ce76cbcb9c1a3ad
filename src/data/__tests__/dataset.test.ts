import { describe, expect, it, vi } from "vitest";
import { LoadError } from "../../errors";
import { parseCsv, parseRatingsCsv, toRatingTable } from "../dataset";

describe("parseRatingsCsv", () => {
  it("reads rows and coerces cells", () => {
    const text = [
      "title,genres,rating,year",
      "Toy Story,Animation,5,1995",
      '"Good, Bad",Western,4.5,1966',
      "Heat,,3,1995",
      "Ronin,Action,n/a,",
    ].join("\n");

    expect(parseRatingsCsv(text)).toEqual([
      { genres: "Animation", rating: 5, title: "Toy Story", year: 1995 },
      { genres: "Western", rating: 4.5, title: "Good, Bad", year: 1966 },
      { genres: null, rating: 3, title: "Heat", year: 1995 },
      { genres: "Action", rating: null, title: "Ronin", year: null },
    ]);
  });

  it("ignores extra columns", () => {
    const text = "userId,title,genres,rating,year,timestamp\n7,Heat,Action,3,1995,0\n";

    expect(parseRatingsCsv(text)).toEqual([
      { genres: "Action", rating: 3, title: "Heat", year: 1995 },
    ]);
  });

  it("treats a fractional year as missing", () => {
    const [record] = parseRatingsCsv("title,genres,rating,year\nHeat,Action,3,1995.5\n");

    expect(record.year).toBeNull();
  });

  it("returns an empty table for a header without rows", () => {
    expect(parseRatingsCsv("title,genres,rating,year\n")).toEqual([]);
  });

  it("freezes the table and its rows", () => {
    const table = parseRatingsCsv("title,genres,rating,year\nHeat,Action,3,1995\n");

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table[0])).toBe(true);
  });

  it("fails when required columns are missing", () => {
    const text = "title,genres\nHeat,Action\n";

    expect(() => parseRatingsCsv(text)).toThrow(LoadError);
    expect(() => parseRatingsCsv(text)).toThrow(
      "Missing required column(s): rating, year",
    );
  });
});

describe("parseCsv", () => {
  it("warns about malformed rows and keeps them", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const { columns, rows } = parseCsv("title,genres,rating,year\nHeat,Action,3\n");

    expect(columns).toEqual(["title", "genres", "rating", "year"]);
    expect(rows).toHaveLength(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("1 problem(s)"));
  });

  it("trims header names", () => {
    expect(parseCsv(" title , genres \nHeat,Action\n").columns).toEqual([
      "title",
      "genres",
    ]);
  });
});

describe("toRatingTable", () => {
  it("fails without a header row", () => {
    expect(() => toRatingTable([], [])).toThrow("Data file has no header row");
  });

  it("accepts cells that are already numbers", () => {
    const table = toRatingTable(
      [{ genres: "Action", rating: 3, title: "Heat", year: 1995 }],
      ["title", "genres", "rating", "year"],
    );

    expect(table).toEqual([
      { genres: "Action", rating: 3, title: "Heat", year: 1995 },
    ]);
  });
});
