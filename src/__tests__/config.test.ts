import { describe, expect, it } from "vitest";
import {
  config,
  DEFAULT_DATA_PATH,
  resolveConfig,
  TOP_MOVIES_TABLES,
} from "../config";

describe("resolveConfig", () => {
  it("falls back to the bundled data file", () => {
    expect(resolveConfig({})).toEqual({
      dataPath: "data/movie_ratings.csv",
      topMoviesTables: TOP_MOVIES_TABLES,
    });
    expect(resolveConfig({ VITE_DATA_PATH: "  " }).dataPath).toBe(
      DEFAULT_DATA_PATH,
    );
  });

  it("uses the configured data path", () => {
    expect(resolveConfig({ VITE_DATA_PATH: "data/full.csv" }).dataPath).toBe(
      "data/full.csv",
    );
  });

  it("renders tables for 50 and 150 ratings by default", () => {
    expect(config.topMoviesTables).toEqual([
      { minRatings: 50, topN: 5 },
      { minRatings: 150, topN: 5 },
    ]);
  });

  it("rejects invalid table options", () => {
    expect(() => resolveConfig({}, [{ minRatings: 10, topN: 0 }])).toThrow(
      "topN must be a positive integer, got 0",
    );
  });
});
