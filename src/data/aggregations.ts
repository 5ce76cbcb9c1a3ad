import * as d3 from "d3";
import type {
  GenreCount,
  MovieStat,
  RatingRecord,
  RatingTable,
  TopMoviesOptions,
  YearlyMeanRating,
} from "./types";

/** Top of the rating scale; a rating equal to it counts as five stars. */
export const MAX_RATING = 5;

export const DEFAULT_TOP_MOVIES_OPTIONS: TopMoviesOptions = {
  minRatings: 50,
  topN: 5,
};

type Row = Readonly<RatingRecord>;

/**
 * Count the rating rows per genre.
 *
 * Every distinct genre label appears exactly once. Rows sorted by count,
 * highest first, then by genre name.
 */
export function genreCounts(table: RatingTable): GenreCount[] {
  return d3
    .rollups(
      table.filter(hasGenre),
      (rows) => rows.length,
      (row) => row.genres,
    )
    .map(([genre, count]) => ({ count, genre }))
    .sort(
      (a, b) =>
        d3.descending(a.count, b.count) || d3.ascending(a.genre, b.genre),
    );
}

/**
 * Same as {@link genreCounts} but only over five-star ratings.
 */
export function fiveStarGenreCounts(table: RatingTable): GenreCount[] {
  return genreCounts(table.filter((row) => row.rating === MAX_RATING));
}

/**
 * Mean rating per release year, in ascending year order so a line chart
 * draws left to right. Years without any rated row are absent.
 */
export function yearlyMeanRating(table: RatingTable): YearlyMeanRating[] {
  return d3
    .rollups(
      table.filter(hasYear).filter(hasRating),
      meanRating,
      (row) => row.year,
    )
    .map(([year, mean]) => ({ meanRating: mean, year }))
    .sort((a, b) => d3.ascending(a.year, b.year));
}

/**
 * Highest rated movies among those with at least `minRatings` ratings.
 *
 * Ties on average rating are broken by title, ascending.
 */
export function topMovies(
  table: RatingTable,
  options: Partial<TopMoviesOptions> = {},
): MovieStat[] {
  const minRatings = options.minRatings ?? DEFAULT_TOP_MOVIES_OPTIONS.minRatings;
  const topN = options.topN ?? DEFAULT_TOP_MOVIES_OPTIONS.topN;
  assertPositiveInteger("minRatings", minRatings);
  assertPositiveInteger("topN", topN);

  return d3
    .rollups(
      table.filter(hasTitle).filter(hasRating),
      (rows) => ({ avgRating: meanRating(rows), ratingCount: rows.length }),
      (row) => row.title,
    )
    .map(([title, stats]) => ({ title, ...stats }))
    .filter((movie) => movie.ratingCount >= minRatings)
    .sort(
      (a, b) =>
        d3.descending(a.avgRating, b.avgRating) ||
        d3.ascending(a.title, b.title),
    )
    .slice(0, topN);
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function meanRating(rows: { rating: number }[]): number {
  return d3.sum(rows, (row) => row.rating) / rows.length;
}

function hasGenre<T extends Row>(row: T): row is T & { genres: string } {
  return row.genres !== null;
}

function hasRating<T extends Row>(row: T): row is T & { rating: number } {
  return row.rating !== null;
}

function hasTitle<T extends Row>(row: T): row is T & { title: string } {
  return row.title !== null;
}

function hasYear<T extends Row>(row: T): row is T & { year: number } {
  return row.year !== null;
}
