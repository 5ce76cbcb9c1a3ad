/**
 * One rating observation. Cells that were empty or did not parse are `null`
 * and the row is left out of any aggregation that needs that field.
 */
export interface RatingRecord {
  genres: null | string;
  rating: null | number;
  title: null | string;
  year: null | number;
}

export type RatingTable = readonly Readonly<RatingRecord>[];

export interface GenreCount {
  count: number;
  genre: string;
}

export interface YearlyMeanRating {
  meanRating: number;
  year: number;
}

export interface MovieStat {
  avgRating: number;
  ratingCount: number;
  title: string;
}

export interface TopMoviesOptions {
  /** Minimum number of ratings a movie needs to be ranked. */
  minRatings: number;
  /** Maximum number of movies returned. */
  topN: number;
}
