import { assertPositiveInteger } from "./data/aggregations";
import type { TopMoviesOptions } from "./data/types";

export interface DashboardConfig {
  /** Ratings file, relative to the base URL. */
  dataPath: string;
  /** One "top movies" table is rendered per entry. */
  topMoviesTables: readonly TopMoviesOptions[];
}

export const DEFAULT_DATA_PATH = "data/movie_ratings.csv";

export const TOP_MOVIES_TABLES: readonly TopMoviesOptions[] = [
  { minRatings: 50, topN: 5 },
  { minRatings: 150, topN: 5 },
];

export function resolveConfig(
  env: Pick<ImportMetaEnv, "VITE_DATA_PATH">,
  topMoviesTables: readonly TopMoviesOptions[] = TOP_MOVIES_TABLES,
): DashboardConfig {
  for (const { minRatings, topN } of topMoviesTables) {
    assertPositiveInteger("minRatings", minRatings);
    assertPositiveInteger("topN", topN);
  }

  const dataPath = env.VITE_DATA_PATH?.trim();

  return {
    dataPath: dataPath ? dataPath : DEFAULT_DATA_PATH,
    topMoviesTables,
  };
}

export const config: DashboardConfig = resolveConfig(import.meta.env);
