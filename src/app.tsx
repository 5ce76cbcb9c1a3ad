import { useMemo } from "react";
import { FiveStarTreemap } from "./components/charts/fiveStarTreemap";
import { GenreCountsChart } from "./components/charts/genreCountsChart";
import { MeanRatingByYearChart } from "./components/charts/meanRatingByYearChart";
import { DashboardSection } from "./components/DashboardSection";
import { TopMoviesTable } from "./components/TopMoviesTable";
import type { DashboardConfig } from "./config";
import {
  fiveStarGenreCounts,
  genreCounts,
  topMovies,
  yearlyMeanRating,
} from "./data/aggregations";
import type { RatingTable } from "./data/types";

export interface AppProps {
  config: DashboardConfig;
  table: RatingTable;
}

export function App({ config, table }: AppProps): React.ReactElement {
  const counts = useMemo(() => genreCounts(table), [table]);
  const fiveStarCounts = useMemo(() => fiveStarGenreCounts(table), [table]);
  const yearly = useMemo(() => yearlyMeanRating(table), [table]);
  const topTables = useMemo(
    () =>
      config.topMoviesTables.map((options) => ({
        ...options,
        movies: topMovies(table, options),
      })),
    [config, table],
  );

  return (
    <div
      className="flex flex-col items-center min-h-screen pt-12"
      style={{
        background:
          "radial-gradient(ellipse at center, #1f2937 0%, #000000 85%)",
      }}
    >
      <header className="text-center mb-6">
        <h1 className="text-5xl font-bold text-white">
          🎬 MovieLens Analytics Dashboard
        </h1>
        <p className="mt-2 text-gray-400 text-sm">
          {table.length.toLocaleString()} ratings
        </p>
      </header>

      <main className="flex-grow w-full max-w-7xl px-8 pb-8">
        <div className="flex flex-col gap-12 w-full">
          <DashboardSection
            description="Horizontal bars count the rating rows recorded for each genre, smallest at the bottom."
            question="What's the breakdown of genres for the movies that were rated?"
            title="Number of Ratings per Genre"
          >
            <div className="h-[60vh] bg-gray-900/30 rounded-lg border border-gray-700">
              <GenreCountsChart counts={counts} />
            </div>
          </DashboardSection>

          <DashboardSection
            description="Each rectangle is a genre, sized and coloured by how many five-star ratings its movies received."
            question="Which genres have the highest viewer satisfaction (highest ratings)?"
            title="5-Star Ratings Distribution Across Genres"
          >
            <div className="h-[60vh] bg-gray-900/30 rounded-lg border border-gray-700">
              <FiveStarTreemap counts={fiveStarCounts} />
            </div>
          </DashboardSection>

          <DashboardSection
            description="Mean of all ratings given to movies released in each year."
            question="How does mean rating change across movie release years?"
            title="Mean Movie Rating by Release Year"
          >
            <div className="h-[50vh] bg-gray-900/30 rounded-lg border border-gray-700">
              <MeanRatingByYearChart series={yearly} />
            </div>
          </DashboardSection>

          {topTables.map(({ minRatings, movies, topN }) => (
            <DashboardSection
              description={`The ${topN} movies with the highest average rating among those rated at least ${minRatings} times. Equal averages are ordered by title.`}
              key={`${minRatings}-${topN}`}
              question={`Top Movies with at Least ${minRatings} Ratings`}
              title="Top Movies"
            >
              <TopMoviesTable minRatings={minRatings} movies={movies} />
            </DashboardSection>
          ))}
        </div>
      </main>
    </div>
  );
}
