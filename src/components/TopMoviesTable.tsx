import { Card, CardBody } from "@heroui/react";
import type { MovieStat } from "../data/types";
import { formatRating } from "../utils";
import { EmptyState } from "./EmptyState";

interface TopMoviesTableProps {
  className?: string;
  minRatings: number;
  movies: MovieStat[];
}

export function TopMoviesTable({
  className,
  minRatings,
  movies,
}: TopMoviesTableProps): React.ReactElement {
  if (movies.length === 0) {
    return (
      <EmptyState
        className={className}
        message={`No movie has at least ${minRatings} ratings`}
      />
    );
  }

  return (
    <Card className={["bg-black/40 border-white/10", className ?? ""].join(" ")}>
      <CardBody className="p-0">
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-xs text-gray-400 border-b border-white/10">
              <th className="px-4 py-2 w-12">#</th>
              <th className="px-4 py-2">Title</th>
              <th className="px-4 py-2 text-right">Avg. rating</th>
              <th className="px-4 py-2 text-right">Ratings</th>
            </tr>
          </thead>
          <tbody>
            {movies.map((movie, idx) => (
              <tr className="border-b border-white/5" key={movie.title}>
                <td className="px-4 py-2 font-bold text-emerald-400/60">
                  {idx + 1}
                </td>
                <td className="px-4 py-2 font-medium text-white">
                  {movie.title}
                </td>
                <td className="px-4 py-2 text-right">
                  <span className="text-yellow-400 mr-1">★</span>
                  {formatRating(movie.avgRating)}
                </td>
                <td className="px-4 py-2 text-right text-gray-400">
                  {movie.ratingCount.toLocaleString("en-US")}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </CardBody>
    </Card>
  );
}
