// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FiveStarTreemap } from "../charts/fiveStarTreemap";
import { GenreCountsChart } from "../charts/genreCountsChart";
import { MeanRatingByYearChart } from "../charts/meanRatingByYearChart";

type SizeCallback = (
  entries: { contentRect: { height: number; width: number } }[],
) => void;

/** Reports a fixed 600x400 box as soon as an element is observed. */
class FixedSizeObserver {
  constructor(private readonly callback: SizeCallback) {}

  disconnect(): void {}

  observe(): void {
    this.callback([{ contentRect: { height: 400, width: 600 } }]);
  }

  unobserve(): void {}
}

const counts = [
  { count: 3, genre: "Drama" },
  { count: 1, genre: "Action" },
];

describe("charts", () => {
  beforeEach(() => {
    vi.stubGlobal("ResizeObserver", FixedSizeObserver);
  });

  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
  });

  describe("GenreCountsChart", () => {
    it("shows a no-data card for an empty sequence", () => {
      const { container } = render(<GenreCountsChart counts={[]} />);

      expect(screen.getByText("No data")).toBeDefined();
      expect(container.querySelectorAll("rect.bar")).toHaveLength(0);
    });

    it("draws one bar per genre, smallest at the bottom", () => {
      const { container } = render(<GenreCountsChart counts={counts} />);

      const bars = Array.from(container.querySelectorAll("rect.bar"));
      const yOf = (genre: string): number =>
        Number(
          bars
            .find((bar) => bar.textContent?.startsWith(`${genre}:`))
            ?.getAttribute("y"),
        );

      expect(screen.queryByText("No data")).toBeNull();
      expect(bars).toHaveLength(2);
      expect(yOf("Action")).toBeGreaterThan(yOf("Drama"));
    });
  });

  describe("FiveStarTreemap", () => {
    it("shows a no-data card for an empty sequence", () => {
      render(<FiveStarTreemap counts={[]} />);

      expect(
        screen.getByText("No five-star ratings in this dataset"),
      ).toBeDefined();
    });

    it("draws one rectangle per genre", () => {
      const { container } = render(<FiveStarTreemap counts={counts} />);

      expect(container.querySelectorAll("rect")).toHaveLength(2);
    });
  });

  describe("MeanRatingByYearChart", () => {
    it("shows a no-data card for an empty sequence", () => {
      render(<MeanRatingByYearChart series={[]} />);

      expect(screen.getByText("No data")).toBeDefined();
    });

    it("marks every year on the line", () => {
      const { container } = render(
        <MeanRatingByYearChart
          series={[
            { meanRating: 3.5, year: 1995 },
            { meanRating: 4, year: 1996 },
          ]}
        />,
      );

      expect(container.querySelectorAll("circle")).toHaveLength(2);
    });
  });
});
