import * as d3 from "d3";
import { useEffect, useRef } from "react";
import type { YearlyMeanRating } from "../../data/types";
import { useElementSize } from "../../hooks/useElementSize";
import { formatRating } from "../../utils";
import { CENTERED_EMPTY_STATE, EmptyState } from "../EmptyState";

export interface MeanRatingByYearChartProps {
  className?: string;
  /** Must be in ascending year order. */
  series: YearlyMeanRating[];
}

export function MeanRatingByYearChart({
  className,
  series,
}: MeanRatingByYearChartProps): React.ReactElement {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const gRef = useRef<null | SVGGElement>(null);
  const dimensions = useElementSize(containerRef);

  useEffect(() => {
    const { height, width } = dimensions;
    if (!gRef.current || width === 0 || height === 0) return;

    const g = d3.select(gRef.current);

    g.selectAll("*").remove();

    if (series.length === 0) return;

    const margin = { bottom: 50, left: 60, right: 30, top: 40 };
    const innerWidth = width - margin.left - margin.right;
    const innerHeight = height - margin.top - margin.bottom;

    const chartG = g
      .append("g")
      .attr("transform", `translate(${margin.left},${margin.top})`);

    const [minYear = 0, maxYear = 0] = d3.extent(series, (d) => d.year);
    const [minMean = 0, maxMean = 0] = d3.extent(series, (d) => d.meanRating);

    const xScale = d3
      .scaleLinear()
      .domain([minYear, maxYear])
      .range([0, innerWidth]);

    const yScale = d3
      .scaleLinear()
      .domain([minMean, maxMean])
      .nice()
      .range([innerHeight, 0]);

    chartG
      .append("g")
      .attr("transform", `translate(0,${innerHeight})`)
      .call(
        d3
          .axisBottom(xScale)
          .ticks(Math.min(series.length, Math.max(2, innerWidth / 80)))
          .tickFormat(d3.format("d")),
      )
      .append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("x", innerWidth / 2)
      .attr("y", 38)
      .attr("text-anchor", "middle")
      .text("Release year");

    chartG
      .append("g")
      .call(d3.axisLeft(yScale))
      .append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("transform", "rotate(-90)")
      .attr("y", -45)
      .attr("x", -innerHeight / 2)
      .attr("text-anchor", "middle")
      .text("Mean rating");

    const line = d3
      .line<YearlyMeanRating>()
      .x((d) => xScale(d.year))
      .y((d) => yScale(d.meanRating));

    chartG
      .append("path")
      .datum(series)
      .attr("d", line)
      .attr("fill", "none")
      .attr("stroke", "#636efa")
      .attr("stroke-width", 2);

    chartG
      .selectAll("circle")
      .data(series)
      .join("circle")
      .attr("cx", (d) => xScale(d.year))
      .attr("cy", (d) => yScale(d.meanRating))
      .attr("r", 4)
      .attr("fill", "#636efa")
      .append("title")
      .text((d) => `${d.year}\nMean rating: ${formatRating(d.meanRating)}`);

    chartG
      .append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("x", 0)
      .attr("y", -16)
      .attr("font-size", 20)
      .text("Mean Movie Rating by Release Year");
  }, [series, dimensions]);

  return (
    <div
      className={[
        "relative",
        "w-full",
        "h-full",
        "overflow-hidden",
        className ?? "",
      ].join(" ")}
      ref={containerRef}
    >
      <svg
        aria-label="Mean rating by release year line chart"
        className="w-full h-full"
        role="img"
        viewBox={`0 0 ${dimensions.width} ${dimensions.height}`}
      >
        <g ref={gRef} />
      </svg>

      {series.length === 0 && <EmptyState className={CENTERED_EMPTY_STATE} />}
    </div>
  );
}
