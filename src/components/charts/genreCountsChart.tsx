import * as d3 from "d3";
import { useEffect, useMemo, useRef } from "react";
import type { GenreCount } from "../../data/types";
import { useElementSize } from "../../hooks/useElementSize";
import { CENTERED_EMPTY_STATE, EmptyState } from "../EmptyState";

export interface GenreCountsChartProps {
  className?: string;
  counts: GenreCount[];
}

/**
 * Horizontal bars, one per genre, smallest count at the bottom. Bars are
 * coloured by count on the Plasma scale.
 */
export function GenreCountsChart({
  className,
  counts,
}: GenreCountsChartProps): React.ReactElement {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const gRef = useRef<null | SVGGElement>(null);
  const dimensions = useElementSize(containerRef);

  const data = useMemo(
    () => [...counts].sort((a, b) => d3.ascending(a.count, b.count)),
    [counts],
  );

  useEffect(() => {
    const { height, width } = dimensions;
    if (!gRef.current || width === 0 || height === 0) return;

    const g = d3.select(gRef.current);

    g.selectAll("*").remove();

    if (data.length === 0) return;

    const margin = { bottom: 50, left: 120, right: 30, top: 40 };
    const innerWidth = width - margin.left - margin.right;
    const innerHeight = height - margin.top - margin.bottom;

    const chartG = g
      .append("g")
      .attr("transform", `translate(${margin.left},${margin.top})`);

    const maxCount = d3.max(data, (d) => d.count) ?? 0;

    const xScale = d3
      .scaleLinear()
      .domain([0, maxCount])
      .nice()
      .range([0, innerWidth]);

    const yScale = d3
      .scaleBand()
      .domain(data.map((d) => d.genre))
      .range([innerHeight, 0])
      .padding(0.15);

    const color = d3
      .scaleSequential(d3.interpolatePlasma)
      .domain([d3.min(data, (d) => d.count) ?? 0, maxCount]);

    // dotted vertical grid
    chartG
      .append("g")
      .attr("transform", `translate(0,${innerHeight})`)
      .call(
        d3
          .axisBottom(xScale)
          .tickSize(-innerHeight)
          .tickFormat(() => ""),
      )
      .call((grid) => grid.select(".domain").remove())
      .selectAll("line")
      .attr("stroke", "gray")
      .attr("stroke-dasharray", "2,3");

    chartG
      .append("g")
      .attr("transform", `translate(0,${innerHeight})`)
      .call(d3.axisBottom(xScale).ticks(Math.max(2, innerWidth / 80)))
      .append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("x", innerWidth / 2)
      .attr("y", 38)
      .attr("text-anchor", "middle")
      .text("Number of ratings");

    chartG.append("g").call(d3.axisLeft(yScale));

    chartG
      .selectAll("rect.bar")
      .data(data)
      .join("rect")
      .attr("class", "bar")
      .attr("x", 0)
      .attr("y", (d) => yScale(d.genre) ?? 0)
      .attr("width", (d) => xScale(d.count))
      .attr("height", yScale.bandwidth())
      .attr("fill", (d) => color(d.count))
      .append("title")
      .text((d) => `${d.genre}: ${d.count.toLocaleString()} ratings`);

    chartG
      .append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("x", 0)
      .attr("y", -16)
      .attr("font-size", 20)
      .text("Number of Ratings per Genre");
  }, [data, dimensions]);

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
        aria-label="Number of ratings per genre bar chart"
        className="w-full h-full"
        role="img"
        viewBox={`0 0 ${dimensions.width} ${dimensions.height}`}
      >
        <g ref={gRef} />
      </svg>

      {data.length === 0 && <EmptyState className={CENTERED_EMPTY_STATE} />}
    </div>
  );
}
