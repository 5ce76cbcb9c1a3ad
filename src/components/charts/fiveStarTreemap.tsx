import * as d3 from "d3";
import { useEffect, useRef } from "react";
import type { GenreCount } from "../../data/types";
import { useElementSize } from "../../hooks/useElementSize";
import { CENTERED_EMPTY_STATE, EmptyState } from "../EmptyState";

/** Rectangles narrower or shorter than this get no label. */
const MIN_LABEL_SIZE: [number, number] = [48, 28];

export interface FiveStarTreemapProps {
  className?: string;
  counts: GenreCount[];
}

interface TreemapDatum {
  children?: TreemapDatum[];
  count: number;
  name: string;
}

/**
 * One rectangle per genre, sized and coloured by its number of five-star
 * ratings.
 */
export function FiveStarTreemap({
  className,
  counts,
}: FiveStarTreemapProps): React.ReactElement {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const gRef = useRef<null | SVGGElement>(null);
  const dimensions = useElementSize(containerRef);

  useEffect(() => {
    const { height, width } = dimensions;
    if (!gRef.current || width === 0 || height === 0) return;

    const g = d3.select(gRef.current);

    g.selectAll("*").remove();

    if (counts.length === 0) return;

    const margin = { bottom: 10, left: 10, right: 10, top: 40 };

    const root = d3
      .hierarchy<TreemapDatum>({
        children: counts.map((c) => ({ count: c.count, name: c.genre })),
        count: 0,
        name: "All genres",
      })
      .sum((d) => (d.children ? 0 : d.count))
      .sort((a, b) => (b.value ?? 0) - (a.value ?? 0));

    const layout = d3
      .treemap<TreemapDatum>()
      .size([
        width - margin.left - margin.right,
        height - margin.top - margin.bottom,
      ])
      .paddingInner(2)
      .round(true)(root);

    const [minCount = 0, maxCount = 0] = d3.extent(counts, (c) => c.count);
    const color = d3
      .scaleSequential(d3.interpolatePlasma)
      .domain([minCount, maxCount]);

    const cells = g
      .append("g")
      .attr("transform", `translate(${margin.left},${margin.top})`)
      .selectAll("g")
      .data(layout.leaves())
      .join("g")
      .attr("transform", (d) => `translate(${d.x0},${d.y0})`);

    cells
      .append("rect")
      .attr("width", (d) => d.x1 - d.x0)
      .attr("height", (d) => d.y1 - d.y0)
      .attr("fill", (d) => color(d.data.count))
      .append("title")
      .text(
        (d) => `${d.data.name}: ${d.data.count.toLocaleString()} five-star ratings`,
      );

    const labelled = cells.filter(
      (d) =>
        d.x1 - d.x0 >= MIN_LABEL_SIZE[0] && d.y1 - d.y0 >= MIN_LABEL_SIZE[1],
    );

    labelled
      .append("text")
      .attr("x", 6)
      .attr("y", 16)
      .attr("fill", "white")
      .attr("font-size", 12)
      .attr("font-weight", 600)
      .text((d) => d.data.name);

    labelled
      .append("text")
      .attr("x", 6)
      .attr("y", 30)
      .attr("fill", "white")
      .attr("fill-opacity", 0.8)
      .attr("font-size", 11)
      .text((d) => d.data.count.toLocaleString());

    g.append("text")
      .attr("fill", "var(--color-foreground)")
      .attr("x", margin.left)
      .attr("y", 24)
      .attr("font-size", 20)
      .text("5-Star Ratings Distribution Across Genres");
  }, [counts, dimensions]);

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
        aria-label="Five-star ratings per genre treemap"
        className="w-full h-full"
        role="img"
        viewBox={`0 0 ${dimensions.width} ${dimensions.height}`}
      >
        <g ref={gRef} />
      </svg>

      {counts.length === 0 && (
        <EmptyState
          className={CENTERED_EMPTY_STATE}
          message="No five-star ratings in this dataset"
        />
      )}
    </div>
  );
}
