import Papa from "papaparse";
import { LoadError } from "../errors";
import type { RatingRecord, RatingTable } from "./types";

export const REQUIRED_COLUMNS = ["title", "genres", "rating", "year"] as const;

export interface ParsedCsv {
  columns: string[];
  rows: Record<string, unknown>[];
}

/**
 * Parse CSV text with a header row into plain objects keyed by column name.
 * Cells are left as strings; see {@link toRatingTable} for coercion.
 */
export function parseCsv(text: string): ParsedCsv {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  if (result.errors.length > 0) {
    const [first] = result.errors;
    console.warn(
      `CSV parser reported ${result.errors.length} problem(s), first at row ${first.row ?? "?"}: ${first.message}`,
    );
  }

  return { columns: result.meta.fields ?? [], rows: result.data };
}

/**
 * Parse the ratings file into a frozen {@link RatingTable}.
 */
export function parseRatingsCsv(text: string): RatingTable {
  const { columns, rows } = parseCsv(text);
  return toRatingTable(rows, columns);
}

/**
 * Check that every required column is present and turn raw rows into
 * rating records. Empty or unparseable cells become `null`.
 */
export function toRatingTable(
  rows: readonly Record<string, unknown>[],
  columns: readonly string[],
): RatingTable {
  if (columns.length === 0) {
    throw new LoadError("Data file has no header row");
  }

  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new LoadError(`Missing required column(s): ${missing.join(", ")}`);
  }

  return Object.freeze(
    rows.map((row): Readonly<RatingRecord> =>
      Object.freeze({
        genres: toText(row.genres),
        rating: toNumber(row.rating),
        title: toText(row.title),
        year: toInteger(row.year),
      }),
    ),
  );
}

function toText(cell: unknown): null | string {
  if (typeof cell !== "string" || cell === "") return null;
  return cell;
}

function toNumber(cell: unknown): null | number {
  const value =
    typeof cell === "number"
      ? cell
      : typeof cell === "string" && cell.trim() !== ""
        ? Number(cell)
        : NaN;

  return Number.isFinite(value) ? value : null;
}

function toInteger(cell: unknown): null | number {
  const value = toNumber(cell);
  return value !== null && Number.isInteger(value) ? value : null;
}
