import { type ParsedCsv, parseCsv } from "./data/dataset";

interface InMsg {
  text: string;
  type: "parse";
}

export type CsvWorkerMsg =
  | { message: string; type: "error" }
  | (ParsedCsv & { type: "done" });

self.onmessage = ({ data: { text } }: MessageEvent<InMsg>) => {
  try {
    const { columns, rows } = parseCsv(text);
    self.postMessage({ columns, rows, type: "done" } satisfies CsvWorkerMsg);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    self.postMessage({ message, type: "error" } satisfies CsvWorkerMsg);
  }
};
