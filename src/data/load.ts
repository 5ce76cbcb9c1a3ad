import type { CsvWorkerMsg } from "../csv.worker";
import { LoadError } from "../errors";
import type { ParsedCsv } from "./dataset";

/**
 * Download a text file, reporting progress as bytes arrive. `total` is 0
 * while the server did not send a content length.
 */
export async function fetchTextWithProgress(
  url: string | URL,
  onProgress: (loaded: number, total: number) => void,
  signal?: AbortSignal,
): Promise<string> {
  let res: Response;

  try {
    res = await fetch(url, { signal });
  } catch (e) {
    throw new LoadError(`Could not fetch ${String(url)}`, { cause: e });
  }

  if (!res.ok) {
    throw new LoadError(`Fetch failed: ${res.status} ${res.statusText}`);
  }

  const lenHeader = res.headers.get("content-length");
  const total = lenHeader ? Number(lenHeader) : 0;

  try {
    return await readBody(res, total, onProgress);
  } catch (e) {
    throw new LoadError(`Could not read ${String(url)}`, { cause: e });
  }
}

async function readBody(
  res: Response,
  total: number,
  onProgress: (loaded: number, total: number) => void,
): Promise<string> {
  const reader = res.body?.getReader();

  if (!reader) {
    return await res.text();
  }

  const decoder = new TextDecoder();
  let text = "";
  let loaded = 0;

  for (;;) {
    const { done, value } = await reader.read();

    if (done) {
      break;
    }

    text += decoder.decode(value, { stream: true });
    loaded += value.byteLength;

    if (total > 0) {
      onProgress(loaded, total);
    }
  }

  text += decoder.decode();
  onProgress(loaded, Math.max(total, loaded));

  return text;
}

/**
 * Fraction of the download done, or `null` while the size is unknown.
 * Capped at 1: a gzipped response reports its compressed length.
 */
export function progressRatio(loaded: number, total: number): null | number {
  return total > 0 ? Math.min(1, loaded / total) : null;
}

/**
 * Parse CSV text in a worker so a large file does not block rendering.
 * Aborting `signal` terminates the worker.
 */
export async function parseCsvInWorker(
  text: string,
  signal?: AbortSignal,
): Promise<ParsedCsv> {
  const worker = new Worker(new URL("../csv.worker.ts", import.meta.url), {
    type: "module",
  });

  return await new Promise((resolve, reject) => {
    const onAbort = (): void => {
      worker.terminate();
      reject(new LoadError("Parsing was cancelled"));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }

    signal?.addEventListener("abort", onAbort, { once: true });

    const settle = (): void => {
      worker.terminate();
      signal?.removeEventListener("abort", onAbort);
    };

    worker.onmessage = ({ data: msg }: MessageEvent<CsvWorkerMsg>) => {
      settle();

      switch (msg.type) {
        case "done":
          resolve({ columns: msg.columns, rows: msg.rows });
          break;
        case "error":
          reject(new LoadError(msg.message));
          break;
      }
    };

    worker.onerror = (err) => {
      settle();
      reject(new LoadError(err.message));
    };

    worker.postMessage({ text, type: "parse" });
  });
}
