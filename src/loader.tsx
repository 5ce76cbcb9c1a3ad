import { Alert, Card, CardBody, Progress } from "@heroui/react";
import { useMemo, useRef, useState } from "react";
import { useAsyncEffect } from "rooks";
import { App } from "./app";
import { config } from "./config";
import { toRatingTable } from "./data/dataset";
import {
  fetchTextWithProgress,
  parseCsvInWorker,
  progressRatio,
} from "./data/load";
import type { RatingTable } from "./data/types";
import { publicUrl } from "./utils";

type LoaderState =
  | { message: string; phase: "error" }
  | { phase: "loading"; ratio: null | number }
  | { phase: "processing" }
  | { phase: "ready"; table: RatingTable };

/**
 * Loads the ratings file once and hands the table to the dashboard.
 * Unmounting cancels the download and the parse.
 */
export function Loader(): React.JSX.Element {
  const [state, setState] = useState<LoaderState>({
    phase: "loading",
    ratio: null,
  });
  const abortRef = useRef<AbortController | null>(null);

  const dataUrl = useMemo(() => publicUrl(config.dataPath), []);

  useAsyncEffect(
    async (shouldContinueEffect) => {
      const ac = new AbortController();
      abortRef.current = ac;

      try {
        const text = await fetchTextWithProgress(
          dataUrl,
          (loaded, total) => {
            if (!shouldContinueEffect()) return;
            setState({ phase: "loading", ratio: progressRatio(loaded, total) });
          },
          ac.signal,
        );

        if (!shouldContinueEffect()) return;
        setState({ phase: "processing" });

        const { columns, rows } = await parseCsvInWorker(text, ac.signal);
        const table = toRatingTable(rows, columns);

        if (!shouldContinueEffect()) return;
        console.log(`Loaded ${table.length} rating rows from ${dataUrl}`);
        setState({ phase: "ready", table });
      } catch (e) {
        if (!shouldContinueEffect()) return;
        console.error("Failed to load ratings data:", e);
        setState({
          message: e instanceof Error ? e.message : String(e),
          phase: "error",
        });
      }
    },
    [dataUrl],
    () => {
      abortRef.current?.abort();
    },
  );

  switch (state.phase) {
    case "error":
      return (
        <Screen>
          <Alert
            color="danger"
            description={state.message}
            title="Failed to load data"
            variant="faded"
          />
        </Screen>
      );
    case "loading":
      return (
        <Screen>
          <LoadingCard
            label="Downloading ratings"
            value={state.ratio === null ? null : state.ratio * 100}
          />
        </Screen>
      );
    case "processing":
      return (
        <Screen>
          <LoadingCard label="Parsing ratings" value={null} />
        </Screen>
      );
    case "ready":
      return <App config={config} table={state.table} />;
  }
}

function Screen({ children }: { children: React.ReactNode }): React.JSX.Element {
  return (
    <div className="min-h-screen flex items-center justify-center bg-black p-8">
      {children}
    </div>
  );
}

/** `value` is a percentage, or `null` when progress cannot be measured. */
function LoadingCard({
  label,
  value,
}: {
  label: string;
  value: null | number;
}): React.JSX.Element {
  return (
    <Card className="w-full max-w-md bg-gray-900/60 border border-gray-700">
      <CardBody className="gap-4 p-6">
        <h1 className="text-2xl font-semibold text-white">
          🎬 MovieLens Analytics Dashboard
        </h1>
        <Progress
          color="secondary"
          isIndeterminate={value === null}
          label={`${label}…`}
          showValueLabel={value !== null}
          size="md"
          value={value ?? 0}
        />
      </CardBody>
    </Card>
  );
}
