import type { DataSource, Dataset } from "../types";
import type { LoadError } from "./errors";
import { load, type LoadOptions } from "./loader";
import { getSyntheticDataset } from "./synthetic";
import { periodLabel } from "./time";

export type ResolvedDataset = {
  dataset: Dataset;
  origin: "loaded" | "fallback";
  /** "Showing Data For" caption. */
  periodLabel: string;
  /** User-facing explanation, present whenever a load failed. */
  warning?: string;
  error?: LoadError;
};

function sampleLabel(suffix: "Sample Data" | "Sample Fallback"): string {
  const period = periodLabel(getSyntheticDataset().tables.Environmental.dates) ?? "Sample period";
  return `${period} (${suffix})`;
}

/** The sample dataset as an explicit choice. */
export function sampleData(): ResolvedDataset {
  return { dataset: getSyntheticDataset(), origin: "loaded", periodLabel: sampleLabel("Sample Data") };
}

/** Sample data shown while no file or URL has been given yet. Not a failure, so no warning. */
export function sampleFallback(): ResolvedDataset {
  return { dataset: getSyntheticDataset(), origin: "fallback", periodLabel: sampleLabel("Sample Fallback") };
}

export function fallbackWarning(source: DataSource, error: LoadError): string {
  if (error.kind === "schema") return `${error.message}. Using sample data instead.`;
  switch (source.kind) {
    case "spreadsheet":
      return `Error with Excel file: ${error.message}. Using sample data.`;
    case "delimited":
      return `Error with CSV file: ${error.message}. Using sample data.`;
    case "remote":
      return error.kind === "unsupported"
        ? `${error.message} Using sample data.`
        : `Error loading data from URL: ${error.message}. Using sample data.`;
    case "synthetic":
      return `${error.message}. Using sample data.`;
  }
}

/**
 * Loads `source` and applies the dashboard's substitution policy: any load
 * failure yields the synthetic dataset plus a warning naming the cause.
 */
export async function resolveDataset(source: DataSource, options: LoadOptions = {}): Promise<ResolvedDataset> {
  const result = await load(source, options);
  if (result.ok) {
    if (source.kind === "synthetic") return sampleData();
    return {
      dataset: result.dataset,
      origin: "loaded",
      periodLabel: source.kind === "remote" ? "Custom (URL Data)" : "Custom (Your Uploaded Data)",
    };
  }

  const warning = fallbackWarning(source, result.error);
  console.warn(`Falling back to sample data (${source.kind}):`, result.error);
  return {
    dataset: getSyntheticDataset(),
    origin: "fallback",
    periodLabel: sampleLabel("Sample Fallback"),
    warning,
    error: result.error,
  };
}
