import type { Category, Dataset, FilteredView } from "../types";

export function rowCount(dataset: Dataset, category: Category): number {
  return dataset.tables[category].dates.length;
}

export function metricNames(dataset: Dataset, category: Category): readonly string[] {
  return dataset.tables[category].columns;
}

/** The first `count` metrics, the dashboard's initial selection. */
export function defaultSelection(names: readonly string[], count: number): string[] {
  return names.slice(0, Math.max(0, count));
}

export function clampWindow(windowSize: number, totalRows: number): number {
  if (totalRows <= 0) return 0;
  if (!Number.isFinite(windowSize)) return totalRows;
  return Math.min(totalRows, Math.max(1, Math.floor(windowSize)));
}

/**
 * The most recent `windowSize` rows of one category, restricted to
 * `metrics` in the order given. Names the table does not carry are skipped.
 * The dataset is left untouched; every array in the view is a fresh slice.
 */
export function project(
  dataset: Dataset,
  category: Category,
  windowSize: number,
  metrics: readonly string[]
): FilteredView {
  const table = dataset.tables[category];
  const total = table.dates.length;
  const start = total - clampWindow(windowSize, total);

  const picked = new Map<string, number[]>();
  for (const name of metrics) {
    if (picked.has(name) || !Object.hasOwn(table.values, name)) continue;
    picked.set(name, table.values[name].slice(start));
  }

  return {
    category,
    dates: table.dates.slice(start),
    columns: [...picked.keys()],
    values: Object.fromEntries(picked),
  };
}

/** A view column's values, or an empty series for a name the view does not hold. */
export function seriesOf(view: FilteredView, metric: string): readonly number[] {
  return Object.hasOwn(view.values, metric) ? view.values[metric] : [];
}
