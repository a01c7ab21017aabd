import type { FilteredView, KPI, TargetMap } from "../types";
import { seriesOf } from "./projection";
import { polarityOf } from "./schema";

/** Percent change from `first` to `last`; a zero baseline counts as no change. */
export function pctChange(first: number, last: number): number {
  if (first === 0) return 0;
  return ((last - first) / first) * 100;
}

export function isMet(metric: string, current: number, target: number): boolean {
  return polarityOf(metric) === "lower-is-better" ? current <= target : current >= target;
}

export function computeKPIs(view: FilteredView, targets: TargetMap): KPI[] {
  return view.columns.flatMap((metric): KPI[] => {
    const series = seriesOf(view, metric);
    if (!series.length) return [];
    const first = series[0];
    const current = series[series.length - 1];
    const targetSet = Object.hasOwn(targets, metric);
    const target = targetSet ? targets[metric] : 0;
    return [{
      metric,
      current,
      target,
      targetSet,
      pctChange: pctChange(first, current),
      polarity: polarityOf(metric),
      attainment: isMet(metric, current, target) ? "met" : "missed",
    }];
  });
}

export function formatValue(v: number): string {
  return v.toFixed(1);
}

export function formatChange(pct: number): string {
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}
