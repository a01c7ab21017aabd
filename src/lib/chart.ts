import type { ChartKind, ChartOptions, ChartPoint, ChartSeries, ChartSpec, FilteredView, GoalLine, TargetMap } from "../types";
import { seriesOf } from "./projection";

export const CHART_KINDS: readonly ChartKind[] = ["Line", "Bar", "Area", "Scatter"];

export const PALETTE = ["#60a5fa", "#22c55e", "#f59e0b", "#8b5cf6", "#ec4899", "#14b8a6", "#ef4444"];

const TITLE_SUFFIX: Record<ChartKind, string> = {
  Line: "Trends",
  Bar: "Comparisons",
  Area: "Cumulative",
  Scatter: "Points",
};

export const metricKey = (i: number) => `m${i}`;
export const trendKey = (i: number) => `t${i}`;

/** Ordinary least squares of `values` against x = 0..n-1. A single point gives a flat line. */
export function linearFit(values: readonly number[]): { slope: number; intercept: number } {
  const n = values.length;
  if (n === 0) return { slope: 0, intercept: 0 };
  const xMean = (n - 1) / 2;
  const yMean = values.reduce((acc, v) => acc + v, 0) / n;
  let num = 0;
  let den = 0;
  values.forEach((y, x) => {
    num += (x - xMean) * (y - yMean);
    den += (x - xMean) * (x - xMean);
  });
  const slope = den !== 0 ? num / den : 0;
  return { slope, intercept: yMean - slope * xMean };
}

export function trendValues(values: readonly number[]): number[] {
  const { slope, intercept } = linearFit(values);
  return values.map((_, x) => intercept + slope * x);
}

/**
 * Maps a view onto a chart: one series per metric against the shared dates,
 * plus goal lines and dashed OLS trend series when requested. Series data is
 * keyed `m<i>` / `t<i>` so metric names never act as property paths.
 */
export function buildChartSpec(view: FilteredView, targets: TargetMap, options: ChartOptions): ChartSpec {
  const series: ChartSeries[] = [];
  const goals: GoalLine[] = [];
  const trends = new Map<string, number[]>();

  view.columns.forEach((metric, i) => {
    const color = PALETTE[i % PALETTE.length];
    series.push({ key: metricKey(i), name: metric, color, role: "metric", dashed: false });
    if (options.showGoals) {
      goals.push({ metric, value: Object.hasOwn(targets, metric) ? targets[metric] : 0, label: `Goal: ${metric}`, color });
    }
    if (options.showTrend) {
      trends.set(trendKey(i), trendValues(seriesOf(view, metric)));
      series.push({ key: trendKey(i), name: `${metric} Trend`, color, role: "trend", dashed: true });
    }
  });

  const points = view.dates.map((date, row) => {
    const point: ChartPoint = { date };
    view.columns.forEach((metric, i) => {
      point[metricKey(i)] = seriesOf(view, metric)[row] ?? 0;
    });
    trends.forEach((values, key) => {
      point[key] = values[row];
    });
    return point;
  });

  return { kind: options.chartKind, title: `${view.category} ${TITLE_SUFFIX[options.chartKind]}`, points, series, goals };
}
