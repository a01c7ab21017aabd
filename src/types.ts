export const CATEGORIES = ["Environmental", "Social", "Governance"] as const;

export type Category = (typeof CATEGORIES)[number];

export type Polarity = "lower-is-better" | "higher-is-better";

/**
 * One category's metrics on a shared timestamp axis. Every entry in `values`
 * has exactly `dates.length` numbers, aligned index by index.
 */
export interface MetricTable {
  dates: readonly string[];
  columns: readonly string[];
  values: Readonly<Record<string, readonly number[]>>;
}

export type TargetMap = Readonly<Record<string, number>>;

export interface Dataset {
  tables: Readonly<Record<Category, MetricTable>>;
  targets: Readonly<Record<Category, TargetMap>>;
}

export interface FilteredView extends MetricTable {
  category: Category;
}

export interface KPI {
  metric: string;
  current: number;
  target: number;
  /** False when the target map has no entry and `target` is the 0 default. */
  targetSet: boolean;
  pctChange: number;
  polarity: Polarity;
  attainment: "met" | "missed";
}

export type ChartKind = "Line" | "Bar" | "Area" | "Scatter";

export type ChartOptions = {
  chartKind: ChartKind;
  showGoals: boolean;
  showTrend: boolean;
};

export type ChartSeries = {
  key: string;
  name: string;
  color: string;
  role: "metric" | "trend";
  dashed: boolean;
};

export type GoalLine = { metric: string; value: number; label: string; color: string };

export type ChartPoint = { date: string } & Record<string, number | string>;

export interface ChartSpec {
  kind: ChartKind;
  title: string;
  points: ChartPoint[];
  series: ChartSeries[];
  goals: GoalLine[];
}

export type SourceKind = "synthetic" | "spreadsheet" | "delimited" | "remote";

export type DataSource =
  | { kind: "synthetic" }
  | { kind: "spreadsheet"; bytes: ArrayBuffer | Uint8Array; fileName?: string }
  | { kind: "delimited"; text: string; fileName?: string }
  | { kind: "remote"; url: string };
