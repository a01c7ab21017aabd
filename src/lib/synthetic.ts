import { type Category, type Dataset, type MetricTable, type TargetMap } from "../types";
import { clip, cumsum, normal, poisson, samples, seededRng, type Rng } from "./random";
import { monthEnds } from "./time";

export const SYNTHETIC_SEED = 42;
export const SYNTHETIC_START = "2023-01-01";
export const SYNTHETIC_END = "2025-03-31";

type Generator = (rng: Rng, n: number) => number[];

// Accumulating metrics are cumulative sums; percentages and scores are clipped to [0, 100].
const accumulated = (mean: number, sd: number, scale = 1000): Generator => (rng, n) =>
  cumsum(samples(n, () => normal(rng, mean, sd))).map((v) => v / scale);
const counted = (lambda: number): Generator => (rng, n) => cumsum(samples(n, () => poisson(rng, lambda)));
const bounded = (mean: number, sd: number): Generator => (rng, n) =>
  clip(samples(n, () => normal(rng, mean, sd)), 0, 100);

// Generation order matters: every metric draws from the same stream.
const GENERATORS: ReadonlyArray<[Category, string, Generator]> = [
  ["Environmental", "CO2 Emissions (tons)", accumulated(1200, 150)],
  ["Environmental", "Energy Consumption (MWh)", accumulated(4500, 400)],
  ["Environmental", "Water Usage (m³)", accumulated(32000, 2500)],
  ["Environmental", "Waste Recycled (%)", bounded(78, 5)],
  ["Environmental", "Sustainable Materials (%)", bounded(65, 8)],
  ["Social", "Safety Incidents", counted(0.8)],
  ["Social", "Employee Training (hours)", accumulated(2500, 300)],
  ["Social", "Diversity (% women)", bounded(32, 3)],
  ["Social", "Community Investment ($)", accumulated(150000, 20000)],
  ["Social", "Worker Satisfaction (score)", bounded(75, 5)],
  ["Governance", "Ethics Training (%)", bounded(95, 4)],
  ["Governance", "Supplier Audits", counted(2.5)],
  ["Governance", "Board Diversity (%)", bounded(45, 3)],
  ["Governance", "Compliance Violations", counted(0.2)],
  ["Governance", "Transparency Score", bounded(85, 5)],
];

export const SYNTHETIC_TARGETS: Readonly<Record<Category, TargetMap>> = {
  Environmental: {
    "CO2 Emissions (tons)": 1.0,
    "Energy Consumption (MWh)": 4.0,
    "Water Usage (m³)": 30.0,
    "Waste Recycled (%)": 85,
    "Sustainable Materials (%)": 75,
  },
  Social: {
    "Safety Incidents": 0,
    "Employee Training (hours)": 3.0,
    "Diversity (% women)": 40,
    "Community Investment ($)": 200.0,
    "Worker Satisfaction (score)": 80,
  },
  Governance: {
    "Ethics Training (%)": 100,
    "Supplier Audits": 30,
    "Board Diversity (%)": 50,
    "Compliance Violations": 0,
    "Transparency Score": 90,
  },
};

/** Builds a fresh synthetic dataset. Prefer `getSyntheticDataset` outside tests. */
export function generateSyntheticDataset(seed = SYNTHETIC_SEED): Dataset {
  const rng = seededRng(seed);
  const dates = monthEnds(SYNTHETIC_START, SYNTHETIC_END);
  const columns: Record<Category, string[]> = { Environmental: [], Social: [], Governance: [] };
  const values: Record<Category, Record<string, number[]>> = { Environmental: {}, Social: {}, Governance: {} };

  for (const [category, metric, generate] of GENERATORS) {
    columns[category].push(metric);
    values[category][metric] = generate(rng, dates.length);
  }

  const table = (category: Category): MetricTable => ({
    dates,
    columns: columns[category],
    values: values[category],
  });

  return {
    tables: { Environmental: table("Environmental"), Social: table("Social"), Governance: table("Governance") },
    targets: {
      Environmental: { ...SYNTHETIC_TARGETS.Environmental },
      Social: { ...SYNTHETIC_TARGETS.Social },
      Governance: { ...SYNTHETIC_TARGETS.Governance },
    },
  };
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      const child: unknown = Reflect.get(value, key);
      deepFreeze(child);
    }
  }
  return value;
}

let cached: Dataset | null = null;

/** The synthetic dataset, generated on first use and shared for the rest of the process. */
export function getSyntheticDataset(): Dataset {
  if (!cached) cached = deepFreeze(generateSyntheticDataset());
  return cached;
}

export function syntheticTargets(): Dataset["targets"] {
  return getSyntheticDataset().targets;
}
