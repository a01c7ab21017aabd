import { z } from "zod";

export type DashboardConfig = {
  fetchTimeoutMs: number;
  defaultMetricCount: number;
  title: string;
};

export const DEFAULT_CONFIG: DashboardConfig = {
  fetchTimeoutMs: 10_000,
  defaultMetricCount: 3,
  title: "Construction Company ESG Dashboard",
};

const setting = <T>(
  env: Record<string, unknown>,
  key: string,
  schema: z.ZodType<T>,
  fallback: T
): T => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  console.warn(`Ignoring ${key}=${String(raw)}: ${parsed.error.issues[0]?.message ?? "invalid value"}`);
  return fallback;
};

export function loadConfig(env: Record<string, unknown>): DashboardConfig {
  return {
    fetchTimeoutMs: setting(env, "VITE_FETCH_TIMEOUT_MS", z.coerce.number().int().positive(), DEFAULT_CONFIG.fetchTimeoutMs),
    defaultMetricCount: setting(env, "VITE_DEFAULT_METRIC_COUNT", z.coerce.number().int().min(0), DEFAULT_CONFIG.defaultMetricCount),
    title: setting(env, "VITE_DASHBOARD_TITLE", z.string().trim().min(1), DEFAULT_CONFIG.title),
  };
}

export const config: DashboardConfig = loadConfig(import.meta.env);
