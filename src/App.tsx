import React from "react";
import { format } from "date-fns";
import type { Category, DataSource, Dataset, SourceKind } from "./types";
import { config } from "./config";
import Header from "./components/Header";
import ControlsPanel, { type ViewControls } from "./components/ControlsPanel";
import KpiCards from "./components/KpiCards";
import MetricChart from "./components/MetricChart";
import DataTable from "./components/DataTable";
import ChartActions from "./components/ChartActions";
import { errorMessage } from "./lib/errors";
import { resolveDataset, sampleData, sampleFallback, type ResolvedDataset } from "./lib/fallback";
import { defaultSelection, metricNames, project, rowCount } from "./lib/projection";
import { computeKPIs } from "./lib/kpi";
import { buildChartSpec } from "./lib/chart";
import { ISO_DATE } from "./lib/time";

// Full window and the default metric selection for a category.
function viewDefaults(dataset: Dataset, category: Category): Pick<ViewControls, "windowSize" | "metrics"> {
  return {
    windowSize: rowCount(dataset, category),
    metrics: defaultSelection(metricNames(dataset, category), config.defaultMetricCount),
  };
}

const App: React.FC = () => {
  const [sourceKind, setSourceKind] = React.useState<SourceKind>("synthetic");
  const [resolved, setResolved] = React.useState<ResolvedDataset>(() => sampleData());
  const [loading, setLoading] = React.useState(false);
  const [controls, setControls] = React.useState<ViewControls>(() => ({
    category: "Environmental",
    chartKind: "Line",
    showGoals: true,
    showTrend: false,
    ...viewDefaults(resolved.dataset, "Environmental"),
  }));
  const chartRef = React.useRef<HTMLDivElement>(null);
  // Bumped on every source change; a load that finishes under an older id is dropped.
  const requestId = React.useRef(0);

  const show = React.useCallback((next: ResolvedDataset) => {
    setResolved(next);
    setControls((c) => ({ ...c, ...viewDefaults(next.dataset, c.category) }));
  }, []);

  const apply = React.useCallback(async (source: DataSource) => {
    const id = ++requestId.current;
    setLoading(true);
    try {
      const next = await resolveDataset(source, { timeoutMs: config.fetchTimeoutMs });
      if (id === requestId.current) show(next);
    } finally {
      if (id === requestId.current) setLoading(false);
    }
  }, [show]);

  const onSourceKindChange = (kind: SourceKind) => {
    requestId.current++;
    setLoading(false);
    setSourceKind(kind);
    show(kind === "synthetic" ? sampleData() : sampleFallback());
  };

  const onFile = async (file: File) => {
    try {
      const source: DataSource = sourceKind === "delimited"
        ? { kind: "delimited", text: await file.text(), fileName: file.name }
        : { kind: "spreadsheet", bytes: await file.arrayBuffer(), fileName: file.name };
      await apply(source);
    } catch (err) {
      console.error(`Failed to read ${file.name}`, err);
      show({ ...sampleFallback(), warning: `Could not read ${file.name}: ${errorMessage(err)}. Using sample data.` });
    }
  };

  const onControlsChange = (patch: Partial<ViewControls>) => {
    setControls((c) => {
      const next = { ...c, ...patch };
      if (patch.category && patch.category !== c.category) {
        return { ...next, ...viewDefaults(resolved.dataset, patch.category) };
      }
      return next;
    });
  };

  const { dataset } = resolved;
  const { category, windowSize, metrics, chartKind, showGoals, showTrend } = controls;
  const targets = dataset.targets[category];

  const view = React.useMemo(
    () => project(dataset, category, windowSize, metrics),
    [dataset, category, windowSize, metrics]
  );
  const kpis = React.useMemo(() => computeKPIs(view, targets), [view, targets]);
  const chart = React.useMemo(
    () => buildChartSpec(view, targets, { chartKind, showGoals, showTrend }),
    [view, targets, chartKind, showGoals, showTrend]
  );
  const today = React.useMemo(() => format(new Date(), ISO_DATE), []);

  return (
    <div>
      <Header title={config.title} />

      <main className="container layout">
        <ControlsPanel
          sourceKind={sourceKind}
          onSourceKindChange={onSourceKindChange}
          onFile={(file) => void onFile(file)}
          onUrl={(url) => void apply({ kind: "remote", url })}
          loading={loading}
          periodLabel={resolved.periodLabel}
          metricOptions={metricNames(dataset, category)}
          totalRows={rowCount(dataset, category)}
          value={controls}
          onChange={onControlsChange}
        />

        <div style={{ display: "grid", gap: 18, minWidth: 0 }}>
          <div className="info" role="note">
            Welcome! This dashboard helps you track Environmental, Social, and Governance (ESG) performance.
            Use the sidebar to choose your data and settings.
          </div>

          {resolved.warning && (
            <div className="alert" role="alert" aria-live="polite">{resolved.warning}</div>
          )}
          {loading && <div className="muted">Loading data…</div>}

          <h2 style={{ margin: 0 }}>{category} Overview</h2>

          <KpiCards kpis={kpis} />

          <section className="card" aria-label="Chart">
            <div className="card-header">Chart</div>
            <div className="card-body">
              <details style={{ marginBottom: 10 }}>
                <summary>How to Read the Chart</summary>
                <ul className="muted" style={{ margin: "8px 0 0", paddingLeft: 18 }}>
                  <li><b>X-Axis</b>: dates over time; <b>Y-Axis</b>: values of your selected metrics.</li>
                  <li><b>Goals</b>: dashed lines (if checked) show targets.</li>
                  <li><b>Trends</b>: dotted lines (if checked) show the direction of change.</li>
                </ul>
              </details>
              <MetricChart spec={chart} chartRef={chartRef} />
            </div>
          </section>

          <DataTable view={view} />

          <ChartActions view={view} chartRef={chartRef} today={today} />

          <div className="muted" style={{ fontStyle: "italic" }}>
            Need help? Check the sections above or try the sample data to get started!
          </div>
        </div>
      </main>
    </div>
  );
};

export default App;
