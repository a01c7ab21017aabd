import React from 'react';
import { CATEGORIES, type Category, type ChartKind, type SourceKind } from '../types';
import { CHART_KINDS } from '../lib/chart';

export type ViewControls = {
  category: Category;
  windowSize: number;
  metrics: string[];
  chartKind: ChartKind;
  showGoals: boolean;
  showTrend: boolean;
};

export const SOURCE_KINDS: readonly SourceKind[] = ['synthetic', 'spreadsheet', 'delimited', 'remote'];

export const SOURCE_LABELS: Record<SourceKind, string> = {
  synthetic: 'Sample Data',
  spreadsheet: 'Upload Excel',
  delimited: 'Upload CSV',
  remote: 'URL',
};

const FILE_ACCEPT: Partial<Record<SourceKind, string>> = {
  spreadsheet: '.xlsx,.xls',
  delimited: '.csv',
};

type Props = {
  sourceKind: SourceKind;
  onSourceKindChange: (kind: SourceKind) => void;
  onFile: (file: File) => void;
  onUrl: (url: string) => void;
  loading: boolean;
  periodLabel: string;
  metricOptions: readonly string[];
  totalRows: number;
  value: ViewControls;
  onChange: (patch: Partial<ViewControls>) => void;
};

const pick = <T extends string>(options: readonly T[], raw: string): T | undefined =>
  options.find((o) => o === raw);

const ControlsPanel: React.FC<Props> = ({
  sourceKind,
  onSourceKindChange,
  onFile,
  onUrl,
  loading,
  periodLabel,
  metricOptions,
  totalRows,
  value,
  onChange,
}) => {
  const [url, setUrl] = React.useState('');
  const accept = FILE_ACCEPT[sourceKind];

  const toggleMetric = (metric: string) => {
    onChange({
      metrics: value.metrics.includes(metric)
        ? value.metrics.filter((m) => m !== metric)
        : [...value.metrics, metric],
    });
  };

  const submitUrl = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    const trimmed = url.trim();
    if (trimmed) onUrl(trimmed);
  };

  return (
    <aside className="card sidebar" aria-label="Dashboard controls">
      <div className="card-header">Get Started</div>
      <div className="card-body" style={{ display: 'grid', gap: 14 }}>
        <details>
          <summary>How to Use This Dashboard</summary>
          <ul className="muted" style={{ margin: '8px 0 0', paddingLeft: 18 }}>
            <li><b>Choose Data</b>: sample data, a file upload, or a URL.</li>
            <li><b>Select Category</b>: Environmental, Social, or Governance.</li>
            <li><b>Adjust Settings</b>: time range, metrics and chart style.</li>
            <li><b>Explore</b>: key numbers, the chart and the data table.</li>
          </ul>
        </details>

        <div className="section-title">1. Choose Your Data</div>
        <label className="field">
          <span className="label">Data Source</span>
          <select
            className="input"
            aria-label="Data Source"
            value={sourceKind}
            onChange={(e) => {
              const kind = pick(SOURCE_KINDS, e.target.value);
              if (kind) onSourceKindChange(kind);
            }}
          >
            {SOURCE_KINDS.map((k) => <option key={k} value={k}>{SOURCE_LABELS[k]}</option>)}
          </select>
        </label>

        {accept && (
          <label className="field">
            <span className="label">{sourceKind === 'spreadsheet' ? 'Upload Your Excel File' : 'Upload Your CSV File'}</span>
            <input
              key={sourceKind}
              className="input"
              type="file"
              accept={accept}
              disabled={loading}
              onChange={(e) => {
                const file = e.target.files?.[0];
                if (file) onFile(file);
              }}
            />
          </label>
        )}

        {sourceKind === 'remote' && (
          <form onSubmit={submitUrl} className="field">
            <span className="label">Enter URL to CSV or Excel</span>
            <div style={{ display: 'flex', gap: 8 }}>
              <input
                className="input"
                type="url"
                aria-label="Data URL"
                placeholder="https://example.com/esg_data.csv"
                value={url}
                onChange={(e) => setUrl(e.target.value)}
                style={{ flex: 1 }}
              />
              <button type="submit" className="btn btn-primary" disabled={loading || !url.trim()}>
                {loading ? 'Loading…' : 'Load'}
              </button>
            </div>
          </form>
        )}

        <div><b>Showing Data For:</b> <span>{periodLabel}</span></div>

        <div className="section-title">2. Pick a Category</div>
        <label className="field">
          <span className="label">Category</span>
          <select
            className="input"
            aria-label="Category"
            value={value.category}
            onChange={(e) => {
              const category = pick(CATEGORIES, e.target.value);
              if (category) onChange({ category });
            }}
          >
            {CATEGORIES.map((c) => <option key={c} value={c}>{c}</option>)}
          </select>
        </label>

        <div className="section-title">3. Customize Your View</div>
        <label className="field">
          <span className="label">Months to Show: {value.windowSize}</span>
          <input
            type="range"
            min={1}
            max={Math.max(1, totalRows)}
            value={value.windowSize}
            disabled={totalRows < 1}
            onChange={(e) => onChange({ windowSize: Number(e.target.value) })}
          />
        </label>

        <fieldset className="field" style={{ border: 0, padding: 0, margin: 0 }}>
          <legend className="label">Metrics to Show</legend>
          <div className="table-checkboxes">
            {metricOptions.map((metric) => (
              <label key={metric}>
                <input
                  type="checkbox"
                  checked={value.metrics.includes(metric)}
                  onChange={() => toggleMetric(metric)}
                />
                {metric}
              </label>
            ))}
            {!metricOptions.length && <span className="muted">No metrics in this category.</span>}
          </div>
        </fieldset>

        <label className="field">
          <span className="label">Chart Style</span>
          <select
            className="input"
            aria-label="Chart Style"
            value={value.chartKind}
            onChange={(e) => {
              const chartKind = pick(CHART_KINDS, e.target.value);
              if (chartKind) onChange({ chartKind });
            }}
          >
            {CHART_KINDS.map((k) => <option key={k} value={k}>{k}</option>)}
          </select>
        </label>

        <label>
          <input type="checkbox" checked={value.showGoals} onChange={(e) => onChange({ showGoals: e.target.checked })} />
          {' '}Show Goals
        </label>
        <label>
          <input type="checkbox" checked={value.showTrend} onChange={(e) => onChange({ showTrend: e.target.checked })} />
          {' '}Show Trends
        </label>
      </div>
    </aside>
  );
};

export default ControlsPanel;
