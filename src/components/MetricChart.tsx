import React from 'react';
import {
  ResponsiveContainer,
  ComposedChart,
  Line,
  Bar,
  Area,
  Scatter,
  XAxis,
  YAxis,
  Tooltip,
  Legend,
  CartesianGrid,
  Label,
  ReferenceLine,
} from 'recharts';
import type { ChartKind, ChartSeries, ChartSpec } from '../types';
import { formatValue } from '../lib/kpi';
import { monthLabel } from '../lib/time';

type Props = {
  spec: ChartSpec;
  height?: number;
  animate?: boolean;
  /** Wraps the rendered chart; used for the PNG export. */
  chartRef?: React.Ref<HTMLDivElement>;
};

function renderSeries(kind: ChartKind, s: ChartSeries, animate: boolean): React.ReactElement {
  if (s.role === 'trend') {
    return (
      <Line key={s.key} type="linear" dataKey={s.key} name={s.name} stroke={s.color} strokeDasharray="2 3"
        dot={false} strokeWidth={1.6} isAnimationActive={animate} />
    );
  }
  switch (kind) {
    case 'Bar':
      return <Bar key={s.key} dataKey={s.key} name={s.name} fill={s.color} isAnimationActive={animate} />;
    case 'Area':
      return (
        <Area key={s.key} type="monotone" dataKey={s.key} name={s.name} stroke={s.color} fill={s.color}
          fillOpacity={0.18} isAnimationActive={animate} />
      );
    case 'Scatter':
      return <Scatter key={s.key} dataKey={s.key} name={s.name} fill={s.color} isAnimationActive={animate} />;
    case 'Line':
      return (
        <Line key={s.key} type="monotone" dataKey={s.key} name={s.name} stroke={s.color} dot={false}
          strokeWidth={2.2} isAnimationActive={animate} />
      );
  }
}

const MetricChart: React.FC<Props> = ({ spec, height = 380, animate = true, chartRef }) => {
  const [legendOpen, setLegendOpen] = React.useState(true);

  if (!spec.series.length) {
    return <div className="muted">Select at least one metric to draw the chart.</div>;
  }

  return (
    <div ref={chartRef} className="forecast-chart-wrapper" style={{ width: '100%', height }}>
      <button className="legend-toggle" onClick={() => setLegendOpen((v) => !v)} aria-pressed={legendOpen}>
        {legendOpen ? 'Hide legend' : 'Show legend'}
      </button>
      <div className="chart-title">{spec.title}</div>
      <ResponsiveContainer>
        <ComposedChart data={spec.points} margin={{ top: 16, bottom: 28, left: 24, right: 16 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#1f2937" />
          <XAxis
            dataKey="date"
            tickFormatter={monthLabel}
            tick={{ fill: 'var(--muted)', fontSize: 12 }}
            minTickGap={12}
            tickMargin={10}
          >
            <Label value="Date" position="insideBottomRight" offset={-18} style={{ fill: 'var(--muted)' }} />
          </XAxis>
          <YAxis tick={{ fill: 'var(--muted)' }} width={64}>
            <Label value="Value" angle={-90} position="insideLeft" offset={0} style={{ fill: 'var(--muted)' }} />
          </YAxis>
          <Tooltip
            formatter={(value: number | string | Array<number | string>) =>
              typeof value === 'number' ? formatValue(value) : String(value)
            }
            contentStyle={{ background: 'var(--surface)', border: '1px solid var(--border)' }}
          />
          {legendOpen && <Legend wrapperStyle={{ color: 'var(--muted)' }} />}

          {spec.series.map((s) => renderSeries(spec.kind, s, animate))}

          {spec.goals.map((g) => (
            <ReferenceLine
              key={`goal-${g.metric}`}
              y={g.value}
              stroke={g.color}
              strokeDasharray="6 4"
              ifOverflow="extendDomain"
              label={{ value: g.label, position: 'insideTopRight', fill: g.color, fontSize: 11 }}
            />
          ))}
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
};

export default MetricChart;
