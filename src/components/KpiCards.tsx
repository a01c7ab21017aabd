import React from 'react';
import type { KPI } from '../types';
import { formatChange, formatValue } from '../lib/kpi';

type Props = { kpis: KPI[] };

const toneColor = (kpi: KPI) => (
  !kpi.targetSet ? '#64748b' : kpi.attainment === 'met' ? '#22c55e' : '#f59e0b'
);

const goalText = (kpi: KPI) => (
  kpi.targetSet ? `${formatValue(kpi.target)} ${kpi.attainment === 'met' ? '✅' : '⚠️'}` : 'No goal set'
);

const KpiCards: React.FC<Props> = ({ kpis }) => {
  return (
    <div className="card">
      <div className="card-header">Key Numbers</div>
      <div className="card-body">
        <details style={{ marginBottom: 12 }}>
          <summary>What are Key Numbers?</summary>
          <ul className="muted" style={{ margin: '8px 0 0', paddingLeft: 18 }}>
            <li><b>Current Value</b>: the latest number.</li>
            <li><b>Goal</b>: what we are aiming for (✅ = met, ⚠️ = not met).</li>
            <li><b>Change</b>: how it moved over the selected months.</li>
          </ul>
        </details>
        {!kpis.length ? (
          <div className="muted">Select at least one metric to see key numbers.</div>
        ) : (
          <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fill, minmax(220px, 1fr))', gap: 12 }}>
            {kpis.map((kpi) => (
              <article key={kpi.metric} className="card metric-card" style={{ padding: 12 }} aria-label={kpi.metric}>
                <div style={{ fontWeight: 700, color: toneColor(kpi), marginBottom: 8 }}>{kpi.metric}</div>
                <dl className="kpi-grid">
                  <dt className="muted">Current Value</dt>
                  <dd>{formatValue(kpi.current)}</dd>
                  <dt className="muted">Goal</dt>
                  <dd>{goalText(kpi)}</dd>
                  <dt className="muted">Change (%)</dt>
                  <dd>{formatChange(kpi.pctChange)}</dd>
                </dl>
              </article>
            ))}
          </div>
        )}
      </div>
    </div>
  );
};

export default KpiCards;
