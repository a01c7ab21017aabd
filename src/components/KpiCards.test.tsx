// @vitest-environment jsdom
import { describe, expect, it } from 'vitest'
import { render, screen, within } from '@testing-library/react'
import KpiCards from './KpiCards'
import type { KPI } from '../types'

const kpi = (patch: Partial<KPI>): KPI => ({
  metric: 'Waste Recycled (%)',
  current: 84,
  target: 85,
  targetSet: true,
  pctChange: 5,
  polarity: 'higher-is-better',
  attainment: 'missed',
  ...patch,
})

describe('KpiCards', () => {
  it('shows current value, goal status and change per metric', () => {
    render(
      <KpiCards
        kpis={[
          kpi({}),
          kpi({ metric: 'CO2 Emissions (tons)', current: 0.8, target: 1, pctChange: -12.345, polarity: 'lower-is-better', attainment: 'met' }),
        ]}
      />
    )

    const waste = within(screen.getByRole('article', { name: 'Waste Recycled (%)' }))
    expect(waste.getByText('84.0')).toBeInTheDocument()
    expect(waste.getByText('85.0 ⚠️')).toBeInTheDocument()
    expect(waste.getByText('+5.0%')).toBeInTheDocument()

    const co2 = within(screen.getByRole('article', { name: 'CO2 Emissions (tons)' }))
    expect(co2.getByText('1.0 ✅')).toBeInTheDocument()
    expect(co2.getByText('-12.3%')).toBeInTheDocument()
  })

  it('says when a metric has no goal', () => {
    render(<KpiCards kpis={[kpi({ metric: 'Green Roofs', target: 0, targetSet: false, attainment: 'met' })]} />)
    expect(screen.getByText('No goal set')).toBeInTheDocument()
  })

  it('prompts for a selection when there are no metrics', () => {
    render(<KpiCards kpis={[]} />)
    expect(screen.getByText('Select at least one metric to see key numbers.')).toBeInTheDocument()
  })
})
