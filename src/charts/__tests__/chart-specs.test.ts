import { describe, it, expect } from 'vitest'
import {
  balanceChart,
  buildCategoryAverageCharts,
  buildCategoryDetailCharts,
  buildOverviewCharts,
  categoriesBarChart,
  categoryDetailChart,
  incomeExpensesChart,
  relativeBalanceChart,
} from '../chart-specs.js'
import { buildReportData } from '../../reporting/index.js'
import { mockTx } from '../../test-utils/fixtures.js'

const data = buildReportData([
  mockTx('2022-01-10', -40, 'Food', 'Supermarket'),
  mockTx('2022-01-12', 100, 'Salary'),
  mockTx('2022-02-03', -20, 'Car', 'Petrol'),
  mockTx('2022-02-20', -20, 'Food', 'Coffee'),
])

const options = { currency: '€', smoothingWeight: 0.5 }

describe('overview charts', () => {
  it('come in display order', () => {
    expect(buildOverviewCharts(data, options).map((chart) => chart.name)).toEqual([
      'Income & expenses',
      'Balance',
      'Relative balance',
      'Expenses per category (stacked area)',
      'Expenses per category (bars)',
      'Category average monthly expense per year',
    ])
  })

  it('stack only the area and bar charts', () => {
    expect(buildOverviewCharts(data, options).map((chart) => chart.spec.kind)).toEqual([
      'line',
      'line',
      'line',
      'area',
      'bar',
      'bar',
    ])
  })

  it('pair each monthly series with its smoothed trend', () => {
    const spec = incomeExpensesChart(data, options)

    expect(spec.kind).toBe('line')
    expect(spec.yAxis).toEqual({ suffix: '€' })
    expect(spec.series.map((s) => [s.name, s.y])).toEqual([
      ['Expenses', [40, 40]],
      ['Expenses smoothed', [40, 40]],
      ['Income', [100, 0]],
      ['Income smoothed', [100, 50]],
    ])
    expect(spec.series[0].x).toEqual(['22_01', '22_02'])
  })

  it('colour balance points by sign', () => {
    const [balance] = balanceChart(data, options).series

    expect(balance.y).toEqual([60, -40])
    expect(balance.pointColors).toEqual(['green', 'red'])
    expect(balance.lineColor).toBe('orange')
  })

  it('mark the average relative balance and the zero line', () => {
    const spec = relativeBalanceChart(data, options)

    expect(spec.series[0].y).toEqual([60, 0])
    expect(spec.guides).toEqual([
      { y: 30, color: 'yellow', dashed: true, label: 'Average (30.00%)' },
      { y: 0, color: 'red' },
    ])
    expect(spec.yAxis).toEqual({ suffix: '%', range: [-50, 75] })
  })

  it('stack categories by rank', () => {
    const spec = categoriesBarChart(data, options)

    expect(spec.kind).toBe('bar')
    expect(spec.series).toEqual([
      { name: 'Food', x: ['22_01', '22_02'], y: [40, 20] },
      { name: 'Car', x: ['22_01', '22_02'], y: [0, 20] },
    ])
  })
})

describe('category charts', () => {
  it('stack subcategories per month under the category average', () => {
    const [food, car] = buildCategoryDetailCharts(data, options)

    expect(food.name).toBe('Food')
    expect(food.spec.series).toEqual([
      { name: 'Supermarket', x: ['22_01', '22_02'], y: [40, 0] },
      { name: 'Coffee', x: ['22_01', '22_02'], y: [0, 20] },
    ])
    expect(food.spec.guides).toEqual([{ y: 30, dashed: true, label: 'Average: (30.00€)' }])
    expect(car.spec.guides).toEqual([{ y: 10, dashed: true, label: 'Average: (10.00€)' }])
  })

  it('skip the guide when the average is unknown', () => {
    expect(categoryDetailChart(new Map(), null, options).guides).toEqual([])
  })

  it('show yearly monthly averages per subcategory', () => {
    const charts = buildCategoryAverageCharts(data, options)

    expect(charts.map((chart) => chart.name)).toEqual(['Food', 'Car'])
    const [supermarket, coffee] = charts[0].spec.series
    expect(supermarket).toMatchObject({ name: 'Supermarket', x: [2022] })
    expect(supermarket.y[0]).toBeCloseTo(40 / 12)
    expect(coffee).toMatchObject({ name: 'Coffee', x: [2022] })
    expect(coffee.y[0]).toBeCloseTo(20 / 12)
  })
})
