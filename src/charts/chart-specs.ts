import { smoothCurve } from '../reporting/metrics.js'
import type { ReportData } from '../reporting/report-data.js'
import type { Bucket, CategoryBuckets, CategoryYearAverage, PeriodKey } from '../reporting/types.js'
import type { AxisValue, ChartSeries, ChartSpec, NamedChart } from './chart-types.js'

export interface ChartOptions {
  currency: string
  /** Weight for trend lines, 0..1 */
  smoothingWeight: number
}

const EXPENSE_COLOR = 'red'
const INCOME_COLOR = 'green'
const BALANCE_COLOR = 'orange'

const axisOf = <K extends PeriodKey>(bucket: Bucket<K>): { x: AxisValue[]; y: number[] } => ({
  x: [...bucket.keys()],
  y: [...bucket.values()],
})

const trendOf = <K extends PeriodKey>(
  name: string,
  bucket: Bucket<K>,
  color: string,
  opacity: number,
  weight: number
): ChartSeries => ({
  name,
  x: [...bucket.keys()],
  y: smoothCurve([...bucket.values()], weight),
  color,
  opacity,
})

const signColor = (value: number): string => (value <= 0 ? EXPENSE_COLOR : INCOME_COLOR)

const stackedSeries = <K extends PeriodKey>(buckets: CategoryBuckets<K>): ChartSeries[] =>
  [...buckets].map(([name, bucket]) => ({ name, ...axisOf(bucket) }))

export const incomeExpensesChart = (data: ReportData, options: ChartOptions): ChartSpec => {
  const { expenses, income } = data.overview
  return {
    kind: 'line',
    series: [
      { name: 'Expenses', ...axisOf(expenses), color: EXPENSE_COLOR, markers: true },
      trendOf('Expenses smoothed', expenses, EXPENSE_COLOR, 0.3, options.smoothingWeight),
      { name: 'Income', ...axisOf(income), color: INCOME_COLOR, markers: true },
      trendOf('Income smoothed', income, INCOME_COLOR, 0.3, options.smoothingWeight),
    ],
    guides: [],
    yAxis: { suffix: options.currency },
  }
}

export const balanceChart = (data: ReportData, options: ChartOptions): ChartSpec => {
  const { balance } = data.overview
  return {
    kind: 'line',
    series: [
      {
        name: 'Balance',
        ...axisOf(balance),
        pointColors: [...balance.values()].map(signColor),
        lineColor: BALANCE_COLOR,
        markers: true,
      },
      trendOf('Balance smoothed', balance, BALANCE_COLOR, 0.3, options.smoothingWeight),
    ],
    guides: [],
    yAxis: { suffix: options.currency },
  }
}

export const relativeBalanceChart = (data: ReportData, options: ChartOptions): ChartSpec => {
  const { balancePercentage, balancePercentageAverage } = data.overview
  const guides: ChartSpec['guides'] = []

  if (balancePercentageAverage !== null) {
    guides.push({
      y: balancePercentageAverage,
      color: 'yellow',
      dashed: true,
      label: `Average (${balancePercentageAverage.toFixed(2)}%)`,
    })
  }
  guides.push({ y: 0, color: EXPENSE_COLOR })

  return {
    kind: 'line',
    series: [
      {
        name: 'Balance',
        ...axisOf(balancePercentage),
        pointColors: [...balancePercentage.values()].map(signColor),
        lineColor: BALANCE_COLOR,
        markers: true,
      },
      trendOf('Balance smoothed', balancePercentage, 'goldenrod', 0.5, options.smoothingWeight),
    ],
    guides,
    yAxis: { suffix: '%', range: [-50, 75] },
  }
}

export const categoriesAreaChart = (data: ReportData): ChartSpec => ({
  kind: 'area',
  series: stackedSeries(data.expensesByCategory),
  guides: [],
  yAxis: { suffix: '' },
})

export const categoriesBarChart = (data: ReportData, options: ChartOptions): ChartSpec => ({
  kind: 'bar',
  series: stackedSeries(data.expensesByCategory),
  guides: [],
  yAxis: { suffix: options.currency },
})

export const categoriesYearAverageChart = (data: ReportData, options: ChartOptions): ChartSpec => ({
  kind: 'bar',
  series: [...data.yearAverages].map(([name, average]) => ({ name, ...axisOf(average.byYear) })),
  guides: [],
  yAxis: { suffix: options.currency },
})

/**
 * Subcategories of one category stacked per month, with the category's
 * monthly average as a guide when it is known.
 */
export const categoryDetailChart = (
  subcategories: CategoryBuckets,
  average: number | null,
  options: ChartOptions
): ChartSpec => ({
  kind: 'bar',
  series: stackedSeries(subcategories),
  guides:
    average === null
      ? []
      : [{ y: average, dashed: true, label: `Average: (${average.toFixed(2)}${options.currency})` }],
  yAxis: { suffix: options.currency },
})

export const categoryYearAverageChart = (
  average: CategoryYearAverage,
  options: ChartOptions
): ChartSpec => ({
  kind: 'bar',
  series: stackedSeries(average.subcategories),
  guides: [],
  yAxis: { suffix: options.currency },
})

/**
 * The summary charts shown at the top of the report, in display order.
 */
export const buildOverviewCharts = (data: ReportData, options: ChartOptions): NamedChart[] => [
  { name: 'Income & expenses', spec: incomeExpensesChart(data, options) },
  { name: 'Balance', spec: balanceChart(data, options) },
  { name: 'Relative balance', spec: relativeBalanceChart(data, options) },
  { name: 'Expenses per category (stacked area)', spec: categoriesAreaChart(data) },
  { name: 'Expenses per category (bars)', spec: categoriesBarChart(data, options) },
  {
    name: 'Category average monthly expense per year',
    spec: categoriesYearAverageChart(data, options),
  },
]

/**
 * One monthly chart per expense category, ranked by total.
 */
export const buildCategoryDetailCharts = (data: ReportData, options: ChartOptions): NamedChart[] =>
  [...data.expensesBySubcategory].map(([category, subcategories]) => ({
    name: category,
    spec: categoryDetailChart(
      subcategories,
      data.categoryMonthlyAverage.get(category) ?? null,
      options
    ),
  }))

/**
 * One yearly-average chart per expense category.
 */
export const buildCategoryAverageCharts = (data: ReportData, options: ChartOptions): NamedChart[] =>
  [...data.yearAverages].map(([category, average]) => ({
    name: category,
    spec: categoryYearAverageChart(average, options),
  }))
