import type { ChartTheme } from '../charts/chart-types.js'
import {
  buildCategoryAverageCharts,
  buildCategoryDetailCharts,
  buildOverviewCharts,
} from '../charts/chart-specs.js'
import type { ReportData } from '../reporting/report-data.js'
import { formatLocalDate } from '../shared/format.js'
import type { ReportPage } from './html-report.js'

export interface ReportSettings {
  title: string
  currency: string
  smoothingWeight: number
  theme: ChartTheme
}

/**
 * Lays out the aggregated data as the sections of the HTML report.
 */
export const createReportPage = (
  data: ReportData,
  settings: ReportSettings,
  now: Date
): ReportPage => {
  const chartOptions = { currency: settings.currency, smoothingWeight: settings.smoothingWeight }

  return {
    title: settings.title,
    currency: settings.currency,
    generatedOn: formatLocalDate(now),
    range: data.range,
    theme: settings.theme,
    overview: buildOverviewCharts(data, chartOptions),
    categoryDetails: buildCategoryDetailCharts(data, chartOptions),
    categoryAverages: buildCategoryAverageCharts(data, chartOptions),
    expenseTree: data.expenseTree,
    years: data.years,
  }
}
