import { resolve } from 'node:path'
import type { ReportOptions } from '../args.js'
import { createFormatter } from '../output.js'
import { loadCommandConfig } from './shared.js'
import { buildReportData } from '../../reporting/index.js'
import { loadTransactions } from '../../transactions/load-transactions.js'
import { renderReportHtml, writeReport } from '../../html/html-report.js'
import { createReportPage } from '../../html/report-page.js'
import type { DateRange } from '../../reporting/types.js'

export interface ReportResult {
  success: true
  file: string
  transactionCount: number
  range: DateRange
  formatted?: string
}

/**
 * Report CLI command implementation.
 *
 * @example
 * expense-report report --input ./exports --title "2023 expenses" --format text
 */
export const reportCommand = async (options: ReportOptions): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const config = await loadCommandConfig(options, formatter)

  // Command-line options win over config file and environment
  const inputDir = resolve(options.input ?? config.paths.inputDir)
  const outputDir = resolve(options.output ?? config.paths.outputDir)
  const settings = {
    title: options.title ?? config.report.title,
    currency: options.currency ?? config.report.currency,
    smoothingWeight: config.charts.smoothingWeight,
    theme: config.charts.theme,
  }

  const transactions = await loadTransactions(inputDir, formatter)

  formatter.progress('Aggregating transactions...')
  const data = buildReportData(transactions)

  const now = new Date()
  const html = renderReportHtml(createReportPage(data, settings, now))
  const file = await writeReport(html, outputDir, now)

  const result: ReportResult = {
    success: true,
    file,
    transactionCount: data.transactionCount,
    range: data.range,
  }

  if (options.format === 'text') {
    result.formatted = `Report written to ${file} (${data.transactionCount} transactions, ${data.range.min} to ${data.range.max})`
  }

  formatter.success(result)
}
