import { resolve } from 'node:path'
import type { SummaryOptions } from '../args.js'
import { createFormatter, formatTable } from '../output.js'
import { loadCommandConfig } from './shared.js'
import { buildReportData, type ReportData } from '../../reporting/index.js'
import type { Bucket, CategoryYearAverages, DateRange, ExpenseTree, YearKey } from '../../reporting/types.js'
import { loadTransactions } from '../../transactions/load-transactions.js'
import { formatMoney } from '../../shared/format.js'

export interface SummaryResult {
  success: true
  range: DateRange
  transactionCount: number
  expenses: ExpenseTree
  averages?: CategoryYearAverages
  formatted?: string
}

export interface TextSummaryOptions {
  currency: string
  averages: boolean
  /** Categories shown before the rest are folded into one line */
  limit?: number
}

const yearCells = (byYear: Bucket<YearKey>, years: YearKey[], currency: string): string[] =>
  years.map((year) => formatMoney(byYear.get(year) ?? 0, currency))

// Name columns on the left, amount columns on the right
const columnAlign = (names: number, amounts: number): ('left' | 'right')[] => [
  ...Array<'left'>(names).fill('left'),
  ...Array<'right'>(amounts).fill('right'),
]

const expenseTable = (tree: ExpenseTree, years: YearKey[], currency: string, limit?: number) => {
  const categories = [...tree.categories]
  const shown = limit === undefined ? categories : categories.slice(0, limit)

  const rows: string[][] = [
    ['All expenses', '', formatMoney(tree.total, currency), ...yearCells(tree.byYear, years, currency)],
  ]
  for (const [name, category] of shown) {
    rows.push([name, '', formatMoney(category.total, currency), ...yearCells(category.byYear, years, currency)])
    for (const [subName, sub] of category.subcategories) {
      rows.push(['', subName, formatMoney(sub.total, currency), ...yearCells(sub.byYear, years, currency)])
    }
  }

  const lines = [
    formatTable(
      ['Category', 'Subcategory', 'Total', ...years.map(String)],
      rows,
      columnAlign(2, years.length + 1)
    ),
  ]
  const hidden = categories.length - shown.length
  if (hidden > 0) {
    lines.push('', `... and ${hidden} more categories`)
  }
  return lines.join('\n')
}

const averagesTable = (averages: CategoryYearAverages, years: YearKey[], currency: string) => {
  const rows: string[][] = []
  for (const [name, average] of averages) {
    rows.push([name, '', ...yearCells(average.byYear, years, currency)])
    for (const [subName, byYear] of average.subcategories) {
      rows.push(['', subName, ...yearCells(byYear, years, currency)])
    }
  }
  return formatTable(['Category', 'Subcategory', ...years.map(String)], rows, columnAlign(2, years.length))
}

/**
 * Generates the terminal rendering of the summary.
 */
export const formatTextSummary = (data: ReportData, options: TextSummaryOptions): string => {
  const lines = [
    `Expenses from ${data.range.min} to ${data.range.max} (${data.transactionCount} transactions)`,
    '',
    expenseTable(data.expenseTree, data.years, options.currency, options.limit),
  ]

  if (options.averages) {
    lines.push('', 'Average monthly expense per year', '', averagesTable(data.yearAverages, data.years, options.currency))
  }

  return lines.join('\n')
}

/**
 * Summary CLI command implementation.
 *
 * @example
 * expense-report summary --averages --limit 5
 */
export const summaryCommand = async (options: SummaryOptions): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const config = await loadCommandConfig(options, formatter)

  const transactions = await loadTransactions(resolve(options.input ?? config.paths.inputDir), formatter)
  const data = buildReportData(transactions)

  const result: SummaryResult = {
    success: true,
    range: data.range,
    transactionCount: data.transactionCount,
    expenses: data.expenseTree,
  }
  if (options.averages) {
    result.averages = data.yearAverages
  }

  if (options.format === 'text') {
    result.formatted = formatTextSummary(data, {
      currency: config.report.currency,
      averages: options.averages,
      limit: options.limit,
    })
  }

  formatter.success(result)
}
