import { EmptyBucketError } from '../shared/errors.js'
import { averageByYear, computeBalance, computeBalancePercentage, metricAverage } from './metrics.js'
import {
  aggregateByCategory,
  aggregateBySubcategory,
  buildExpenseTree,
  sumByPeriod,
} from './period-aggregator.js'
import { buildMonthTimeline, buildYearTimeline, getDateRange, toMonthKey } from './timeline.js'
import { zeroFill, zeroFillAndRank, zeroFillAndRankSubcategories } from './zero-fill.js'
import type {
  Bucket,
  CategoryBuckets,
  CategoryYearAverages,
  DateRange,
  ExpenseTree,
  MonthKey,
  PeriodKey,
  SubcategoryBuckets,
  Transaction,
  YearKey,
} from './types.js'

export interface MonthlyOverview {
  expenses: Bucket<MonthKey>
  income: Bucket<MonthKey>
  balance: Bucket<MonthKey>
  balancePercentage: Bucket<MonthKey>
  /** Mean of balancePercentage, null when there is nothing to average */
  balancePercentageAverage: number | null
}

/**
 * Everything the charts, tables and terminal views consume. Each series is
 * zero-filled against the global month or year timeline.
 */
export interface ReportData {
  range: DateRange
  months: MonthKey[]
  years: YearKey[]
  transactionCount: number
  overview: MonthlyOverview
  /** Expense categories ranked by total */
  expensesByCategory: CategoryBuckets<MonthKey>
  /** Expense subcategories per category, both levels ranked by total */
  expensesBySubcategory: SubcategoryBuckets<MonthKey>
  /** Mean monthly expense per category, null when it cannot be computed */
  categoryMonthlyAverage: Map<string, number | null>
  yearAverages: CategoryYearAverages
  expenseTree: ExpenseTree
}

/**
 * An empty series only loses the one metric that needed it, not the whole
 * report.
 */
export const averageOrNull = <K extends PeriodKey>(bucket: Bucket<K>): number | null => {
  try {
    return metricAverage(bucket)
  } catch (error) {
    if (error instanceof EmptyBucketError) return null
    throw error
  }
}

/**
 * Runs the whole aggregation pipeline over an already de-duplicated set.
 * Pure: the same transactions always give the same data.
 *
 * @example
 * const data = buildReportData(transactions)
 * data.months // => ['22_01', '22_02']
 * data.overview.balance // => Map { '22_01' => -50, '22_02' => 100 }
 */
export const buildReportData = (transactions: readonly Transaction[]): ReportData => {
  const range = getDateRange(transactions)
  const months = buildMonthTimeline(transactions)
  const years = buildYearTimeline(transactions)

  const expenses = zeroFill(sumByPeriod(transactions, { kind: 'EXPENSE', keyOf: toMonthKey }), months)
  const income = zeroFill(sumByPeriod(transactions, { kind: 'INCOME', keyOf: toMonthKey }), months)
  const balancePercentage = computeBalancePercentage(income, expenses)

  const expensesByCategory = zeroFillAndRank(
    aggregateByCategory(transactions, { kind: 'EXPENSE', keyOf: toMonthKey }),
    months
  )
  const expensesBySubcategory = zeroFillAndRankSubcategories(
    aggregateBySubcategory(transactions, { kind: 'EXPENSE', keyOf: toMonthKey }),
    months
  )

  const categoryMonthlyAverage = new Map<string, number | null>()
  for (const [category, bucket] of expensesByCategory) {
    categoryMonthlyAverage.set(category, averageOrNull(bucket))
  }

  const expenseTree = buildExpenseTree(transactions)

  return {
    range,
    months,
    years,
    transactionCount: transactions.length,
    overview: {
      expenses,
      income,
      balance: computeBalance(income, expenses),
      balancePercentage,
      balancePercentageAverage: averageOrNull(balancePercentage),
    },
    expensesByCategory,
    expensesBySubcategory,
    categoryMonthlyAverage,
    yearAverages: averageByYear(expenseTree, range),
    expenseTree,
  }
}
