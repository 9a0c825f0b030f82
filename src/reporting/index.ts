/**
 * Aggregation core.
 *
 * Turns a flat list of dated, categorized transactions into period-aligned
 * series and summary trees. Pure and synchronous; all I/O lives elsewhere.
 */

// Timeline
export {
  getDateRange,
  buildMonthTimeline,
  buildYearTimeline,
  toMonthKey,
  toYearKey,
  formatMonthKey,
  parseYearMonth,
} from './timeline.js'

// Aggregation
export {
  sumByPeriod,
  aggregateByCategory,
  aggregateBySubcategory,
  buildExpenseTree,
  subcategoryOf,
} from './period-aggregator.js'

// Zero-fill & rank
export {
  zeroFill,
  rankByTotal,
  bucketTotal,
  zeroFillAndRank,
  zeroFillAndRankSubcategories,
} from './zero-fill.js'

// Metrics
export {
  computeBalance,
  computeBalancePercentage,
  metricAverage,
  monthsCoveredInYear,
  averageByYear,
  smoothCurve,
} from './metrics.js'

// Report data
export { buildReportData, averageOrNull } from './report-data.js'

export { NO_SUBCATEGORY } from './types.js'

export type {
  MonthKey,
  YearKey,
  PeriodKey,
  PeriodKeyFn,
  Bucket,
  CategoryBuckets,
  SubcategoryBuckets,
  KindFilter,
  AggregateOptions,
  DateRange,
  SubcategoryAggregate,
  CategoryAggregate,
  ExpenseTree,
  CategoryYearAverage,
  CategoryYearAverages,
  Transaction,
  TransactionKind,
} from './types.js'
export type { ReportData, MonthlyOverview } from './report-data.js'
