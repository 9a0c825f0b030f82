import { EmptyBucketError, MismatchedPeriodsError } from '../shared/errors.js'
import { parseYearMonth } from './timeline.js'
import { rankByTotal, bucketTotal } from './zero-fill.js'
import type {
  Bucket,
  CategoryYearAverages,
  DateRange,
  ExpenseTree,
  PeriodKey,
  YearKey,
} from './types.js'

/**
 * Both series must be indexed by the same periods before they can be
 * combined element by element.
 */
const assertSamePeriods = <K extends PeriodKey>(income: Bucket<K>, expense: Bucket<K>): void => {
  const missing = [...income.keys()].filter((key) => !expense.has(key))
  const unexpected = [...expense.keys()].filter((key) => !income.has(key))
  if (missing.length > 0 || unexpected.length > 0) {
    throw new MismatchedPeriodsError('Income and expense series cover different periods', {
      missing: missing.map(String),
      unexpected: unexpected.map(String),
    })
  }
}

/**
 * Income minus expense for every period.
 *
 * @example
 * computeBalance(new Map([['22_01', 0]]), new Map([['22_01', 50]]))
 * // => Map { '22_01' => -50 }
 */
export const computeBalance = <K extends PeriodKey>(
  income: Bucket<K>,
  expense: Bucket<K>
): Bucket<K> => {
  assertSamePeriods(income, expense)

  const balance: Bucket<K> = new Map()
  for (const [key, incomeValue] of income) {
    balance.set(key, incomeValue - (expense.get(key) ?? 0))
  }
  return balance
}

/**
 * Share of income left after expenses, as a percentage. A period with no
 * income reports 0 rather than an error, whatever was spent.
 */
export const computeBalancePercentage = <K extends PeriodKey>(
  income: Bucket<K>,
  expense: Bucket<K>
): Bucket<K> => {
  assertSamePeriods(income, expense)

  const percentage: Bucket<K> = new Map()
  for (const [key, incomeValue] of income) {
    if (incomeValue === 0) {
      percentage.set(key, 0)
    } else {
      percentage.set(key, ((incomeValue - (expense.get(key) ?? 0)) / incomeValue) * 100)
    }
  }
  return percentage
}

/**
 * Arithmetic mean of a bucket's values. Unlike the balance percentage,
 * an empty input is an error, never a silent 0 or NaN.
 */
export const metricAverage = <K extends PeriodKey>(bucket: Bucket<K>): number => {
  if (bucket.size === 0) {
    throw new EmptyBucketError()
  }
  return bucketTotal(bucket) / bucket.size
}

/**
 * Number of months of `year` the data covers. The first year counts from its
 * first month to December, the last year from January to its last month.
 * A year that is both first and last follows the first-year rule.
 *
 * @example
 * // data from 2021-03-10 to 2023-02-01
 * monthsCoveredInYear(2021, range) // => 10
 * monthsCoveredInYear(2022, range) // => 12
 * monthsCoveredInYear(2023, range) // => 2
 */
export const monthsCoveredInYear = (year: YearKey, range: DateRange): number => {
  const first = parseYearMonth(range.min)
  const last = parseYearMonth(range.max)

  if (year === first.year) {
    return 13 - first.month
  }
  if (year === last.year) {
    return last.month
  }
  return 12
}

const averagePerMonth = (
  byYear: Bucket<YearKey>,
  range: DateRange
): Bucket<YearKey> => {
  const averages: Bucket<YearKey> = new Map()
  for (const [year, total] of byYear) {
    averages.set(year, total === 0 ? 0 : total / monthsCoveredInYear(year, range))
  }
  return averages
}

/**
 * Average monthly expense per year for every category and subcategory.
 * Categories are ranked by the sum of their yearly averages.
 */
export const averageByYear = (tree: ExpenseTree, range: DateRange): CategoryYearAverages => {
  const averages: CategoryYearAverages = new Map()

  for (const [name, category] of tree.categories) {
    const subcategories = new Map<string, Bucket<YearKey>>()
    for (const [subName, subcategory] of category.subcategories) {
      subcategories.set(subName, averagePerMonth(subcategory.byYear, range))
    }
    averages.set(name, { byYear: averagePerMonth(category.byYear, range), subcategories })
  }

  return rankByTotal(averages, (category) => bucketTotal(category.byYear))
}

/**
 * Exponential smoothing used for trend lines:
 * `s[0] = v[0]`, `s[i] = weight * s[i-1] + (1 - weight) * v[i]`.
 */
export const smoothCurve = (values: readonly number[], weight: number): number[] => {
  if (!(weight >= 0 && weight <= 1)) {
    throw new RangeError(`Smoothing weight must be between 0 and 1, got ${weight}`)
  }
  if (values.length === 0) return []

  const smoothed = [values[0]]
  for (let i = 1; i < values.length; i++) {
    smoothed.push(weight * smoothed[i - 1] + (1 - weight) * values[i])
  }
  return smoothed
}
