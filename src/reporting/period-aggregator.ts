import { buildYearTimeline, toYearKey } from './timeline.js'
import { rankByTotal, zeroFill } from './zero-fill.js'
import {
  NO_SUBCATEGORY,
  type AggregateOptions,
  type Bucket,
  type CategoryAggregate,
  type CategoryBuckets,
  type ExpenseTree,
  type KindFilter,
  type PeriodKey,
  type SubcategoryAggregate,
  type SubcategoryBuckets,
  type Transaction,
  type YearKey,
} from './types.js'

const matchesKind = (tx: Transaction, kind: KindFilter): boolean =>
  kind === 'ALL' || tx.kind === kind

/**
 * Adds `amount` to the entry for `key`, creating it on first touch.
 */
const addTo = <K extends PeriodKey>(bucket: Bucket<K>, key: K, amount: number): void => {
  bucket.set(key, (bucket.get(key) ?? 0) + amount)
}

/**
 * Returns the existing value for `key`, or stores and returns a fresh one.
 */
const getOrCreate = <V>(map: Map<string, V>, key: string, create: () => V): V => {
  const existing = map.get(key)
  if (existing !== undefined) return existing
  const created = create()
  map.set(key, created)
  return created
}

export const subcategoryOf = (tx: Transaction): string =>
  tx.subcategory === null || tx.subcategory === '' ? NO_SUBCATEGORY : tx.subcategory

/**
 * Total absolute value per period for the transactions matching `kind`.
 * Periods without transactions are absent; zero-fill adds them.
 *
 * @example
 * sumByPeriod(transactions, { kind: 'INCOME', keyOf: toMonthKey })
 * // => Map { '22_02' => 100 }
 */
export const sumByPeriod = <K extends PeriodKey>(
  transactions: readonly Transaction[],
  { kind, keyOf }: AggregateOptions<K>
): Bucket<K> => {
  const bucket: Bucket<K> = new Map()

  for (const tx of transactions) {
    if (!matchesKind(tx, kind)) continue
    addTo(bucket, keyOf(tx), Math.abs(tx.value))
  }

  return bucket
}

/**
 * Per-category totals per period. Categories are grouped by exact string
 * match, so "food" and "Food" stay apart. Map order is encounter order.
 */
export const aggregateByCategory = <K extends PeriodKey>(
  transactions: readonly Transaction[],
  { kind, keyOf }: AggregateOptions<K>
): CategoryBuckets<K> => {
  const categories: CategoryBuckets<K> = new Map()

  for (const tx of transactions) {
    if (!matchesKind(tx, kind)) continue
    const bucket = getOrCreate(categories, tx.category, (): Bucket<K> => new Map())
    addTo(bucket, keyOf(tx), Math.abs(tx.value))
  }

  return categories
}

/**
 * Like aggregateByCategory, one level deeper. Transactions without a
 * subcategory are grouped under "No subcategory".
 */
export const aggregateBySubcategory = <K extends PeriodKey>(
  transactions: readonly Transaction[],
  { kind, keyOf }: AggregateOptions<K>
): SubcategoryBuckets<K> => {
  const categories: SubcategoryBuckets<K> = new Map()

  for (const tx of transactions) {
    if (!matchesKind(tx, kind)) continue
    const subcategories = getOrCreate(categories, tx.category, (): CategoryBuckets<K> => new Map())
    const bucket = getOrCreate(subcategories, subcategoryOf(tx), (): Bucket<K> => new Map())
    addTo(bucket, keyOf(tx), Math.abs(tx.value))
  }

  return categories
}

interface YearAccumulator {
  total: number
  byYear: Bucket<YearKey>
}

const emptyAccumulator = (): YearAccumulator => ({ total: 0, byYear: new Map() })

const accumulate = (acc: YearAccumulator, year: YearKey, amount: number): void => {
  acc.total += amount
  addTo(acc.byYear, year, amount)
}

/**
 * Expense totals by category and subcategory with a per-year breakdown,
 * used for the summary tables. Every `byYear` covers the full year
 * timeline; categories and subcategories are ranked by total.
 */
export const buildExpenseTree = (transactions: readonly Transaction[]): ExpenseTree => {
  const years = buildYearTimeline(transactions)

  const overall = emptyAccumulator()
  const categories = new Map<
    string,
    { acc: YearAccumulator; subcategories: Map<string, YearAccumulator> }
  >()

  for (const tx of transactions) {
    if (tx.kind !== 'EXPENSE') continue

    const year = toYearKey(tx)
    const amount = Math.abs(tx.value)
    const category = getOrCreate(categories, tx.category, () => ({
      acc: emptyAccumulator(),
      subcategories: new Map<string, YearAccumulator>(),
    }))
    const subcategory = getOrCreate(category.subcategories, subcategoryOf(tx), emptyAccumulator)

    accumulate(overall, year, amount)
    accumulate(category.acc, year, amount)
    accumulate(subcategory, year, amount)
  }

  const finalized = new Map<string, CategoryAggregate>()
  for (const [name, { acc, subcategories }] of categories) {
    const subs = new Map<string, SubcategoryAggregate>()
    for (const [subName, subAcc] of subcategories) {
      subs.set(subName, { total: subAcc.total, byYear: zeroFill(subAcc.byYear, years) })
    }

    finalized.set(name, {
      total: acc.total,
      byYear: zeroFill(acc.byYear, years),
      subcategories: rankByTotal(subs, (sub) => sub.total),
    })
  }

  return {
    total: overall.total,
    byYear: zeroFill(overall.byYear, years),
    categories: rankByTotal(finalized, (category) => category.total),
  }
}
