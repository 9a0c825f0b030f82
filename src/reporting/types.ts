/**
 * Types for the aggregation core.
 *
 * Every series is keyed by a period and reindexed against one global
 * timeline, so any two series of the same granularity line up element by
 * element.
 */

import type { Transaction, TransactionKind } from '../transactions/transaction-types.js'

export type { Transaction, TransactionKind }

/**
 * Month period as `YY_MM`, e.g. `22_01`. Sorts chronologically as a string.
 */
export type MonthKey = string

/** Calendar year, e.g. 2022 */
export type YearKey = number

export type PeriodKey = MonthKey | YearKey

/**
 * Maps a transaction to the period it belongs to.
 */
export type PeriodKeyFn<K extends PeriodKey> = (tx: Transaction) => K

/** Subcategory used when a transaction has none */
export const NO_SUBCATEGORY = 'No subcategory'

/**
 * Period key to accumulated absolute value. Iteration order is the
 * presentation order (chronological once zero-filled).
 */
export type Bucket<K extends PeriodKey = MonthKey> = Map<K, number>

/**
 * Category to bucket. Iteration order is the ranking.
 */
export type CategoryBuckets<K extends PeriodKey = MonthKey> = Map<string, Bucket<K>>

/**
 * Category to subcategory to bucket.
 */
export type SubcategoryBuckets<K extends PeriodKey = MonthKey> = Map<string, CategoryBuckets<K>>

/**
 * Which transactions an aggregation looks at. `ALL` is used when both kinds
 * must be summed together.
 */
export type KindFilter = TransactionKind | 'ALL'

export interface AggregateOptions<K extends PeriodKey> {
  kind: KindFilter
  keyOf: PeriodKeyFn<K>
}

/** Oldest and newest transaction dates, `YYYY-MM-DD` */
export interface DateRange {
  min: string
  max: string
}

export interface SubcategoryAggregate {
  total: number
  byYear: Bucket<YearKey>
}

export interface CategoryAggregate {
  total: number
  byYear: Bucket<YearKey>
  /** Ranked by total, highest first */
  subcategories: Map<string, SubcategoryAggregate>
}

/**
 * Expense totals for summary tables: overall, per category and per
 * subcategory, each with a per-year breakdown.
 *
 * @example
 * const tree: ExpenseTree = {
 *   total: 250,
 *   byYear: new Map([[2022, 250]]),
 *   categories: new Map([['Food', {
 *     total: 250,
 *     byYear: new Map([[2022, 250]]),
 *     subcategories: new Map([['Coffee', { total: 250, byYear: new Map([[2022, 250]]) }]]),
 *   }]]),
 * }
 */
export interface ExpenseTree {
  total: number
  byYear: Bucket<YearKey>
  /** Ranked by total, highest first */
  categories: Map<string, CategoryAggregate>
}

/**
 * Average expense per covered month, per year.
 */
export interface CategoryYearAverage {
  byYear: Bucket<YearKey>
  subcategories: Map<string, Bucket<YearKey>>
}

export type CategoryYearAverages = Map<string, CategoryYearAverage>
