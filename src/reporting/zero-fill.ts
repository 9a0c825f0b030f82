import { MismatchedPeriodsError } from '../shared/errors.js'
import type { Bucket, CategoryBuckets, PeriodKey, SubcategoryBuckets } from './types.js'

export const bucketTotal = <K extends PeriodKey>(bucket: Bucket<K>): number => {
  let total = 0
  for (const value of bucket.values()) {
    total += value
  }
  return total
}

/**
 * Returns a new bucket holding exactly the timeline's periods, in timeline
 * order, with 0 for periods the bucket lacks. Applying it twice gives the
 * same result as applying it once.
 *
 * A period outside the timeline means the timeline was built from a
 * different transaction set.
 */
export const zeroFill = <K extends PeriodKey>(
  bucket: Bucket<K>,
  timeline: readonly K[]
): Bucket<K> => {
  const known = new Set(timeline)
  const unexpected = [...bucket.keys()].filter((key) => !known.has(key))
  if (unexpected.length > 0) {
    throw new MismatchedPeriodsError(
      `Bucket has periods outside the timeline: ${unexpected.join(', ')}`,
      { missing: [], unexpected: unexpected.map(String) }
    )
  }

  return new Map(timeline.map((key): [K, number] => [key, bucket.get(key) ?? 0]))
}

/**
 * Reorders a map by descending total. Ties keep their original order.
 * Values are passed through untouched.
 */
export const rankByTotal = <V>(
  entries: Map<string, V>,
  totalOf: (value: V) => number
): Map<string, V> =>
  new Map(
    [...entries]
      .map(([name, value]) => ({ name, value, total: totalOf(value) }))
      .sort((a, b) => b.total - a.total)
      .map(({ name, value }): [string, V] => [name, value])
  )

/**
 * Zero-fills every category's bucket and ranks categories by total.
 */
export const zeroFillAndRank = <K extends PeriodKey>(
  categories: CategoryBuckets<K>,
  timeline: readonly K[]
): CategoryBuckets<K> => {
  const filled: CategoryBuckets<K> = new Map()
  for (const [name, bucket] of categories) {
    filled.set(name, zeroFill(bucket, timeline))
  }
  return rankByTotal(filled, bucketTotal)
}

const nestedTotal = <K extends PeriodKey>(subcategories: CategoryBuckets<K>): number => {
  let total = 0
  for (const bucket of subcategories.values()) {
    total += bucketTotal(bucket)
  }
  return total
}

/**
 * Zero-fills every subcategory bucket, ranks subcategories inside each
 * category, and ranks categories by the sum of all their subcategories.
 */
export const zeroFillAndRankSubcategories = <K extends PeriodKey>(
  categories: SubcategoryBuckets<K>,
  timeline: readonly K[]
): SubcategoryBuckets<K> => {
  const filled: SubcategoryBuckets<K> = new Map()
  for (const [name, subcategories] of categories) {
    filled.set(name, zeroFillAndRank(subcategories, timeline))
  }
  return rankByTotal(filled, nestedTotal)
}
