import { describe, it, expect } from 'vitest'
import {
  averageByYear,
  computeBalance,
  computeBalancePercentage,
  metricAverage,
  monthsCoveredInYear,
  smoothCurve,
} from '../metrics.js'
import { buildExpenseTree } from '../period-aggregator.js'
import { getDateRange } from '../timeline.js'
import { EmptyBucketError, MismatchedPeriodsError } from '../../shared/errors.js'
import { mockTx } from '../../test-utils/fixtures.js'
import type { Bucket } from '../types.js'

describe('computeBalance', () => {
  it('subtracts expense from income per period', () => {
    const balance = computeBalance(
      new Map([['22_01', 0], ['22_02', 100]]),
      new Map([['22_01', 50], ['22_02', 0]])
    )

    expect([...balance]).toEqual([
      ['22_01', -50],
      ['22_02', 100],
    ])
  })

  it('rejects series with different periods', () => {
    const income: Bucket = new Map([['22_01', 10], ['22_02', 10]])
    const expense: Bucket = new Map([['22_01', 5]])

    expect(() => computeBalance(income, expense)).toThrow(MismatchedPeriodsError)
    try {
      computeBalance(income, expense)
    } catch (error) {
      expect(error).toBeInstanceOf(MismatchedPeriodsError)
      if (error instanceof MismatchedPeriodsError) {
        expect(error.details).toEqual({ missing: ['22_02'], unexpected: [] })
      }
    }
  })
})

describe('computeBalancePercentage', () => {
  it('reports the share of income kept, and 0 without income', () => {
    const percentage = computeBalancePercentage(
      new Map([['a', 200], ['b', 0], ['c', 100]]),
      new Map([['a', 50], ['b', 30], ['c', 150]])
    )

    expect([...percentage]).toEqual([
      ['a', 75],
      ['b', 0],
      ['c', -50],
    ])
  })

  it('rejects series with different periods', () => {
    expect(() =>
      computeBalancePercentage(new Map([['22_01', 1]]), new Map([['22_02', 1]]))
    ).toThrow(MismatchedPeriodsError)
  })
})

describe('metricAverage', () => {
  it('returns the arithmetic mean', () => {
    expect(metricAverage(new Map([['a', 1], ['b', 2], ['c', 3], ['d', 4]]))).toBe(2.5)
  })

  it('throws EmptyBucketError on an empty bucket', () => {
    expect(() => metricAverage(new Map())).toThrow(EmptyBucketError)
  })
})

describe('monthsCoveredInYear', () => {
  const range = { min: '2021-03-10', max: '2023-02-01' }

  it('counts partial first and last years', () => {
    expect(monthsCoveredInYear(2021, range)).toBe(10)
    expect(monthsCoveredInYear(2022, range)).toBe(12)
    expect(monthsCoveredInYear(2023, range)).toBe(2)
  })

  it('applies the first-year rule when the data fits in one year', () => {
    expect(monthsCoveredInYear(2022, { min: '2022-03-05', max: '2022-07-20' })).toBe(10)
    expect(monthsCoveredInYear(2022, { min: '2022-01-05', max: '2022-01-20' })).toBe(12)
  })
})

describe('averageByYear', () => {
  it('divides yearly totals by the months covered', () => {
    const txs = [
      mockTx('2021-11-01', -40, 'Food', 'Coffee'),
      mockTx('2022-01-10', -120, 'Food', 'Supermarket'),
      mockTx('2022-02-01', -6, 'Car', 'Petrol'),
    ]

    const averages = averageByYear(buildExpenseTree(txs), getDateRange(txs))

    expect([...averages.keys()]).toEqual(['Food', 'Car'])
    const food = averages.get('Food')
    expect([...(food?.byYear ?? [])]).toEqual([
      [2021, 20],
      [2022, 60],
    ])
    expect([...(food?.subcategories.keys() ?? [])]).toEqual(['Supermarket', 'Coffee'])
    expect([...(food?.subcategories.get('Coffee') ?? [])]).toEqual([
      [2021, 20],
      [2022, 0],
    ])
    expect([...(averages.get('Car')?.byYear ?? [])]).toEqual([
      [2021, 0],
      [2022, 3],
    ])
  })

  it('ranks by the sum of yearly averages, not by total', () => {
    const txs = [mockTx('2021-11-15', -60, 'Short'), mockTx('2022-12-20', -120, 'Long')]
    const tree = buildExpenseTree(txs)

    const averages = averageByYear(tree, getDateRange(txs))

    expect([...tree.categories.keys()]).toEqual(['Long', 'Short'])
    expect([...averages.keys()]).toEqual(['Short', 'Long'])
    expect([...(averages.get('Short')?.byYear ?? [])]).toEqual([
      [2021, 30],
      [2022, 0],
    ])
    expect([...(averages.get('Long')?.byYear ?? [])]).toEqual([
      [2021, 0],
      [2022, 10],
    ])
  })
})

describe('smoothCurve', () => {
  it('starts at the first value and blends the rest', () => {
    expect(smoothCurve([10, 20], 0.5)).toEqual([10, 15])
  })

  it('returns the input with weight 0 and a flat line with weight 1', () => {
    expect(smoothCurve([3, 9, 4], 0)).toEqual([3, 9, 4])
    expect(smoothCurve([3, 9, 4], 1)).toEqual([3, 3, 3])
  })

  it('returns an empty curve for no values', () => {
    expect(smoothCurve([], 0.9)).toEqual([])
  })

  it('rejects weights outside 0..1', () => {
    expect(() => smoothCurve([1], 1.5)).toThrow(RangeError)
    expect(() => smoothCurve([1], -0.1)).toThrow(RangeError)
    expect(() => smoothCurve([1], Number.NaN)).toThrow(RangeError)
  })
})
