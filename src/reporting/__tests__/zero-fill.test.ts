import { describe, it, expect } from 'vitest'
import {
  bucketTotal,
  rankByTotal,
  zeroFill,
  zeroFillAndRank,
  zeroFillAndRankSubcategories,
} from '../zero-fill.js'
import { MismatchedPeriodsError } from '../../shared/errors.js'
import type { Bucket, CategoryBuckets, SubcategoryBuckets } from '../types.js'

const timeline = ['22_01', '22_02', '22_03']

describe('bucketTotal', () => {
  it('adds every value', () => {
    expect(bucketTotal(new Map([['22_01', 2], ['22_02', 3.5]]))).toBe(5.5)
    expect(bucketTotal(new Map())).toBe(0)
  })
})

describe('zeroFill', () => {
  it('adds missing periods as 0', () => {
    const filled = zeroFill(new Map([['22_02', 5]]), timeline)

    expect([...filled]).toEqual([
      ['22_01', 0],
      ['22_02', 5],
      ['22_03', 0],
    ])
  })

  it('orders the result like the timeline', () => {
    const filled = zeroFill(
      new Map([
        ['22_03', 1],
        ['22_01', 2],
      ]),
      timeline
    )

    expect([...filled.keys()]).toEqual(timeline)
  })

  it('gives the same result when applied twice', () => {
    const once = zeroFill(new Map([['22_02', 5]]), timeline)
    const twice = zeroFill(once, timeline)

    expect([...twice]).toEqual([...once])
  })

  it('leaves the input untouched', () => {
    const bucket: Bucket = new Map([['22_02', 5]])
    zeroFill(bucket, timeline)

    expect([...bucket]).toEqual([['22_02', 5]])
  })

  it('rejects periods outside the timeline', () => {
    const bucket: Bucket = new Map([
      ['22_02', 5],
      ['23_01', 1],
    ])

    expect(() => zeroFill(bucket, timeline)).toThrow(MismatchedPeriodsError)
    try {
      zeroFill(bucket, timeline)
    } catch (error) {
      expect(error).toBeInstanceOf(MismatchedPeriodsError)
      if (error instanceof MismatchedPeriodsError) {
        expect(error.code).toBe('MISMATCHED_PERIODS')
        expect(error.details).toEqual({ missing: [], unexpected: ['23_01'] })
      }
    }
  })

  it('works with year keys', () => {
    const filled = zeroFill(new Map([[2022, 7]]), [2021, 2022, 2023])

    expect([...filled]).toEqual([
      [2021, 0],
      [2022, 7],
      [2023, 0],
    ])
  })
})

describe('rankByTotal', () => {
  it('sorts by descending total and keeps ties in input order', () => {
    const ranked = rankByTotal(
      new Map([
        ['a', 1],
        ['b', 3],
        ['c', 1],
        ['d', 3],
      ]),
      (value) => value
    )

    expect([...ranked.keys()]).toEqual(['b', 'd', 'a', 'c'])
  })
})

describe('zeroFillAndRank', () => {
  it('fills each category and ranks by total', () => {
    const categories: CategoryBuckets = new Map([
      ['Car', new Map([['22_01', 5]])],
      ['Food', new Map([['22_02', 10], ['22_03', 10]])],
    ])

    const result = zeroFillAndRank(categories, timeline)

    expect([...result.keys()]).toEqual(['Food', 'Car'])
    expect([...(result.get('Car') ?? [])]).toEqual([
      ['22_01', 5],
      ['22_02', 0],
      ['22_03', 0],
    ])
  })
})

describe('zeroFillAndRankSubcategories', () => {
  it('ranks categories by the sum of their subcategories', () => {
    const categories: SubcategoryBuckets = new Map([
      [
        'Car',
        new Map([
          ['Petrol', new Map([['22_01', 8]])],
          ['Taxes', new Map([['22_03', 8]])],
        ]),
      ],
      ['Food', new Map([['Coffee', new Map([['22_02', 12]])]])],
    ])

    const result = zeroFillAndRankSubcategories(categories, timeline)

    expect([...result.keys()]).toEqual(['Car', 'Food'])
    expect([...(result.get('Car')?.keys() ?? [])]).toEqual(['Petrol', 'Taxes'])
    expect([...(result.get('Food')?.get('Coffee') ?? [])]).toEqual([
      ['22_01', 0],
      ['22_02', 12],
      ['22_03', 0],
    ])
  })
})
