import { describe, it, expect } from 'vitest'
import {
  buildMonthTimeline,
  buildYearTimeline,
  formatMonthKey,
  getDateRange,
  toMonthKey,
  toYearKey,
} from '../timeline.js'
import { EmptyInputError } from '../../shared/errors.js'
import { createMockTransaction, mockTx } from '../../test-utils/fixtures.js'

describe('formatMonthKey', () => {
  it('uses a two-digit year and zero-padded month', () => {
    expect(formatMonthKey(2022, 1)).toBe('22_01')
    expect(formatMonthKey(2009, 12)).toBe('09_12')
  })
})

describe('toMonthKey / toYearKey', () => {
  it('derives period keys from the transaction date', () => {
    const tx = createMockTransaction({ date: '2022-01-15' })

    expect(toMonthKey(tx)).toBe('22_01')
    expect(toYearKey(tx)).toBe(2022)
  })
})

describe('getDateRange', () => {
  it('finds oldest and newest dates regardless of input order', () => {
    const range = getDateRange([
      mockTx('2022-03-01', -1, 'Food'),
      mockTx('2021-11-20', -1, 'Food'),
      mockTx('2022-12-31', 5, 'Salary'),
      mockTx('2022-01-01', -1, 'Car'),
    ])

    expect(range).toEqual({ min: '2021-11-20', max: '2022-12-31' })
  })

  it('throws EmptyInputError without transactions', () => {
    expect(() => getDateRange([])).toThrow(EmptyInputError)
  })
})

describe('buildMonthTimeline', () => {
  it('covers every month between the extremes, including empty ones', () => {
    const months = buildMonthTimeline([
      mockTx('2022-02-10', -1, 'Food'),
      mockTx('2021-11-03', -1, 'Food'),
    ])

    expect(months).toEqual(['21_11', '21_12', '22_01', '22_02'])
  })

  it('returns a single month when all dates share it', () => {
    const months = buildMonthTimeline([
      mockTx('2022-05-01', -1, 'Food'),
      mockTx('2022-05-31', -1, 'Food'),
    ])

    expect(months).toEqual(['22_05'])
  })

  it('sorts chronologically as plain strings', () => {
    const months = buildMonthTimeline([
      mockTx('2009-10-01', -1, 'Food'),
      mockTx('2011-02-01', -1, 'Food'),
    ])

    expect(months).toHaveLength(17)
    expect([...months].sort()).toEqual(months)
  })

  it('throws EmptyInputError without transactions', () => {
    expect(() => buildMonthTimeline([])).toThrow(EmptyInputError)
  })
})

describe('buildYearTimeline', () => {
  it('lists every year between the extremes', () => {
    const years = buildYearTimeline([
      mockTx('2020-12-31', -1, 'Food'),
      mockTx('2023-01-01', -1, 'Food'),
    ])

    expect(years).toEqual([2020, 2021, 2022, 2023])
  })
})
