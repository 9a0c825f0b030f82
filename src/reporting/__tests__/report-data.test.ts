import { describe, it, expect } from 'vitest'
import { averageOrNull, buildReportData } from '../report-data.js'
import { EmptyInputError } from '../../shared/errors.js'
import { mockTx } from '../../test-utils/fixtures.js'

describe('buildReportData', () => {
  const data = buildReportData([
    mockTx('2022-01-15', -20, 'Food', 'Coffee'),
    mockTx('2022-01-20', -30, 'Food', 'Supermarket'),
    mockTx('2022-02-10', 100, 'Salary'),
  ])

  it('builds the global timelines', () => {
    expect(data.months).toEqual(['22_01', '22_02'])
    expect(data.years).toEqual([2022])
    expect(data.range).toEqual({ min: '2022-01-15', max: '2022-02-10' })
    expect(data.transactionCount).toBe(3)
  })

  it('computes the monthly overview', () => {
    expect([...data.overview.expenses]).toEqual([
      ['22_01', 50],
      ['22_02', 0],
    ])
    expect([...data.overview.income]).toEqual([
      ['22_01', 0],
      ['22_02', 100],
    ])
    expect([...data.overview.balance]).toEqual([
      ['22_01', -50],
      ['22_02', 100],
    ])
    expect([...data.overview.balancePercentage]).toEqual([
      ['22_01', 0],
      ['22_02', 100],
    ])
    expect(data.overview.balancePercentageAverage).toBe(50)
  })

  it('zero-fills expense categories against the timeline', () => {
    expect([...data.expensesByCategory.keys()]).toEqual(['Food'])
    expect([...(data.expensesByCategory.get('Food') ?? [])]).toEqual([
      ['22_01', 50],
      ['22_02', 0],
    ])
  })

  it('ranks subcategories inside each category', () => {
    const food = data.expensesBySubcategory.get('Food')

    expect([...(food?.keys() ?? [])]).toEqual(['Supermarket', 'Coffee'])
    expect([...(food?.get('Coffee') ?? [])]).toEqual([
      ['22_01', 20],
      ['22_02', 0],
    ])
  })

  it('averages category expenses over every month', () => {
    expect(data.categoryMonthlyAverage.get('Food')).toBe(25)
  })

  it('averages a single starting year over the months left from January', () => {
    const food = data.yearAverages.get('Food')

    expect([...(food?.byYear.keys() ?? [])]).toEqual([2022])
    expect(food?.byYear.get(2022)).toBeCloseTo(50 / 12)
    expect(food?.subcategories.get('Supermarket')?.get(2022)).toBe(2.5)
    expect(food?.subcategories.get('Coffee')?.get(2022)).toBeCloseTo(20 / 12)
  })

  it('includes the expense tree', () => {
    expect(data.expenseTree.total).toBe(50)
    expect([...data.expenseTree.byYear]).toEqual([[2022, 50]])
  })

  it('handles income-only data', () => {
    const incomeOnly = buildReportData([mockTx('2022-03-01', 10, 'Salary')])

    expect(incomeOnly.expensesByCategory.size).toBe(0)
    expect(incomeOnly.expenseTree.total).toBe(0)
    expect([...incomeOnly.expenseTree.byYear]).toEqual([[2022, 0]])
    expect([...incomeOnly.overview.balancePercentage]).toEqual([['22_03', 100]])
  })

  it('throws EmptyInputError without transactions', () => {
    expect(() => buildReportData([])).toThrow(EmptyInputError)
  })
})

describe('averageOrNull', () => {
  it('returns null for an empty bucket', () => {
    expect(averageOrNull(new Map())).toBeNull()
  })

  it('returns the mean otherwise', () => {
    expect(averageOrNull(new Map([['22_01', 4], ['22_02', 8]]))).toBe(6)
  })
})
