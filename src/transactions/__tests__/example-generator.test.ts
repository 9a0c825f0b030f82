import { describe, it, expect } from 'vitest'
import { EXAMPLE_CATEGORIES, generateExampleTransactions } from '../example-generator.js'

describe('generateExampleTransactions', () => {
  it('adds one expense per day and a salary on days divisible by 5', () => {
    const transactions = generateExampleTransactions({
      from: '2022-01-01',
      to: '2022-01-10',
      random: () => 0,
    })

    expect(transactions).toHaveLength(12)
    expect(transactions[0]).toMatchObject({
      date: '2022-01-01',
      description: 'Expense of 2022-01-01',
      value: -50,
      category: 'Car',
      subcategory: 'Maintenance',
      kind: 'EXPENSE',
    })
    expect(transactions[5]).toMatchObject({
      date: '2022-01-05',
      description: 'Income of 2022-01-05',
      value: 1,
      category: 'Salary',
      subcategory: null,
      kind: 'INCOME',
    })
    expect(transactions[11].date).toBe('2022-01-10')
  })

  it('includes both ends of the range', () => {
    const transactions = generateExampleTransactions({ from: '2022-01-01', to: '2022-12-31' })
    const expenses = transactions.filter((tx) => tx.kind === 'EXPENSE')
    const incomes = transactions.filter((tx) => tx.kind === 'INCOME')

    expect(expenses).toHaveLength(365)
    // Six salary days per month, five in February
    expect(incomes).toHaveLength(71)
    expect(expenses[0].date).toBe('2022-01-01')
    expect(expenses[364].date).toBe('2022-12-31')
  })

  it('keeps amounts inside their ranges', () => {
    const transactions = generateExampleTransactions({ from: '2022-01-01', to: '2022-03-31' })

    for (const tx of transactions) {
      if (tx.kind === 'EXPENSE') {
        expect(tx.value).toBeGreaterThanOrEqual(-50)
        expect(tx.value).toBeLessThanOrEqual(-0.01)
      } else {
        expect(tx.value).toBeGreaterThanOrEqual(1)
        expect(tx.value).toBeLessThanOrEqual(200)
      }
    }
  })

  it('only uses known categories', () => {
    const names = new Set<string>([...EXAMPLE_CATEGORIES.map((c) => c.name), 'Salary'])
    const transactions = generateExampleTransactions({ from: '2022-01-01', to: '2022-01-31' })

    expect(transactions.every((tx) => names.has(tx.category))).toBe(true)
  })

  it('returns nothing when the range is reversed', () => {
    expect(generateExampleTransactions({ from: '2022-02-01', to: '2022-01-01' })).toEqual([])
  })
})
