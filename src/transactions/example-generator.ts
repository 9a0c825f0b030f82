import { createTransaction, type Transaction } from './transaction-types.js'

export const EXAMPLE_CATEGORIES = [
  { name: 'Car', subcategories: ['Maintenance', 'Petrol', 'Taxes'] },
  { name: 'Flat', subcategories: ['Rent', 'Maintenance', 'Electricity'] },
  { name: 'Food', subcategories: ['Supermarket', 'Restaurants', 'Coffee'] },
  { name: 'Transport', subcategories: ['Train', 'Plane', 'Bus'] },
] as const

export const DEFAULT_EXAMPLE_RANGE = { from: '2018-01-01', to: '2022-12-31' } as const

export interface ExampleOptions {
  /** First day, inclusive, YYYY-MM-DD */
  from: string
  /** Last day, inclusive, YYYY-MM-DD */
  to: string
  /** Uniform [0, 1) source; defaults to Math.random */
  random?: () => number
}

const DAY_MS = 24 * 60 * 60 * 1000

const toUtcMs = (isoDate: string): number => {
  const [year, month, day] = isoDate.split('-').map(Number)
  return Date.UTC(year, month - 1, day)
}

const roundCents = (value: number): number => Math.round(value * 100) / 100

const pick = <T>(items: readonly T[], random: () => number): T =>
  items[Math.min(Math.floor(random() * items.length), items.length - 1)]

/**
 * Produces a plausible history: one expense every day and a salary payment
 * on days of the month divisible by 5.
 *
 * @example
 * generateExampleTransactions({ from: '2022-01-01', to: '2022-01-31' })
 * // => 31 expenses + 6 incomes
 */
export const generateExampleTransactions = ({
  from,
  to,
  random = Math.random,
}: ExampleOptions): Transaction[] => {
  const transactions: Transaction[] = []
  const end = toUtcMs(to)

  for (let ms = toUtcMs(from); ms <= end; ms += DAY_MS) {
    const date = new Date(ms).toISOString().slice(0, 10)
    const category = pick(EXAMPLE_CATEGORIES, random)

    transactions.push(
      createTransaction({
        date,
        description: `Expense of ${date}`,
        value: roundCents(-50 + random() * 49.99),
        category: category.name,
        subcategory: pick(category.subcategories, random),
      })
    )

    if (new Date(ms).getUTCDate() % 5 === 0) {
      transactions.push(
        createTransaction({
          date,
          description: `Income of ${date}`,
          value: roundCents(1 + random() * 199),
          category: 'Salary',
          subcategory: null,
        })
      )
    }
  }

  return transactions
}
