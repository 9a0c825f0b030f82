import {
  createTransaction,
  type Transaction,
  type TransactionInput,
} from '../transactions/transaction-types.js'

/**
 * Creates a transaction with sensible defaults (a 10.00 expense on Food)
 */
export const createMockTransaction = (overrides: Partial<TransactionInput> = {}): Transaction =>
  createTransaction({
    date: '2022-01-15',
    description: 'Test transaction',
    value: -10,
    category: 'Food',
    subcategory: null,
    ...overrides,
  })

/**
 * Shorthand for tables of transactions in tests.
 *
 * @example
 * mockTx('2022-01-10', -50, 'Food', 'Supermarket')
 */
export const mockTx = (
  date: string,
  value: number,
  category: string,
  subcategory: string | null = null
): Transaction => createMockTransaction({ date, value, category, subcategory })
