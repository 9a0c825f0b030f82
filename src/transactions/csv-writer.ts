import { CSV_DELIMITER } from './csv-reader.js'
import { formatDayMonthYear, type Transaction } from './transaction-types.js'

export type CsvCell = string | number | null

export const CSV_HEADER = [
  'Date',
  'Description',
  'Value',
  'Account',
  'Category',
  'Subcategory',
  'Tags',
] as const

const NEEDS_QUOTES = new RegExp(`["${CSV_DELIMITER}\\n\\r]`)

const escapeCell = (value: CsvCell): string => {
  if (value === null) return ''
  const text = String(value)
  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export const toCsv = (rows: CsvCell[][]): string =>
  rows.map((row) => row.map(escapeCell).join(CSV_DELIMITER)).join('\n') + '\n'

/**
 * Serializes transactions in the same layout the reader expects.
 */
export const transactionsToCsv = (transactions: Transaction[]): string =>
  toCsv([
    [...CSV_HEADER],
    ...transactions.map((tx) => [
      formatDayMonthYear(tx.date),
      tx.description,
      tx.value,
      tx.account,
      tx.category,
      tx.subcategory,
      tx.tags,
    ]),
  ])
