import { EmptyInputError } from '../shared/errors.js'
import type { DateRange, MonthKey, Transaction, YearKey } from './types.js'

/**
 * Splits a YYYY-MM-DD date into year and month numbers.
 */
export const parseYearMonth = (date: string): { year: number; month: number } => ({
  year: Number(date.slice(0, 4)),
  month: Number(date.slice(5, 7)),
})

export const formatMonthKey = (year: number, month: number): MonthKey =>
  `${String(year).slice(-2)}_${String(month).padStart(2, '0')}`

/**
 * @example
 * toMonthKey({ date: '2022-01-15', ... }) // => '22_01'
 */
export const toMonthKey = (tx: Transaction): MonthKey => {
  const { year, month } = parseYearMonth(tx.date)
  return formatMonthKey(year, month)
}

export const toYearKey = (tx: Transaction): YearKey => parseYearMonth(tx.date).year

/**
 * Oldest and newest dates by linear scan; input order does not matter.
 * Plain string comparison is chronological for ISO dates.
 */
export const getDateRange = (transactions: readonly Transaction[]): DateRange => {
  if (transactions.length === 0) {
    throw new EmptyInputError()
  }

  let min = transactions[0].date
  let max = transactions[0].date
  for (const tx of transactions) {
    if (tx.date < min) min = tx.date
    if (tx.date > max) max = tx.date
  }

  return { min, max }
}

/**
 * Every month from the oldest to the newest transaction, inclusive, with no
 * gaps even when a month has no transactions.
 *
 * @example
 * buildMonthTimeline(txsFromNov2021ToFeb2022) // => ['21_11', '21_12', '22_01', '22_02']
 */
export const buildMonthTimeline = (transactions: readonly Transaction[]): MonthKey[] => {
  const range = getDateRange(transactions)
  const first = parseYearMonth(range.min)
  const last = parseYearMonth(range.max)

  const months: MonthKey[] = []
  for (let year = first.year; year <= last.year; year++) {
    for (let month = 1; month <= 12; month++) {
      if (year === first.year && month < first.month) continue
      if (year === last.year && month > last.month) continue
      months.push(formatMonthKey(year, month))
    }
  }

  return months
}

/**
 * Every calendar year from the oldest to the newest transaction, inclusive.
 */
export const buildYearTimeline = (transactions: readonly Transaction[]): YearKey[] => {
  const range = getDateRange(transactions)
  const first = parseYearMonth(range.min).year
  const last = parseYearMonth(range.max).year

  const years: YearKey[] = []
  for (let year = first; year <= last; year++) {
    years.push(year)
  }
  return years
}
