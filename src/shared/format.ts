/**
 * @example
 * formatMoney(1234.5, '€') // => '1,234.50€'
 */
export const formatMoney = (value: number, currency: string): string =>
  `${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}${currency}`

/** Local calendar date as YYYY-MM-DD */
export const formatLocalDate = (date: Date): string =>
  [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, '0'),
    String(date.getDate()).padStart(2, '0'),
  ].join('-')
