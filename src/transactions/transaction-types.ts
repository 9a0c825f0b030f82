import { z } from 'zod'

export type TransactionKind = 'EXPENSE' | 'INCOME'

/**
 * A single validated record from an export.
 * Dates are ISO `YYYY-MM-DD` strings so ordering is plain string comparison.
 */
export interface Transaction {
  readonly date: string
  readonly description: string
  /** Signed amount; negative values are expenses */
  readonly value: number
  readonly category: string
  readonly subcategory: string | null
  readonly account: string | null
  readonly tags: string | null
  readonly kind: TransactionKind
}

export type TransactionInput = Omit<Transaction, 'kind' | 'subcategory' | 'account' | 'tags'> & {
  subcategory?: string | null
  account?: string | null
  tags?: string | null
}

export const kindOf = (value: number): TransactionKind => (value < 0 ? 'EXPENSE' : 'INCOME')

const emptyToNull = (value: string | null | undefined): string | null =>
  value === undefined || value === null || value.trim() === '' ? null : value

/**
 * Builds a frozen transaction. `kind` is derived here and nowhere else.
 */
export const createTransaction = (input: TransactionInput): Transaction =>
  Object.freeze({
    date: input.date,
    description: input.description,
    value: input.value,
    category: input.category,
    subcategory: emptyToNull(input.subcategory),
    account: emptyToNull(input.account),
    tags: emptyToNull(input.tags),
    kind: kindOf(input.value),
  })

const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/

/**
 * Converts `dd/mm/yyyy` to `YYYY-MM-DD`, or null when it is not a real date.
 */
export const parseDayMonthYear = (text: string): string | null => {
  const match = DAY_MONTH_YEAR.exec(text.trim())
  if (!match) return null

  const day = Number(match[1])
  const month = Number(match[2])
  const year = Number(match[3])
  const probe = new Date(Date.UTC(year, month - 1, day))
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null
  }

  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`
}

/**
 * Formats `YYYY-MM-DD` back to the export's `dd/mm/yyyy`.
 */
export const formatDayMonthYear = (isoDate: string): string => {
  const [year, month, day] = isoDate.split('-')
  return `${day}/${month}/${year}`
}

const optionalColumn = z
  .string()
  .optional()
  .transform((value) => emptyToNull(value))

/**
 * Schema for one CSV row keyed by header name.
 */
export const csvRowSchema = z.object({
  Date: z
    .string()
    .transform((value, ctx) => {
      const iso = parseDayMonthYear(value)
      if (!iso) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a dd/mm/yyyy date` })
        return z.NEVER
      }
      return iso
    }),
  Description: z.string().default(''),
  Value: z.string().transform((value, ctx) => {
    const amount = value.trim() === '' ? Number.NaN : Number(value.trim())
    if (!Number.isFinite(amount)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` })
      return z.NEVER
    }
    return amount
  }),
  Category: z.string().refine((value) => value.trim() !== '', 'Category is required'),
  Subcategory: optionalColumn,
  Account: optionalColumn,
  Tags: optionalColumn,
})

export type CsvRow = z.infer<typeof csvRowSchema>

export const rowToTransaction = (row: CsvRow): Transaction =>
  createTransaction({
    date: row.Date,
    description: row.Description,
    value: row.Value,
    category: row.Category,
    subcategory: row.Subcategory,
    account: row.Account,
    tags: row.Tags,
  })
