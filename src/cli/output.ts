import type { OutputFormat } from './args.js'
import { ExpenseReportError } from '../shared/errors.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
  /** Output warning to stderr */
  warn(message: string): void
}

const hasFormatted = (data: unknown): data is { formatted: string } =>
  typeof data === 'object' &&
  data !== null &&
  'formatted' in data &&
  typeof data.formatted === 'string'

/**
 * JSON.stringify replacer that writes Maps as plain objects, keeping their
 * insertion order.
 */
export const mapReplacer = (_key: string, value: unknown): unknown =>
  value instanceof Map ? Object.fromEntries(value) : value

/**
 * Create an output formatter based on format and quiet settings
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => {
  const progress = (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  }

  const warn = (message: string) => {
    process.stderr.write(`Warning: ${message}\n`)
  }

  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, mapReplacer, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, mapReplacer, 2))
        process.exit(1)
      },
      progress,
      warn,
    }
  }

  // Text format
  return {
    success: <T>(data: T) => {
      if (typeof data === 'string') {
        console.log(data)
      } else if (hasFormatted(data)) {
        console.log(data.formatted)
      } else {
        console.log(JSON.stringify(data, mapReplacer, 2))
      }
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details) {
        console.error(details)
      }
      process.exit(1)
    },
    progress,
    warn,
  }
}

/**
 * Reports any thrown value through the formatter and exits.
 */
export const reportFailure = (formatter: OutputFormatter, error: unknown): never => {
  if (error instanceof ExpenseReportError) {
    return formatter.error(error.message, { code: error.code, ...detailsOf(error) })
  }
  return formatter.error(error instanceof Error ? error.message : String(error))
}

const detailsOf = (error: ExpenseReportError): Record<string, unknown> =>
  typeof error.details === 'object' && error.details !== null ? { ...error.details } : {}

/**
 * Create a simple text table from data
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  align: ('left' | 'right')[] = []
): string => {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells
      .map((cell, i) =>
        align[i] === 'right' ? (cell ?? '').padStart(widths[i]) : (cell ?? '').padEnd(widths[i])
      )
      .join('  ')
      .trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map((w) => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}
