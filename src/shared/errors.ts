/**
 * Base class for every failure the report pipeline raises on purpose.
 * `code` is stable and safe to match on; `details` is whatever context helps
 * the user fix their input.
 */
export class ExpenseReportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message)
    this.name = this.constructor.name
  }
}

/**
 * No transactions to derive a timeline from. Aborts the run.
 */
export class EmptyInputError extends ExpenseReportError {
  constructor(message = 'No transactions available to build a report') {
    super(message, 'EMPTY_INPUT')
  }
}

/**
 * Two period-keyed series disagree on their keys. Only happens when a
 * series skipped zero-fill, so treat it as a bug rather than bad input.
 */
export class MismatchedPeriodsError extends ExpenseReportError {
  constructor(message: string, details?: { missing: string[]; unexpected: string[] }) {
    super(message, 'MISMATCHED_PERIODS', details)
  }
}

/**
 * Averaging a series with no values.
 */
export class EmptyBucketError extends ExpenseReportError {
  constructor(message = 'Cannot average an empty series') {
    super(message, 'EMPTY_BUCKET')
  }
}

export class NoInputFilesError extends ExpenseReportError {
  constructor(inputDir: string) {
    super(`No *.csv files were found in ${inputDir}`, 'NO_INPUT_FILES', { inputDir })
  }
}

export class CsvFormatError extends ExpenseReportError {
  constructor(message: string, file: string, line: number) {
    super(`${file}:${line}: ${message}`, 'CSV_FORMAT', { file, line })
  }
}

export class TransactionValidationError extends ExpenseReportError {
  constructor(file: string, line: number, issues: string[]) {
    super(`${file}:${line}: invalid transaction (${issues.join('; ')})`, 'INVALID_TRANSACTION', {
      file,
      line,
      issues,
    })
  }
}

export class ConfigError extends ExpenseReportError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'INVALID_CONFIG', { issues })
  }
}
