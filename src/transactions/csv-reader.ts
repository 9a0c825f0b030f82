import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  CsvFormatError,
  EmptyInputError,
  NoInputFilesError,
  TransactionValidationError,
} from '../shared/errors.js'
import { csvRowSchema, rowToTransaction, type Transaction } from './transaction-types.js'

export const CSV_DELIMITER = ';'

export interface CsvRecord {
  /** 1-based line where the record starts */
  line: number
  fields: string[]
}

/**
 * Decodes raw file bytes. Exports from the budgeting app are UTF-16 with a
 * byte-order mark; anything without one is read as UTF-8.
 */
export const decodeCsvBuffer = (bytes: Uint8Array): string => {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return new TextDecoder('utf-16le').decode(bytes.subarray(2))
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return new TextDecoder('utf-16be').decode(bytes.subarray(2))
  }
  return new TextDecoder('utf-8').decode(bytes)
}

/**
 * Splits CSV text into records. Handles quoted fields with `""` escapes and
 * newlines inside quotes; blank lines are skipped. A quote only opens a
 * quoted field as its first character, elsewhere it is kept as text.
 */
export const parseCsvRecords = (
  content: string,
  file: string,
  delimiter = CSV_DELIMITER
): CsvRecord[] => {
  const records: CsvRecord[] = []
  let fields: string[] = []
  let field = ''
  let inQuotes = false
  let line = 1
  let recordLine = 1

  const pushRecord = () => {
    fields.push(field)
    const isBlank = fields.length === 1 && fields[0].trim() === ''
    if (!isBlank) {
      records.push({ line: recordLine, fields })
    }
    fields = []
    field = ''
  }

  for (let i = 0; i < content.length; i++) {
    const ch = content[i]

    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
        continue
      }
      if (ch === '\n') line++
      field += ch
      continue
    }

    if (ch === '"' && field === '') {
      inQuotes = true
    } else if (ch === delimiter) {
      fields.push(field)
      field = ''
    } else if (ch === '\n') {
      pushRecord()
      line++
      recordLine = line
    } else if (ch !== '\r') {
      field += ch
    }
  }

  if (inQuotes) {
    throw new CsvFormatError('Unterminated quoted field', file, recordLine)
  }
  if (field !== '' || fields.length > 0) {
    pushRecord()
  }

  return records
}

/**
 * Parses one export into validated transactions. The first record is the
 * header; column order is taken from it. Short rows leave their trailing
 * columns unset, so only missing required columns fail validation.
 */
export const parseTransactionsCsv = (content: string, file: string): Transaction[] => {
  const [header, ...rows] = parseCsvRecords(content, file)
  if (!header) return []

  const columns = header.fields.map((name) => name.trim())

  return rows.map((row) => {
    if (row.fields.length > columns.length) {
      throw new CsvFormatError(
        `Expected ${columns.length} fields but found ${row.fields.length}`,
        file,
        row.line
      )
    }

    const raw = Object.fromEntries(row.fields.map((value, i) => [columns[i], value]))
    const result = csvRowSchema.safeParse(raw)
    if (!result.success) {
      throw new TransactionValidationError(
        file,
        row.line,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      )
    }

    return rowToTransaction(result.data)
  })
}

/**
 * Lists the CSV exports in a directory, sorted by name.
 * Several partial exports can live side by side.
 */
export const listCsvFiles = async (inputDir: string): Promise<string[]> => {
  const entries = await readdir(inputDir)
  const files = entries
    .filter((name) => name.toLowerCase().endsWith('.csv'))
    .sort()
    .map((name) => join(inputDir, name))

  if (files.length === 0) {
    throw new NoInputFilesError(inputDir)
  }

  return files
}

export interface ReadTransactionsOptions {
  /** Called after each file is parsed */
  onFile?: (file: string, count: number) => void
}

/**
 * Reads every export in `inputDir`. Fails when none of them holds a
 * transaction, since nothing downstream can work with an empty set.
 */
export const readTransactions = async (
  inputDir: string,
  options: ReadTransactionsOptions = {}
): Promise<Transaction[]> => {
  const files = await listCsvFiles(inputDir)
  const transactions: Transaction[] = []

  for (const file of files) {
    const content = decodeCsvBuffer(await readFile(file))
    const parsed = parseTransactionsCsv(content, file)
    options.onFile?.(file, parsed.length)
    transactions.push(...parsed)
  }

  if (transactions.length === 0) {
    throw new EmptyInputError(`No transactions could be found in the CSV files of ${inputDir}`)
  }

  return transactions
}
