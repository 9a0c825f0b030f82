import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import type { GenerateOptions } from '../args.js'
import { createFormatter } from '../output.js'
import { generateExampleTransactions } from '../../transactions/example-generator.js'
import { transactionsToCsv } from '../../transactions/csv-writer.js'

export interface GenerateResult {
  success: true
  file: string
  count: number
  formatted?: string
}

/**
 * Writes a made-up transaction history, handy for trying the report out.
 * Without `--output` the CSV goes to stdout.
 *
 * @example
 * expense-report generate --from 2022-01-01 --to 2022-12-31 -o input/example.csv
 */
export const generateCommand = async (options: GenerateOptions): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)

  if (options.from > options.to) {
    formatter.error(
      `Invalid range: ${options.from} is after ${options.to}`,
      'Expected --from to be on or before --to'
    )
  }

  formatter.progress(`Generating transactions from ${options.from} to ${options.to}...`)
  const transactions = generateExampleTransactions({ from: options.from, to: options.to })
  const csv = transactionsToCsv(transactions)

  if (!options.output) {
    process.stdout.write(csv)
    return
  }

  const file = resolve(options.output)
  await mkdir(dirname(file), { recursive: true })
  await writeFile(file, csv, 'utf-8')

  const result: GenerateResult = { success: true, file, count: transactions.length }
  if (options.format === 'text') {
    result.formatted = `Wrote ${transactions.length} transactions to ${file}`
  }
  formatter.success(result)
}
