import { readTransactions } from './csv-reader.js'
import { removeDuplicates } from './duplicates.js'
import type { Transaction } from './transaction-types.js'

/**
 * The part of the CLI formatter the loader talks to.
 */
export interface LoadLogger {
  progress(message: string): void
  warn(message: string): void
}

/**
 * Reads every export in `inputDir` and drops records that appear more than
 * once, announcing each one.
 */
export const loadTransactions = async (
  inputDir: string,
  logger: LoadLogger
): Promise<Transaction[]> => {
  logger.progress(`Reading CSV exports from ${inputDir}...`)

  const transactions = await readTransactions(inputDir, {
    onFile: (file, count) => logger.progress(`  ${file}: ${count} transactions`),
  })

  const { unique, duplicates } = removeDuplicates(transactions)
  for (const tx of duplicates) {
    logger.warn(`Duplicate removed: ${tx.date} ${tx.description} ${tx.value} (${tx.category})`)
  }

  logger.progress(
    `Loaded ${unique.length} transactions (${duplicates.length} duplicates removed)`
  )
  return unique
}
