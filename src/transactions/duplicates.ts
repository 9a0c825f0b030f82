import type { Transaction } from './transaction-types.js'

export interface DuplicateRemoval {
  unique: Transaction[]
  duplicates: Transaction[]
}

/**
 * Identity used to spot the same record appearing in overlapping exports.
 */
export const duplicateKey = (tx: Transaction): string =>
  JSON.stringify([tx.date, tx.description, tx.value, tx.category])

/**
 * Keeps the first of every group of records that share date, description,
 * value and category. Order of the kept records is preserved.
 */
export const removeDuplicates = (transactions: Transaction[]): DuplicateRemoval => {
  const seen = new Set<string>()
  const unique: Transaction[] = []
  const duplicates: Transaction[] = []

  for (const tx of transactions) {
    const key = duplicateKey(tx)
    if (seen.has(key)) {
      duplicates.push(tx)
    } else {
      seen.add(key)
      unique.push(tx)
    }
  }

  return { unique, duplicates }
}
