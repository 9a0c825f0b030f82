import { atom } from 'jotai'
import type { ReportData } from '../reporting/report-data.js'
import type { Bucket, YearKey } from '../reporting/types.js'

export interface CategoryRow {
  name: string
  total: number
  byYear: Bucket<YearKey>
  /** Mean monthly expense over the whole timeline */
  monthlyAverage: number | null
  subcategoryCount: number
}

export interface SubcategoryRow {
  name: string
  total: number
  byYear: Bucket<YearKey>
  /** Average monthly expense, per year */
  averageByYear: Bucket<YearKey>
}

/**
 * Expense categories in ranking order.
 */
export const buildCategoryRows = (data: ReportData): CategoryRow[] =>
  [...data.expenseTree.categories].map(([name, category]) => ({
    name,
    total: category.total,
    byYear: category.byYear,
    monthlyAverage: data.categoryMonthlyAverage.get(name) ?? null,
    subcategoryCount: category.subcategories.size,
  }))

/**
 * Subcategories of one category in ranking order; empty for an unknown name.
 */
export const buildSubcategoryRows = (data: ReportData, category: string): SubcategoryRow[] => {
  const aggregate = data.expenseTree.categories.get(category)
  if (!aggregate) return []
  const averages = data.yearAverages.get(category)?.subcategories

  return [...aggregate.subcategories].map(([name, sub]) => ({
    name,
    total: sub.total,
    byYear: sub.byYear,
    averageByYear: averages?.get(name) ?? new Map(),
  }))
}

/** Case-insensitive substring match; a blank filter matches everything */
export const matchesFilter = (name: string, filter: string): boolean =>
  name.toLowerCase().includes(filter.trim().toLowerCase())

// Data atoms
export const reportDataAtom = atom<ReportData | null>(null)
export const isLoadingAtom = atom(true)
export const warningsAtom = atom<string[]>([])

// UI state
export const categoryFilterAtom = atom('')

// Derived
export const categoryRowsAtom = atom((get) => {
  const data = get(reportDataAtom)
  if (!data) return []
  const filter = get(categoryFilterAtom)
  return buildCategoryRows(data).filter((row) => matchesFilter(row.name, filter))
})
