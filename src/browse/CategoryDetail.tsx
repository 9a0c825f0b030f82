import React, { useMemo } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { useAtomValue, useSetAtom } from 'jotai'
import { buildSubcategoryRows, reportDataAtom } from './browse-atoms.js'
import { goBackAtom } from '../navigation/navigation-atoms.js'
import { useListNavigation } from '../shared/hooks/useListNavigation.js'
import { formatMoney } from '../shared/format.js'

interface CategoryDetailProps {
  category: string
  currency: string
}

const VIEWPORT_SIZE = 15
const NAME_WIDTH = 24
const AMOUNT_WIDTH = 14

const cell = (text: string) => text.padStart(AMOUNT_WIDTH)

/**
 * Subcategories of one category: totals per year, then average monthly
 * expense per year.
 */
export const CategoryDetail = ({ category, currency }: CategoryDetailProps) => {
  const { exit } = useApp()
  const data = useAtomValue(reportDataAtom)
  const goBack = useSetAtom(goBackAtom)

  const rows = useMemo(() => (data ? buildSubcategoryRows(data, category) : []), [data, category])
  const aggregate = data?.expenseTree.categories.get(category)
  const categoryAverage = data?.yearAverages.get(category)

  const { visibleRange, positionDisplay, isSelected } = useListNavigation({
    itemCount: rows.length,
    viewportSize: VIEWPORT_SIZE,
  })

  useInput((input, key) => {
    if (key.escape || input === 'b') goBack()
    if (input === 'q') exit()
  })

  if (!data || !aggregate) {
    return <Text color="red">Unknown category: {category}</Text>
  }

  const years = data.years
  const header = (label: string) => (
    <Text bold>
      {label.padEnd(NAME_WIDTH)}
      {years.map((year) => cell(String(year))).join('')}
    </Text>
  )

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box justifyContent="space-between">
        <Text>
          <Text bold color="green">
            {category}
          </Text>
          <Text dimColor> {formatMoney(aggregate.total, currency)} in total</Text>
        </Text>
        <Text dimColor>{positionDisplay}</Text>
      </Box>

      <Box flexDirection="column" marginTop={1}>
        {header('Expenses per year')}
        <Text dimColor>
          {'(all)'.padEnd(NAME_WIDTH)}
          {years.map((year) => cell(formatMoney(aggregate.byYear.get(year) ?? 0, currency))).join('')}
        </Text>
        {rows.slice(visibleRange.start, visibleRange.end).map((row, i) => (
          <Text key={row.name} inverse={isSelected(visibleRange.start + i)}>
            {row.name.slice(0, NAME_WIDTH - 1).padEnd(NAME_WIDTH)}
            {years.map((year) => cell(formatMoney(row.byYear.get(year) ?? 0, currency))).join('')}
          </Text>
        ))}
      </Box>

      <Box flexDirection="column" marginTop={1}>
        {header('Avg. per month')}
        {categoryAverage && (
          <Text dimColor>
            {'(all)'.padEnd(NAME_WIDTH)}
            {years.map((year) => cell(formatMoney(categoryAverage.byYear.get(year) ?? 0, currency))).join('')}
          </Text>
        )}
        {rows.slice(visibleRange.start, visibleRange.end).map((row, i) => (
          <Text key={row.name} inverse={isSelected(visibleRange.start + i)}>
            {row.name.slice(0, NAME_WIDTH - 1).padEnd(NAME_WIDTH)}
            {years.map((year) => cell(formatMoney(row.averageByYear.get(year) ?? 0, currency))).join('')}
          </Text>
        ))}
      </Box>

      <Box marginTop={1} gap={2}>
        <Text>
          <Text color="cyan" bold>j/k</Text> <Text dimColor>move</Text>
        </Text>
        <Text>
          <Text color="cyan" bold>esc/b</Text> <Text dimColor>back</Text>
        </Text>
        <Text>
          <Text color="cyan" bold>q</Text> <Text dimColor>quit</Text>
        </Text>
      </Box>
    </Box>
  )
}
