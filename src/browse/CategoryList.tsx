import React, { useState } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { useAtom, useAtomValue, useSetAtom } from 'jotai'
import { categoryFilterAtom, categoryRowsAtom, reportDataAtom, warningsAtom } from './browse-atoms.js'
import { navigateAtom } from '../navigation/navigation-atoms.js'
import { useListNavigation } from '../shared/hooks/useListNavigation.js'
import { StatusBar } from '../shared/components/StatusBar.js'
import { SpendingSummary } from '../shared/components/SpendingSummary.js'
import { formatMoney } from '../shared/format.js'

interface CategoryListProps {
  title: string
  currency: string
}

const VIEWPORT_SIZE = 15
const NAME_WIDTH = 24
const AMOUNT_WIDTH = 14

const cell = (text: string) => text.padStart(AMOUNT_WIDTH)

export const CategoryList = ({ title, currency }: CategoryListProps) => {
  const { exit } = useApp()
  const data = useAtomValue(reportDataAtom)
  const rows = useAtomValue(categoryRowsAtom)
  const warnings = useAtomValue(warningsAtom)
  const [filter, setFilter] = useAtom(categoryFilterAtom)
  const navigate = useSetAtom(navigateAtom)
  const [isFiltering, setIsFiltering] = useState(false)

  const { visibleRange, positionDisplay, isSelected } = useListNavigation({
    itemCount: rows.length,
    viewportSize: VIEWPORT_SIZE,
    enabled: !isFiltering,
    onOpen: (index) => {
      const row = rows[index]
      if (row) navigate('detail', { category: row.name })
    },
  })

  useInput(
    (input, key) => {
      if (isFiltering) {
        if (key.escape) {
          setFilter('')
          setIsFiltering(false)
        }
        return
      }

      if (input === 'q') exit()
      if (input === '/') setIsFiltering(true)
      if (input === '?') navigate('help')
      if (key.escape && filter) setFilter('')
    }
  )

  if (!data) return null

  return (
    <Box flexDirection="column">
      <StatusBar
        title={title}
        rangeLabel={`${data.range.min} → ${data.range.max}`}
        transactionCount={data.transactionCount}
        warningCount={warnings.length}
        position={positionDisplay}
        hints={[
          { key: 'j/k', label: 'move' },
          { key: 'enter', label: 'details' },
          { key: '/', label: 'filter' },
          { key: '?', label: 'help' },
          { key: 'q', label: 'quit' },
        ]}
      />
      <SpendingSummary overview={data.overview} currency={currency} />

      {(isFiltering || filter) && (
        <Box paddingX={1} gap={1}>
          <Text color="cyan">/</Text>
          {isFiltering ? (
            <TextInput value={filter} onChange={setFilter} onSubmit={() => setIsFiltering(false)} />
          ) : (
            <Text>{filter}</Text>
          )}
        </Box>
      )}

      <Box flexDirection="column" paddingX={1} marginTop={1}>
        <Text bold>
          {'Category'.padEnd(NAME_WIDTH)}
          {cell('Total')}
          {data.years.map((year) => cell(String(year))).join('')}
          {cell('Avg/month')}
        </Text>
        {rows.length === 0 && <Text dimColor>No category matches "{filter}"</Text>}
        {rows.slice(visibleRange.start, visibleRange.end).map((row, i) => {
          const selected = isSelected(visibleRange.start + i)
          return (
            <Text key={row.name} inverse={selected}>
              {row.name.slice(0, NAME_WIDTH - 1).padEnd(NAME_WIDTH)}
              {cell(formatMoney(row.total, currency))}
              {data.years.map((year) => cell(formatMoney(row.byYear.get(year) ?? 0, currency))).join('')}
              {cell(row.monthlyAverage === null ? '-' : formatMoney(row.monthlyAverage, currency))}
            </Text>
          )
        })}
      </Box>
    </Box>
  )
}
