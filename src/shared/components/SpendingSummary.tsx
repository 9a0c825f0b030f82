import React from 'react'
import { Box, Text } from 'ink'
import type { MonthlyOverview } from '../../reporting/report-data.js'
import { bucketTotal } from '../../reporting/zero-fill.js'
import { formatMoney } from '../format.js'

interface SpendingSummaryProps {
  overview: MonthlyOverview
  currency: string
}

/**
 * One-line totals over the whole timeline.
 */
export const SpendingSummary = ({ overview, currency }: SpendingSummaryProps) => {
  const spent = bucketTotal(overview.expenses)
  const income = bucketTotal(overview.income)
  const balance = income - spent
  const average = overview.balancePercentageAverage

  return (
    <Box paddingX={1} gap={3}>
      <Box gap={1}>
        <Text dimColor>Spent:</Text>
        <Text color="red" bold>
          {formatMoney(spent, currency)}
        </Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Income:</Text>
        <Text color="green" bold>
          {formatMoney(income, currency)}
        </Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Balance:</Text>
        <Text color={balance > 0 ? 'green' : 'red'} bold>
          {formatMoney(balance, currency)}
        </Text>
      </Box>

      {average !== null && (
        <Box gap={1}>
          <Text dimColor>Avg. saved:</Text>
          <Text color="yellow">{average.toFixed(2)}%</Text>
        </Box>
      )}
    </Box>
  )
}
