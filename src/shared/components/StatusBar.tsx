import React from 'react'
import { Box, Text } from 'ink'

interface KeyHint {
  key: string
  label: string
}

interface StatusBarProps {
  title: string
  /** e.g. "2021-03-01 → 2023-02-28" */
  rangeLabel: string
  transactionCount: number
  warningCount: number
  position?: string
  hints: KeyHint[]
}

export const StatusBar = ({
  title,
  rangeLabel,
  transactionCount,
  warningCount,
  position,
  hints,
}: StatusBarProps) => (
  <Box flexDirection="column">
    <Box borderStyle="single" borderColor="gray" paddingX={1} justifyContent="space-between">
      <Text>
        <Text bold color="green">
          {title}
        </Text>
        <Text dimColor> {rangeLabel}</Text>
      </Text>
      <Box gap={2}>
        {position && <Text dimColor>{position}</Text>}
        {warningCount > 0 && <Text color="yellow">{warningCount} duplicates removed</Text>}
        <Text dimColor>{transactionCount} transactions</Text>
      </Box>
    </Box>
    <Box gap={2} flexWrap="wrap">
      {hints.map(({ key, label }) => (
        <Box key={key} gap={1}>
          <Text color="cyan" bold>
            {key}
          </Text>
          <Text dimColor>{label}</Text>
        </Box>
      ))}
    </Box>
  </Box>
)
