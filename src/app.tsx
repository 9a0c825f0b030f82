import React, { useEffect, useCallback } from 'react'
import { Box, Text, useApp } from 'ink'
import { useAtomValue, useSetAtom } from 'jotai'
import { Provider } from 'jotai/react'

import { currentScreenAtom, screenParamsAtom, goBackAtom } from './navigation/navigation-atoms.js'
import { reportDataAtom, isLoadingAtom, warningsAtom } from './browse/browse-atoms.js'
import { CategoryList } from './browse/CategoryList.js'
import { CategoryDetail } from './browse/CategoryDetail.js'
import { HelpScreen } from './shared/components/HelpScreen.js'
import { buildReportData } from './reporting/report-data.js'
import { loadTransactions } from './transactions/load-transactions.js'
import type { AppConfig } from './config/config-types.js'

interface AppContentProps {
  config: AppConfig
  inputDir: string
}

const AppContent = ({ config, inputDir }: AppContentProps) => {
  const screen = useAtomValue(currentScreenAtom)
  const screenParams = useAtomValue(screenParamsAtom)
  const goBack = useSetAtom(goBackAtom)

  const setReportData = useSetAtom(reportDataAtom)
  const setIsLoading = useSetAtom(isLoadingAtom)
  const setWarnings = useSetAtom(warningsAtom)
  const isLoading = useAtomValue(isLoadingAtom)
  const { exit } = useApp()

  const loadData = useCallback(async () => {
    setIsLoading(true)

    const warnings: string[] = []
    try {
      // Progress lines would tear the ink frame; only warnings are kept
      const transactions = await loadTransactions(inputDir, {
        progress: () => undefined,
        warn: (message) => warnings.push(message),
      })
      setReportData(buildReportData(transactions))
      setWarnings(warnings)
      setIsLoading(false)
    } catch (err) {
      // Unmounts; the CLI reports the error once ink has restored the terminal
      exit(err instanceof Error ? err : new Error(String(err)))
    }
  }, [inputDir, setReportData, setIsLoading, setWarnings, exit])

  // Initial load
  useEffect(() => {
    void loadData()
  }, [loadData])

  if (isLoading) {
    return <Text dimColor>Reading CSV exports from {inputDir}...</Text>
  }

  // Render current screen
  switch (screen) {
    case 'categories':
      return <CategoryList title={config.report.title} currency={config.report.currency} />

    case 'detail':
      if (!screenParams.category) {
        return <Text color="red">No category selected</Text>
      }
      return <CategoryDetail category={screenParams.category} currency={config.report.currency} />

    case 'help':
      return <HelpScreen onClose={() => goBack()} />
  }
}

interface AppProps {
  config: AppConfig
  inputDir: string
}

export const App = ({ config, inputDir }: AppProps) => (
  <Provider>
    <Box flexDirection="column">
      <AppContent config={config} inputDir={inputDir} />
    </Box>
  </Provider>
)
