import * as p from '@clack/prompts'
import { CHART_THEMES, appConfigSchema, type AppConfig } from './config-types.js'
import { getConfigPath, saveConfig } from './config-service.js'

const required = (label: string) => (value: string | undefined) => {
  if (!value || !value.trim()) return `${label} is required`
}

const cancelSetup = (): never => {
  p.cancel('Setup cancelled')
  process.exit(0)
}

/**
 * Interactive setup wizard. Asks for the report settings, starting from the
 * current values, and saves the result.
 */
export const runSetupWizard = async (
  current: AppConfig = appConfigSchema.parse({}),
  path: string = getConfigPath()
): Promise<AppConfig> => {
  p.intro('expense-report setup')

  const title = await p.text({
    message: 'Report title',
    initialValue: current.report.title,
    validate: required('Title'),
  })
  if (p.isCancel(title)) return cancelSetup()

  const currency = await p.text({
    message: 'Currency symbol appended to amounts',
    initialValue: current.report.currency,
    validate: required('Currency'),
  })
  if (p.isCancel(currency)) return cancelSetup()

  const inputDir = await p.text({
    message: 'Directory holding the exported *.csv files',
    initialValue: current.paths.inputDir,
    validate: required('Input directory'),
  })
  if (p.isCancel(inputDir)) return cancelSetup()

  const outputDir = await p.text({
    message: 'Directory the HTML report is written to',
    initialValue: current.paths.outputDir,
    validate: required('Output directory'),
  })
  if (p.isCancel(outputDir)) return cancelSetup()

  const theme = await p.select({
    message: 'Chart theme',
    initialValue: current.charts.theme,
    options: CHART_THEMES.map((t) => ({ value: t.value, label: t.label, hint: t.description })),
  })
  if (p.isCancel(theme)) return cancelSetup()

  const config = appConfigSchema.parse({
    report: { title: title.trim(), currency: currency.trim() },
    paths: { inputDir: inputDir.trim(), outputDir: outputDir.trim() },
    charts: { ...current.charts, theme },
  })

  const confirmed = await p.confirm({
    message: `Save settings to ${path}?`,
    initialValue: true,
  })
  if (p.isCancel(confirmed) || !confirmed) return cancelSetup()

  await saveConfig(config, path)
  p.outro('Setup complete!')

  return config
}
