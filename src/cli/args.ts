import { Command, InvalidArgumentError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { DEFAULT_EXAMPLE_RANGE } from '../transactions/example-generator.js'

// package.json sits one level above dist/ and two above src/cli/
const getVersion = (): string => {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    try {
      const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(pkgPath, 'utf-8')))
      return pkg.version
    } catch {
      continue
    }
  }
  return '0.0.0'
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  config?: string
}

export interface ReportOptions extends GlobalOptions {
  input?: string
  output?: string
  title?: string
  currency?: string
}

export interface SummaryOptions extends GlobalOptions {
  input?: string
  averages: boolean
  limit?: number
}

export interface GenerateOptions extends GlobalOptions {
  from: string
  to: string
  output?: string
}

export type CommandAction =
  | { command: 'report'; options: ReportOptions }
  | { command: 'summary'; options: SummaryOptions }
  | { command: 'generate'; options: GenerateOptions }
  | { command: 'init'; options: GlobalOptions }
  | { command: 'tui'; forceSetup: boolean; config?: string }

export const parsePositiveInt = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.')
  }
  return parsed
}

export const parseIsoDate = (value: string): string => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value)
  if (match) {
    const [year, month, day] = match.slice(1).map(Number)
    const probe = new Date(Date.UTC(year, month - 1, day))
    if (probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day) return value
  }
  throw new InvalidArgumentError('Expected a date in YYYY-MM-DD format.')
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  // Subcommands copy exitOverride from the program when they are created
  const program = new Command()
    .name('expense-report')
    .description('Aggregate personal finance CSV exports into reports')
    .version(getVersion())
    .exitOverride()
    .enablePositionalOptions()
    .option('--setup', 'Run the setup wizard before opening the browser', false)
    .option('--config <path>', 'Path to config file')
    .action((options: { setup: boolean; config?: string }) => {
      // Default action when no subcommand is provided - run TUI
      result = { command: 'tui', forceSetup: options.setup, config: options.config }
    })

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command, defaultFormat: OutputFormat) => {
    return cmd
      .addOption(
        new Option('-f, --format <format>', 'Output format')
          .choices(['json', 'text'])
          .default(defaultFormat)
      )
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--config <path>', 'Path to config file')
  }

  addGlobalOptions(
    program
      .command('report')
      .description('Write the HTML report for the CSV exports in the input directory')
      .option('-i, --input <dir>', 'Directory holding the *.csv exports')
      .option('-o, --output <dir>', 'Directory the report is written to')
      .option('-t, --title <title>', 'Report title')
      .option('--currency <symbol>', 'Currency symbol appended to amounts'),
    'json'
  ).action((options: ReportOptions) => {
    result = { command: 'report', options }
  })

  addGlobalOptions(
    program
      .command('summary')
      .description('Print expenses per category, subcategory and year')
      .option('-i, --input <dir>', 'Directory holding the *.csv exports')
      .option('--averages', 'Also print average monthly expenses per year', false)
      .option('-l, --limit <number>', 'Number of categories shown in text mode', parsePositiveInt),
    'text'
  ).action((options: SummaryOptions) => {
    result = { command: 'summary', options }
  })

  addGlobalOptions(
    program
      .command('generate')
      .description('Write example transactions as CSV')
      .option('--from <date>', 'First day (YYYY-MM-DD)', parseIsoDate, DEFAULT_EXAMPLE_RANGE.from)
      .option('--to <date>', 'Last day (YYYY-MM-DD)', parseIsoDate, DEFAULT_EXAMPLE_RANGE.to)
      .option('-o, --output <file>', 'CSV file to write (default: stdout)'),
    'json'
  ).action((options: GenerateOptions) => {
    result = { command: 'generate', options }
  })

  addGlobalOptions(
    program.command('init').description('Create or update the config file interactively'),
    'text'
  ).action((options: GlobalOptions) => {
    result = { command: 'init', options }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}
