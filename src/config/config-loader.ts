import { getConfigPath, loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'
import { ConfigError } from '../shared/errors.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  INPUT_DIR: 'EXPENSE_REPORT_INPUT_DIR',
  OUTPUT_DIR: 'EXPENSE_REPORT_OUTPUT_DIR',
  TITLE: 'EXPENSE_REPORT_TITLE',
  CURRENCY: 'EXPENSE_REPORT_CURRENCY',
} as const

export type ConfigSource = 'defaults' | 'file' | 'env' | 'mixed'

export interface LoadConfigResult {
  config: AppConfig
  source: ConfigSource
  path: string
}

type Env = Record<string, string | undefined>

// Empty strings count as unset
const readEnv = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim()
  return value ? value : undefined
}

/**
 * Load config from the config file with environment variables on top.
 * Without a file every setting falls back to its default.
 */
export const loadConfigWithEnv = async (
  options: { path?: string; env?: Env } = {}
): Promise<LoadConfigResult> => {
  const path = options.path ?? getConfigPath()
  const env = options.env ?? process.env
  const fileConfig = await loadConfigFile(path)

  const inputDir = readEnv(env, ENV_VARS.INPUT_DIR)
  const outputDir = readEnv(env, ENV_VARS.OUTPUT_DIR)
  const title = readEnv(env, ENV_VARS.TITLE)
  const currency = readEnv(env, ENV_VARS.CURRENCY)
  const fromEnv = [inputDir, outputDir, title, currency].some((value) => value !== undefined)

  let source: ConfigSource
  if (fromEnv) {
    source = fileConfig ? 'mixed' : 'env'
  } else {
    source = fileConfig ? 'file' : 'defaults'
  }

  const base = fileConfig ?? appConfigSchema.parse({})
  const merged = {
    report: {
      title: title ?? base.report.title,
      currency: currency ?? base.report.currency,
    },
    paths: {
      inputDir: inputDir ?? base.paths.inputDir,
      outputDir: outputDir ?? base.paths.outputDir,
    },
    charts: base.charts,
  }

  const result = appConfigSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError('Invalid configuration from environment', issues)
  }

  return { config: result.data, source, path }
}
