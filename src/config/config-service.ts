import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, type AppConfig } from './config-types.js'
import { ConfigError } from '../shared/errors.js'

const CONFIG_DIR = join(homedir(), '.config', 'expense-report')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Reads and validates the config file. Returns null when there is no file;
 * a file that exists but does not parse is an error.
 */
export const loadConfig = async (path: string = CONFIG_FILE): Promise<AppConfig | null> => {
  if (!existsSync(path)) return null

  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`${path} is not valid JSON: ${reason}`)
  }

  const result = appConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`${path} is not a valid config file`, issues)
  }
  return result.data
}

export const saveConfig = async (config: AppConfig, path: string = CONFIG_FILE): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(config, null, 2))
}
