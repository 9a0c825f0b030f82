import type { GlobalOptions } from '../args.js'
import type { OutputFormatter } from '../output.js'
import type { AppConfig } from '../../config/config-types.js'
import { loadConfigWithEnv } from '../../config/config-loader.js'

const SOURCE_LABELS = {
  defaults: 'built-in defaults',
  file: 'config file',
  env: 'environment',
  mixed: 'config file and environment',
} as const

/**
 * Loads settings for a subcommand, honouring `--config`.
 */
export const loadCommandConfig = async (
  options: GlobalOptions,
  formatter: OutputFormatter
): Promise<AppConfig> => {
  const { config, source, path } = await loadConfigWithEnv({ path: options.config })
  formatter.progress(
    source === 'defaults'
      ? `No config at ${path}, using ${SOURCE_LABELS.defaults}`
      : `Settings from ${SOURCE_LABELS[source]} (${path})`
  )
  return config
}
