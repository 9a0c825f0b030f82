import type { GlobalOptions } from '../args.js'
import { createFormatter } from '../output.js'
import { getConfigPath, loadConfig } from '../../config/config-service.js'
import { runSetupWizard } from '../../config/setup-wizard.js'

export const initCommand = async (options: GlobalOptions): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const path = options.config ?? getConfigPath()

  // Start from what is stored, not from environment overrides
  const current = await loadConfig(path)
  const config = await runSetupWizard(current ?? undefined, path)

  formatter.success({ success: true, path, config, formatted: `Saved settings to ${path}` })
}
