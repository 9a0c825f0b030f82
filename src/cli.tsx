#!/usr/bin/env node
import React from 'react'
import { resolve } from 'node:path'
import { render } from 'ink'
import { CommanderError } from 'commander'
import { App } from './app.js'
import { runSetupWizard } from './config/setup-wizard.js'
import { getConfigPath, loadConfig } from './config/config-service.js'
import { loadConfigWithEnv } from './config/config-loader.js'
import { parseArgs, type CommandAction } from './cli/args.js'
import { reportCommand, summaryCommand, generateCommand, initCommand } from './cli/commands/index.js'
import { createFormatter, reportFailure } from './cli/output.js'

const runTuiMode = async (forceSetup: boolean, configPath?: string) => {
  const path = configPath ?? getConfigPath()

  // First run, or asked for: let the user review the settings
  if (forceSetup || !(await loadConfig(path))) {
    await runSetupWizard(undefined, path)
  }

  const { config } = await loadConfigWithEnv({ path })
  const instance = render(<App config={config} inputDir={resolve(config.paths.inputDir)} />)
  await instance.waitUntilExit()
}

const runCliCommand = async (action: CommandAction) => {
  switch (action.command) {
    case 'tui':
      await runTuiMode(action.forceSetup, action.config)
      break
    case 'report':
      await reportCommand(action.options)
      break
    case 'summary':
      await summaryCommand(action.options)
      break
    case 'generate':
      await generateCommand(action.options)
      break
    case 'init':
      await initCommand(action.options)
      break
  }
}

const main = async () => {
  let action: CommandAction | null = null
  try {
    // Parse command line arguments
    action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    // Commander has already printed its own message
    if (error instanceof CommanderError) {
      process.exit(error.exitCode)
    }
    const formatter =
      action && action.command !== 'tui'
        ? createFormatter(action.options.format, action.options.quiet)
        : createFormatter('text', false)
    reportFailure(formatter, error)
  }
}

void main()
