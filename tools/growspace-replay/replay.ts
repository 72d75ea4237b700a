#!/usr/bin/env node
/**
 * Growspace Event Replay
 * Runs a recorded JSON-lines event stream through the inference engine
 */

import * as fs from 'fs'
import * as path from 'path'

import chalk from 'chalk'
import { program } from 'commander'

import { ReplayConfigManager, toStage } from './config'
import { formatOutputEvent, formatSummary } from './format'
import { runReplay } from './session'

interface CliOptions {
  file?: string
  growspace?: string[]
  stage?: string
  lightBound?: boolean
  debug?: boolean
  env: string
}

// Parse command line arguments
program
  .name('growspace-replay')
  .description('Replay recorded growspace events and print verdict changes')
  .option('-f, --file <path>', 'JSON-lines event file (defaults to GROWSPACE_EVENTS_FILE)')
  .option('-g, --growspace <id...>', 'Growspaces to register (defaults to every id in the file)')
  .option('-s, --stage <stage>', 'Initial growth stage (defaults to GROWSPACE_STAGE or veg)')
  .option('--light-bound', 'Treat light events as coming from a bound light sensor')
  .option('--debug', 'Show engine debug logs')
  .option('--env <path>', '.env file with defaults', '.env')
  .parse(process.argv)

const options = program.opts<CliOptions>()

function fail(message: string): never {
  console.error(chalk.red(message))
  process.exit(1)
}

function main(): void {
  ReplayConfigManager.loadEnvFile(path.resolve(options.env))
  const manager = new ReplayConfigManager()

  const configErrors = manager.getErrors()
  if (configErrors.length > 0) {
    console.error('Configuration errors:')
    configErrors.forEach((error) => console.error(`  - ${error}`))
    process.exit(1)
  }
  const config = manager.get()

  const file = options.file ?? config.eventsFile
  if (file === undefined) {
    fail('No event file given (use --file or GROWSPACE_EVENTS_FILE)')
  }

  const stage = options.stage === undefined ? config.stage : toStage(options.stage)
  if (stage === null) {
    fail(`Unknown stage "${options.stage}"`)
  }

  let content: string
  try {
    content = fs.readFileSync(file, 'utf-8')
  } catch (error) {
    fail(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`)
  }

  const summary = runReplay(
    content.split('\n'),
    {
      growspaces: options.growspace ?? config.growspaces,
      stage,
      lightBound: options.lightBound === true || config.lightBound,
      logLevel: options.debug ? 0 : config.logLevel,
    },
    (event) => console.log(formatOutputEvent(event))
  )

  if (summary === null) {
    fail('No growspace to replay')
  }

  formatSummary(summary).forEach((line) => console.log(line))
  process.exitCode = summary.errors.length > 0 ? 1 : 0
}

main()
