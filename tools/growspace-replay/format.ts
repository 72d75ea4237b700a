/**
 * Console formatting for replay output
 */

import chalk from 'chalk'

import { fmtProbability } from '@logging'

import type { LightScheduleEvent, OutputEvent, VerdictUpdateEvent } from '@events'
import type { ReplaySummary } from './session'

export function formatTime(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().replace('T', ' ').slice(0, 19)
}

function formatVerdict(event: VerdictUpdateEvent): string {
  let state: string
  if (event.value === 'unknown') {
    state = chalk.gray('UNKNOWN')
  } else if (event.value) {
    state = chalk.yellow.bold('ON')
  } else {
    state = chalk.green('OFF')
  }

  let line = `${chalk.gray(formatTime(event.timestamp))} ${chalk.cyan(event.growspaceId)} ${event.condition.padEnd(8)} ${state} p=${fmtProbability(event.probability)}`
  if (event.contributingVariables.length > 0) {
    line += ` [${event.contributingVariables.join(', ')}]`
  }
  if (event.lowConfidence) {
    line += chalk.yellow(' low-confidence')
  }
  if (event.stale) {
    line += chalk.gray(' stale')
  }
  return line
}

function formatLight(event: LightScheduleEvent): string {
  let status: string
  switch (event.status) {
    case 'correct':
      status = chalk.green('CORRECT')
      break
    case 'incorrect':
      status = chalk.red.bold('INCORRECT')
      break
    default:
      status = chalk.gray('UNKNOWN')
  }

  const observed = event.observedOnSec === null ? 'n/a' : `${event.observedOnSec}s`
  return `${chalk.gray(formatTime(event.timestamp))} ${chalk.cyan(event.growspaceId)} ${'light'.padEnd(8)} ${status} ${observed} on, expected ${event.expectedOnSec}s`
}

export function formatOutputEvent(event: OutputEvent): string {
  return event.type === 'verdict' ? formatVerdict(event) : formatLight(event)
}

export function formatSummary(summary: ReplaySummary): string[] {
  const lines = [
    chalk.cyan('═'.repeat(60)),
    chalk.cyan.bold('Replay Summary'),
    chalk.cyan('═'.repeat(60)),
    `Growspaces:     ${summary.growspaces.join(', ')}`,
    `Events:         ${summary.dispatched} dispatched, ${summary.dropped} dropped`,
    `Verdicts:       ${summary.verdicts}`,
    `Light reports:  ${summary.lightReports}`,
  ]

  if (summary.errors.length > 0) {
    lines.push(chalk.red(`Parse errors:   ${summary.errors.length}`))
    summary.errors.forEach((err) => {
      lines.push(chalk.red(`  ✗ line ${err.lineNumber}: ${err.message}`))
    })
  } else {
    lines.push(chalk.green('✓ No parse errors'))
  }
  return lines
}
