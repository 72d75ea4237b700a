/**
 * Replay session
 * Feeds a recorded event stream through a fresh engine
 */

import { createGrowspaceConfig } from '@boot/config'
import { initialize } from '@boot/init'

import { parseEventLine } from './events'

import type { GrowthStage } from '$types/common'
import type { InputEvent, OutputEvent } from '@events'
import type { ConsoleAPI, LogLevel, TimerAPI } from '@logging'

export interface ReplayOptions {
  /** Growspaces to register; empty registers every id found in the stream */
  growspaces: string[]
  stage: GrowthStage
  lightBound: boolean
  logLevel: LogLevel
  consoleApi?: ConsoleAPI
  timerApi?: TimerAPI
}

export interface ReplaySummary {
  growspaces: string[]
  dispatched: number
  dropped: number
  verdicts: number
  lightReports: number
  errors: { lineNumber: number; message: string }[]
}

/**
 * Replay event lines and report every output event
 * @returns Summary, or null when the engine could not start
 */
export function runReplay(
  lines: string[],
  options: ReplayOptions,
  onOutput: (event: OutputEvent) => void
): ReplaySummary | null {
  const events: InputEvent[] = []
  const errors: ReplaySummary['errors'] = []

  lines.forEach((line, i) => {
    const result = parseEventLine(line, i + 1)
    if (result.kind === 'event') {
      events.push(result.event)
    } else if (result.kind === 'error') {
      errors.push({ lineNumber: result.lineNumber, message: result.message })
    }
  })

  let ids = options.growspaces
  if (ids.length === 0) {
    ids = []
    for (const event of events) {
      if (ids.indexOf(event.growspaceId) === -1) ids.push(event.growspaceId)
    }
  }

  const configs = ids.map((id) => createGrowspaceConfig(id, {
    initialStage: options.stage,
    sensors: { light: options.lightBound },
  }))

  const engine = initialize(configs, {
    logLevel: options.logLevel,
    consoleApi: options.consoleApi,
    timerApi: options.timerApi,
  })
  if (engine === null) {
    return null
  }

  const summary: ReplaySummary = {
    growspaces: engine.registry.ids(),
    dispatched: 0,
    dropped: 0,
    verdicts: 0,
    lightReports: 0,
    errors,
  }

  engine.registry.on((event) => {
    if (event.type === 'verdict') {
      summary.verdicts++
    } else {
      summary.lightReports++
    }
    onOutput(event)
  })

  let last: number | null = null
  for (const event of events) {
    if (engine.registry.dispatch(event)) {
      summary.dispatched++
    } else {
      summary.dropped++
    }
    last = last === null ? event.timestamp : Math.max(last, event.timestamp)
  }

  // Final pass so staleness and closed light windows show up
  if (last !== null) {
    engine.registry.tick(last)
  }

  engine.dispose()
  return summary
}
