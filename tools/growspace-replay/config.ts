/**
 * Configuration Management
 * Reads replay defaults from the environment and an optional .env file
 */

import * as fs from 'fs'

import * as dotenv from 'dotenv'

import { GROWTH_STAGES } from '@utils/constants'

import type { GrowthStage } from '$types/common'
import type { LogLevel } from '@logging'

const LOG_LEVELS: readonly LogLevel[] = [0, 1, 2, 3]

export interface ReplayConfig {
  // Input
  eventsFile?: string
  growspaces: string[]

  // Engine settings
  stage: GrowthStage
  lightBound: boolean
  logLevel: LogLevel
}

function toLogLevel(value: number): LogLevel | null {
  return LOG_LEVELS.find((l) => l === value) ?? null
}

function toStage(value: string): GrowthStage | null {
  return GROWTH_STAGES.find((s) => s === value) ?? null
}

class ReplayConfigManager {
  private config: ReplayConfig
  private errors: string[] = []

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(env)
  }

  /**
   * Merge a .env file into the environment (existing variables win)
   * @returns False when the file does not exist
   */
  static loadEnvFile(envPath: string): boolean {
    if (!fs.existsSync(envPath)) {
      return false
    }
    dotenv.config({ path: envPath })
    return true
  }

  private loadConfig(env: NodeJS.ProcessEnv): ReplayConfig {
    return {
      eventsFile: env.GROWSPACE_EVENTS_FILE || undefined,
      growspaces: (env.GROWSPACE_IDS || '').split(',').map((s) => s.trim()).filter((s) => s !== ''),
      stage: this.loadStage(env.GROWSPACE_STAGE),
      lightBound: env.GROWSPACE_LIGHT_BOUND === 'true',
      logLevel: this.loadLogLevel(env.GROWSPACE_LOG_LEVEL),
    }
  }

  private loadStage(raw: string | undefined): GrowthStage {
    if (raw === undefined || raw === '') return 'veg'
    const stage = toStage(raw)
    if (stage === null) {
      this.errors.push(`GROWSPACE_STAGE must be one of ${GROWTH_STAGES.join(', ')} (got ${raw})`)
      return 'veg'
    }
    return stage
  }

  private loadLogLevel(raw: string | undefined): LogLevel {
    if (raw === undefined || raw === '') return 1
    const level = toLogLevel(Number(raw))
    if (level === null) {
      this.errors.push(`GROWSPACE_LOG_LEVEL must be 0-3 (got ${raw})`)
      return 1
    }
    return level
  }

  getErrors(): string[] {
    return [...this.errors]
  }

  get(): ReplayConfig {
    return { ...this.config, growspaces: [...this.config.growspaces] }
  }
}

export { ReplayConfigManager, toStage }
