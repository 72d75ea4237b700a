import { ReplayConfigManager, toStage } from './config'

describe('ReplayConfigManager', () => {
  it('should fall back to defaults', () => {
    const manager = new ReplayConfigManager({})

    expect(manager.get()).toEqual({
      eventsFile: undefined,
      growspaces: [],
      stage: 'veg',
      lightBound: false,
      logLevel: 1,
    })
    expect(manager.getErrors()).toEqual([])
  })

  it('should read settings from the environment', () => {
    const manager = new ReplayConfigManager({
      GROWSPACE_EVENTS_FILE: 'events.jsonl',
      GROWSPACE_IDS: 'tent-a, tent-b,',
      GROWSPACE_STAGE: 'flower',
      GROWSPACE_LIGHT_BOUND: 'true',
      GROWSPACE_LOG_LEVEL: '0',
    })

    expect(manager.get()).toEqual({
      eventsFile: 'events.jsonl',
      growspaces: ['tent-a', 'tent-b'],
      stage: 'flower',
      lightBound: true,
      logLevel: 0,
    })
  })

  it('should report invalid values', () => {
    const manager = new ReplayConfigManager({ GROWSPACE_STAGE: 'bloom', GROWSPACE_LOG_LEVEL: '7' })

    expect(manager.getErrors()).toEqual([
      'GROWSPACE_STAGE must be one of seedling, clone, mother, veg, flower, dry, cure (got bloom)',
      'GROWSPACE_LOG_LEVEL must be 0-3 (got 7)',
    ])
    expect(manager.get().stage).toBe('veg')
  })

  it('should skip a missing .env file', () => {
    expect(ReplayConfigManager.loadEnvFile('/nonexistent/growspace.env')).toBe(false)
  })
})

describe('toStage', () => {
  it('should accept known stages only', () => {
    expect(toStage('dry')).toBe('dry')
    expect(toStage('Flower')).toBeNull()
  })
})
