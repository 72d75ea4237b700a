import { parseEventLine } from './events'

describe('parseEventLine', () => {
  it('should skip blank lines and comments', () => {
    expect(parseEventLine('', 1)).toEqual({ kind: 'skip' })
    expect(parseEventLine('   ', 2)).toEqual({ kind: 'skip' })
    expect(parseEventLine('# lights on at 06:00', 3)).toEqual({ kind: 'skip' })
  })

  it('should parse a light change', () => {
    const result = parseEventLine('{"type":"light_change","growspaceId":"tent-a","on":true,"timestamp":1710050400}', 1)

    expect(result).toEqual({
      kind: 'event',
      event: { type: 'light_change', growspaceId: 'tent-a', on: true, timestamp: 1710050400 },
    })
  })

  it('should report malformed JSON with its line number', () => {
    const result = parseEventLine('{"type":', 7)

    expect(result.kind).toBe('error')
    if (result.kind === 'error') {
      expect(result.lineNumber).toBe(7)
      expect(result.message.startsWith('invalid JSON (')).toBe(true)
    }
  })

  it('should report events that fail validation', () => {
    const result = parseEventLine('{"type":"stage_change","growspaceId":"tent-a","stage":"bloom","timestamp":1710050400}', 4)

    expect(result).toEqual({ kind: 'error', lineNumber: 4, message: 'unknown stage "bloom"' })
  })

  it('should reject a JSON array', () => {
    expect(parseEventLine('[1, 2]', 2)).toEqual({ kind: 'error', lineNumber: 2, message: 'event must be an object' })
  })
})
