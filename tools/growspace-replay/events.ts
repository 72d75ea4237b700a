/**
 * Event file parsing
 * One JSON input event per line; blank lines and # comments are skipped
 */

import { parseInputEvent } from '@events'

import type { InputEvent } from '@events'

export type LineResult =
  | { kind: 'event'; event: InputEvent }
  | { kind: 'skip' }
  | { kind: 'error'; lineNumber: number; message: string }

export function parseEventLine(line: string, lineNumber: number): LineResult {
  const text = line.trim()
  if (text === '' || text.startsWith('#')) {
    return { kind: 'skip' }
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return { kind: 'error', lineNumber, message: `invalid JSON (${reason})` }
  }

  const parsed = parseInputEvent(raw)
  if (!parsed.ok) {
    return { kind: 'error', lineNumber, message: parsed.error }
  }
  return { kind: 'event', event: parsed.event }
}
