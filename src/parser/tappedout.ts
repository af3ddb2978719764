/**
 * Board List Parser
 *
 * Reads the tappedout.net board export format, one card per line:
 *
 * ```
 * 4x Llanowar Elves (M19:314)
 * 1x Fire // Ice (MH2) *F*
 * 2x Alpine Watchdog (M21:2) *F* *SL*
 * ```
 *
 * Count (the `x` is optional), name (HTML entities allowed), set code with an
 * optional collector number, then any flags: `*F*` for foil and a condition
 * symbol (`*SL*`, `*ME*`, `*HE*`).
 */

import { decode } from 'html-entities'
import { type Condition, conditionFromSymbol, conditionSymbol } from '../types/card'

export interface ListEntry {
  readonly count: number
  readonly name: string
  /** Lower-case set code */
  readonly set: string
  /** Absent when the line gives only the set */
  readonly number?: string | undefined
  readonly foil: boolean
  readonly condition: Condition
}

export type ParseLineResult =
  | { readonly ok: true; readonly value: ListEntry }
  | { readonly ok: false; readonly error: string }

export interface SkippedLine {
  /** 1-based line number */
  readonly line: number
  readonly text: string
  readonly reason: string
}

export interface ParsedList {
  readonly entries: readonly ListEntry[]
  readonly skipped: readonly SkippedLine[]
}

const COUNT_PATTERN = /^(\d+)x?$/i
const CARD_ID_PATTERN = /^(.*\S)\s+\(([^():\s]+)(?::([^()\s]+))?\)$/
const FLAG_PATTERN = /^\*[^*\s]+\*$/

/**
 * Parse a single board line.
 */
export function parseListLine(line: string): ParseLineResult {
  const trimmed = line.trim()
  const space = trimmed.indexOf(' ')
  if (space < 0) {
    return { ok: false, error: 'expected a count followed by a card' }
  }

  const countMatch = COUNT_PATTERN.exec(trimmed.slice(0, space))
  const count = countMatch?.[1] ? Number.parseInt(countMatch[1], 10) : Number.NaN
  if (!Number.isInteger(count) || count < 1) {
    return { ok: false, error: `invalid count '${trimmed.slice(0, space)}'` }
  }

  const tokens = trimmed.slice(space + 1).trim().split(/\s+/)
  let foil = false
  let condition: Condition = 'mint'
  let last = tokens[tokens.length - 1]
  while (last !== undefined && FLAG_PATTERN.test(last)) {
    if (last.toUpperCase() === '*F*') {
      foil = true
    } else {
      condition = conditionFromSymbol(last)
    }
    tokens.pop()
    last = tokens[tokens.length - 1]
  }

  const idMatch = CARD_ID_PATTERN.exec(tokens.join(' '))
  const [, rawName, set, number] = idMatch ?? []
  if (rawName === undefined || set === undefined) {
    return { ok: false, error: 'expected a card name followed by (SET) or (SET:NUMBER)' }
  }

  return {
    ok: true,
    value: { count, name: decode(rawName), set: set.toLowerCase(), number, foil, condition }
  }
}

/**
 * Render an entry back to a board line.
 */
export function toListLine(entry: ListEntry): string {
  const setId = entry.number ? `${entry.set.toUpperCase()}:${entry.number}` : entry.set.toUpperCase()
  let line = `${entry.count}x ${entry.name} (${setId})`
  if (entry.foil) {
    line += ' *F*'
  }
  if (entry.condition !== 'mint') {
    line += ` *${conditionSymbol(entry.condition)}*`
  }
  return line
}

/**
 * Parse a whole board list. Blank lines are ignored; lines that do not parse
 * are collected in `skipped` rather than failing the list.
 */
export function parseList(text: string): ParsedList {
  const entries: ListEntry[] = []
  const skipped: SkippedLine[] = []

  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === '') return
    const result = parseListLine(line)
    if (result.ok) {
      entries.push(result.value)
    } else {
      skipped.push({ line: i + 1, text: line, reason: result.error })
    }
  })

  return { entries, skipped }
}
