/**
 * Card Set Types
 */

import { asRecord, booleanField, numberField, optionalStringField, stringField } from './fields'

export interface CardSet {
  readonly id: string
  /** Lower-case set code */
  readonly code: string
  readonly name: string
  /** Catalog set type, e.g. "core", "expansion", "masters" */
  readonly setType: string
  /** ISO date (YYYY-MM-DD) */
  readonly releasedAt?: string | undefined
  readonly block?: string | undefined
  readonly parentSet?: string | undefined
  readonly cardCount: number
  readonly digital: boolean
  readonly foilOnly: boolean
  readonly nonfoilOnly: boolean
}

export type CardSetJson = {
  readonly id: string
  readonly code: string
  readonly name: string
  readonly setType: string
  readonly releasedAt: string | null
  readonly block: string | null
  readonly parentSet: string | null
  readonly cardCount: number
  readonly digital: boolean
  readonly foilOnly: boolean
  readonly nonfoilOnly: boolean
}

export function cardSetToJson(set: CardSet): CardSetJson {
  return {
    id: set.id,
    code: set.code,
    name: set.name,
    setType: set.setType,
    releasedAt: set.releasedAt ?? null,
    block: set.block ?? null,
    parentSet: set.parentSet ?? null,
    cardCount: set.cardCount,
    digital: set.digital,
    foilOnly: set.foilOnly,
    nonfoilOnly: set.nonfoilOnly
  }
}

/**
 * @throws TypeError when the value is not a stored set
 */
export function cardSetFromJson(value: unknown): CardSet {
  const record = asRecord(value, 'set')
  return {
    id: stringField(record, 'id', 'set'),
    code: stringField(record, 'code', 'set'),
    name: stringField(record, 'name', 'set'),
    setType: stringField(record, 'setType', 'set'),
    releasedAt: optionalStringField(record, 'releasedAt', 'set'),
    block: optionalStringField(record, 'block', 'set'),
    parentSet: optionalStringField(record, 'parentSet', 'set'),
    cardCount: numberField(record, 'cardCount', 'set'),
    digital: booleanField(record, 'digital', 'set', false),
    foilOnly: booleanField(record, 'foilOnly', 'set', false),
    nonfoilOnly: booleanField(record, 'nonfoilOnly', 'set', false)
  }
}
