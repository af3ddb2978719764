/**
 * Catalog Response Parsing
 *
 * Converts catalog service payloads (Scryfall card, set, list and catalog
 * objects) into domain shapes. Only the fields the app uses are read.
 */

import type { Card, Face } from '../types/card'
import type { CardSet } from '../types/card-set'
import {
  arrayField,
  asRecord,
  booleanField,
  type JsonRecord,
  numberField,
  optionalStringField,
  stringArrayField,
  stringField
} from '../types/fields'

/** Layouts whose faces are listed under `card_faces` */
const MULTI_FACE_LAYOUTS = new Set(['split', 'flip', 'transform', 'double_faced_token', 'modal_dfc'])

function parseFace(record: JsonRecord): Face {
  return {
    name: stringField(record, 'name', 'face'),
    type: optionalStringField(record, 'type_line', 'face') ?? '',
    cost: optionalStringField(record, 'mana_cost', 'face') ?? '',
    text: optionalStringField(record, 'oracle_text', 'face') ?? '',
    power: optionalStringField(record, 'power', 'face'),
    toughness: optionalStringField(record, 'toughness', 'face')
  }
}

/**
 * @throws TypeError when the payload is not a card object
 */
export function parseCardResponse(body: unknown): Card {
  const record = asRecord(body, 'card response')
  const layout = (optionalStringField(record, 'layout', 'card') ?? 'normal').toLowerCase()
  const faces =
    MULTI_FACE_LAYOUTS.has(layout) && Array.isArray(record['card_faces'])
      ? arrayField(record, 'card_faces', 'card').map((face) => parseFace(asRecord(face, 'card face')))
      : [parseFace(record)]

  return {
    id: stringField(record, 'id', 'card'),
    set: stringField(record, 'set', 'card').toLowerCase(),
    number: stringField(record, 'collector_number', 'card'),
    lang: optionalStringField(record, 'lang', 'card') ?? 'en',
    rarity: stringField(record, 'rarity', 'card'),
    faces
  }
}

/**
 * @throws TypeError when the payload is not a list of cards
 */
export function parseCardListResponse(body: unknown): Card[] {
  const record = asRecord(body, 'card list response')
  return arrayField(record, 'data', 'card list').map(parseCardResponse)
}

/**
 * @throws TypeError when the payload is not a set object
 */
export function parseSetResponse(body: unknown): CardSet {
  const record = asRecord(body, 'set response')
  return {
    id: stringField(record, 'id', 'set'),
    code: stringField(record, 'code', 'set').toLowerCase(),
    name: stringField(record, 'name', 'set'),
    setType: stringField(record, 'set_type', 'set'),
    releasedAt: optionalStringField(record, 'released_at', 'set'),
    block: optionalStringField(record, 'block', 'set'),
    parentSet: optionalStringField(record, 'parent_set_code', 'set'),
    cardCount: numberField(record, 'card_count', 'set'),
    digital: booleanField(record, 'digital', 'set', false),
    foilOnly: booleanField(record, 'foil_only', 'set', false),
    nonfoilOnly: booleanField(record, 'nonfoil_only', 'set', false)
  }
}

/**
 * @throws TypeError when the payload is not a catalog object
 */
export function parseCatalogResponse(body: unknown): string[] {
  return stringArrayField(asRecord(body, 'catalog response'), 'data', 'catalog')
}

/**
 * Search query for a name and optional set. Exact names are quoted and
 * prefixed with `!`.
 */
export function buildSearchQuery(options: {
  readonly name?: string | undefined
  readonly exact?: boolean | undefined
  readonly set?: string | undefined
}): string {
  const parts: string[] = []
  if (options.name !== undefined) {
    parts.push(
      options.exact ? `!"${options.name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"` : options.name
    )
  }
  if (options.set !== undefined) {
    parts.push(`set:${options.set.toLowerCase()}`)
  }
  return parts.join(' ')
}
