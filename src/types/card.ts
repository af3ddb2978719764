/**
 * Card Types
 *
 * A printed card is identified by (set, collector number, language). The
 * catalog ID is kept as a secondary key.
 */

import {
  arrayField,
  asRecord,
  booleanField,
  type JsonRecord,
  numberField,
  optionalStringField,
  stringField
} from './fields'

export interface Face {
  readonly name: string
  readonly type: string
  readonly cost: string
  readonly text: string
  readonly power?: string | undefined
  readonly toughness?: string | undefined
}

export interface Card {
  /** Catalog ID */
  readonly id: string
  /** Lower-case set code */
  readonly set: string
  /** Collector number; not always numeric (e.g. "12a", "★5") */
  readonly number: string
  readonly lang: string
  readonly rarity: string
  readonly faces: readonly Face[]
}

export const CONDITIONS = {
  mint: { label: 'Mint/Near Mint', symbol: '' },
  'slightly-used': { label: 'Slightly Used', symbol: 'SL' },
  'medium-used': { label: 'Medium Used', symbol: 'ME' },
  'heavy-used': { label: 'Heavy Used', symbol: 'HE' }
} as const satisfies Record<string, { readonly label: string; readonly symbol: string }>

export type Condition = keyof typeof CONDITIONS

/**
 * A card as held in a collection.
 */
export interface OwnedCard extends Card {
  readonly count: number
  readonly foil: boolean
  readonly condition: Condition
}

function isCondition(value: string): value is Condition {
  return Object.hasOwn(CONDITIONS, value)
}

/**
 * Condition for a list-format symbol such as `*SL*`. Unknown symbols are mint.
 */
export function conditionFromSymbol(symbol: string): Condition {
  const bare = symbol.replace(/^\*+|\*+$/g, '').toUpperCase()
  for (const [condition, info] of Object.entries(CONDITIONS)) {
    if (bare !== '' && info.symbol === bare && isCondition(condition)) {
      return condition
    }
  }
  return 'mint'
}

export function conditionSymbol(condition: Condition): string {
  return CONDITIONS[condition].symbol
}

/**
 * Full name, with the faces of multi-faced cards joined by ` // `.
 */
export function cardName(card: Card): string {
  return card.faces.map((face) => face.name).join(' // ')
}

/**
 * Key under which copies of the same printing, finish and condition merge.
 */
export function variantKey(card: OwnedCard): string {
  return [card.set, card.number, card.lang, card.foil ? 'foil' : 'nonfoil', card.condition].join(':')
}

/**
 * Collector number without padding, or NaN when it is not purely numeric.
 */
function numericPart(number: string): number {
  return /^\d+$/.test(number) ? Number.parseInt(number, 10) : Number.NaN
}

/**
 * Binder order: set, then collector number (numerically where possible), then name.
 */
export function compareCards(a: Card, b: Card): number {
  if (a.set !== b.set) return a.set < b.set ? -1 : 1

  const na = numericPart(a.number)
  const nb = numericPart(b.number)
  if (!Number.isNaN(na) && !Number.isNaN(nb) && na !== nb) return na - nb
  if (Number.isNaN(na) !== Number.isNaN(nb)) return Number.isNaN(na) ? 1 : -1
  if (a.number !== b.number) return a.number < b.number ? -1 : 1

  return cardName(a).localeCompare(cardName(b))
}

// Canonical JSON form

type FaceJson = {
  readonly name: string
  readonly type: string
  readonly cost: string
  readonly text: string
  readonly power: string | null
  readonly toughness: string | null
}

export type CardJson = {
  readonly id: string
  readonly set: string
  readonly number: string
  readonly lang: string
  readonly rarity: string
  readonly faces: readonly FaceJson[]
}

export type OwnedCardJson = CardJson & {
  readonly count: number
  readonly foil: boolean
  readonly condition: Condition
}

function faceToJson(face: Face): FaceJson {
  return {
    name: face.name,
    type: face.type,
    cost: face.cost,
    text: face.text,
    power: face.power ?? null,
    toughness: face.toughness ?? null
  }
}

export function cardToJson(card: Card): CardJson {
  return {
    id: card.id,
    set: card.set,
    number: card.number,
    lang: card.lang,
    rarity: card.rarity,
    faces: card.faces.map(faceToJson)
  }
}

export function ownedCardToJson(card: OwnedCard): OwnedCardJson {
  return { ...cardToJson(card), count: card.count, foil: card.foil, condition: card.condition }
}

function faceFromRecord(record: JsonRecord): Face {
  return {
    name: stringField(record, 'name', 'face'),
    type: stringField(record, 'type', 'face'),
    cost: stringField(record, 'cost', 'face'),
    text: stringField(record, 'text', 'face'),
    power: optionalStringField(record, 'power', 'face'),
    toughness: optionalStringField(record, 'toughness', 'face')
  }
}

function cardFromRecord(record: JsonRecord): Card {
  return {
    id: stringField(record, 'id', 'card'),
    set: stringField(record, 'set', 'card'),
    number: stringField(record, 'number', 'card'),
    lang: stringField(record, 'lang', 'card'),
    rarity: stringField(record, 'rarity', 'card'),
    faces: arrayField(record, 'faces', 'card').map((face) => faceFromRecord(asRecord(face, 'face')))
  }
}

/**
 * @throws TypeError when the value is not a stored card
 */
export function cardFromJson(value: unknown): Card {
  return cardFromRecord(asRecord(value, 'card'))
}

/**
 * @throws TypeError when the value is not a stored owned card
 */
export function ownedCardFromJson(value: unknown): OwnedCard {
  const record = asRecord(value, 'card')
  const condition = optionalStringField(record, 'condition', 'card') ?? 'mint'
  if (!isCondition(condition)) {
    throw new TypeError(`Unknown card condition '${condition}'`)
  }
  const count = numberField(record, 'count', 'card')
  if (!Number.isInteger(count) || count < 1) {
    throw new TypeError(`Expected card.count to be a positive integer, got ${count}`)
  }
  return {
    ...cardFromRecord(record),
    count,
    foil: booleanField(record, 'foil', 'card', false),
    condition
  }
}
