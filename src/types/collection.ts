/**
 * Collection Types
 *
 * Inventories (owned cards), binders (rendered pages of cards) and the index
 * records listing every stored ID of each. All carry a `kind` discriminant,
 * which the object store uses to pick their codec.
 */

import type { AutoSaveObjectStore, Codec } from '../cache/object-store'
import type { JsonValue } from '../cache/types'
import { type ImageSize, isImageSize } from '../catalog/paths'
import { type OwnedCard, ownedCardFromJson, ownedCardToJson, variantKey } from './card'
import { arrayField, asRecord, isRecord, numberField, stringArrayField, stringField } from './fields'

export interface Inventory {
  readonly kind: 'inventory'
  readonly id: string
  readonly name: string
  /** Directory the inventory file is written to */
  readonly path: string
  readonly cards: readonly OwnedCard[]
}

/**
 * Sheet grid and image size of a rendered binder.
 */
export interface BinderLayout {
  readonly rows: number
  readonly columns: number
  readonly imageSize: ImageSize
}

export const DEFAULT_BINDER_LAYOUT: BinderLayout = { rows: 3, columns: 3, imageSize: 'large' }

export interface Binder {
  readonly kind: 'binder'
  readonly id: string
  readonly name: string
  /** Directory the binder pages are written to */
  readonly path: string
  /** Cards in page order */
  readonly cards: readonly OwnedCard[]
  readonly layout: BinderLayout
}

export type IndexKind = 'inventory-index' | 'binder-index'

export interface CollectionIndex<K extends IndexKind = IndexKind> {
  readonly kind: K
  readonly ids: ReadonlySet<string>
}

export type CollectionRecord =
  | Inventory
  | Binder
  | CollectionIndex<'inventory-index'>
  | CollectionIndex<'binder-index'>

export type CollectionStore = AutoSaveObjectStore<CollectionRecord>

/**
 * Lower-case ID with everything outside [a-z0-9_] replaced by `_`.
 */
export function normalizeId(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_]/g, '_')
}

/**
 * Merge cards into a list. Copies of the same variant (printing, language,
 * finish and condition) add their counts to the existing entry; new variants
 * are appended in the order given.
 */
export function mergeCards(existing: readonly OwnedCard[], added: readonly OwnedCard[]): OwnedCard[] {
  const merged = new Map<string, OwnedCard>()
  for (const card of [...existing, ...added]) {
    const key = variantKey(card)
    const prior = merged.get(key)
    merged.set(key, prior ? { ...prior, count: prior.count + card.count } : card)
  }
  return [...merged.values()]
}

export function addCards(inventory: Inventory, cards: readonly OwnedCard[]): Inventory {
  return { ...inventory, cards: mergeCards(inventory.cards, cards) }
}

export function totalCount(cards: readonly OwnedCard[]): number {
  return cards.reduce((sum, card) => sum + card.count, 0)
}

// Canonical forms, shared by the store codecs and the JSON files written
// beside inventories and binders

function cardsToJson(cards: readonly OwnedCard[]): JsonValue {
  return cards.map(ownedCardToJson)
}

export function inventoryToJson(inventory: Inventory): JsonValue {
  return {
    id: inventory.id,
    name: inventory.name,
    path: inventory.path,
    cards: cardsToJson(inventory.cards)
  }
}

/**
 * @throws TypeError when the value is not a stored inventory
 */
export function inventoryFromJson(value: unknown): Inventory {
  const record = asRecord(value, 'inventory')
  return {
    kind: 'inventory',
    id: normalizeId(stringField(record, 'id', 'inventory')),
    name: stringField(record, 'name', 'inventory'),
    path: stringField(record, 'path', 'inventory'),
    cards: arrayField(record, 'cards', 'inventory').map(ownedCardFromJson)
  }
}

export function binderToJson(binder: Binder): JsonValue {
  return {
    id: binder.id,
    name: binder.name,
    path: binder.path,
    layout: { rows: binder.layout.rows, columns: binder.layout.columns, imageSize: binder.layout.imageSize },
    cards: cardsToJson(binder.cards)
  }
}

function layoutFromJson(value: unknown): BinderLayout {
  // Binders written before layouts were recorded used the defaults
  if (value === undefined) return DEFAULT_BINDER_LAYOUT
  const record = asRecord(value, 'binder.layout')
  const imageSize = stringField(record, 'imageSize', 'binder.layout')
  if (!isImageSize(imageSize)) {
    throw new TypeError(`Unknown image size '${imageSize}'`)
  }
  const rows = numberField(record, 'rows', 'binder.layout')
  const columns = numberField(record, 'columns', 'binder.layout')
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(columns) || columns < 1) {
    throw new TypeError('Expected binder.layout rows and columns to be positive integers')
  }
  return { rows, columns, imageSize }
}

/**
 * @throws TypeError when the value is not a stored binder
 */
export function binderFromJson(value: unknown): Binder {
  const record = asRecord(value, 'binder')
  return {
    kind: 'binder',
    id: normalizeId(stringField(record, 'id', 'binder')),
    name: stringField(record, 'name', 'binder'),
    path: stringField(record, 'path', 'binder'),
    cards: arrayField(record, 'cards', 'binder').map(ownedCardFromJson),
    layout: layoutFromJson(record['layout'])
  }
}

export const inventoryCodec: Codec<Inventory> = {
  kind: 'inventory',
  toStorage: inventoryToJson,
  fromStorage: inventoryFromJson
}

export const binderCodec: Codec<Binder> = {
  kind: 'binder',
  toStorage: binderToJson,
  fromStorage: binderFromJson
}

function indexCodec<K extends IndexKind>(kind: K): Codec<CollectionIndex<K>> {
  return {
    kind,
    toStorage: (index) => ({ ids: [...index.ids].sort() }),
    fromStorage: (stored) => ({
      kind,
      ids: new Set(stringArrayField(asRecord(stored, kind), 'ids', kind))
    })
  }
}

export const inventoryIndexCodec = indexCodec('inventory-index')
export const binderIndexCodec = indexCodec('binder-index')

function kindOf(value: unknown): unknown {
  return isRecord(value) ? value['kind'] : undefined
}

export function isInventory(value: unknown): value is Inventory {
  return kindOf(value) === 'inventory'
}

export function isBinder(value: unknown): value is Binder {
  return kindOf(value) === 'binder'
}

export function isCollectionIndex<K extends IndexKind>(value: unknown, kind: K): value is CollectionIndex<K> {
  return kindOf(value) === kind && isRecord(value) && value['ids'] instanceof Set
}

/**
 * Register the codec of every collection record kind.
 */
export function registerCollectionCodecs(store: CollectionStore): void {
  store.register(inventoryCodec)
  store.register(binderCodec)
  store.register(inventoryIndexCodec)
  store.register(binderIndexCodec)
}
