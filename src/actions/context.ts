/**
 * Action Context
 *
 * What every action runs against, the errors actions report with, and the
 * helpers shared by the inventory and binder actions: looking up records
 * through their index, choosing IDs and resolving board lists into cards.
 */

import { readFile } from 'node:fs/promises'
import pluralize from 'pluralize'
import type { CatalogClient } from '../catalog/client'
import type { Logger } from '../logger'
import { parseList, type ListEntry } from '../parser/tappedout'
import type { OwnedCard } from '../types/card'
import {
  type Binder,
  type CollectionStore,
  type IndexKind,
  type Inventory,
  isBinder,
  isCollectionIndex,
  isInventory,
  normalizeId
} from '../types/collection'

export interface ActionContext {
  readonly store: CollectionStore
  readonly catalog: CatalogClient
  readonly logger: Logger
}

/**
 * A user-facing failure. The CLI prints the message and exits non-zero.
 */
export class ActionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ActionError'
  }
}

export interface RecordKind<R extends Inventory | Binder> {
  readonly noun: string
  readonly root: string
  readonly indexKind: IndexKind
  readonly matches: (value: unknown) => value is R
}

export const INVENTORIES: RecordKind<Inventory> = {
  noun: 'inventory',
  root: '/inventories',
  indexKind: 'inventory-index',
  matches: isInventory
}

export const BINDERS: RecordKind<Binder> = {
  noun: 'binder',
  root: '/binders',
  indexKind: 'binder-index',
  matches: isBinder
}

export function recordPath<R extends Inventory | Binder>(kind: RecordKind<R>, id: string): string {
  return `${kind.root}/${id}`
}

function indexPath<R extends Inventory | Binder>(kind: RecordKind<R>): string {
  return `${kind.root}/.meta`
}

/**
 * IDs listed in a kind's index; empty when there is no index yet.
 */
export function readIndex<R extends Inventory | Binder>(store: CollectionStore, kind: RecordKind<R>): Set<string> {
  const { value } = store.get(indexPath(kind))
  return isCollectionIndex(value, kind.indexKind) ? new Set(value.ids) : new Set()
}

export function writeIndex<R extends Inventory | Binder>(
  store: CollectionStore,
  kind: RecordKind<R>,
  ids: ReadonlySet<string>
): void {
  store.set(indexPath(kind), { kind: kind.indexKind, ids })
}

export interface LoadedRecord<R> {
  readonly record: R
  readonly ids: Set<string>
}

/**
 * Load a record listed in its index. A listed record that can't be loaded is
 * dropped from the index before the error is raised.
 *
 * @throws ActionError when the ID is not listed or the record is missing
 */
export function loadRecord<R extends Inventory | Binder>(
  ctx: ActionContext,
  kind: RecordKind<R>,
  id: string
): LoadedRecord<R> {
  const ids = readIndex(ctx.store, kind)
  if (!ids.has(id)) {
    throw new ActionError(`\`${id}\` is not ${withArticle(kind.noun)} that is currently defined`)
  }

  let stored: unknown
  try {
    stored = ctx.store.get(recordPath(kind, id)).value
  } catch (error) {
    if (!(error instanceof TypeError)) throw error
    ctx.logger.verbose(`Stored ${kind.noun} \`${id}\` is malformed: ${error.message}`)
    stored = undefined
  }

  if (!kind.matches(stored)) {
    ids.delete(id)
    writeIndex(ctx.store, kind, ids)
    throw new ActionError(
      `\`${id}\` was listed as ${withArticle(kind.noun)}, but its record couldn't be loaded. ` +
        'The entry has been removed from the index to repair it.'
    )
  }
  return { record: stored, ids }
}

function withArticle(noun: string): string {
  return /^[aeiou]/i.test(noun) ? `an ${noun}` : `a ${noun}`
}

/**
 * Next free ID of the form `base`, `base_1`, `base_2`, ...
 */
export function uniqueId(base: string, taken: ReadonlySet<string>): string {
  let id = base
  for (let n = 1; taken.has(id); n++) {
    id = `${base}_${n}`
  }
  return id
}

export interface Naming {
  readonly name?: string | undefined
  readonly id?: string | undefined
}

/**
 * Name and ID for a new record. With neither given, the name is `default` and
 * the ID the first free `default`, `default_1`, ...; with one given, the
 * other is derived from it.
 *
 * @throws ActionError on a blank name or ID, or an ID already in use
 */
export function chooseNaming<R extends Inventory | Binder>(
  kind: RecordKind<R>,
  naming: Naming,
  taken: ReadonlySet<string>
): { name: string; id: string } {
  if (naming.name === undefined && naming.id === undefined) {
    return { name: 'default', id: uniqueId('default', taken) }
  }
  const name = naming.name ?? naming.id ?? ''
  if (name.trim() === '') {
    throw new ActionError(
      `Can't create ${withArticle(kind.noun)} with a blank name; give one or leave it out to use the default`
    )
  }
  const id = normalizeId(naming.id ?? name)
  if (id === '') {
    throw new ActionError(`Can't create ${withArticle(kind.noun)} with a blank ID`)
  }
  if (taken.has(id)) {
    throw new ActionError(`${capitalize(kind.noun)} \`${id}\` already exists`)
  }
  return { name, id }
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Read and parse board list files. Every malformed line is logged and
 * skipped.
 *
 * @throws ActionError when a file can't be read or no line held a card
 */
export async function readListFiles(ctx: ActionContext, files: readonly string[]): Promise<ListEntry[]> {
  const entries: ListEntry[] = []
  for (const file of files) {
    ctx.logger.log(`Reading cards from ${file}...`)
    let text: string
    try {
      text = await readFile(file, 'utf-8')
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ActionError(`Couldn't read ${file}: ${reason}`)
    }

    const parsed = parseList(text)
    for (const skipped of parsed.skipped) {
      ctx.logger.warn(`skipping bad line ${skipped.line}: ${skipped.reason}`)
    }
    entries.push(...parsed.entries)
  }

  if (entries.length === 0) {
    throw new ActionError('No cards were successfully processed')
  }
  return entries
}

/**
 * Look up full card data for list entries. Entries without a collector
 * number get the set's default printing of that name.
 */
export async function resolveEntries(ctx: ActionContext, entries: readonly ListEntry[]): Promise<OwnedCard[]> {
  ctx.logger.log(`Looking up ${pluralize('card', entries.length, true)} in the catalog...`)
  const cards: OwnedCard[] = []
  for (const [i, entry] of entries.entries()) {
    const number = entry.number ?? (await ctx.catalog.getCardDefaultNumber(entry.name, entry.set))
    const card = await ctx.catalog.getCardByNumber(entry.set, number)
    cards.push({ ...card, count: entry.count, foil: entry.foil, condition: entry.condition })
    ctx.logger.progress(entry.name, i + 1, entries.length)
  }
  return cards
}
