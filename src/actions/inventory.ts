/**
 * Inventory Actions
 *
 * Create, inspect, edit and delete inventories, and add cards to them from
 * board lists. Each inventory is stored at `/inventories/{id}` and mirrored
 * to `inventory.json` in its directory.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import pluralize from 'pluralize'
import { toListLine } from '../parser/tappedout'
import { cardName, CONDITIONS, type OwnedCard } from '../types/card'
import {
  addCards as mergeIntoInventory,
  type Inventory,
  inventoryToJson,
  normalizeId,
  totalCount
} from '../types/collection'
import {
  type ActionContext,
  ActionError,
  chooseNaming,
  INVENTORIES,
  loadRecord,
  type Naming,
  readIndex,
  readListFiles,
  recordPath,
  resolveEntries,
  writeIndex
} from './context'

export const INVENTORY_FILE = 'inventory.json'

async function writeInventoryFile(inventory: Inventory): Promise<void> {
  await writeFile(join(inventory.path, INVENTORY_FILE), `${JSON.stringify(inventoryToJson(inventory), null, 2)}\n`)
}

/**
 * Mirror the record to its directory. The store stays authoritative, so a
 * failure here is only a warning.
 */
async function syncInventoryFile(ctx: ActionContext, inventory: Inventory): Promise<void> {
  try {
    await writeInventoryFile(inventory)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    ctx.logger.warn(`Records updated, but couldn't update the inventory directory: ${reason}`)
  }
}

/**
 * Board-format line for an owned card.
 */
export function boardLine(card: OwnedCard): string {
  return toListLine({ ...card, name: cardName(card) })
}

/**
 * Human-readable line for an owned card.
 */
export function describeCard(card: OwnedCard): string {
  let line = `${card.count}x ${cardName(card)} [${card.set.toUpperCase()} #${card.number}, ${card.lang}]`
  if (card.foil) {
    line += ', foil'
  }
  if (card.condition !== 'mint') {
    line += `, ${CONDITIONS[card.condition].label}`
  }
  return line
}

export async function createInventory(ctx: ActionContext, outputDir: string, naming: Naming = {}): Promise<Inventory> {
  const ids = readIndex(ctx.store, INVENTORIES)
  const { name, id } = chooseNaming(INVENTORIES, naming, ids)

  await mkdir(outputDir, { recursive: true })
  const inventory: Inventory = { kind: 'inventory', id, name, path: outputDir, cards: [] }
  await writeInventoryFile(inventory)

  ctx.store.batch()
  ctx.store.set(recordPath(INVENTORIES, id), inventory)
  ids.add(id)
  writeIndex(ctx.store, INVENTORIES, ids)
  ctx.store.commit()

  ctx.logger.success(`Inventory \`${id}\` created in ${outputDir}`)
  return inventory
}

export function listInventories(ctx: ActionContext): string[] {
  const ids = [...readIndex(ctx.store, INVENTORIES)].sort()
  if (ids.length === 0) {
    ctx.logger.log('(No inventories have been created yet)')
  }
  for (const id of ids) {
    ctx.logger.log(id)
  }
  return ids
}

export interface ShowInventoryOptions {
  /** List the cards instead of only counting them */
  readonly cards?: boolean | undefined
  /** List cards in board format */
  readonly board?: boolean | undefined
  /** Leave out ID, name and location */
  readonly noMeta?: boolean | undefined
}

export function showInventory(ctx: ActionContext, id: string, options: ShowInventoryOptions = {}): Inventory {
  const { record: inventory } = loadRecord(ctx, INVENTORIES, id)
  const { logger } = ctx

  if (!options.noMeta) {
    logger.log(`Inventory ID: ${inventory.id}`)
    logger.log(`Name:         ${inventory.name}`)
    logger.log(`Location:     ${inventory.path}`)
  }

  if (!options.cards) {
    logger.log(`Cards:        ${pluralize('card', totalCount(inventory.cards), true)}`)
    return inventory
  }

  if (!options.noMeta) {
    logger.log('Cards:')
  }
  for (const card of inventory.cards) {
    logger.log(options.board ? boardLine(card) : `* ${describeCard(card)}`)
  }
  return inventory
}

export interface EditOptions {
  readonly id?: string | undefined
  readonly name?: string | undefined
  readonly path?: string | undefined
}

export async function editInventory(ctx: ActionContext, id: string, changes: EditOptions): Promise<Inventory> {
  const { record, ids } = loadRecord(ctx, INVENTORIES, id)

  if (changes.name !== undefined && changes.name.trim() === '') {
    throw new ActionError("Can't set the name of an inventory to a blank string")
  }
  const newId = changes.id === undefined ? record.id : normalizeId(changes.id)
  if (newId === '') {
    throw new ActionError("Can't set the ID of an inventory to a blank string")
  }
  if (newId !== record.id && ids.has(newId)) {
    throw new ActionError(`Inventory \`${newId}\` already exists`)
  }

  const updated: Inventory = {
    ...record,
    id: newId,
    name: changes.name ?? record.name,
    path: changes.path ?? record.path
  }
  if (updated.id === record.id && updated.name === record.name && updated.path === record.path) {
    ctx.logger.log('Nothing to change')
    return record
  }

  ctx.store.batch()
  ctx.store.set(recordPath(INVENTORIES, updated.id), updated)
  if (updated.id !== record.id) {
    ctx.store.clear(recordPath(INVENTORIES, record.id))
    ids.delete(record.id)
    ids.add(updated.id)
    writeIndex(ctx.store, INVENTORIES, ids)
  }
  ctx.store.commit()

  await syncInventoryFile(ctx, updated)
  ctx.logger.success(`Inventory \`${updated.id}\` updated`)
  return updated
}

export interface DeleteOptions {
  /** Also remove the directory the record points at */
  readonly deleteDirectory?: boolean | undefined
}

export async function deleteInventory(ctx: ActionContext, id: string, options: DeleteOptions = {}): Promise<void> {
  const { record, ids } = loadRecord(ctx, INVENTORIES, id)

  if (options.deleteDirectory) {
    try {
      await rm(record.path, { recursive: true, force: true })
      ctx.logger.log(`Deleted inventory directory ${record.path}`)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      ctx.logger.warn(`Couldn't delete inventory directory: ${reason}`)
    }
  }

  ctx.store.batch()
  ctx.store.clear(recordPath(INVENTORIES, record.id))
  ids.delete(record.id)
  writeIndex(ctx.store, INVENTORIES, ids)
  ctx.store.commit()

  ctx.logger.success(`Deleted inventory \`${record.id}\``)
}

/**
 * Add every card from the given board lists. Copies of a variant already in
 * the inventory add to its count.
 */
export async function addCardsToInventory(
  ctx: ActionContext,
  id: string,
  listFiles: readonly string[]
): Promise<Inventory> {
  const { record } = loadRecord(ctx, INVENTORIES, id)
  if (listFiles.length === 0) {
    throw new ActionError('Give at least one card list file')
  }

  const entries = await readListFiles(ctx, listFiles)
  const cards = await resolveEntries(ctx, entries)

  const updated = mergeIntoInventory(record, cards)
  ctx.store.set(recordPath(INVENTORIES, updated.id), updated)
  await syncInventoryFile(ctx, updated)

  ctx.logger.success(`Added ${pluralize('card', totalCount(cards), true)} to inventory \`${updated.id}\``)
  return updated
}
