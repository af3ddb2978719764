/**
 * Binder Actions
 *
 * Build static binder views from an inventory or a board list, and manage
 * the records of built binders (`/binders/{id}`).
 *
 * A built binder directory looks like:
 *
 * ```
 * index.html
 * binder001.html ...
 * binder.json
 * assets/styles.css
 * assets/images/M19-314-front-large-en.jpg ...
 * assets/images/back.jpg
 * ```
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import pluralize from 'pluralize'
import {
  BINDER_STYLES,
  backImageSlug,
  cardImageSlug,
  IMAGES_DIR,
  pageFileName,
  paginate,
  renderBinderPage,
  renderIndexPage,
  STYLES_FILE
} from '../export/binder-html'
import { compareCards, type OwnedCard } from '../types/card'
import {
  type Binder,
  type BinderLayout,
  binderFromJson,
  binderToJson,
  DEFAULT_BINDER_LAYOUT,
  normalizeId,
  totalCount
} from '../types/collection'
import {
  type ActionContext,
  ActionError,
  BINDERS,
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
import { type DeleteOptions, describeCard, type EditOptions } from './inventory'

export const BINDER_FILE = 'binder.json'

export interface CreateBinderOptions extends Naming {
  /** Inventory to take the cards from */
  readonly inventory?: string | undefined
  /** Board list to take the cards from */
  readonly listFile?: string | undefined
  readonly layout?: Partial<BinderLayout> | undefined
}

/**
 * Sort cards into binder order: by set, collector number, then name.
 */
export function sortForBinder(cards: readonly OwnedCard[]): OwnedCard[] {
  return [...cards].sort(compareCards)
}

function resolveLayout(layout: Partial<BinderLayout> = {}): BinderLayout {
  const rows = layout.rows ?? DEFAULT_BINDER_LAYOUT.rows
  const columns = layout.columns ?? DEFAULT_BINDER_LAYOUT.columns
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(columns) || columns < 1) {
    throw new ActionError(`Binder rows and columns must be positive whole numbers, got ${rows}x${columns}`)
  }
  return { rows, columns, imageSize: layout.imageSize ?? DEFAULT_BINDER_LAYOUT.imageSize }
}

async function cardsFromSource(ctx: ActionContext, options: CreateBinderOptions): Promise<OwnedCard[]> {
  if ((options.inventory === undefined) === (options.listFile === undefined)) {
    throw new ActionError('Give either an inventory or a card list file to build the binder from')
  }
  if (options.inventory !== undefined) {
    const { record } = loadRecord(ctx, INVENTORIES, options.inventory)
    if (record.cards.length === 0) {
      throw new ActionError(`Inventory \`${record.id}\` has no cards`)
    }
    return [...record.cards]
  }
  const entries = await readListFiles(ctx, options.listFile === undefined ? [] : [options.listFile])
  return resolveEntries(ctx, entries)
}

/**
 * Write the pages and index of a binder. Returns the page count.
 */
async function writePages(binder: Binder): Promise<number> {
  const { rows, columns, imageSize } = binder.layout
  const pages = paginate(binder.cards, rows * columns)
  for (const [i, cards] of pages.entries()) {
    const html = renderBinderPage({
      binderName: binder.name,
      pageNumber: i + 1,
      totalPages: pages.length,
      rows,
      columns,
      cards,
      imageSize
    })
    await writeFile(join(binder.path, pageFileName(i + 1)), html)
  }
  await writeFile(join(binder.path, 'index.html'), renderIndexPage(binder.name, pages.length))
  return pages.length
}

/**
 * Copy each card's image, and the card back, out of the catalog's image
 * cache (fetching what is missing).
 */
async function copyImages(ctx: ActionContext, binder: Binder): Promise<void> {
  const imagesDir = join(binder.path, IMAGES_DIR)
  await mkdir(imagesDir, { recursive: true })

  const { imageSize } = binder.layout
  const unique = new Map<string, OwnedCard>()
  for (const card of binder.cards) {
    unique.set(cardImageSlug(card, imageSize), card)
  }

  let done = 0
  for (const [slug, card] of unique) {
    const image = await ctx.catalog.getCardImage(card.set, card.number, { size: imageSize, lang: card.lang })
    await writeFile(join(imagesDir, slug), image.data)
    done++
    ctx.logger.progress(slug, done, unique.size)
  }

  const back = await ctx.catalog.getCardBackImage()
  await writeFile(join(imagesDir, backImageSlug()), back.data)
}

async function writeBinderFile(binder: Binder): Promise<void> {
  await writeFile(join(binder.path, BINDER_FILE), `${JSON.stringify(binderToJson(binder), null, 2)}\n`)
}

export async function createBinder(
  ctx: ActionContext,
  outputDir: string,
  options: CreateBinderOptions
): Promise<Binder> {
  const ids = readIndex(ctx.store, BINDERS)
  const { name, id } = chooseNaming(BINDERS, options, ids)
  const layout = resolveLayout(options.layout)
  const { logger } = ctx

  logger.log('(1/5) Reading cards...')
  const cards = sortForBinder(await cardsFromSource(ctx, options))
  const binder: Binder = { kind: 'binder', id, name, path: outputDir, cards, layout }

  logger.log('(2/5) Generating binder pages...')
  await mkdir(outputDir, { recursive: true })
  const pageCount = await writePages(binder)

  logger.log('(3/5) Copying card images...')
  await copyImages(ctx, binder)

  logger.log('(4/5) Writing styles...')
  await mkdir(join(outputDir, 'assets'), { recursive: true })
  await writeFile(join(outputDir, STYLES_FILE), BINDER_STYLES)

  logger.log('(5/5) Saving binder...')
  await writeBinderFile(binder)
  ctx.store.batch()
  ctx.store.set(recordPath(BINDERS, id), binder)
  ids.add(id)
  writeIndex(ctx.store, BINDERS, ids)
  ctx.store.commit()

  logger.success(
    `Binder \`${id}\` (${pluralize('card', totalCount(cards), true)} on ${pluralize('page', pageCount, true)}) is ready at ${join(outputDir, 'index.html')}`
  )
  return binder
}

export function listBinders(ctx: ActionContext): string[] {
  const ids = [...readIndex(ctx.store, BINDERS)].sort()
  if (ids.length === 0) {
    ctx.logger.log('(No binders have been created yet)')
  }
  for (const id of ids) {
    ctx.logger.log(id)
  }
  return ids
}

export function showBinder(ctx: ActionContext, id: string, options: { readonly cards?: boolean | undefined } = {}): Binder {
  const { record: binder } = loadRecord(ctx, BINDERS, id)
  const { logger } = ctx

  logger.log(`Binder ID: ${binder.id}`)
  logger.log(`Name:      ${binder.name}`)
  logger.log(`Location:  ${binder.path}`)
  logger.log(`Layout:    ${binder.layout.rows}x${binder.layout.columns}, ${binder.layout.imageSize} images`)
  if (!options.cards) {
    logger.log(`Cards:     ${pluralize('card', totalCount(binder.cards), true)}`)
    return binder
  }
  logger.log('Cards:')
  for (const card of binder.cards) {
    logger.log(`* ${describeCard(card)}`)
  }
  return binder
}

async function readBinderFile(path: string): Promise<Binder> {
  return binderFromJson(JSON.parse(await readFile(join(path, BINDER_FILE), 'utf-8')))
}

/**
 * Change a binder's ID, name or location. A new name is rendered into the
 * pages, which are rebuilt from the binder directory's `binder.json`.
 */
export async function editBinder(ctx: ActionContext, id: string, changes: EditOptions): Promise<Binder> {
  const { record, ids } = loadRecord(ctx, BINDERS, id)

  if (changes.name !== undefined && changes.name.trim() === '') {
    throw new ActionError("Can't set the name of a binder to a blank string")
  }
  const newId = changes.id === undefined ? record.id : normalizeId(changes.id)
  if (newId === '') {
    throw new ActionError("Can't set the ID of a binder to a blank string")
  }
  if (newId !== record.id && ids.has(newId)) {
    throw new ActionError(`Binder \`${newId}\` already exists`)
  }

  const updated: Binder = {
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
  ctx.store.set(recordPath(BINDERS, updated.id), updated)
  if (updated.id !== record.id) {
    ctx.store.clear(recordPath(BINDERS, record.id))
    ids.delete(record.id)
    ids.add(updated.id)
    writeIndex(ctx.store, BINDERS, ids)
  }
  ctx.store.commit()

  try {
    const built = await readBinderFile(updated.path)
    if (built.name !== updated.name) {
      ctx.logger.log('Name has changed; regenerating binder pages...')
      await writePages({ ...built, name: updated.name, path: updated.path })
    }
    await writeBinderFile({ ...built, id: updated.id, name: updated.name, path: updated.path })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    ctx.logger.warn(`Records updated, but couldn't update the binder directory: ${reason}`)
    ctx.logger.warn('Point the binder at a valid binder directory to correct this.')
  }

  ctx.logger.success(`Binder \`${updated.id}\` updated`)
  return updated
}

export async function deleteBinder(ctx: ActionContext, id: string, options: DeleteOptions = {}): Promise<void> {
  const { record, ids } = loadRecord(ctx, BINDERS, id)

  if (options.deleteDirectory) {
    try {
      await rm(record.path, { recursive: true, force: true })
      ctx.logger.log(`Deleted binder directory ${record.path}`)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      ctx.logger.warn(`Couldn't delete binder directory: ${reason}`)
    }
  }

  ctx.store.batch()
  ctx.store.clear(recordPath(BINDERS, record.id))
  ids.delete(record.id)
  writeIndex(ctx.store, BINDERS, ids)
  ctx.store.commit()

  ctx.logger.success(`Deleted binder \`${record.id}\``)
}
