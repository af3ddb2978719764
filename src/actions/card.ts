/**
 * Card Actions
 *
 * One-off catalog lookups: by name, by set and number, and card images.
 */

import { writeFile } from 'node:fs/promises'
import type { CardImage } from '../catalog/client'
import type { ImageSize } from '../catalog/paths'
import type { Card } from '../types/card'
import { type ActionContext, ActionError } from './context'

/**
 * Printable description of a card, one face after another.
 */
export function formatCard(card: Card): string[] {
  const lines: string[] = []
  card.faces.forEach((face, i) => {
    if (i > 0) {
      lines.push('//')
    }
    lines.push(face.cost ? `${face.name}  ${face.cost}` : face.name)
    lines.push(face.type)
    if (face.text) {
      lines.push(...face.text.split('\n'))
    }
    if (face.power !== undefined && face.toughness !== undefined) {
      lines.push(`${face.power}/${face.toughness}`)
    }
  })
  lines.push(`Set: ${card.set.toUpperCase()} #${card.number} (${card.lang}), ${card.rarity}`)
  lines.push(`ID: ${card.id}`)
  return lines
}

export interface SearchCardOptions {
  readonly fuzzy?: boolean | undefined
  readonly set?: string | undefined
}

/**
 * Look up each name and print the card found.
 */
export async function searchCard(
  ctx: ActionContext,
  names: readonly string[],
  options: SearchCardOptions = {}
): Promise<Card[]> {
  if (names.length === 0) {
    throw new ActionError('Give at least one card name to look up')
  }
  const cards: Card[] = []
  for (const name of names) {
    const card = await ctx.catalog.getCardByName(name, options)
    cards.push(card)
    if (cards.length > 1) {
      ctx.logger.log('')
    }
    for (const line of formatCard(card)) {
      ctx.logger.log(line)
    }
  }
  return cards
}

export async function showCard(ctx: ActionContext, set: string, number: string, lang?: string): Promise<Card> {
  const card = await ctx.catalog.getCardByNumber(set, number, lang)
  for (const line of formatCard(card)) {
    ctx.logger.log(line)
  }
  return card
}

export interface CardImageOptions {
  readonly size?: ImageSize | undefined
  readonly lang?: string | undefined
  readonly back?: boolean | undefined
  /** Also write the image to this file */
  readonly output?: string | undefined
}

/**
 * Fetch a card image into the image cache, optionally saving a copy.
 */
export async function cardImage(
  ctx: ActionContext,
  set: string,
  number: string,
  options: CardImageOptions = {}
): Promise<CardImage> {
  const image = await ctx.catalog.getCardImage(set, number, {
    size: options.size,
    lang: options.lang,
    back: options.back
  })
  if (options.output !== undefined) {
    await writeFile(options.output, image.data)
    ctx.logger.success(`Saved ${set.toUpperCase()} #${number} to ${options.output}`)
  } else {
    ctx.logger.success(`Image of ${set.toUpperCase()} #${number} is cached at ${image.cachePath}`)
  }
  return image
}
