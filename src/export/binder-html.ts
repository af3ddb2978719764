/**
 * Binder HTML Export
 *
 * Static binder view: an index page plus one page per binder sheet, each a
 * grid of card images with captions. Images are expected under
 * `assets/images/` and the stylesheet at `assets/styles.css`.
 */

import { encode } from 'html-entities'
import { backImageFormat, type ImageSize, imageFileName } from '../catalog/paths'
import { CONDITIONS, cardName, type OwnedCard } from '../types/card'

export const ASSETS_DIR = 'assets'
export const IMAGES_DIR = 'assets/images'
export const STYLES_FILE = 'assets/styles.css'

export interface BinderPage {
  readonly binderName: string
  /** 1-based */
  readonly pageNumber: number
  readonly totalPages: number
  readonly rows: number
  readonly columns: number
  /** At most rows * columns cards; missing slots render empty */
  readonly cards: readonly OwnedCard[]
  readonly imageSize: ImageSize
}

/**
 * `binder001.html`, `binder002.html`, ...
 */
export function pageFileName(pageNumber: number): string {
  return `binder${String(pageNumber).padStart(3, '0')}.html`
}

/**
 * File name of a card's front image inside the images directory.
 */
export function cardImageSlug(card: OwnedCard, size: ImageSize): string {
  return imageFileName({ set: card.set, number: card.number, lang: card.lang, size })
}

export function backImageSlug(): string {
  return `back.${backImageFormat()}`
}

/**
 * Split cards into pages of `perPage`. An empty list still yields no pages.
 */
export function paginate<T>(items: readonly T[], perPage: number): T[][] {
  if (perPage < 1) {
    throw new RangeError(`Page size must be at least 1, got ${perPage}`)
  }
  const pages: T[][] = []
  for (let i = 0; i < items.length; i += perPage) {
    pages.push(items.slice(i, i + perPage))
  }
  return pages
}

/**
 * Caption under a card: count and name, then foil and condition when set.
 */
export function cardCaption(card: OwnedCard): string {
  const parts = [`${card.count}x ${cardName(card)}`]
  if (card.foil) {
    parts.push('Foil')
  }
  if (card.condition !== 'mint') {
    parts.push(CONDITIONS[card.condition].label)
  }
  return parts.join(' · ')
}

function renderSlot(card: OwnedCard | undefined, imageSize: ImageSize): string {
  if (!card) {
    return `<div class="slot empty"><img src="${IMAGES_DIR}/${backImageSlug()}" alt="" /></div>`
  }
  const name = encode(cardName(card))
  const foil = card.foil ? ' foil' : ''
  return `<div class="slot${foil}">
        <img src="${IMAGES_DIR}/${encode(cardImageSlug(card, imageSize))}" alt="${name}" title="${name}" />
        <div class="caption">${encode(cardCaption(card))}</div>
      </div>`
}

function renderNav(pageNumber: number, totalPages: number): string {
  const prev =
    pageNumber > 1
      ? `<a class="prev" href="${pageFileName(pageNumber - 1)}">&larr; Previous</a>`
      : '<span class="prev"></span>'
  const next =
    pageNumber < totalPages
      ? `<a class="next" href="${pageFileName(pageNumber + 1)}">Next &rarr;</a>`
      : '<span class="next"></span>'
  return `<nav>
    ${prev}
    <a class="home" href="index.html">Page ${pageNumber} of ${totalPages}</a>
    ${next}
  </nav>`
}

function pageShell(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>${encode(title)}</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <link rel="stylesheet" href="${STYLES_FILE}" />
</head>
<body>
${body}
</body>
</html>
`
}

export function renderBinderPage(page: BinderPage): string {
  const rows: string[] = []
  for (let y = 0; y < page.rows; y++) {
    const slots: string[] = []
    for (let x = 0; x < page.columns; x++) {
      slots.push(renderSlot(page.cards[y * page.columns + x], page.imageSize))
    }
    rows.push(`<div class="row">
      ${slots.join('\n      ')}
    </div>`)
  }

  const body = `  <h1>${encode(page.binderName)}</h1>
  ${renderNav(page.pageNumber, page.totalPages)}
  <div class="sheet" style="--columns: ${page.columns}">
    ${rows.join('\n    ')}
  </div>`
  return pageShell(`${page.binderName} - Page ${page.pageNumber}`, body)
}

export function renderIndexPage(binderName: string, totalPages: number): string {
  const links = Array.from({ length: totalPages }, (_, i) => {
    const file = pageFileName(i + 1)
    return `<li><a href="${file}">Page ${i + 1}</a></li>`
  })
  const list = links.length > 0 ? `<ol class="pages">\n    ${links.join('\n    ')}\n  </ol>` : '<p>(This binder has no pages)</p>'
  const body = `  <h1>${encode(binderName)}</h1>
  ${list}`
  return pageShell(binderName, body)
}

export const BINDER_STYLES = `* { box-sizing: border-box; }
body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
  max-width: 1100px;
  margin: 0 auto;
  padding: 20px;
  background: #2b2b2b;
  color: #eee;
}
a { color: #9cc9ff; }
h1 { margin-bottom: 10px; }
nav {
  display: flex;
  justify-content: space-between;
  margin-bottom: 20px;
}
.sheet {
  display: flex;
  flex-direction: column;
  gap: 12px;
  padding: 16px;
  background: #1b1b1b;
  border-radius: 8px;
}
.row {
  display: grid;
  grid-template-columns: repeat(var(--columns), 1fr);
  gap: 12px;
}
.slot { text-align: center; }
.slot img {
  width: 100%;
  border-radius: 4.75% / 3.5%;
}
.slot.empty img { opacity: 0.15; }
.slot.foil img { box-shadow: 0 0 8px 2px rgba(180, 220, 255, 0.7); }
.caption {
  font-size: 13px;
  margin-top: 4px;
  color: #ccc;
}
.pages { line-height: 1.8; }
`
