import { describe, expect, it } from 'vitest'
import { createOwnedCard } from '../test-support'
import {
  type BinderPage,
  cardCaption,
  cardImageSlug,
  pageFileName,
  paginate,
  renderBinderPage,
  renderIndexPage
} from './binder-html'

function page(overrides: Partial<BinderPage> = {}): BinderPage {
  return {
    binderName: 'Trade Binder',
    pageNumber: 1,
    totalPages: 1,
    rows: 3,
    columns: 3,
    cards: [createOwnedCard()],
    imageSize: 'large',
    ...overrides
  }
}

function countOf(html: string, needle: string): number {
  return html.split(needle).length - 1
}

describe('binder HTML', () => {
  describe('pageFileName', () => {
    it('zero-pads page numbers to three digits', () => {
      expect(pageFileName(1)).toBe('binder001.html')
      expect(pageFileName(12)).toBe('binder012.html')
      expect(pageFileName(1234)).toBe('binder1234.html')
    })
  })

  describe('paginate', () => {
    it('splits items into full pages and a partial last page', () => {
      expect(paginate([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
    })

    it('returns no pages for no items', () => {
      expect(paginate([], 9)).toEqual([])
    })

    it('rejects a page size below one', () => {
      expect(() => paginate([1], 0)).toThrow('Page size must be at least 1, got 0')
    })
  })

  describe('cardCaption', () => {
    it('shows count and name for a plain card', () => {
      expect(cardCaption(createOwnedCard())).toBe('1x Llanowar Elves')
    })

    it('adds foil and condition', () => {
      const card = createOwnedCard({ count: 2, foil: true, condition: 'slightly-used' })
      expect(cardCaption(card)).toBe('2x Llanowar Elves · Foil · Slightly Used')
    })
  })

  it('names card images by set, padded number, size and language', () => {
    expect(cardImageSlug(createOwnedCard({ set: 'm21', number: '2' }), 'large')).toBe(
      'M21-002-front-large-en.jpg'
    )
  })

  describe('renderBinderPage', () => {
    it('lays out rows of slots and fills the rest with empty slots', () => {
      const html = renderBinderPage(page({ rows: 2, columns: 2 }))

      expect(countOf(html, '<div class="row">')).toBe(2)
      expect(countOf(html, '<div class="slot empty">')).toBe(3)
      expect(html).toContain('src="assets/images/M19-314-front-large-en.jpg"')
      expect(html).toContain('<div class="caption">1x Llanowar Elves</div>')
      expect(html).toContain('style="--columns: 2"')
    })

    it('escapes card and binder names', () => {
      const html = renderBinderPage(
        page({ binderName: '<Rares>', cards: [createOwnedCard({ name: 'Fire & Ice' })] })
      )

      expect(html).toContain('<h1>&lt;Rares&gt;</h1>')
      expect(html).toContain('alt="Fire &amp; Ice"')
      expect(html).not.toContain('<Rares>')
    })

    it('links to neighbouring pages only where they exist', () => {
      const first = renderBinderPage(page({ pageNumber: 1, totalPages: 3 }))
      const middle = renderBinderPage(page({ pageNumber: 2, totalPages: 3 }))
      const last = renderBinderPage(page({ pageNumber: 3, totalPages: 3 }))

      expect(first).not.toContain('class="prev" href')
      expect(first).toContain('<a class="next" href="binder002.html">')
      expect(middle).toContain('<a class="prev" href="binder001.html">')
      expect(middle).toContain('<a class="next" href="binder003.html">')
      expect(middle).toContain('Page 2 of 3')
      expect(last).not.toContain('class="next" href')
    })

    it('marks foil slots', () => {
      const html = renderBinderPage(page({ cards: [createOwnedCard({ foil: true })] }))
      expect(html).toContain('<div class="slot foil">')
    })
  })

  describe('renderIndexPage', () => {
    it('links every page', () => {
      const html = renderIndexPage('Trade Binder', 2)

      expect(html).toContain('<title>Trade Binder</title>')
      expect(html).toContain('<li><a href="binder001.html">Page 1</a></li>')
      expect(html).toContain('<li><a href="binder002.html">Page 2</a></li>')
      expect(html).toContain('<link rel="stylesheet" href="assets/styles.css" />')
    })

    it('says so when there are no pages', () => {
      expect(renderIndexPage('Empty', 0)).toContain('<p>(This binder has no pages)</p>')
    })
  })
})
