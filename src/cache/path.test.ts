import { describe, expect, it } from 'vitest'
import { InvalidPathError } from './errors'
import { joinPath, normalizePath, splitKeyPath, splitPath } from './path'

describe('cache paths', () => {
  it('drops empty segments', () => {
    expect(splitPath('//sets//m21/cards/')).toEqual(['sets', 'm21', 'cards'])
  })

  it('treats slashes alone as the root', () => {
    expect(splitPath('')).toEqual([])
    expect(splitPath('///')).toEqual([])
    expect(normalizePath('///')).toBe('/')
  })

  it('normalizes to a leading slash', () => {
    expect(normalizePath('sets/m21/')).toBe('/sets/m21')
  })

  it('splits a key from its parents', () => {
    expect(splitKeyPath('/sets/m21/info')).toEqual([['sets', 'm21'], 'info'])
  })

  it('rejects the root as a key', () => {
    expect(() => splitKeyPath('/')).toThrow(InvalidPathError)
  })

  it('joins parts', () => {
    expect(joinPath('/sets/', 'm21', '/cards')).toBe('/sets/m21/cards')
  })
})
