import { describe, expect, it } from 'vitest'
import { InvalidPathError } from './errors'
import { PathCache } from './path-cache'

function isNumber(value: unknown): value is number {
  return typeof value === 'number'
}

describe('PathCache', () => {
  describe('set and get', () => {
    it('should return what was set', () => {
      const cache = new PathCache<number>()
      cache.set('/sets/m21/cards/1/en', 42)

      expect(cache.get('/sets/m21/cards/1/en')).toEqual({ hit: true, value: 42 })
    })

    it('should ignore repeated and trailing slashes', () => {
      const cache = new PathCache<string>()
      cache.set('a//b/', 'x')

      expect(cache.get('/a/b')).toEqual({ hit: true, value: 'x' })
    })

    it('should miss for absent paths and absent ancestors', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)

      expect(cache.get('/a/c')).toEqual({ hit: false, value: undefined })
      expect(cache.get('/x/y/z')).toEqual({ hit: false, value: undefined })
    })

    it('should miss for an interior node', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)

      expect(cache.get('/a').hit).toBe(false)
    })

    it('should apply convert only on a hit', () => {
      const cache = new PathCache<number>()
      cache.set('/a', 2)
      const calls: number[] = []
      const double = (value: number): number => {
        calls.push(value)
        return value * 2
      }

      expect(cache.get('/a', double)).toEqual({ hit: true, value: 4 })
      expect(cache.get('/b', double)).toEqual({ hit: false, value: undefined })
      expect(calls).toEqual([2])
    })

    it('should replace a subtree with a value', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)
      cache.set('/a', 2)

      expect(cache.get('/a')).toEqual({ hit: true, value: 2 })
    })

    it('should reject the root path', () => {
      const cache = new PathCache<number>()

      expect(() => cache.set('/', 1)).toThrow(InvalidPathError)
      expect(() => cache.get('')).toThrow(InvalidPathError)
    })

    it('should reject descending through a value', () => {
      const cache = new PathCache<number>()
      cache.set('/a', 1)

      expect(() => cache.set('/a/b', 2)).toThrow('Invalid path /a/b: value at /a is not a directory')
      expect(() => cache.get('/a/b')).toThrow(InvalidPathError)
      expect(cache.get('/a')).toEqual({ hit: true, value: 1 })
    })
  })

  describe('clear', () => {
    it('should clear recursively and idempotently', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)
      cache.set('/a/c', 2)
      cache.set('/d', 3)

      cache.clear('/a')
      cache.clear('/a')

      expect(cache.get('/a/b').hit).toBe(false)
      expect(cache.get('/a/c').hit).toBe(false)
      expect(cache.get('/d')).toEqual({ hit: true, value: 3 })
    })

    it('should clear everything from the root', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)
      cache.set('/d', 3)

      cache.reset()

      expect(cache.keys('/')).toEqual([])
    })

    it('should do nothing for paths through a value', () => {
      const cache = new PathCache<number>()
      cache.set('/a', 1)

      cache.clear('/a/b')

      expect(cache.get('/a')).toEqual({ hit: true, value: 1 })
    })
  })

  describe('inspection', () => {
    it('should list sorted child keys', () => {
      const cache = new PathCache<number>()
      cache.set('/sets/m21/info', 1)
      cache.set('/sets/khm/info', 2)

      expect(cache.keys('/sets')).toEqual(['khm', 'm21'])
      expect(cache.keys('/sets/m21/info')).toEqual([])
    })

    it('should list leaves with full paths', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)
      cache.set('/a/c/d', 2)
      cache.set('/e', 3)

      expect(cache.leaves('/a')).toEqual([
        ['/a/b', 1],
        ['/a/c/d', 2]
      ])
      expect(cache.leaves('/e')).toEqual([['/e', 3]])
      expect(cache.leaves('/missing')).toEqual([])
    })
  })

  describe('serialization', () => {
    it('should round-trip through JSON', () => {
      const cache = new PathCache<number>()
      cache.set('/a/b', 1)
      cache.set('/c', 2)

      const restored = PathCache.fromJSON(JSON.parse(JSON.stringify(cache.toJSON())), isNumber)

      expect(restored.get('/a/b')).toEqual({ hit: true, value: 1 })
      expect(restored.get('/c')).toEqual({ hit: true, value: 2 })
    })

    it('should round-trip a segment named like an object prototype key', () => {
      const cache = new PathCache<number>()
      cache.set('/names/__proto__', 1)

      const json = cache.toJSON()
      const restored = PathCache.fromJSON(JSON.parse(JSON.stringify(json)), isNumber)

      expect(JSON.stringify(json)).toBe(
        '{"kind":"interior","children":{"names":{"kind":"interior","children":{"__proto__":{"kind":"leaf","value":1}}}}}'
      )
      expect(restored.keys('/names')).toEqual(['__proto__'])
      expect(restored.get('/names/__proto__')).toEqual({ hit: true, value: 1 })
    })

    it('should persist the tagged node shape', () => {
      const cache = new PathCache<number>()
      cache.set('/a', 1)

      expect(cache.toJSON()).toEqual({
        kind: 'interior',
        children: { a: { kind: 'leaf', value: 1 } }
      })
    })

    it('should reject malformed trees and values', () => {
      expect(() => PathCache.fromJSON({ kind: 'leaf', value: 1 }, isNumber)).toThrow(TypeError)
      expect(() => PathCache.fromJSON({ kind: 'interior' }, isNumber)).toThrow(TypeError)
      expect(() =>
        PathCache.fromJSON(
          { kind: 'interior', children: { a: { kind: 'leaf', value: 'x' } } },
          isNumber
        )
      ).toThrow('Unexpected cache value at /a')
    })
  })
})
