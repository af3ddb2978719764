import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { BlobFileCache, isBlobEntry } from './blob-file-cache'
import { ConfigurationError, InvalidPathError } from './errors'
import { PathCache } from './path-cache'

const IMAGE_PATH = '/images/set-M21/card-001/M21-001-front-large-en.jpg'

describe('BlobFileCache', () => {
  let testDir: string
  let rootDir: string

  beforeEach(() => {
    testDir = join(tmpdir(), `blob-cache-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    rootDir = join(testDir, 'filestore')
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('constructor', () => {
    it('should create the root directory', () => {
      new BlobFileCache(rootDir)
      expect(existsSync(rootDir)).toBe(true)
    })

    it('should reject a root that is a file', () => {
      mkdirSync(testDir, { recursive: true })
      writeFileSync(rootDir, 'not a directory')

      expect(() => new BlobFileCache(rootDir)).toThrow(ConfigurationError)
    })
  })

  describe('set and get', () => {
    it('should write the payload to a file mirroring the path', () => {
      const cache = new BlobFileCache(rootDir)
      const bytes = new Uint8Array([1, 2, 3, 4])

      const entry = cache.set(IMAGE_PATH, bytes)

      expect(entry).toEqual({
        filepath: join(rootDir, 'images', 'set-M21', 'card-001', 'M21-001-front-large-en.jpg'),
        size: 4
      })
      expect([...readFileSync(entry.filepath)]).toEqual([1, 2, 3, 4])
    })

    it('should return identical bytes and metadata', () => {
      const cache = new BlobFileCache(rootDir)
      cache.set(IMAGE_PATH, new Uint8Array([9, 8, 7]))

      const result = cache.get(IMAGE_PATH)

      expect(result.hit).toBe(true)
      if (result.hit) {
        expect([...result.value.data]).toEqual([9, 8, 7])
        expect(result.value.entry.size).toBe(3)
      }
    })

    it('should apply convert to the bytes', () => {
      const cache = new BlobFileCache(rootDir)
      cache.set('/text/hello', Buffer.from('hello'))

      const result = cache.get('/text/hello', (data) => data.toString('utf-8'))

      expect(result.hit && result.value.data).toBe('hello')
    })

    it('should miss and drop metadata when the file is deleted', () => {
      const cache = new BlobFileCache(rootDir)
      const entry = cache.set(IMAGE_PATH, new Uint8Array([1, 2]))
      rmSync(entry.filepath)

      expect(cache.get(IMAGE_PATH).hit).toBe(false)
      expect(cache.keys('/images/set-M21/card-001')).toEqual([])

      cache.set(IMAGE_PATH, new Uint8Array([3]))
      expect(cache.get(IMAGE_PATH).hit).toBe(true)
    })

    it('should miss when the file was truncated', () => {
      const cache = new BlobFileCache(rootDir)
      const entry = cache.set(IMAGE_PATH, new Uint8Array([1, 2, 3]))
      writeFileSync(entry.filepath, new Uint8Array([1]))

      expect(cache.get(IMAGE_PATH).hit).toBe(false)
    })

    it('should reject segments that could leave the root', () => {
      const cache = new BlobFileCache(rootDir)

      expect(() => cache.set('/images/../../escape', new Uint8Array([1]))).toThrow(InvalidPathError)
      expect(() => cache.set('/images/./x', new Uint8Array([1]))).toThrow(InvalidPathError)
      expect(() => cache.set('/images/a\\b', new Uint8Array([1]))).toThrow(InvalidPathError)
      expect(cache.keys('/')).toEqual([])
    })

    it('should roll back metadata when the write fails', () => {
      const cache = new BlobFileCache(rootDir)
      // A file where a directory is needed makes mkdir fail
      mkdirSync(join(rootDir, 'images'), { recursive: true })
      writeFileSync(join(rootDir, 'images', 'blocked'), 'x')

      expect(() => cache.set('/images/blocked/file.jpg', new Uint8Array([1]))).toThrow()
      expect(cache.keys('/images/blocked')).toEqual([])
      expect(cache.get('/images/blocked/file.jpg').hit).toBe(false)
    })
  })

  describe('clear', () => {
    it('should delete every file under the path', () => {
      const cache = new BlobFileCache(rootDir)
      const a = cache.set('/images/set-M21/a.jpg', new Uint8Array([1]))
      const b = cache.set('/images/set-M21/b.jpg', new Uint8Array([2]))
      const c = cache.set('/images/set-KHM/c.jpg', new Uint8Array([3]))

      cache.clear('/images/set-M21')

      expect(existsSync(a.filepath)).toBe(false)
      expect(existsSync(b.filepath)).toBe(false)
      expect(existsSync(c.filepath)).toBe(true)
      expect(cache.keys('/images')).toEqual(['set-KHM'])
    })

    it('should ignore files that are already gone', () => {
      const cache = new BlobFileCache(rootDir)
      const a = cache.set('/a.jpg', new Uint8Array([1]))
      rmSync(a.filepath)

      cache.reset()

      expect(cache.keys('/')).toEqual([])
    })
  })

  describe('persistence', () => {
    it('should reopen from a saved index', () => {
      const first = new BlobFileCache(rootDir)
      first.set(IMAGE_PATH, new Uint8Array([5, 6]))

      const index = PathCache.fromJSON(JSON.parse(JSON.stringify(first.toJSON())), isBlobEntry)
      const second = new BlobFileCache(rootDir, { index })

      const result = second.get(IMAGE_PATH)
      expect(result.hit && [...result.value.data]).toEqual([5, 6])
    })
  })
})

describe('isBlobEntry', () => {
  it('should accept file metadata', () => {
    expect(isBlobEntry({ filepath: '/tmp/x', size: 3 })).toBe(true)
  })

  it('should reject anything else', () => {
    expect(isBlobEntry({ filepath: '/tmp/x' })).toBe(false)
    expect(isBlobEntry({ filepath: '/tmp/x', size: -1 })).toBe(false)
    expect(isBlobEntry('x')).toBe(false)
  })
})
