/**
 * Blob File Cache
 *
 * Stores binary payloads (card images) as files under a root directory. The
 * path tree only keeps `{ filepath, size }` metadata; the file holds the bytes.
 *
 * Directory structure mirrors the cache path:
 * ```
 * <root>/images/set-M21/card-001/M21-001-front-large-en.jpg
 *                                ^ cache path /images/set-M21/card-001/M21-001-front-large-en.jpg
 * ```
 *
 * The metadata is authoritative for what should exist. A file that has gone
 * missing or was truncated is treated as a miss and its metadata is dropped,
 * so the caller simply fetches it again.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { silentLogger, type Logger } from '../logger'
import { ConfigurationError, InvalidPathError } from './errors'
import { splitKeyPath } from './path'
import { PathCache } from './path-cache'
import type { BlobEntry, BlobHit, Lookup, PersistedNode } from './types'

interface BlobFileCacheOptions {
  /** Metadata restored from a previous run */
  readonly index?: PathCache<BlobEntry> | undefined
  readonly logger?: Logger | undefined
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Type guard for blob metadata loaded from disk.
 */
export function isBlobEntry(value: unknown): value is BlobEntry {
  if (typeof value !== 'object' || value === null) return false
  const filepath: unknown = Reflect.get(value, 'filepath')
  const size: unknown = Reflect.get(value, 'size')
  return typeof filepath === 'string' && Number.isInteger(size) && Number(size) >= 0
}

export class BlobFileCache {
  readonly rootDir: string
  private readonly index: PathCache<BlobEntry>
  private readonly logger: Logger

  /**
   * @throws ConfigurationError if `rootDir` exists and is not a directory, or
   * cannot be created
   */
  constructor(rootDir: string, options: BlobFileCacheOptions = {}) {
    this.rootDir = resolve(rootDir)
    this.index = options.index ?? new PathCache<BlobEntry>()
    this.logger = options.logger ?? silentLogger

    if (existsSync(this.rootDir)) {
      if (!statSync(this.rootDir).isDirectory()) {
        throw new ConfigurationError(`${this.rootDir} exists and is not a directory`)
      }
      return
    }
    try {
      mkdirSync(this.rootDir, { recursive: true })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConfigurationError(`Could not create file cache at ${this.rootDir}: ${reason}`)
    }
  }

  /**
   * Write a payload to its file and record it. If the write fails the
   * metadata entry is removed again before the error is rethrown.
   */
  set(path: string, data: Uint8Array): BlobEntry {
    const filepath = this.filePathFor(path)
    const entry: BlobEntry = { filepath, size: data.byteLength }
    this.index.set(path, entry)

    try {
      mkdirSync(dirname(filepath), { recursive: true })
      writeFileSync(filepath, data)
    } catch (error) {
      this.index.clear(path)
      throw error
    }
    return entry
  }

  /**
   * Read a payload back. `convert` is applied to the bytes on a hit.
   */
  get(path: string): Lookup<BlobHit<Buffer>>
  get<T>(path: string, convert: (data: Buffer) => T): Lookup<BlobHit<T>>
  get<T>(path: string, convert?: (data: Buffer) => T): Lookup<BlobHit<Buffer | T>> {
    const meta = this.index.get(path)
    if (!meta.hit) {
      return { hit: false, value: undefined }
    }

    const entry = meta.value
    const bytes = this.readFile(entry)
    if (bytes === undefined || bytes.byteLength < entry.size) {
      this.logger.verbose(`Backing file for ${path} is missing or truncated; dropping it`)
      this.index.clear(path)
      return { hit: false, value: undefined }
    }

    const data = bytes.subarray(0, entry.size)
    return { hit: true, value: { data: convert ? convert(data) : data, entry } }
  }

  /**
   * Delete every file under a path, then its metadata. The root path
   * deletes everything this cache tracks.
   */
  clear(path: string): void {
    for (const [, entry] of this.index.leaves(path)) {
      rmSync(entry.filepath, { force: true })
    }
    this.index.clear(path)
  }

  reset(): void {
    this.clear('/')
  }

  /**
   * Child segment names at a path.
   */
  keys(path: string): string[] {
    return this.index.keys(path)
  }

  toJSON(): PersistedNode {
    return this.index.toJSON()
  }

  private filePathFor(path: string): string {
    const [parents, key] = splitKeyPath(path)
    for (const segment of [...parents, key]) {
      if (segment === '.' || segment === '..' || /[\\\0]/.test(segment)) {
        throw new InvalidPathError(`Invalid file cache path ${path}: bad segment '${segment}'`, path)
      }
    }
    return join(this.rootDir, ...parents, key)
  }

  private readFile(entry: BlobEntry): Buffer | undefined {
    try {
      return readFileSync(entry.filepath)
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        return undefined
      }
      throw error
    }
  }
}
