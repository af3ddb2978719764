/**
 * Auto-Saving Store
 *
 * A PathCache of JSON values persisted to a single snapshot file. Every
 * mutation rewrites the whole file unless a batch is open; `commit()` then
 * writes once for the whole batch.
 *
 * Snapshot format:
 * ```json
 * { "version": 1, "savedAt": "2026-01-01T00:00:00.000Z", "tree": { "kind": "interior", "children": {} } }
 * ```
 */

import { silentLogger, type Logger } from '../logger'
import { PathCache } from './path-cache'
import { isJsonValue, readSnapshot, writeSnapshot } from './snapshot'
import type { GetOptions, JsonValue, Lookup } from './types'

export interface StoreOptions {
  readonly logger?: Logger | undefined
}

/**
 * Shared persistence and batching for the stores. Subclasses decide how a
 * value maps to and from its stored JSON form.
 */
export abstract class PersistentStore<V> {
  readonly filePath: string
  protected readonly logger: Logger
  private readonly cache: PathCache<JsonValue>
  private batching = false

  constructor(filePath: string, options: StoreOptions = {}) {
    this.filePath = filePath
    this.logger = options.logger ?? silentLogger
    this.cache = this.load()
  }

  protected abstract toStored(value: V): JsonValue
  protected abstract fromStored(stored: JsonValue): V

  get inBatch(): boolean {
    return this.batching
  }

  set(path: string, value: V): void {
    this.cache.set(path, this.toStored(value))
    this.persist()
  }

  /**
   * Look up a value. On a miss `value` is the given default.
   */
  get(path: string): Lookup<V>
  get<D>(path: string, options: { readonly default: D }): Lookup<V, D>
  get<T, D = undefined>(
    path: string,
    options: { readonly convert: (value: V) => T; readonly default?: D | undefined }
  ): Lookup<T, D>
  get<T, D>(path: string, options: GetOptions<V, T, D> = {}): Lookup<V | T, D | undefined> {
    const found = this.cache.get(path)
    if (!found.hit) {
      return { hit: false, value: options.default }
    }
    const value = this.fromStored(found.value)
    return { hit: true, value: options.convert ? options.convert(value) : value }
  }

  clear(path: string): void {
    this.cache.clear(path)
    this.persist()
  }

  reset(): void {
    this.cache.reset()
    this.persist()
  }

  /**
   * Child segment names at a path.
   */
  keys(path: string): string[] {
    return this.cache.keys(path)
  }

  /**
   * Defer persistence until `commit()`. Opening a batch twice is harmless.
   */
  batch(): void {
    this.batching = true
  }

  commit(): void {
    if (!this.batching) return
    this.batching = false
    this.save()
  }

  /**
   * Write the snapshot now, batch or not. Returns false when the write
   * failed; the in-memory state is kept either way.
   */
  save(): boolean {
    return writeSnapshot(this.filePath, { tree: this.cache.toJSON() }, this.logger)
  }

  private persist(): void {
    if (!this.batching) {
      this.save()
    }
  }

  private load(): PathCache<JsonValue> {
    const snapshot = readSnapshot(this.filePath)
    if (snapshot.status === 'missing') {
      return new PathCache()
    }
    if (snapshot.status === 'unreadable') {
      this.logger.warn(`Ignoring unreadable store ${this.filePath}: ${snapshot.reason}`)
      return new PathCache()
    }
    try {
      return PathCache.fromJSON(snapshot.data['tree'], isJsonValue)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.logger.warn(`Ignoring unreadable store ${this.filePath}: ${reason}`)
      return new PathCache()
    }
  }
}

/**
 * Store for plain JSON values.
 */
export class AutoSaveStore extends PersistentStore<JsonValue> {
  protected override toStored(value: JsonValue): JsonValue {
    return value
  }

  protected override fromStored(stored: JsonValue): JsonValue {
    return stored
  }
}
