/**
 * Cache and Store Types
 *
 * Shared shapes for the path cache, the blob file cache and the auto-saving
 * stores built on top of them.
 */

/**
 * Any value that survives a JSON round-trip unchanged.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }

/**
 * Node of the hierarchical cache tree.
 *
 * A node is either a leaf holding a value, or an interior node mapping path
 * segments to child nodes. Only interior nodes can be descended into.
 */
export type CacheNode<V> =
  | { readonly kind: 'leaf'; readonly value: V }
  | { readonly kind: 'interior'; readonly children: Map<string, CacheNode<V>> }

/**
 * On-disk form of a cache node.
 */
export type PersistedNode =
  | { readonly kind: 'leaf'; readonly value: unknown }
  | { readonly kind: 'interior'; readonly children: { readonly [segment: string]: PersistedNode } }

/**
 * Result of a cache or store lookup.
 *
 * On a miss, `value` carries the caller's default (undefined unless one was given).
 */
export type Lookup<T, D = undefined> =
  | { readonly hit: true; readonly value: T }
  | { readonly hit: false; readonly value: D }

/**
 * Metadata recorded for every file tracked by a BlobFileCache.
 */
export interface BlobEntry {
  /** Absolute path of the backing file */
  readonly filepath: string
  /** Byte length of the payload that was written */
  readonly size: number
}

/**
 * A blob read back from a BlobFileCache.
 */
export interface BlobHit<T> {
  readonly data: T
  readonly entry: BlobEntry
}

/**
 * Options accepted by store lookups.
 */
export interface GetOptions<V, T, D> {
  /** Applied to the stored value on a hit, never on a miss */
  readonly convert?: ((value: V) => T) | undefined
  /** Returned as `value` on a miss */
  readonly default?: D | undefined
}
