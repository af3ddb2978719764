/**
 * Path Cache
 *
 * In-memory hierarchical key-value cache addressed by slash-delimited paths.
 * Values live in leaf nodes; every other node on a path is an interior node,
 * so a whole prefix (e.g. `/sets/m21`) can be cleared in one call.
 *
 * ```
 * /sets/m21/cards/1/en      -> leaf (card data)
 * /sets/m21/info            -> leaf (set data)
 * /id-map/cards/scryfall/x  -> leaf ({ set, number, lang })
 * ```
 */

import { InvalidPathError } from './errors'
import { splitKeyPath, splitPath } from './path'
import type { CacheNode, Lookup, PersistedNode } from './types'

type InteriorNode<V> = Extract<CacheNode<V>, { kind: 'interior' }>

function interior<V>(): InteriorNode<V> {
  return { kind: 'interior', children: new Map() }
}

export class PathCache<V> {
  private readonly root: InteriorNode<V>

  constructor(root?: InteriorNode<V>) {
    this.root = root ?? interior()
  }

  /**
   * Store a value at the given path, creating intermediate nodes as needed.
   * Replaces any value or subtree previously at that path.
   *
   * @throws InvalidPathError for the root path, or when an intermediate
   * segment already holds a value
   */
  set(path: string, value: V): void {
    const [parents, key] = splitKeyPath(path)
    const parent = this.descend(parents, path, true)
    parent?.children.set(key, { kind: 'leaf', value })
  }

  /**
   * Look up the value at the given path. `convert` is only called on a hit.
   * Paths that are absent, or that name an interior node, are misses.
   *
   * @throws InvalidPathError for the root path, or when an intermediate
   * segment holds a value
   */
  get(path: string): Lookup<V>
  get<T>(path: string, convert: (value: V) => T): Lookup<T>
  get<T>(path: string, convert?: (value: V) => T): Lookup<V | T> {
    const [parents, key] = splitKeyPath(path)
    const node = this.descend(parents, path, false)?.children.get(key)
    if (node?.kind !== 'leaf') {
      return { hit: false, value: undefined }
    }
    return { hit: true, value: convert ? convert(node.value) : node.value }
  }

  /**
   * Remove everything at and below the given path. The root path clears the
   * whole cache. Clearing a path that does not exist does nothing.
   */
  clear(path: string): void {
    const segments = splitPath(path)
    const key = segments.pop()
    if (key === undefined) {
      this.root.children.clear()
      return
    }
    const parent = this.find(segments)
    if (parent?.kind === 'interior') {
      parent.children.delete(key)
    }
  }

  /**
   * Remove all entries.
   */
  reset(): void {
    this.clear('/')
  }

  /**
   * Node at the given path, or undefined when there is none.
   * The root path returns the root node. Never throws.
   */
  node(path: string): CacheNode<V> | undefined {
    return this.find(splitPath(path))
  }

  /**
   * Child segment names of the interior node at a path, sorted.
   */
  keys(path: string): string[] {
    const node = this.node(path)
    if (node?.kind !== 'interior') return []
    return [...node.children.keys()].sort()
  }

  /**
   * Every leaf at or below a path, with its full path.
   */
  leaves(path: string): Array<[string, V]> {
    const start = this.node(path)
    const results: Array<[string, V]> = []
    if (!start) return results

    const walk = (node: CacheNode<V>, at: string[]): void => {
      if (node.kind === 'leaf') {
        results.push([`/${at.join('/')}`, node.value])
        return
      }
      for (const [segment, child] of node.children) {
        walk(child, [...at, segment])
      }
    }
    walk(start, splitPath(path))
    return results
  }

  /**
   * Serializable form of the whole tree.
   */
  toJSON(): PersistedNode {
    return toPersisted(this.root)
  }

  /**
   * Rebuild a cache from its serialized form.
   *
   * @throws TypeError when the data is not a serialized tree, or a leaf value
   * is rejected by `isValue`
   */
  static fromJSON<V>(data: unknown, isValue: (value: unknown) => value is V): PathCache<V> {
    const root = fromPersisted(data, isValue, '')
    if (root.kind !== 'interior') {
      throw new TypeError('Serialized cache root must be an interior node')
    }
    return new PathCache(root)
  }

  /**
   * Walk to the interior node named by `segments`. Missing nodes are created
   * when `create` is set; otherwise the walk stops with undefined.
   */
  private descend(
    segments: readonly string[],
    path: string,
    create: boolean
  ): InteriorNode<V> | undefined {
    let cur = this.root
    const walked: string[] = []
    for (const segment of segments) {
      walked.push(segment)
      let next = cur.children.get(segment)
      if (next === undefined) {
        if (!create) return undefined
        next = interior()
        cur.children.set(segment, next)
      }
      if (next.kind !== 'interior') {
        throw new InvalidPathError(
          `Invalid path ${path}: value at /${walked.join('/')} is not a directory`,
          path
        )
      }
      cur = next
    }
    return cur
  }

  private find(segments: readonly string[]): CacheNode<V> | undefined {
    let cur: CacheNode<V> = this.root
    for (const segment of segments) {
      if (cur.kind !== 'interior') return undefined
      const next = cur.children.get(segment)
      if (next === undefined) return undefined
      cur = next
    }
    return cur
  }
}

function toPersisted<V>(node: CacheNode<V>): PersistedNode {
  if (node.kind === 'leaf') {
    return { kind: 'leaf', value: node.value }
  }
  // Own properties for every segment, `__proto__` included
  const children = Object.fromEntries(
    [...node.children].map(([segment, child]): [string, PersistedNode] => [segment, toPersisted(child)])
  )
  return { kind: 'interior', children }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function fromPersisted<V>(
  data: unknown,
  isValue: (value: unknown) => value is V,
  at: string
): CacheNode<V> {
  if (!isRecord(data)) {
    throw new TypeError(`Malformed cache node at ${at || '/'}`)
  }
  if (data['kind'] === 'leaf') {
    const value = data['value']
    if (!isValue(value)) {
      throw new TypeError(`Unexpected cache value at ${at}`)
    }
    return { kind: 'leaf', value }
  }
  const children = data['children']
  if (data['kind'] !== 'interior' || !isRecord(children)) {
    throw new TypeError(`Malformed cache node at ${at || '/'}`)
  }
  const node = interior<V>()
  for (const [segment, child] of Object.entries(children)) {
    node.children.set(segment, fromPersisted(child, isValue, `${at}/${segment}`))
  }
  return node
}
