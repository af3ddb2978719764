/**
 * Cache Path Helpers
 */

import { InvalidPathError } from './errors'

/**
 * Split a slash-delimited path into its non-empty segments.
 * Returns an empty array for the root path ('', '/', '//').
 */
export function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '')
}

/**
 * Canonical string form of a path: segments joined with a leading slash.
 */
export function normalizePath(path: string): string {
  return `/${splitPath(path).join('/')}`
}

/**
 * Split a path that must name a key (not the root).
 */
export function splitKeyPath(path: string): [string[], string] {
  const segments = splitPath(path)
  const last = segments.pop()
  if (last === undefined) {
    throw new InvalidPathError('Empty or root path is not a valid key', path)
  }
  return [segments, last]
}

/**
 * Join path segments, dropping empty ones.
 */
export function joinPath(...parts: readonly string[]): string {
  return normalizePath(parts.join('/'))
}
