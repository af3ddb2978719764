/**
 * Snapshot Files
 *
 * Whole-file JSON persistence shared by the auto-saving stores and the
 * catalog cache. A snapshot is always replaced as a whole: the new content is
 * written to a temp file beside the target and renamed over it, so a crash
 * mid-write leaves the previous snapshot intact.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import type { Logger } from '../logger'
import type { JsonValue } from './types'

export const SNAPSHOT_VERSION = 1

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Type guard for values that survive a JSON round-trip.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (value === null) return true
      if (Array.isArray(value)) return value.every(isJsonValue)
      if (!isPlainObject(value)) return false
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

/**
 * Narrow a JSON value to an object (not an array, not null).
 */
export function isJsonObject(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Outcome of reading a snapshot file.
 */
export type SnapshotRead =
  | { readonly status: 'missing' }
  | { readonly status: 'loaded'; readonly data: Record<string, unknown> }
  | { readonly status: 'unreadable'; readonly reason: string }

/**
 * Read and parse a snapshot. Never throws.
 */
export function readSnapshot(path: string): SnapshotRead {
  if (!existsSync(path)) {
    return { status: 'missing' }
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return { status: 'unreadable', reason: 'snapshot is not a JSON object' }
    }
    const data = Object.fromEntries(Object.entries(parsed))
    if (data['version'] !== SNAPSHOT_VERSION) {
      return { status: 'unreadable', reason: `unsupported snapshot version ${String(data['version'])}` }
    }
    return { status: 'loaded', data }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return { status: 'unreadable', reason }
  }
}

/**
 * Write a snapshot atomically. Failures are logged and reported through the
 * return value rather than thrown.
 */
export function writeSnapshot(path: string, body: Record<string, unknown>, logger: Logger): boolean {
  const tempPath = join(dirname(path), `.${basename(path)}.tmp.${process.pid}`)
  try {
    mkdirSync(dirname(path), { recursive: true })
    const content = JSON.stringify({
      version: SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      ...body
    })
    writeFileSync(tempPath, content)
    renameSync(tempPath, path)
    return true
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    logger.warn(`Couldn't save ${path}: ${reason}`)
    if (existsSync(tempPath)) rmSync(tempPath, { force: true })
    return false
  }
}
