/**
 * Cache Actions
 *
 * Inspect and clear the catalog's response and image caches.
 */

import { normalizePath } from '../cache/path'
import type { ActionContext } from './context'

export interface CacheActionOptions {
  /** Work on the image cache instead of the response cache */
  readonly images?: boolean | undefined
}

function cacheLabel(options: CacheActionOptions): string {
  return options.images ? 'image cache' : 'response cache'
}

/**
 * Print the child keys at a cache path.
 */
export function listCache(ctx: ActionContext, path = '/', options: CacheActionOptions = {}): string[] {
  const keys = ctx.catalog.cacheKeys(path, options)
  if (keys.length === 0) {
    ctx.logger.log(`(Nothing in the ${cacheLabel(options)} at ${normalizePath(path)})`)
  }
  for (const key of keys) {
    ctx.logger.log(key)
  }
  return keys
}

/**
 * Drop everything at and below a cache path. Clearing the image cache also
 * deletes the image files.
 */
export function clearCache(ctx: ActionContext, path = '/', options: CacheActionOptions = {}): void {
  ctx.catalog.clearCache(path, options)
  ctx.logger.success(`Cleared ${normalizePath(path)} from the ${cacheLabel(options)}`)
}
