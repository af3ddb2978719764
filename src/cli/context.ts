/**
 * Command Context
 *
 * Opens the collection store and the catalog client every command runs
 * against, from the CLI flags and the persistent config.
 */

import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { ActionContext } from '../actions/context'
import { AutoSaveObjectStore } from '../cache/object-store'
import { CatalogClient } from '../catalog/client'
import { RateLimiter } from '../catalog/rate-limiter'
import type { Logger } from '../logger'
import { type CollectionRecord, registerCollectionCodecs } from '../types/collection'
import type { CLIArgs } from './args'
import { type Config, loadConfig, resolveHomeDir } from './config'

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Files under the data home directory.
 */
export function homePaths(homeDir: string): { storeFile: string; cacheFile: string; fileStoreDir: string } {
  return {
    storeFile: join(homeDir, 'store.json'),
    cacheFile: join(homeDir, 'catalog-cache.json'),
    fileStoreDir: join(homeDir, 'filestore')
  }
}

export interface CommandContext extends ActionContext {
  readonly config: Config
  readonly homeDir: string
}

export async function initCommandContext(args: CLIArgs, logger: Logger): Promise<CommandContext> {
  const config = (await loadConfig(args.configFile)) ?? {}
  const homeDir = resolveHomeDir(args.homeDir, config)
  await mkdir(homeDir, { recursive: true })
  logger.verbose(`Data directory: ${homeDir}`)

  const { storeFile, cacheFile, fileStoreDir } = homePaths(homeDir)

  const store = new AutoSaveObjectStore<CollectionRecord>(storeFile, { logger })
  registerCollectionCodecs(store)

  const catalog = new CatalogClient({
    cacheFile,
    fileStoreDir,
    baseUrl: config.apiBaseUrl,
    rateLimiter: new RateLimiter({ minIntervalMs: config.requestIntervalMs }),
    catalogTtlMs: config.catalogTtlDays === undefined ? undefined : config.catalogTtlDays * DAY_MS,
    logger
  })

  return { store, catalog, logger, config, homeDir }
}
