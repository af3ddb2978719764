/**
 * card-binder Library
 *
 * Organize a trading card collection: cached catalog lookups, inventories
 * of owned cards, and static binder pages built from them.
 *
 * @license AGPL-3.0
 */

export * from './actions/index'
export * from './cache/index'
export * from './catalog/index'
export * from './export/index'
export { createLogger, type Logger, silentLogger } from './logger'
export * from './parser/index'
export * from './types/index'
export { VERSION } from './version'
