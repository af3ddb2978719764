#!/usr/bin/env node
/**
 * card-binder CLI
 *
 * Local front end for the library: parses the command line, opens the
 * collection store and catalog cache, and runs one action.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdBinder } from './cli/commands/binder'
import { cmdCache } from './cli/commands/cache'
import { cmdCard } from './cli/commands/card'
import { cmdConfig } from './cli/commands/config'
import { cmdInventory } from './cli/commands/inventory'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'inventory':
        await cmdInventory(args, logger)
        break

      case 'binder':
        await cmdBinder(args, logger)
        break

      case 'card':
        await cmdCard(args, logger)
        break

      case 'cache':
        await cmdCache(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'card-binder --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
