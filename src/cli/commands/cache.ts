/**
 * Cache Command
 */

import { clearCache, listCache } from '../../actions/cache'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import { initCommandContext } from '../context'

export async function cmdCache(args: CLIArgs, logger: Logger): Promise<void> {
  const ctx = await initCommandContext(args, logger)
  const path = args.operands[0] ?? '/'

  switch (args.action) {
    case 'list':
      listCache(ctx, path, { images: args.images })
      break

    case 'clear':
      clearCache(ctx, path, { images: args.images })
      break

    default:
      throw new Error(`Unknown cache action: ${args.action}`)
  }
}
