/**
 * Card Command
 */

import { cardImage, searchCard, showCard } from '../../actions/card'
import type { Logger } from '../../logger'
import { type CLIArgs, operand } from '../args'
import { initCommandContext } from '../context'
import { imageSizeOption } from './binder'

export async function cmdCard(args: CLIArgs, logger: Logger): Promise<void> {
  const ctx = await initCommandContext(args, logger)

  switch (args.action) {
    case 'search':
      await searchCard(ctx, args.operands, { fuzzy: args.fuzzy, set: args.set })
      break

    case 'show':
      await showCard(ctx, operand(args, 0, 'set code'), operand(args, 1, 'collector number'), args.lang)
      break

    case 'image':
      await cardImage(ctx, operand(args, 0, 'set code'), operand(args, 1, 'collector number'), {
        size: imageSizeOption(args.imageSize),
        lang: args.lang,
        back: args.back,
        output: args.output
      })
      break

    default:
      throw new Error(`Unknown card action: ${args.action}`)
  }
}
