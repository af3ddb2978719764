/**
 * Binder Command
 *
 * Layout flags fall back to the binderRows, binderColumns and imageSize
 * settings.
 */

import { createBinder, deleteBinder, editBinder, listBinders, showBinder } from '../../actions/binder'
import { ActionError } from '../../actions/context'
import { type ImageSize, isImageSize } from '../../catalog/paths'
import type { Logger } from '../../logger'
import type { BinderLayout } from '../../types/collection'
import { type CLIArgs, operand } from '../args'
import type { Config } from '../config'
import { initCommandContext } from '../context'

export function imageSizeOption(value: string | undefined): ImageSize | undefined {
  if (value === undefined) return undefined
  if (!isImageSize(value)) {
    throw new ActionError(`Unknown image size '${value}'. Use full, large, normal or small.`)
  }
  return value
}

/**
 * Layout from the flags, then the config. Anything still unset takes the
 * binder default.
 */
export function layoutOptions(args: CLIArgs, config: Config): Partial<BinderLayout> {
  const layout: { -readonly [K in keyof BinderLayout]?: BinderLayout[K] } = {}
  const rows = args.rows ?? config.binderRows
  const columns = args.columns ?? config.binderColumns
  const imageSize = imageSizeOption(args.imageSize ?? config.imageSize)
  if (rows !== undefined) layout.rows = rows
  if (columns !== undefined) layout.columns = columns
  if (imageSize !== undefined) layout.imageSize = imageSize
  return layout
}

export async function cmdBinder(args: CLIArgs, logger: Logger): Promise<void> {
  const ctx = await initCommandContext(args, logger)

  switch (args.action) {
    case 'create':
      await createBinder(ctx, operand(args, 0, 'directory'), {
        name: args.name,
        id: args.id,
        inventory: args.inventory,
        listFile: args.listFile,
        layout: layoutOptions(args, ctx.config)
      })
      break

    case 'list':
      listBinders(ctx)
      break

    case 'show':
      showBinder(ctx, operand(args, 0, 'binder ID'), { cards: args.cards })
      break

    case 'edit':
      await editBinder(ctx, operand(args, 0, 'binder ID'), { id: args.id, name: args.name, path: args.path })
      break

    case 'delete':
      await deleteBinder(ctx, operand(args, 0, 'binder ID'), { deleteDirectory: args.deleteDirectory })
      break

    default:
      throw new Error(`Unknown binder action: ${args.action}`)
  }
}
