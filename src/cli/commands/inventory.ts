/**
 * Inventory Command
 */

import {
  addCardsToInventory,
  createInventory,
  deleteInventory,
  editInventory,
  listInventories,
  showInventory
} from '../../actions/inventory'
import type { Logger } from '../../logger'
import { type CLIArgs, operand } from '../args'
import { initCommandContext } from '../context'

export async function cmdInventory(args: CLIArgs, logger: Logger): Promise<void> {
  const ctx = await initCommandContext(args, logger)

  switch (args.action) {
    case 'create':
      await createInventory(ctx, operand(args, 0, 'directory'), { name: args.name, id: args.id })
      break

    case 'list':
      listInventories(ctx)
      break

    case 'show':
      showInventory(ctx, operand(args, 0, 'inventory ID'), {
        cards: args.cards,
        board: args.board,
        noMeta: args.noMeta
      })
      break

    case 'edit':
      await editInventory(ctx, operand(args, 0, 'inventory ID'), { id: args.id, name: args.name, path: args.path })
      break

    case 'delete':
      await deleteInventory(ctx, operand(args, 0, 'inventory ID'), { deleteDirectory: args.deleteDirectory })
      break

    case 'add':
      await addCardsToInventory(ctx, operand(args, 0, 'inventory ID'), args.operands.slice(1))
      break

    default:
      throw new Error(`Unknown inventory action: ${args.action}`)
  }
}
