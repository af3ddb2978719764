/**
 * Actions Module
 *
 * The operations behind each CLI command, run against an ActionContext.
 */

export { BINDER_FILE, type CreateBinderOptions, createBinder, deleteBinder, editBinder, listBinders, showBinder, sortForBinder } from './binder'
export { type CacheActionOptions, clearCache, listCache } from './cache'
export { type CardImageOptions, cardImage, formatCard, type SearchCardOptions, searchCard, showCard } from './card'
export {
  type ActionContext,
  ActionError,
  BINDERS,
  chooseNaming,
  INVENTORIES,
  type Naming,
  readIndex,
  type RecordKind
} from './context'
export {
  addCardsToInventory,
  boardLine,
  createInventory,
  type DeleteOptions,
  deleteInventory,
  describeCard,
  type EditOptions,
  editInventory,
  INVENTORY_FILE,
  listInventories,
  type ShowInventoryOptions,
  showInventory
} from './inventory'
