/**
 * Parser Module
 *
 * Parse card list exports into list entries.
 */

export {
  type ListEntry,
  type ParsedList,
  type ParseLineResult,
  parseList,
  parseListLine,
  type SkippedLine,
  toListLine
} from './tappedout'
