/**
 * Cache Module
 *
 * Path-addressed caches and auto-saving stores.
 */

export { AutoSaveStore, PersistentStore, type StoreOptions } from './auto-save-store'
export { BlobFileCache, isBlobEntry } from './blob-file-cache'
export { ConfigurationError, InvalidPathError } from './errors'
export { AutoSaveObjectStore, type Codec, OBJECT_MARKER, type Storable } from './object-store'
export { joinPath, normalizePath, splitKeyPath, splitPath } from './path'
export { PathCache } from './path-cache'
export {
  isJsonObject,
  isJsonValue,
  readSnapshot,
  SNAPSHOT_VERSION,
  type SnapshotRead,
  writeSnapshot
} from './snapshot'
export type {
  BlobEntry,
  BlobHit,
  CacheNode,
  GetOptions,
  JsonValue,
  Lookup,
  PersistedNode
} from './types'
