/**
 * Catalog Module
 *
 * Cached, rate-limited access to the card catalog service.
 */

export {
  CATALOG_TYPES,
  type CardImage,
  CatalogClient,
  type CatalogClientOptions,
  type CatalogType,
  DEFAULT_API_BASE_URL,
  DEFAULT_CATALOG_TTL_MS,
  type ImageOptions,
  type NameLookupOptions,
  type SearchOptions
} from './client'
export { CatalogApiError, parseApiError } from './errors'
export {
  BACK_IMAGE_URL,
  backImagePath,
  cardPath,
  catalogPath,
  defaultNumberPath,
  IMAGE_SIZES,
  type ImageRef,
  type ImageSize,
  idMapPath,
  imageFileName,
  imagePath,
  isImageSize,
  padNumber,
  setInfoPath
} from './paths'
export {
  buildSearchQuery,
  parseCardListResponse,
  parseCardResponse,
  parseCatalogResponse,
  parseSetResponse
} from './parse'
export { DEFAULT_REQUEST_INTERVAL_MS, RateLimiter, type RateLimiterOptions } from './rate-limiter'
