/**
 * Catalog Client
 *
 * Looks cards, sets, images and catalog lists up in the local catalog cache
 * first and only calls the catalog service on a miss:
 *
 * 1. Build the canonical cache path (see ./paths)
 * 2. Hit: return it, with no request and no rate-limit wait
 * 3. Miss: wait for the rate limiter, then request
 * 4. Error response: throw CatalogApiError, cache nothing
 * 5. Success: store the parsed result, save the cache file, return it
 *
 * Card searches and name lookups are never cached: their results change as
 * the catalog grows.
 *
 * Cache file format:
 * ```json
 * { "version": 1, "savedAt": "...", "requests": <tree>, "files": <tree> }
 * ```
 */

import { BlobFileCache, isBlobEntry } from '../cache/blob-file-cache'
import { PathCache } from '../cache/path-cache'
import { isJsonValue, readSnapshot, writeSnapshot } from '../cache/snapshot'
import type { BlobEntry, JsonValue } from '../cache/types'
import { type HttpResponse, httpFetch } from '../http'
import { silentLogger, type Logger } from '../logger'
import { type Card, cardFromJson, cardToJson } from '../types/card'
import { type CardSet, cardSetFromJson, cardSetToJson } from '../types/card-set'
import { asRecord, stringArrayField, stringField } from '../types/fields'
import { VERSION } from '../version'
import { CatalogApiError, parseApiError } from './errors'
import {
  BACK_IMAGE_URL,
  backImageFormat,
  backImagePath,
  cardPath,
  catalogPath,
  defaultNumberPath,
  IMAGE_SIZES,
  type ImageSize,
  idMapPath,
  imagePath,
  setInfoPath
} from './paths'
import {
  buildSearchQuery,
  parseCardListResponse,
  parseCardResponse,
  parseCatalogResponse,
  parseSetResponse
} from './parse'
import { RateLimiter } from './rate-limiter'

export const DEFAULT_API_BASE_URL = 'https://api.scryfall.com'
export const DEFAULT_CATALOG_TTL_MS = 7 * 24 * 60 * 60 * 1000

export const CATALOG_TYPES = [
  'creature-types',
  'planeswalker-types',
  'land-types',
  'artifact-types',
  'enchantment-types',
  'spell-types',
  'keyword-abilities',
  'keyword-actions'
] as const

export type CatalogType = (typeof CATALOG_TYPES)[number]

export interface CatalogClientOptions {
  /** Snapshot file holding the response cache and the image index */
  readonly cacheFile: string
  /** Directory image files are written under */
  readonly fileStoreDir: string
  readonly baseUrl?: string | undefined
  readonly rateLimiter?: RateLimiter | undefined
  /** Age after which catalog lists are fetched again */
  readonly catalogTtlMs?: number | undefined
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export interface CardImage {
  readonly data: Buffer
  /** File extension, e.g. "jpg" */
  readonly format: string
  readonly cachePath: string
}

export interface ImageOptions {
  readonly lang?: string | undefined
  readonly size?: ImageSize | undefined
  readonly back?: boolean | undefined
}

export interface NameLookupOptions {
  readonly fuzzy?: boolean | undefined
  readonly set?: string | undefined
}

export interface SearchOptions {
  readonly exact?: boolean | undefined
  readonly set?: string | undefined
}

interface CardKey {
  readonly set: string
  readonly number: string
  readonly lang: string
}

function parseCardKey(value: JsonValue): CardKey {
  const record = asRecord(value, 'id map entry')
  return {
    set: stringField(record, 'set', 'id map entry'),
    number: stringField(record, 'number', 'id map entry'),
    lang: stringField(record, 'lang', 'id map entry')
  }
}

function parseDefaultNumber(value: JsonValue): string {
  if (typeof value !== 'string') {
    throw new TypeError('Expected default number to be a string')
  }
  return value
}

interface CachedCatalog {
  readonly retrievedAt: string
  readonly data: string[]
}

function parseCachedCatalog(value: JsonValue): CachedCatalog {
  const record = asRecord(value, 'catalog entry')
  return {
    retrievedAt: stringField(record, 'retrievedAt', 'catalog entry'),
    data: stringArrayField(record, 'data', 'catalog entry')
  }
}

async function readBody(response: HttpResponse): Promise<unknown> {
  const text = await response.text()
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

export class CatalogClient {
  readonly cacheFile: string
  private readonly baseUrl: string
  private readonly rateLimiter: RateLimiter
  private readonly catalogTtlMs: number
  private readonly logger: Logger
  private readonly now: () => number
  private readonly requests: PathCache<JsonValue>
  private readonly files: BlobFileCache

  constructor(options: CatalogClientOptions) {
    this.cacheFile = options.cacheFile
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL
    this.rateLimiter = options.rateLimiter ?? new RateLimiter()
    this.catalogTtlMs = options.catalogTtlMs ?? DEFAULT_CATALOG_TTL_MS
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now

    const [requests, index] = this.load()
    this.requests = requests
    this.files = new BlobFileCache(options.fileStoreDir, { index, logger: this.logger })
  }

  /**
   * Card by set code and collector number. Without `lang` the English
   * printing is returned.
   */
  async getCardByNumber(set: string, number: string, lang?: string): Promise<Card> {
    const path = cardPath(set, number, lang)
    const cached = this.lookup(path, cardFromJson)
    if (cached) return cached

    this.logger.verbose(`Cache miss for ${path}; requesting from catalog`)
    const langSegment = lang ? `/${encodeURIComponent(lang)}` : ''
    const body = await this.requestJson(
      `/cards/${encodeURIComponent(set.toLowerCase())}/${encodeURIComponent(number)}${langSegment}`
    )
    const card = parseCardResponse(body)

    this.requests.set(path, cardToJson(card))
    this.requests.set(idMapPath(card.id), { set: card.set, number: card.number, lang: card.lang })
    this.save()
    return card
  }

  /**
   * Card by catalog ID. The ID map points at the card-by-number entry, so
   * both lookups share one cached copy.
   */
  async getCardById(id: string): Promise<Card> {
    const key = this.lookup(idMapPath(id), parseCardKey)
    if (key) {
      return this.getCardByNumber(key.set, key.number, key.lang)
    }

    this.logger.verbose(`Cache miss for ${idMapPath(id)}; requesting from catalog`)
    const card = parseCardResponse(await this.requestJson(`/cards/${encodeURIComponent(id)}`))

    this.requests.set(cardPath(card.set, card.number, card.lang), cardToJson(card))
    this.requests.set(idMapPath(card.id), { set: card.set, number: card.number, lang: card.lang })
    this.save()
    return card
  }

  /**
   * Card by name, exact unless `fuzzy`. Not cached.
   */
  async getCardByName(name: string, options: NameLookupOptions = {}): Promise<Card> {
    const query: Record<string, string> = options.fuzzy ? { fuzzy: name } : { exact: name }
    if (options.set) {
      query['set'] = options.set.toLowerCase()
    }
    return parseCardResponse(await this.requestJson('/cards/named', query))
  }

  /**
   * Cards matching a name, ordered by set and collector number. One result
   * per card unless limited to a set, then one per printing. An empty result
   * is an empty list. Not cached.
   */
  async searchCards(name: string, options: SearchOptions = {}): Promise<Card[]> {
    const query = {
      q: buildSearchQuery({ name, exact: options.exact, set: options.set }),
      unique: options.set ? 'prints' : 'cards',
      order: 'set',
      dir: 'asc'
    }
    try {
      return parseCardListResponse(await this.requestJson('/cards/search', query))
    } catch (error) {
      if (error instanceof CatalogApiError && error.isNotFound()) {
        return []
      }
      throw error
    }
  }

  /**
   * Collector number to assume for a card given only by name and set: the
   * first printing of that name in the set.
   */
  async getCardDefaultNumber(name: string, set: string): Promise<string> {
    const path = defaultNumberPath(set, name)
    const cached = this.lookup(path, parseDefaultNumber)
    if (cached !== undefined) return cached

    this.logger.verbose(`Cache miss for ${path}; searching catalog`)
    const [first] = await this.searchCards(name, { exact: true, set })
    if (!first) {
      throw new CatalogApiError(`No card named '${name}' in set ${set.toUpperCase()}`, 404)
    }

    this.requests.set(path, first.number)
    this.save()
    return first.number
  }

  /**
   * Card image bytes. The default size is `full` (PNG).
   *
   * @throws CatalogApiError with `isInvalidFace()` when a back is requested
   * for a single-faced card
   */
  async getCardImage(set: string, number: string, options: ImageOptions = {}): Promise<CardImage> {
    const size = options.size ?? 'full'
    const { apiName, format } = IMAGE_SIZES[size]
    const path = imagePath({ set, number, lang: options.lang, size, back: options.back })

    const cached = this.files.get(path)
    if (cached.hit) {
      return { data: cached.value.data, format, cachePath: path }
    }

    this.logger.verbose(`Image cache miss for ${path}; requesting from catalog`)
    const langSegment = options.lang ? `/${encodeURIComponent(options.lang)}` : ''
    const query: Record<string, string> = { format: 'image', version: apiName }
    if (options.back) {
      query['face'] = 'back'
    }
    const data = await this.requestBytes(
      this.url(
        `/cards/${encodeURIComponent(set.toLowerCase())}/${encodeURIComponent(number)}${langSegment}`,
        query
      )
    )

    this.files.set(path, data)
    this.save()
    return { data, format, cachePath: path }
  }

  /**
   * The generic card back.
   */
  async getCardBackImage(): Promise<CardImage> {
    const path = backImagePath()
    const format = backImageFormat()

    const cached = this.files.get(path)
    if (cached.hit) {
      return { data: cached.value.data, format, cachePath: path }
    }

    this.logger.verbose(`Image cache miss for ${path}; downloading`)
    const data = await this.requestBytes(BACK_IMAGE_URL)
    this.files.set(path, data)
    this.save()
    return { data, format, cachePath: path }
  }

  async getSet(code: string): Promise<CardSet> {
    const path = setInfoPath(code)
    const cached = this.lookup(path, cardSetFromJson)
    if (cached) return cached

    this.logger.verbose(`Cache miss for ${path}; requesting from catalog`)
    const set = parseSetResponse(
      await this.requestJson(`/sets/${encodeURIComponent(code.toLowerCase())}`)
    )

    this.requests.set(path, cardSetToJson(set))
    this.save()
    return set
  }

  /**
   * A catalog list such as all creature types. Cached entries older than the
   * TTL are dropped and fetched again.
   */
  async getCatalog(catalogType: CatalogType): Promise<string[]> {
    const path = catalogPath(catalogType)
    const cached = this.lookup(path, parseCachedCatalog)
    if (cached) {
      const age = this.now() - Date.parse(cached.retrievedAt)
      if (age <= this.catalogTtlMs) {
        return cached.data
      }
      this.logger.verbose(`Cached ${path} is too old; removing it`)
      this.requests.clear(path)
    }

    this.logger.verbose(`Cache miss for ${path}; requesting from catalog`)
    const data = parseCatalogResponse(await this.requestJson(`/catalog/${catalogType}`))

    this.requests.set(path, { retrievedAt: new Date(this.now()).toISOString(), data })
    this.save()
    return data
  }

  /**
   * Child keys of the response cache (or the image cache) at a path.
   */
  cacheKeys(path: string, options: { readonly images?: boolean | undefined } = {}): string[] {
    return options.images ? this.files.keys(path) : this.requests.keys(path)
  }

  /**
   * Drop a subtree of the response cache, or of the image cache along with
   * its files, and save.
   */
  clearCache(path: string, options: { readonly images?: boolean | undefined } = {}): void {
    if (options.images) {
      this.files.clear(path)
    } else {
      this.requests.clear(path)
    }
    this.save()
  }

  /**
   * Write the cache file. Failures are logged and reported as false.
   */
  save(): boolean {
    return writeSnapshot(
      this.cacheFile,
      { requests: this.requests.toJSON(), files: this.files.toJSON() },
      this.logger
    )
  }

  /**
   * Cached value at a path. An entry that no longer parses is dropped and
   * treated as a miss.
   */
  private lookup<T>(path: string, convert: (value: JsonValue) => T): T | undefined {
    const found = this.requests.get(path)
    if (!found.hit) return undefined
    try {
      return convert(found.value)
    } catch (error) {
      if (!(error instanceof TypeError)) throw error
      this.logger.warn(`Dropping unreadable cache entry ${path}: ${error.message}`)
      this.requests.clear(path)
      return undefined
    }
  }

  private load(): [PathCache<JsonValue>, PathCache<BlobEntry>] {
    const snapshot = readSnapshot(this.cacheFile)
    if (snapshot.status === 'unreadable') {
      this.logger.warn(`Couldn't load catalog cache (${snapshot.reason}); starting a new one`)
    }
    if (snapshot.status !== 'loaded') {
      return [new PathCache(), new PathCache()]
    }
    try {
      return [
        PathCache.fromJSON(snapshot.data['requests'], isJsonValue),
        PathCache.fromJSON(snapshot.data['files'], isBlobEntry)
      ]
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.logger.warn(`Couldn't load catalog cache (${reason}); starting a new one`)
      return [new PathCache(), new PathCache()]
    }
  }

  private url(path: string, query: Record<string, string> = {}): string {
    const url = new URL(path, this.baseUrl)
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value)
    }
    return url.toString()
  }

  private async send(url: string): Promise<HttpResponse> {
    await this.rateLimiter.acquire()
    this.logger.verbose(`GET ${url}`)
    return httpFetch(url, {
      headers: {
        'User-Agent': `card-binder/${VERSION}`,
        Accept: 'application/json;q=0.9,*/*;q=0.8'
      }
    })
  }

  private async requestJson(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const response = await this.send(this.url(path, query))
    const body = await readBody(response)
    if (!response.ok) {
      throw parseApiError(body, response.status)
    }
    return body
  }

  private async requestBytes(url: string): Promise<Buffer> {
    const response = await this.send(url)
    if (!response.ok) {
      throw parseApiError(await readBody(response), response.status)
    }
    return Buffer.from(await response.arrayBuffer())
  }
}
