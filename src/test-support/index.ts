/**
 * Test Support Module
 *
 * Builders for catalog payloads, fake HTTP responses and domain objects.
 */

import { mkdirSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { HttpResponse } from '../http'
import type { Logger } from '../logger'
import type { OwnedCard } from '../types/card'

/**
 * Fresh directory under the OS temp dir. Callers remove it in afterEach.
 */
export function createTempDir(prefix: string): string {
  const dir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  mkdirSync(dir, { recursive: true })
  return dir
}

export function jsonResponse(status: number, body: unknown): HttpResponse {
  const text = JSON.stringify(body)
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: () => 'application/json' },
    text: async () => text,
    json: async () => JSON.parse(text),
    arrayBuffer: async () => new TextEncoder().encode(text).buffer
  }
}

export function bytesResponse(bytes: readonly number[]): HttpResponse {
  const data = new Uint8Array(bytes)
  return {
    ok: true,
    status: 200,
    headers: { get: () => 'image/jpeg' },
    text: async () => new TextDecoder().decode(data),
    json: async () => {
      throw new SyntaxError('Unexpected token in JSON')
    },
    arrayBuffer: async () => data.buffer
  }
}

export function notFoundBody(details = 'No card found with the given ID or set code and collector number.') {
  return { object: 'error', code: 'not_found', status: 404, details }
}

/**
 * Catalog card payload for a single-faced card.
 */
export function catalogCard(overrides: {
  readonly id?: string
  readonly name: string
  readonly set: string
  readonly number: string
  readonly lang?: string
}) {
  return {
    object: 'card',
    id: overrides.id ?? `id-${overrides.set}-${overrides.number}`,
    lang: overrides.lang ?? 'en',
    layout: 'normal',
    name: overrides.name,
    mana_cost: '{1}{G}',
    type_line: 'Creature — Elf',
    oracle_text: '{T}: Add {G}.',
    power: '1',
    toughness: '1',
    set: overrides.set,
    collector_number: overrides.number,
    rarity: 'common'
  }
}

export type CatalogCardPayload = ReturnType<typeof catalogCard>

/**
 * In-process stand-in for the catalog API, used as the mocked `httpFetch`.
 * Serves cards by set and number, exact-name searches within a set, card
 * images (the bytes of the card ID) and the card back. Anything else is a 404.
 */
export function fakeCatalog(cards: readonly CatalogCardPayload[]): (url: string) => Promise<HttpResponse> {
  return async (url) => {
    const { pathname, searchParams } = new URL(url)
    if (pathname.endsWith('/missing.jpg')) {
      return bytesResponse([0xff, 0xd8, 0xff])
    }
    if (pathname === '/cards/search') {
      const q = searchParams.get('q') ?? ''
      const data = cards.filter((c) => q.includes(`!"${c.name}"`) && q.includes(`set:${c.set}`))
      return data.length > 0 ? jsonResponse(200, { object: 'list', data }) : jsonResponse(404, notFoundBody())
    }
    const [, set, number] = /^\/cards\/([^/]+)\/([^/]+)/.exec(pathname) ?? []
    const card = cards.find((c) => c.set === set && c.collector_number === decodeURIComponent(number ?? ''))
    if (!card) {
      return jsonResponse(404, notFoundBody())
    }
    if (searchParams.get('format') === 'image') {
      return bytesResponse([...Buffer.from(card.id)])
    }
    return jsonResponse(200, card)
  }
}

export interface RecordedLogs {
  readonly log: string[]
  readonly success: string[]
  readonly warn: string[]
  readonly error: string[]
}

/**
 * Logger that keeps what it is given, for assertions.
 */
export function createRecordingLogger(): { logger: Logger; logs: RecordedLogs } {
  const logs: RecordedLogs = { log: [], success: [], warn: [], error: [] }
  const logger: Logger = {
    log: (msg) => logs.log.push(msg),
    verbose: () => {},
    success: (msg) => logs.success.push(msg),
    warn: (msg) => logs.warn.push(msg),
    error: (msg) => logs.error.push(msg),
    progress: () => {}
  }
  return { logger, logs }
}

/**
 * Owned card with default values for testing.
 */
export function createOwnedCard(
  overrides: Partial<OwnedCard> & { readonly name?: string } = {}
): OwnedCard {
  const { name = 'Llanowar Elves', ...rest } = overrides
  return {
    id: 'id-m19-314',
    set: 'm19',
    number: '314',
    lang: 'en',
    rarity: 'common',
    faces: [{ name, type: 'Creature — Elf', cost: '{G}', text: '{T}: Add {G}.' }],
    count: 1,
    foil: false,
    condition: 'mint',
    ...rest
  }
}
