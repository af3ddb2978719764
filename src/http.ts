/**
 * HTTP Utilities
 *
 * The single place outbound requests go through, so tests and offline runs
 * can refuse network access in one spot.
 */

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Check if offline mode is on (no real HTTP requests allowed).
 * Lets a run use only what is already in the catalog cache.
 */
function isOffline(): boolean {
  return process.env.CARD_BINDER_OFFLINE === 'true'
}

/**
 * Check if HTTP requests should be blocked.
 * True when:
 * - Running tests in CI (CI=true + test mode)
 * - Offline mode is on (CARD_BINDER_OFFLINE=true)
 */
function shouldBlockHttpRequests(): boolean {
  return (isCI() && isTestMode()) || isOffline()
}

/**
 * Error thrown when an uncached HTTP request is made while requests are blocked.
 */
export class UncachedHttpRequestError extends Error {
  constructor(url: string) {
    const reason = isOffline() ? 'offline mode is on (CARD_BINDER_OFFLINE=true)' : 'running tests in CI'
    super(`Uncached HTTP request to ${url} blocked: ${reason}.`)
    this.name = 'UncachedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
  arrayBuffer(): Promise<ArrayBufferLike>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws UncachedHttpRequestError when HTTP requests are blocked (CI tests or offline mode)
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new UncachedHttpRequestError(url)
  }
  return fetch(url, init)
}
