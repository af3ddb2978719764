/**
 * Catalog API Errors
 */

import { isRecord } from '../types/fields'

/**
 * Error object returned by the catalog service. Sub-conditions are
 * predicates rather than subclasses, so callers can decide per condition
 * (a missing back face is expected for most cards).
 */
export class CatalogApiError extends Error {
  readonly status: number
  readonly details: string
  readonly warnings: readonly string[]

  constructor(details: string | undefined, status = 0, warnings: readonly string[] = []) {
    const text = details ?? 'Catalog API returned an error'
    super(warnings.length > 0 ? `${text} (${warnings.join('; ')})` : text)
    this.name = 'CatalogApiError'
    this.status = status
    this.details = text
    this.warnings = warnings
  }

  isNotFound(): boolean {
    return this.status === 404
  }

  isBadRequest(): boolean {
    return this.status === 400
  }

  /** The card has no face of the kind requested */
  isInvalidFace(): boolean {
    return this.status === 422
  }

  override toString(): string {
    return this.message
  }
}

/**
 * Build an error from a response body. Bodies that are not the service's
 * `{ object: "error", status, details, warnings? }` object still produce an
 * error carrying the HTTP status.
 */
export function parseApiError(body: unknown, httpStatus: number): CatalogApiError {
  if (!isRecord(body) || body['object'] !== 'error') {
    return new CatalogApiError(`Catalog API request failed with HTTP ${httpStatus}`, httpStatus)
  }

  const status = typeof body['status'] === 'number' ? body['status'] : httpStatus
  const details = typeof body['details'] === 'string' ? body['details'] : undefined
  const rawWarnings = body['warnings']
  const warnings = Array.isArray(rawWarnings)
    ? rawWarnings.filter((w): w is string => typeof w === 'string')
    : []

  return new CatalogApiError(details, status, warnings)
}
