/**
 * Field Readers
 *
 * Checked access to fields of parsed JSON (API responses, stored records,
 * inventory files). Each reader throws a TypeError naming the field when the
 * value has the wrong shape.
 */

export type JsonRecord = { readonly [key: string]: unknown }

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asRecord(value: unknown, what: string): JsonRecord {
  if (!isRecord(value)) {
    throw new TypeError(`Expected ${what} to be an object`)
  }
  return value
}

export function stringField(record: JsonRecord, key: string, what: string): string {
  const value = record[key]
  if (typeof value !== 'string') {
    throw new TypeError(`Expected ${what}.${key} to be a string`)
  }
  return value
}

/**
 * Optional string; null and a missing key both read as undefined.
 */
export function optionalStringField(record: JsonRecord, key: string, what: string): string | undefined {
  const value = record[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new TypeError(`Expected ${what}.${key} to be a string`)
  }
  return value
}

export function numberField(record: JsonRecord, key: string, what: string): number {
  const value = record[key]
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TypeError(`Expected ${what}.${key} to be a number`)
  }
  return value
}

export function booleanField(record: JsonRecord, key: string, what: string, fallback?: boolean): boolean {
  const value = record[key]
  if (value === undefined && fallback !== undefined) return fallback
  if (typeof value !== 'boolean') {
    throw new TypeError(`Expected ${what}.${key} to be a boolean`)
  }
  return value
}

export function arrayField(record: JsonRecord, key: string, what: string): readonly unknown[] {
  const value = record[key]
  if (!Array.isArray(value)) {
    throw new TypeError(`Expected ${what}.${key} to be an array`)
  }
  return value
}

export function stringArrayField(record: JsonRecord, key: string, what: string): string[] {
  return arrayField(record, key, what).map((item, i) => {
    if (typeof item !== 'string') {
      throw new TypeError(`Expected ${what}.${key}[${i}] to be a string`)
    }
    return item
  })
}
