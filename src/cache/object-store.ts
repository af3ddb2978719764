/**
 * Auto-Saving Object Store
 *
 * AutoSaveStore that also accepts domain objects. Each domain type carries an
 * explicit `kind` discriminant; a registered codec for that kind converts the
 * object to a canonical JSON form, stored inside an envelope:
 *
 * ```json
 * { ".meta": "card-binder/object", ".type": "inventory", ".value": { ... } }
 * ```
 *
 * Reading an envelope whose kind is no longer registered returns the raw
 * canonical form instead of failing.
 */

import { PersistentStore } from './auto-save-store'
import { isJsonObject, isJsonValue } from './snapshot'
import type { JsonValue } from './types'

export const OBJECT_MARKER = 'card-binder/object'

/**
 * Anything selectable by a codec.
 */
export interface Storable {
  readonly kind: string
}

export interface Codec<T extends Storable> {
  readonly kind: T['kind']
  toStorage(value: T): JsonValue
  fromStorage(stored: JsonValue): T
}

type Envelope = {
  readonly '.meta': typeof OBJECT_MARKER
  readonly '.type': string
  readonly '.value': JsonValue
}

function isEnvelope(value: JsonValue): value is Envelope {
  if (!isJsonObject(value)) return false
  return value['.meta'] === OBJECT_MARKER && typeof value['.type'] === 'string' && '.value' in value
}

export class AutoSaveObjectStore<S extends Storable> extends PersistentStore<S | JsonValue> {
  private readonly codecs = new Map<string, Codec<S>>()

  /**
   * Register the codec for a kind. A later registration for the same kind
   * replaces the earlier one.
   */
  register<T extends S>(codec: Codec<T>): void {
    this.codecs.set(codec.kind, codec)
  }

  unregister(kind: S['kind']): void {
    this.codecs.delete(kind)
  }

  isRegistered(kind: string): boolean {
    return this.codecs.has(kind)
  }

  protected override toStored(value: S | JsonValue): JsonValue {
    if (this.hasCodec(value)) {
      const codec = this.codecs.get(value.kind)
      if (codec) {
        const envelope: Envelope = {
          '.meta': OBJECT_MARKER,
          '.type': value.kind,
          '.value': codec.toStorage(value)
        }
        return envelope
      }
    }
    if (isJsonValue(value)) {
      return value
    }
    throw new TypeError('Value has no registered codec and is not plain JSON')
  }

  protected override fromStored(stored: JsonValue): S | JsonValue {
    if (!isEnvelope(stored)) {
      return stored
    }
    const codec = this.codecs.get(stored['.type'])
    return codec ? codec.fromStorage(stored['.value']) : stored['.value']
  }

  /**
   * A value whose `kind` names a registered codec is a domain object.
   */
  private hasCodec(value: S | JsonValue): value is S {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
    const kind: unknown = Reflect.get(value, 'kind')
    return typeof kind === 'string' && this.codecs.has(kind)
  }
}
