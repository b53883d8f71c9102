import type { SnapshotValue } from './types'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isSnapshotRecord(value: SnapshotValue | undefined): value is { [key: string]: SnapshotValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export type SnapshotResult = { ok: true; value: SnapshotValue } | { ok: false; error: string }

/**
 * Structural equality over JSON-like values.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (typeof a !== typeof b || a === null || b === null) return false

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!isEqual(a[i], b[i])) return false
    }
    return true
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a)
    if (aKeys.length !== Object.keys(b).length) return false
    for (const key of aKeys) {
      if (!Object.hasOwn(b, key) || !isEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}

/**
 * Deep copy a stored value into a snapshot value.
 * Fails with a message when the value is not JSON-representable.
 */
export function toSnapshotValue(value: unknown): SnapshotResult {
  const seen = new Set<unknown>()

  const visit = (current: unknown, at: string): SnapshotValue => {
    switch (typeof current) {
      case 'string':
      case 'boolean':
        return current
      case 'number':
        if (!Number.isFinite(current)) throw new SnapshotValueError(`non-finite number at ${at}`)
        return current
      case 'object': {
        if (current === null) return null
        if (seen.has(current)) throw new SnapshotValueError(`circular reference at ${at}`)
        seen.add(current)
        let result: SnapshotValue
        if (Array.isArray(current)) {
          result = current.map((item, i) => visit(item, `${at}/${i}`))
        } else if (isRecord(current) && isPlainObject(current)) {
          const out: { [key: string]: SnapshotValue } = {}
          for (const [key, item] of Object.entries(current)) {
            if (item === undefined) continue
            out[key] = visit(item, `${at}/${key}`)
          }
          result = out
        } else {
          throw new SnapshotValueError(`unsupported object at ${at}`)
        }
        seen.delete(current)
        return result
      }
      default:
        throw new SnapshotValueError(`unsupported ${typeof current} at ${at}`)
    }
  }

  try {
    return { ok: true, value: visit(value, 'value') }
  } catch (error) {
    if (error instanceof SnapshotValueError) return { ok: false, error: error.message }
    throw error
  }
}

class SnapshotValueError extends Error {}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Escape one JSON Pointer segment (RFC 6901).
 */
export function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1')
}

export function unescapePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~')
}

export function toJsonPointer(path: readonly string[]): string {
  return path.map((segment) => `/${escapePointerSegment(segment)}`).join('')
}

export function fromJsonPointer(pointer: string): string[] {
  if (pointer === '') return []
  return pointer.slice(1).split('/').map(unescapePointerSegment)
}
