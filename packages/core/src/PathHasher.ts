import { PATH_SEPARATOR, WILDCARD } from './constants'
import { SchemaError } from './errors'
import type { FieldDef } from './Schema/types'
import { fnv1a32 } from './hash'
import type { PatchPath } from './types'

/** A concrete path resolved against the hash table. */
export interface HashedPath {
  hash: number
  pattern: string
  /** Values of the wildcard segments, outermost first. */
  keys: string[]
}

/**
 * Compiles every static path shape of a schema into a 32-bit hash.
 * Map and array entries are wildcard segments (`players.*.position`).
 * Built once per state definition; immutable afterwards.
 */
export class PathHasher {
  private readonly fields: Record<string, FieldDef>
  private readonly patternToHash = new Map<string, number>()
  private readonly hashToPattern = new Map<number, string>()

  /**
   * @param fields - Top-level field definitions
   * @throws SchemaError if two patterns hash to the same value
   */
  constructor(fields: Record<string, FieldDef>) {
    this.fields = fields
    for (const [name, def] of Object.entries(fields)) {
      this.collect(def, [name])
    }
  }

  private collect(def: FieldDef, segments: string[]): void {
    const pattern = segments.join(PATH_SEPARATOR)
    const hash = fnv1a32(pattern)
    const existing = this.hashToPattern.get(hash)
    if (existing !== undefined && existing !== pattern) {
      throw new SchemaError(`Path hash collision between "${existing}" and "${pattern}"`)
    }
    this.patternToHash.set(pattern, hash)
    this.hashToPattern.set(hash, pattern)

    switch (def.type) {
      case 'object':
        for (const [name, child] of Object.entries(def.fields)) {
          this.collect(child, [...segments, name])
        }
        break
      case 'map':
        this.collect(def.value, [...segments, WILDCARD])
        break
      case 'array':
        this.collect(def.element, [...segments, WILDCARD])
        break
    }
  }

  /** Number of patterns in the table. */
  get size(): number {
    return this.patternToHash.size
  }

  /** Every pattern with its hash, in schema order. */
  entries(): [pattern: string, hash: number][] {
    return [...this.patternToHash.entries()]
  }

  hashOf(pattern: string): number | undefined {
    return this.patternToHash.get(pattern)
  }

  patternOf(hash: number): string | undefined {
    return this.hashToPattern.get(hash)
  }

  /**
   * Resolve a concrete path to its hash and wildcard keys.
   * Returns null for paths the schema does not describe, such as paths inside a JSON field.
   */
  split(path: PatchPath): HashedPath | null {
    if (path.length === 0) return null
    let def: FieldDef | undefined = this.fields[path[0]]
    if (def === undefined || !Object.hasOwn(this.fields, path[0])) return null

    const pattern: string[] = [path[0]]
    const keys: string[] = []

    for (let i = 1; i < path.length; i++) {
      const segment = path[i]
      switch (def.type) {
        case 'object':
          if (!Object.hasOwn(def.fields, segment)) return null
          pattern.push(segment)
          def = def.fields[segment]
          break
        case 'map':
          pattern.push(WILDCARD)
          keys.push(segment)
          def = def.value
          break
        case 'array':
          pattern.push(WILDCARD)
          keys.push(segment)
          def = def.element
          break
        default:
          return null
      }
    }

    const joined = pattern.join(PATH_SEPARATOR)
    const hash = this.patternToHash.get(joined)
    if (hash === undefined) return null
    return { hash, pattern: joined, keys }
  }
}
