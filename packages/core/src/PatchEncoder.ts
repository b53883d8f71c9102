import { PatchOpcode } from './constants'
import type { DynamicKeyTable } from './DynamicKeyTable'
import type { PathHasher } from './PathHasher'
import type { DynamicKeyToken, DynamicKeyTokens, KeyDefinition, StatePatch, WirePatch } from './types'
import { toJsonPointer } from './utils'

/**
 * A two-element array is a slot definition iff it is `[integer, string]`.
 * Any other array is a list of tokens, one per wildcard.
 */
export function isKeyDefinition(value: unknown): value is KeyDefinition {
  return (
    Array.isArray(value) && value.length === 2 && Number.isInteger(value[0]) && typeof value[1] === 'string'
  )
}

/**
 * Compresses logical patches for the wire: static path shapes become hashes,
 * wildcard segments become slots of the scope's key table.
 * Without a hasher every path is sent as a JSON Pointer.
 */
export class PatchEncoder {
  private readonly hasher: PathHasher | null

  constructor(hasher: PathHasher | null) {
    this.hasher = hasher
  }

  /**
   * @param patches - Logical patches of one sync target
   * @param table - Key table of the target's scope
   */
  encode(patches: readonly StatePatch[], table: DynamicKeyTable): WirePatch[] {
    return patches.map((patch) => this.encodePatch(patch, table))
  }

  private encodePatch(patch: StatePatch, table: DynamicKeyTable): WirePatch {
    const hashed = this.hasher?.split(patch.path) ?? null
    const wire: WirePatch = hashed
      ? { path: hashed.hash, op: PatchOpcode[patch.op] }
      : { path: toJsonPointer(patch.path), op: PatchOpcode[patch.op] }

    if (hashed && hashed.keys.length > 0) {
      wire.keys = encodeKeys(hashed.keys, table)
    }
    if (patch.value !== undefined) {
      wire.value = patch.value
    }
    return wire
  }
}

function encodeKeys(keys: string[], table: DynamicKeyTable): DynamicKeyTokens {
  if (keys.length === 1) return encodeKey(keys[0], table)

  const tokens = keys.map((key) => encodeKey(key, table))
  // [slot, raw] would read as a definition; define the outer key again instead.
  if (tokens.length === 2 && typeof tokens[0] === 'number' && typeof tokens[1] === 'string') {
    tokens[0] = [tokens[0], keys[0]]
  }
  return tokens
}

function encodeKey(key: string, table: DynamicKeyTable): DynamicKeyToken {
  const lookup = table.lookup(key)
  if (lookup === null) return key
  return lookup.isNew ? [lookup.slot, key] : lookup.slot
}
