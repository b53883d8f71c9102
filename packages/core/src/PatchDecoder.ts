import { PATH_SEPARATOR, PatchOpcode, UpdateKind, WILDCARD } from './constants'
import { StaleSlotError } from './errors'
import { isKeyDefinition } from './PatchEncoder'
import type { PathHasher } from './PathHasher'
import type {
  DynamicKeyToken,
  DynamicKeyTokens,
  KeyDefinition,
  PatchOperation,
  StatePatch,
  StateUpdate,
  UpdateScope,
  WirePatch,
} from './types'
import { fromJsonPointer } from './utils'

const OPERATIONS: Record<number, PatchOperation> = {
  [PatchOpcode.set]: 'set',
  [PatchOpcode.delete]: 'delete',
  [PatchOpcode.add]: 'add',
}

/**
 * Receiving side of the patch compression: turns wire patches back into logical
 * patches, keeping one key table per scope as the sender does.
 *
 * @example
 * ```typescript
 * const decoder = new PatchDecoder(Arena.pathHasher)
 * const view = {}
 * for (const { scope, update } of updates) applyPatches(view, decoder.decode(update, scope))
 * ```
 */
export class PatchDecoder {
  private readonly hasher: PathHasher
  private broadcastSlots = new Map<number, string>()
  private participantSlots = new Map<number, string>()

  constructor(hasher: PathHasher) {
    this.hasher = hasher
  }

  /**
   * @param update - An update as produced by the sync engine
   * @param scope - The key table scope the update was encoded with
   * @throws StaleSlotError on a slot the scope never defined
   */
  decode(update: StateUpdate, scope: UpdateScope = 'participant'): StatePatch[] {
    if (update.kind === UpdateKind.NoChange) return []

    if (update.kind === UpdateKind.FirstSync) {
      if (scope === 'participant') {
        this.participantSlots = new Map()
        this.broadcastSlots = new Map<number, string>(update.broadcastKeys ?? [])
      } else {
        this.broadcastSlots = new Map()
      }
    }

    const slots = scope === 'broadcast' ? this.broadcastSlots : this.participantSlots
    return update.patches.map((patch) => this.decodePatch(patch, slots, scope))
  }

  private decodePatch(patch: WirePatch, slots: Map<number, string>, scope: UpdateScope): StatePatch {
    const op = OPERATIONS[patch.op]
    if (op === undefined) {
      throw new Error(`Unknown patch opcode ${patch.op}`)
    }

    const path =
      typeof patch.path === 'string' ? fromJsonPointer(patch.path) : this.expand(patch.path, patch.keys, slots, scope)
    const result: StatePatch = { path, op }
    if (patch.value !== undefined) result.value = patch.value
    return result
  }

  private expand(
    hash: number,
    tokens: DynamicKeyTokens | undefined,
    slots: Map<number, string>,
    scope: UpdateScope,
  ): string[] {
    const pattern = this.hasher.patternOf(hash)
    if (pattern === undefined) {
      throw new Error(`Unknown path hash ${hash}`)
    }

    const segments = pattern.split(PATH_SEPARATOR)
    const wildcards = segments.filter((segment) => segment === WILDCARD).length
    const keys = tokenList(tokens, wildcards).map((token) => resolveToken(token, slots, scope))
    if (keys.length !== wildcards) {
      throw new Error(`Path ${pattern} needs ${wildcards} keys, got ${keys.length}`)
    }

    let next = 0
    return segments.map((segment) => (segment === WILDCARD ? keys[next++] : segment))
  }
}

/** The decoder knows the wildcard count from the path pattern, so a single token is never read as a list. */
function tokenList(tokens: DynamicKeyTokens | undefined, wildcards: number): DynamicKeyToken[] {
  if (tokens === undefined) return []
  if (wildcards === 1 || !Array.isArray(tokens) || isKeyDefinition(tokens)) return [singleToken(tokens)]
  return tokens
}

function singleToken(tokens: DynamicKeyTokens): DynamicKeyToken {
  if (typeof tokens === 'string' || typeof tokens === 'number' || isKeyDefinition(tokens)) return tokens
  throw new Error('Expected a single dynamic key token')
}

function resolveToken(token: DynamicKeyToken, slots: Map<number, string>, scope: UpdateScope): string {
  if (typeof token === 'string') return token
  if (typeof token === 'number') {
    const key = slots.get(token)
    if (key === undefined) throw new StaleSlotError(token, scope)
    return key
  }
  const [slot, key]: KeyDefinition = token
  slots.set(slot, key)
  return key
}
