import type { KeyDefinition, ParticipantId } from './types'

/** Result of looking a key up in a table. */
export type SlotLookup = { slot: number; isNew: boolean } | null

/**
 * Maps dynamic key strings to small integer slots in first-seen order.
 * Once full, `lookup` returns null and the key travels raw.
 */
export class DynamicKeyTable {
  private readonly slots = new Map<string, number>()
  private nextSlot = 0
  readonly maxSlots: number

  constructor(maxSlots = Number.POSITIVE_INFINITY) {
    this.maxSlots = maxSlots
  }

  get size(): number {
    return this.slots.size
  }

  /**
   * Get the slot for a key, assigning the next one if the key is new.
   */
  lookup(key: string): SlotLookup {
    const existing = this.slots.get(key)
    if (existing !== undefined) return { slot: existing, isNew: false }
    if (this.nextSlot >= this.maxSlots) return null

    const slot = this.nextSlot++
    this.slots.set(key, slot)
    return { slot, isNew: true }
  }

  slotOf(key: string): number | undefined {
    return this.slots.get(key)
  }

  /** All definitions, in slot order. */
  entries(): KeyDefinition[] {
    const result: KeyDefinition[] = []
    for (const [key, slot] of this.slots) {
      result.push([slot, key])
    }
    return result
  }
}

export type KeyScope = { kind: 'broadcast' } | { kind: 'participant'; participantId: ParticipantId }

export const broadcastScope: KeyScope = { kind: 'broadcast' }

export function participantScope(participantId: ParticipantId): KeyScope {
  return { kind: 'participant', participantId }
}

/**
 * Owns the key tables of one room: a broadcast scope and one scope per participant.
 * Scopes are created when they start (their first full sync) and dropped with the participant.
 */
export class KeyTableStore {
  private broadcast: DynamicKeyTable | null = null
  private readonly participants = new Map<ParticipantId, DynamicKeyTable>()
  private readonly maxSlots: number

  constructor(maxSlots = Number.POSITIVE_INFINITY) {
    this.maxSlots = maxSlots
  }

  /**
   * Start a scope: replaces any existing table for it with an empty one.
   */
  reset(scope: KeyScope): DynamicKeyTable {
    const table = new DynamicKeyTable(this.maxSlots)
    if (scope.kind === 'broadcast') {
      this.broadcast = table
    } else {
      this.participants.set(scope.participantId, table)
    }
    return table
  }

  /**
   * Get the table of a scope, starting it if it does not exist yet.
   */
  table(scope: KeyScope): DynamicKeyTable {
    const existing = this.get(scope)
    return existing ?? this.reset(scope)
  }

  get(scope: KeyScope): DynamicKeyTable | undefined {
    if (scope.kind === 'broadcast') return this.broadcast ?? undefined
    return this.participants.get(scope.participantId)
  }

  drop(participantId: ParticipantId): void {
    this.participants.delete(participantId)
  }

  clear(): void {
    this.broadcast = null
    this.participants.clear()
  }

  /** Participants that currently own a scope. */
  participantIds(): ParticipantId[] {
    return [...this.participants.keys()]
  }
}
