import { UpdateKind } from './constants'
import { diffSnapshots, snapshotPatches } from './diff'
import { broadcastScope, type DynamicKeyTable, KeyTableStore, participantScope } from './DynamicKeyTable'
import { PatchEncoder } from './PatchEncoder'
import type { StateDef } from './Schema/StateDef'
import type { StateSchema } from './Schema/types'
import type { StateTree } from './StateTree'
import type { FirstSyncUpdate, ParticipantId, ScopedUpdate, StatePatch, StateSnapshot, StateUpdate } from './types'

export interface SyncEngineOptions {
  /** Replace static path shapes with hashes. Defaults to true. */
  pathHashing?: boolean
  /** Slots per key table scope before keys are sent raw. Unbounded by default. */
  maxDynamicKeys?: number
}

/** Output of one sync round. */
export interface SyncRound {
  broadcast: StateUpdate
  participants: Map<ParticipantId, StateUpdate>
}

const NO_CHANGE: StateUpdate = { kind: UpdateKind.NoChange }

/**
 * Computes, per round, a full sync or a diff for the broadcast view and for each
 * participant's own view. Caches hold the last view sent to each target; they are
 * never authoritative and are only touched during a round.
 *
 * @example
 * ```typescript
 * const engine = new SyncEngine(Arena)
 * const round = engine.sync(tree, ['A', 'B'])
 * tree.clearDirty()
 * for (const { scope, update } of updatesFor(round, 'A')) send('A', scope, update)
 * ```
 */
export class SyncEngine<S extends StateSchema = StateSchema> {
  readonly def: StateDef<S>
  readonly keyTables: KeyTableStore
  private readonly encoder: PatchEncoder
  private broadcastCache: StateSnapshot | null = null
  private readonly participantCaches = new Map<ParticipantId, StateSnapshot>()

  constructor(def: StateDef<S>, options: SyncEngineOptions = {}) {
    this.def = def
    this.keyTables = new KeyTableStore(options.maxDynamicKeys)
    this.encoder = new PatchEncoder(options.pathHashing === false ? null : def.pathHasher)
  }

  /**
   * Run one round for the broadcast view and the given participants.
   * Does not clear dirty marks; the caller does once the round is delivered.
   *
   * @throws PolicyError if a policy fails. Caches already advanced by the round are
   * dropped with it, so the next round is a full sync for everyone.
   */
  sync(tree: StateTree<S>, participantIds: Iterable<ParticipantId>): SyncRound {
    const dirty = tree.dirtyFields()
    try {
      const broadcast = this.syncBroadcast(tree, dirty)

      const participants = new Map<ParticipantId, StateUpdate>()
      for (const participantId of participantIds) {
        participants.set(participantId, this.syncParticipant(tree, participantId, dirty))
      }
      return { broadcast, participants }
    } catch (error) {
      this.reset()
      throw error
    }
  }

  /**
   * Full sync on the first call, then diffs of dirty broadcast fields.
   */
  syncBroadcast(tree: StateTree<S>, dirty: ReadonlySet<string> = tree.dirtyFields()): StateUpdate {
    if (this.broadcastCache === null) {
      const view = tree.view(null, this.def.broadcastFields)
      this.broadcastCache = view
      const table = this.keyTables.reset(broadcastScope)
      return { kind: UpdateKind.FirstSync, patches: this.encoder.encode(snapshotPatches(view), table) }
    }

    const fields = [...dirty].filter((name) => this.def.broadcastFields.has(name))
    return this.diff(tree, null, this.broadcastCache, fields, () => this.keyTables.table(broadcastScope))
  }

  /**
   * A participant's first call yields their full sync (broadcast and own fields),
   * later calls diffs of their dirty own fields.
   */
  syncParticipant(
    tree: StateTree<S>,
    participantId: ParticipantId,
    dirty: ReadonlySet<string> = tree.dirtyFields(),
  ): StateUpdate {
    const cache = this.participantCaches.get(participantId)

    if (cache === undefined) {
      const own = tree.view(participantId, this.def.participantFields)
      this.participantCaches.set(participantId, own)
      const table = this.keyTables.reset(participantScope(participantId))
      const full = { ...tree.view(null, this.def.broadcastFields), ...own }

      const update: FirstSyncUpdate = {
        kind: UpdateKind.FirstSync,
        patches: this.encoder.encode(snapshotPatches(full), table),
      }
      const broadcastKeys = this.keyTables.get(broadcastScope)?.entries() ?? []
      if (broadcastKeys.length > 0) update.broadcastKeys = broadcastKeys
      return update
    }

    const fields = [...dirty].filter((name) => this.def.participantFields.has(name))
    return this.diff(tree, participantId, cache, fields, () =>
      this.keyTables.table(participantScope(participantId)),
    )
  }

  private diff(
    tree: StateTree<S>,
    participantId: ParticipantId | null,
    cache: StateSnapshot,
    fields: string[],
    table: () => DynamicKeyTable,
  ): StateUpdate {
    if (fields.length === 0) return NO_CHANGE

    const next = tree.view(participantId, fields)
    const patches: StatePatch[] = diffSnapshots(this.def, cache, next, fields)

    for (const name of fields) {
      if (Object.hasOwn(next, name)) {
        cache[name] = next[name]
      } else {
        delete cache[name]
      }
    }

    if (patches.length === 0) return NO_CHANGE
    return { kind: UpdateKind.Diff, patches: this.encoder.encode(patches, table()) }
  }

  /** Whether the participant has had their full sync since they were last forgotten. */
  hasSynced(participantId: ParticipantId): boolean {
    return this.participantCaches.has(participantId)
  }

  /**
   * Drop everything kept for a participant. Their next round starts with a full sync.
   */
  forget(participantId: ParticipantId): void {
    this.participantCaches.delete(participantId)
    this.keyTables.drop(participantId)
  }

  /** Drop all caches and key tables. The next round is a full sync for everyone. */
  reset(): void {
    this.broadcastCache = null
    this.participantCaches.clear()
    this.keyTables.clear()
  }
}

/**
 * The updates to deliver to one participant for a round, in order.
 * A participant's full sync already contains the broadcast view, so it is sent alone.
 */
export function updatesFor(round: SyncRound, participantId: ParticipantId): ScopedUpdate[] {
  const own = round.participants.get(participantId)
  if (own === undefined) return []
  if (own.kind === UpdateKind.FirstSync) return [{ scope: 'participant', update: own }]

  const updates: ScopedUpdate[] = []
  if (round.broadcast.kind !== UpdateKind.NoChange) updates.push({ scope: 'broadcast', update: round.broadcast })
  if (own.kind !== UpdateKind.NoChange) updates.push({ scope: 'participant', update: own })
  return updates
}
