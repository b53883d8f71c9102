import type { PatchOpcode, UpdateKind } from './constants'

/** Stable participant identifier, independent of any connection or session. */
export type ParticipantId = string

/** A JSON-representable value as it appears in snapshots and patches. */
export type SnapshotValue = null | boolean | number | string | SnapshotValue[] | { [key: string]: SnapshotValue }

/** Top-level field name to value. Fields hidden from a view are absent. */
export type StateSnapshot = Record<string, SnapshotValue>

/** Path segments from a top-level field down to the changed value. */
export type PatchPath = readonly string[]

/** Paths accepted by path-level state access: segments, or a dot-separated string. */
export type FieldPath = string | readonly string[]

export type PatchOperation = 'set' | 'delete' | 'add'

/** A change at a logical path. `value` is present for `set` and `add`. */
export interface StatePatch {
  path: PatchPath
  op: PatchOperation
  value?: SnapshotValue
}

/** A key slot definition: `[slot, key]`. */
export type KeyDefinition = [slot: number, key: string]

/**
 * One dynamic key on the wire: a raw key, a reference to a previously
 * defined slot, or a definition of a new slot.
 */
export type DynamicKeyToken = string | number | KeyDefinition

/** A single token for one wildcard, an ordered list (outermost first) for several. */
export type DynamicKeyTokens = DynamicKeyToken | DynamicKeyToken[]

/** A patch as handed to the codec. `path` is a path hash, or a JSON Pointer for unhashed paths. */
export interface WirePatch {
  path: number | string
  keys?: DynamicKeyTokens
  op: PatchOpcode
  value?: SnapshotValue
}

export interface NoChangeUpdate {
  kind: typeof UpdateKind.NoChange
}

export interface FirstSyncUpdate {
  kind: typeof UpdateKind.FirstSync
  patches: WirePatch[]
  /** Broadcast key slots already defined when a participant starts late. */
  broadcastKeys?: KeyDefinition[]
}

export interface DiffUpdate {
  kind: typeof UpdateKind.Diff
  patches: WirePatch[]
}

export type StateUpdate = NoChangeUpdate | FirstSyncUpdate | DiffUpdate

/** Which key table scope an update was encoded with. */
export type UpdateScope = 'broadcast' | 'participant'

/** An update tagged with its scope, as delivered to one participant. */
export interface ScopedUpdate {
  scope: UpdateScope
  update: StateUpdate
}
