export { PATH_SEPARATOR, PatchOpcode, PROTOCOL_VERSION, UpdateKind, WILDCARD } from './constants'
export { diffSnapshots, snapshotPatches } from './diff'
export {
  broadcastScope,
  DynamicKeyTable,
  type KeyScope,
  KeyTableStore,
  participantScope,
  type SlotLookup,
} from './DynamicKeyTable'
export { PathError, PolicyError, SchemaError, StaleSlotError } from './errors'
export { fnv1a32 } from './hash'
export { applyPatch, applyPatches } from './patch'
export { PatchDecoder } from './PatchDecoder'
export { isKeyDefinition, PatchEncoder } from './PatchEncoder'
export { type HashedPath, PathHasher } from './PathHasher'
export { HIDDEN, viewOf } from './policy'
export {
  type AnyFieldBuilder,
  ArrayFieldBuilder,
  BooleanFieldBuilder,
  defineState,
  EnumFieldBuilder,
  FieldBuilder,
  type FieldDef,
  type FieldInfo,
  type FieldScope,
  type FieldType,
  field,
  type InferFieldType,
  type InferState,
  JsonFieldBuilder,
  MapFieldBuilder,
  NumberFieldBuilder,
  ObjectFieldBuilder,
  type PolicyKind,
  type ReplicationPolicy,
  StateDef,
  type StateSchema,
  StringFieldBuilder,
} from './Schema'
export { POLICY_PROBE_PARTICIPANT, type ReadonlyStateTree, type SnapshotOptions, StateTree } from './StateTree'
export { type SyncEngineOptions, type SyncRound, SyncEngine, updatesFor } from './SyncEngine'
export type {
  DiffUpdate,
  DynamicKeyToken,
  DynamicKeyTokens,
  FieldPath,
  FirstSyncUpdate,
  KeyDefinition,
  NoChangeUpdate,
  ParticipantId,
  PatchOperation,
  PatchPath,
  ScopedUpdate,
  SnapshotValue,
  StatePatch,
  StateSnapshot,
  StateUpdate,
  UpdateScope,
  WirePatch,
} from './types'
export { fromJsonPointer, isEqual, toJsonPointer } from './utils'
