import type { ParticipantId } from '../types'
import type { AnyFieldBuilder, FieldBuilder } from './fieldBuilders'

export interface StringFieldDef {
  type: 'string'
  default?: string
}

export interface NumberFieldDef {
  type: 'number'
  integer: boolean
  default?: number
}

export interface BooleanFieldDef {
  type: 'boolean'
  default?: boolean
}

export interface EnumFieldDef {
  type: 'enum'
  values: readonly string[]
  default?: string
}

export interface ObjectFieldDef {
  type: 'object'
  fields: Record<string, FieldDef>
}

/** String-keyed entries. Keys are dynamic path segments. */
export interface MapFieldDef {
  type: 'map'
  value: FieldDef
}

/** Arrays are replicated atomically; element paths are still hashed. */
export interface ArrayFieldDef {
  type: 'array'
  element: FieldDef
}

/** Opaque JSON value, replicated atomically. */
export interface JsonFieldDef {
  type: 'json'
}

export type FieldDef =
  | StringFieldDef
  | NumberFieldDef
  | BooleanFieldDef
  | EnumFieldDef
  | ObjectFieldDef
  | MapFieldDef
  | ArrayFieldDef
  | JsonFieldDef

export type FieldType = FieldDef['type']

/**
 * Replication policy of a top-level field. Fixed for the lifetime of a state tree.
 *
 * - `serverOnly`: never replicated
 * - `broadcast`: the same value for everyone
 * - `perParticipantSlice`: a map keyed by participant id; each participant sees their own entry
 * - `perParticipant`: a filter per participant; `undefined` hides the field
 * - `masked`: the same transformed value for everyone
 * - `custom`: an arbitrary per-participant view, replicated atomically
 */
export type ReplicationPolicy<T = unknown> =
  | { kind: 'serverOnly' }
  | { kind: 'broadcast' }
  | { kind: 'perParticipantSlice' }
  | { kind: 'perParticipant'; filter(value: T, participantId: ParticipantId): T | undefined }
  | { kind: 'masked'; mask(value: T): T }
  | { kind: 'custom'; transform(participantId: ParticipantId, value: T): unknown }

export type PolicyKind = ReplicationPolicy['kind']

/** Schema object passed to `defineState`. */
export type StateSchema = Record<string, AnyFieldBuilder>

/** Infer the value type of a field builder. */
export type InferFieldType<B> = B extends FieldBuilder<FieldDef, infer T> ? T : never

/**
 * Infer the state type from a schema.
 *
 * @example
 * ```typescript
 * const Arena = defineState({ round: field.integer(), hp: field.map(field.number()).perParticipantSlice() })
 * type ArenaState = InferState<typeof Arena.schema> // { round: number; hp: Record<string, number> }
 * ```
 */
export type InferState<S extends StateSchema> = { [K in keyof S]: InferFieldType<S[K]> }
