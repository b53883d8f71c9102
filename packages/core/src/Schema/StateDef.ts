import { PATH_SEPARATOR, WILDCARD } from '../constants'
import { SchemaError } from '../errors'
import { PathHasher } from '../PathHasher'
import {
  type AnyFieldBuilder,
  ArrayFieldBuilder,
  MapFieldBuilder,
  ObjectFieldBuilder,
  schemaDefault,
} from './fieldBuilders'
import type { FieldDef, InferState, PolicyKind, ReplicationPolicy, StateSchema } from './types'

/** Where a field's value is computed during a sync round. */
export type FieldScope = 'hidden' | 'broadcast' | 'participant'

/** Registration-time metadata of one top-level field. */
export interface FieldInfo {
  name: string
  def: FieldDef
  policy: ReplicationPolicy
  scope: FieldScope
  /** Views that are replicated as a whole value rather than diffed key by key. */
  atomic: boolean
}

const SCOPE_BY_POLICY: Record<PolicyKind, FieldScope> = {
  serverOnly: 'hidden',
  broadcast: 'broadcast',
  masked: 'broadcast',
  perParticipantSlice: 'participant',
  perParticipant: 'participant',
  custom: 'participant',
}

/**
 * A registered state schema: the field table, the policy table and the
 * path hash table consumed by state trees and sync engines.
 */
export class StateDef<S extends StateSchema = StateSchema> {
  readonly schema: S
  readonly fields: ReadonlyMap<string, FieldInfo>
  readonly fieldNames: readonly string[]
  readonly broadcastFields: ReadonlySet<string>
  readonly participantFields: ReadonlySet<string>
  readonly pathHasher: PathHasher

  /**
   * @throws SchemaError if the schema cannot be built
   */
  constructor(schema: S) {
    this.schema = schema

    const fields = new Map<string, FieldInfo>()
    const defs: Record<string, FieldDef> = {}
    const broadcastFields = new Set<string>()
    const participantFields = new Set<string>()

    for (const [name, builder] of Object.entries(schema)) {
      validateName(name, name)
      validateNested(builder, name, true)

      const policy = builder.policy
      const scope = SCOPE_BY_POLICY[policy.kind]
      const atomic = policy.kind === 'custom' || isAtomicDef(builder.def)
      fields.set(name, { name, def: builder.def, policy, scope, atomic })
      defs[name] = builder.def

      if (scope === 'broadcast') broadcastFields.add(name)
      if (scope === 'participant') participantFields.add(name)
    }

    if (fields.size === 0) {
      throw new SchemaError('A state schema needs at least one field')
    }

    this.fields = fields
    this.fieldNames = [...fields.keys()]
    this.broadcastFields = broadcastFields
    this.participantFields = participantFields
    this.pathHasher = new PathHasher(defs)
  }

  field(name: string): FieldInfo | undefined {
    return this.fields.get(name)
  }

  /**
   * Create a plain object with every field set to its default value.
   *
   * @example
   * ```typescript
   * const Lobby = defineState({ round: field.integer().default(1), names: field.map(field.string()) })
   * Lobby.default() // { round: 1, names: {} }
   * ```
   */
  default(): InferState<S> {
    const result: Record<string, unknown> = {}
    for (const [name, builder] of Object.entries(this.schema)) {
      result[name] = builder[schemaDefault]()
    }
    return result as InferState<S>
  }
}

function isAtomicDef(def: FieldDef): boolean {
  return def.type === 'array' || def.type === 'json'
}

function validateName(name: string, at: string): void {
  if (name.length === 0) {
    throw new SchemaError(`Empty field name in "${at}"`)
  }
  if (name.includes(PATH_SEPARATOR) || name === WILDCARD) {
    throw new SchemaError(`Field name "${at}" may not contain "${PATH_SEPARATOR}" or be "${WILDCARD}"`)
  }
}

function validateNested(builder: AnyFieldBuilder, at: string, topLevel: boolean): void {
  if (!topLevel && builder.policy.kind !== 'broadcast') {
    throw new SchemaError(`Replication policies apply to top-level fields only; "${at}" has "${builder.policy.kind}"`)
  }

  if (builder instanceof ObjectFieldBuilder) {
    for (const [name, child] of Object.entries<AnyFieldBuilder>(builder.shape)) {
      validateName(name, `${at}.${name}`)
      validateNested(child, `${at}.${name}`, false)
    }
  } else if (builder instanceof MapFieldBuilder || builder instanceof ArrayFieldBuilder) {
    const child: AnyFieldBuilder = builder instanceof MapFieldBuilder ? builder.valueBuilder : builder.elementBuilder
    validateNested(child, `${at}.${WILDCARD}`, false)
  }
}

/**
 * Register a state schema.
 *
 * @param schema - Field builders keyed by field name
 * @returns The state definition
 * @throws SchemaError if the schema cannot be built
 *
 * @example
 * ```typescript
 * const Arena = defineState({
 *   round: field.integer(),
 *   players: field.map(field.object({ x: field.number(), y: field.number() })),
 *   hp: field.map(field.number()).perParticipantSlice(),
 *   seed: field.integer().serverOnly(),
 * })
 * ```
 */
export function defineState<S extends StateSchema>(schema: S): StateDef<S> {
  return new StateDef(schema)
}
