import type { ParticipantId } from '../types'
import type {
  ArrayFieldDef,
  BooleanFieldDef,
  EnumFieldDef,
  FieldDef,
  InferFieldType,
  JsonFieldDef,
  MapFieldDef,
  NumberFieldDef,
  ObjectFieldDef,
  ReplicationPolicy,
  StringFieldDef,
} from './types'

/**
 * Symbol for accessing schema default value.
 * Hidden from users to keep the builder API clean.
 */
export const schemaDefault = Symbol('schemaDefault')

/**
 * Abstract base class for all field builders.
 * Carries the field definition and, for top-level fields, the replication policy.
 */
export abstract class FieldBuilder<D extends FieldDef = FieldDef, T = unknown> {
  abstract readonly def: D
  policy: ReplicationPolicy<T> = { kind: 'broadcast' }

  abstract [schemaDefault](): T

  /**
   * Send the same value to every participant. This is the default.
   * @returns This builder for chaining
   */
  broadcast(): this {
    this.policy = { kind: 'broadcast' }
    return this
  }

  /**
   * Keep the field on the server. It never appears in a snapshot or patch.
   * @returns This builder for chaining
   */
  serverOnly(): this {
    this.policy = { kind: 'serverOnly' }
    return this
  }

  /**
   * Give each participant a filtered view. Returning `undefined` hides the field from them.
   *
   * @param filter - Pure function of the stored value and the viewing participant
   * @returns This builder for chaining
   *
   * @example
   * ```typescript
   * hand: field.map(field.array(field.string())).perParticipant((hands, pid) => ({ [pid]: hands[pid] ?? [] }))
   * ```
   */
  perParticipant(filter: (value: T, participantId: ParticipantId) => T | undefined): this {
    this.policy = { kind: 'perParticipant', filter }
    return this
  }

  /**
   * Replace the value with the same transformed value for everyone.
   *
   * @param mask - Pure function producing a value of the same type
   * @returns This builder for chaining
   *
   * @example
   * ```typescript
   * deck: field.array(field.string()).masked((cards) => cards.map(() => 'hidden'))
   * ```
   */
  masked(mask: (value: T) => T): this {
    this.policy = { kind: 'masked', mask }
    return this
  }

  /**
   * Give each participant an arbitrary view of the field. The view is replicated as a whole.
   *
   * @param transform - Pure function of the viewing participant and the stored value
   * @returns This builder for chaining
   */
  custom(transform: (participantId: ParticipantId, value: T) => unknown): this {
    this.policy = { kind: 'custom', transform }
    return this
  }
}

/** Any field builder, whatever its value type. */
export type AnyFieldBuilder = FieldBuilder<FieldDef, any>

export class StringFieldBuilder extends FieldBuilder<StringFieldDef, string> {
  def: StringFieldDef = {
    type: 'string',
  }

  /**
   * Set the default value for the string field
   * @param value - The default value
   * @returns This builder for chaining
   */
  default(value: string): this {
    this.def.default = value
    return this
  }

  [schemaDefault](): string {
    return this.def.default ?? ''
  }
}

export class NumberFieldBuilder extends FieldBuilder<NumberFieldDef, number> {
  def: NumberFieldDef

  /**
   * Create a number field builder
   * @param integer - Whether values are restricted to integers
   */
  constructor(integer: boolean) {
    super()
    this.def = {
      type: 'number',
      integer,
    }
  }

  /**
   * Set the default value for the number field
   * @param value - The default value
   * @returns This builder for chaining
   */
  default(value: number): this {
    this.def.default = value
    return this
  }

  [schemaDefault](): number {
    return this.def.default ?? 0
  }
}

export class BooleanFieldBuilder extends FieldBuilder<BooleanFieldDef, boolean> {
  def: BooleanFieldDef = {
    type: 'boolean',
  }

  /**
   * Set the default value for the boolean field
   * @param value - The default value
   * @returns This builder for chaining
   */
  default(value: boolean): this {
    this.def.default = value
    return this
  }

  [schemaDefault](): boolean {
    return this.def.default ?? false
  }
}

export class EnumFieldBuilder<V extends string> extends FieldBuilder<EnumFieldDef, V> {
  def: EnumFieldDef
  private readonly values: readonly V[]
  private defaultValue: V | undefined

  /**
   * Create an enum field builder
   * @param values - Allowed values; the first is the default unless one is set
   */
  constructor(values: readonly V[]) {
    super()
    if (values.length === 0) {
      throw new Error('Enum fields need at least one value')
    }
    this.values = values
    this.def = {
      type: 'enum',
      values,
    }
  }

  /**
   * Set the default value for the enum field
   * @param value - The default value
   * @returns This builder for chaining
   */
  default(value: V): this {
    this.def.default = value
    this.defaultValue = value
    return this
  }

  [schemaDefault](): V {
    return this.defaultValue ?? this.values[0]
  }
}

type InferShape<F extends Record<string, AnyFieldBuilder>> = { [K in keyof F]: InferFieldType<F[K]> }

export class ObjectFieldBuilder<F extends Record<string, AnyFieldBuilder>> extends FieldBuilder<
  ObjectFieldDef,
  InferShape<F>
> {
  def: ObjectFieldDef
  readonly shape: F
  private defaultValue: InferShape<F> | undefined

  constructor(shape: F) {
    super()
    this.shape = shape
    const fields: Record<string, FieldDef> = {}
    for (const [name, builder] of Object.entries(shape)) {
      fields[name] = builder.def
    }
    this.def = {
      type: 'object',
      fields,
    }
  }

  /**
   * Set the default value for the object field
   * @param value - The default value, copied for every new state
   * @returns This builder for chaining
   */
  default(value: InferShape<F>): this {
    this.defaultValue = value
    return this
  }

  [schemaDefault](): InferShape<F> {
    if (this.defaultValue !== undefined) return structuredClone(this.defaultValue)
    return buildShapeDefault(this.shape)
  }
}

export class MapFieldBuilder<V extends AnyFieldBuilder> extends FieldBuilder<MapFieldDef, Record<string, InferFieldType<V>>> {
  def: MapFieldDef
  readonly valueBuilder: V
  private defaultValue: Record<string, InferFieldType<V>> = {}

  constructor(valueBuilder: V) {
    super()
    this.valueBuilder = valueBuilder
    this.def = {
      type: 'map',
      value: valueBuilder.def,
    }
  }

  /**
   * Each participant sees only the entry keyed by their own id.
   * @returns This builder for chaining
   *
   * @example
   * ```typescript
   * hp: field.map(field.number()).perParticipantSlice()
   * // participant "A" sees { A: 80 }, participant "B" sees { B: 100 }
   * ```
   */
  perParticipantSlice(): this {
    this.policy = { kind: 'perParticipantSlice' }
    return this
  }

  /**
   * Set the default value for the map field
   * @param value - The default entries, copied for every new state
   * @returns This builder for chaining
   */
  default(value: Record<string, InferFieldType<V>>): this {
    this.defaultValue = value
    return this
  }

  [schemaDefault](): Record<string, InferFieldType<V>> {
    return structuredClone(this.defaultValue)
  }
}

export class ArrayFieldBuilder<E extends AnyFieldBuilder> extends FieldBuilder<ArrayFieldDef, InferFieldType<E>[]> {
  def: ArrayFieldDef
  readonly elementBuilder: E
  private defaultValue: InferFieldType<E>[] = []

  constructor(elementBuilder: E) {
    super()
    this.elementBuilder = elementBuilder
    this.def = {
      type: 'array',
      element: elementBuilder.def,
    }
  }

  /**
   * Set the default value for the array field
   * @param value - The default elements, copied for every new state
   * @returns This builder for chaining
   */
  default(value: InferFieldType<E>[]): this {
    this.defaultValue = value
    return this
  }

  [schemaDefault](): InferFieldType<E>[] {
    return structuredClone(this.defaultValue)
  }
}

export class JsonFieldBuilder<T> extends FieldBuilder<JsonFieldDef, T> {
  def: JsonFieldDef = {
    type: 'json',
  }
  private initial: T

  constructor(initial: T) {
    super()
    this.initial = initial
  }

  [schemaDefault](): T {
    return structuredClone(this.initial)
  }
}

function buildShapeDefault<F extends Record<string, AnyFieldBuilder>>(shape: F): InferShape<F> {
  const result: Partial<InferShape<F>> = {}
  for (const key of Object.keys(shape) as (keyof F)[]) {
    result[key] = shape[key][schemaDefault]() as InferShape<F>[keyof F]
  }
  return result as InferShape<F>
}

/**
 * Field builder factory for defining state schemas.
 *
 * @example
 * ```typescript
 * const Arena = defineState({
 *   round: field.integer().default(1),
 *   phase: field.enum(['lobby', 'playing', 'ended']),
 *   players: field.map(field.object({ name: field.string(), x: field.number(), y: field.number() })),
 *   hp: field.map(field.number()).perParticipantSlice(),
 *   seed: field.integer().serverOnly(),
 * })
 * ```
 */
export const field = {
  /**
   * Create a string field
   * @returns A string field builder
   */
  string: () => new StringFieldBuilder(),

  /**
   * Create a number field
   * @returns A number field builder
   */
  number: () => new NumberFieldBuilder(false),

  /**
   * Create an integer field
   * @returns A number field builder restricted to integers
   */
  integer: () => new NumberFieldBuilder(true),

  /**
   * Create a boolean field
   * @returns A boolean field builder
   */
  boolean: () => new BooleanFieldBuilder(),

  /**
   * Create an enum field
   * @param values - The allowed values
   * @returns An enum field builder
   *
   * @example
   * ```typescript
   * phase: field.enum(['lobby', 'playing']).default('lobby')
   * ```
   */
  enum: <const V extends string>(values: readonly V[]) => new EnumFieldBuilder<V>(values),

  /**
   * Create an object field with a fixed set of named fields
   * @param shape - Builders for each nested field
   * @returns An object field builder
   */
  object: <F extends Record<string, AnyFieldBuilder>>(shape: F) => new ObjectFieldBuilder(shape),

  /**
   * Create a map field with string keys. Keys become dynamic path segments.
   * @param value - Builder for the entry values
   * @returns A map field builder
   */
  map: <V extends AnyFieldBuilder>(value: V) => new MapFieldBuilder(value),

  /**
   * Create an array field. Arrays are replicated as a whole.
   * @param element - Builder for the elements
   * @returns An array field builder
   */
  array: <E extends AnyFieldBuilder>(element: E) => new ArrayFieldBuilder(element),

  /**
   * Create a field holding an opaque JSON value, replicated as a whole.
   * @param initial - The initial value
   * @returns A JSON field builder
   *
   * @example
   * ```typescript
   * settings: field.json<{ rounds: number }>({ rounds: 3 })
   * ```
   */
  json: <T>(initial: T) => new JsonFieldBuilder<T>(initial),
}
