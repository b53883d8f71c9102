import { PATH_SEPARATOR } from './constants'
import { PathError } from './errors'
import { HIDDEN, viewOf } from './policy'
import type { FieldInfo, StateDef } from './Schema/StateDef'
import type { FieldDef, InferState, StateSchema } from './Schema/types'
import type { FieldPath, ParticipantId, StateSnapshot } from './types'
import { isRecord } from './utils'

export interface SnapshotOptions {
  /** Only include fields written since the last `clearDirty` */
  dirtyOnly?: boolean
  /** Only include these fields */
  fields?: Iterable<string>
}

/** Participant id used to evaluate per-participant policies when verifying a tree. */
export const POLICY_PROBE_PARTICIPANT = '__probe__'

type StateKey<S extends StateSchema> = keyof InferState<S> & string

/** The reading half of a state tree, handed to code that must not mutate state. */
export interface ReadonlyStateTree<S extends StateSchema = StateSchema> {
  readonly def: StateDef<S>
  get<K extends StateKey<S>>(key: K): InferState<S>[K]
  read(path: FieldPath): unknown
  snapshot(participantId?: ParticipantId | null, options?: SnapshotOptions): StateSnapshot
  toObject(): InferState<S>
}

type Container = Record<string, unknown> | unknown[]

/**
 * The replicated state of one room. Every write marks its top-level field dirty;
 * dirty marks carry the write version so a sync round can clear only what it consumed.
 *
 * @example
 * ```typescript
 * const tree = new StateTree(Arena)
 * tree.set('round', 2)
 * tree.write(['hp', 'A'], 80)
 * tree.snapshot('A') // { round: 2, players: {}, hp: { A: 80 } }
 * ```
 */
export class StateTree<S extends StateSchema = StateSchema> implements ReadonlyStateTree<S> {
  readonly def: StateDef<S>
  private readonly values: InferState<S>
  private readonly dirty = new Map<string, number>()
  private writeVersion = 0

  /**
   * @param def - The state definition
   * @param initial - Values overriding the schema defaults
   */
  constructor(def: StateDef<S>, initial: Partial<InferState<S>> = {}) {
    this.def = def
    this.values = { ...def.default(), ...structuredClone(initial) }
  }

  // --- Typed access ---

  get<K extends StateKey<S>>(key: K): InferState<S>[K] {
    return this.values[key]
  }

  /**
   * Replace a top-level field.
   */
  set<K extends StateKey<S>>(key: K, value: InferState<S>[K]): void {
    this.values[key] = value
    this.markDirty(key)
  }

  /**
   * Mutate a top-level field in place and mark it dirty.
   *
   * @example
   * ```typescript
   * tree.update('players', (players) => {
   *   players.A = { x: 0, y: 0 }
   * })
   * ```
   */
  update<K extends StateKey<S>>(key: K, recipe: (draft: InferState<S>[K]) => void): void {
    recipe(this.values[key])
    this.markDirty(key)
  }

  // --- Path access ---

  /**
   * Read the value at a path. Returns undefined for a missing map entry.
   * @throws PathError if the path does not fit the schema
   */
  read(path: FieldPath): unknown {
    const segments = toSegments(path)
    const info = this.requireField(segments, path)
    let current: unknown = this.root()[info.name]
    let def: FieldDef = info.def

    for (let i = 1; i < segments.length; i++) {
      if (current === undefined) return undefined
      const step = descend(def, segments[i], path)
      const container = asContainer(current, path)
      current = getChild(container, segments[i])
      def = step
    }
    return current
  }

  /**
   * Write the value at a path and mark its top-level field dirty.
   * Parent containers must exist.
   * @throws PathError if the path does not fit the schema or a parent is missing
   */
  write(path: FieldPath, value: unknown): void {
    const segments = toSegments(path)
    const info = this.requireField(segments, path)

    if (segments.length === 1) {
      this.root()[info.name] = value
      this.markDirty(info.name)
      return
    }

    const { container, key } = this.resolveParent(segments, info, path)
    if (Array.isArray(container)) {
      const index = toIndex(key, container.length, path)
      container[index] = value
    } else {
      container[key] = value
    }
    this.markDirty(info.name)
  }

  /**
   * Remove the entry at a path: a map entry, an array element or a key inside a JSON value.
   * @throws PathError for top-level fields and object fields, which always exist
   */
  delete(path: FieldPath): void {
    const segments = toSegments(path)
    const info = this.requireField(segments, path)
    if (segments.length === 1) {
      throw new PathError(formatPath(path), 'top-level fields cannot be deleted')
    }

    const { container, key, def } = this.resolveParent(segments, info, path)
    if (def.type === 'object') {
      throw new PathError(formatPath(path), 'object fields cannot be deleted')
    }
    if (Array.isArray(container)) {
      const index = toIndex(key, container.length - 1, path)
      container.splice(index, 1)
    } else {
      delete container[key]
    }
    this.markDirty(info.name)
  }

  private requireField(segments: string[], path: FieldPath): FieldInfo {
    const info = segments.length > 0 ? this.def.field(segments[0]) : undefined
    if (!info) {
      throw new PathError(formatPath(path), `unknown field "${segments[0] ?? ''}"`)
    }
    return info
  }

  private resolveParent(
    segments: string[],
    info: FieldInfo,
    path: FieldPath,
  ): { container: Container; key: string; def: FieldDef } {
    let current: unknown = this.root()[info.name]
    let def: FieldDef = info.def

    for (let i = 1; i < segments.length - 1; i++) {
      const child = descend(def, segments[i], path)
      current = getChild(asContainer(current, path), segments[i])
      if (current === undefined) {
        throw new PathError(formatPath(path), `missing parent "${segments.slice(0, i + 1).join(PATH_SEPARATOR)}"`)
      }
      def = child
    }

    const key = segments[segments.length - 1]
    descend(def, key, path)
    return { container: asContainer(current, path), key, def }
  }

  private root(): Record<string, unknown> {
    const values: unknown = this.values
    if (!isRecord(values)) {
      throw new Error('State values must be an object')
    }
    return values
  }

  // --- Dirty tracking ---

  /**
   * Mark a top-level field dirty without changing it.
   * Use after mutating a value obtained from `get`.
   */
  markDirty(name: string): void {
    this.dirty.set(name, ++this.writeVersion)
  }

  /** Version of the most recent write. */
  get version(): number {
    return this.writeVersion
  }

  isDirty(): boolean {
    return this.dirty.size > 0
  }

  dirtyFields(): ReadonlySet<string> {
    return new Set(this.dirty.keys())
  }

  /**
   * Clear dirty marks made at or before `upToVersion` (all marks by default).
   * Marks made later survive, so writes landing during a sync round are not lost.
   */
  clearDirty(upToVersion = Number.POSITIVE_INFINITY): void {
    for (const [name, version] of this.dirty) {
      if (version <= upToVersion) this.dirty.delete(name)
    }
  }

  // --- Views ---

  /**
   * Policy-filtered copy of the state.
   *
   * @param participantId - The viewer; omit for the broadcast view
   * @param options - Restrict to dirty or named fields
   * @returns Broadcast-visible fields, plus the viewer's own fields when a participant is given
   * @throws PolicyError if a policy fails
   */
  snapshot(participantId: ParticipantId | null = null, options: SnapshotOptions = {}): StateSnapshot {
    const only = options.fields ? new Set(options.fields) : null
    const names = this.def.fieldNames.filter((name) => {
      if (options.dirtyOnly && !this.dirty.has(name)) return false
      return only === null || only.has(name)
    })

    const broadcast = names.filter((name) => this.def.broadcastFields.has(name))
    const result = this.view(null, broadcast)
    if (participantId === null) return result

    const own = names.filter((name) => this.def.participantFields.has(name))
    return { ...result, ...this.view(participantId, own) }
  }

  /**
   * Compute the views of the named fields for one viewer. Hidden fields are skipped.
   * @throws PolicyError if a policy fails
   */
  view(participantId: ParticipantId | null, names: Iterable<string>): StateSnapshot {
    const result: StateSnapshot = {}
    const values = this.root()
    for (const name of names) {
      const info = this.def.field(name)
      if (!info || info.scope === 'hidden') continue
      const view = viewOf(info, values[name], participantId)
      if (view !== HIDDEN) result[name] = view
    }
    return result
  }

  /**
   * Evaluate every policy against the current values.
   * @throws PolicyError if any policy fails
   */
  verifyPolicies(participantId: ParticipantId = POLICY_PROBE_PARTICIPANT): void {
    this.view(null, this.def.broadcastFields)
    this.view(participantId, this.def.participantFields)
  }

  /** Deep copy of the raw values, server-only fields included. */
  toObject(): InferState<S> {
    return structuredClone(this.values)
  }
}

function toSegments(path: FieldPath): string[] {
  return typeof path === 'string' ? path.split(PATH_SEPARATOR) : [...path]
}

function formatPath(path: FieldPath): string {
  return typeof path === 'string' ? path : path.join(PATH_SEPARATOR)
}

/** Definition of the child at `segment`, or PathError if the schema has no such child. */
function descend(def: FieldDef, segment: string, path: FieldPath): FieldDef {
  switch (def.type) {
    case 'object': {
      if (!Object.hasOwn(def.fields, segment)) {
        throw new PathError(formatPath(path), `unknown field "${segment}"`)
      }
      return def.fields[segment]
    }
    case 'map':
      return def.value
    case 'array':
      if (!/^\d+$/.test(segment)) {
        throw new PathError(formatPath(path), `"${segment}" is not an array index`)
      }
      return def.element
    case 'json':
      return def
    default:
      throw new PathError(formatPath(path), `cannot descend into a ${def.type} field`)
  }
}

function asContainer(value: unknown, path: FieldPath): Container {
  if (Array.isArray(value) || isRecord(value)) return value
  throw new PathError(formatPath(path), 'parent is not an object or array')
}

function getChild(container: Container, key: string): unknown {
  if (Array.isArray(container)) return container[Number(key)]
  return Object.hasOwn(container, key) ? container[key] : undefined
}

function toIndex(key: string, max: number, path: FieldPath): number {
  const index = Number(key)
  if (!Number.isInteger(index) || index < 0 || index > max) {
    throw new PathError(formatPath(path), `index ${key} out of range`)
  }
  return index
}
