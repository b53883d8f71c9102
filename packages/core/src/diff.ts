import type { StateDef } from './Schema/StateDef'
import type { FieldDef } from './Schema/types'
import type { PatchPath, SnapshotValue, StatePatch, StateSnapshot } from './types'
import { isEqual, isSnapshotRecord } from './utils'

/**
 * Compare two views of a state and return the patches turning `prev` into `next`.
 * Objects and maps are compared key by key; arrays, JSON values and atomic views
 * are replaced as a whole.
 *
 * @param def - The state definition the views belong to
 * @param prev - The view last delivered
 * @param next - The current view
 * @param fields - Only compare these fields (the dirty ones); all fields when omitted
 */
export function diffSnapshots(
  def: StateDef,
  prev: StateSnapshot,
  next: StateSnapshot,
  fields?: Iterable<string>,
): StatePatch[] {
  const patches: StatePatch[] = []
  const names = fields ? [...fields] : unionKeys(prev, next)

  for (const name of names) {
    const info = def.field(name)
    const hadPrev = Object.hasOwn(prev, name)
    const hasNext = Object.hasOwn(next, name)

    if (hadPrev && hasNext) {
      const fieldDef = info && !info.atomic ? info.def : undefined
      diffValues(prev[name], next[name], [name], fieldDef, patches)
    } else if (hasNext) {
      patches.push({ path: [name], op: 'add', value: next[name] })
    } else if (hadPrev) {
      patches.push({ path: [name], op: 'delete' })
    }
  }

  return patches
}

/**
 * One `set` per field: the patch set of a full sync.
 */
export function snapshotPatches(snapshot: StateSnapshot): StatePatch[] {
  return Object.entries(snapshot).map(([name, value]) => ({ path: [name], op: 'set', value }))
}

function diffValues(
  prev: SnapshotValue,
  next: SnapshotValue,
  path: PatchPath,
  def: FieldDef | undefined,
  patches: StatePatch[],
): void {
  if (isEqual(prev, next)) return

  const keyed = def !== undefined && (def.type === 'object' || def.type === 'map')
  if (!keyed || !isSnapshotRecord(prev) || !isSnapshotRecord(next)) {
    patches.push({ path, op: 'set', value: next })
    return
  }

  for (const key of unionKeys(prev, next)) {
    const hadPrev = Object.hasOwn(prev, key)
    const hasNext = Object.hasOwn(next, key)
    const childPath = [...path, key]

    if (hadPrev && hasNext) {
      diffValues(prev[key], next[key], childPath, childDef(def, key), patches)
    } else if (hasNext) {
      patches.push({ path: childPath, op: 'add', value: next[key] })
    } else {
      patches.push({ path: childPath, op: 'delete' })
    }
  }
}

function childDef(def: FieldDef, key: string): FieldDef | undefined {
  if (def.type === 'map') return atomicOrKeyed(def.value)
  if (def.type === 'object' && Object.hasOwn(def.fields, key)) return atomicOrKeyed(def.fields[key])
  return undefined
}

function atomicOrKeyed(def: FieldDef): FieldDef | undefined {
  return def.type === 'array' || def.type === 'json' ? undefined : def
}

/** Keys of `next` in order, then keys only `prev` has. */
function unionKeys(prev: Record<string, unknown>, next: Record<string, unknown>): string[] {
  const keys = Object.keys(next)
  for (const key of Object.keys(prev)) {
    if (!Object.hasOwn(next, key)) keys.push(key)
  }
  return keys
}
