import type { StatePatch } from './types'
import { isRecord } from './utils'

/**
 * Apply logical patches to a plain state object, in order.
 * Missing parents of `set` and `add` are created as objects.
 *
 * @example
 * ```typescript
 * const view = {}
 * applyPatches(view, [{ path: ['hp'], op: 'set', value: { A: 100 } }, { path: ['hp', 'A'], op: 'set', value: 80 }])
 * // view is { hp: { A: 80 } }
 * ```
 */
export function applyPatches(target: Record<string, unknown>, patches: Iterable<StatePatch>): void {
  for (const patch of patches) {
    applyPatch(target, patch)
  }
}

export function applyPatch(target: Record<string, unknown>, patch: StatePatch): void {
  const { path } = patch
  if (path.length === 0) return

  let parent: Record<string, unknown> = target
  for (let i = 0; i < path.length - 1; i++) {
    const child = parent[path[i]]
    if (isRecord(child)) {
      parent = child
      continue
    }
    if (patch.op === 'delete') return
    const created: Record<string, unknown> = {}
    parent[path[i]] = created
    parent = created
  }

  const key = path[path.length - 1]
  if (patch.op === 'delete') {
    delete parent[key]
  } else {
    parent[key] = structuredClone(patch.value)
  }
}
