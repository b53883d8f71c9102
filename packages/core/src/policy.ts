import { PolicyError } from './errors'
import type { FieldInfo } from './Schema/StateDef'
import type { ParticipantId, SnapshotValue } from './types'
import { isRecord, toSnapshotValue } from './utils'

/** Marker for a field that is absent from a view. */
export const HIDDEN = Symbol('hidden')

/**
 * Compute what a viewer sees of one field.
 *
 * @param info - The field
 * @param value - The stored value
 * @param participantId - The viewing participant, or null for the broadcast view
 * @returns A deep copy of the visible value, or HIDDEN
 * @throws PolicyError if the policy throws or produces a value that cannot be replicated
 */
export function viewOf(info: FieldInfo, value: unknown, participantId: ParticipantId | null): SnapshotValue | typeof HIDDEN {
  const view = applyPolicy(info, value, participantId)
  if (view === HIDDEN) return HIDDEN

  const result = toSnapshotValue(view)
  if (!result.ok) {
    throw new PolicyError(info.name, result.error)
  }
  return result.value
}

function applyPolicy(info: FieldInfo, value: unknown, participantId: ParticipantId | null): unknown {
  const policy = info.policy
  try {
    switch (policy.kind) {
      case 'serverOnly':
        return HIDDEN
      case 'broadcast':
        return value
      case 'masked':
        return policy.mask(value)
      case 'perParticipantSlice': {
        if (participantId === null) return HIDDEN
        if (!isRecord(value)) {
          throw new Error('perParticipantSlice expects a map value')
        }
        return Object.hasOwn(value, participantId) ? { [participantId]: value[participantId] } : {}
      }
      case 'perParticipant': {
        if (participantId === null) return HIDDEN
        return policy.filter(value, participantId) ?? HIDDEN
      }
      case 'custom': {
        if (participantId === null) return HIDDEN
        return policy.transform(participantId, value) ?? HIDDEN
      }
    }
  } catch (error) {
    throw new PolicyError(info.name, error instanceof Error ? error.message : String(error), { cause: error })
  }
}
