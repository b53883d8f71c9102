import type { ParticipantId } from '@roomstate/core'
import type { ParticipantInfo } from './types'

/**
 * Present participants of a room and a per-participant epoch.
 * The epoch moves on every registration and every removal, so anything stamped
 * with an older epoch belongs to a session that is gone, even if the same
 * participant id has joined again since.
 */
export class Membership {
  private readonly present = new Map<ParticipantId, ParticipantInfo>()
  private readonly epochs = new Map<ParticipantId, number>()

  register(info: ParticipantInfo): number {
    this.present.set(info.participantId, info)
    return this.bump(info.participantId)
  }

  /** @returns The removed participant, or undefined if they were not present */
  remove(participantId: ParticipantId): ParticipantInfo | undefined {
    const info = this.present.get(participantId)
    if (!info) return undefined
    this.present.delete(participantId)
    this.bump(participantId)
    return info
  }

  get(participantId: ParticipantId): ParticipantInfo | undefined {
    return this.present.get(participantId)
  }

  has(participantId: ParticipantId): boolean {
    return this.present.has(participantId)
  }

  /** Current epoch of a present participant. */
  epochOf(participantId: ParticipantId): number | undefined {
    return this.present.has(participantId) ? this.epochs.get(participantId) : undefined
  }

  /** Whether the participant is present and still in the given epoch. */
  isCurrent(participantId: ParticipantId, epoch: number): boolean {
    return this.epochOf(participantId) === epoch
  }

  ids(): ParticipantId[] {
    return Array.from(this.present.keys())
  }

  list(): ParticipantInfo[] {
    return Array.from(this.present.values())
  }

  get size(): number {
    return this.present.size
  }

  private bump(participantId: ParticipantId): number {
    const epoch = (this.epochs.get(participantId) ?? 0) + 1
    this.epochs.set(participantId, epoch)
    return epoch
  }
}
