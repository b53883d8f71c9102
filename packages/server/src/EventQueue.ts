import type { ParticipantId } from '@roomstate/core'
import type { ServerEvent } from './types'

export interface QueuedEvent {
  participantId: ParticipantId
  epoch: number
  event: ServerEvent
}

export interface FlushResult {
  delivered: QueuedEvent[]
  dropped: QueuedEvent[]
}

/** Server events waiting for the next flush, each stamped with its recipient's epoch. */
export class EventQueue {
  private entries: QueuedEvent[] = []

  enqueue(participantId: ParticipantId, epoch: number, event: ServerEvent): void {
    this.entries.push({ participantId, epoch, event })
  }

  /**
   * Take every queued event, in order, and split it by whether its epoch is still current.
   */
  flush(isCurrent: (participantId: ParticipantId, epoch: number) => boolean): FlushResult {
    const entries = this.entries
    this.entries = []

    const result: FlushResult = { delivered: [], dropped: [] }
    for (const entry of entries) {
      if (isCurrent(entry.participantId, entry.epoch)) {
        result.delivered.push(entry)
      } else {
        result.dropped.push(entry)
      }
    }
    return result
  }

  clear(): void {
    this.entries = []
  }

  get size(): number {
    return this.entries.length
  }
}
