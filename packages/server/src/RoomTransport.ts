import type { ParticipantId, StateUpdate, UpdateScope } from '@roomstate/core'
import type { ServerEvent, SessionId } from './types'

/**
 * Where a room sends its output. Encoding and framing are the transport's business.
 * Calls are synchronous; a transport that writes to sockets should not throw.
 */
export interface RoomTransport {
  sendUpdate(roomId: string, participantId: ParticipantId, update: StateUpdate, scope: UpdateScope): void
  sendEvent(roomId: string, participantId: ParticipantId, event: ServerEvent): void
  /** Close a session that was replaced or whose room is gone. */
  disconnect?(roomId: string, participantId: ParticipantId, sessionId: SessionId, reason: string): void
}
