import type { ParticipantId } from '@roomstate/core'
import type { Logger } from './logger'

export type SessionId = string

/** Lifecycle of a room. Transitions only move forward, except draining back to running on a join. */
export type RoomStatus = 'uninitialized' | 'running' | 'draining' | 'destroyed'

export interface JoinRequest {
  participantId: ParticipantId
  sessionId: SessionId
  /** Opaque data from the transport, e.g. the authenticated user. */
  metadata?: Record<string, unknown>
}

export type DenialCode = 'denied' | 'capacity' | 'closed'

export type JoinDecision =
  | { allowed: true; participantId: ParticipantId; sessionId: SessionId }
  | { allowed: false; reason: string; code: DenialCode }

/** Result of a `canJoin` hook. An allowed result may rename the participant. */
export type Admission = { allowed: true; participantId?: ParticipantId } | { allowed: false; reason: string }

export const allow = (participantId?: ParticipantId): Admission =>
  participantId === undefined ? { allowed: true } : { allowed: true, participantId }

export const deny = (reason: string): Admission => ({ allowed: false, reason })

/** A server-to-client message outside the replicated state. */
export interface ServerEvent {
  type: string
  payload?: unknown
}

export interface ParticipantInfo {
  participantId: ParticipantId
  sessionId: SessionId
  metadata: Record<string, unknown>
  joinedAt: number
}

/** Context handed to every hook and handler. */
export interface RoomContext {
  readonly roomId: string
  readonly roomType: string
  readonly instanceId: string
  /** Tick the work runs after. */
  readonly tickId: number
  readonly logger: Logger
  /** Queue an event for one participant. Delivered on the next flush if they are still the same session. */
  send(participantId: ParticipantId, event: ServerEvent): void
  /** Queue an event for every present participant. */
  broadcast(event: ServerEvent): void
  /** Start background work that outlives the handler. It is aborted when the room is destroyed. */
  spawn(work: (signal: AbortSignal) => Promise<void>): void
}

export interface ParticipantContext extends RoomContext {
  readonly participantId: ParticipantId
  readonly sessionId: SessionId
  readonly metadata: Record<string, unknown>
}

export type WithResolved<C, O> = C & { readonly resolved: O }
