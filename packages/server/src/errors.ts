import type { ZodIssue } from 'zod'

/** A resolver rejected; the handler it fed never ran. */
export class ResolverError extends Error {
  readonly resolverName: string

  constructor(resolverName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Resolver "${resolverName}" failed: ${detail}`, { cause })
    this.name = 'ResolverError'
    this.resolverName = resolverName
  }
}

/** An action or event payload did not match its schema. */
export class InvalidPayloadError extends Error {
  readonly handlerType: string
  readonly issues: ZodIssue[]

  constructor(handlerType: string, issues: ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ')
    super(`Invalid payload for "${handlerType}": ${summary}`)
    this.name = 'InvalidPayloadError'
    this.handlerType = handlerType
    this.issues = issues
  }
}

/** No action or event handler is registered under the requested type. */
export class UnknownHandlerError extends Error {
  readonly kind: 'action' | 'event'
  readonly handlerType: string

  constructor(kind: 'action' | 'event', handlerType: string) {
    super(`Unknown ${kind} "${handlerType}"`)
    this.name = 'UnknownHandlerError'
    this.kind = kind
    this.handlerType = handlerType
  }
}

/** The participant sending an action or event is not in the room. */
export class NotJoinedError extends Error {
  readonly participantId: string

  constructor(roomId: string, participantId: string) {
    super(`Participant "${participantId}" has not joined room "${roomId}"`)
    this.name = 'NotJoinedError'
    this.participantId = participantId
  }
}

export class RoomClosedError extends Error {
  readonly roomId: string

  constructor(roomId: string) {
    super(`Room "${roomId}" is closed`)
    this.name = 'RoomClosedError'
    this.roomId = roomId
  }
}

export class UnknownRoomTypeError extends Error {
  readonly roomType: string

  constructor(roomType: string) {
    super(`No room type "${roomType}" is registered`)
    this.name = 'UnknownRoomTypeError'
    this.roomType = roomType
  }
}
