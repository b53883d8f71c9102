export {
  LOG_LEVELS,
  loadConfig,
  type RoomConfig,
  type RoomConfigInput,
  RoomConfigSchema,
  resolveRoomConfig,
  type ServerConfig,
  ServerConfigSchema,
} from './config'
export {
  InvalidPayloadError,
  NotJoinedError,
  ResolverError,
  RoomClosedError,
  UnknownHandlerError,
  UnknownRoomTypeError,
} from './errors'
export { EventQueue, type FlushResult, type QueuedEvent } from './EventQueue'
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from './logger'
export { Membership } from './Membership'
export {
  type ExecuteOptions,
  executeResolvers,
  type Resolved,
  type Resolver,
  type ResolverContext,
  type ResolverMap,
} from './ResolverExecutor'
export { Room, type RoomOptions } from './Room'
export {
  type ActionDef,
  type AdmissionHook,
  type AnyRoomDef,
  defineRoom,
  type EventDef,
  type FinalizeHook,
  type InitializeHook,
  type ParticipantHook,
  type PayloadSchema,
  RoomDef,
  type RoomDefOptions,
  type RoomHooks,
  type TickHandler,
} from './RoomDef'
export { formatRoomId, parseRoomId, type RoomAddress, ROOM_ID_SEPARATOR } from './roomId'
export {
  type AnyRoom,
  type ManagerJoinRequest,
  type ManagerJoinResult,
  RoomManager,
  type RoomManagerOptions,
} from './RoomManager'
export type { RoomTransport } from './RoomTransport'
export { TaskQueue } from './TaskQueue'
export {
  type Admission,
  allow,
  type DenialCode,
  deny,
  type JoinDecision,
  type JoinRequest,
  type ParticipantContext,
  type ParticipantInfo,
  type RoomContext,
  type RoomStatus,
  type ServerEvent,
  type SessionId,
  type WithResolved,
} from './types'
