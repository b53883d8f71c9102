import type { StateSchema } from '@roomstate/core'
import { type RoomConfigInput, resolveRoomConfig } from './config'
import { UnknownRoomTypeError } from './errors'
import { createLogger, type Logger } from './logger'
import { Room } from './Room'
import type { AnyRoomDef, RoomDef } from './RoomDef'
import { formatRoomId } from './roomId'
import type { RoomTransport } from './RoomTransport'
import type { JoinDecision, JoinRequest } from './types'

export interface RoomManagerOptions {
  /** Room config defaults. Each room type's own config overrides them. */
  config?: RoomConfigInput
  logger?: Logger
  /** Where every room sends its updates and events. */
  transport?: RoomTransport
}

export interface ManagerJoinRequest extends JoinRequest {
  roomType: string
  /** Omit to create a new instance. */
  instanceId?: string
}

export type ManagerJoinResult = JoinDecision & { roomId: string; instanceId: string }

/** Any room, whatever its schema. */
export type AnyRoom = Room<any>

export class RoomManager {
  private definitions = new Map<string, AnyRoomDef>()
  private rooms = new Map<string, AnyRoom>()
  private creating = new Map<string, Promise<AnyRoom>>()
  private defaults: RoomConfigInput
  private logger: Logger
  private transport?: RoomTransport

  constructor(options: RoomManagerOptions = {}) {
    this.defaults = options.config ?? {}
    this.logger = options.logger ?? createLogger()
    this.transport = options.transport
    resolveRoomConfig(this.defaults)
  }

  /** Make a room type available. */
  register<S extends StateSchema>(definition: RoomDef<S>): this {
    if (this.definitions.has(definition.type)) {
      throw new Error(`Room type "${definition.type}" is already registered`)
    }
    resolveRoomConfig(this.defaults, definition.config)
    this.definitions.set(definition.type, definition)
    return this
  }

  /**
   * Join a room, creating it first when it does not exist yet.
   *
   * @example
   * ```typescript
   * const result = await manager.join({ roomType: 'arena', participantId: 'A', sessionId })
   * if (result.allowed) subscribe(result.roomId)
   * ```
   *
   * @throws UnknownRoomTypeError, or whatever room creation or the join hooks throw
   */
  async join(request: ManagerJoinRequest): Promise<ManagerJoinResult> {
    const { roomType, instanceId = crypto.randomUUID(), ...joinRequest } = request
    let room = await this.getOrCreateRoom(roomType, instanceId)
    let decision = await room.join(joinRequest)
    // The room drained between lookup and admission; a fresh instance takes the join.
    if (!decision.allowed && decision.code === 'closed' && room.closeReason === 'empty') {
      room = await this.getOrCreateRoom(roomType, instanceId)
      decision = await room.join(joinRequest)
    }
    return { ...decision, roomId: room.id, instanceId }
  }

  /** Remove a participant from a room. */
  async leave(roomId: string, participantId: string, sessionId?: string): Promise<boolean> {
    const room = this.rooms.get(roomId)
    if (!room) return false
    return room.leave(participantId, sessionId)
  }

  /**
   * Create and start a room.
   * @throws UnknownRoomTypeError, an Error if the room exists, or SchemaError/PolicyError from the state
   */
  async createRoom(roomType: string, instanceId: string = crypto.randomUUID()): Promise<AnyRoom> {
    const roomId = formatRoomId(roomType, instanceId)
    if (this.rooms.has(roomId) || this.creating.has(roomId)) {
      throw new Error(`Room "${roomId}" already exists`)
    }
    return this.getOrCreateRoom(roomType, instanceId)
  }

  /** Get a room only if it already exists. Does not create. */
  getRoom(roomId: string): AnyRoom | undefined {
    return this.rooms.get(roomId)
  }

  /** List all active room IDs. */
  getRoomIds(): string[] {
    return Array.from(this.rooms.keys())
  }

  /** Destroy and remove a specific room. */
  async closeRoom(roomId: string, reason = 'shutdown'): Promise<void> {
    const room = this.rooms.get(roomId)
    if (room) {
      this.rooms.delete(roomId)
      await room.destroy(reason)
    }
  }

  /** Shut down all rooms. */
  async closeAll(reason = 'shutdown'): Promise<void> {
    await Promise.all(this.getRoomIds().map((roomId) => this.closeRoom(roomId, reason)))
  }

  private getOrCreateRoom(roomType: string, instanceId: string): Promise<AnyRoom> {
    const roomId = formatRoomId(roomType, instanceId)
    const existing = this.rooms.get(roomId)
    if (existing) return Promise.resolve(existing)

    const pending = this.creating.get(roomId)
    if (pending) return pending

    const creation = this.startRoom(roomType, instanceId).finally(() => {
      this.creating.delete(roomId)
    })
    this.creating.set(roomId, creation)
    return creation
  }

  private async startRoom(roomType: string, instanceId: string): Promise<AnyRoom> {
    const definition = this.definitions.get(roomType)
    if (!definition) throw new UnknownRoomTypeError(roomType)

    const room: AnyRoom = new Room({
      definition,
      instanceId,
      config: resolveRoomConfig(this.defaults, definition.config),
      logger: this.logger,
      transport: this.transport,
      onDestroyed: (destroyed) => {
        if (this.rooms.get(destroyed.id) === destroyed) this.rooms.delete(destroyed.id)
      },
    })
    await room.start()
    this.rooms.set(room.id, room)
    return room
  }
}
