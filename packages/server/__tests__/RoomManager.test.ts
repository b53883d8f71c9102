import { defineState, field } from '@roomstate/core'
import { pino } from 'pino'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { UnknownRoomTypeError } from '../src/errors'
import { defineRoom } from '../src/RoomDef'
import { formatRoomId, parseRoomId } from '../src/roomId'
import { RoomManager } from '../src/RoomManager'

const Lobby = defineState({
  names: field.map(field.string()),
})

const LobbyRoom = defineRoom({ type: 'lobby', state: Lobby, config: { emptyGracePeriodMs: 100 } }).onJoin(
  (state, ctx) => {
    state.write(['names', ctx.participantId], ctx.participantId.toLowerCase())
  },
)

const logger = pino({ level: 'silent' })

describe('RoomManager', () => {
  let manager: RoomManager

  beforeEach(() => {
    manager = new RoomManager({ logger }).register(LobbyRoom)
  })

  afterEach(async () => {
    await manager.closeAll()
  })

  it('creates a new instance for a join without an instance id', async () => {
    const result = await manager.join({ roomType: 'lobby', participantId: 'A', sessionId: 's1' })

    expect(result.allowed).toBe(true)
    expect(result.roomId).toBe(formatRoomId('lobby', result.instanceId))
    expect(manager.getRoomIds()).toEqual([result.roomId])
  })

  it('returns the same room for the same instance id', async () => {
    await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' })
    await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'B', sessionId: 's2' })

    const room = manager.getRoom('lobby:r1')
    expect(manager.getRoomIds()).toEqual(['lobby:r1'])
    expect(room?.participantCount).toBe(2)
    expect(room?.currentState()).toEqual({ names: { A: 'a', B: 'b' } })
  })

  it('creates a room once for concurrent joins', async () => {
    const [first, second] = await Promise.all([
      manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' }),
      manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'B', sessionId: 's2' }),
    ])

    expect(first.roomId).toBe('lobby:r1')
    expect(second.roomId).toBe('lobby:r1')
    expect(manager.getRoom('lobby:r1')?.participantCount).toBe(2)
  })

  it('rejects unknown room types', async () => {
    await expect(manager.join({ roomType: 'arena', participantId: 'A', sessionId: 's1' })).rejects.toThrow(
      UnknownRoomTypeError,
    )
  })

  it('refuses to register a room type twice', () => {
    expect(() => manager.register(LobbyRoom)).toThrow('Room type "lobby" is already registered')
  })

  it('refuses to create a room that exists', async () => {
    await manager.createRoom('lobby', 'r1')
    await expect(manager.createRoom('lobby', 'r1')).rejects.toThrow('Room "lobby:r1" already exists')
  })

  it('leaves through the room', async () => {
    await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' })

    expect(await manager.leave('lobby:r1', 'A', 's1')).toBe(true)
    expect(await manager.leave('lobby:missing', 'A')).toBe(false)
    expect(manager.getRoom('lobby:r1')?.participantCount).toBe(0)
  })

  it('closes a specific room', async () => {
    const room = await manager.createRoom('lobby', 'r1')
    await manager.createRoom('lobby', 'r2')

    await manager.closeRoom('lobby:r1')

    expect(room.status).toBe('destroyed')
    expect(manager.getRoomIds()).toEqual(['lobby:r2'])
  })

  it('closes all rooms', async () => {
    await manager.createRoom('lobby', 'r1')
    await manager.createRoom('lobby', 'r2')

    await manager.closeAll()

    expect(manager.getRoomIds()).toEqual([])
  })

  it('forgets rooms that drained', async () => {
    vi.useFakeTimers()
    try {
      await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' })
      const room = manager.getRoom('lobby:r1')
      await manager.leave('lobby:r1', 'A')

      await vi.advanceTimersByTimeAsync(100)
      await room?.idle()

      expect(room?.status).toBe('destroyed')
      expect(manager.getRoomIds()).toEqual([])
    } finally {
      vi.useRealTimers()
    }
  })

  it('hands a join that races the drain to a fresh room', async () => {
    vi.useFakeTimers()
    try {
      await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' })
      const drained = manager.getRoom('lobby:r1')
      await manager.leave('lobby:r1', 'A')

      // Queues the teardown without letting it run.
      vi.advanceTimersByTime(100)
      const result = await manager.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'B', sessionId: 's2' })

      expect(drained?.status).toBe('destroyed')
      expect(drained?.closeReason).toBe('empty')
      expect(result).toEqual({ allowed: true, participantId: 'B', sessionId: 's2', roomId: 'lobby:r1', instanceId: 'r1' })
      const room = manager.getRoom('lobby:r1')
      expect(room).not.toBe(drained)
      expect(room?.currentState()).toEqual({ names: { B: 'b' } })
    } finally {
      vi.useRealTimers()
    }
  })

  it('applies the room type config over the manager defaults', async () => {
    const capped = new RoomManager({ logger, config: { maxParticipants: 1, emptyGracePeriodMs: 100 } })
      .register(LobbyRoom)
      .register(defineRoom({ type: 'party', state: Lobby, config: { maxParticipants: 2 } }))

    await capped.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'A', sessionId: 's1' })
    const lobby = await capped.join({ roomType: 'lobby', instanceId: 'r1', participantId: 'B', sessionId: 's2' })
    await capped.join({ roomType: 'party', instanceId: 'p1', participantId: 'A', sessionId: 's3' })
    const party = await capped.join({ roomType: 'party', instanceId: 'p1', participantId: 'B', sessionId: 's4' })

    expect(lobby).toMatchObject({ allowed: false, code: 'capacity', roomId: 'lobby:r1' })
    expect(party.allowed).toBe(true)
    expect(capped.getRoom('party:p1')?.config.emptyGracePeriodMs).toBe(100)
    await capped.closeAll()
  })
})

describe('room ids', () => {
  it('formats type and instance', () => {
    expect(formatRoomId('lobby', 'r1')).toBe('lobby:r1')
  })

  it('splits at the first separator', () => {
    expect(parseRoomId('lobby:r1:extra')).toEqual({ roomType: 'lobby', instanceId: 'r1:extra' })
  })

  it('rejects ids without both parts', () => {
    expect(parseRoomId('lobby')).toBeNull()
    expect(parseRoomId(':r1')).toBeNull()
    expect(parseRoomId('lobby:')).toBeNull()
  })
})
