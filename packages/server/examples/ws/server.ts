import { createServer } from 'node:http'
import { defineState, field, PROTOCOL_VERSION } from '@roomstate/core'
import { allow, createLogger, defineRoom, deny, loadConfig, type RoomTransport, RoomManager } from '@roomstate/server'
import { type WebSocket, WebSocketServer } from 'ws'
import { z } from 'zod'

const PORT = Number(process.env.PORT) || 8087

const config = loadConfig()
const logger = createLogger({ level: config.logLevel })

// --- Room type ---

const Arena = defineState({
  phase: field.enum(['lobby', 'playing']),
  players: field.map(field.object({ name: field.string(), x: field.number(), y: field.number() })),
  hp: field.map(field.number()).perParticipantSlice(),
})

const ArenaRoom = defineRoom({ type: 'arena', state: Arena, config: { maxParticipants: 8 } })
  .canJoin((state) => (state.get('phase') === 'lobby' ? allow() : deny('Game already started')))
  .onJoin((state, ctx) => {
    const name = typeof ctx.metadata.name === 'string' ? ctx.metadata.name : ctx.participantId
    state.write(['players', ctx.participantId], { name, x: 0, y: 0 })
    state.write(['hp', ctx.participantId], 100)
    ctx.broadcast({ type: 'joined', payload: { participantId: ctx.participantId, name } })
  })
  .onLeave((state, ctx) => {
    state.delete(['players', ctx.participantId])
    state.delete(['hp', ctx.participantId])
  })
  .action('move', {
    payload: z.object({ x: z.number(), y: z.number() }),
    handle(state, { x, y }, ctx) {
      state.write(['players', ctx.participantId, 'x'], x)
      state.write(['players', ctx.participantId, 'y'], y)
    },
  })
  .action('attack', {
    payload: z.object({ target: z.string(), amount: z.number().int().positive().max(50) }),
    handle(state, { target, amount }, ctx) {
      const hp = Math.max(0, (state.get('hp')[target] ?? 0) - amount)
      state.write(['hp', target], hp)
      ctx.send(target, { type: 'hit', payload: { by: ctx.participantId, amount } })
      return { hp }
    },
  })

// --- Transport ---

const sockets = new Map<string, WebSocket>()
const socketKey = (roomId: string, participantId: string) => `${roomId}/${participantId}`

const transport: RoomTransport = {
  sendUpdate(roomId, participantId, update, scope) {
    sockets.get(socketKey(roomId, participantId))?.send(JSON.stringify({ type: 'update', scope, update }))
  },
  sendEvent(roomId, participantId, event) {
    sockets.get(socketKey(roomId, participantId))?.send(JSON.stringify({ type: 'event', event }))
  },
  disconnect(roomId, participantId, _sessionId, reason) {
    const key = socketKey(roomId, participantId)
    sockets.get(key)?.close(1000, reason)
    sockets.delete(key)
  },
}

const manager = new RoomManager({
  config: { ...config.room, syncIntervalMs: config.room.syncIntervalMs || 50 },
  logger,
  transport,
}).register(ArenaRoom)

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('action'), requestId: z.number().int(), name: z.string(), payload: z.unknown() }),
  z.object({ type: z.literal('event'), name: z.string(), payload: z.unknown() }),
])

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

// --- Server ---

const server = createServer((_req, res) => {
  res.writeHead(200).end('ok')
})

const wss = new WebSocketServer({ server })

wss.on('connection', async (ws, req) => {
  const url = new URL(req.url ?? '/', `http://localhost:${PORT}`)
  const instanceId = url.searchParams.get('roomId') ?? 'default'
  const participantId = url.searchParams.get('clientId')

  if (!participantId) {
    ws.close(1008, 'Missing clientId query parameter')
    return
  }

  const sessionId = crypto.randomUUID()
  const result = await manager
    .join({
      roomType: 'arena',
      instanceId,
      participantId,
      sessionId,
      metadata: { name: url.searchParams.get('name') ?? undefined },
    })
    .catch((error: unknown) => {
      logger.error({ err: error, instanceId, participantId }, 'join failed')
      return null
    })
  if (!result) {
    ws.close(1011, 'Join failed')
    return
  }
  if (!result.allowed) {
    ws.close(1008, result.reason)
    return
  }

  const { roomId } = result
  sockets.set(socketKey(roomId, result.participantId), ws)
  ws.send(JSON.stringify({ type: 'welcome', protocolVersion: PROTOCOL_VERSION, roomId, sessionId }))

  ws.on('message', async (data) => {
    const room = manager.getRoom(roomId)
    const parsed = clientMessageSchema.safeParse(parseJson(String(data)))
    if (!room || !parsed.success) return

    const message = parsed.data
    try {
      if (message.type === 'action') {
        const response = await room.handleAction(result.participantId, message.name, message.payload)
        ws.send(JSON.stringify({ type: 'response', requestId: message.requestId, response }))
      } else {
        await room.handleEvent(result.participantId, message.name, message.payload)
      }
    } catch (error) {
      const requestId = message.type === 'action' ? message.requestId : undefined
      ws.send(JSON.stringify({ type: 'error', requestId, message: error instanceof Error ? error.message : String(error) }))
    }
  })

  ws.on('close', () => {
    const key = socketKey(roomId, result.participantId)
    if (sockets.get(key) === ws) sockets.delete(key)
    manager.leave(roomId, result.participantId, sessionId).catch((error: unknown) => {
      logger.error({ err: error, roomId }, 'leave failed')
    })
  })
})

server.listen(PORT, () => {
  logger.info(`roomstate server listening on ws://localhost:${PORT}`)
  logger.info(`Connect: ws://localhost:${PORT}?roomId=myRoom&clientId=myClient&name=Ada`)
})

process.on('SIGINT', async () => {
  logger.info('Shutting down...')
  await manager.closeAll()
  server.close()
  process.exit(0)
})
