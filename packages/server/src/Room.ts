import {
  type ParticipantId,
  type ReadonlyStateTree,
  type StateSchema,
  StateTree,
  SyncEngine,
  type SyncRound,
  updatesFor,
  type InferState,
} from '@roomstate/core'
import { type RoomConfig, resolveRoomConfig } from './config'
import { InvalidPayloadError, NotJoinedError, ResolverError, RoomClosedError, UnknownHandlerError } from './errors'
import { EventQueue, type QueuedEvent } from './EventQueue'
import { createLogger, type Logger } from './logger'
import { Membership } from './Membership'
import { executeResolvers, type Resolved, type ResolverMap } from './ResolverExecutor'
import type { ActionDef, PayloadSchema, RoomDef } from './RoomDef'
import { formatRoomId } from './roomId'
import type { RoomTransport } from './RoomTransport'
import { TaskQueue } from './TaskQueue'
import type {
  JoinDecision,
  JoinRequest,
  ParticipantContext,
  ParticipantInfo,
  RoomContext,
  RoomStatus,
  ServerEvent,
} from './types'

export interface RoomOptions<S extends StateSchema> {
  definition: RoomDef<S>
  /** Defaults to a random UUID. */
  instanceId?: string
  /** Resolved config. Defaults to the room type's config over the built-in defaults. */
  config?: RoomConfig
  /** Parent logger. The room logs through a child bound to its id. */
  logger?: Logger
  transport?: RoomTransport
  /** Called once the room is destroyed. */
  onDestroyed?: (room: Room<S>) => void
}

/**
 * One live room: its state, its participants and the single queue every
 * join, leave, action, event and tick runs through.
 *
 * @example
 * ```typescript
 * const room = new Room({ definition: ArenaRoom, transport })
 * await room.start()
 * await room.join({ participantId: 'A', sessionId: 's1' })
 * await room.handleAction('A', 'attack', { target: 'B' })
 * room.sync()
 * ```
 */
export class Room<S extends StateSchema = StateSchema> {
  readonly id: string
  readonly roomType: string
  readonly instanceId: string
  readonly config: RoomConfig
  readonly logger: Logger

  // --- state ---
  private readonly definition: RoomDef<S>
  private readonly tree: StateTree<S>
  private readonly engine: SyncEngine<S>
  private currentStatus: RoomStatus = 'uninitialized'
  private destroyReason: string | null = null
  private tickCount = 0

  // --- work ---
  private readonly queue = new TaskQueue()
  private readonly membership = new Membership()
  private readonly events = new EventQueue()
  private readonly lifetime = new AbortController()
  private readonly background = new Set<Promise<void>>()
  private starting: Promise<void> | null = null
  private destroying: Promise<void> | null = null

  // --- sync ---
  private syncing = false
  private syncVersion = 0

  // --- timers ---
  private tickTimer: ReturnType<typeof setInterval> | null = null
  private syncTimer: ReturnType<typeof setInterval> | null = null
  private drainTimer: ReturnType<typeof setTimeout> | null = null
  private tickInFlight = false

  // --- options ---
  private transport?: RoomTransport
  private onDestroyed?: (room: Room<S>) => void

  /**
   * @throws SchemaError or PolicyError if the state cannot be replicated
   */
  constructor(options: RoomOptions<S>) {
    this.definition = options.definition
    this.roomType = options.definition.type
    this.instanceId = options.instanceId ?? crypto.randomUUID()
    this.id = formatRoomId(this.roomType, this.instanceId)
    this.config = options.config ?? resolveRoomConfig(options.definition.config)
    this.logger = (options.logger ?? createLogger()).child({ roomId: this.id })
    this.transport = options.transport
    this.onDestroyed = options.onDestroyed

    this.tree = new StateTree(this.definition.state, this.definition.createInitialState())
    this.tree.verifyPolicies()
    this.engine = new SyncEngine(this.definition.state, {
      pathHashing: this.config.pathHashing,
      maxDynamicKeys: this.config.maxDynamicKeys,
    })
  }

  get status(): RoomStatus {
    return this.currentStatus
  }

  /** Why the room was destroyed: `empty` after draining, otherwise the reason passed to `destroy`. */
  get closeReason(): string | null {
    return this.destroyReason
  }

  /** Ticks completed so far. Work sees the tick it runs after. */
  get tickId(): number {
    return this.tickCount
  }

  get participantCount(): number {
    return this.membership.size
  }

  participants(): ParticipantInfo[] {
    return this.membership.list()
  }

  hasParticipant(participantId: ParticipantId): boolean {
    return this.membership.has(participantId)
  }

  // ---------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------

  /**
   * Run the initialize hook and start the loops. An empty room starts draining at once.
   * Calling it again returns the same promise.
   */
  start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.queue.run(async () => {
        if (this.currentStatus !== 'uninitialized') return
        const hook = this.definition.hooks.onInitialize
        if (hook) {
          const resolved = await this.resolve(hook.resolvers, null, undefined)
          hook.handle(this.tree, { ...this.context(), resolved })
        }
        this.currentStatus = 'running'
        this.logger.info('room started')
        this.startLoops()
        this.evaluateDrain()
      })
    }
    return this.starting
  }

  /**
   * Tear the room down: stop the loops and the drain timer, abort spawned work,
   * run the finalize hook and disconnect everyone. Work already queued runs first.
   */
  destroy(reason = 'shutdown'): Promise<void> {
    if (!this.destroying) {
      this.stopTimers()
      this.lifetime.abort(new RoomClosedError(this.id))
      this.destroying = this.queue.run(() => this.teardown(reason))
    }
    return this.destroying
  }

  /** Resolves once queued work and spawned background work have settled. */
  async idle(): Promise<void> {
    await this.queue.idle()
    await Promise.all(this.background)
  }

  // ---------------------------------------------------------------
  // Membership
  // ---------------------------------------------------------------

  /**
   * Admit a participant. Denials are returned, never thrown.
   * A newer session of a present participant replaces the older one.
   *
   * @throws ResolverError if a `canJoin` or `onJoin` resolver fails
   */
  join(request: JoinRequest): Promise<JoinDecision> {
    return this.queue.run(() => this.admit(request))
  }

  /**
   * Remove a participant. A session id that is no longer current is ignored,
   * so a late close from a replaced session cannot remove its successor.
   *
   * @returns Whether the participant was removed
   */
  leave(participantId: ParticipantId, sessionId?: string): Promise<boolean> {
    return this.queue.run(async () => {
      const info = this.membership.get(participantId)
      if (!info || (sessionId !== undefined && info.sessionId !== sessionId)) return false
      try {
        await this.removeParticipant(info)
      } finally {
        this.evaluateDrain()
      }
      this.logger.info({ participantId, sessionId: info.sessionId }, 'participant left')
      return true
    })
  }

  private async admit(request: JoinRequest): Promise<JoinDecision> {
    if (!this.isActive()) {
      return { allowed: false, reason: `Room ${this.id} is not open`, code: 'closed' }
    }

    let participantId = request.participantId
    const canJoin = this.definition.hooks.canJoin
    if (canJoin) {
      const resolved = await this.resolve(canJoin.resolvers, participantId, request)
      const admission = canJoin.handle(this.tree, request, { ...this.context(), resolved })
      if (!admission.allowed) {
        this.logger.debug({ participantId, reason: admission.reason }, 'join denied')
        return { allowed: false, reason: admission.reason, code: 'denied' }
      }
      participantId = admission.participantId ?? participantId
    }

    const existing = this.membership.get(participantId)
    if (existing && existing.sessionId === request.sessionId) {
      return { allowed: true, participantId, sessionId: request.sessionId }
    }

    const max = this.config.maxParticipants
    if (!existing && max !== undefined && this.membership.size >= max) {
      this.logger.debug({ participantId, max }, 'join denied, room full')
      return { allowed: false, reason: `Room ${this.id} is full`, code: 'capacity' }
    }

    // Resolve before anything changes, so a failing resolver leaves the room as it was.
    const onJoin = this.definition.hooks.onJoin
    const resolved = await this.resolve(onJoin?.resolvers, participantId, request)

    try {
      if (existing) {
        this.logger.warn({ participantId, sessionId: existing.sessionId }, 'session replaced')
        await this.removeParticipant(existing)
        this.disconnect(participantId, existing.sessionId, 'replaced')
      }

      const info: ParticipantInfo = {
        participantId,
        sessionId: request.sessionId,
        metadata: request.metadata ?? {},
        joinedAt: Date.now(),
      }

      // The joiner is not registered yet; events for them wait for their epoch.
      const pending: ServerEvent[] = []
      onJoin?.handle(this.tree, {
        ...this.participantContext(info),
        resolved,
        send: (target, event) => {
          if (target === participantId) {
            pending.push(event)
          } else {
            this.send(target, event)
          }
        },
        broadcast: (event) => {
          this.broadcast(event)
          pending.push(event)
        },
      })

      const epoch = this.membership.register(info)
      for (const event of pending) this.events.enqueue(participantId, epoch, event)
      this.cancelDrain()
      this.logger.info({ participantId, sessionId: info.sessionId }, 'participant joined')
      return { allowed: true, participantId, sessionId: info.sessionId }
    } finally {
      // An evicted participant whose successor failed to join leaves the room empty.
      this.evaluateDrain()
    }
  }

  /** Membership removal first, so nothing the leave hook sends can reach the departed session. */
  private async removeParticipant(info: ParticipantInfo): Promise<void> {
    this.membership.remove(info.participantId)
    this.engine.forget(info.participantId)

    const hook = this.definition.hooks.onLeave
    if (!hook) return
    let resolved: Resolved<ResolverMap<S>>
    try {
      resolved = await this.resolve(hook.resolvers, info.participantId, undefined)
    } catch (error) {
      if (!(error instanceof ResolverError)) throw error
      this.logger.warn({ err: error, participantId: info.participantId }, 'leave hook skipped after resolver failure')
      return
    }
    hook.handle(this.tree, { ...this.participantContext(info), resolved })
  }

  // ---------------------------------------------------------------
  // Actions, events and ticks
  // ---------------------------------------------------------------

  /**
   * Run an action for a present participant and return the handler's response.
   *
   * @throws UnknownHandlerError, NotJoinedError, InvalidPayloadError, ResolverError or RoomClosedError
   */
  handleAction(participantId: ParticipantId, type: string, payload?: unknown): Promise<unknown> {
    return this.queue.run(async () => {
      const { def, info, input } = this.prepare('action', participantId, type, payload)
      const resolved = await this.resolve(def.resolvers, participantId, input)
      return def.handle(this.tree, input, { ...this.participantContext(info), resolved })
    })
  }

  /**
   * Run an event for a present participant. A resolver failure is logged and the event dropped.
   *
   * @throws UnknownHandlerError, NotJoinedError, InvalidPayloadError or RoomClosedError
   */
  handleEvent(participantId: ParticipantId, type: string, payload?: unknown): Promise<void> {
    return this.queue.run(async () => {
      const { def, info, input } = this.prepare('event', participantId, type, payload)
      let resolved: Resolved<ResolverMap<S>>
      try {
        resolved = await this.resolve(def.resolvers, participantId, input)
      } catch (error) {
        if (!(error instanceof ResolverError)) throw error
        this.logger.warn({ err: error, participantId, type }, 'event dropped after resolver failure')
        return
      }
      def.handle(this.tree, input, { ...this.participantContext(info), resolved })
    })
  }

  /** Advance the tick counter and run the tick handler. A no-op once the room is destroyed. */
  tick(): Promise<void> {
    return this.queue.run(() => {
      if (!this.isActive()) return
      this.tickCount++
      this.definition.tick?.(this.tree, this.context())
    })
  }

  private prepare(
    kind: 'action' | 'event',
    participantId: ParticipantId,
    type: string,
    payload: unknown,
  ): { def: ActionDef<S>; info: ParticipantInfo; input: unknown } {
    if (!this.isActive()) throw new RoomClosedError(this.id)
    const def = kind === 'action' ? this.definition.actions.get(type) : this.definition.events.get(type)
    if (!def) throw new UnknownHandlerError(kind, type)
    const info = this.membership.get(participantId)
    if (!info) throw new NotJoinedError(this.id, participantId)
    return { def, info, input: parsePayload(type, def.payload, payload) }
  }

  // ---------------------------------------------------------------
  // Sync
  // ---------------------------------------------------------------

  /**
   * Claim the sync slot. Returns null at once when another sync is in flight.
   * The state handed back reflects every mutation completed so far.
   */
  beginSync(): ReadonlyStateTree<S> | null {
    if (this.syncing || !this.isActive()) return null
    this.syncing = true
    this.syncVersion = this.tree.version
    return this.tree
  }

  /**
   * Release the sync slot. Dirty marks up to the claim are cleared unless `clearDirty` is false;
   * writes made since the claim stay dirty for the next round.
   */
  endSync(options: { clearDirty?: boolean } = {}): void {
    if (!this.syncing) return
    if (options.clearDirty ?? true) this.tree.clearDirty(this.syncVersion)
    this.syncing = false
  }

  /**
   * Run one sync round, hand every participant their updates, then flush queued events.
   * @returns The round, or null if a sync was already in flight
   * @throws PolicyError if a policy fails; dirty marks are kept and the next round is a full sync for everyone
   */
  sync(): SyncRound | null {
    if (this.beginSync() === null) return null

    let round: SyncRound
    try {
      round = this.engine.sync(this.tree, this.membership.ids())
    } catch (error) {
      this.endSync({ clearDirty: false })
      throw error
    }

    try {
      for (const participantId of this.membership.ids()) this.deliver(round, participantId)
    } finally {
      this.endSync()
    }
    this.flushEvents()
    return round
  }

  /** A participant whose delivery fails starts over with a full sync next round. */
  private deliver(round: SyncRound, participantId: ParticipantId): void {
    try {
      for (const { scope, update } of updatesFor(round, participantId)) {
        this.transport?.sendUpdate(this.id, participantId, update, scope)
      }
    } catch (error) {
      this.engine.forget(participantId)
      this.logger.error({ err: error, participantId }, 'update delivery failed')
    }
  }

  /**
   * Deliver queued events whose recipient is still in the session they were queued for.
   * @returns The delivered events
   */
  flushEvents(): QueuedEvent[] {
    const { delivered, dropped } = this.events.flush((participantId, epoch) =>
      this.membership.isCurrent(participantId, epoch),
    )
    for (const entry of dropped) {
      this.logger.debug({ participantId: entry.participantId, type: entry.event.type }, 'stale event dropped')
    }
    for (const entry of delivered) {
      try {
        this.transport?.sendEvent(this.id, entry.participantId, entry.event)
      } catch (error) {
        this.logger.error({ err: error, participantId: entry.participantId, type: entry.event.type }, 'event delivery failed')
      }
    }
    return delivered
  }

  /** Deep copy of the state, server-only fields included. */
  currentState(): InferState<S> {
    return this.tree.toObject()
  }

  // ---------------------------------------------------------------
  // Context
  // ---------------------------------------------------------------

  private context(): RoomContext {
    return {
      roomId: this.id,
      roomType: this.roomType,
      instanceId: this.instanceId,
      tickId: this.tickCount,
      logger: this.logger,
      send: (participantId, event) => this.send(participantId, event),
      broadcast: (event) => this.broadcast(event),
      spawn: (work) => this.spawn(work),
    }
  }

  private participantContext(info: ParticipantInfo): ParticipantContext {
    return {
      ...this.context(),
      participantId: info.participantId,
      sessionId: info.sessionId,
      metadata: info.metadata,
    }
  }

  private resolve(
    resolvers: ResolverMap<S> | undefined,
    participantId: ParticipantId | null,
    payload: unknown,
  ): Promise<Resolved<ResolverMap<S>>> {
    return executeResolvers<S, ResolverMap<S>>(
      resolvers ?? {},
      { roomId: this.id, participantId, payload, state: this.tree },
      { concurrency: this.config.resolverConcurrency, signal: this.lifetime.signal },
    )
  }

  private send(participantId: ParticipantId, event: ServerEvent): void {
    const epoch = this.membership.epochOf(participantId)
    if (epoch === undefined) {
      this.logger.debug({ participantId, type: event.type }, 'event for absent participant dropped')
      return
    }
    this.events.enqueue(participantId, epoch, event)
  }

  private broadcast(event: ServerEvent): void {
    for (const participantId of this.membership.ids()) this.send(participantId, event)
  }

  private disconnect(participantId: ParticipantId, sessionId: string, reason: string): void {
    try {
      this.transport?.disconnect?.(this.id, participantId, sessionId, reason)
    } catch (error) {
      this.logger.error({ err: error, participantId }, 'disconnect failed')
    }
  }

  private spawn(work: (signal: AbortSignal) => Promise<void>): void {
    const signal = this.lifetime.signal
    if (signal.aborted) {
      this.logger.debug('background task not started, room destroyed')
      return
    }
    const task = Promise.resolve()
      .then(() => work(signal))
      .catch((error: unknown) => {
        if (signal.aborted) {
          this.logger.debug({ err: error }, 'background task aborted')
        } else {
          this.logger.error({ err: error }, 'background task failed')
        }
      })
    this.background.add(task)
    void task.then(() => this.background.delete(task))
  }

  // ---------------------------------------------------------------
  // Timers
  // ---------------------------------------------------------------

  private isActive(): boolean {
    return this.currentStatus === 'running' || this.currentStatus === 'draining'
  }

  private startLoops(): void {
    const { tickIntervalMs, syncIntervalMs } = this.config
    if (tickIntervalMs > 0 && this.definition.tick) {
      this.tickTimer = setInterval(() => this.runScheduledTick(), tickIntervalMs)
    }
    if (syncIntervalMs > 0) {
      this.syncTimer = setInterval(() => this.runScheduledSync(), syncIntervalMs)
    }
  }

  private runScheduledTick(): void {
    // A slow tick delays the next one instead of piling up behind it.
    if (this.tickInFlight) return
    this.tickInFlight = true
    void this.tick().then(
      () => {
        this.tickInFlight = false
      },
      (error: unknown) => {
        this.tickInFlight = false
        this.logger.error({ err: error }, 'tick failed')
      },
    )
  }

  private runScheduledSync(): void {
    try {
      this.sync()
    } catch (error) {
      this.logger.error({ err: error }, 'sync failed')
    }
  }

  private evaluateDrain(): void {
    if (this.currentStatus !== 'running' || this.membership.size > 0) return
    this.currentStatus = 'draining'
    this.logger.debug({ gracePeriodMs: this.config.emptyGracePeriodMs }, 'room empty, draining')
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null
      void this.queue.run(() => this.destroyIfEmpty()).catch((error: unknown) => {
        this.logger.error({ err: error }, 'room teardown failed')
      })
    }, this.config.emptyGracePeriodMs)
  }

  private cancelDrain(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer)
      this.drainTimer = null
    }
    if (this.currentStatus === 'draining') this.currentStatus = 'running'
  }

  /** Runs on the queue, so a join admitted after the timer fired keeps the room alive. */
  private async destroyIfEmpty(): Promise<void> {
    if (this.currentStatus !== 'draining' || this.membership.size > 0) return
    this.stopTimers()
    this.lifetime.abort(new RoomClosedError(this.id))
    await this.teardown('empty')
  }

  private stopTimers(): void {
    if (this.tickTimer) clearInterval(this.tickTimer)
    if (this.syncTimer) clearInterval(this.syncTimer)
    if (this.drainTimer) clearTimeout(this.drainTimer)
    this.tickTimer = null
    this.syncTimer = null
    this.drainTimer = null
  }

  private async teardown(reason: string): Promise<void> {
    if (this.currentStatus === 'destroyed') return
    const wasStarted = this.currentStatus !== 'uninitialized'
    try {
      const finalize = this.definition.hooks.onFinalize
      if (finalize && wasStarted) await finalize(this.tree, this.context())
    } finally {
      this.currentStatus = 'destroyed'
      this.destroyReason = reason
      for (const info of this.membership.list()) {
        this.membership.remove(info.participantId)
        this.disconnect(info.participantId, info.sessionId, reason)
      }
      this.events.clear()
      this.engine.reset()
      this.logger.info({ reason }, 'room destroyed')
      this.onDestroyed?.(this)
    }
  }
}

function parsePayload(type: string, schema: PayloadSchema<unknown> | undefined, payload: unknown): unknown {
  if (!schema) return payload
  const result = schema.safeParse(payload)
  if (!result.success) throw new InvalidPayloadError(type, result.error.issues)
  return result.data
}
