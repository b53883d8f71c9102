import type { InferState, ReadonlyStateTree, StateDef, StateSchema, StateTree } from '@roomstate/core'
import type { ZodType, ZodTypeDef } from 'zod'
import type { RoomConfigInput } from './config'
import { ROOM_ID_SEPARATOR } from './roomId'
import type { Resolved, ResolverMap } from './ResolverExecutor'
import type { Admission, JoinRequest, ParticipantContext, RoomContext, WithResolved } from './types'

type MaybePromise<T> = T | Promise<T>

/** Schema of a handler payload. Its output is what the handler receives. */
export type PayloadSchema<P> = ZodType<P, ZodTypeDef, unknown>

export interface AdmissionHook<S extends StateSchema, R extends ResolverMap<S> = ResolverMap<S>> {
  resolvers?: R
  handle(state: ReadonlyStateTree<S>, request: JoinRequest, ctx: WithResolved<RoomContext, Resolved<R>>): Admission
}

export interface InitializeHook<S extends StateSchema, R extends ResolverMap<S> = ResolverMap<S>> {
  resolvers?: R
  handle(state: StateTree<S>, ctx: WithResolved<RoomContext, Resolved<R>>): void
}

/** Join and leave hooks. */
export interface ParticipantHook<S extends StateSchema, R extends ResolverMap<S> = ResolverMap<S>> {
  resolvers?: R
  handle(state: StateTree<S>, ctx: WithResolved<ParticipantContext, Resolved<R>>): void
}

export type FinalizeHook<S extends StateSchema> = (state: ReadonlyStateTree<S>, ctx: RoomContext) => MaybePromise<void>

export type TickHandler<S extends StateSchema> = (state: StateTree<S>, ctx: RoomContext) => void

/**
 * A client request handler. Resolvers run first; `handle` then runs synchronously
 * against the state, so its mutations are never observed half-done.
 */
export interface ActionDef<S extends StateSchema, P = unknown, Res = unknown, R extends ResolverMap<S> = ResolverMap<S>> {
  payload?: PayloadSchema<P>
  resolvers?: R
  handle(state: StateTree<S>, payload: P, ctx: WithResolved<ParticipantContext, Resolved<R>>): Res
}

/** Like an action, but with no response. A resolver failure drops the event. */
export type EventDef<S extends StateSchema, P = unknown, R extends ResolverMap<S> = ResolverMap<S>> = ActionDef<
  S,
  P,
  void,
  R
>

export interface RoomHooks<S extends StateSchema> {
  canJoin?: AdmissionHook<S>
  onInitialize?: InitializeHook<S>
  onJoin?: ParticipantHook<S>
  onLeave?: ParticipantHook<S>
  onFinalize?: FinalizeHook<S>
}

export interface RoomDefOptions<S extends StateSchema> {
  /** Room type name. Part of every room id, so it cannot contain ':'. */
  type: string
  state: StateDef<S>
  /** Values overriding the schema defaults in every new room. */
  initialState?: () => Partial<InferState<S>>
  /** Overrides of the manager's room config for this type. */
  config?: RoomConfigInput
}

/**
 * Everything a room type runs: its state, lifecycle hooks, actions, events and tick.
 * Registered with a `RoomManager`, which creates rooms from it.
 */
export class RoomDef<S extends StateSchema = StateSchema> {
  readonly type: string
  readonly state: StateDef<S>
  readonly config: RoomConfigInput
  readonly hooks: RoomHooks<S> = {}
  readonly actions = new Map<string, ActionDef<S>>()
  readonly events = new Map<string, EventDef<S>>()
  private readonly initialState?: () => Partial<InferState<S>>
  private tickHandler?: TickHandler<S>

  constructor(options: RoomDefOptions<S>) {
    if (options.type.length === 0 || options.type.includes(ROOM_ID_SEPARATOR)) {
      throw new Error(`Invalid room type "${options.type}"`)
    }
    this.type = options.type
    this.state = options.state
    this.config = options.config ?? {}
    this.initialState = options.initialState
  }

  /** Values a new room starts from. */
  createInitialState(): Partial<InferState<S>> {
    return this.initialState?.() ?? {}
  }

  get tick(): TickHandler<S> | undefined {
    return this.tickHandler
  }

  // --- Lifecycle ---

  /**
   * Decide whether a join request is admitted. Runs before capacity checks.
   *
   * @example
   * ```typescript
   * room.canJoin((state, request) => (state.get('phase') === 'lobby' ? allow() : deny('game started')))
   * ```
   */
  canJoin<R extends ResolverMap<S> = ResolverMap<S>>(hook: AdmissionHook<S, R> | AdmissionHook<S, R>['handle']): this {
    this.hooks.canJoin = typeof hook === 'function' ? { handle: hook } : hook
    return this
  }

  onInitialize<R extends ResolverMap<S> = ResolverMap<S>>(
    hook: InitializeHook<S, R> | InitializeHook<S, R>['handle'],
  ): this {
    this.hooks.onInitialize = typeof hook === 'function' ? { handle: hook } : hook
    return this
  }

  onJoin<R extends ResolverMap<S> = ResolverMap<S>>(hook: ParticipantHook<S, R> | ParticipantHook<S, R>['handle']): this {
    this.hooks.onJoin = typeof hook === 'function' ? { handle: hook } : hook
    return this
  }

  onLeave<R extends ResolverMap<S> = ResolverMap<S>>(hook: ParticipantHook<S, R> | ParticipantHook<S, R>['handle']): this {
    this.hooks.onLeave = typeof hook === 'function' ? { handle: hook } : hook
    return this
  }

  /** Runs once while the room is destroyed. State can be read but no longer changed. */
  onFinalize(hook: FinalizeHook<S>): this {
    this.hooks.onFinalize = hook
    return this
  }

  // --- Handlers ---

  /**
   * Register a client action.
   *
   * @example
   * ```typescript
   * room.action('move', {
   *   payload: z.object({ x: z.number(), y: z.number() }),
   *   handle(state, { x, y }, ctx) {
   *     state.write(['players', ctx.participantId, 'x'], x)
   *     state.write(['players', ctx.participantId, 'y'], y)
   *   },
   * })
   * ```
   */
  action<P = unknown, Res = unknown, R extends ResolverMap<S> = ResolverMap<S>>(
    type: string,
    def: ActionDef<S, P, Res, R>,
  ): this {
    if (this.actions.has(type)) {
      throw new Error(`Action "${type}" is already registered on room type "${this.type}"`)
    }
    this.actions.set(type, def)
    return this
  }

  /** Register a fire-and-forget client event. */
  event<P = unknown, R extends ResolverMap<S> = ResolverMap<S>>(type: string, def: EventDef<S, P, R>): this {
    if (this.events.has(type)) {
      throw new Error(`Event "${type}" is already registered on room type "${this.type}"`)
    }
    this.events.set(type, def)
    return this
  }

  /** Set the handler run by `Room.tick` and the tick loop. */
  onTick(handler: TickHandler<S>): this {
    this.tickHandler = handler
    return this
  }
}

/** Any room definition, whatever its schema. */
export type AnyRoomDef = RoomDef<any>

/**
 * Define a room type.
 *
 * @example
 * ```typescript
 * const ArenaRoom = defineRoom({ type: 'arena', state: Arena, config: { maxParticipants: 8 } })
 *   .onJoin((state, ctx) => state.write(['hp', ctx.participantId], 100))
 *   .action('attack', { payload: z.object({ target: z.string() }), handle: attack })
 * ```
 */
export function defineRoom<S extends StateSchema>(options: RoomDefOptions<S>): RoomDef<S> {
  return new RoomDef(options)
}
