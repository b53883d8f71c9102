import type { ParticipantId, ReadonlyStateTree, StateSchema } from '@roomstate/core'
import { ResolverError } from './errors'

/** What a resolver can see. It reads state but never writes it. */
export interface ResolverContext<S extends StateSchema = StateSchema> {
  readonly roomId: string
  readonly participantId: ParticipantId | null
  readonly payload: unknown
  readonly state: ReadonlyStateTree<S>
  /** Aborted when a sibling resolver fails or the room is destroyed. */
  readonly signal: AbortSignal
}

/** Asynchronous input to a handler, fetched before the handler touches state. */
export type Resolver<S extends StateSchema = StateSchema, T = unknown> = (ctx: ResolverContext<S>) => T | Promise<T>

export type ResolverMap<S extends StateSchema = StateSchema> = Record<string, Resolver<S>>

/** Outputs of a resolver map, keyed by resolver name. */
export type Resolved<R> = { [K in keyof R]: R[K] extends (...args: never[]) => infer T ? Awaited<T> : never }

export interface ExecuteOptions {
  /** Resolvers running at once. Defaults to all of them. */
  concurrency?: number
  /** Aborting it aborts every running resolver. */
  signal?: AbortSignal
}

/**
 * Run every resolver of a handler, at most `concurrency` at a time.
 * Resolves with all outputs once every resolver succeeded. On the first failure the
 * others are aborted and the promise rejects at once with a `ResolverError`.
 *
 * @example
 * ```typescript
 * const { profile } = await executeResolvers({ profile: ({ participantId }) => fetchProfile(participantId) }, ctx)
 * ```
 */
export function executeResolvers<S extends StateSchema, R extends ResolverMap<S>>(
  resolvers: R,
  context: Omit<ResolverContext<S>, 'signal'>,
  options: ExecuteOptions = {},
): Promise<Resolved<R>> {
  const entries = Object.entries(resolvers)
  const outputs: Record<string, unknown> = {}
  if (entries.length === 0) return Promise.resolve(outputs as Resolved<R>)

  const controller = new AbortController()
  const parent = options.signal
  const abortFromParent = (): void => controller.abort(parent?.reason)
  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener('abort', abortFromParent, { once: true })
  }

  const limit = Math.max(1, Math.min(options.concurrency ?? entries.length, entries.length))

  return new Promise<Resolved<R>>((resolve, reject) => {
    let next = 0
    let remaining = entries.length
    let failed = false

    const settle = (): void => {
      parent?.removeEventListener('abort', abortFromParent)
    }

    const launch = (): void => {
      if (failed || next >= entries.length) return
      const [name, resolver] = entries[next++]

      void Promise.resolve()
        .then(() => resolver({ ...context, signal: controller.signal }))
        .then(
          (value) => {
            if (failed) return
            outputs[name] = value
            remaining--
            if (remaining === 0) {
              settle()
              resolve(outputs as Resolved<R>)
            } else {
              launch()
            }
          },
          (error: unknown) => {
            if (failed) return
            failed = true
            controller.abort(error)
            settle()
            reject(new ResolverError(name, error))
          },
        )
    }

    for (let i = 0; i < limit; i++) launch()
  })
}
