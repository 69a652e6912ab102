/**
 * Effects
 * =======
 *
 * An `Effect<A>` describes work a reducer wants done after it returns: send an
 * action, run something asynchronous that yields actions, cancel running work,
 * or combine other effects. Effects are plain immutable values; nothing happens
 * until a store hands one to the runner in `effect-runner.ts`.
 *
 * @example
 * ```ts
 * case 'searchChanged':
 *   state.query = action.query
 *   return Effect.promise(signal => api.search(action.query, signal))
 *     .map(results => ({ type: 'searchResponse', results }))
 *     .debounce(SEARCH, 300)
 * ```
 */

import type { CancelId } from './cancellation'
import { captureDependencies, resolve, clockKey, type DependencyValues } from './dependencies'
import { toError } from './diagnostics'

// =============================================================================
// TYPES
// =============================================================================

export type Send<A> = (action: A) => void

/** Async work that may send any number of actions before it settles. */
export type RunBody<A> = (send: Send<A>, signal: AbortSignal) => Promise<void>

/** Maps an error thrown by a run body into actions. */
export type CatchHandler<A> = (error: Error, send: Send<A>) => void

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export interface RunOptions<A> {
  catch?: CatchHandler<A>
}

export interface CancellableOptions {
  /** Cancel tasks already running under the id before starting this one. */
  cancelInFlight?: boolean
}

export type EffectNode<A> =
  | { readonly kind: 'none' }
  | { readonly kind: 'send'; readonly action: A }
  | {
      readonly kind: 'run'
      readonly body: RunBody<A>
      readonly onError: CatchHandler<A> | undefined
      readonly dependencies: DependencyValues | undefined
    }
  | { readonly kind: 'cancel'; readonly id: CancelId }
  | { readonly kind: 'merge'; readonly effects: readonly Effect<A>[] }
  | { readonly kind: 'concatenate'; readonly effects: readonly Effect<A>[] }
  | {
      readonly kind: 'cancellable'
      readonly id: CancelId
      readonly cancelInFlight: boolean
      readonly effect: Effect<A>
    }

// =============================================================================
// EFFECT
// =============================================================================

export class Effect<A> {
  readonly node: EffectNode<A>

  private constructor(node: EffectNode<A>) {
    this.node = node
  }

  /** An effect that does nothing. */
  static readonly none: Effect<never> = new Effect<never>({ kind: 'none' })

  /** Feeds `action` straight back into the store once the current reduction finishes. */
  static send<A>(action: A): Effect<A> {
    return new Effect({ kind: 'send', action })
  }

  /**
   * Runs async work that can send actions while it runs. The dependency scope
   * active at construction is re-entered when the work executes.
   *
   * Errors thrown by `body` go to `options.catch`; without one they are logged
   * and dropped at the effect boundary.
   */
  static run<A>(body: RunBody<A>, options: RunOptions<A> = {}): Effect<A> {
    return new Effect({
      kind: 'run',
      body,
      onError: options.catch,
      dependencies: captureDependencies()
    })
  }

  /** Work whose outcome the reducer does not need. */
  static fireAndForget(work: (signal: AbortSignal) => Promise<void>, options: RunOptions<never> = {}): Effect<never> {
    return Effect.run<never>((_send, signal) => work(signal), options)
  }

  /** Sends one action produced by a promise. */
  static promise<A>(operation: (signal: AbortSignal) => Promise<A>, options: RunOptions<A> = {}): Effect<A> {
    return Effect.run<A>(async (send, signal) => {
      send(await operation(signal))
    }, options)
  }

  /**
   * Sends every action of a (possibly async, possibly empty) sequence, in order,
   * stopping as soon as the task is cancelled.
   */
  static stream<A>(
    factory: (signal: AbortSignal) => AsyncIterable<A> | Iterable<A>,
    options: RunOptions<A> = {}
  ): Effect<A> {
    return Effect.run<A>(async (send, signal) => {
      for await (const action of factory(signal)) {
        if (signal.aborted) return
        send(action)
      }
    }, options)
  }

  /**
   * Runs `operation` and always delivers an explicit success or failure action.
   */
  static result<T, A>(
    operation: (signal: AbortSignal) => Promise<T>,
    toAction: (result: Result<T>) => A
  ): Effect<A> {
    return Effect.run<A>(async (send, signal) => {
      let result: Result<T>
      try {
        result = { ok: true, value: await operation(signal) }
      } catch (error) {
        if (signal.aborted) return
        result = { ok: false, error: toError(error) }
      }
      send(toAction(result))
    })
  }

  /** Cancels every task running under `id`. */
  static cancel(id: CancelId): Effect<never> {
    return new Effect<never>({ kind: 'cancel', id })
  }

  /** Waits `ms` on the `clock` dependency without sending anything. */
  static sleep(ms: number): Effect<never> {
    return Effect.run<never>(async (_send, signal) => {
      await resolve(clockKey).sleep(ms, signal)
    })
  }

  /** Runs the effects concurrently. */
  static merge<A>(...effects: Effect<A>[]): Effect<A> {
    const members = effects.filter(effect => !effect.isNone)
    if (members.length === 0) return Effect.none
    if (members.length === 1) return members[0]
    return new Effect({ kind: 'merge', effects: members })
  }

  /** Runs the effects one after another; each starts once the previous one is exhausted. */
  static concatenate<A>(...effects: Effect<A>[]): Effect<A> {
    const members = effects.filter(effect => !effect.isNone)
    if (members.length === 0) return Effect.none
    if (members.length === 1) return members[0]
    return new Effect({ kind: 'concatenate', effects: members })
  }

  get isNone(): boolean {
    return this.node.kind === 'none'
  }

  /** Transforms every action this effect can produce. */
  map<B>(transform: (action: A) => B): Effect<B> {
    const node = this.node
    switch (node.kind) {
      case 'none':
        return Effect.none
      case 'cancel':
        return Effect.cancel(node.id)
      case 'send':
        return Effect.send(transform(node.action))
      case 'run': {
        const body = node.body
        const onError = node.onError
        return new Effect<B>({
          kind: 'run',
          body: (send, signal) => body(action => send(transform(action)), signal),
          onError: onError
            ? (error: Error, send: Send<B>) => onError(error, action => send(transform(action)))
            : undefined,
          dependencies: node.dependencies
        })
      }
      case 'merge':
        return new Effect<B>({ kind: 'merge', effects: node.effects.map(effect => effect.map(transform)) })
      case 'concatenate':
        return new Effect<B>({ kind: 'concatenate', effects: node.effects.map(effect => effect.map(transform)) })
      case 'cancellable':
        return new Effect<B>({
          kind: 'cancellable',
          id: node.id,
          cancelInFlight: node.cancelInFlight,
          effect: node.effect.map(transform)
        })
    }
  }

  /**
   * Registers the whole effect under `id` while it runs so `Effect.cancel(id)`
   * can stop it.
   */
  cancellable(id: CancelId, options: CancellableOptions = {}): Effect<A> {
    if (this.isNone) return this
    return new Effect({
      kind: 'cancellable',
      id,
      cancelInFlight: options.cancelInFlight ?? false,
      effect: this
    })
  }

  /**
   * Delays this effect by `ms`; a newer debounced effect under the same id
   * replaces one still waiting.
   */
  debounce(id: CancelId, ms: number): Effect<A> {
    return Effect.concatenate<A>(Effect.sleep(ms), this).cancellable(id, { cancelInFlight: true })
  }

  /**
   * Races this effect against a delay of `ms` under one cancellation id.
   * Whichever finishes first cancels the other; when the delay wins,
   * `onTimeout` is sent. Work that does nothing never times out.
   */
  timeout(id: CancelId, ms: number, onTimeout: A): Effect<A> {
    if (this.isNone) return this
    return Effect.merge<A>(
      Effect.concatenate<A>(this, Effect.cancel(id)).cancellable(id),
      Effect.concatenate<A>(Effect.sleep(ms), Effect.send(onTimeout), Effect.cancel(id)).cancellable(id)
    )
  }

  merge(...others: Effect<A>[]): Effect<A> {
    return Effect.merge(this, ...others)
  }

  concatenate(...others: Effect<A>[]): Effect<A> {
    return Effect.concatenate(this, ...others)
  }
}
