/**
 * Store
 * =====
 *
 * The runtime that owns one state tree. Actions go in through `send`, are
 * reduced one at a time against the live state, and every effect a reduction
 * returns is started right away; actions those effects produce come back
 * through the same queue.
 *
 * --- DISPATCH ---
 * `send` never waits for effects. Sends issued while the queue is draining
 * (from effects, subscribers or `Effect.send`) are appended and handled in
 * arrival order by the drain already in progress, so a reduction always sees
 * the result of every action sent before it.
 *
 * --- SNAPSHOTS ---
 * Readers never see the live tree. After each action the store publishes a
 * deep copy; `Shared` references inside it are kept by identity and the store
 * republishes whenever one of their cells changes.
 *
 * @example
 * ```ts
 * const store = createStore({ count: 0 }, counter, { name: 'Counter' })
 * store.subscribe(state => render(state.count))
 * store.send({ type: 'increment' })
 * ```
 */

import { cancellations as processCancellations, type CancellationTable } from './cancellation'
import { fromSubscription } from './channel'
import {
  DependencyValues,
  captureDependencies,
  runWithDependencies,
  type DependencyOverrides
} from './dependencies'
import { describeAction, reportProgrammingError, runtimeWarn } from './diagnostics'
import { Effect } from './effect'
import { runEffect } from './effect-runner'
import { cloneState, deepEqual, isPlainObject } from './helpers'
import type { Reducer } from './reducer'
import { Shared } from './shared'
import { EffectTask } from './task'

// =============================================================================
// TYPES
// =============================================================================

export interface StoreOptions {
  /** Used in log output. */
  name?: string
  /** Overrides applied to every reduction and to every effect the store runs. */
  dependencies?: DependencyOverrides
  cancellations?: CancellationTable
}

/** Handle to the effects started by one `send`. */
export interface StoreTask {
  /** True until every effect started by the action has finished or been cancelled. */
  readonly isActive: boolean
  cancel(): void
  /** Resolves once the effects started by the action have finished. */
  finish(): Promise<void>
}

export type StateListener<State> = (state: Readonly<State>) => void

/** What views need from a store or a scoped part of one. */
export interface StoreView<State, Action> {
  readonly state: Readonly<State>
  send(action: Action): StoreTask
  subscribe(listener: StateListener<State>): () => void
  scope<ChildState, ChildAction>(
    toState: (state: Readonly<State>) => ChildState,
    fromAction: (action: ChildAction) => Action
  ): StoreView<ChildState, ChildAction>
}

interface QueuedAction<Action> {
  action: Action
  task: EffectTask
}

interface SharedReference {
  subscribe(listener: () => void): () => void
}

class ActionTask implements StoreTask {
  private readonly task: EffectTask
  private readonly settled: Promise<void>

  constructor(task: EffectTask) {
    this.task = task
    this.settled = new Promise<void>(resolve => {
      task.onSettled(() => resolve())
    })
  }

  get isActive(): boolean {
    return !this.task.isSettled
  }

  cancel(): void {
    this.task.cancel()
  }

  finish(): Promise<void> {
    return this.settled
  }
}

// =============================================================================
// STORE
// =============================================================================

export class Store<State extends object, Action> implements StoreView<State, Action> {
  readonly name: string
  private readonly live: State
  private readonly reducer: Reducer<State, Action>
  private readonly dependencyScope: DependencyValues
  private readonly cancellations: CancellationTable
  private readonly lifetime = new AbortController()
  private readonly queue: QueuedAction<Action>[] = []
  private readonly listeners = new Set<StateListener<State>>()
  private readonly inFlight = new Set<Promise<void>>()
  private readonly trackedShared = new Map<SharedReference, () => void>()
  private snapshot: Readonly<State>
  private isSending = false
  private isStale = false

  constructor(initialState: State, reducer: Reducer<State, Action>, options: StoreOptions = {}) {
    this.name = options.name ?? 'Store'
    this.live = cloneState(initialState)
    this.reducer = reducer
    this.cancellations = options.cancellations ?? processCancellations
    this.dependencyScope = new DependencyValues(captureDependencies(), { ownsTestValues: true })
    options.dependencies?.(this.dependencyScope)
    this.snapshot = cloneState(this.live)
    this.trackShared()
  }

  /** The latest published snapshot. */
  get state(): Readonly<State> {
    return this.snapshot
  }

  currentState(): Readonly<State> {
    return this.snapshot
  }

  get isDestroyed(): boolean {
    return this.lifetime.signal.aborted
  }

  /** Number of effect trees still running. */
  get runningEffects(): number {
    return this.inFlight.size
  }

  send(action: Action): StoreTask {
    const task = new EffectTask(this.lifetime.signal)
    if (this.isDestroyed) {
      runtimeWarn(`Ignored "${describeAction(action)}" sent after the store was destroyed`, this.name)
      return new ActionTask(task)
    }
    task.start()
    this.queue.push({ action, task })
    this.drain()
    return new ActionTask(task)
  }

  subscribe(listener: StateListener<State>): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  /**
   * Every snapshot from now on, starting with the current one. The sequence
   * ends when the store is destroyed or the consumer stops iterating.
   */
  observeChanges(): AsyncIterableIterator<Readonly<State>> {
    const changes = fromSubscription<Readonly<State>>(push => this.subscribe(push), this.lifetime.signal)
    changes.push(this.snapshot)
    return changes
  }

  scope<ChildState, ChildAction>(
    toState: (state: Readonly<State>) => ChildState,
    fromAction: (action: ChildAction) => Action
  ): StoreView<ChildState, ChildAction> {
    return new ScopedStore(this, toState, fromAction)
  }

  /** Resolves once no effect of this store is running. */
  async finish(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight))
    }
  }

  /** Cancels every running effect and detaches all observers. */
  destroy(): void {
    if (this.isDestroyed) return
    this.lifetime.abort()
    this.queue.length = 0
    this.listeners.clear()
    this.trackedShared.forEach(unsubscribe => unsubscribe())
    this.trackedShared.clear()
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private drain(): void {
    if (this.isSending) return
    this.isSending = true
    const failures: Array<{ action: Action; error: unknown }> = []
    try {
      while (this.queue.length > 0) {
        const [entry] = this.queue.splice(0, 1)
        this.process(entry, failures)
      }
    } finally {
      this.isSending = false
    }

    if (this.isStale) this.publish()
    for (const failure of failures) {
      reportProgrammingError(
        `The reducer threw while handling "${describeAction(failure.action)}"`,
        this.name,
        failure.error
      )
    }
  }

  private process(entry: QueuedAction<Action>, failures: Array<{ action: Action; error: unknown }>): void {
    let effect: Effect<Action> = Effect.none
    try {
      effect = runWithDependencies(this.dependencyScope, () => this.reducer.reduce(this.live, entry.action))
    } catch (error) {
      failures.push({ action: entry.action, error })
    }
    this.trackShared()
    this.publish()
    this.schedule(effect, entry.task)
  }

  private schedule(effect: Effect<Action>, task: EffectTask): void {
    if (effect.isNone) {
      task.complete()
      return
    }
    const running = runEffect(effect, {
      send: action => this.receiveFromEffect(action),
      signal: task.signal,
      cancellations: this.cancellations,
      source: this.name
    }).then(() => task.complete())
    this.inFlight.add(running)
    void running.finally(() => this.inFlight.delete(running))
  }

  private receiveFromEffect(action: Action): void {
    try {
      this.send(action)
    } catch (error) {
      runtimeWarn(`An action sent by an effect failed: "${describeAction(action)}"`, this.name, error)
    }
  }

  // ---------------------------------------------------------------------------
  // Publishing
  // ---------------------------------------------------------------------------

  private publish(): void {
    this.isStale = false
    this.snapshot = cloneState(this.live)
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(this.snapshot)
      } catch (error) {
        runtimeWarn('A state listener threw', this.name, error)
      }
    }
  }

  private onSharedChange(): void {
    if (this.isDestroyed) return
    if (this.isSending) {
      this.isStale = true
      return
    }
    this.publish()
  }

  private trackShared(): void {
    const reachable = new Set<SharedReference>()
    collectShared(this.live, reachable, new Set())
    for (const [reference, unsubscribe] of this.trackedShared) {
      if (!reachable.has(reference)) {
        unsubscribe()
        this.trackedShared.delete(reference)
      }
    }
    for (const reference of reachable) {
      if (!this.trackedShared.has(reference)) {
        this.trackedShared.set(reference, reference.subscribe(() => this.onSharedChange()))
      }
    }
  }
}

function collectShared(value: unknown, found: Set<SharedReference>, visited: Set<object>): void {
  if (typeof value !== 'object' || value === null || visited.has(value)) return
  visited.add(value)
  if (value instanceof Shared) {
    found.add(value)
  } else if (Array.isArray(value) || value instanceof Set) {
    for (const item of value) collectShared(item, found, visited)
  } else if (value instanceof Map) {
    for (const item of value.values()) collectShared(item, found, visited)
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) collectShared(item, found, visited)
  }
}

/** A copy of `value` in which every `Shared` is replaced by a copy of its current value. */
function withSharedValues(value: unknown): unknown {
  if (value instanceof Shared) return cloneState(value.value)
  if (Array.isArray(value)) return value.map(withSharedValues)
  if (value instanceof Map) {
    return new Map(Array.from(value, ([key, entry]) => [key, withSharedValues(entry)]))
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {}
    for (const key of Object.keys(value)) copy[key] = withSharedValues(value[key])
    return copy
  }
  return value
}

export function createStore<State extends object, Action>(
  initialState: State,
  reducer: Reducer<State, Action>,
  options?: StoreOptions
): Store<State, Action> {
  return new Store(initialState, reducer, options)
}

// =============================================================================
// SCOPED VIEWS
// =============================================================================

/**
 * A child's view of a store. Listeners only hear about snapshots in which the
 * child's part actually changed, including the values of `Shared` cells it holds.
 */
export class ScopedStore<ParentState, ParentAction, State, Action> implements StoreView<State, Action> {
  private readonly parent: StoreView<ParentState, ParentAction>
  private readonly toState: (state: Readonly<ParentState>) => State
  private readonly fromAction: (action: Action) => ParentAction

  constructor(
    parent: StoreView<ParentState, ParentAction>,
    toState: (state: Readonly<ParentState>) => State,
    fromAction: (action: Action) => ParentAction
  ) {
    this.parent = parent
    this.toState = toState
    this.fromAction = fromAction
  }

  get state(): Readonly<State> {
    return this.toState(this.parent.state)
  }

  send(action: Action): StoreTask {
    return this.parent.send(this.fromAction(action))
  }

  subscribe(listener: StateListener<State>): () => void {
    let last = withSharedValues(this.state)
    return this.parent.subscribe(parentState => {
      const next = this.toState(parentState)
      const compared = withSharedValues(next)
      if (deepEqual(compared, last)) return
      last = compared
      listener(next)
    })
  }

  scope<ChildState, ChildAction>(
    toState: (state: Readonly<State>) => ChildState,
    fromAction: (action: ChildAction) => Action
  ): StoreView<ChildState, ChildAction> {
    return new ScopedStore(this, toState, fromAction)
  }
}
