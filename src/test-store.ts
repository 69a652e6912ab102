/**
 * Exhaustive test harness over a `Store`.
 *
 * Every action sent from the test must be followed by a description of how it
 * changed the state, and every action an effect feeds back must be claimed with
 * `receive` before the next `send`. `finish` fails when effects are still
 * running or received actions were never claimed.
 *
 * @example
 * ```ts
 * const store = new TestStore({ count: 0 }, counter)
 * store.send({ type: 'incrementLater' })
 * await store.receive({ type: 'increment' }, state => { state.count = 1 })
 * await store.finish()
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises'
import { LOG_PREFIX, describeAction } from './diagnostics'
import { cloneState, deepEqual } from './helpers'
import type { Reducer } from './reducer'
import { Shared } from './shared'
import { Store, type StoreOptions, type StoreTask } from './store'

export interface TestStoreOptions extends StoreOptions {
  /** How long `receive` and `finish` wait, in milliseconds. Defaults to 1000. */
  timeout?: number
}

/** Tags each action with where it came from. */
interface Envelope<Action> {
  readonly source: 'test' | 'effect'
  readonly action: Action
}

interface ReceivedAction<State, Action> {
  readonly action: Action
  /** State right after the action was reduced. */
  readonly state: State
}

function describeState(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, entry: unknown) => {
      if (entry instanceof Shared) return { shared: entry.key, value: entry.value }
      if (entry instanceof Map) return Object.fromEntries(entry)
      if (entry instanceof Set) return Array.from(entry)
      return entry
    },
    2
  )
}

function failure(message: string): Error {
  return new Error(`${LOG_PREFIX} ${message}`)
}

export class TestStore<State extends object, Action> {
  private readonly store: Store<State, Envelope<Action>>
  private readonly timeout: number
  private readonly received: ReceivedAction<State, Action>[] = []
  private readonly receiveWaiters = new Set<() => void>()
  private expected: State
  private lastSent: State

  constructor(initialState: State, reducer: Reducer<State, Action>, options: TestStoreOptions = {}) {
    this.timeout = options.timeout ?? 1000
    this.expected = cloneState(initialState)
    this.lastSent = cloneState(initialState)

    const recording: Reducer<State, Envelope<Action>> = {
      reduce: (state, envelope) => {
        const effect = reducer.reduce(state, envelope.action)
        if (envelope.source === 'effect') {
          this.received.push({ action: envelope.action, state: cloneState(state) })
          this.receiveWaiters.forEach(wake => wake())
        } else {
          this.lastSent = cloneState(state)
        }
        return effect.map((action): Envelope<Action> => ({ source: 'effect', action }))
      }
    }

    this.store = new Store(initialState, recording, { ...options, name: options.name ?? 'TestStore' })
  }

  get state(): Readonly<State> {
    return this.store.state
  }

  /** Actions delivered by effects that no `receive` has claimed yet. */
  get pendingReceivedActions(): readonly Action[] {
    return this.received.map(entry => entry.action)
  }

  /**
   * Sends `action` and asserts that applying `update` to the previous state
   * yields exactly the state the reducer produced.
   */
  send(action: Action, update?: (state: State) => void): StoreTask {
    if (this.received.length > 0) {
      throw failure(
        `Must handle ${this.received.length} received action(s) before sending "${describeAction(action)}": ` +
          this.received.map(entry => describeAction(entry.action)).join(', ')
      )
    }
    const task = this.store.send({ source: 'test', action })
    this.assertTransition(`sending "${describeAction(action)}"`, this.lastSent, update)
    return task
  }

  /** Waits for an effect to deliver `expected` and asserts the state it produced. */
  receive(expected: Action, update?: (state: State) => void): Promise<void> {
    return this.receiveMatching(
      action => deepEqual(action, expected),
      update,
      describeState(expected)
    )
  }

  /** Waits for an effect to deliver an action accepted by `matches`. */
  async receiveMatching(
    matches: (action: Action) => boolean,
    update?: (state: State) => void,
    description = 'a matching action'
  ): Promise<void> {
    await this.waitForReceived(description)
    const [next] = this.received.splice(0, 1)
    if (!matches(next.action)) {
      throw failure(`Expected to receive ${description} but received ${describeState(next.action)}`)
    }
    this.assertTransition(`receiving "${describeAction(next.action)}"`, next.state, update)
  }

  /** Claims every received action, accepting whatever state they produced. */
  skipReceivedActions(): void {
    const last = this.received.at(-1)
    this.received.length = 0
    if (last) this.expected = cloneState(last.state)
  }

  /**
   * Waits for in-flight effects, then fails if any are still running or any
   * received action was never claimed.
   */
  async finish(): Promise<void> {
    const settled = await this.waitForEffects()
    if (!settled) {
      throw failure(
        `${this.store.runningEffects} effect(s) still running after ${this.timeout}ms. ` +
          'Cancel long-running effects or claim their actions before finishing.'
      )
    }
    if (this.received.length > 0) {
      throw failure(
        `${this.received.length} received action(s) were never handled: ` +
          this.received.map(entry => describeAction(entry.action)).join(', ')
      )
    }
  }

  /** Cancels everything the store is running. */
  destroy(): void {
    this.store.destroy()
  }

  private assertTransition(step: string, actual: State, update?: (state: State) => void): void {
    const expected = cloneState(this.expected)
    update?.(expected)
    this.expected = cloneState(actual)
    if (!deepEqual(expected, actual)) {
      throw failure(
        `State after ${step} does not match.\nExpected: ${describeState(expected)}\nActual: ${describeState(actual)}`
      )
    }
  }

  private waitForReceived(description: string): Promise<void> {
    if (this.received.length > 0) return Promise.resolve()
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.receiveWaiters.delete(wake)
        reject(failure(`Expected to receive ${description} within ${this.timeout}ms, but nothing arrived`))
      }, this.timeout)
      const wake = () => {
        clearTimeout(timer)
        this.receiveWaiters.delete(wake)
        resolve()
      }
      this.receiveWaiters.add(wake)
    })
  }

  private async waitForEffects(): Promise<boolean> {
    const controller = new AbortController()
    const timedOut = delay(this.timeout, false, { signal: controller.signal }).catch(() => false)
    const finished = this.store.finish().then(() => true)
    const settled = await Promise.race([finished, timedOut])
    controller.abort()
    return settled
  }
}
