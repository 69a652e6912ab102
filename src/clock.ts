import { setTimeout as delay } from 'node:timers/promises'

/**
 * Time source used by effects that wait. Reducers never read the wall clock
 * directly; they resolve the `clock` dependency so tests can substitute one
 * of the controllable implementations below.
 */
export interface Clock {
  now(): number
  /** Resolves after `ms`; rejects with the signal's reason when aborted first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('The operation was aborted')
}

export class LiveClock implements Clock {
  now(): number {
    return Date.now()
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return delay(Math.max(0, ms), undefined, { signal })
  }
}

/**
 * A clock that never waits. Useful in previews and in tests that only care
 * about the order of delivered actions.
 */
export class ImmediateClock implements Clock {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortReason(signal)
    this.current += Math.max(0, ms)
  }
}

interface Sleeper {
  deadline: number
  order: number
  resolve: () => void
}

function flushMicrotasks(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}

/**
 * A manually driven clock. Sleeps resolve only when `advance` moves time past
 * their deadline, in deadline order.
 *
 * @example
 * ```ts
 * const clock = new TestClock()
 * store.send({ type: 'startTimer' })
 * await clock.advance(1000)
 * ```
 */
export class TestClock implements Clock {
  private current: number
  private sleepers: Sleeper[] = []
  private nextOrder = 0

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  /** Number of sleeps still waiting on this clock. */
  get pendingSleeps(): number {
    return this.sleepers.length
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal))

    return new Promise<void>((resolve, reject) => {
      const sleeper: Sleeper = {
        deadline: this.current + Math.max(0, ms),
        order: this.nextOrder++,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        }
      }
      const onAbort = () => {
        this.sleepers = this.sleepers.filter(entry => entry !== sleeper)
        if (signal) reject(abortReason(signal))
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.sleepers.push(sleeper)
    })
  }

  /**
   * Moves time forward by `ms`, waking every sleeper whose deadline falls in
   * the window and letting its continuation run before waking the next one.
   */
  async advance(ms = 0): Promise<void> {
    const target = this.current + Math.max(0, ms)
    await flushMicrotasks()
    for (;;) {
      const next = this.nextDue(target)
      if (!next) break
      this.sleepers = this.sleepers.filter(entry => entry !== next)
      this.current = next.deadline
      next.resolve()
      await flushMicrotasks()
    }
    this.current = target
    await flushMicrotasks()
  }

  /** Advances until no sleeper is left. */
  async run(): Promise<void> {
    await flushMicrotasks()
    while (this.sleepers.length > 0) {
      const latest = Math.max(...this.sleepers.map(entry => entry.deadline))
      await this.advance(latest - this.current)
    }
  }

  private nextDue(target: number): Sleeper | undefined {
    let due: Sleeper | undefined
    for (const sleeper of this.sleepers) {
      if (sleeper.deadline > target) continue
      if (!due || sleeper.deadline < due.deadline || (sleeper.deadline === due.deadline && sleeper.order < due.order)) {
        due = sleeper
      }
    }
    return due
  }
}
