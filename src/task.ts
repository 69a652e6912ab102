/**
 * Lifecycle of one scheduled effect instance, modelled as an XState machine:
 *
 *   idle ──start──▶ running ──complete──▶ completed
 *     │                │────fail──────▶ failed
 *     └──cancel──┬─────┘────cancel────▶ cancelled
 *
 * Terminal states are final, so a settled task ignores every later event.
 */

import { createActor, setup, type Actor } from 'xstate'

type TaskEvent =
  | { type: 'start' }
  | { type: 'complete' }
  | { type: 'fail' }
  | { type: 'cancel' }

export const effectTaskMachine = setup({
  types: {
    events: {} as TaskEvent
  }
}).createMachine({
  id: 'effectTask',
  initial: 'idle',
  states: {
    idle: {
      on: { start: 'running', cancel: 'cancelled' }
    },
    running: {
      on: { complete: 'completed', fail: 'failed', cancel: 'cancelled' }
    },
    completed: { type: 'final' },
    failed: { type: 'final' },
    cancelled: { type: 'final' }
  }
})

export type EffectTaskStatus = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled'

const STATUSES: readonly EffectTaskStatus[] = ['idle', 'running', 'completed', 'failed', 'cancelled']

let nextTaskId = 1

export class EffectTask {
  readonly id = nextTaskId++
  private readonly controller = new AbortController()
  private readonly actor: Actor<typeof effectTaskMachine>
  private readonly settledListeners = new Set<(task: EffectTask) => void>()
  private detachParent: (() => void) | undefined
  private failure: Error | undefined

  /**
   * @param parent Cancelling the parent signal cancels this task.
   */
  constructor(parent?: AbortSignal) {
    this.actor = createActor(effectTaskMachine)
    this.actor.subscribe(snapshot => {
      if (snapshot.status === 'done') this.settle()
    })
    this.actor.start()

    if (parent) {
      if (parent.aborted) {
        this.cancel()
      } else {
        const onAbort = () => this.cancel()
        parent.addEventListener('abort', onAbort, { once: true })
        this.detachParent = () => parent.removeEventListener('abort', onAbort)
      }
    }
  }

  get status(): EffectTaskStatus {
    const snapshot = this.actor.getSnapshot()
    return STATUSES.find(status => snapshot.matches(status)) ?? 'idle'
  }

  /** Aborted as soon as the task is cancelled. */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  /** True while the task may still deliver actions. */
  get isRunning(): boolean {
    return this.status === 'running'
  }

  get isSettled(): boolean {
    return this.actor.getSnapshot().status === 'done'
  }

  get error(): Error | undefined {
    return this.failure
  }

  start(): void {
    if (this.isSettled) return
    this.actor.send({ type: 'start' })
  }

  complete(): void {
    if (this.isSettled) return
    this.actor.send({ type: 'complete' })
  }

  fail(error: Error): void {
    if (this.isSettled) return
    this.failure = error
    this.actor.send({ type: 'fail' })
  }

  cancel(): void {
    if (this.isSettled) return
    this.controller.abort()
    this.actor.send({ type: 'cancel' })
  }

  /** Runs `listener` once the task reaches a terminal state (immediately if it already has). */
  onSettled(listener: (task: EffectTask) => void): () => void {
    if (this.isSettled) {
      listener(this)
      return () => {}
    }
    this.settledListeners.add(listener)
    return () => this.settledListeners.delete(listener)
  }

  private settle(): void {
    this.detachParent?.()
    this.detachParent = undefined
    const listeners = Array.from(this.settledListeners)
    this.settledListeners.clear()
    listeners.forEach(listener => listener(this))
  }
}
