/**
 * Shared State
 * ============
 *
 * A `Shared<T>` is a reference to a process-wide cell identified by a
 * persistence key. Every reference built from an equal key reads and writes
 * the same cell, so a value written through one reference is visible through
 * all the others as soon as the write returns. The cell persists writes through
 * its backend and, while at least one reference is alive, follows changes the
 * backend reports from elsewhere.
 *
 * Shared references can live inside store state: snapshots carry them by
 * reference and the store republishes whenever a referenced cell changes.
 *
 * @example
 * ```ts
 * interface SettingsState { theme: Shared<'light' | 'dark'> }
 *
 * const settings = createReducer<SettingsState, SettingsAction>({
 *   toggleTheme: state =>
 *     state.theme.write(state.theme.value === 'light' ? 'dark' : 'light', {
 *       onFailure: error => ({ type: 'saveFailed', message: error.message })
 *     })
 * })
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises'
import { getConfig } from './config'
import { runtimeWarn, toError } from './diagnostics'
import { Effect, type Result } from './effect'
import { cloneState, deepEqual, freezeState } from './helpers'
import type { PersistenceBackend, PersistenceKey } from './persistence'

type Listener<T> = (value: T) => void

function notifyAll<T>(listeners: Iterable<Listener<T>>, value: T, source: string): void {
  for (const listener of Array.from(listeners)) {
    try {
      listener(value)
    } catch (error) {
      runtimeWarn('A shared value listener threw', source, error)
    }
  }
}

// =============================================================================
// CELL
// =============================================================================

/** The storage behind every reference to one key. */
export class SharedCell<T> {
  readonly id: string
  private readonly storageKey: string
  private readonly backend: PersistenceBackend<T>
  private current: T
  // Private copy of the last applied value; `current` is handed out.
  private committed: T
  private readonly listeners = new Set<Listener<T>>()
  private readonly errorListeners = new Set<Listener<Error>>()
  private references = 0
  private pendingWrites = 0
  private version = 0
  private failure: Error | undefined
  private subscription: AbortController | undefined
  readonly ready: Promise<void>

  constructor(key: PersistenceKey<T>, defaultValue: T) {
    this.id = key.id
    this.storageKey = key.storageKey
    this.backend = key.backend
    this.committed = cloneState(defaultValue)
    this.current = freezeState(cloneState(defaultValue))
    this.ready = this.loadInitialValue()
  }

  /** Frozen; write a changed copy through `set` instead of mutating it. */
  get value(): T {
    return this.current
  }

  get referenceCount(): number {
    return this.references
  }

  get lastError(): Error | undefined {
    return this.failure
  }

  retain(): void {
    this.references += 1
    if (this.references === 1) this.follow()
  }

  release(): void {
    if (this.references === 0) return
    this.references -= 1
    if (this.references === 0) {
      this.subscription?.abort()
      this.subscription = undefined
    }
  }

  /**
   * Updates the value for every reference immediately, then saves it. The
   * returned promise rejects when the backend fails; the failure is also
   * recorded in `lastError` and reported to error listeners.
   */
  async set(value: T): Promise<void> {
    this.version += 1
    this.apply(value)
    this.pendingWrites += 1
    try {
      await this.backend.save(this.storageKey, value)
      this.failure = undefined
    } catch (thrown) {
      const error = toError(thrown)
      this.reportFailure(error)
      throw error
    } finally {
      this.pendingWrites -= 1
    }
  }

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  onError(listener: Listener<Error>): () => void {
    this.errorListeners.add(listener)
    return () => this.errorListeners.delete(listener)
  }

  /** Stops following the backend regardless of outstanding references. */
  close(): void {
    this.subscription?.abort()
    this.subscription = undefined
    this.references = 0
  }

  private async loadInitialValue(): Promise<void> {
    const version = this.version
    try {
      const stored = await this.backend.load(this.storageKey)
      // A local write made while loading wins over the stored value.
      if (stored !== undefined && this.version === version) this.apply(stored)
    } catch (thrown) {
      this.reportFailure(toError(thrown))
    }
  }

  private receive(value: T): void {
    if (this.pendingWrites > 0) return
    this.apply(value)
  }

  private apply(value: T): void {
    if (deepEqual(value, this.committed)) return
    this.committed = cloneState(value)
    this.current = freezeState(cloneState(value))
    notifyAll(this.listeners, this.current, this.id)
  }

  private reportFailure(error: Error): void {
    this.failure = error
    notifyAll(this.errorListeners, error, this.id)
  }

  private follow(): void {
    const subscribe = this.backend.subscribe
    if (!subscribe) return
    const controller = new AbortController()
    this.subscription = controller
    void this.followUntilAborted(subscribe.bind(this.backend), controller.signal)
  }

  private async followUntilAborted(
    subscribe: (key: string, signal: AbortSignal) => AsyncIterable<T>,
    signal: AbortSignal
  ): Promise<void> {
    while (!signal.aborted) {
      try {
        for await (const value of subscribe(this.storageKey, signal)) {
          if (signal.aborted) return
          this.receive(value)
        }
      } catch (thrown) {
        if (signal.aborted) return
        this.reportFailure(toError(thrown))
      }
      if (signal.aborted) return
      try {
        await delay(getConfig().sharedRetryDelay, undefined, { signal })
      } catch {
        return
      }
    }
  }
}

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Owns the cells of the process. A cell is created by the first reference to
 * its key and stays alive (keeping its last value) after the last reference
 * is released; `teardown` drops it.
 */
export class SharedCellRegistry {
  private readonly cells = new Map<string, SharedCell<unknown>>()

  retain<T>(key: PersistenceKey<T>, defaultValue: T): SharedCell<T> {
    const existing = this.cells.get(key.id)
    // Keys with equal ids name the same value, so they agree on its type.
    const cell = existing ? (existing as SharedCell<T>) : this.create(key, defaultValue)
    cell.retain()
    return cell
  }

  has(id: string): boolean {
    return this.cells.has(id)
  }

  get size(): number {
    return this.cells.size
  }

  /** Forgets the cell for `id`; the next reference starts from its default. */
  teardown(id: string): void {
    this.cells.get(id)?.close()
    this.cells.delete(id)
  }

  teardownAll(): void {
    for (const id of Array.from(this.cells.keys())) this.teardown(id)
  }

  private create<T>(key: PersistenceKey<T>, defaultValue: T): SharedCell<T> {
    const cell = new SharedCell(key, defaultValue)
    this.cells.set(key.id, cell)
    return cell
  }
}

export const sharedCells = new SharedCellRegistry()

// =============================================================================
// REFERENCE
// =============================================================================

export interface WriteOptions<A> {
  /** Turns a failed save into an action. */
  onFailure?: (error: Error) => A
}

export interface ObserveOptions<T, A> {
  onChange: (value: T) => A
  onFailure?: (error: Error) => A
}

export class Shared<T> {
  private readonly cell: SharedCell<T>
  private released = false

  constructor(key: PersistenceKey<T>, defaultValue: T, registry: SharedCellRegistry = sharedCells) {
    this.cell = registry.retain(key, defaultValue)
  }

  /** A reference whose initial backend load has finished. */
  static async load<T>(key: PersistenceKey<T>, defaultValue: T): Promise<Shared<T>> {
    const shared = new Shared(key, defaultValue)
    await shared.ready
    return shared
  }

  get key(): string {
    return this.cell.id
  }

  /**
   * The cell's latest value. Arrays and plain objects in it are frozen, so
   * every change goes through `set`, `update` or `write` and reaches
   * subscribers and the backend.
   */
  get value(): T {
    return this.cell.value
  }

  /** Settles once the initial load from the backend finished or failed. */
  get ready(): Promise<void> {
    return this.cell.ready
  }

  /** The most recent backend failure; cleared by the next successful save. */
  get lastError(): Error | undefined {
    return this.cell.lastError
  }

  get isReleased(): boolean {
    return this.released
  }

  set(value: T): Promise<void> {
    return this.cell.set(value)
  }

  /** Applies `mutate` to a copy of the current value and writes the result. */
  update(mutate: (draft: T) => void): Promise<void> {
    const draft = cloneState(this.cell.value)
    mutate(draft)
    return this.cell.set(draft)
  }

  /**
   * Writes `value` now and returns an effect that reports a failed save.
   * The value is visible through every reference before the reducer returns.
   */
  write<A>(value: T, options: WriteOptions<A> = {}): Effect<A> {
    const saved = this.cell.set(value).then(
      (): Result<void> => ({ ok: true, value: undefined }),
      (error: unknown): Result<void> => ({ ok: false, error: toError(error) })
    )
    const { onFailure } = options
    if (!onFailure) return Effect.none
    return Effect.run<A>(async send => {
      const result = await saved
      if (!result.ok) send(onFailure(result.error))
    })
  }

  subscribe(listener: (value: T) => void): () => void {
    return this.cell.subscribe(listener)
  }

  onError(listener: (error: Error) => void): () => void {
    return this.cell.onError(listener)
  }

  /**
   * A long-running effect that sends `onChange` for every value the cell takes
   * on after it starts. Give it a cancellation id to stop it.
   */
  observe<A>(options: ObserveOptions<T, A>): Effect<A> {
    return Effect.run<A>(
      (send, signal) =>
        new Promise<void>(resolve => {
          const { onChange, onFailure } = options
          const stopChanges = this.subscribe(value => send(onChange(value)))
          const stopErrors = onFailure ? this.onError(error => send(onFailure(error))) : undefined
          const stop = () => {
            stopChanges()
            stopErrors?.()
            resolve()
          }
          if (signal.aborted) stop()
          else signal.addEventListener('abort', stop, { once: true })
        })
    )
  }

  /** Drops this reference. The cell stops following its backend once no reference is left. */
  release(): void {
    if (this.released) return
    this.released = true
    this.cell.release()
  }
}
