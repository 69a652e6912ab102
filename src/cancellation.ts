import type { EffectTask } from './task'

// =============================================================================
// CANCELLATION IDS
// =============================================================================

type CancelIdPart = string | number | symbol

/**
 * Identifies a group of effect tasks that can be cancelled together. Arrays
 * combine a call-site token with an element id, e.g. `[TIMER, todo.id]`, and
 * compare element-wise.
 */
export type CancelId = CancelIdPart | readonly CancelIdPart[]

const symbolIndices = new Map<symbol, number>()

function hashPart(part: CancelIdPart): string {
  if (typeof part === 'string') return `s:${JSON.stringify(part)}`
  if (typeof part === 'number') return `n:${part}`
  let index = symbolIndices.get(part)
  if (index === undefined) {
    index = symbolIndices.size
    symbolIndices.set(part, index)
  }
  return `y:${index}`
}

/** Stable string key for a cancellation id. Equal ids hash equal. */
export function hashCancelId(id: CancelId): string {
  if (typeof id === 'object') {
    return `[${id.map(hashPart).join(',')}]`
  }
  return hashPart(id)
}

// =============================================================================
// CANCELLATION TABLE
// =============================================================================

/**
 * Tracks the tasks currently running under each cancellation id. Entries are
 * removed as soon as their task settles, so the table only ever describes
 * live work.
 */
export class CancellationTable {
  private readonly entries = new Map<string, Set<EffectTask>>()

  register(id: CancelId, task: EffectTask): void {
    if (task.isSettled) return
    const key = hashCancelId(id)
    let tasks = this.entries.get(key)
    if (!tasks) {
      tasks = new Set()
      this.entries.set(key, tasks)
    }
    tasks.add(task)
    task.onSettled(() => this.remove(key, task))
  }

  /**
   * Requests cancellation of every task under `id` and deregisters them.
   *
   * @returns The number of tasks that were cancelled.
   */
  cancel(id: CancelId): number {
    const key = hashCancelId(id)
    const tasks = this.entries.get(key)
    if (!tasks) return 0
    this.entries.delete(key)
    for (const task of tasks) {
      task.cancel()
    }
    return tasks.size
  }

  /** Number of running tasks registered under `id`. */
  count(id: CancelId): number {
    return this.entries.get(hashCancelId(id))?.size ?? 0
  }

  has(id: CancelId): boolean {
    return this.count(id) > 0
  }

  get size(): number {
    return this.entries.size
  }

  cancelAll(): void {
    const all = Array.from(this.entries.values())
    this.entries.clear()
    for (const tasks of all) {
      tasks.forEach(task => task.cancel())
    }
  }

  private remove(key: string, task: EffectTask): void {
    const tasks = this.entries.get(key)
    if (!tasks) return
    tasks.delete(task)
    if (tasks.size === 0) this.entries.delete(key)
  }
}

/** The process-wide table used by stores that are not given their own. */
export const cancellations = new CancellationTable()
