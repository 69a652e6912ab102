import { LOG_PREFIX, describeAction } from './diagnostics'
import { cloneState, deepEqual, getNestedProperty } from './helpers'
import type { Reducer } from './reducer'

export interface DebugOptions {
  /** Label printed with every line. */
  name?: string
  log?: (line: string) => void
}

/**
 * Logs every action the reducer receives and the top-level fields it changed.
 *
 * @example
 * ```ts
 * const store = createStore(initialState, debugActions(todos, { name: 'Todos' }))
 * // [composable-store] Todos: received "addTodo"; changed todos
 * ```
 */
export function debugActions<State extends object, Action>(
  reducer: Reducer<State, Action>,
  options: DebugOptions = {}
): Reducer<State, Action> {
  const name = options.name ?? 'Reducer'
  const log = options.log ?? ((line: string) => console.log(line))

  return {
    reduce(state, action) {
      const before = cloneState(state)
      const effect = reducer.reduce(state, action)
      const changed = Object.keys(state).filter(
        key => !deepEqual(getNestedProperty(before, key), getNestedProperty(state, key))
      )
      const summary = changed.length > 0 ? `changed ${changed.join(', ')}` : 'no state change'
      log(`${LOG_PREFIX} ${name}: received "${describeAction(action)}"; ${summary}`)
      return effect
    }
  }
}
