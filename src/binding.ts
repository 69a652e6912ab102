import { reportProgrammingError } from './diagnostics'
import { Effect } from './effect'
import { getNestedProperty, setNestedProperty, type Path, type PathValue } from './helpers'
import type { Reducer } from './reducer'

/**
 * A direct write of `value` to the field at `path`. Include
 * `BindingAction<State>` in a feature's action union to accept them.
 */
export interface BindingAction<State> {
  readonly type: 'binding'
  readonly path: string
  readonly value: unknown
  /** Type-level tag only; never set at runtime. */
  readonly state?: State
}

/**
 * Typed constructors for binding actions.
 *
 * @example
 * ```ts
 * const bind = bindings<TodosState>()
 * store.send(bind.set('filter', 'active'))
 * ```
 */
export function bindings<State>() {
  return {
    set<P extends Path<State>>(path: P & string, value: PathValue<State, P>): BindingAction<State> {
      return { type: 'binding', path, value }
    }
  }
}

export function isBindingAction(action: unknown): action is BindingAction<unknown> {
  return (
    typeof action === 'object' &&
    action !== null &&
    'type' in action &&
    action.type === 'binding' &&
    'path' in action &&
    typeof action.path === 'string'
  )
}

/**
 * Applies binding actions to state and ignores everything else. Place it
 * before the feature's own logic so that logic sees the written value.
 */
export function bindingReducer<State extends object, Action>(): Reducer<State, Action> {
  return {
    reduce(state, action) {
      if (!isBindingAction(action)) return Effect.none
      const separator = action.path.lastIndexOf('.')
      const parent = separator === -1 ? state : getNestedProperty(state, action.path.slice(0, separator))
      if (typeof parent !== 'object' || parent === null || !setNestedProperty(state, action.path, action.value)) {
        reportProgrammingError(`Binding to "${action.path}" does not address a field of the state`)
      }
      return Effect.none
    }
  }
}
