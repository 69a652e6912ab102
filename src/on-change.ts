import { Effect } from './effect'
import { cloneState, deepEqual } from './helpers'
import type { Reducer } from './reducer'

export interface OnChangeConfig<State, Action, Value> {
  /** The projection to watch. */
  of: (state: State) => Value
  /** Defaults to structural equality. */
  isEqual?: (previous: Value, next: Value) => boolean
  /** The extra step to run, against the updated state, when the projection changed. */
  run: (previous: Value, next: Value) => Reducer<State, Action>
}

/**
 * Runs `upstream`, then runs an extra reducer step whenever the watched
 * projection of state differs from what it was before the action.
 *
 * The comparison happens after everything inside `upstream` has run, so when
 * `upstream` contains `forEach` or `ifLet`, element and child routing come
 * first, then the parent, then the change step.
 *
 * @example
 * ```ts
 * onChange(todos, {
 *   of: state => state.filter,
 *   run: (_previous, filter) => reduce(state => {
 *     state.visible = state.todos.filter(matches(filter))
 *   })
 * })
 * ```
 */
export function onChange<State, Action, Value>(
  upstream: Reducer<State, Action>,
  config: OnChangeConfig<State, Action, Value>
): Reducer<State, Action> {
  const isEqual = config.isEqual ?? deepEqual

  return {
    reduce(state, action) {
      // Copied so in-place mutation by upstream cannot alter the "before" value.
      const previous = cloneState(config.of(state))
      const upstreamEffect = upstream.reduce(state, action)
      const next = config.of(state)
      if (isEqual(previous, next)) return upstreamEffect
      return Effect.merge(upstreamEffect, config.run(previous, next).reduce(state, action))
    }
  }
}
