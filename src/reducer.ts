/**
 * Reducers
 * ========
 *
 * A reducer mutates state in place for one action and returns the effect to
 * run afterwards. Features are assembled from small reducers with the
 * combinators in this module and its siblings (`for-each`, `if-let`,
 * `on-change`, `binding`).
 *
 * @example
 * ```ts
 * type CounterAction = { type: 'increment' } | { type: 'reset' }
 *
 * const counter = createReducer<{ count: number }, CounterAction>({
 *   increment: state => { state.count += 1 },
 *   reset: state => { state.count = 0 }
 * })
 * ```
 */

import { reportProgrammingError } from './diagnostics'
import { withDependencies, type DependencyOverrides } from './dependencies'
import { Effect } from './effect'

// =============================================================================
// CORE TYPES
// =============================================================================

export interface Reducer<State, Action> {
  reduce(state: State, action: Action): Effect<Action>
}

/** A reducer body written as a function; returning nothing means `Effect.none`. */
export type ReduceFunction<State, Action> = (state: State, action: Action) => Effect<Action> | void

/**
 * Handlers keyed by action `type`. Variants without a handler are ignored.
 */
export type ActionHandlers<State, Action extends { type: string }> = {
  [K in Action['type']]?: (state: State, action: Extract<Action, { type: K }>) => Effect<Action> | void
}

/** Reads and writes a child value inside a parent state. */
export interface StateAccessor<Parent, Child> {
  get(parent: Parent): Child
  set(parent: Parent, child: Child): void
}

/** Recognizes child actions inside a parent action and wraps child actions back up. */
export interface ActionPrism<Parent, Child> {
  extract(action: Parent): Child | undefined
  embed(action: Child): Parent
}

// =============================================================================
// LEAF REDUCERS
// =============================================================================

/** Wraps a function as a reducer. */
export function reduce<State, Action>(fn: ReduceFunction<State, Action>): Reducer<State, Action> {
  return {
    reduce(state, action) {
      const effect = fn(state, action)
      return effect instanceof Effect ? effect : Effect.none
    }
  }
}

/**
 * Creates a reducer from per-variant handlers.
 *
 * @example
 * ```ts
 * const todos = createReducer<TodosState, TodosAction>({
 *   add: (state, action) => { state.items.push(action.todo) },
 *   clear: state => { state.items = [] }
 * })
 * ```
 */
export function createReducer<State, Action extends { type: string }>(
  handlers: ActionHandlers<State, Action>
): Reducer<State, Action> {
  return reduce<State, Action>((state, action) => {
    const type: Action['type'] = action.type
    const handler = handlers[type]
    return handler ? handler(state, action as Extract<Action, { type: Action['type'] }>) : Effect.none
  })
}

/** A reducer that does nothing. */
export function emptyReducer<State, Action>(): Reducer<State, Action> {
  return { reduce: () => Effect.none }
}

// =============================================================================
// FEATURE CLASSES
// =============================================================================

/**
 * Base class for class-based features. Subclasses either override `reduce`
 * directly or describe themselves as a composition in `body`.
 *
 * When a subclass overrides `reduce`, `body` is never read. Otherwise `body`
 * is read once, on the first action.
 *
 * @example
 * ```ts
 * class Todos extends Feature<TodosState, TodosAction> {
 *   get body() {
 *     return combineReducers(bindingReducer(), todosCore)
 *   }
 * }
 * ```
 */
export abstract class Feature<State, Action> implements Reducer<State, Action> {
  private composed: Reducer<State, Action> | undefined

  get body(): Reducer<State, Action> {
    reportProgrammingError(
      `'${this.constructor.name}' has no body. Override 'reduce' or 'body'; do not read 'body' of a feature that implements 'reduce'.`
    )
    return emptyReducer()
  }

  reduce(state: State, action: Action): Effect<Action> {
    // Built once: combinators hold per-instance cancellation tokens.
    this.composed ??= this.body
    return this.composed.reduce(state, action)
  }
}

// =============================================================================
// COMBINATORS
// =============================================================================

/**
 * Runs each reducer in order against the same (progressively mutated) state
 * and merges their effects.
 */
export function combineReducers<State, Action>(...reducers: Reducer<State, Action>[]): Reducer<State, Action> {
  return {
    reduce(state, action) {
      return Effect.merge(...reducers.map(reducer => reducer.reduce(state, action)))
    }
  }
}

export interface ScopeConfig<ParentState, ParentAction, ChildState, ChildAction> {
  state: StateAccessor<ParentState, ChildState>
  action: ActionPrism<ParentAction, ChildAction>
  child: Reducer<ChildState, ChildAction>
}

/**
 * Runs a child reducer on a slice of the parent state for the parent actions
 * that wrap a child action.
 */
export function scope<ParentState, ParentAction, ChildState, ChildAction>(
  config: ScopeConfig<ParentState, ParentAction, ChildState, ChildAction>
): Reducer<ParentState, ParentAction> {
  return {
    reduce(state, action) {
      const childAction = config.action.extract(action)
      if (childAction === undefined) return Effect.none

      const childState = config.state.get(state)
      const effect = config.child.reduce(childState, childAction)
      config.state.set(state, childState)
      return effect.map(config.action.embed)
    }
  }
}

// =============================================================================
// MODIFIERS
// =============================================================================

/**
 * Runs `reducer` with dependency overrides. Effects it returns were built
 * inside the scope, so they see the same overrides when they run.
 */
export function provideDependencies<State, Action>(
  reducer: Reducer<State, Action>,
  overrides: DependencyOverrides
): Reducer<State, Action> {
  return {
    reduce(state, action) {
      return withDependencies(overrides, () => reducer.reduce(state, action))
    }
  }
}
