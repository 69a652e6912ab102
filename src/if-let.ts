import { getConfig } from './config'
import { runtimeWarn } from './diagnostics'
import { Effect } from './effect'
import type { ActionPrism, Reducer } from './reducer'

/** Reads and writes an optional child inside a parent state. */
export interface OptionalAccessor<Parent, Child> {
  get(parent: Parent): Child | undefined
  set(parent: Parent, child: Child): void
}

export interface IfLetConfig<ParentState, ParentAction, ChildState, ChildAction> {
  state: OptionalAccessor<ParentState, ChildState>
  action: ActionPrism<ParentAction, ChildAction>
  child: Reducer<ChildState, ChildAction>
}

/**
 * Runs `child` while the optional substate is present, then runs `parent`.
 *
 * Child actions that arrive while the substate is absent are dropped. When the
 * parent dismisses or replaces the substate, effects the child started are
 * cancelled.
 */
export function ifLet<ParentState, ParentAction, ChildState, ChildAction>(
  parent: Reducer<ParentState, ParentAction>,
  config: IfLetConfig<ParentState, ParentAction, ChildState, ChildAction>
): Reducer<ParentState, ParentAction> {
  const token = Symbol('ifLet')

  return {
    reduce(state, action) {
      let childEffect: Effect<ParentAction> = Effect.none
      const childAction = config.action.extract(action)
      if (childAction !== undefined) {
        const child = config.state.get(state)
        if (child === undefined) {
          if (getConfig().devMode) {
            runtimeWarn('ifLet received a child action while its state was absent; the action was dropped')
          }
        } else {
          childEffect = config.child
            .reduce(child, childAction)
            .map(config.action.embed)
            .cancellable(token)
          config.state.set(state, child)
        }
      }

      const presented = config.state.get(state)
      const parentEffect = parent.reduce(state, action)
      const dismissed = presented !== undefined && config.state.get(state) !== presented

      return Effect.merge(childEffect, parentEffect, dismissed ? Effect.cancel(token) : Effect.none)
    }
  }
}

/** Extracts and embeds one case of a tagged-union substate. */
export interface CaseAccessor<Parent, Child> {
  extract(parent: Parent): Child | undefined
  embed(parent: Parent, child: Child): void
}

export interface IfCaseLetConfig<ParentState, ParentAction, ChildState, ChildAction> {
  state: CaseAccessor<ParentState, ChildState>
  action: ActionPrism<ParentAction, ChildAction>
  child: Reducer<ChildState, ChildAction>
}

/**
 * `ifLet` for a variant substate: the child runs only while the parent's
 * tagged union holds the matching case.
 *
 * @example
 * ```ts
 * ifCaseLet(contacts, {
 *   state: {
 *     extract: state => (state.destination?.type === 'addContact' ? state.destination.state : undefined),
 *     embed: (state, child) => { state.destination = { type: 'addContact', state: child } }
 *   },
 *   action: {
 *     extract: action => (action.type === 'addContact' ? action.action : undefined),
 *     embed: action => ({ type: 'addContact', action })
 *   },
 *   child: addContact
 * })
 * ```
 */
export function ifCaseLet<ParentState, ParentAction, ChildState, ChildAction>(
  parent: Reducer<ParentState, ParentAction>,
  config: IfCaseLetConfig<ParentState, ParentAction, ChildState, ChildAction>
): Reducer<ParentState, ParentAction> {
  return ifLet(parent, {
    state: {
      get: config.state.extract,
      set: config.state.embed
    },
    action: config.action,
    child: config.child
  })
}
