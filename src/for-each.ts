import { getConfig } from './config'
import { runtimeWarn } from './diagnostics'
import { Effect } from './effect'
import type { Reducer } from './reducer'

export type ElementId = string | number

/** An action addressed to one element of a collection. */
export interface ElementAction<Id, Action> {
  id: Id
  action: Action
}

export interface ForEachConfig<ParentState, ParentAction, Element, ChildAction, Id extends ElementId> {
  /** The collection inside the parent state. Elements are written back in place. */
  state: (parent: ParentState) => Element[]
  action: {
    extract(action: ParentAction): ElementAction<Id, ChildAction> | undefined
    embed(id: Id, action: ChildAction): ParentAction
  }
  id: (element: Element) => Id
  element: Reducer<Element, ChildAction>
}

/**
 * Runs `element` on the collection member an action is addressed to, then
 * runs `parent`.
 *
 * Actions for ids that are no longer in the collection are dropped. Effects
 * started by an element are cancelled when the parent removes that element.
 *
 * @example
 * ```ts
 * forEach(todosCore, {
 *   state: state => state.todos,
 *   action: {
 *     extract: action => (action.type === 'todo' ? action : undefined),
 *     embed: (id, action) => ({ type: 'todo', id, action })
 *   },
 *   id: todo => todo.id,
 *   element: todoReducer
 * })
 * ```
 */
export function forEach<ParentState, ParentAction, Element, ChildAction, Id extends ElementId>(
  parent: Reducer<ParentState, ParentAction>,
  config: ForEachConfig<ParentState, ParentAction, Element, ChildAction, Id>
): Reducer<ParentState, ParentAction> {
  const token = Symbol('forEach')

  return {
    reduce(state, action) {
      let elementEffect: Effect<ParentAction> = Effect.none
      const routed = config.action.extract(action)
      if (routed) {
        const elements = config.state(state)
        const index = elements.findIndex(element => config.id(element) === routed.id)
        if (index === -1) {
          if (getConfig().devMode) {
            runtimeWarn(`forEach received an action for element "${routed.id}", which is not in the collection`)
          }
        } else {
          const element = elements[index]
          elementEffect = config.element
            .reduce(element, routed.action)
            .map(childAction => config.action.embed(routed.id, childAction))
            .cancellable([token, routed.id])
          elements[index] = element
        }
      }

      const idsBefore = config.state(state).map(config.id)
      const parentEffect = parent.reduce(state, action)
      const idsAfter = new Set(config.state(state).map(config.id))
      const cancellations = idsBefore
        .filter(id => !idsAfter.has(id))
        .map(id => Effect.cancel([token, id]))

      return Effect.merge(elementEffect, parentEffect, ...cancellations)
    }
  }
}
