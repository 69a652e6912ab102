import { describe, it, expect } from 'vitest'
import {
  CancellationTable,
  Effect,
  Feature,
  combineReducers,
  createReducer,
  emptyReducer,
  provideDependencies,
  reduce,
  resolve,
  runEffect,
  scope,
  uuidKey,
  type Reducer
} from '../src'

/** Runs an effect to completion and returns what it sent. */
async function sendsOf<A>(effect: Effect<A>): Promise<A[]> {
  const sent: A[] = []
  await runEffect(effect, {
    send: action => sent.push(action),
    signal: new AbortController().signal,
    cancellations: new CancellationTable()
  })
  return sent
}

type CounterAction = { type: 'increment' } | { type: 'add'; amount: number } | { type: 'reset' }

interface CounterState {
  count: number
}

describe('Reducer System', () => {
  describe('reduce', () => {
    it('should treat a body that returns nothing as Effect.none', () => {
      const counter = reduce<CounterState, CounterAction>(state => {
        state.count += 1
      })
      const state = { count: 0 }

      expect(counter.reduce(state, { type: 'increment' }).isNone).toBe(true)
      expect(state.count).toBe(1)
    })

    it('should pass a returned effect through', async () => {
      const echo = reduce<CounterState, string>((_state, action) => Effect.send(`${action}!`))
      expect(await sendsOf(echo.reduce({ count: 0 }, 'hi'))).toEqual(['hi!'])
    })
  })

  describe('createReducer', () => {
    const counter = createReducer<CounterState, CounterAction>({
      increment: state => {
        state.count += 1
      },
      add: (state, action) => {
        state.count += action.amount
      }
    })

    it('should dispatch each variant to its handler', () => {
      const state = { count: 0 }
      counter.reduce(state, { type: 'increment' })
      counter.reduce(state, { type: 'add', amount: 5 })
      expect(state.count).toBe(6)
    })

    it('should ignore variants without a handler', () => {
      const state = { count: 3 }
      expect(counter.reduce(state, { type: 'reset' }).isNone).toBe(true)
      expect(state.count).toBe(3)
    })
  })

  describe('emptyReducer', () => {
    it('should change nothing', () => {
      const state = { count: 1 }
      expect(emptyReducer<CounterState, CounterAction>().reduce(state, { type: 'increment' }).isNone).toBe(true)
      expect(state).toEqual({ count: 1 })
    })
  })

  describe('combineReducers', () => {
    it('should run reducers in order against the same state and merge their effects', async () => {
      interface LogState {
        log: string[]
      }
      const first = reduce<LogState, string>(state => {
        state.log.push('first')
        return Effect.send('from first')
      })
      const second = reduce<LogState, string>(state => {
        state.log.push(`second saw ${state.log.length}`)
        return Effect.send('from second')
      })
      const state: LogState = { log: [] }

      const effect = combineReducers(first, second).reduce(state, 'go')

      expect(state.log).toEqual(['first', 'second saw 1'])
      expect(await sendsOf(effect)).toEqual(['from first', 'from second'])
    })
  })

  describe('scope', () => {
    interface ParentState {
      counter: CounterState
      other: number
    }
    type ParentAction = { type: 'counter'; action: CounterAction } | { type: 'other' }

    const child = createReducer<CounterState, CounterAction>({
      increment: state => {
        state.count += 1
        return Effect.send<CounterAction>({ type: 'add', amount: 10 })
      },
      add: (state, action) => {
        state.count += action.amount
      }
    })

    const parent = scope<ParentState, ParentAction, CounterState, CounterAction>({
      state: {
        get: state => state.counter,
        set: (state, counter) => {
          state.counter = counter
        }
      },
      action: {
        extract: action => (action.type === 'counter' ? action.action : undefined),
        embed: (action): ParentAction => ({ type: 'counter', action })
      },
      child
    })

    it('should run the child on its slice and wrap its effects', async () => {
      const state: ParentState = { counter: { count: 0 }, other: 0 }
      const effect = parent.reduce(state, { type: 'counter', action: { type: 'increment' } })

      expect(state.counter.count).toBe(1)
      expect(await sendsOf(effect)).toEqual([{ type: 'counter', action: { type: 'add', amount: 10 } }])
    })

    it('should ignore actions that do not wrap a child action', () => {
      const state: ParentState = { counter: { count: 0 }, other: 0 }
      expect(parent.reduce(state, { type: 'other' }).isNone).toBe(true)
      expect(state.counter.count).toBe(0)
    })
  })

  describe('Feature', () => {
    it('should run the composition described by body', () => {
      class Counter extends Feature<CounterState, CounterAction> {
        get body(): Reducer<CounterState, CounterAction> {
          return createReducer<CounterState, CounterAction>({
            reset: state => {
              state.count = 0
            }
          })
        }
      }
      const state = { count: 4 }
      new Counter().reduce(state, { type: 'reset' })
      expect(state.count).toBe(0)
    })

    it('should build the body once', () => {
      let built = 0
      class Counter extends Feature<CounterState, CounterAction> {
        get body(): Reducer<CounterState, CounterAction> {
          built += 1
          return reduce<CounterState, CounterAction>(state => {
            state.count += 1
          })
        }
      }
      const feature = new Counter()
      const state = { count: 0 }

      feature.reduce(state, { type: 'increment' })
      feature.reduce(state, { type: 'increment' })

      expect(built).toBe(1)
      expect(state.count).toBe(2)
    })

    it('should prefer an overridden reduce', () => {
      class Doubler extends Feature<CounterState, CounterAction> {
        reduce(state: CounterState): Effect<CounterAction> {
          state.count *= 2
          return Effect.none
        }
      }
      const state = { count: 3 }
      new Doubler().reduce(state)
      expect(state.count).toBe(6)
    })

    it('should throw in dev mode when neither body nor reduce is provided', () => {
      class Bare extends Feature<CounterState, CounterAction> {}
      expect(() => new Bare().reduce({ count: 0 }, { type: 'increment' })).toThrow(
        "[composable-store] 'Bare' has no body."
      )
    })
  })

  describe('provideDependencies', () => {
    it('should apply overrides to the reducer and the effects it builds', async () => {
      interface IdsState {
        ids: string[]
      }
      const ids = reduce<IdsState, string>(state => {
        state.ids.push(resolve(uuidKey)())
        return Effect.promise(async () => resolve(uuidKey)())
      })
      const fixed = provideDependencies(ids, values => {
        values.set(uuidKey, () => 'fixed-id')
      })
      const state: IdsState = { ids: [] }

      const effect = fixed.reduce(state, 'add')

      expect(state.ids).toEqual(['fixed-id'])
      expect(await sendsOf(effect)).toEqual(['fixed-id'])
    })
  })
})
