import { describe, it, expect, vi, afterEach } from 'vitest'
import { Effect, TestClock, TestStore, clockKey, createReducer, createStore, forEach } from '../src'

interface Counter {
  id: number
  count: number
}

type CounterAction = { type: 'increment' } | { type: 'startTimer' } | { type: 'tick' }

interface CountersState {
  counters: Counter[]
}

type CountersAction = { type: 'counter'; id: number; action: CounterAction } | { type: 'remove'; id: number }

const TICK_DELAY = 100

const counter = createReducer<Counter, CounterAction>({
  increment: state => {
    state.count += 1
  },
  startTimer: () => Effect.concatenate<CounterAction>(Effect.sleep(TICK_DELAY), Effect.send({ type: 'tick' })),
  tick: state => {
    state.count += 10
  }
})

function counters() {
  return forEach(
    createReducer<CountersState, CountersAction>({
      remove: (state, action) => {
        state.counters = state.counters.filter(entry => entry.id !== action.id)
      }
    }),
    {
      state: state => state.counters,
      action: {
        extract: action => (action.type === 'counter' ? action : undefined),
        embed: (id, action): CountersAction => ({ type: 'counter', id, action })
      },
      id: entry => entry.id,
      element: counter
    }
  )
}

function initialState(): CountersState {
  return {
    counters: [
      { id: 1, count: 0 },
      { id: 2, count: 0 }
    ]
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('forEach', () => {
  it('should route an action to the element with its id', () => {
    const store = createStore<CountersState, CountersAction>(initialState(), counters())
    store.send({ type: 'counter', id: 2, action: { type: 'increment' } })
    expect(store.state.counters).toEqual([
      { id: 1, count: 0 },
      { id: 2, count: 1 }
    ])
  })

  it('should drop and report actions for ids that are not in the collection', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const store = createStore<CountersState, CountersAction>(initialState(), counters())

    store.send({ type: 'counter', id: 9, action: { type: 'increment' } })

    expect(store.state).toEqual(initialState())
    expect(warn).toHaveBeenCalledWith(
      '[composable-store] forEach received an action for element "9", which is not in the collection'
    )
  })

  it('should deliver element effects wrapped in the parent action', async () => {
    const clock = new TestClock()
    const store = new TestStore(initialState(), counters(), {
      dependencies: values => {
        values.set(clockKey, clock)
      }
    })

    store.send({ type: 'counter', id: 2, action: { type: 'startTimer' } })
    await clock.advance(TICK_DELAY)
    await store.receive({ type: 'counter', id: 2, action: { type: 'tick' } }, state => {
      state.counters[1].count = 10
    })
    await store.finish()
  })

  it('should cancel the effects of an element when it is removed', async () => {
    const clock = new TestClock()
    const store = new TestStore(initialState(), counters(), {
      dependencies: values => {
        values.set(clockKey, clock)
      }
    })

    store.send({ type: 'counter', id: 1, action: { type: 'startTimer' } })
    expect(clock.pendingSleeps).toBe(1)

    store.send({ type: 'remove', id: 1 }, state => {
      state.counters = [{ id: 2, count: 0 }]
    })
    expect(clock.pendingSleeps).toBe(0)

    await clock.advance(TICK_DELAY)
    await store.finish()
  })
})
