import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  CancellationTable,
  InMemoryBackend,
  Shared,
  TestClock,
  bindings,
  clockKey,
  createStore,
  sharedCells,
  uuidKey
} from '../src'
import {
  SORT_DELAY,
  Todos,
  initialTodosState,
  todosBackendKey,
  todosKey,
  type Todo,
  type TodosAction,
  type TodosState
} from './fixtures/todos'

function countingIds(): () => string {
  let next = 0
  return () => String(++next)
}

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}

function ids(todos: readonly Todo[] | undefined): string[] {
  return (todos ?? []).map(todo => todo.id)
}

function setUp() {
  const clock = new TestClock()
  const backend = new InMemoryBackend<Todo[]>()
  const store = createStore<TodosState, TodosAction>(initialTodosState(backend), new Todos(), {
    cancellations: new CancellationTable(),
    dependencies: values => {
      values.set(clockKey, clock).set(uuidKey, countingIds()).set(todosBackendKey, backend)
    }
  })
  return { clock, backend, store }
}

afterEach(() => {
  sharedCells.teardownAll()
  vi.restoreAllMocks()
})

describe('Todos feature', () => {
  const bind = bindings<TodosState>()

  it('should keep ids 1 and 3 after completing 2 and clearing completed todos', async () => {
    const { clock, backend, store } = setUp()

    store.send({ type: 'addTodo' })
    store.send({ type: 'addTodo' })
    store.send({ type: 'addTodo' })
    store.send({ type: 'todo', id: '2', action: { type: 'toggleCompleted' } })
    store.send({ type: 'clearCompleted' })
    expect(ids(store.state.todos.value)).toEqual(['1', '3'])

    // The debounced sort still fires; the order it produces is already in place.
    await clock.advance(SORT_DELAY)
    await store.finish()

    expect(ids(store.state.todos.value)).toEqual(['1', '3'])
    expect(ids(backend.peek('todos.all'))).toEqual(['1', '3'])
    store.destroy()
  })

  it('should sort completed todos to the end once toggling settles', async () => {
    const { clock, store } = setUp()

    store.send({ type: 'addTodo' })
    store.send({ type: 'addTodo' })
    store.send({ type: 'todo', id: '1', action: { type: 'toggleCompleted' } })

    await clock.advance(SORT_DELAY / 2)
    // Toggling again restarts the wait.
    store.send({ type: 'todo', id: '1', action: { type: 'toggleCompleted' } })
    store.send({ type: 'todo', id: '1', action: { type: 'toggleCompleted' } })
    await clock.advance(SORT_DELAY / 2)
    expect(ids(store.state.todos.value)).toEqual(['1', '2'])

    await clock.advance(SORT_DELAY / 2)
    await store.finish()

    expect(store.state.todos.value).toEqual([
      { id: '2', description: '', isComplete: false },
      { id: '1', description: '', isComplete: true }
    ])
    store.destroy()
  })

  it('should follow the list of the current filter and stop following the previous one', async () => {
    const { backend, store } = setUp()

    store.send({ type: 'addTodo' })
    store.send({ type: 'addTodo' })
    store.send({ type: 'todo', id: '2', action: { type: 'toggleCompleted' } })
    store.send(bind.set('filter', 'active'))

    expect(store.state.todos.key).toBe('memory:todos.active')
    expect(ids(store.state.todos.value)).toEqual(['1'])
    expect(store.state.remaining).toBe(1)
    await flush()

    let publishes = 0
    store.subscribe(() => {
      publishes += 1
    })
    const everything = new Shared(todosKey('all', backend), [])
    const active = new Shared(todosKey('active', backend), [])

    await everything.set([])
    expect(publishes).toBe(0)
    expect(store.state.remaining).toBe(1)

    await active.set([
      { id: '1', description: '', isComplete: false },
      { id: '7', description: 'Added elsewhere', isComplete: false }
    ])
    await vi.waitFor(() => expect(store.state.remaining).toBe(2))
    expect(ids(store.state.todos.value)).toEqual(['1', '7'])
    expect(publishes).toBe(2)
    store.destroy()
  })

  it('should return to the stored full list when the filter goes back to all', () => {
    const { store } = setUp()

    store.send({ type: 'addTodo' })
    store.send({ type: 'addTodo' })
    store.send({ type: 'todo', id: '2', action: { type: 'toggleCompleted' } })
    store.send(bind.set('filter', 'active'))
    store.send(bind.set('filter', 'all'))

    expect(store.state.todos.key).toBe('memory:todos.all')
    expect(ids(store.state.todos.value)).toEqual(['1', '2'])
    expect(store.state.remaining).toBe(1)
    store.destroy()
  })

  it('should keep the new todo and record the error when saving fails', async () => {
    const { backend, store } = setUp()
    backend.failNext('save', new Error('disk full'))

    store.send({ type: 'addTodo' })

    await vi.waitFor(() => expect(store.state.saveError).toBe('disk full'))
    expect(ids(store.state.todos.value)).toEqual(['1'])
    expect(backend.peek('todos.all')).toBeUndefined()
    store.destroy()
  })

  it('should ignore actions for todos that no longer exist', () => {
    const { backend, store } = setUp()

    store.send({ type: 'addTodo' })
    store.send({ type: 'delete', ids: ['1'] })
    store.send({ type: 'todo', id: '1', action: { type: 'descriptionChanged', description: 'Milk' } })

    expect(store.state.todos.value).toEqual([])
    expect(backend.peek('todos.all')).toEqual([])
    store.destroy()
  })
})
