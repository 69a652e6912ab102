import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  configure,
  describeAction,
  enableDevMode,
  getConfig,
  reportProgrammingError,
  resetConfig,
  runtimeWarn,
  toError
} from '../src'

afterEach(() => {
  resetConfig()
  vi.restoreAllMocks()
})

describe('Configuration', () => {
  it('should derive test defaults from the environment', () => {
    expect(getConfig()).toEqual({
      devMode: true,
      dependencyContext: 'test',
      sharedRetryDelay: 1000,
      warnOnUnhandledEffectErrors: true
    })
  })

  it('should merge options and restore defaults on reset', () => {
    configure({ sharedRetryDelay: 250, devMode: false })
    expect(getConfig().sharedRetryDelay).toBe(250)
    expect(getConfig().devMode).toBe(false)

    enableDevMode()
    expect(getConfig().devMode).toBe(true)

    resetConfig()
    expect(getConfig().sharedRetryDelay).toBe(1000)
  })
})

describe('Diagnostics', () => {
  it('should prefix warnings with the source', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const detail = new Error('detail')

    runtimeWarn('Something odd', 'Todos')
    runtimeWarn('Something odd', undefined, detail)

    expect(warn.mock.calls).toEqual([['[composable-store] Todos: Something odd'], ['[composable-store] Something odd', detail]])
  })

  it('should throw programming errors in dev mode and keep the cause', () => {
    const cause = new Error('root')
    let thrown: unknown
    try {
      reportProgrammingError('Bad composition', 'App', cause)
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(Error)
    expect(thrown instanceof Error ? [thrown.message, thrown.cause] : []).toEqual([
      '[composable-store] App: Bad composition',
      cause
    ])
  })

  it('should log programming errors outside dev mode', () => {
    configure({ devMode: false })
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    reportProgrammingError('Bad composition')

    expect(error).toHaveBeenCalledWith('[composable-store] Bad composition')
  })

  it('should describe actions by their type', () => {
    expect(describeAction({ type: 'addTodo' })).toBe('addTodo')
    expect(describeAction('reset')).toBe('reset')
    expect(describeAction(42)).toBe('42')
  })

  it('should normalize thrown values to errors', () => {
    const error = new Error('kept')
    expect(toError(error)).toBe(error)
    expect(toError('text').message).toBe('text')
  })
})
