/**
 * Dependency Registry
 * ===================
 *
 * A process-wide table of named capabilities (clock, id generation, dates,
 * persistence) that reducers and effects resolve instead of reaching for
 * globals. Each key carries live, test and preview variants; overrides can be
 * installed process-wide or for a scope.
 *
 * --- HOW SCOPING WORKS ---
 * Scoped overrides live in an `unctx` context backed by `AsyncLocalStorage`,
 * so they stay visible across `await` boundaries inside the scope. Effects
 * capture the scope they were constructed in and re-enter it when they run,
 * which is what lets a reducer wrapped in `withDependencies` hand its
 * overrides to the async work it schedules.
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { randomUUID } from 'node:crypto'
import { getContext } from 'unctx'
import { getConfig, type DependencyContext } from './config'
import { LiveClock, ImmediateClock, type Clock } from './clock'

// =============================================================================
// KEYS AND VALUES
// =============================================================================

interface Slot<T> {
  readonly value: T
}

export interface DependencyKeyOptions<T> {
  liveValue: T
  testValue?: T
  /**
   * Builds the test value in place of `testValue`, once per store, so a
   * stand-in that counts or records starts over in every store.
   */
  makeTestValue?: () => T
  previewValue?: T
}

// Owns test values made outside of any store.
const processTestValues = {}

/**
 * A typed handle to one capability. The key itself stores the values assigned
 * to it per scope, so lookups stay fully typed.
 */
export class DependencyKey<T> {
  readonly name: string
  readonly liveValue: T
  readonly testValue: T | undefined
  readonly previewValue: T | undefined
  private readonly makeTestValue: (() => T) | undefined
  private readonly slots = new WeakMap<DependencyValues, Slot<T>>()
  private readonly madeTestValues = new WeakMap<object, Slot<T>>()

  constructor(name: string, options: DependencyKeyOptions<T>) {
    this.name = name
    this.liveValue = options.liveValue
    this.testValue = options.testValue
    this.makeTestValue = options.makeTestValue
    this.previewValue = options.previewValue
  }

  /**
   * The value used when nothing overrides this key. `values` decides which
   * store a made test value belongs to.
   */
  defaultValue(context: DependencyContext, values?: DependencyValues): T {
    switch (context) {
      case 'test':
        if (this.makeTestValue) return this.madeTestValue(this.makeTestValue, values)
        return this.testValue ?? this.previewValue ?? this.liveValue
      case 'preview':
        return this.previewValue ?? this.liveValue
      case 'live':
        return this.liveValue
    }
  }

  assign(values: DependencyValues, value: T): void {
    this.slots.set(values, { value })
  }

  private madeTestValue(make: () => T, values: DependencyValues | undefined): T {
    let owner: object = processTestValues
    for (let scope = values; scope; scope = scope.parent) {
      if (scope.ownsTestValues) {
        owner = scope
        break
      }
    }
    let slot = this.madeTestValues.get(owner)
    if (!slot) {
      slot = { value: make() }
      this.madeTestValues.set(owner, slot)
    }
    return slot.value
  }

  /** Walks from `values` outwards and returns the innermost assignment. */
  lookup(values: DependencyValues | undefined): Slot<T> | undefined {
    for (let scope = values; scope; scope = scope.parent) {
      const slot = this.slots.get(scope)
      if (slot) return slot
    }
    return undefined
  }
}

export function dependencyKey<T>(name: string, options: DependencyKeyOptions<T>): DependencyKey<T> {
  return new DependencyKey(name, options)
}

/**
 * One layer of overrides. Layers chain to their parent, so a nested scope
 * only stores what it changes.
 */
export interface DependencyValuesOptions {
  /** Keeps the test values made for keys resolved through this layer apart from everyone else's. */
  ownsTestValues?: boolean
}

export class DependencyValues {
  readonly parent: DependencyValues | undefined
  readonly ownsTestValues: boolean

  constructor(parent?: DependencyValues, options: DependencyValuesOptions = {}) {
    this.parent = parent
    this.ownsTestValues = options.ownsTestValues ?? false
  }

  set<T>(key: DependencyKey<T>, value: T): this {
    key.assign(this, value)
    return this
  }

  /** Reads a key through this layer and its parents, falling back to the key's default. */
  get<T>(key: DependencyKey<T>): T {
    const slot = key.lookup(this)
    return slot ? slot.value : key.defaultValue(getConfig().dependencyContext, this)
  }
}

export type DependencyOverrides = (values: DependencyValues) => void

// =============================================================================
// SCOPED CONTEXT
// =============================================================================

const scopeContext = getContext<DependencyValues>('composable-store:dependencies', {
  asyncContext: true,
  AsyncLocalStorage
})

function currentScope(): DependencyValues | undefined {
  return scopeContext.tryUse() ?? undefined
}

function enterScope<R>(values: DependencyValues, operation: () => R): R {
  // unctx refuses a synchronous `call` nested in another with a different
  // instance. AsyncLocalStorage restores the outer scope when this one exits.
  scopeContext.unset()
  return scopeContext.call(values, operation)
}

// =============================================================================
// REGISTRY
// =============================================================================

export class DependencyRegistry {
  private global = new DependencyValues()

  /**
   * Innermost scoped override, else a process-wide override, else the key's
   * variant for the configured dependency context.
   */
  resolve<T>(key: DependencyKey<T>): T {
    const scope = currentScope()
    const slot = key.lookup(scope) ?? key.lookup(this.global)
    return slot ? slot.value : key.defaultValue(getConfig().dependencyContext, scope)
  }

  /** Installs a process-wide override. Scoped overrides still take precedence. */
  override<T>(key: DependencyKey<T>, value: T): void {
    this.global.set(key, value)
  }

  /** Drops every process-wide override. */
  reset(): void {
    this.global = new DependencyValues()
  }
}

export const dependencies = new DependencyRegistry()

export function resolve<T>(key: DependencyKey<T>): T {
  return dependencies.resolve(key)
}

/**
 * Runs `operation` with the given overrides layered over the current scope.
 * Async operations keep the overrides across awaits; code outside the call
 * is unaffected.
 *
 * @example
 * ```ts
 * const ids = withDependencies(
 *   values => values.set(uuidKey, incrementingUUID()),
 *   () => [resolve(uuidKey)(), resolve(uuidKey)()]
 * )
 * ```
 */
export function withDependencies<R>(overrides: DependencyOverrides, operation: () => R): R {
  const values = new DependencyValues(currentScope())
  overrides(values)
  return enterScope(values, operation)
}

/** Snapshot of the active scope, for re-entering it later. */
export function captureDependencies(): DependencyValues | undefined {
  return currentScope()
}

/** Re-enters a scope captured with `captureDependencies`. */
export function runWithDependencies<R>(values: DependencyValues | undefined, operation: () => R): R {
  if (!values || values === currentScope()) return operation()
  return enterScope(values, operation)
}

// =============================================================================
// BUILT-IN CAPABILITIES
// =============================================================================

export type UUIDGenerator = () => string
export type DateGenerator = () => Date

/**
 * Deterministic ids: `00000000-0000-0000-0000-000000000000`, `...-000000000001`, ...
 */
export function incrementingUUID(): UUIDGenerator {
  let next = 0
  return () => `00000000-0000-0000-0000-${(next++).toString(16).padStart(12, '0')}`
}

export function constantDate(date: Date): DateGenerator {
  return () => new Date(date.getTime())
}

export const clockKey = dependencyKey<Clock>('clock', {
  liveValue: new LiveClock(),
  testValue: new ImmediateClock(),
  previewValue: new ImmediateClock()
})

/** Under test every store counts from `...-000000000000` on its own. */
export const uuidKey = dependencyKey<UUIDGenerator>('uuid', {
  liveValue: () => randomUUID(),
  makeTestValue: incrementingUUID
})

export const dateKey = dependencyKey<DateGenerator>('date', {
  liveValue: () => new Date(),
  testValue: constantDate(new Date(0))
})
