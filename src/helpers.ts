/**
 * State Helpers
 * =============
 *
 * Type-level field paths and the small runtime utilities reducers and the
 * store share: nested get/set by dotted path, structural equality, and the
 * snapshot clone used for published state.
 */

// =============================================================================
// TYPES
// =============================================================================

type PrevDepth = [never, 0, 1, 2, 3, 4, 5]

type PathImpl<T, K extends keyof T, D extends number> = K extends string
  ? T[K] extends (...args: never[]) => unknown
    ? never
    : T[K] extends ReadonlyArray<unknown>
      ? K
      : T[K] extends object
        ? [D] extends [0]
          ? K
          : K | `${K}.${PathImpl<T[K], keyof T[K], PrevDepth[D]>}`
        : K
  : never

/**
 * Every dotted field path through an object type, e.g. `'filter' | 'settings.theme'`.
 * Arrays are leaves; recursion stops after five levels.
 */
export type Path<T> = PathImpl<T, keyof T, 5>

/**
 * The type of the value stored at a dotted path.
 */
export type PathValue<T, P> = P extends `${infer K}.${infer Rest}`
  ? K extends keyof T
    ? PathValue<T[K], Rest>
    : never
  : P extends keyof T
    ? T[P]
    : never

// =============================================================================
// NESTED ACCESS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Retrieves a nested property value from an object using a dot-separated path.
 *
 * @returns The value at the path, or undefined if any segment is missing.
 */
export function getNestedProperty(obj: object, path: string): unknown {
  let current: unknown = obj
  for (const key of path.split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, key)) return undefined
    current = current[key]
  }
  return current
}

const RESERVED_KEYS = new Set(['__proto__', 'constructor', 'prototype'])

/**
 * Sets a nested property value using a dot-separated path, creating missing
 * intermediate objects. Only own properties are walked.
 *
 * @returns false when the path is empty, names a reserved key, or runs
 * through a non-object or inherited value.
 */
export function setNestedProperty(obj: object, path: string, value: unknown): boolean {
  const keys = path.split('.')
  if (keys.some(key => key === '' || RESERVED_KEYS.has(key))) return false
  const lastKey = keys.pop()
  if (!lastKey) return false

  let target: unknown = obj
  for (const key of keys) {
    if (!isRecord(target)) return false
    if (!Object.hasOwn(target, key)) {
      if (key in target) return false
      target[key] = {}
    }
    target = target[key]
  }
  if (!isRecord(target)) return false
  target[lastKey] = value
  return true
}

// =============================================================================
// EQUALITY AND CLONING
// =============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * A deep equality check for arrays, plain objects, dates, maps and sets.
 * Class instances compare by reference.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false
    }
    return true
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false
    for (const value of a) {
      if (!b.has(value)) return false
    }
    return true
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    for (const key of keysA) {
      if (!(key in b) || !deepEqual(a[key], b[key])) return false
    }
    return true
  }

  return false
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneValue)
  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof Map) {
    return new Map(Array.from(value, ([key, entry]) => [key, cloneValue(entry)]))
  }
  if (value instanceof Set) return new Set(Array.from(value, cloneValue))
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {}
    for (const key of Object.keys(value)) {
      copy[key] = cloneValue(value[key])
    }
    return copy
  }
  // Primitives, functions and class instances (e.g. `Shared` references) are kept as-is.
  return value
}

/**
 * Deep-copies the plain data in a state tree. Unlike `structuredClone`, class
 * instances are carried over by reference so `Shared` references inside a
 * snapshot still point at their live cells.
 */
export function cloneState<T>(value: T): T {
  // cloneValue preserves the shape of every node it copies.
  return cloneValue(value) as T
}

/**
 * Freezes the arrays and plain objects of a tree in place. Maps, sets, dates
 * and class instances are left as they are.
 */
export function freezeState<T>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach(freezeState)
    Object.freeze(value)
  } else if (isPlainObject(value)) {
    Object.values(value).forEach(freezeState)
    Object.freeze(value)
  }
  return value
}
