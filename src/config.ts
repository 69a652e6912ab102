/**
 * Runtime configuration shared by every store, effect and shared cell in the
 * process. Values are read lazily, so `configure` may be called at any time
 * before (or between) operations that depend on them.
 */

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/**
 * Which variant of a dependency the registry hands out when nothing
 * overrides it.
 */
export type DependencyContext = 'live' | 'test' | 'preview'

export interface RuntimeConfig {
  /** Fail fast on programming errors instead of logging them. */
  devMode: boolean
  /** Default dependency variant. */
  dependencyContext: DependencyContext
  /** Milliseconds to wait before restarting a backend subscription that ended or failed. */
  sharedRetryDelay: number
  /** Log effect errors that no `catch` handler claimed. */
  warnOnUnhandledEffectErrors: boolean
}

// =============================================================================
// DEFAULTS
// =============================================================================

function readEnv(name: string): string | undefined {
  return typeof process !== 'undefined' ? process.env[name] : undefined
}

function defaultConfig(): RuntimeConfig {
  const nodeEnv = readEnv('NODE_ENV')
  const isTest = nodeEnv === 'test' || readEnv('VITEST') !== undefined
  return {
    devMode: nodeEnv !== 'production',
    dependencyContext: isTest ? 'test' : 'live',
    sharedRetryDelay: 1000,
    warnOnUnhandledEffectErrors: true
  }
}

let current: RuntimeConfig = defaultConfig()

// =============================================================================
// API
// =============================================================================

export function getConfig(): Readonly<RuntimeConfig> {
  return current
}

/**
 * Merges the given options into the process-wide configuration.
 *
 * @example
 * ```ts
 * configure({ sharedRetryDelay: 250 })
 * ```
 */
export function configure(options: Partial<RuntimeConfig>): Readonly<RuntimeConfig> {
  current = { ...current, ...options }
  return current
}

/** Restores the defaults derived from the environment. */
export function resetConfig(): Readonly<RuntimeConfig> {
  current = defaultConfig()
  return current
}

/**
 * Enables development mode: programming errors throw instead of being logged.
 */
export function enableDevMode(): void {
  configure({ devMode: true })
}
