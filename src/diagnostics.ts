import { getConfig } from './config'

export const LOG_PREFIX = '[composable-store]'

function format(message: string, source?: string): string {
  return source ? `${LOG_PREFIX} ${source}: ${message}` : `${LOG_PREFIX} ${message}`
}

/**
 * Logs a non-fatal runtime warning, e.g. an action routed to a collection
 * element that no longer exists.
 */
export function runtimeWarn(message: string, source?: string, detail?: unknown): void {
  if (detail === undefined) {
    console.warn(format(message, source))
  } else {
    console.warn(format(message, source), detail)
  }
}

/**
 * Reports a violated composition invariant. Throws in dev mode so the mistake
 * surfaces at the call site, otherwise logs it and lets the caller continue.
 */
export function reportProgrammingError(message: string, source?: string, cause?: unknown): void {
  const text = format(message, source)
  if (getConfig().devMode) {
    throw cause === undefined ? new Error(text) : new Error(text, { cause })
  }
  if (cause === undefined) {
    console.error(text)
  } else {
    console.error(text, cause)
  }
}

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Short label for an action in log output: its `type` when it has one.
 */
export function describeAction(action: unknown): string {
  if (typeof action === 'object' && action !== null && 'type' in action && typeof action.type === 'string') {
    return action.type
  }
  return String(action)
}
