import type { CancellationTable } from './cancellation'
import { getConfig } from './config'
import { runWithDependencies } from './dependencies'
import { runtimeWarn, toError } from './diagnostics'
import type { Effect, Send } from './effect'
import { EffectTask } from './task'

export interface EffectContext<A> {
  /** Delivers an action back to the owner of the effect. */
  send: Send<A>
  /** Aborts when the enclosing task is cancelled. */
  signal: AbortSignal
  cancellations: CancellationTable
  /** Name used in diagnostics, usually the store's. */
  source?: string
}

/**
 * Executes an effect tree. The returned promise settles once every part of the
 * effect has completed, failed or been cancelled; it never rejects.
 */
export function runEffect<A>(effect: Effect<A>, context: EffectContext<A>): Promise<void> {
  const node = effect.node
  switch (node.kind) {
    case 'none':
      return Promise.resolve()

    case 'send':
      if (!context.signal.aborted) context.send(node.action)
      return Promise.resolve()

    case 'cancel':
      context.cancellations.cancel(node.id)
      return Promise.resolve()

    case 'merge':
      return Promise.all(node.effects.map(member => runEffect(member, context))).then(() => undefined)

    case 'concatenate':
      return runSequentially(node.effects, context)

    case 'cancellable': {
      if (node.cancelInFlight) context.cancellations.cancel(node.id)
      const task = new EffectTask(context.signal)
      context.cancellations.register(node.id, task)
      task.start()
      return runEffect(node.effect, gate(context, task)).then(() => task.complete())
    }

    case 'run': {
      const task = new EffectTask(context.signal)
      task.start()
      const { send } = gate(context, task)
      const { body, onError } = node
      return runWithDependencies(node.dependencies, async () => {
        try {
          await body(send, task.signal)
          task.complete()
        } catch (thrown) {
          // Work that observed its own cancellation is not a failure.
          if (task.signal.aborted) return
          const error = toError(thrown)
          if (onError) {
            try {
              onError(error, send)
            } catch (handlerError) {
              runtimeWarn('An effect catch handler threw', context.source, handlerError)
            }
          } else if (getConfig().warnOnUnhandledEffectErrors) {
            runtimeWarn(
              'An effect failed and no catch handler mapped the error to an action',
              context.source,
              error
            )
          }
          task.fail(error)
        }
      })
    }
  }
}

async function runSequentially<A>(effects: readonly Effect<A>[], context: EffectContext<A>): Promise<void> {
  for (const effect of effects) {
    if (context.signal.aborted) return
    await runEffect(effect, context)
  }
}

/** Restricts delivery to the lifetime of `task`. */
function gate<A>(context: EffectContext<A>, task: EffectTask): EffectContext<A> {
  return {
    ...context,
    signal: task.signal,
    send: action => {
      if (task.isRunning && !context.signal.aborted) context.send(action)
    }
  }
}
