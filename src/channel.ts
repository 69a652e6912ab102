/**
 * Unbounded single-consumer async queue. Every lazy sequence in the runtime
 * (state changes, backend subscriptions) is exposed through one of these.
 */
export interface Channel<T> extends AsyncIterableIterator<T> {
  /** Enqueue a value. Ignored after `close()`. */
  push(value: T): void
  /** End the sequence; pending and future reads resolve as done. */
  close(): void
  readonly closed: boolean
}

export function createChannel<T>(onClose?: () => void): Channel<T> {
  const buffer: T[] = []
  const waiting: Array<(result: IteratorResult<T, undefined>) => void> = []
  let closed = false

  const close = () => {
    if (closed) return
    closed = true
    buffer.length = 0
    for (const resolve of waiting.splice(0)) {
      resolve({ done: true, value: undefined })
    }
    onClose?.()
  }

  const channel: Channel<T> = {
    get closed() {
      return closed
    },
    push(value) {
      if (closed) return
      const resolve = waiting.shift()
      if (resolve) {
        resolve({ done: false, value })
      } else {
        buffer.push(value)
      }
    },
    close,
    next() {
      if (buffer.length > 0) {
        const [value] = buffer.splice(0, 1)
        return Promise.resolve<IteratorResult<T, undefined>>({ done: false, value })
      }
      if (closed) {
        return Promise.resolve<IteratorResult<T, undefined>>({ done: true, value: undefined })
      }
      return new Promise(resolve => waiting.push(resolve))
    },
    return() {
      close()
      return Promise.resolve<IteratorResult<T, undefined>>({ done: true, value: undefined })
    },
    [Symbol.asyncIterator]() {
      return channel
    }
  }

  return channel
}

/**
 * Adapts a callback subscription into an async sequence. The subscription is
 * torn down when the consumer stops iterating or the signal aborts.
 */
export function fromSubscription<T>(
  subscribe: (push: (value: T) => void) => () => void,
  signal?: AbortSignal
): Channel<T> {
  let unsubscribe: (() => void) | undefined
  const onAbort = () => channel.close()
  const channel = createChannel<T>(() => {
    unsubscribe?.()
    signal?.removeEventListener('abort', onAbort)
  })
  if (signal?.aborted) {
    channel.close()
    return channel
  }
  unsubscribe = subscribe(value => channel.push(value))
  signal?.addEventListener('abort', onAbort, { once: true })
  return channel
}
