/**
 * Persistence backends for shared cells.
 *
 * A backend loads, saves and (optionally) streams external changes for string
 * keys. Two are provided: an in-memory backend, and a JSON file backend that
 * goes through the `fileSystem` dependency so tests never touch the disk.
 */

import { mkdir, readFile, watch, writeFile } from 'node:fs/promises'
import { basename, dirname } from 'node:path'
import { fromSubscription } from './channel'
import { dependencyKey, resolve } from './dependencies'

// =============================================================================
// BACKEND PROTOCOL
// =============================================================================

export interface PersistenceBackend<T> {
  /** Resolves `undefined` when nothing is stored under `key`. */
  load(key: string): Promise<T | undefined>
  save(key: string, value: T): Promise<void>
  /**
   * Values written to `key` by someone else. The sequence is expected to run
   * until `signal` aborts; if it ends or throws, the cell restarts it.
   */
  subscribe?(key: string, signal: AbortSignal): AsyncIterable<T>
}

/**
 * Addresses one persisted value. Keys with the same `id` share one cell, so
 * they must agree on the value type and backend.
 */
export interface PersistenceKey<T> {
  readonly id: string
  /** The key handed to the backend. */
  readonly storageKey: string
  readonly backend: PersistenceBackend<T>
}

// =============================================================================
// IN-MEMORY BACKEND
// =============================================================================

export class InMemoryBackend<T> implements PersistenceBackend<T> {
  private readonly values: Map<string, T>
  private readonly listeners = new Map<string, Set<(value: T) => void>>()
  private readonly failures = new Map<'load' | 'save', Error>()

  constructor(initial: Iterable<readonly [string, T]> = []) {
    this.values = new Map(initial)
  }

  async load(key: string): Promise<T | undefined> {
    this.throwPendingFailure('load')
    return this.values.get(key)
  }

  async save(key: string, value: T): Promise<void> {
    this.throwPendingFailure('save')
    this.values.set(key, value)
  }

  subscribe(key: string, signal: AbortSignal): AsyncIterable<T> {
    return fromSubscription<T>(push => {
      let listeners = this.listeners.get(key)
      if (!listeners) {
        listeners = new Set()
        this.listeners.set(key, listeners)
      }
      const active = listeners
      active.add(push)
      return () => active.delete(push)
    }, signal)
  }

  /** Stores `value` as if another process wrote it and notifies subscribers. */
  externalWrite(key: string, value: T): void {
    this.values.set(key, value)
    this.listeners.get(key)?.forEach(listener => listener(value))
  }

  /** The stored value, bypassing any configured failure. */
  peek(key: string): T | undefined {
    return this.values.get(key)
  }

  /** Makes the next `load` or `save` reject with `error`. */
  failNext(operation: 'load' | 'save', error: Error): void {
    this.failures.set(operation, error)
  }

  private throwPendingFailure(operation: 'load' | 'save'): void {
    const failure = this.failures.get(operation)
    if (failure) {
      this.failures.delete(operation)
      throw failure
    }
  }
}

/**
 * A key stored in memory for the lifetime of the process.
 *
 * @example
 * ```ts
 * const settings = new Shared(inMemoryKey<Settings>('settings'), defaultSettings)
 * ```
 */
export function inMemoryKey<T>(id: string, backend: PersistenceBackend<T> = new InMemoryBackend<T>()): PersistenceKey<T> {
  return { id: `memory:${id}`, storageKey: id, backend }
}

// =============================================================================
// FILE STORAGE
// =============================================================================

/** The slice of a file system the file backend needs. */
export interface FileSystem {
  /** Resolves `undefined` when the file does not exist. */
  readFile(path: string): Promise<string | undefined>
  writeFile(path: string, contents: string): Promise<void>
  /** Yields once per change to the file until `signal` aborts. */
  watch(path: string, signal: AbortSignal): AsyncIterable<void>
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class LiveFileSystem implements FileSystem {
  async readFile(path: string): Promise<string | undefined> {
    try {
      return await readFile(path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return undefined
      throw error
    }
  }

  async writeFile(path: string, contents: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, contents, 'utf8')
  }

  async *watch(path: string, signal: AbortSignal): AsyncIterable<void> {
    const name = basename(path)
    try {
      for await (const event of watch(dirname(path), { signal })) {
        if (event.filename === name) yield
      }
    } catch (error) {
      if (signal.aborted) return
      throw error
    }
  }
}

export class InMemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>()
  private readonly watchers = new Map<string, Set<() => void>>()

  async readFile(path: string): Promise<string | undefined> {
    return this.files.get(path)
  }

  async writeFile(path: string, contents: string): Promise<void> {
    this.files.set(path, contents)
    this.watchers.get(path)?.forEach(listener => listener())
  }

  watch(path: string, signal: AbortSignal): AsyncIterable<void> {
    return fromSubscription<void>(push => {
      let listeners = this.watchers.get(path)
      if (!listeners) {
        listeners = new Set()
        this.watchers.set(path, listeners)
      }
      const active = listeners
      const listener = () => push(undefined)
      active.add(listener)
      return () => active.delete(listener)
    }, signal)
  }
}

export const fileSystemKey = dependencyKey<FileSystem>('fileSystem', {
  liveValue: new LiveFileSystem(),
  testValue: new InMemoryFileSystem(),
  previewValue: new InMemoryFileSystem()
})

/**
 * Stores values as pretty-printed JSON files. `decode` validates what was
 * read back; return `undefined` to treat a file as empty.
 */
export class FileStorageBackend<T> implements PersistenceBackend<T> {
  private readonly decode: (raw: unknown) => T | undefined

  constructor(decode: (raw: unknown) => T | undefined) {
    this.decode = decode
  }

  async load(path: string): Promise<T | undefined> {
    const text = await resolve(fileSystemKey).readFile(path)
    if (text === undefined) return undefined
    const raw: unknown = JSON.parse(text)
    return this.decode(raw)
  }

  save(path: string, value: T): Promise<void> {
    return resolve(fileSystemKey).writeFile(path, JSON.stringify(value, null, 2))
  }

  async *subscribe(path: string, signal: AbortSignal): AsyncIterable<T> {
    for await (const _change of resolve(fileSystemKey).watch(path, signal)) {
      const value = await this.load(path)
      if (value !== undefined) yield value
    }
  }
}

/**
 * A key persisted as a JSON file at `path`.
 *
 * @example
 * ```ts
 * const todos = new Shared(fileStorageKey('./todos.json', decodeTodos), [])
 * ```
 */
export function fileStorageKey<T>(path: string, decode: (raw: unknown) => T | undefined): PersistenceKey<T> {
  return { id: `file:${path}`, storageKey: path, backend: new FileStorageBackend(decode) }
}
