import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  FileStorageBackend,
  InMemoryBackend,
  InMemoryFileSystem,
  LiveFileSystem,
  Shared,
  fileStorageKey,
  fileSystemKey,
  sharedCells,
  withDependencies
} from '../src'

interface Settings {
  theme: 'light' | 'dark'
}

function decodeSettings(raw: unknown): Settings | undefined {
  if (typeof raw !== 'object' || raw === null || !('theme' in raw)) return undefined
  return raw.theme === 'light' || raw.theme === 'dark' ? { theme: raw.theme } : undefined
}

afterEach(() => {
  sharedCells.teardownAll()
})

describe('Persistence', () => {
  describe('InMemoryBackend', () => {
    it('should load what was saved', async () => {
      const backend = new InMemoryBackend<number>()
      expect(await backend.load('count')).toBeUndefined()
      await backend.save('count', 2)
      expect(await backend.load('count')).toBe(2)
    })

    it('should fail the next operation only', async () => {
      const backend = new InMemoryBackend<number>()
      backend.failNext('load', new Error('unavailable'))
      await expect(backend.load('count')).rejects.toThrow('unavailable')
      expect(await backend.load('count')).toBeUndefined()
    })

    it('should stream external writes to subscribers', async () => {
      const backend = new InMemoryBackend<number>()
      const controller = new AbortController()
      const updates = backend.subscribe('count', controller.signal)[Symbol.asyncIterator]()

      backend.externalWrite('count', 1)
      backend.externalWrite('other', 7)
      backend.externalWrite('count', 2)

      expect(await updates.next()).toEqual({ done: false, value: 1 })
      expect(await updates.next()).toEqual({ done: false, value: 2 })
      controller.abort()
      expect(await updates.next()).toEqual({ done: true, value: undefined })
    })
  })

  describe('FileStorageBackend', () => {
    it('should save pretty-printed JSON through the file system dependency', async () => {
      const files = new InMemoryFileSystem()
      const backend = new FileStorageBackend(decodeSettings)

      await withDependencies(
        values => values.set(fileSystemKey, files),
        () => backend.save('/config/settings.json', { theme: 'dark' })
      )

      expect(await files.readFile('/config/settings.json')).toBe('{\n  "theme": "dark"\n}')
    })

    it('should decode what it reads and reject malformed content', async () => {
      const files = new InMemoryFileSystem()
      const backend = new FileStorageBackend(decodeSettings)
      await files.writeFile('/good.json', '{ "theme": "light" }')
      await files.writeFile('/bad.json', '{ "theme": "blue" }')

      const [good, bad, missing] = await withDependencies(
        values => values.set(fileSystemKey, files),
        () => Promise.all([backend.load('/good.json'), backend.load('/bad.json'), backend.load('/missing.json')])
      )

      expect(good).toEqual({ theme: 'light' })
      expect(bad).toBeUndefined()
      expect(missing).toBeUndefined()
    })

    it('should back a shared value and follow edits to the file', async () => {
      const files = new InMemoryFileSystem()
      await files.writeFile('/settings.json', '{ "theme": "dark" }')

      const settings = await withDependencies(
        values => values.set(fileSystemKey, files),
        () => Shared.load(fileStorageKey('/settings.json', decodeSettings), { theme: 'light' })
      )
      expect(settings.key).toBe('file:/settings.json')
      expect(settings.value).toEqual({ theme: 'dark' })

      await files.writeFile('/settings.json', '{ "theme": "light" }')
      await vi.waitFor(() => expect(settings.value).toEqual({ theme: 'light' }))
    })
  })

  describe('LiveFileSystem', () => {
    let directory: string | undefined

    afterEach(async () => {
      if (directory) await rm(directory, { recursive: true, force: true })
      directory = undefined
    })

    it('should create parent directories and read files back', async () => {
      directory = await mkdtemp(join(tmpdir(), 'composable-store-'))
      const files = new LiveFileSystem()
      const path = join(directory, 'nested', 'value.json')

      expect(await files.readFile(path)).toBeUndefined()
      await files.writeFile(path, '[1,2]')
      expect(await files.readFile(path)).toBe('[1,2]')
    })
  })
})
