import type { CompareAndSetResult, GetResult, StateStore, StoredValue } from './types.js'

interface Entry {
  value: StoredValue
  expiresAt: number
}

export interface InMemoryStateStore extends StateStore {
  cleanup(): number
  size(): number
}

export function createInMemoryStateStore(): InMemoryStateStore {
  const entries = new Map<string, Entry>()

  function isExpired(entry: Entry): boolean {
    return Date.now() >= entry.expiresAt
  }

  function read(key: string): StoredValue | null {
    const entry = entries.get(key)
    if (!entry) {
      return null
    }
    if (isExpired(entry)) {
      entries.delete(key)
      return null
    }
    return entry.value
  }

  function write(key: string, value: StoredValue, ttlSeconds: number): void {
    entries.set(key, {
      value: { version: value.version, payload: value.payload },
      expiresAt: Date.now() + ttlSeconds * 1000
    })
  }

  async function get(key: string): Promise<GetResult> {
    const value = read(key)
    if (!value) {
      return { found: false }
    }
    return { found: true, value: { ...value } }
  }

  async function set(key: string, value: StoredValue, ttlSeconds: number): Promise<void> {
    write(key, value, ttlSeconds)
  }

  // No await between the version check and the write, so this is atomic per key.
  async function compareAndSet(
    key: string,
    expectedVersion: number,
    value: StoredValue,
    ttlSeconds: number
  ): Promise<CompareAndSetResult> {
    const current = read(key)
    const currentVersion = current?.version ?? 0
    if (currentVersion !== expectedVersion) {
      return { ok: false, current: current ? { ...current } : null }
    }
    write(key, value, ttlSeconds)
    return { ok: true, current: { ...value } }
  }

  async function deleteKey(key: string): Promise<void> {
    entries.delete(key)
  }

  function cleanup(): number {
    let removed = 0
    for (const [key, entry] of entries) {
      if (isExpired(entry)) {
        entries.delete(key)
        removed++
      }
    }
    return removed
  }

  function size(): number {
    return entries.size
  }

  return {
    get,
    set,
    compareAndSet,
    delete: deleteKey,
    cleanup,
    size
  }
}
