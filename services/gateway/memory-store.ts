// services/gateway/memory-store.ts
import { LRUCache } from 'lru-cache'
import type { KvStore } from './store'

const DAY_MS = 24 * 60 * 60 * 1000

export class MemoryStore implements KvStore {
  readonly kind = 'memory' as const
  private readonly values = new Map<string, string>()
  private readonly sets = new Map<string, Set<string>>()
  // короткоживущие ключи (дедупликация апдейтов)
  private readonly expiring = new LRUCache<string, string>({ max: 50_000, ttl: DAY_MS })

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? this.expiring.get(key) ?? null
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value)
  }

  async del(key: string): Promise<void> {
    this.values.delete(key)
    this.expiring.delete(key)
    this.sets.delete(key)
  }

  async increment(counterKey: string): Promise<number> {
    const next = Number(this.values.get(counterKey) ?? 0) + 1
    this.values.set(counterKey, String(next))
    return next
  }

  async addToSet(setKey: string, member: string): Promise<void> {
    const s = this.sets.get(setKey) ?? new Set<string>()
    s.add(member)
    this.sets.set(setKey, s)
  }

  async removeFromSet(setKey: string, member: string): Promise<void> {
    const s = this.sets.get(setKey)
    if (!s) return
    s.delete(member)
    if (s.size === 0) this.sets.delete(setKey)
  }

  async members(setKey: string): Promise<string[]> {
    return [...(this.sets.get(setKey) ?? [])]
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.values.has(key) || this.expiring.has(key)) return false
    this.expiring.set(key, value, { ttl: ttlSeconds * 1000 })
    return true
  }

  async ping(): Promise<boolean> {
    return true
  }

  async close(): Promise<void> {
    this.values.clear()
    this.sets.clear()
    this.expiring.clear()
  }
}
