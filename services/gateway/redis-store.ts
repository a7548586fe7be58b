// services/gateway/redis-store.ts
import type { KvStore } from './store'

// подмножество ioredis, которое реально используется
export interface RedisLike {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<'OK'>
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>
  del(key: string): Promise<number>
  incr(key: string): Promise<number>
  sadd(key: string, member: string): Promise<number>
  srem(key: string, member: string): Promise<number>
  smembers(key: string): Promise<string[]>
  ping(): Promise<string>
  quit(): Promise<string>
}

export class RedisStore implements KvStore {
  readonly kind = 'redis' as const

  constructor(private readonly redis: RedisLike) {}

  get(key: string) {
    return this.redis.get(key)
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value)
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key)
  }

  increment(counterKey: string) {
    return this.redis.incr(counterKey)
  }

  async addToSet(setKey: string, member: string): Promise<void> {
    await this.redis.sadd(setKey, member)
  }

  async removeFromSet(setKey: string, member: string): Promise<void> {
    await this.redis.srem(setKey, member)
  }

  members(setKey: string) {
    return this.redis.smembers(setKey)
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const ok = await this.redis.set(key, value, 'EX', ttlSeconds, 'NX')
    return ok !== null
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG'
  }

  async close(): Promise<void> {
    await this.redis.quit()
  }
}
