// services/gateway/store.ts
import Redis from 'ioredis'
import type { FastifyBaseLogger } from 'fastify'
import { MemoryStore } from './memory-store'
import { RedisStore, type RedisLike } from './redis-store'

export type Logger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>

/**
 * String-keyed persistence used for sessions, roles and orders.
 * Implementations: {@link RedisStore} (primary) and {@link MemoryStore} (fallback).
 */
export interface KvStore {
  readonly kind: 'redis' | 'memory'
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<void>
  del(key: string): Promise<void>
  /** atomic; every caller gets a distinct value */
  increment(counterKey: string): Promise<number>
  addToSet(setKey: string, member: string): Promise<void>
  removeFromSet(setKey: string, member: string): Promise<void>
  members(setKey: string): Promise<string[]>
  /** true when the key was absent and is now set; it expires after ttlSeconds */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>
  ping(): Promise<boolean>
  close(): Promise<void>
}

type ConnectableRedis = RedisLike & {
  connect(): Promise<void>
  disconnect(): void
}

type OpenOpts = {
  redisUrl: string | null
  logger: Logger
  connectTimeoutMs?: number
  /** overridable for tests */
  connect?: (url: string, connectTimeoutMs: number) => ConnectableRedis
}

const defaultConnect = (url: string, connectTimeoutMs: number): ConnectableRedis =>
  new Redis(url, { lazyConnect: true, connectTimeout: connectTimeoutMs, maxRetriesPerRequest: 1 })

// Redis проверяется один раз при старте; выбор не меняется до перезапуска
export async function openStore(opts: OpenOpts): Promise<KvStore> {
  const { redisUrl, logger } = opts
  if (!redisUrl) {
    logger.info('REDIS_URL is not set, using in-memory store')
    return new MemoryStore()
  }

  const client = (opts.connect ?? defaultConnect)(redisUrl, opts.connectTimeoutMs ?? 3000)
  try {
    await client.connect()
    const store = new RedisStore(client)
    if (!(await store.ping())) throw new Error('REDIS_PING_FAILED')
    logger.info('using redis store')
    return store
  } catch (e) {
    logger.warn({ err: e instanceof Error ? e.message : String(e) }, 'redis unreachable, falling back to in-memory store')
    client.disconnect()
    return new MemoryStore()
  }
}
