// services/gateway/test-helpers/fakes.ts
import { vi } from 'vitest'
import type { RedisLike } from '../redis-store'
import type { ChatApi, SendOpts } from '../telegram'

export const silentLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() })

export type Sent = { chatId: number; text: string; opts?: SendOpts }

/** Records outgoing calls instead of talking to Telegram. */
export class FakeChatApi implements ChatApi {
  readonly sent: Sent[] = []
  readonly edits: { chatId: number; messageId: number; text: string }[] = []
  readonly answers: { id: string; text?: string; showAlert?: boolean }[] = []
  /** chats whose sendMessage fails (blocked bot etc.) */
  readonly failFor = new Set<number>()

  async sendMessage(chatId: number, text: string, opts?: SendOpts): Promise<void> {
    if (this.failFor.has(chatId)) throw new Error('TG_sendMessage_FAIL_403_Forbidden: bot was blocked by the user')
    this.sent.push({ chatId, text, opts })
  }

  async editMessageText(chatId: number, messageId: number, text: string): Promise<void> {
    this.edits.push({ chatId, messageId, text })
  }

  async answerCallbackQuery(id: string, text?: string, showAlert?: boolean): Promise<void> {
    this.answers.push({ id, text, showAlert })
  }

  to(chatId: number): Sent[] {
    return this.sent.filter(s => s.chatId === chatId)
  }

  last(chatId: number): Sent | undefined {
    const list = this.to(chatId)
    return list[list.length - 1]
  }

  reset() {
    this.sent.length = 0
    this.edits.length = 0
    this.answers.length = 0
  }
}

/** In-process stand-in for the ioredis commands RedisStore uses. */
export class FakeRedis implements RedisLike {
  readonly strings = new Map<string, string>()
  readonly sets = new Map<string, Set<string>>()
  readonly ttls = new Map<string, number>()
  connected = false
  failConnect = false
  pong = 'PONG'

  async connect(): Promise<void> {
    if (this.failConnect) throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
    this.connected = true
  }

  disconnect(): void {
    this.connected = false
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null
  }

  set(key: string, value: string): Promise<'OK'>
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>
  async set(key: string, value: string, secondsToken?: 'EX', seconds?: number, nx?: 'NX'): Promise<'OK' | null> {
    if (nx === 'NX' && this.strings.has(key)) return null
    this.strings.set(key, value)
    if (secondsToken === 'EX' && seconds !== undefined) this.ttls.set(key, seconds)
    return 'OK'
  }

  async del(key: string): Promise<number> {
    const had = this.strings.delete(key) || this.sets.delete(key)
    return had ? 1 : 0
  }

  async incr(key: string): Promise<number> {
    const n = Number(this.strings.get(key) ?? 0) + 1
    this.strings.set(key, String(n))
    return n
  }

  async sadd(key: string, member: string): Promise<number> {
    const s = this.sets.get(key) ?? new Set<string>()
    const added = s.has(member) ? 0 : 1
    s.add(member)
    this.sets.set(key, s)
    return added
  }

  async srem(key: string, member: string): Promise<number> {
    return this.sets.get(key)?.delete(member) ? 1 : 0
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])]
  }

  async ping(): Promise<string> {
    return this.pong
  }

  async quit(): Promise<string> {
    this.connected = false
    return 'OK'
  }
}
