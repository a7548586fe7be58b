// services/gateway/notify.ts
import type { RoleGate } from './roles'
import type { Logger } from './store'
import type { ChatApi, SendOpts } from './telegram'

export type SendResult = { ok: true } | { ok: false; error: string }

/** Never throws: a failed notification must not undo the transition that caused it. */
export async function sendSafe(api: ChatApi, chatId: number, text: string, opts?: SendOpts): Promise<SendResult> {
  try {
    await api.sendMessage(chatId, text, opts)
    return { ok: true }
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) }
  }
}

export class Notifier {
  constructor(
    private readonly api: ChatApi,
    private readonly roles: RoleGate,
    private readonly log: Logger,
  ) {}

  async toUser(chatId: number, text: string, opts?: SendOpts): Promise<SendResult> {
    const r = await sendSafe(this.api, chatId, text, opts)
    if (!r.ok) this.log.warn({ chatId, err: r.error }, 'notification failed')
    return r
  }

  /**
   * Sends to every bank user except `exceptUserId`; returns how many deliveries succeeded.
   * Never throws, like {@link toUser}.
   */
  async toBank(text: string, opts?: SendOpts, exceptUserId?: number): Promise<number> {
    let ids: number[]
    try {
      ids = await this.roles.bankUsers()
    } catch (e) {
      this.log.error(e, 'bank users lookup failed')
      return 0
    }
    let delivered = 0
    for (const id of ids) {
      if (id === exceptUserId) continue
      const r = await this.toUser(id, text, opts)
      if (r.ok) delivered++
    }
    return delivered
  }
}
