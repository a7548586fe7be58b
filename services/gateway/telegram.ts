// services/gateway/telegram.ts
// Тонкая обёртка над Bot API: fetch + ретраи на 429/5xx

export type TgUser = { id: number; first_name?: string; username?: string }
export type TgChat = { id: number; type?: string }
export type TgMessage = { message_id: number; chat: TgChat; from?: TgUser; text?: string }
export type TgCallbackQuery = { id: string; from: TgUser; data?: string; message?: TgMessage }
export type TgUpdate = { update_id: number; message?: TgMessage; callback_query?: TgCallbackQuery }

export type InlineButton = { text: string; callback_data: string }
export type ReplyMarkup =
  | { inline_keyboard: InlineButton[][] }
  | { keyboard: { text: string }[][]; resize_keyboard?: boolean; is_persistent?: boolean }
  | { remove_keyboard: true }

export type SendOpts = {
  parseMode?: 'HTML'
  replyMarkup?: ReplyMarkup
  disablePreview?: boolean
}

export type WebhookInfo = { url: string; pendingUpdateCount: number; lastErrorMessage: string | null }

export type SetWebhookParams = {
  url: string
  secretToken?: string | null
  allowedUpdates: string[]
}

/** What update handlers need from the chat platform. */
export interface ChatApi {
  sendMessage(chatId: number, text: string, opts?: SendOpts): Promise<void>
  editMessageText(chatId: number, messageId: number, text: string, opts?: SendOpts): Promise<void>
  answerCallbackQuery(callbackQueryId: string, text?: string, showAlert?: boolean): Promise<void>
}

export interface WebhookApi {
  getWebhookInfo(): Promise<WebhookInfo>
  setWebhook(p: SetWebhookParams): Promise<void>
  deleteWebhook(): Promise<void>
}

export interface UpdatesApi {
  /** raw payloads; validation happens in the dispatcher */
  getUpdates(offset: number, timeoutS: number, signal?: AbortSignal): Promise<unknown[]>
}

type TelegramOpts = {
  baseUrl?: string
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  maxAttempts?: number
}

type TgEnvelope = { ok: boolean; result: unknown; description: string; retryAfter: number | null }

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms))

function readEnvelope(text: string): TgEnvelope {
  let json: unknown
  try { json = JSON.parse(text) } catch { return { ok: false, result: null, description: text, retryAfter: null } }
  if (!json || typeof json !== 'object') return { ok: false, result: null, description: text, retryAfter: null }

  const ok = 'ok' in json && json.ok === true
  const result = 'result' in json ? json.result : null
  const description = 'description' in json && typeof json.description === 'string' ? json.description : ''
  let retryAfter: number | null = null
  if ('parameters' in json && json.parameters && typeof json.parameters === 'object' && 'retry_after' in json.parameters) {
    const ra = Number(json.parameters.retry_after)
    if (Number.isFinite(ra)) retryAfter = ra
  }
  return { ok, result, description, retryAfter }
}

function fieldOf(obj: unknown, name: string): unknown {
  return obj && typeof obj === 'object' && name in obj ? Reflect.get(obj, name) : undefined
}

function markupBody(opts: SendOpts) {
  const body: Record<string, unknown> = {
    disable_web_page_preview: Boolean(opts.disablePreview ?? true),
  }
  if (opts.parseMode) body.parse_mode = opts.parseMode
  if (opts.replyMarkup) body.reply_markup = opts.replyMarkup
  return body
}

export class TelegramApi implements ChatApi, WebhookApi, UpdatesApi {
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private readonly maxAttempts: number

  constructor(private readonly token: string, opts: TelegramOpts = {}) {
    this.baseUrl = (opts.baseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '')
    this.fetchImpl = opts.fetchImpl ?? fetch
    this.sleep = opts.sleep ?? defaultSleep
    this.maxAttempts = opts.maxAttempts ?? 3
  }

  // универсальный вызов с 429-backoff
  async call(method: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}/bot${this.token}/${method}`

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      })
      const text = await res.text()
      const env = readEnvelope(text)

      if (res.ok && env.ok) return env.result

      // 429 — выдержим паузу
      if (res.status === 429) {
        await this.sleep(((env.retryAfter ?? 1) + 0.5) * 1000)
        continue
      }

      // 5xx — лёгкий ретрай
      if (res.status >= 500 && res.status < 600) {
        await this.sleep(300 * (attempt + 1))
        continue
      }

      throw new Error(`TG_${method}_FAIL_${res.status}_${(env.description || text).slice(0, 180)}`)
    }
    throw new Error(`TG_${method}_RETRY_EXHAUSTED`)
  }

  async sendMessage(chatId: number, text: string, opts: SendOpts = {}): Promise<void> {
    await this.call('sendMessage', { chat_id: chatId, text, ...markupBody(opts) })
  }

  async editMessageText(chatId: number, messageId: number, text: string, opts: SendOpts = {}): Promise<void> {
    await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text, ...markupBody(opts) })
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string, showAlert = false): Promise<void> {
    const body: Record<string, unknown> = { callback_query_id: callbackQueryId, show_alert: showAlert }
    if (text) body.text = text
    await this.call('answerCallbackQuery', body)
  }

  async getWebhookInfo(): Promise<WebhookInfo> {
    const r = await this.call('getWebhookInfo', {})
    const url = fieldOf(r, 'url')
    const pending = fieldOf(r, 'pending_update_count')
    const lastError = fieldOf(r, 'last_error_message')
    return {
      url: typeof url === 'string' ? url : '',
      pendingUpdateCount: typeof pending === 'number' ? pending : 0,
      lastErrorMessage: typeof lastError === 'string' ? lastError : null,
    }
  }

  async setWebhook(p: SetWebhookParams): Promise<void> {
    const body: Record<string, unknown> = { url: p.url, allowed_updates: p.allowedUpdates }
    if (p.secretToken) body.secret_token = p.secretToken
    await this.call('setWebhook', body)
  }

  async deleteWebhook(): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: false })
  }

  async getUpdates(offset: number, timeoutS: number, signal?: AbortSignal): Promise<unknown[]> {
    const r = await this.call('getUpdates', {
      offset,
      timeout: timeoutS,
      allowed_updates: ['message', 'callback_query'],
    }, signal)
    return Array.isArray(r) ? r : []
  }
}
