// services/gateway/poller.ts
import type { HandleResult } from './bot'
import type { Logger } from './store'
import type { UpdatesApi, WebhookApi } from './telegram'

type PollerOpts = {
  timeoutS: number
  /** pause after a failed getUpdates */
  backoffMs?: number
  sleep?: (ms: number) => Promise<void>
}

type Handler = (payload: unknown) => Promise<HandleResult>

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms))

function updateIdOf(payload: unknown): number | null {
  if (!payload || typeof payload !== 'object' || !('update_id' in payload)) return null
  return typeof payload.update_id === 'number' ? payload.update_id : null
}

/** Long-polling fallback used when no public webhook base is configured. */
export class UpdatePoller {
  private offset = 0
  private stopped = true
  private abort: AbortController | null = null
  private loopDone: Promise<void> | null = null
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly api: UpdatesApi & Pick<WebhookApi, 'deleteWebhook'>,
    private readonly handle: Handler,
    private readonly log: Logger,
    private readonly opts: PollerOpts,
  ) {
    this.sleep = opts.sleep ?? defaultSleep
  }

  /** One getUpdates round; returns how many updates were dispatched. */
  async pollOnce(): Promise<number> {
    this.abort = new AbortController()
    const batch = await this.api.getUpdates(this.offset, this.opts.timeoutS, this.abort.signal)
    for (const raw of batch) {
      const id = updateIdOf(raw)
      // offset двигаем даже для битых апдейтов, иначе Telegram пришлёт их снова
      if (id !== null && id >= this.offset) this.offset = id + 1
      await this.handle(raw)
    }
    return batch.length
  }

  async start(): Promise<void> {
    if (!this.stopped) throw new Error('POLLER_ALREADY_STARTED')
    this.stopped = false
    try {
      await this.api.deleteWebhook()
    } catch (e) {
      // getUpdates вернёт 409, пока вебхук жив; цикл ретраит сам
      this.log.warn({ err: e instanceof Error ? e.message : String(e) }, 'deleteWebhook failed, polling anyway')
    }
    this.log.info('polling for updates')
    this.loopDone = this.loop()
  }

  async stop(): Promise<void> {
    this.stopped = true
    this.abort?.abort()
    if (this.loopDone) await this.loopDone
    this.loopDone = null
  }

  get nextOffset() {
    return this.offset
  }

  private async loop(): Promise<void> {
    while (!this.stopped) {
      try {
        await this.pollOnce()
      } catch (e) {
        if (this.stopped) break
        this.log.error(e, 'getUpdates failed')
        await this.sleep(this.opts.backoffMs ?? 2000)
      }
    }
  }
}
