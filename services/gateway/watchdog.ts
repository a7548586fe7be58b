// services/gateway/watchdog.ts
import type { Logger } from './store'
import type { WebhookApi } from './telegram'

export const ALLOWED_UPDATES = ['message', 'callback_query']

export type ReconcileResult = 'in_sync' | 'reset' | 'error'

type WatchdogOpts = {
  url: string
  secretToken: string | null
  intervalMs: number
}

/**
 * Keeps the registered webhook URL equal to the desired one.
 * Runs on its own timer, never on the request path; a failed tick is logged
 * and the next tick tries again.
 */
export class WebhookWatchdog {
  private timer: NodeJS.Timeout | null = null
  private running: Promise<ReconcileResult> | null = null
  private stopped = true

  constructor(private readonly api: WebhookApi, private readonly log: Logger, private readonly opts: WatchdogOpts) {}

  async reconcile(): Promise<ReconcileResult> {
    try {
      const info = await this.api.getWebhookInfo()
      if (info.url === this.opts.url) return 'in_sync'
      await this.api.setWebhook({ url: this.opts.url, secretToken: this.opts.secretToken, allowedUpdates: ALLOWED_UPDATES })
      this.log.warn({ was: info.url || null, lastError: info.lastErrorMessage }, 'webhook re-registered')
      return 'reset'
    } catch (e) {
      this.log.error(e, 'webhook check failed')
      return 'error'
    }
  }

  /** Reconciles once right away, then every `intervalMs`. */
  async start(): Promise<ReconcileResult> {
    if (!this.stopped) throw new Error('WATCHDOG_ALREADY_STARTED')
    this.stopped = false
    const first = await this.tick()
    this.schedule()
    return first
  }

  async stop(): Promise<void> {
    this.stopped = true
    if (this.timer) clearTimeout(this.timer)
    this.timer = null
    if (this.running) await this.running
  }

  get active() {
    return !this.stopped
  }

  private tick(): Promise<ReconcileResult> {
    const p = this.reconcile()
    this.running = p
    return p.finally(() => { if (this.running === p) this.running = null })
  }

  // setTimeout, а не setInterval: проверки не перекрываются
  private schedule() {
    if (this.stopped) return
    this.timer = setTimeout(() => {
      void this.tick().then(() => this.schedule())
    }, this.opts.intervalMs)
    this.timer.unref()
  }
}
