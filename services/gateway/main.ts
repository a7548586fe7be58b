// services/gateway/main.ts
import Fastify from 'fastify'
import { BotDispatcher } from './bot'
import { loadConfig, webhookUrl } from './config'
import { UpdatePoller } from './poller'
import { buildServer } from './server'
import { openStore } from './store'
import { TelegramApi } from './telegram'
import { WebhookWatchdog } from './watchdog'

async function main() {
  const cfg = loadConfig()
  const app = Fastify({ logger: true })

  const store = await openStore({ redisUrl: cfg.redisUrl, logger: app.log })
  const api = new TelegramApi(cfg.botToken)
  if (!cfg.bankPassword) app.log.warn('BANK_PASSWORD is not set, bank elevation is disabled')

  const bot = new BotDispatcher(api, store, app.log, {
    bankPassword: cfg.bankPassword,
    baseCurrency: cfg.baseCurrency,
  })

  buildServer({
    handleUpdate: payload => bot.handleRaw(payload),
    store,
    mode: cfg.mode,
    pathSecret: cfg.pathSecret,
    webhookSecret: cfg.webhookSecret,
  }, app)

  await app.listen({ port: cfg.port, host: cfg.host })
  app.log.info(`listening on :${cfg.port} | mode=${cfg.mode} store=${store.kind}`)

  const url = webhookUrl(cfg)
  const watchdog = url
    ? new WebhookWatchdog(api, app.log, { url, secretToken: cfg.webhookSecret, intervalMs: cfg.webhookCheckIntervalMs })
    : null
  const poller = url
    ? null
    : new UpdatePoller(api, payload => bot.handleRaw(payload), app.log, { timeoutS: cfg.pollTimeoutS })

  if (watchdog) {
    const first = await watchdog.start()
    app.log.info({ result: first }, 'webhook watchdog started')
  } else {
    app.log.warn('WEBHOOK_BASE is empty, using long polling')
    await poller?.start()
  }

  let closing = false
  const shutdown = async (signal: string) => {
    if (closing) return
    closing = true
    app.log.info({ signal }, 'shutting down')
    await watchdog?.stop()
    await poller?.stop()
    if (watchdog) {
      try { await api.deleteWebhook() } catch (e) { app.log.warn({ err: e instanceof Error ? e.message : String(e) }, 'deleteWebhook failed') }
    }
    await app.close()
    await store.close()
  }
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      shutdown(sig).then(() => process.exit(0), (e) => { app.log.error(e, 'shutdown failed'); process.exit(1) })
    })
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
