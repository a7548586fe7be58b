// services/gateway/config.ts
import crypto from 'node:crypto'

export type Mode = 'webhook' | 'polling'

export type AppConfig = {
  botToken: string
  webhookBase: string | null
  webhookSecret: string | null
  /** last segment of POST /wh/:pathSecret */
  pathSecret: string
  redisUrl: string | null
  bankPassword: string | null
  baseCurrency: string
  port: number
  host: string
  webhookCheckIntervalMs: number
  pollTimeoutS: number
  mode: Mode
}

type Env = Record<string, string | undefined>

const str = (v: string | undefined) => {
  const s = (v ?? '').trim()
  return s ? s : null
}

const num = (v: string | undefined, fallback: number) => {
  const n = Number(v)
  return v != null && v.trim() !== '' && Number.isFinite(n) && n > 0 ? n : fallback
}

export function loadConfig(env: Env = process.env): AppConfig {
  const botToken = str(env.BOT_TOKEN)
  if (!botToken) throw new Error('BOT_TOKEN_MISSING')

  const webhookBase = str(env.WEBHOOK_BASE)?.replace(/\/+$/, '') ?? null
  const webhookSecret = str(env.WEBHOOK_SECRET)
  const pathSecret = webhookSecret ?? crypto.createHash('sha256').update(botToken).digest('hex').slice(0, 32)

  return {
    botToken,
    webhookBase,
    webhookSecret,
    pathSecret,
    redisUrl: str(env.REDIS_URL),
    bankPassword: str(env.BANK_PASSWORD),
    baseCurrency: (str(env.BASE_CURRENCY) ?? 'UAH').toUpperCase(),
    port: num(env.PORT, 10000),
    host: str(env.HOST) ?? '0.0.0.0',
    webhookCheckIntervalMs: num(env.WEBHOOK_CHECK_INTERVAL_MS, 5 * 60 * 1000),
    pollTimeoutS: num(env.POLL_TIMEOUT_S, 25),
    mode: webhookBase ? 'webhook' : 'polling',
  }
}

export function webhookPath(cfg: Pick<AppConfig, 'pathSecret'>): string {
  return `/wh/${cfg.pathSecret}`
}

export function webhookUrl(cfg: Pick<AppConfig, 'webhookBase' | 'pathSecret'>): string | null {
  return cfg.webhookBase ? `${cfg.webhookBase}${webhookPath(cfg)}` : null
}
