// services/gateway/server.ts
// HTTP: вебхук Telegram + liveness
import Fastify, { type FastifyInstance } from 'fastify'
import type { HandleResult } from './bot'
import { webhookPath, type Mode } from './config'
import type { KvStore } from './store'

export type ServerDeps = {
  handleUpdate: (payload: unknown) => Promise<HandleResult>
  store: Pick<KvStore, 'kind' | 'ping'>
  mode: Mode
  pathSecret: string
  webhookSecret: string | null
}

const SECRET_HEADER = 'x-telegram-bot-api-secret-token'

export function buildServer(deps: ServerDeps, app: FastifyInstance = Fastify({ logger: true })): FastifyInstance {
  app.get('/', async () => ({ status: 'ok', mode: deps.mode }))

  app.get('/health', async (req) => {
    try {
      return { ok: await deps.store.ping(), store: deps.store.kind }
    } catch (e) {
      req.log.error(e, 'store ping failed')
      return { ok: false, store: deps.store.kind }
    }
  })

  // отдельный scope: свой JSON-парсер, чтобы битое тело не превращалось в 400
  app.register(async (scope) => {
    scope.removeContentTypeParser('application/json')
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
      try {
        done(null, JSON.parse(String(body)))
      } catch (e) {
        req.log.warn({ err: e instanceof Error ? e.message : String(e) }, 'webhook body is not JSON')
        done(null, null)
      }
    })

    scope.post(webhookPath(deps), async (req, reply) => {
      if (deps.webhookSecret) {
        const incoming = req.headers[SECRET_HEADER]
        if (incoming !== deps.webhookSecret) {
          req.log.warn('webhook forbidden (secret mismatch)')
          return reply.code(403).send({ ok: false })
        }
      }

      try {
        const result = await deps.handleUpdate(req.body)
        return reply.code(200).send({ ok: true, result })
      } catch (e) {
        req.log.error(e, 'webhook handler error')
        // Always 200 to Telegram to avoid retries
        return reply.code(200).send({ ok: true })
      }
    })
  })

  return app
}
