import { describe, expect, it, vi } from 'vitest'
import type { HandleResult } from './bot'
import { UpdatePoller } from './poller'
import type { UpdatesApi, WebhookApi } from './telegram'
import { silentLogger } from './test-helpers/fakes'

type Api = UpdatesApi & Pick<WebhookApi, 'deleteWebhook'>

function fakeApi(batches: unknown[][]) {
  const offsets: number[] = []
  const api: Api = {
    deleteWebhook: vi.fn(async () => {}),
    getUpdates: vi.fn(async (offset: number, _timeoutS: number, signal?: AbortSignal) => {
      offsets.push(offset)
      const next = batches.shift()
      if (next) return next
      // пустая очередь: ждём, пока poller не остановят
      return new Promise<unknown[]>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
    }),
  }
  return { api, offsets }
}

const handled = async (): Promise<HandleResult> => 'handled'

describe('UpdatePoller', () => {
  it('dispatches a batch and advances the offset past the last update', async () => {
    const { api, offsets } = fakeApi([[{ update_id: 10 }, { update_id: 11 }], []])
    const handle = vi.fn(handled)
    const poller = new UpdatePoller(api, handle, silentLogger(), { timeoutS: 0 })

    expect(await poller.pollOnce()).toBe(2)
    expect(handle).toHaveBeenCalledTimes(2)
    expect(poller.nextOffset).toBe(12)

    await poller.pollOnce()
    expect(offsets).toEqual([0, 12])
  })

  it('moves past malformed updates too', async () => {
    const { api } = fakeApi([[{ update_id: 5, message: 'garbage' }, 'not an update']])
    const handle = vi.fn(async (): Promise<HandleResult> => 'invalid')
    const poller = new UpdatePoller(api, handle, silentLogger(), { timeoutS: 0 })

    await poller.pollOnce()
    expect(handle).toHaveBeenCalledTimes(2)
    expect(poller.nextOffset).toBe(6)
  })

  it('drops the webhook, polls until stopped and backs off after errors', async () => {
    const { api, offsets } = fakeApi([[{ update_id: 1 }]])
    const failing = vi.mocked(api.getUpdates)
    failing.mockRejectedValueOnce(new Error('TG_getUpdates_FAIL_502_Bad Gateway'))
    const sleep = vi.fn(async (_ms: number) => {})
    const log = silentLogger()
    const handle = vi.fn(handled)
    const poller = new UpdatePoller(api, handle, log, { timeoutS: 0, backoffMs: 250, sleep })

    await poller.start()
    expect(api.deleteWebhook).toHaveBeenCalledTimes(1)

    await vi.waitFor(() => expect(handle).toHaveBeenCalledTimes(1))
    expect(log.error).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(250)

    await poller.stop()
    expect(offsets).toEqual([0, 2])
    await expect(poller.stop()).resolves.toBeUndefined()
  })

  it('keeps polling when the webhook cannot be dropped', async () => {
    const { api } = fakeApi([[{ update_id: 3 }]])
    vi.mocked(api.deleteWebhook).mockRejectedValueOnce(new Error('TG_deleteWebhook_RETRY_EXHAUSTED'))
    const log = silentLogger()
    const handle = vi.fn(handled)
    const poller = new UpdatePoller(api, handle, log, { timeoutS: 0 })

    await expect(poller.start()).resolves.toBeUndefined()
    expect(log.warn).toHaveBeenCalledTimes(1)

    await vi.waitFor(() => expect(handle).toHaveBeenCalledTimes(1))
    expect(poller.nextOffset).toBe(4)
    await poller.stop()
  })
})
