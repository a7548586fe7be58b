import { beforeEach, describe, expect, it } from 'vitest'
import { BotDispatcher, parseCommand } from './bot'
import { bankActionsKeyboard, roleKeyboard } from './keyboards'
import { MemoryStore } from './memory-store'
import { FakeChatApi, silentLogger } from './test-helpers/fakes'

const CLIENT = 100
const BANKER = 7

class BrokenStore extends MemoryStore {
  async get(): Promise<string | null> {
    throw new Error('store down')
  }
}

describe('BotDispatcher', () => {
  let api: FakeChatApi
  let log: ReturnType<typeof silentLogger>
  let bot: BotDispatcher
  let seq = 0

  const msg = (userId: number, text: string) => ({
    update_id: ++seq,
    message: { message_id: seq, chat: { id: userId, type: 'private' }, from: { id: userId, first_name: 'U' }, text },
  })

  const tap = (userId: number, data: string, messageId = 50) => ({
    update_id: ++seq,
    callback_query: {
      id: `cq-${seq}`,
      from: { id: userId, first_name: 'U' },
      data,
      message: { message_id: messageId, chat: { id: userId, type: 'private' } },
    },
  })

  const send = (userId: number, ...texts: string[]) =>
    texts.reduce<Promise<unknown>>((p, t) => p.then(() => bot.handleRaw(msg(userId, t))), Promise.resolve())

  const lastText = (chatId: number) => api.last(chatId)?.text

  const createOrder = () => send(CLIENT, '/new', 'ACME Corp', 'buy', 'USD', '500', '41.25')

  beforeEach(async () => {
    seq = 0
    api = new FakeChatApi()
    log = silentLogger()
    bot = new BotDispatcher(api, new MemoryStore(), log, { bankPassword: 'test-secret', baseCurrency: 'UAH' })
    await send(BANKER, '/bank test-secret')
    api.reset()
  })

  it('greets on /start and offers a role choice', async () => {
    expect(await bot.handleRaw(msg(CLIENT, '/start'))).toBe('handled')
    const out = api.to(CLIENT)
    expect(out.length).toBe(2)
    expect(out[1]).toEqual({ chatId: CLIENT, text: 'Кто вы?', opts: { parseMode: undefined, replyMarkup: roleKeyboard() } })
  })

  it('drops invalid payloads and ignores updates it does not read', async () => {
    expect(await bot.handleRaw({ message: {} })).toBe('invalid')
    expect(log.warn).toHaveBeenCalledTimes(1)
    expect(await bot.handleRaw({ update_id: 999 })).toBe('ignored')
    expect(api.sent).toEqual([])
  })

  it('processes a redelivered update once', async () => {
    const u = msg(CLIENT, '/help')
    expect(await bot.handleRaw(u)).toBe('handled')
    expect(await bot.handleRaw(u)).toBe('duplicate')
    expect(api.to(CLIENT).length).toBe(1)
  })

  it('creates an order and lets the bank accept it', async () => {
    await createOrder()
    expect(lastText(CLIENT)?.startsWith('Заявка создана ✅')).toBe(true)
    expect(api.last(BANKER)?.opts?.replyMarkup).toEqual(bankActionsKeyboard(1))

    api.reset()
    expect(await bot.handleRaw(tap(BANKER, 'accept:1'))).toBe('handled')
    expect(api.answers).toEqual([{ id: 'cq-8', text: 'Заявка принята ✅', showAlert: undefined }])
    expect(api.edits.length).toBe(1)
    expect(api.edits[0].messageId).toBe(50)
    expect(api.edits[0].text.split('\n').pop()).toBe('Статус: ✅ принята')
    expect(api.to(CLIENT).map(s => s.text)).toEqual(['✅ Ваша заявка #1 принята банком.'])
  })

  it('runs a counter-offer through the rate prompt and the client\'s answer', async () => {
    await createOrder()
    api.reset()

    await bot.handleRaw(tap(BANKER, 'counter:1'))
    expect(lastText(BANKER)).toBe('Введите ваш курс для заявки #1 (курс клиента 41.25):')

    await send(BANKER, 'abc')
    expect(lastText(BANKER)).toBe('⚠️ Курс должен быть положительным числом. Введите курс для заявки #1 или /cancel.')

    await send(BANKER, '40')
    expect(lastText(BANKER)?.split('\n')[0]).toBe('💬 Курс 40 предложен клиенту.')
    expect(lastText(CLIENT)).toBe('💬 Банк предлагает курс <b>40</b> по заявке #1 (ваш курс 41.25).')

    api.reset()
    await bot.handleRaw(tap(CLIENT, 'take:1'))
    expect(api.answers[0].text).toBe('Вы приняли курс банка ✅')
    expect(lastText(BANKER)).toBe('✅ ACME Corp принял(а) курс 40 по заявке #1.')
  })

  it('accepts /counter with arguments', async () => {
    await createOrder()
    await send(BANKER, '/counter 1 40,5')
    expect(lastText(CLIENT)).toBe('💬 Банк предлагает курс <b>40.5</b> по заявке #1 (ваш курс 41.25).')
    await send(BANKER, '/counter 1')
    expect(lastText(BANKER)).toBe('Формат: /counter <id> <курс>')
  })

  it('answers with an alert when a client presses a bank button', async () => {
    await createOrder()
    api.reset()
    await bot.handleRaw(tap(CLIENT, 'accept:1'))
    expect(api.answers).toEqual([{ id: 'cq-8', text: 'Нет доступа', showAlert: true }])
    expect(api.edits).toEqual([])
  })

  it('answers unknown callback data', async () => {
    await bot.handleRaw(tap(CLIENT, 'launch:rockets'))
    expect(api.answers).toEqual([{ id: 'cq-2', text: 'Неизвестное действие', showAlert: undefined }])
  })

  it('keeps bank commands for bank users', async () => {
    await send(CLIENT, '/orders')
    expect(lastText(CLIENT)).toBe('⛔ Нет доступа. Эта команда только для банка.')
    await send(BANKER, '/orders')
    expect(lastText(BANKER)).toBe('Новых заявок нет.')
  })

  it('posts pending orders with buttons, up to the list limit', async () => {
    bot = new BotDispatcher(api, new MemoryStore(), log, { bankPassword: 'test-secret', baseCurrency: 'UAH', listLimit: 1 })
    await send(BANKER, '/bank test-secret')
    await createOrder()
    await createOrder()
    api.reset()

    await send(BANKER, '/orders')
    const out = api.to(BANKER)
    expect(out.length).toBe(2)
    expect(out[0].opts?.replyMarkup).toEqual(bankActionsKeyboard(1))
    expect(out[1].text).toBe('…и ещё 1. Полный список: /all')
  })

  it('clears the pending list', async () => {
    await createOrder()
    await send(BANKER, '/clear')
    expect(lastText(BANKER)).toBe('🧹 Список ожидающих очищен (1).')
    await send(BANKER, '/orders')
    expect(lastText(BANKER)).toBe('Новых заявок нет.')
  })

  it('elevates through the role button and a password message', async () => {
    await bot.handleRaw(tap(CLIENT, 'role:bank'))
    expect(lastText(CLIENT)).toBe('Введите пароль банка:')
    await send(CLIENT, 'wrong')
    expect(lastText(CLIENT)).toBe('⛔ Неверный пароль.')

    await bot.handleRaw(tap(CLIENT, 'role:bank'))
    await send(CLIENT, 'test-secret')
    expect(lastText(CLIENT)).toBe('🏦 Вы вошли как банк.')
  })

  it('cancels an open form', async () => {
    await send(CLIENT, '/new', 'ACME Corp')
    await send(CLIENT, '/cancel')
    expect(lastText(CLIENT)).toBe('Действие отменено.')
    await send(CLIENT, '❌ Отмена')
    expect(lastText(CLIENT)).toBe('Нечего отменять.')
  })

  it('cancels with the /cancel@bot form of the command', async () => {
    await send(CLIENT, '/new', '/cancel@FxDeskBot')
    expect(lastText(CLIENT)).toBe('Действие отменено.')
    await send(CLIENT, 'ACME Corp')
    expect(lastText(CLIENT)).toBe('Не понимаю сообщение. Используйте меню или команду /start.')
  })

  it('falls back on free text outside a form', async () => {
    await send(CLIENT, 'hello')
    expect(lastText(CLIENT)).toBe('Не понимаю сообщение. Используйте меню или команду /start.')
  })

  it('reports a failed update to the user and carries on', async () => {
    bot = new BotDispatcher(api, new BrokenStore(), log, { bankPassword: 'test-secret', baseCurrency: 'UAH' })
    expect(await bot.handleRaw(msg(CLIENT, '/help'))).toBe('failed')
    expect(log.error).toHaveBeenCalledTimes(1)
    expect(lastText(CLIENT)).toBe('⚠️ Не удалось обработать запрос, попробуйте ещё раз.')

    expect(await bot.handleRaw(tap(CLIENT, 'accept:1'))).toBe('failed')
    expect(api.answers.at(-1)).toEqual({ id: `cq-${seq}`, text: 'Ошибка обработки', showAlert: true })
  })
})

describe('parseCommand', () => {
  it('splits the name and arguments', () => {
    expect(parseCommand('/bank@FxDeskBot  test-secret ')).toEqual({ name: 'bank', args: 'test-secret' })
    expect(parseCommand('/Orders')).toEqual({ name: 'orders', args: '' })
    expect(parseCommand('hello /start')).toBeNull()
  })
})
