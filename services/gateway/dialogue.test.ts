import { beforeEach, describe, expect, it } from 'vitest'
import { Dialogue, isCancel, isFormStep, parseOperation } from './dialogue'
import { choiceKeyboard } from './keyboards'
import { MemoryStore } from './memory-store'
import { Notifier } from './notify'
import { OrdersRepo } from './orders'
import { RoleGate, type Role } from './roles'
import { SessionsRepo } from './sessions'
import { FakeChatApi, silentLogger } from './test-helpers/fakes'

const CLIENT = 100
const BANKER = 7

class FailingSetsStore extends MemoryStore {
  async members(): Promise<string[]> {
    throw new Error('store down')
  }
}

describe('Dialogue', () => {
  let api: FakeChatApi
  let sessions: SessionsRepo
  let orders: OrdersRepo
  let dialogue: Dialogue

  beforeEach(async () => {
    const store = new MemoryStore()
    const roles = new RoleGate(store, 'test-secret')
    await roles.elevate(BANKER, 'test-secret')
    api = new FakeChatApi()
    sessions = new SessionsRepo(store)
    orders = new OrdersRepo(store)
    dialogue = new Dialogue(sessions, orders, new Notifier(api, roles, silentLogger()), { baseCurrency: 'UAH' })
  })

  async function say(userId: number, text: string, role: Role = 'client') {
    const s = await sessions.get(userId)
    if (!s || !isFormStep(s.step)) throw new Error(`no form session for ${userId}`)
    return dialogue.advance(userId, { step: s.step, data: s.data }, text, role)
  }

  const stepOf = async (userId: number) => (await sessions.get(userId))?.step

  it('walks a buy order through to creation', async () => {
    const first = await dialogue.start(CLIENT)
    expect(first.text).toBe('Введите название клиента (компания или ФИО):')

    await say(CLIENT, 'ACME Corp')
    expect(await stepOf(CLIENT)).toBe('awaitingOperation')
    await say(CLIENT, 'buy')
    expect(await stepOf(CLIENT)).toBe('awaitingBuyCurrency')
    await say(CLIENT, 'usd')
    expect(await stepOf(CLIENT)).toBe('awaitingAmount')
    await say(CLIENT, '500')
    expect(await stepOf(CLIENT)).toBe('awaitingRate')
    const done = await say(CLIENT, '41.25')

    if (done.kind !== 'created') throw new Error('order was not created')
    expect(done.order).toMatchObject({
      id: 1,
      clientId: CLIENT,
      clientName: 'ACME Corp',
      operation: 'buy',
      currencyFrom: 'UAH',
      currencyTo: 'USD',
      amount: '500',
      amountCurrency: 'USD',
      rate: 41.25,
      status: 'new',
    })
    expect(done.replies[0].text.startsWith('Заявка создана ✅')).toBe(true)
    expect(await sessions.get(CLIENT)).toBeNull()
    expect(await orders.get(1)).toEqual(done.order)
  })

  it('notifies bank users about a new order with action buttons', async () => {
    await dialogue.start(CLIENT)
    for (const t of ['ACME Corp', 'sell', 'EUR', '200', '44.1']) await say(CLIENT, t)

    const note = api.last(BANKER)
    expect(note?.text.split('\n')[0]).toBe('🆕 Новая заявка от ACME Corp')
    expect(note?.opts?.parseMode).toBe('HTML')
    expect(note?.opts?.replyMarkup).toEqual({
      inline_keyboard: [
        [{ text: '✅ Принять', callback_data: 'accept:1' }, { text: '❌ Отклонить', callback_data: 'reject:1' }],
        [{ text: '📌 В ордер', callback_data: 'order:1' }, { text: '💬 Свой курс', callback_data: 'counter:1' }],
      ],
    })
  })

  it('does not notify the bank user who created the order', async () => {
    await dialogue.start(BANKER)
    for (const t of ['Internal desk', 'buy', 'PLN']) await say(BANKER, t, 'bank')
    await say(BANKER, '1000', 'bank')
    const done = await say(BANKER, '10.5', 'bank')
    expect(done.kind).toBe('created')
    expect(api.to(BANKER)).toEqual([])
  })

  it('keeps the state on an invalid amount and re-prompts', async () => {
    await dialogue.start(CLIENT)
    for (const t of ['ACME Corp', 'buy', 'USD']) await say(CLIENT, t)

    const r = await say(CLIENT, 'abc')
    expect(r).toEqual({
      kind: 'reply',
      replies: [
        { text: '⚠️ Сумма должна быть положительным числом, например 1000 или 1 000,50.' },
        { text: 'Введите сумму в USD:', replyMarkup: choiceKeyboard([]) },
      ],
    })
    const s = await sessions.get(CLIENT)
    expect(s?.step).toBe('awaitingAmount')
    expect(s?.data.amount).toBeUndefined()
  })

  it('keeps the state on an invalid rate and creates nothing', async () => {
    await dialogue.start(CLIENT)
    for (const t of ['ACME Corp', 'buy', 'USD', '500']) await say(CLIENT, t)

    const r = await say(CLIENT, 'abc')
    expect(r.kind).toBe('reply')
    expect(r.replies[0].text).toBe('⚠️ Курс должен быть положительным числом, например 41.25.')
    const s = await sessions.get(CLIENT)
    expect(s?.step).toBe('awaitingRate')
    expect(s?.data.rate).toBeUndefined()
    expect(await orders.get(1)).toBeNull()
  })

  it('creates the order even when the bank fan-out fails', async () => {
    const log = silentLogger()
    const rolesStore = new FailingSetsStore()
    const notifier = new Notifier(api, new RoleGate(rolesStore, 'test-secret'), log)
    dialogue = new Dialogue(sessions, orders, notifier, { baseCurrency: 'UAH' })

    await dialogue.start(CLIENT)
    for (const t of ['ACME Corp', 'buy', 'USD', '500']) await say(CLIENT, t)
    const done = await say(CLIENT, '41.25')

    expect(done.kind).toBe('created')
    expect(done.replies[0].text.startsWith('Заявка создана ✅')).toBe(true)
    expect(log.error).toHaveBeenCalledTimes(1)
    expect(api.sent).toEqual([])
  })

  it('refuses the base currency on the sell branch', async () => {
    await dialogue.start(CLIENT)
    for (const t of ['ACME Corp', 'sell']) await say(CLIENT, t)
    const r = await say(CLIENT, 'uah')
    expect(r.replies[0].text).toBe('⚠️ Валюта должна отличаться от UAH.')
    expect(await stepOf(CLIENT)).toBe('awaitingSellCurrency')
  })

  it('runs the convert branch with an amount in the target currency', async () => {
    await dialogue.start(CLIENT)
    await say(CLIENT, 'ACME Corp')
    await say(CLIENT, 'Конвертация')
    expect(await stepOf(CLIENT)).toBe('awaitingConvertFrom')
    await say(CLIENT, 'usd')

    const same = await say(CLIENT, 'USD')
    expect(same.replies[0].text).toBe('⚠️ Валюты конвертации должны различаться.')
    expect(await stepOf(CLIENT)).toBe('awaitingConvertTo')

    await say(CLIENT, 'eur')
    expect(await stepOf(CLIENT)).toBe('awaitingConvertDirection')
    await say(CLIENT, '2')
    await say(CLIENT, '1 000,50')
    const done = await say(CLIENT, '0,92')

    if (done.kind !== 'created') throw new Error('order was not created')
    expect(done.order).toMatchObject({
      operation: 'convert',
      currencyFrom: 'USD',
      currencyTo: 'EUR',
      amount: '1000.50',
      amountCurrency: 'EUR',
      rate: 0.92,
    })
  })

  it('cancel reports whether a form was open', async () => {
    await dialogue.start(CLIENT)
    expect(await dialogue.cancel(CLIENT)).toBe(true)
    expect(await dialogue.cancel(CLIENT)).toBe(false)
  })
})

describe('parseOperation', () => {
  it.each([
    ['buy', 'buy'],
    ['  Продать ', 'sell'],
    ['💵 Купить валюту', 'buy'],
    ['CONVERT', 'convert'],
    ['exchange', null],
  ])('%s → %s', (input, expected) => {
    expect(parseOperation(input)).toBe(expected)
  })
})

describe('isCancel', () => {
  it('accepts the command, the menu button and plain words', () => {
    expect(isCancel('/cancel')).toBe(true)
    expect(isCancel('❌ Отмена')).toBe(true)
    expect(isCancel(' Отмена ')).toBe(true)
    expect(isCancel('cancel please')).toBe(false)
  })
})
