// services/gateway/dialogue.ts
import { normalizeCurrency, parsePositiveDecimal } from '../../lib/numbers'
import { escapeHtml, formatOrder } from './format'
import { bankActionsKeyboard, choiceKeyboard, mainKeyboard, MENU, OPERATION_LABELS, operationKeyboard } from './keyboards'
import type { Notifier } from './notify'
import type { Operation, Order, OrderDraft, OrdersRepo } from './orders'
import type { Role } from './roles'
import type { FormStep, SessionData, SessionsRepo } from './sessions'
import type { ReplyMarkup } from './telegram'

export type Reply = { text: string; replyMarkup?: ReplyMarkup; parseMode?: 'HTML' }

type Ctx = { baseCurrency: string }

type StepResult =
  | { ok: true; data: SessionData; next: FormStep | 'done' }
  | { ok: false; error: string }

type StepDef = {
  prompt: (data: SessionData, ctx: Ctx) => Reply
  handle: (input: string, data: SessionData, ctx: Ctx) => StepResult
}

export type DialogueOutcome =
  | { kind: 'reply'; replies: Reply[] }
  | { kind: 'created'; order: Order; replies: Reply[] }

const POPULAR = ['USD', 'EUR', 'PLN']
const MAX_NAME = 100

const OPERATION_WORDS: Record<string, Operation> = {
  buy: 'buy',
  'купить': 'buy',
  'покупка': 'buy',
  [OPERATION_LABELS.buy.toLowerCase()]: 'buy',
  sell: 'sell',
  'продать': 'sell',
  'продажа': 'sell',
  [OPERATION_LABELS.sell.toLowerCase()]: 'sell',
  convert: 'convert',
  'конвертация': 'convert',
  [OPERATION_LABELS.convert.toLowerCase()]: 'convert',
}

export function parseOperation(input: string): Operation | null {
  return OPERATION_WORDS[input.trim().toLowerCase()] ?? null
}

const currencyError = 'Код валюты — 3–4 латинские буквы, например USD.'

// одна валюта, вторая — базовая (для buy/sell)
function foreignCurrency(side: 'buy' | 'sell') {
  return (input: string, data: SessionData, ctx: Ctx): StepResult => {
    const code = normalizeCurrency(input)
    if (!code) return { ok: false, error: currencyError }
    if (code === ctx.baseCurrency) return { ok: false, error: `Валюта должна отличаться от ${ctx.baseCurrency}.` }
    const pair = side === 'buy'
      ? { currencyFrom: ctx.baseCurrency, currencyTo: code }
      : { currencyFrom: code, currencyTo: ctx.baseCurrency }
    return { ok: true, data: { ...data, ...pair, amountCurrency: code }, next: 'awaitingAmount' }
  }
}

/**
 * The order form. Each state validates its input, commits one field and names
 * the next state; `awaitingOperation` is the only branch point.
 */
export const FORM: Record<FormStep, StepDef> = {
  awaitingClientName: {
    prompt: () => ({ text: 'Введите название клиента (компания или ФИО):', replyMarkup: choiceKeyboard([]) }),
    handle: (input, data) => {
      const name = input.trim()
      if (!name) return { ok: false, error: 'Название клиента не может быть пустым.' }
      if (name.length > MAX_NAME) return { ok: false, error: `Не больше ${MAX_NAME} символов.` }
      return { ok: true, data: { ...data, clientName: name }, next: 'awaitingOperation' }
    },
  },

  awaitingOperation: {
    prompt: () => ({ text: 'Выберите операцию:', replyMarkup: operationKeyboard() }),
    handle: (input, data) => {
      const operation = parseOperation(input)
      if (!operation) return { ok: false, error: 'Выберите операцию кнопкой: купить, продать или конвертация.' }
      const next: FormStep = operation === 'buy' ? 'awaitingBuyCurrency'
        : operation === 'sell' ? 'awaitingSellCurrency'
        : 'awaitingConvertFrom'
      return { ok: true, data: { ...data, operation }, next }
    },
  },

  awaitingBuyCurrency: {
    prompt: () => ({ text: 'Какую валюту покупаете?', replyMarkup: choiceKeyboard(POPULAR) }),
    handle: foreignCurrency('buy'),
  },

  awaitingSellCurrency: {
    prompt: () => ({ text: 'Какую валюту продаёте?', replyMarkup: choiceKeyboard(POPULAR) }),
    handle: foreignCurrency('sell'),
  },

  awaitingConvertFrom: {
    prompt: () => ({ text: 'Из какой валюты конвертируем?', replyMarkup: choiceKeyboard(POPULAR) }),
    handle: (input, data) => {
      const code = normalizeCurrency(input)
      if (!code) return { ok: false, error: currencyError }
      return { ok: true, data: { ...data, currencyFrom: code }, next: 'awaitingConvertTo' }
    },
  },

  awaitingConvertTo: {
    prompt: data => ({
      text: 'В какую валюту конвертируем?',
      replyMarkup: choiceKeyboard(POPULAR.filter(c => c !== data.currencyFrom)),
    }),
    handle: (input, data) => {
      const code = normalizeCurrency(input)
      if (!code) return { ok: false, error: currencyError }
      if (code === data.currencyFrom) return { ok: false, error: 'Валюты конвертации должны различаться.' }
      return { ok: true, data: { ...data, currencyTo: code }, next: 'awaitingConvertDirection' }
    },
  },

  awaitingConvertDirection: {
    prompt: data => ({
      text: `В какой валюте укажете сумму: ${data.currencyFrom} или ${data.currencyTo}?`,
      replyMarkup: choiceKeyboard([data.currencyFrom ?? '', data.currencyTo ?? ''].filter(Boolean)),
    }),
    handle: (input, data) => {
      const s = input.trim()
      const code = s === '1' ? data.currencyFrom : s === '2' ? data.currencyTo : normalizeCurrency(s)
      if (!code || (code !== data.currencyFrom && code !== data.currencyTo)) {
        return { ok: false, error: `Ответьте ${data.currencyFrom} или ${data.currencyTo}.` }
      }
      return { ok: true, data: { ...data, amountCurrency: code }, next: 'awaitingAmount' }
    },
  },

  awaitingAmount: {
    prompt: data => ({ text: `Введите сумму в ${data.amountCurrency}:`, replyMarkup: choiceKeyboard([]) }),
    handle: (input, data) => {
      const r = parsePositiveDecimal(input)
      if (!r.ok) return { ok: false, error: 'Сумма должна быть положительным числом, например 1000 или 1 000,50.' }
      return { ok: true, data: { ...data, amount: r.value.text }, next: 'awaitingRate' }
    },
  },

  awaitingRate: {
    prompt: data => ({ text: `Введите желаемый курс ${data.currencyFrom}/${data.currencyTo}:` }),
    handle: (input, data) => {
      const r = parsePositiveDecimal(input)
      if (!r.ok) return { ok: false, error: 'Курс должен быть положительным числом, например 41.25.' }
      return { ok: true, data: { ...data, rate: r.value.value }, next: 'done' }
    },
  },
}

export const isFormStep = (step: string): step is FormStep => Object.hasOwn(FORM, step)

export type FormSession = { step: FormStep; data: SessionData }

function toDraft(clientId: number, d: SessionData): OrderDraft | null {
  const { clientName, operation, currencyFrom, currencyTo, amount, amountCurrency, rate } = d
  if (!clientName || !operation || !currencyFrom || !currencyTo || !amount || !amountCurrency || rate === undefined) return null
  return { clientId, clientName, operation, currencyFrom, currencyTo, amount, amountCurrency, rate }
}

export class Dialogue {
  private readonly ctx: Ctx

  constructor(
    private readonly sessions: SessionsRepo,
    private readonly orders: OrdersRepo,
    private readonly notifier: Notifier,
    opts: { baseCurrency: string },
  ) {
    this.ctx = { baseCurrency: opts.baseCurrency }
  }

  /** Opens (or restarts) the form for `userId`. */
  async start(userId: number): Promise<Reply> {
    await this.sessions.put(userId, { step: 'awaitingClientName', data: {} })
    return FORM.awaitingClientName.prompt({}, this.ctx)
  }

  async cancel(userId: number): Promise<boolean> {
    const had = (await this.sessions.get(userId)) !== null
    await this.sessions.clear(userId)
    return had
  }

  /** Feeds one message to the current step. A rejected input leaves the session untouched. */
  async advance(userId: number, session: FormSession, input: string, role: Role): Promise<DialogueOutcome> {
    const def = FORM[session.step]
    const r = def.handle(input, session.data, this.ctx)
    if (!r.ok) {
      return { kind: 'reply', replies: [{ text: `⚠️ ${r.error}` }, def.prompt(session.data, this.ctx)] }
    }

    if (r.next !== 'done') {
      await this.sessions.put(userId, { step: r.next, data: r.data })
      return { kind: 'reply', replies: [FORM[r.next].prompt(r.data, this.ctx)] }
    }

    const draft = toDraft(userId, r.data)
    if (!draft) {
      // неполная сессия (например, ключ правили вручную) — начинаем заново
      await this.sessions.clear(userId)
      return { kind: 'reply', replies: [{ text: 'Данные заявки неполные, начните заново.', replyMarkup: mainKeyboard(role) }] }
    }
    const created = await this.orders.create(draft)
    if (!created.ok) {
      return { kind: 'reply', replies: [{ text: `⚠️ Заявка не создана (${created.error}).` }, def.prompt(session.data, this.ctx)] }
    }

    const order = created.value
    await this.sessions.clear(userId)
    await this.notifier.toBank(
      `🆕 Новая заявка от ${escapeHtml(order.clientName)}\n\n${formatOrder(order)}`,
      { parseMode: 'HTML', replyMarkup: bankActionsKeyboard(order.id) },
      userId,
    )
    return {
      kind: 'created',
      order,
      replies: [{ text: `Заявка создана ✅\n\n${formatOrder(order)}`, parseMode: 'HTML', replyMarkup: mainKeyboard(role) }],
    }
  }
}

const CANCEL_WORDS = new Set(['/cancel', MENU.cancel.toLowerCase(), 'отмена', 'cancel'])

export const isCancel = (text: string) => CANCEL_WORDS.has(text.trim().toLowerCase())
