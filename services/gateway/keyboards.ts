// services/gateway/keyboards.ts
import { toPositiveInt } from '../../lib/numbers'
import type { Role } from './roles'
import type { InlineButton, ReplyMarkup } from './telegram'

export const MENU = {
  newOrder: '🆕 Новая заявка',
  myOrders: '📄 Мои заявки',
  pending: '📥 Заявки в работе',
  cancel: '❌ Отмена',
  help: 'ℹ️ Помощь',
} as const

export const OPERATION_LABELS = {
  buy: '💵 Купить валюту',
  sell: '💴 Продать валюту',
  convert: '🔄 Конвертация',
} as const

export type BankAction = 'accept' | 'reject' | 'order' | 'counter'
export type ClientAction = 'take' | 'decline'
export type CallbackAction = BankAction | ClientAction

const rows = (labels: string[][]) => labels.map(r => r.map(text => ({ text })))

export function mainKeyboard(role: Role): ReplyMarkup {
  const layout = role === 'bank'
    ? [[MENU.pending, MENU.newOrder], [MENU.help]]
    : [[MENU.newOrder, MENU.myOrders], [MENU.cancel, MENU.help]]
  return { keyboard: rows(layout), resize_keyboard: true, is_persistent: true }
}

export function operationKeyboard(): ReplyMarkup {
  return {
    keyboard: rows([[OPERATION_LABELS.buy, OPERATION_LABELS.sell], [OPERATION_LABELS.convert], [MENU.cancel]]),
    resize_keyboard: true,
  }
}

export function choiceKeyboard(options: string[]): ReplyMarkup {
  return { keyboard: rows([options, [MENU.cancel]].filter(r => r.length > 0)), resize_keyboard: true }
}

export function roleKeyboard(): ReplyMarkup {
  return {
    inline_keyboard: [[
      { text: '👤 Я клиент', callback_data: 'role:client' },
      { text: '🏦 Я банк', callback_data: 'role:bank' },
    ]],
  }
}

const button = (text: string, action: CallbackAction, orderId: number): InlineButton =>
  ({ text, callback_data: `${action}:${orderId}` })

export function bankActionsKeyboard(orderId: number): ReplyMarkup {
  return {
    inline_keyboard: [
      [button('✅ Принять', 'accept', orderId), button('❌ Отклонить', 'reject', orderId)],
      [button('📌 В ордер', 'order', orderId), button('💬 Свой курс', 'counter', orderId)],
    ],
  }
}

export function counterOfferKeyboard(orderId: number): ReplyMarkup {
  return {
    inline_keyboard: [[
      button('✅ Согласен', 'take', orderId),
      button('🚫 Не согласен', 'decline', orderId),
    ]],
  }
}

export type ParsedCallback =
  | { kind: 'order'; action: CallbackAction; orderId: number }
  | { kind: 'role'; role: Role }

const ACTIONS: readonly string[] = ['accept', 'reject', 'order', 'counter', 'take', 'decline']
const isAction = (v: string): v is CallbackAction => ACTIONS.includes(v)

/** `accept:12` → order action, `role:bank` → role choice, anything else → null */
export function parseCallback(data: string | undefined): ParsedCallback | null {
  if (!data) return null
  const m = /^([a-z]+):([a-z0-9]+)$/.exec(data)
  if (!m) return null
  const [, verb, arg] = m
  if (verb === 'role') return arg === 'bank' || arg === 'client' ? { kind: 'role', role: arg } : null
  const orderId = toPositiveInt(arg)
  return isAction(verb) && orderId !== null ? { kind: 'order', action: verb, orderId } : null
}
