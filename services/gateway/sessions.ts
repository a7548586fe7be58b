// services/gateway/sessions.ts
import type { KvStore } from './store'
import { isOperation, type Operation } from './orders'
import { validateSessionShape } from './schemas'

export const STEPS = [
  'awaitingClientName',
  'awaitingOperation',
  'awaitingBuyCurrency',
  'awaitingSellCurrency',
  'awaitingConvertFrom',
  'awaitingConvertTo',
  'awaitingConvertDirection',
  'awaitingAmount',
  'awaitingRate',
  // вне формы заявки
  'awaitingCounterRate',
  'awaitingBankPassword',
] as const
export type Step = typeof STEPS[number]
export type FormStep = Exclude<Step, 'awaitingCounterRate' | 'awaitingBankPassword'>

export type SessionData = {
  clientName?: string
  operation?: Operation
  currencyFrom?: string
  currencyTo?: string
  amountCurrency?: string
  amount?: string
  rate?: number
  /** target of a bank counter-offer */
  orderId?: number
}

export type DialogueSession = { step: Step; data: SessionData }

const isStep = (v: unknown): v is Step => typeof v === 'string' && (STEPS as readonly string[]).includes(v)
const optStr = (v: unknown) => (typeof v === 'string' ? v : undefined)

function pickData(raw: Record<string, unknown>): SessionData {
  const out: SessionData = {}
  const clientName = optStr(raw.clientName)
  if (clientName !== undefined) out.clientName = clientName
  if (isOperation(raw.operation)) out.operation = raw.operation
  const currencyFrom = optStr(raw.currencyFrom)
  if (currencyFrom !== undefined) out.currencyFrom = currencyFrom
  const currencyTo = optStr(raw.currencyTo)
  if (currencyTo !== undefined) out.currencyTo = currencyTo
  const amountCurrency = optStr(raw.amountCurrency)
  if (amountCurrency !== undefined) out.amountCurrency = amountCurrency
  const amount = optStr(raw.amount)
  if (amount !== undefined) out.amount = amount
  if (typeof raw.rate === 'number') out.rate = raw.rate
  if (typeof raw.orderId === 'number') out.orderId = raw.orderId
  return out
}

const key = (userId: number) => `session:${userId}`

/** One in-progress dialogue per user. */
export class SessionsRepo {
  constructor(private readonly store: KvStore) {}

  async get(userId: number): Promise<DialogueSession | null> {
    const raw = await this.store.get(key(userId))
    if (!raw) return null
    let parsed: unknown
    try { parsed = JSON.parse(raw) } catch { return null }
    if (!validateSessionShape(parsed) || !isStep(parsed.step)) return null
    return { step: parsed.step, data: pickData(parsed.data) }
  }

  async put(userId: number, session: DialogueSession): Promise<void> {
    await this.store.set(key(userId), JSON.stringify(session))
  }

  async clear(userId: number): Promise<void> {
    await this.store.del(key(userId))
  }
}
