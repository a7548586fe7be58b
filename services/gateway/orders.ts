// services/gateway/orders.ts
import type { KvStore } from './store'
import { validateOrder } from './schemas'
import { normalizeCurrency, parsePositiveDecimal, type Parsed } from '../../lib/numbers'

export const OPERATIONS = ['buy', 'sell', 'convert'] as const
export type Operation = typeof OPERATIONS[number]

// 'order' — заявка зафиксирована банком как сделка
export const STATUSES = ['new', 'accepted', 'rejected', 'order'] as const
export type OrderStatus = typeof STATUSES[number]

export type Order = {
  id: number
  clientId: number
  clientName: string
  operation: Operation
  currencyFrom: string
  currencyTo: string
  amount: string
  amountCurrency: string
  rate: number
  proposedRate: number | null
  status: OrderStatus
  createdAt: string
  updatedAt: string
}

export type OrderDraft = {
  clientId: number
  clientName: string
  operation: Operation
  currencyFrom: string
  currencyTo: string
  amount: string
  amountCurrency: string
  rate: number
}

export const isOperation = (v: unknown): v is Operation =>
  typeof v === 'string' && (OPERATIONS as readonly string[]).includes(v)

export const isStatus = (v: unknown): v is OrderStatus =>
  typeof v === 'string' && (STATUSES as readonly string[]).includes(v)

/** Validates a draft and stamps it into a `new` order. */
export function createOrder(id: number, draft: OrderDraft, now: Date = new Date()): Parsed<Order> {
  const clientName = draft.clientName.trim()
  if (!clientName) return { ok: false, error: 'CLIENT_NAME_EMPTY' }
  if (!isOperation(draft.operation)) return { ok: false, error: 'BAD_OPERATION' }

  const from = normalizeCurrency(draft.currencyFrom)
  const to = normalizeCurrency(draft.currencyTo)
  if (!from || !to) return { ok: false, error: 'BAD_CURRENCY' }
  if (from === to) return { ok: false, error: 'SAME_CURRENCY' }
  if (draft.amountCurrency !== from && draft.amountCurrency !== to) return { ok: false, error: 'BAD_AMOUNT_CURRENCY' }

  const amount = parsePositiveDecimal(draft.amount)
  if (!amount.ok) return { ok: false, error: 'BAD_AMOUNT' }
  if (!Number.isFinite(draft.rate) || draft.rate <= 0) return { ok: false, error: 'BAD_RATE' }

  const ts = now.toISOString()
  return {
    ok: true,
    value: {
      id,
      clientId: draft.clientId,
      clientName,
      operation: draft.operation,
      currencyFrom: from,
      currencyTo: to,
      amount: amount.value.text,
      amountCurrency: draft.amountCurrency,
      rate: draft.rate,
      proposedRate: null,
      status: 'new',
      createdAt: ts,
      updatedAt: ts,
    },
  }
}

const orderKey = (id: number) => `order:${id}`
const statusKey = (s: OrderStatus) => `orders:status:${s}`
const clientKey = (clientId: number) => `orders:client:${clientId}`
const SEQ_KEY = 'orders:seq'
const PENDING_KEY = 'orders:pending'

function decode(raw: string): Order | null {
  let o: unknown
  try { o = JSON.parse(raw) } catch { return null }
  return validateOrder(o) ? o : null
}

const byId = (a: Order, b: Order) => a.id - b.id

/**
 * Orders live under `order:<id>` as JSON; sets index them by status,
 * by owner and by "waiting for the bank".
 */
export class OrdersRepo {
  constructor(private readonly store: KvStore, private readonly now: () => Date = () => new Date()) {}

  async create(draft: OrderDraft): Promise<Parsed<Order>> {
    // проверка черновика до выдачи id
    const probe = createOrder(0, draft, this.now())
    if (!probe.ok) return probe

    const id = await this.store.increment(SEQ_KEY)
    const order = { ...probe.value, id }
    await this.store.set(orderKey(id), JSON.stringify(order))
    await this.store.addToSet(statusKey(order.status), String(id))
    await this.store.addToSet(clientKey(order.clientId), String(id))
    await this.store.addToSet(PENDING_KEY, String(id))
    return { ok: true, value: order }
  }

  async get(id: number): Promise<Order | null> {
    const raw = await this.store.get(orderKey(id))
    return raw ? decode(raw) : null
  }

  /** Rewrites the record and moves it between status indexes. */
  async save(order: Order, previousStatus: OrderStatus): Promise<Order> {
    const next = { ...order, updatedAt: this.now().toISOString() }
    await this.store.set(orderKey(next.id), JSON.stringify(next))
    if (previousStatus !== next.status) {
      await this.store.removeFromSet(statusKey(previousStatus), String(next.id))
      await this.store.addToSet(statusKey(next.status), String(next.id))
    }
    // решения банка ждут только новые заявки
    if (next.status === 'new') await this.store.addToSet(PENDING_KEY, String(next.id))
    else await this.store.removeFromSet(PENDING_KEY, String(next.id))
    return next
  }

  listByStatus(status: OrderStatus) {
    return this.load(statusKey(status))
  }

  listPending() {
    return this.load(PENDING_KEY)
  }

  listByClient(clientId: number) {
    return this.load(clientKey(clientId))
  }

  /** Drops the pending index only; records stay. */
  async clearPending(): Promise<number> {
    const ids = await this.store.members(PENDING_KEY)
    await this.store.del(PENDING_KEY)
    return ids.length
  }

  private async load(setKey: string): Promise<Order[]> {
    const ids = await this.store.members(setKey)
    const out: Order[] = []
    for (const id of ids) {
      const o = await this.get(Number(id))
      if (o) out.push(o)
    }
    return out.sort(byId)
  }
}
