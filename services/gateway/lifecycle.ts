// services/gateway/lifecycle.ts
import { escapeHtml } from './format'
import { counterOfferKeyboard, type CallbackAction } from './keyboards'
import type { Notifier } from './notify'
import type { Order, OrderStatus, OrdersRepo } from './orders'
import type { RoleGate } from './roles'

export type TransitionError = 'not_found' | 'forbidden' | 'invalid' | 'bad_rate'

export type TransitionResult =
  | { ok: true; order: Order; previous: OrderStatus }
  | { ok: false; error: TransitionError }

type Edge = {
  /** bank: role check; owner: order.clientId must match */
  actor: 'bank' | 'owner'
  from: OrderStatus
  /** the order must carry a bank counter-rate */
  needsProposal?: boolean
  apply: (o: Order, rate: number | null) => Order
}

const EDGES: Record<CallbackAction, Edge> = {
  accept: { actor: 'bank', from: 'new', apply: o => ({ ...o, status: 'accepted' }) },
  reject: { actor: 'bank', from: 'new', apply: o => ({ ...o, status: 'rejected' }) },
  order: { actor: 'bank', from: 'new', apply: o => ({ ...o, status: 'order' }) },
  counter: { actor: 'bank', from: 'new', apply: (o, rate) => ({ ...o, status: 'rejected', proposedRate: rate }) },
  take: {
    actor: 'owner',
    from: 'rejected',
    needsProposal: true,
    apply: o => ({ ...o, status: 'accepted', rate: o.proposedRate ?? o.rate, proposedRate: null }),
  },
  decline: { actor: 'owner', from: 'rejected', needsProposal: true, apply: o => ({ ...o, status: 'rejected', proposedRate: null }) },
}

export const isBankAction = (a: CallbackAction) => EDGES[a].actor === 'bank'

/**
 * Order status transitions. Each successful transition sends exactly one
 * notification to the counterparty: the owner for bank actions, the bank
 * users for client actions.
 *
 * No locking: when two bank users act on the same `new` order at once,
 * both pass the status check and the later write wins.
 */
export class OrderLifecycle {
  constructor(
    private readonly orders: OrdersRepo,
    private readonly roles: RoleGate,
    private readonly notifier: Notifier,
  ) {}

  async apply(actorId: number, action: CallbackAction, orderId: number, rate: number | null = null): Promise<TransitionResult> {
    const edge = EDGES[action]
    if (edge.actor === 'bank' && !(await this.roles.isBank(actorId))) return { ok: false, error: 'forbidden' }
    if (action === 'counter' && (rate === null || !Number.isFinite(rate) || rate <= 0)) return { ok: false, error: 'bad_rate' }

    const current = await this.orders.get(orderId)
    if (!current) return { ok: false, error: 'not_found' }
    if (edge.actor === 'owner' && current.clientId !== actorId) return { ok: false, error: 'forbidden' }
    if (current.status !== edge.from) return { ok: false, error: 'invalid' }
    if (edge.needsProposal && current.proposedRate === null) return { ok: false, error: 'invalid' }

    const order = await this.orders.save(edge.apply(current, rate), current.status)
    await this.notify(action, order, actorId)
    return { ok: true, order, previous: current.status }
  }

  private async notify(action: CallbackAction, o: Order, actorId: number) {
    const name = escapeHtml(o.clientName)
    switch (action) {
      case 'accept':
        await this.notifier.toUser(o.clientId, `✅ Ваша заявка #${o.id} принята банком.`)
        return
      case 'reject':
        await this.notifier.toUser(o.clientId, `❌ Ваша заявка #${o.id} отклонена банком.`)
        return
      case 'order':
        await this.notifier.toUser(o.clientId, `📌 Ваша заявка #${o.id} сохранена как ордер.`)
        return
      case 'counter':
        await this.notifier.toUser(
          o.clientId,
          `💬 Банк предлагает курс <b>${o.proposedRate}</b> по заявке #${o.id} (ваш курс ${o.rate}).`,
          { parseMode: 'HTML', replyMarkup: counterOfferKeyboard(o.id) },
        )
        return
      case 'take':
        await this.notifier.toBank(`✅ ${name} принял(а) курс ${o.rate} по заявке #${o.id}.`, { parseMode: 'HTML' }, actorId)
        return
      case 'decline':
        await this.notifier.toBank(`🚫 ${name} отказался(ась) от предложенного курса по заявке #${o.id}.`, { parseMode: 'HTML' }, actorId)
        return
    }
  }
}
