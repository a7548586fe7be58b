// services/gateway/format.ts
import type { Operation, Order, OrderStatus } from './orders'

export const escapeHtml = (s: string) =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')

const OPERATION_LABEL: Record<Operation, string> = {
  buy: 'Покупка',
  sell: 'Продажа',
  convert: 'Конвертация',
}

const STATUS_LABEL: Record<OrderStatus, string> = {
  new: '🆕 новая',
  accepted: '✅ принята',
  rejected: '❌ отклонена',
  order: '📌 ордер',
}

export function formatOrder(o: Order): string {
  const lines = [
    `<b>Заявка #${o.id}</b>`,
    `Клиент: ${escapeHtml(o.clientName)}`,
    `Операция: ${OPERATION_LABEL[o.operation]} ${o.currencyFrom} → ${o.currencyTo}`,
    `Сумма: ${o.amount} ${o.amountCurrency}`,
    `Курс: ${o.rate}`,
  ]
  if (o.proposedRate !== null) lines.push(`Предложенный курс: ${o.proposedRate}`)
  lines.push(`Статус: ${STATUS_LABEL[o.status]}`)
  return lines.join('\n')
}

export function formatOrderList(title: string, orders: Order[]): string {
  if (orders.length === 0) return `${title}\nЗаявок нет.`
  const rows = orders.map(o =>
    `#${o.id} ${escapeHtml(o.clientName)}: ${o.operation} ${o.amount} ${o.amountCurrency} ${o.currencyFrom}→${o.currencyTo} @ ${o.rate} (${o.status})`)
  return [title, ...rows].join('\n')
}
