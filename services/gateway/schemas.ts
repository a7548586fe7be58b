// services/gateway/schemas.ts
import Ajv from 'ajv'
import type { Order } from './orders'
import type { TgUpdate } from './telegram'

const ajv = new Ajv({ allErrors: true, strict: false })

const user = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer' },
    first_name: { type: 'string' },
    username: { type: 'string' },
  },
} as const

const message = {
  type: 'object',
  required: ['message_id', 'chat'],
  properties: {
    message_id: { type: 'integer' },
    chat: {
      type: 'object',
      required: ['id'],
      properties: { id: { type: 'integer' }, type: { type: 'string' } },
    },
    from: user,
    text: { type: 'string' },
  },
} as const

// Telegram присылает много полей — проверяем только те, что читаем
export const UpdateSchema = {
  $id: 'TgUpdate',
  type: 'object',
  required: ['update_id'],
  properties: {
    update_id: { type: 'integer' },
    message,
    callback_query: {
      type: 'object',
      required: ['id', 'from'],
      properties: {
        id: { type: 'string' },
        from: user,
        data: { type: 'string' },
        message,
      },
    },
  },
} as const

export const OrderSchema = {
  $id: 'Order',
  type: 'object',
  additionalProperties: false,
  required: [
    'id', 'clientId', 'clientName', 'operation', 'currencyFrom', 'currencyTo',
    'amount', 'amountCurrency', 'rate', 'proposedRate', 'status', 'createdAt', 'updatedAt',
  ],
  properties: {
    id: { type: 'integer', minimum: 1 },
    clientId: { type: 'integer' },
    clientName: { type: 'string', minLength: 1 },
    operation: { enum: ['buy', 'sell', 'convert'] },
    currencyFrom: { type: 'string', pattern: '^[A-Z]{3,4}$' },
    currencyTo: { type: 'string', pattern: '^[A-Z]{3,4}$' },
    amount: { type: 'string', pattern: '^\\d+(\\.\\d+)?$' },
    amountCurrency: { type: 'string' },
    rate: { type: 'number', exclusiveMinimum: 0 },
    proposedRate: { type: ['number', 'null'] },
    status: { enum: ['new', 'accepted', 'rejected', 'order'] },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' },
  },
} as const

export const SessionSchema = {
  $id: 'DialogueSession',
  type: 'object',
  required: ['step', 'data'],
  properties: {
    step: { type: 'string' },
    data: { type: 'object' },
  },
} as const

export const validateUpdate = ajv.compile<TgUpdate>(UpdateSchema)
export const validateOrder = ajv.compile<Order>(OrderSchema)
export const validateSessionShape = ajv.compile<{ step: string; data: Record<string, unknown> }>(SessionSchema)

export function describeErrors(errors: typeof validateUpdate.errors): string {
  return ajv.errorsText(errors)
}
