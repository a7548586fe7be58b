// services/gateway/bot.ts
// Разбор апдейтов: команды, меню, шаги формы, inline-кнопки
import { parsePositiveDecimal, toPositiveInt } from '../../lib/numbers'
import { Dialogue, isCancel, isFormStep, type Reply } from './dialogue'
import { formatOrder, formatOrderList } from './format'
import { bankActionsKeyboard, mainKeyboard, MENU, parseCallback, roleKeyboard, type CallbackAction } from './keyboards'
import { OrderLifecycle, type TransitionError } from './lifecycle'
import { Notifier, sendSafe } from './notify'
import { OrdersRepo } from './orders'
import { RoleGate, type Role } from './roles'
import { describeErrors, validateUpdate } from './schemas'
import { SessionsRepo } from './sessions'
import type { KvStore, Logger } from './store'
import type { ChatApi, TgCallbackQuery, TgMessage, TgUpdate } from './telegram'

export type HandleResult = 'handled' | 'ignored' | 'invalid' | 'duplicate' | 'failed'

export type BotOpts = {
  bankPassword: string | null
  baseCurrency: string
  /** how many pending orders /orders posts with buttons */
  listLimit?: number
}

const DEDUPE_TTL_S = 24 * 60 * 60
const GENERIC_ERROR = '⚠️ Не удалось обработать запрос, попробуйте ещё раз.'
const DENIED = '⛔ Нет доступа. Эта команда только для банка.'
const FALLBACK = 'Не понимаю сообщение. Используйте меню или команду /start.'

const TOAST: Record<CallbackAction, string> = {
  accept: 'Заявка принята ✅',
  reject: 'Заявка отклонена ❌',
  order: 'Заявка сохранена как ордер 📌',
  counter: 'Курс предложен 💬',
  take: 'Вы приняли курс банка ✅',
  decline: 'Вы отказались от курса банка',
}

const TRANSITION_ERROR: Record<TransitionError, string> = {
  not_found: 'Заявка не найдена',
  forbidden: 'Нет доступа',
  invalid: 'Заявка уже обработана',
  bad_rate: 'Курс должен быть положительным числом',
}

type Command = { name: string; args: string }

export function parseCommand(text: string): Command | null {
  const m = /^\/([A-Za-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim())
  return m ? { name: m[1].toLowerCase(), args: (m[2] ?? '').trim() } : null
}

function helpText(role: Role): string {
  const common = [
    '/start — начать сначала',
    '/new — новая заявка',
    '/my — мои заявки',
    '/cancel — отменить текущее действие',
    '/bank <пароль> — войти как банк',
  ]
  const bank = [
    '/orders — заявки, ждущие решения',
    '/all — все заявки',
    '/counter <id> <курс> — предложить свой курс',
    '/clear — очистить список ожидающих',
    '/client — вернуться в роль клиента',
  ]
  return (role === 'bank' ? [...common, ...bank] : common).join('\n')
}

export class BotDispatcher {
  private readonly orders: OrdersRepo
  private readonly sessions: SessionsRepo
  private readonly roles: RoleGate
  private readonly notifier: Notifier
  private readonly dialogue: Dialogue
  private readonly lifecycle: OrderLifecycle
  private readonly listLimit: number

  constructor(
    private readonly api: ChatApi,
    private readonly store: KvStore,
    private readonly log: Logger,
    opts: BotOpts,
  ) {
    this.orders = new OrdersRepo(store)
    this.sessions = new SessionsRepo(store)
    this.roles = new RoleGate(store, opts.bankPassword)
    this.notifier = new Notifier(api, this.roles, log)
    this.dialogue = new Dialogue(this.sessions, this.orders, this.notifier, { baseCurrency: opts.baseCurrency })
    this.lifecycle = new OrderLifecycle(this.orders, this.roles, this.notifier)
    this.listLimit = opts.listLimit ?? 20
  }

  /** Entry point for webhook bodies and polled updates. Never throws. */
  async handleRaw(payload: unknown): Promise<HandleResult> {
    if (!validateUpdate(payload)) {
      this.log.warn({ err: describeErrors(validateUpdate.errors) }, 'invalid update payload')
      return 'invalid'
    }
    const update = payload
    try {
      // повторная доставка того же апдейта (ретраи Telegram)
      const fresh = await this.store.setIfAbsent(`update:${update.update_id}`, '1', DEDUPE_TTL_S)
      if (!fresh) return 'duplicate'
      return await this.handle(update)
    } catch (e) {
      this.log.error(e, 'update handler error')
      await this.reportFailure(update)
      return 'failed'
    }
  }

  async handle(update: TgUpdate): Promise<HandleResult> {
    if (update.callback_query) {
      await this.onCallback(update.callback_query)
      return 'handled'
    }
    const msg = update.message
    if (msg?.from && typeof msg.text === 'string') {
      await this.onMessage(msg, msg.from.id, msg.text)
      return 'handled'
    }
    return 'ignored'
  }

  private async reportFailure(update: TgUpdate) {
    const cq = update.callback_query
    if (cq) {
      try {
        await this.api.answerCallbackQuery(cq.id, 'Ошибка обработки', true)
      } catch (e) {
        this.log.warn({ err: e instanceof Error ? e.message : String(e) }, 'answerCallbackQuery failed')
      }
      return
    }
    const chatId = update.message?.chat.id
    if (chatId === undefined) return
    const r = await sendSafe(this.api, chatId, GENERIC_ERROR)
    if (!r.ok) this.log.warn({ chatId, err: r.error }, 'error reply failed')
  }

  private async reply(chatId: number, r: Reply) {
    await this.api.sendMessage(chatId, r.text, { parseMode: r.parseMode, replyMarkup: r.replyMarkup })
  }

  // ===== messages =====

  private async onMessage(msg: TgMessage, userId: number, raw: string) {
    const chatId = msg.chat.id
    const text = raw.trim()
    const role = await this.roles.role(userId)

    if (isCancel(text)) return this.cancel(chatId, userId, role)

    const cmd = parseCommand(text)
    if (cmd) return this.onCommand(chatId, userId, role, cmd)

    if (text === MENU.newOrder) return this.reply(chatId, await this.dialogue.start(userId))
    if (text === MENU.myOrders) return this.showOwnOrders(chatId, userId)
    if (text === MENU.pending) return this.showPending(chatId, userId)
    if (text === MENU.help) return this.reply(chatId, { text: helpText(role), replyMarkup: mainKeyboard(role) })

    const session = await this.sessions.get(userId)
    if (!session) return this.reply(chatId, { text: FALLBACK, replyMarkup: mainKeyboard(role) })

    if (session.step === 'awaitingBankPassword') {
      await this.sessions.clear(userId)
      return this.elevate(chatId, userId, text)
    }

    if (session.step === 'awaitingCounterRate') {
      const orderId = session.data.orderId
      if (orderId === undefined) {
        await this.sessions.clear(userId)
        return this.reply(chatId, { text: FALLBACK, replyMarkup: mainKeyboard(role) })
      }
      const rate = parsePositiveDecimal(text)
      if (!rate.ok) {
        return this.reply(chatId, { text: `⚠️ ${TRANSITION_ERROR.bad_rate}. Введите курс для заявки #${orderId} или /cancel.` })
      }
      await this.sessions.clear(userId)
      return this.counter(chatId, userId, orderId, rate.value.value)
    }

    if (isFormStep(session.step)) {
      const out = await this.dialogue.advance(userId, { step: session.step, data: session.data }, text, role)
      for (const r of out.replies) await this.reply(chatId, r)
      if (out.kind === 'created') this.log.info({ orderId: out.order.id, clientId: userId }, 'order created')
    }
  }

  private async onCommand(chatId: number, userId: number, role: Role, cmd: Command) {
    switch (cmd.name) {
      case 'start':
        await this.sessions.clear(userId)
        await this.reply(chatId, {
          text: 'Здравствуйте! Это бот заявок на обмен валюты.\nВыберите действие в меню.',
          replyMarkup: mainKeyboard(role),
        })
        return this.reply(chatId, { text: 'Кто вы?', replyMarkup: roleKeyboard() })
      case 'cancel':
        return this.cancel(chatId, userId, role)
      case 'help':
        return this.reply(chatId, { text: helpText(role), replyMarkup: mainKeyboard(role) })
      case 'new':
        return this.reply(chatId, await this.dialogue.start(userId))
      case 'my':
        return this.showOwnOrders(chatId, userId)
      case 'bank':
        if (!cmd.args) {
          await this.sessions.put(userId, { step: 'awaitingBankPassword', data: {} })
          return this.reply(chatId, { text: 'Введите пароль банка:' })
        }
        return this.elevate(chatId, userId, cmd.args)
      case 'client':
        await this.roles.demote(userId)
        return this.reply(chatId, { text: 'Вы вошли как клиент.', replyMarkup: mainKeyboard('client') })
      case 'orders':
        return this.showPending(chatId, userId)
      case 'all':
        return this.showAll(chatId, userId)
      case 'clear':
        return this.clearPending(chatId, userId)
      case 'counter': {
        if (role !== 'bank') return this.reply(chatId, { text: DENIED })
        const [idArg = '', rateArg = ''] = cmd.args.split(/\s+/)
        const orderId = toPositiveInt(idArg)
        const rate = parsePositiveDecimal(rateArg)
        if (orderId === null || !rate.ok) return this.reply(chatId, { text: 'Формат: /counter <id> <курс>' })
        return this.counter(chatId, userId, orderId, rate.value.value)
      }
      default:
        return this.reply(chatId, { text: FALLBACK, replyMarkup: mainKeyboard(role) })
    }
  }

  private async cancel(chatId: number, userId: number, role: Role) {
    const had = await this.dialogue.cancel(userId)
    return this.reply(chatId, { text: had ? 'Действие отменено.' : 'Нечего отменять.', replyMarkup: mainKeyboard(role) })
  }

  private async elevate(chatId: number, userId: number, secret: string) {
    const r = await this.roles.elevate(userId, secret)
    if (r.ok) {
      this.log.info({ userId }, 'user elevated to bank')
      return this.reply(chatId, { text: '🏦 Вы вошли как банк.', replyMarkup: mainKeyboard('bank') })
    }
    this.log.warn({ userId, reason: r.error }, 'bank elevation refused')
    const text = r.error === 'ELEVATION_DISABLED' ? 'Вход для банка отключён.' : '⛔ Неверный пароль.'
    return this.reply(chatId, { text, replyMarkup: mainKeyboard(await this.roles.role(userId)) })
  }

  private async counter(chatId: number, userId: number, orderId: number, rate: number) {
    const r = await this.lifecycle.apply(userId, 'counter', orderId, rate)
    if (!r.ok) return this.reply(chatId, { text: `⚠️ ${TRANSITION_ERROR[r.error]}.` })
    return this.reply(chatId, { text: `💬 Курс ${rate} предложен клиенту.\n\n${formatOrder(r.order)}`, parseMode: 'HTML' })
  }

  private async showOwnOrders(chatId: number, userId: number) {
    const list = await this.orders.listByClient(userId)
    return this.reply(chatId, { text: formatOrderList('<b>Ваши заявки</b>', list), parseMode: 'HTML' })
  }

  private async showPending(chatId: number, userId: number) {
    if (!(await this.roles.isBank(userId))) return this.reply(chatId, { text: DENIED })
    const list = await this.orders.listPending()
    if (list.length === 0) return this.reply(chatId, { text: 'Новых заявок нет.' })
    for (const o of list.slice(0, this.listLimit)) {
      await this.reply(chatId, { text: formatOrder(o), parseMode: 'HTML', replyMarkup: bankActionsKeyboard(o.id) })
    }
    if (list.length > this.listLimit) {
      await this.reply(chatId, { text: `…и ещё ${list.length - this.listLimit}. Полный список: /all` })
    }
  }

  private async showAll(chatId: number, userId: number) {
    if (!(await this.roles.isBank(userId))) return this.reply(chatId, { text: DENIED })
    const all = [
      ...(await this.orders.listByStatus('new')),
      ...(await this.orders.listByStatus('accepted')),
      ...(await this.orders.listByStatus('rejected')),
      ...(await this.orders.listByStatus('order')),
    ].sort((a, b) => a.id - b.id)
    return this.reply(chatId, { text: formatOrderList('<b>Все заявки</b>', all), parseMode: 'HTML' })
  }

  private async clearPending(chatId: number, userId: number) {
    if (!(await this.roles.isBank(userId))) return this.reply(chatId, { text: DENIED })
    const n = await this.orders.clearPending()
    this.log.info({ userId, cleared: n }, 'pending orders cleared')
    return this.reply(chatId, { text: `🧹 Список ожидающих очищен (${n}).` })
  }

  // ===== callback buttons =====

  private async onCallback(cq: TgCallbackQuery) {
    const userId = cq.from.id
    const chatId = cq.message?.chat.id ?? userId
    const parsed = parseCallback(cq.data)
    if (!parsed) return this.api.answerCallbackQuery(cq.id, 'Неизвестное действие')

    if (parsed.kind === 'role') {
      if (parsed.role === 'client') {
        await this.roles.demote(userId)
        await this.api.answerCallbackQuery(cq.id, 'Вы клиент')
        return this.reply(chatId, { text: 'Вы вошли как клиент.', replyMarkup: mainKeyboard('client') })
      }
      if (await this.roles.isBank(userId)) return this.api.answerCallbackQuery(cq.id, 'Вы уже вошли как банк')
      await this.sessions.put(userId, { step: 'awaitingBankPassword', data: {} })
      await this.api.answerCallbackQuery(cq.id)
      return this.reply(chatId, { text: 'Введите пароль банка:' })
    }

    const { action, orderId } = parsed
    if (action === 'counter') return this.askCounterRate(cq, chatId, orderId)

    const r = await this.lifecycle.apply(userId, action, orderId)
    if (!r.ok) return this.api.answerCallbackQuery(cq.id, TRANSITION_ERROR[r.error], true)

    this.log.info({ orderId, action, by: userId, from: r.previous, to: r.order.status }, 'order transition')
    await this.api.answerCallbackQuery(cq.id, TOAST[action])
    if (cq.message) await this.safeEdit(cq.message, formatOrder(r.order))
  }

  private async askCounterRate(cq: TgCallbackQuery, chatId: number, orderId: number) {
    const userId = cq.from.id
    if (!(await this.roles.isBank(userId))) return this.api.answerCallbackQuery(cq.id, TRANSITION_ERROR.forbidden, true)
    const order = await this.orders.get(orderId)
    if (!order) return this.api.answerCallbackQuery(cq.id, TRANSITION_ERROR.not_found, true)
    if (order.status !== 'new') return this.api.answerCallbackQuery(cq.id, TRANSITION_ERROR.invalid, true)

    await this.sessions.put(userId, { step: 'awaitingCounterRate', data: { orderId } })
    await this.api.answerCallbackQuery(cq.id)
    return this.reply(chatId, { text: `Введите ваш курс для заявки #${orderId} (курс клиента ${order.rate}):` })
  }

  // правка исходного сообщения с кнопками — не критична
  private async safeEdit(msg: TgMessage, text: string) {
    try {
      await this.api.editMessageText(msg.chat.id, msg.message_id, text, { parseMode: 'HTML' })
    } catch (e) {
      this.log.warn({ err: e instanceof Error ? e.message : String(e) }, 'editMessageText failed')
    }
  }
}
