import { describe, expect, it } from 'vitest'
import { choiceKeyboard, mainKeyboard, MENU, parseCallback } from './keyboards'

describe('parseCallback', () => {
  it('reads order actions and role choices', () => {
    expect(parseCallback('accept:12')).toEqual({ kind: 'order', action: 'accept', orderId: 12 })
    expect(parseCallback('decline:3')).toEqual({ kind: 'order', action: 'decline', orderId: 3 })
    expect(parseCallback('role:bank')).toEqual({ kind: 'role', role: 'bank' })
  })

  it.each([undefined, '', 'accept', 'accept:0', 'accept:x1', 'launch:1', 'role:admin', 'ACCEPT:1'])('rejects %s', data => {
    expect(parseCallback(data)).toBeNull()
  })
})

describe('keyboards', () => {
  it('shows the pending list to bank users only', () => {
    const labels = (role: 'client' | 'bank') => {
      const kb = mainKeyboard(role)
      return 'keyboard' in kb ? kb.keyboard.flat().map(b => b.text) : []
    }
    expect(labels('bank')).toContain(MENU.pending)
    expect(labels('client')).not.toContain(MENU.pending)
  })

  it('always offers a cancel row', () => {
    expect(choiceKeyboard([])).toEqual({ keyboard: [[{ text: MENU.cancel }]], resize_keyboard: true })
  })
})
