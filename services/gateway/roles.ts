// services/gateway/roles.ts
import crypto from 'node:crypto'
import type { KvStore } from './store'

export type Role = 'client' | 'bank'

export type ElevateResult =
  | { ok: true }
  | { ok: false; error: 'ELEVATION_DISABLED' | 'BAD_PASSWORD' }

const roleKey = (userId: number) => `role:${userId}`
const BANK_SET = 'roles:bank'

const digest = (s: string) => crypto.createHash('sha256').update(s).digest()

function secretEquals(a: string, b: string): boolean {
  return crypto.timingSafeEqual(digest(a), digest(b))
}

export class RoleGate {
  constructor(private readonly store: KvStore, private readonly bankPassword: string | null) {}

  async role(userId: number): Promise<Role> {
    return (await this.store.get(roleKey(userId))) === 'bank' ? 'bank' : 'client'
  }

  async isBank(userId: number): Promise<boolean> {
    return (await this.role(userId)) === 'bank'
  }

  async elevate(userId: number, secret: string): Promise<ElevateResult> {
    if (!this.bankPassword) return { ok: false, error: 'ELEVATION_DISABLED' }
    if (!secretEquals(secret.trim(), this.bankPassword)) return { ok: false, error: 'BAD_PASSWORD' }
    await this.store.set(roleKey(userId), 'bank')
    await this.store.addToSet(BANK_SET, String(userId))
    return { ok: true }
  }

  async demote(userId: number): Promise<void> {
    await this.store.set(roleKey(userId), 'client')
    await this.store.removeFromSet(BANK_SET, String(userId))
  }

  async bankUsers(): Promise<number[]> {
    const ids = await this.store.members(BANK_SET)
    return ids.map(Number).filter(Number.isSafeInteger).sort((a, b) => a - b)
  }
}
