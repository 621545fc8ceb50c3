import type { AuthToken } from '@domain/models/User.ts'
import { getDb } from './database.ts'

interface TokenRow {
  key: string
  user_id: number
  created_at: string
}

function toToken(row: TokenRow): AuthToken {
  return { key: row.key, userId: row.user_id, createdAt: row.created_at }
}

/** Each user holds at most one token; an existing one is returned as-is. */
export function getOrCreateToken(userId: number, generateKey: () => string): AuthToken {
  const db = getDb()
  const existing = db
    .prepare<[number], TokenRow>('SELECT * FROM auth_tokens WHERE user_id = ?')
    .get(userId)
  if (existing) return toToken(existing)

  const row: TokenRow = { key: generateKey(), user_id: userId, created_at: new Date().toISOString() }
  db.prepare<[string, number, string]>('INSERT INTO auth_tokens (key, user_id, created_at) VALUES (?, ?, ?)')
    .run(row.key, row.user_id, row.created_at)
  return toToken(row)
}

export function findToken(key: string): AuthToken | undefined {
  const row = getDb().prepare<[string], TokenRow>('SELECT * FROM auth_tokens WHERE key = ?').get(key)
  return row ? toToken(row) : undefined
}
