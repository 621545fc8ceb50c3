import type { User } from '@domain/models/User.ts'
import { getDb } from './database.ts'

interface UserRow {
  id: number
  email: string
  name: string
  password: string
  is_active: number
  is_staff: number
  created_at: string
}

export interface NewUser {
  email: string
  name: string
  password: string
  isStaff?: boolean
}

export type UserChanges = Partial<Pick<User, 'email' | 'name' | 'password' | 'isActive'>>

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    password: row.password,
    isActive: row.is_active === 1,
    isStaff: row.is_staff === 1,
    createdAt: row.created_at,
  }
}

export function insertUser(user: NewUser): User {
  const result = getDb()
    .prepare<[string, string, string, number, string]>(
      'INSERT INTO users (email, name, password, is_staff, created_at) VALUES (?, ?, ?, ?, ?)',
    )
    .run(user.email, user.name, user.password, user.isStaff ? 1 : 0, new Date().toISOString())
  const created = getUserById(Number(result.lastInsertRowid))
  if (!created) throw new Error('User vanished after insert')
  return created
}

export function getUserById(id: number): User | undefined {
  const row = getDb().prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id)
  return row ? toUser(row) : undefined
}

export function getUserByEmail(email: string): User | undefined {
  const row = getDb().prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?').get(email)
  return row ? toUser(row) : undefined
}

export function updateUser(id: number, changes: UserChanges): User | undefined {
  const db = getDb()
  if (changes.email !== undefined) {
    db.prepare<[string, number]>('UPDATE users SET email = ? WHERE id = ?').run(changes.email, id)
  }
  if (changes.name !== undefined) {
    db.prepare<[string, number]>('UPDATE users SET name = ? WHERE id = ?').run(changes.name, id)
  }
  if (changes.password !== undefined) {
    db.prepare<[string, number]>('UPDATE users SET password = ? WHERE id = ?').run(changes.password, id)
  }
  if (changes.isActive !== undefined) {
    db.prepare<[number, number]>('UPDATE users SET is_active = ? WHERE id = ?').run(changes.isActive ? 1 : 0, id)
  }
  return getUserById(id)
}
