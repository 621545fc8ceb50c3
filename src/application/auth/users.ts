import type { User } from '@domain/models/User.ts'
import { ValidationError } from '@domain/errors.ts'
import { getUserByEmail, insertUser, updateUser, type UserChanges } from '@infrastructure/db/userRepository.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { hashPassword, verifyPassword } from './passwords.ts'

export interface UserInput {
  email: string
  password: string
  name: string
}

/** Lowercase the domain part; the local part is case-sensitive */
export function normalizeEmail(email: string): string {
  const trimmed = email.trim()
  const at = trimmed.lastIndexOf('@')
  if (at < 0) return trimmed
  return trimmed.slice(0, at) + '@' + trimmed.slice(at + 1).toLowerCase()
}

function assertEmailAvailable(email: string, exceptUserId?: number): void {
  const existing = getUserByEmail(email)
  if (existing && existing.id !== exceptUserId) {
    throw new ValidationError({ email: ['A user with this email already exists.'] })
  }
}

export function createUser(input: UserInput): User {
  const email = normalizeEmail(input.email)
  assertEmailAvailable(email)

  const user = insertUser({ email, name: input.name, password: hashPassword(input.password) })
  logger.info({ userId: user.id }, 'Created user')
  return user
}

export function updateProfile(user: User, input: Partial<UserInput>): User {
  const changes: UserChanges = {}
  if (input.email !== undefined) {
    changes.email = normalizeEmail(input.email)
    assertEmailAvailable(changes.email, user.id)
  }
  if (input.name !== undefined) changes.name = input.name
  if (input.password !== undefined) changes.password = hashPassword(input.password)

  const updated = updateUser(user.id, changes)
  if (!updated) throw new Error(`User ${user.id} disappeared during update`)
  logger.info({ userId: user.id, fields: Object.keys(changes) }, 'Updated user')
  return updated
}

export function authenticateCredentials(email: string, password: string): User | null {
  const user = getUserByEmail(normalizeEmail(email))
  if (!user || !user.isActive) return null
  return verifyPassword(password, user.password) ? user : null
}
