import { randomBytes } from 'node:crypto'
import type { User } from '@domain/models/User.ts'
import { findToken, getOrCreateToken } from '@infrastructure/db/tokenRepository.ts'
import { getUserById } from '@infrastructure/db/userRepository.ts'

const TOKEN_BYTES = 20

/** 40 lowercase hex characters */
export function generateTokenKey(): string {
  return randomBytes(TOKEN_BYTES).toString('hex')
}

export function issueToken(user: User): string {
  return getOrCreateToken(user.id, generateTokenKey).key
}

/** Resolve an `Authorization` header to its active user, or null */
export function userForAuthorizationHeader(header: string | undefined): User | null {
  if (!header) return null
  const [scheme, key, ...rest] = header.trim().split(/\s+/)
  if (scheme.toLowerCase() !== 'token' || !key || rest.length > 0) return null

  const token = findToken(key)
  if (!token) return null
  const user = getUserById(token.userId)
  return user && user.isActive ? user : null
}
