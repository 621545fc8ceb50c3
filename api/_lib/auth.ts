import type { User } from '@domain/models/User.ts'
import { AuthenticationError } from '@domain/errors.ts'
import { userForAuthorizationHeader } from '@application/auth/tokens.ts'
import type { ApiRequest } from './http.ts'

/** The user behind `Authorization: Token <key>`; throws a 401 otherwise */
export function requireUser(req: ApiRequest): User {
  const header = req.headers.authorization
  if (!header) throw new AuthenticationError()

  const user = userForAuthorizationHeader(header)
  if (!user) throw new AuthenticationError('Invalid token.')
  return user
}
