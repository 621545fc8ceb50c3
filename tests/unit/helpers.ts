import type { ApiRequest, ApiResponse } from '../../api/_lib/http.ts'
import type { User } from '@domain/models/User.ts'
import { createUser } from '@application/auth/users.ts'
import { issueToken } from '@application/auth/tokens.ts'

export interface MockResponse {
  statusCode: number
  body: unknown
  headers: Record<string, unknown>
  ended: boolean
  setHeader: (name: string, value: unknown) => MockResponse
  getHeader: (name: string) => unknown
  status: (code: number) => MockResponse
  json: (payload: unknown) => MockResponse
  end: () => MockResponse
}

interface RequestOptions {
  body?: unknown
  query?: Record<string, string>
  params?: Record<string, string>
  token?: string
  headers?: Record<string, string>
}

export function createRequest(method: string, options: RequestOptions = {}): ApiRequest {
  const headers: Record<string, string> = { host: 'testserver', ...options.headers }
  if (options.token) headers.authorization = `Token ${options.token}`
  return {
    method,
    protocol: 'http',
    headers,
    body: options.body,
    query: options.query ?? {},
    params: options.params ?? {},
  } as unknown as ApiRequest
}

export function createResponse(): ApiResponse & MockResponse {
  const response: MockResponse = {
    statusCode: 200,
    body: undefined,
    headers: {},
    ended: false,
    setHeader(name, value) {
      this.headers[name] = value
      return this
    },
    getHeader(name) {
      return this.headers[name]
    },
    status(code) {
      this.statusCode = code
      return this
    },
    json(payload) {
      this.body = payload
      return this
    },
    end() {
      this.ended = true
      return this
    },
  }

  return response as ApiResponse & MockResponse
}

type Handler = (req: ApiRequest, res: ApiResponse) => unknown

export async function call(handler: Handler, method: string, options: RequestOptions = {}) {
  const res = createResponse()
  await handler(createRequest(method, options), res)
  return res
}

export interface TestUser {
  user: User
  token: string
}

export function createTestUser(email = 'user@example.com', password = 'testpass123'): TestUser {
  const user = createUser({ email, password, name: 'Test User' })
  return { user, token: issueToken(user) }
}
