/**
 * Errors raised by the application layer. Each carries the HTTP status the
 * API answers with, so handlers can map them without inspecting messages.
 */

export type FieldErrors = Record<string, string[]>

export class ApiError extends Error {
  public status: number
  public code: string

  constructor(message: string, status: number, code: string) {
    super(message)
    this.name = 'ApiError'
    this.status = status
    this.code = code
  }
}

export class ValidationError extends ApiError {
  public fields: FieldErrors

  constructor(fields: FieldErrors, message = 'Invalid request') {
    super(message, 400, 'invalid')
    this.name = 'ValidationError'
    this.fields = fields
  }
}

export class AuthenticationError extends ApiError {
  constructor(message = 'Authentication credentials were not provided.') {
    super(message, 401, 'not_authenticated')
    this.name = 'AuthenticationError'
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Not found.') {
    super(message, 404, 'not_found')
    this.name = 'NotFoundError'
  }
}

export class MethodNotAllowedError extends ApiError {
  public allowed: string[]

  constructor(allowed: string[]) {
    super('Method not allowed', 405, 'method_not_allowed')
    this.name = 'MethodNotAllowedError'
    this.allowed = allowed
  }
}
