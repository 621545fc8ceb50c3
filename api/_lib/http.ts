import type { Request, Response } from 'express'
import { ApiError, AuthenticationError, MethodNotAllowedError, NotFoundError, ValidationError } from '@domain/errors.ts'
import type { MediaUrlBuilder } from '@application/serializers/recipeSerializer.ts'
import { idParamSchema } from '@application/validation/schemas.ts'
import { getConfig } from '@infrastructure/config.ts'
import { logger } from '@infrastructure/logging/logger.ts'

export type ApiRequest = Request
export type ApiResponse = Response
export type ApiHandler = (req: ApiRequest, res: ApiResponse) => unknown

export function assertMethod(req: ApiRequest, allowed: string[]): void {
  if (!allowed.includes(req.method)) {
    throw new MethodNotAllowedError(allowed)
  }
}

/** Path ids that are not positive integers cannot match a row */
export function parseId(raw: string | undefined): number {
  const result = idParamSchema.safeParse(raw)
  if (!result.success) throw new NotFoundError()
  return result.data
}

export function mediaUrlFor(req: ApiRequest): MediaUrlBuilder {
  const protocol = req.protocol || 'http'
  const host = req.headers.host ?? 'localhost'
  const prefix = getConfig().mediaUrl
  return (path) => `${protocol}://${host}${prefix}${path}`
}

export function sendError(res: ApiResponse, err: unknown): ApiResponse {
  if (err instanceof ValidationError) {
    return res.status(err.status).json({ error: err.message, fields: err.fields })
  }
  if (err instanceof AuthenticationError) {
    res.setHeader('WWW-Authenticate', 'Token')
    return res.status(err.status).json({ error: err.message })
  }
  if (err instanceof MethodNotAllowedError) {
    res.setHeader('Allow', err.allowed.join(', '))
    return res.status(err.status).json({ error: err.message })
  }
  if (err instanceof ApiError) {
    return res.status(err.status).json({ error: err.message })
  }

  logger.error({ err }, 'Unhandled error while serving request')
  return res.status(500).json({ error: 'Internal server error' })
}
