import type { Request, Response } from 'express'

const ALLOWED_METHODS = 'GET, POST, PUT, PATCH, DELETE, OPTIONS'
const ALLOWED_HEADERS = 'Content-Type, Authorization'

/**
 * Reflect the request origin when it is on the allow-list. An empty list
 * means the API is only used same-origin and no CORS headers are sent.
 */
export function setApiCors(req: Request, res: Response, allowedOrigins: string[]): void {
  const origin = req.headers.origin ?? ''
  if (!origin) return
  if (allowedOrigins.includes('*')) {
    res.setHeader('Access-Control-Allow-Origin', '*')
  } else if (allowedOrigins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin)
    res.setHeader('Vary', 'Origin')
  } else {
    // No Access-Control-Allow-Origin: the browser blocks the response
    return
  }
  res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS)
  res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS)
}
