import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import type { Server } from 'http'
import { tmpdir } from 'os'
import { join } from 'path'
import { createApp, handleAppError } from '../../../api/_lib/app.ts'
import { NotFoundError } from '@domain/errors.ts'
import { resetConfig } from '@infrastructure/config.ts'
import { createRequest, createResponse } from '../helpers.ts'

const PNG_BYTES = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64',
)

let server: Server
let baseUrl: string
let mediaRoot: string

beforeAll(async () => {
  mediaRoot = mkdtempSync(join(tmpdir(), 'recipe-app-'))
  process.env.MEDIA_ROOT = mediaRoot
  process.env.MAX_IMAGE_BYTES = '1024'
  resetConfig()

  const app = createApp()
  await new Promise<void>((resolve) => {
    server = app.listen(0, '127.0.0.1', () => resolve())
  })
  const address = server.address()
  if (!address || typeof address === 'string') throw new Error('server is not listening on a port')
  baseUrl = `http://127.0.0.1:${address.port}`
})

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
  rmSync(mediaRoot, { recursive: true, force: true })
  delete process.env.MEDIA_ROOT
  delete process.env.MAX_IMAGE_BYTES
  resetConfig()
})

describe('app routing', () => {
  it('serves the health check', async () => {
    const res = await fetch(`${baseUrl}/api/health`)

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ healthy: true })
  })

  it('answers 405 with the allowed method on a known path', async () => {
    const res = await fetch(`${baseUrl}/api/health`, { method: 'DELETE' })

    expect(res.status).toBe(405)
    expect(res.headers.get('allow')).toBe('GET')
    expect(await res.json()).toEqual({ error: 'Method not allowed' })
  })

  it('answers 404 for an unknown path', async () => {
    const res = await fetch(`${baseUrl}/api/unknown`)

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found.' })
  })

  it('rejects a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/api/user/create`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"email": ',
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Malformed request body' })
  })

  it('rejects a body over the size limit', async () => {
    const res = await fetch(`${baseUrl}/api/user/create`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ image: 'a'.repeat(70_000) }),
    })

    expect(res.status).toBe(413)
    expect(await res.json()).toEqual({ error: 'Request body too large' })
  })

  it('serves uploaded media under the media URL', async () => {
    mkdirSync(join(mediaRoot, 'uploads', 'recipe'), { recursive: true })
    writeFileSync(join(mediaRoot, 'uploads', 'recipe', 'sample.png'), PNG_BYTES)

    const res = await fetch(`${baseUrl}/static/media/uploads/recipe/sample.png`)

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('image/png')
    expect(Buffer.from(await res.arrayBuffer()).equals(PNG_BYTES)).toBe(true)
  })
})

describe('handleAppError', () => {
  it('maps API errors to their status', () => {
    const res = createResponse()

    handleAppError(new NotFoundError(), createRequest('GET'), res, () => undefined)

    expect(res.statusCode).toBe(404)
    expect(res.body).toEqual({ error: 'Not found.' })
  })

  it('answers 500 for unexpected errors', () => {
    const res = createResponse()

    handleAppError(new Error('boom'), createRequest('GET'), res, () => undefined)

    expect(res.statusCode).toBe(500)
    expect(res.body).toEqual({ error: 'Internal server error' })
  })
})
