import express, { type ErrorRequestHandler, type RequestHandler } from 'express'
import pinoHttp from 'pino-http'
import { getConfig } from '@infrastructure/config.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import health from '../health.ts'
import createUser from '../user/create.ts'
import issueToken from '../user/token.ts'
import me from '../user/me.ts'
import recipes from '../recipe/recipes.ts'
import recipeDetail from '../recipe/recipe-detail.ts'
import uploadImage from '../recipe/upload-image.ts'
import tags from '../recipe/tags.ts'
import tagDetail from '../recipe/tag-detail.ts'
import ingredients from '../recipe/ingredients.ts'
import ingredientDetail from '../recipe/ingredient-detail.ts'
import { setApiCors } from './cors.ts'
import { sendError, type ApiHandler } from './http.ts'

/** Adapt a handler so a rejected promise reaches the error middleware */
function route(handler: ApiHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res)).catch(next)
  }
}

/** Body-parser failures carry an HTTP status and a `type` such as "entity.parse.failed" */
function bodyParserStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return null
  return typeof err.status === 'number' ? err.status : null
}

// JSON bodies carry base64 images, a third larger than the decoded limit
function jsonBodyLimit(maxImageBytes: number): number {
  return Math.ceil(maxImageBytes * 1.4) + 64 * 1024
}

/** Last-resort middleware for body-parser failures and rejected handlers */
export const handleAppError: ErrorRequestHandler = (err, _req, res, _next) => {
  const status = bodyParserStatus(err)
  if (status !== null && status < 500) {
    res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Malformed request body' })
    return
  }
  sendError(res, err)
}

export function createApp(): express.Express {
  const config = getConfig()
  const app = express()

  app.disable('x-powered-by')
  app.use(pinoHttp({ logger }))
  app.use((req, res, next) => {
    setApiCors(req, res, config.corsOrigins)
    if (req.method === 'OPTIONS') {
      res.status(204).end()
      return
    }
    next()
  })
  app.use(express.json({ limit: jsonBodyLimit(config.maxImageBytes) }))

  app.all('/api/health', route(health))

  app.all('/api/user/create', route(createUser))
  app.all('/api/user/token', route(issueToken))
  app.all('/api/user/me', route(me))

  app.all('/api/recipe/recipes', route(recipes))
  app.all('/api/recipe/recipes/:id', route(recipeDetail))
  app.all('/api/recipe/recipes/:id/upload-image', route(uploadImage))
  app.all('/api/recipe/tags', route(tags))
  app.all('/api/recipe/tags/:id', route(tagDetail))
  app.all('/api/recipe/ingredients', route(ingredients))
  app.all('/api/recipe/ingredients/:id', route(ingredientDetail))

  app.use(config.mediaUrl, express.static(config.mediaRoot, { index: false }))

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found.' })
  })

  app.use(handleAppError)

  return app
}
