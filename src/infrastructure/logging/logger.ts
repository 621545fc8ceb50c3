import pino from 'pino'
import { getConfig } from '../config.ts'

export const logger = pino({
  level: getConfig().logLevel,
  base: { service: 'recipe-api' },
  redact: ['req.headers.authorization', 'req.headers.cookie'],
})
