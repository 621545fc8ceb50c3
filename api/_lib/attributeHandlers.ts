import { NotFoundError } from '@domain/errors.ts'
import { serializeAttribute } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { attributeListQuerySchema, attributeSchema } from '@application/validation/schemas.ts'
import type { AttributeRepository } from '@infrastructure/db/attributeRepository.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { requireUser } from './auth.ts'
import { assertMethod, parseId, sendError, type ApiHandler } from './http.ts'

const attributePatchSchema = attributeSchema.partial()

/** GET lists the user's entries; POST returns the entry of that name, creating it if needed */
export function createAttributeListHandler(repository: AttributeRepository): ApiHandler {
  return (req, res) => {
    try {
      const user = requireUser(req)
      assertMethod(req, ['GET', 'POST'])

      if (req.method === 'GET') {
        const { assigned_only } = parseWith(attributeListQuerySchema, req.query)
        const items = repository.listForUser(user.id, { assignedOnly: assigned_only })
        return res.status(200).json(items.map(serializeAttribute))
      }

      const { name } = parseWith(attributeSchema, req.body)
      const { item, created } = repository.getOrCreate(user.id, name)
      if (created) logger.info({ userId: user.id, id: item.id }, `Created ${repository.kind}`)
      return res.status(created ? 201 : 200).json(serializeAttribute(item))
    } catch (err) {
      return sendError(res, err)
    }
  }
}

export function createAttributeDetailHandler(repository: AttributeRepository): ApiHandler {
  return (req, res) => {
    try {
      const user = requireUser(req)
      assertMethod(req, ['GET', 'PUT', 'PATCH', 'DELETE'])

      const id = parseId(req.params.id)
      const current = repository.getForUser(user.id, id)
      if (!current) throw new NotFoundError()

      if (req.method === 'GET') {
        return res.status(200).json(serializeAttribute(current))
      }

      if (req.method === 'DELETE') {
        repository.remove(user.id, id)
        logger.info({ userId: user.id, id }, `Deleted ${repository.kind}`)
        return res.status(204).end()
      }

      const { name } = parseWith(req.method === 'PUT' ? attributeSchema : attributePatchSchema, req.body)
      if (name === undefined || name === current.name) {
        return res.status(200).json(serializeAttribute(current))
      }

      const renamed = repository.rename(user.id, id, name)
      if (!renamed) throw new NotFoundError()
      logger.info({ userId: user.id, id }, `Renamed ${repository.kind}`)
      return res.status(200).json(serializeAttribute(renamed))
    } catch (err) {
      return sendError(res, err)
    }
  }
}
