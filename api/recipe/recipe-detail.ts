import { NotFoundError } from '@domain/errors.ts'
import { removeRecipe } from '@application/recipes/recipeImage.ts'
import { updateRecipe } from '@application/recipes/updateRecipe.ts'
import { serializeRecipeDetail } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { recipeCreateSchema, recipePatchSchema, toRecipeInput } from '@application/validation/schemas.ts'
import { getRecipeForUser } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.ts'
import { assertMethod, mediaUrlFor, parseId, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

export default async function handler(req: ApiRequest, res: ApiResponse) {
  try {
    const user = requireUser(req)
    assertMethod(req, ['GET', 'PUT', 'PATCH', 'DELETE'])

    const recipe = getRecipeForUser(user.id, parseId(req.params.id))
    if (!recipe) throw new NotFoundError()

    switch (req.method) {
      case 'GET':
        return res.status(200).json(serializeRecipeDetail(recipe, mediaUrlFor(req)))

      case 'DELETE':
        await removeRecipe(user.id, recipe)
        return res.status(204).end()

      default: {
        // PUT replaces every writable field; PATCH only those sent
        const schema = req.method === 'PUT' ? recipeCreateSchema : recipePatchSchema
        const body = parseWith(schema, req.body)
        const updated = updateRecipe(user.id, recipe, toRecipeInput(body))
        return res.status(200).json(serializeRecipeDetail(updated, mediaUrlFor(req)))
      }
    }
  } catch (err) {
    return sendError(res, err)
  }
}
