import { createRecipe } from '@application/recipes/createRecipe.ts'
import { serializeRecipe, serializeRecipeDetail } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { recipeCreateSchema, recipeListQuerySchema, toNewRecipeInput } from '@application/validation/schemas.ts'
import { listRecipesForUser } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.ts'
import { assertMethod, mediaUrlFor, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

export default function handler(req: ApiRequest, res: ApiResponse) {
  try {
    const user = requireUser(req)
    assertMethod(req, ['GET', 'POST'])

    if (req.method === 'GET') {
      const query = parseWith(recipeListQuerySchema, req.query)
      const recipes = listRecipesForUser(user.id, {
        tagIds: query.tags,
        ingredientIds: query.ingredients,
      })
      return res.status(200).json(recipes.map(serializeRecipe))
    }

    const body = parseWith(recipeCreateSchema, req.body)
    const recipe = createRecipe(user.id, toNewRecipeInput(body))
    return res.status(201).json(serializeRecipeDetail(recipe, mediaUrlFor(req)))
  } catch (err) {
    return sendError(res, err)
  }
}
