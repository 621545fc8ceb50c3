import { NotFoundError } from '@domain/errors.ts'
import { uploadRecipeImage } from '@application/recipes/recipeImage.ts'
import { serializeRecipeImage } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { imageUploadSchema } from '@application/validation/schemas.ts'
import { getRecipeForUser } from '@infrastructure/db/index.ts'
import { requireUser } from '../_lib/auth.ts'
import { assertMethod, mediaUrlFor, parseId, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

export default async function handler(req: ApiRequest, res: ApiResponse) {
  try {
    const user = requireUser(req)
    assertMethod(req, ['POST'])

    const recipe = getRecipeForUser(user.id, parseId(req.params.id))
    if (!recipe) throw new NotFoundError()

    const { image } = parseWith(imageUploadSchema, req.body)
    const updated = await uploadRecipeImage(user.id, recipe, image)
    return res.status(200).json(serializeRecipeImage(updated, mediaUrlFor(req)))
  } catch (err) {
    return sendError(res, err)
  }
}
