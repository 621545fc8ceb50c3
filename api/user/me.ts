import { updateProfile } from '@application/auth/users.ts'
import { serializeUser } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { userCreateSchema, userPatchSchema } from '@application/validation/schemas.ts'
import { requireUser } from '../_lib/auth.ts'
import { assertMethod, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

export default function handler(req: ApiRequest, res: ApiResponse) {
  try {
    const user = requireUser(req)
    assertMethod(req, ['GET', 'PUT', 'PATCH'])

    if (req.method === 'GET') {
      return res.status(200).json(serializeUser(user))
    }

    const body = parseWith(req.method === 'PUT' ? userCreateSchema : userPatchSchema, req.body)
    const updated = updateProfile(user, body)
    return res.status(200).json(serializeUser(updated))
  } catch (err) {
    return sendError(res, err)
  }
}
