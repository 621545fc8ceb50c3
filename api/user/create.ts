import { createUser } from '@application/auth/users.ts'
import { serializeUser } from '@application/serializers/recipeSerializer.ts'
import { parseWith } from '@application/validation/parse.ts'
import { userCreateSchema } from '@application/validation/schemas.ts'
import { assertMethod, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

export default function handler(req: ApiRequest, res: ApiResponse) {
  try {
    assertMethod(req, ['POST'])
    const body = parseWith(userCreateSchema, req.body)
    const user = createUser(body)
    return res.status(201).json(serializeUser(user))
  } catch (err) {
    return sendError(res, err)
  }
}
