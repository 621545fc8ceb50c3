import { ValidationError } from '@domain/errors.ts'
import { issueToken } from '@application/auth/tokens.ts'
import { authenticateCredentials } from '@application/auth/users.ts'
import { parseWith } from '@application/validation/parse.ts'
import { tokenRequestSchema } from '@application/validation/schemas.ts'
import { assertMethod, sendError, type ApiRequest, type ApiResponse } from '../_lib/http.ts'

const BAD_CREDENTIALS = 'Unable to authenticate with provided credentials.'

export default function handler(req: ApiRequest, res: ApiResponse) {
  try {
    assertMethod(req, ['POST'])
    const { email, password } = parseWith(tokenRequestSchema, req.body)

    const user = authenticateCredentials(email, password)
    if (!user) {
      throw new ValidationError({ non_field_errors: [BAD_CREDENTIALS] }, BAD_CREDENTIALS)
    }
    return res.status(200).json({ token: issueToken(user) })
  } catch (err) {
    return sendError(res, err)
  }
}
