import { assertMethod, sendError, type ApiRequest, type ApiResponse } from './_lib/http.ts'

export default function handler(req: ApiRequest, res: ApiResponse) {
  try {
    assertMethod(req, ['GET'])
    return res.status(200).json({ healthy: true })
  } catch (err) {
    return sendError(res, err)
  }
}
