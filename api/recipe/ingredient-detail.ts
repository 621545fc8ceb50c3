import { ingredientRepository } from '@infrastructure/db/index.ts'
import { createAttributeDetailHandler } from '../_lib/attributeHandlers.ts'

export default createAttributeDetailHandler(ingredientRepository)
