import { tagRepository } from '@infrastructure/db/index.ts'
import { createAttributeListHandler } from '../_lib/attributeHandlers.ts'

export default createAttributeListHandler(tagRepository)
