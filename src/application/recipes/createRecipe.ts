import type { NewRecipeInput, Recipe } from '@domain/models/Recipe.ts'
import { getDb } from '@infrastructure/db/database.ts'
import { getRecipeForUser, insertRecipe } from '@infrastructure/db/recipeRepository.ts'
import { ingredientRepository, tagRepository } from '@infrastructure/db/attributeRepository.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { getOrCreateAndAttach } from './assignAttributes.ts'

export function createRecipe(userId: number, input: NewRecipeInput): Recipe {
  const { tags = [], ingredients = [], ...fields } = input

  const recipeId = getDb().transaction(() => {
    const id = insertRecipe(userId, {
      title: fields.title,
      timeMinutes: fields.timeMinutes,
      price: fields.price,
      description: fields.description ?? '',
      link: fields.link ?? '',
    })
    getOrCreateAndAttach(tagRepository, userId, id, tags)
    getOrCreateAndAttach(ingredientRepository, userId, id, ingredients)
    return id
  })()

  const recipe = getRecipeForUser(userId, recipeId)
  if (!recipe) throw new Error(`Recipe ${recipeId} missing after create`)
  logger.info({ userId, recipeId, tags: recipe.tags.length, ingredients: recipe.ingredients.length }, 'Created recipe')
  return recipe
}
