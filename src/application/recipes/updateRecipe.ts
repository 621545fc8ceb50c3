import type { Recipe, RecipeInput } from '@domain/models/Recipe.ts'
import { getDb } from '@infrastructure/db/database.ts'
import { getRecipeForUser, updateRecipeFields } from '@infrastructure/db/recipeRepository.ts'
import { ingredientRepository, tagRepository } from '@infrastructure/db/attributeRepository.ts'
import { logger } from '@infrastructure/logging/logger.ts'
import { replaceAttributes } from './assignAttributes.ts'

/**
 * Apply a partial update. An absent `tags` or `ingredients` leaves that
 * collection alone; a present one, even empty, replaces it.
 */
export function updateRecipe(userId: number, recipe: Recipe, input: RecipeInput): Recipe {
  const { tags, ingredients, ...fields } = input

  getDb().transaction(() => {
    if (tags !== undefined) {
      replaceAttributes(tagRepository, userId, recipe.id, tags)
    }
    if (ingredients !== undefined) {
      replaceAttributes(ingredientRepository, userId, recipe.id, ingredients)
    }
    updateRecipeFields(recipe.id, fields)
  })()

  const updated = getRecipeForUser(userId, recipe.id)
  if (!updated) throw new Error(`Recipe ${recipe.id} missing after update`)
  logger.info({ userId, recipeId: recipe.id, fields: Object.keys(input) }, 'Updated recipe')
  return updated
}
