import { NotFoundError } from '@domain/errors.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { deleteRecipe, getRecipeForUser, replaceRecipeImage } from '@infrastructure/db/recipeRepository.ts'
import { decodeImage, deleteMediaFile, saveRecipeImage } from '@infrastructure/media/imageStore.ts'
import { logger } from '@infrastructure/logging/logger.ts'

/**
 * Store a new image for the recipe and remove the file it replaces. The
 * previous path is read when the new one is written, so overlapping uploads
 * each remove exactly the file they displaced.
 */
export async function uploadRecipeImage(userId: number, recipe: Recipe, encoded: string): Promise<Recipe> {
  const image = decodeImage(encoded)
  const path = await saveRecipeImage(image)

  let replaced: { previous: string | null } | undefined
  try {
    replaced = replaceRecipeImage(recipe.id, path)
  } catch (err) {
    // Nothing references the new file if the row was not written
    await deleteMediaFile(path)
    throw err
  }

  const updated = replaced ? getRecipeForUser(userId, recipe.id) : undefined
  if (!replaced || !updated) {
    await deleteMediaFile(path)
    throw new NotFoundError()
  }

  if (replaced.previous) {
    await deleteMediaFile(replaced.previous)
  }

  logger.info({ userId, recipeId: recipe.id, image: path }, 'Uploaded recipe image')
  return updated
}

/** Delete the recipe and its image file; false when it does not belong to the user */
export async function removeRecipe(userId: number, recipe: Recipe): Promise<boolean> {
  const deleted = deleteRecipe(userId, recipe.id)
  if (deleted && recipe.image) {
    await deleteMediaFile(recipe.image)
  }
  if (deleted) logger.info({ userId, recipeId: recipe.id }, 'Deleted recipe')
  return deleted
}
