import type { AttributeInput } from '@domain/models/Recipe.ts'
import type { AttributeRepository } from '@infrastructure/db/attributeRepository.ts'

/**
 * Link each named entry to the recipe, reusing the user's existing tag or
 * ingredient of that name and creating it otherwise. Linking is
 * idempotent, so a name repeated in the input is attached once.
 */
export function getOrCreateAndAttach(
  repository: AttributeRepository,
  userId: number,
  recipeId: number,
  entries: AttributeInput[],
): void {
  for (const entry of entries) {
    const { item } = repository.getOrCreate(userId, entry.name)
    repository.attachToRecipe(recipeId, item.id)
  }
}

/** Drop every link of this kind from the recipe, then attach the given entries */
export function replaceAttributes(
  repository: AttributeRepository,
  userId: number,
  recipeId: number,
  entries: AttributeInput[],
): void {
  repository.clearFromRecipe(recipeId)
  getOrCreateAndAttach(repository, userId, recipeId, entries)
}
