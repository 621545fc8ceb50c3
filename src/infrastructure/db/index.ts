export { getDb, openDatabase, closeDatabase } from './database.ts'
export {
  insertRecipe,
  getRecipeForUser,
  listRecipesForUser,
  updateRecipeFields,
  replaceRecipeImage,
  deleteRecipe,
} from './recipeRepository.ts'
export { tagRepository, ingredientRepository } from './attributeRepository.ts'
export { insertUser, getUserById, getUserByEmail, updateUser } from './userRepository.ts'
export { getOrCreateToken, findToken } from './tokenRepository.ts'
