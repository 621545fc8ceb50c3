import type { Tag } from './Tag.ts'
import type { Ingredient } from './Ingredient.ts'

/** A per-user named label that can be linked to many recipes. */
export type RecipeAttribute = Tag | Ingredient

export type RecipeAttributeKind = 'tag' | 'ingredient'
