import type { Ingredient } from './Ingredient.ts'
import type { Tag } from './Tag.ts'

export interface Recipe {
  id: number
  userId: number
  title: string
  description: string
  timeMinutes: number
  /** Decimal string with two places, e.g. "5.50" */
  price: string
  link: string
  /** Path relative to the media root, or null when no image was uploaded */
  image: string | null
  tags: Tag[]
  ingredients: Ingredient[]
  createdAt: string
  updatedAt: string
}

export type RecipeFields = Pick<Recipe, 'title' | 'description' | 'timeMinutes' | 'price' | 'link'>

export interface AttributeInput {
  name: string
}

export interface RecipeInput extends Partial<RecipeFields> {
  tags?: AttributeInput[]
  ingredients?: AttributeInput[]
}

export type NewRecipeInput = RecipeInput & Pick<RecipeFields, 'title' | 'timeMinutes' | 'price'>
