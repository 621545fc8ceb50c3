import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeAttribute } from '@domain/models/RecipeAttribute.ts'
import type { User } from '@domain/models/User.ts'

export interface AttributeResponse {
  id: number
  name: string
}

export interface RecipeResponse {
  id: number
  title: string
  time_minutes: number
  price: string
  link: string
  tags: AttributeResponse[]
  ingredients: AttributeResponse[]
}

export interface RecipeDetailResponse extends RecipeResponse {
  description: string
  image: string | null
}

export interface RecipeImageResponse {
  id: number
  image: string | null
}

export interface UserResponse {
  email: string
  name: string
}

/** Builds the public URL of a file stored under the media root */
export type MediaUrlBuilder = (path: string) => string

export function serializeAttribute(attribute: RecipeAttribute): AttributeResponse {
  return { id: attribute.id, name: attribute.name }
}

export function serializeRecipe(recipe: Recipe): RecipeResponse {
  return {
    id: recipe.id,
    title: recipe.title,
    time_minutes: recipe.timeMinutes,
    price: recipe.price,
    link: recipe.link,
    tags: recipe.tags.map(serializeAttribute),
    ingredients: recipe.ingredients.map(serializeAttribute),
  }
}

export function serializeRecipeDetail(recipe: Recipe, mediaUrl: MediaUrlBuilder): RecipeDetailResponse {
  return {
    ...serializeRecipe(recipe),
    description: recipe.description,
    image: recipe.image ? mediaUrl(recipe.image) : null,
  }
}

export function serializeRecipeImage(recipe: Recipe, mediaUrl: MediaUrlBuilder): RecipeImageResponse {
  return { id: recipe.id, image: recipe.image ? mediaUrl(recipe.image) : null }
}

export function serializeUser(user: User): UserResponse {
  return { email: user.email, name: user.name }
}
