import type { Recipe, RecipeFields } from '@domain/models/Recipe.ts'
import { getDb } from './database.ts'
import { ingredientRepository, tagRepository } from './attributeRepository.ts'

interface RecipeRow {
  id: number
  user_id: number
  title: string
  description: string
  time_minutes: number
  price: string
  link: string
  image: string | null
  created_at: string
  updated_at: string
}

export interface RecipeFilters {
  tagIds?: number[]
  ingredientIds?: number[]
}

const COLUMNS: [keyof RecipeFields, string][] = [
  ['title', 'title'],
  ['description', 'description'],
  ['timeMinutes', 'time_minutes'],
  ['price', 'price'],
  ['link', 'link'],
]

function hydrate(rows: RecipeRow[]): Recipe[] {
  const ids = rows.map((row) => row.id)
  const tags = tagRepository.listForRecipes(ids)
  const ingredients = ingredientRepository.listForRecipes(ids)

  return rows.map((row) => ({
    id: row.id,
    userId: row.user_id,
    title: row.title,
    description: row.description,
    timeMinutes: row.time_minutes,
    price: row.price,
    link: row.link,
    image: row.image,
    tags: tags.get(row.id) ?? [],
    ingredients: ingredients.get(row.id) ?? [],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }))
}

export function insertRecipe(userId: number, fields: RecipeFields): number {
  const now = new Date().toISOString()
  const result = getDb()
    .prepare<[number, string, string, number, string, string, string, string]>(
      `INSERT INTO recipes (user_id, title, description, time_minutes, price, link, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(userId, fields.title, fields.description, fields.timeMinutes, fields.price, fields.link, now, now)
  return Number(result.lastInsertRowid)
}

export function getRecipeForUser(userId: number, id: number): Recipe | undefined {
  const row = getDb()
    .prepare<[number, number], RecipeRow>('SELECT * FROM recipes WHERE id = ? AND user_id = ?')
    .get(id, userId)
  return row ? hydrate([row])[0] : undefined
}

export function listRecipesForUser(userId: number, filters: RecipeFilters = {}): Recipe[] {
  const clauses = ['r.user_id = ?']
  const params: number[] = [userId]

  if (filters.tagIds && filters.tagIds.length > 0) {
    clauses.push(
      `r.id IN (SELECT recipe_id FROM recipe_tags WHERE tag_id IN (${filters.tagIds.map(() => '?').join(', ')}))`,
    )
    params.push(...filters.tagIds)
  }
  if (filters.ingredientIds && filters.ingredientIds.length > 0) {
    clauses.push(
      `r.id IN (SELECT recipe_id FROM recipe_ingredients WHERE ingredient_id IN (${filters.ingredientIds.map(() => '?').join(', ')}))`,
    )
    params.push(...filters.ingredientIds)
  }

  const rows = getDb()
    .prepare<number[], RecipeRow>(`SELECT r.* FROM recipes r WHERE ${clauses.join(' AND ')} ORDER BY r.id DESC`)
    .all(...params)
  return hydrate(rows)
}

export function updateRecipeFields(id: number, fields: Partial<RecipeFields>): void {
  const db = getDb()
  const now = new Date().toISOString()
  for (const [key, column] of COLUMNS) {
    const value = fields[key]
    if (value === undefined) continue
    db.prepare<[string | number, number]>(`UPDATE recipes SET ${column} = ? WHERE id = ?`).run(value, id)
  }
  db.prepare<[string, number]>('UPDATE recipes SET updated_at = ? WHERE id = ?').run(now, id)
}

/**
 * Point the recipe at a new image and return the path it replaces, read in
 * the same transaction. Undefined when the recipe no longer exists.
 */
export function replaceRecipeImage(id: number, image: string | null): { previous: string | null } | undefined {
  const db = getDb()
  return db.transaction(() => {
    const row = db.prepare<[number], Pick<RecipeRow, 'image'>>('SELECT image FROM recipes WHERE id = ?').get(id)
    if (!row) return undefined
    db.prepare<[string | null, string, number]>('UPDATE recipes SET image = ?, updated_at = ? WHERE id = ?')
      .run(image, new Date().toISOString(), id)
    return { previous: row.image }
  })()
}

export function deleteRecipe(userId: number, id: number): boolean {
  const result = getDb()
    .prepare<[number, number]>('DELETE FROM recipes WHERE id = ? AND user_id = ?')
    .run(id, userId)
  return result.changes > 0
}
