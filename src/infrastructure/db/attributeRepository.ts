import type { RecipeAttribute, RecipeAttributeKind } from '@domain/models/RecipeAttribute.ts'
import { ValidationError } from '@domain/errors.ts'
import { getDb } from './database.ts'

interface AttributeRow {
  id: number
  user_id: number
  name: string
}

interface LinkedAttributeRow extends AttributeRow {
  recipe_id: number
}

interface AttributeTables {
  table: 'tags' | 'ingredients'
  linkTable: 'recipe_tags' | 'recipe_ingredients'
  linkColumn: 'tag_id' | 'ingredient_id'
}

const TABLES: Record<RecipeAttributeKind, AttributeTables> = {
  tag: { table: 'tags', linkTable: 'recipe_tags', linkColumn: 'tag_id' },
  ingredient: { table: 'ingredients', linkTable: 'recipe_ingredients', linkColumn: 'ingredient_id' },
}

export interface ListAttributesOptions {
  /** Only return entries linked to at least one recipe */
  assignedOnly?: boolean
}

export interface GetOrCreateResult<T> {
  item: T
  created: boolean
}

export interface AttributeRepository<T extends RecipeAttribute = RecipeAttribute> {
  kind: RecipeAttributeKind
  listForUser(userId: number, options?: ListAttributesOptions): T[]
  getForUser(userId: number, id: number): T | undefined
  getOrCreate(userId: number, name: string): GetOrCreateResult<T>
  rename(userId: number, id: number, name: string): T | undefined
  remove(userId: number, id: number): boolean
  attachToRecipe(recipeId: number, id: number): void
  clearFromRecipe(recipeId: number): void
  listForRecipes(recipeIds: number[]): Map<number, T[]>
}

function toAttribute(row: AttributeRow): RecipeAttribute {
  return { id: row.id, userId: row.user_id, name: row.name }
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

export function createAttributeRepository(kind: RecipeAttributeKind): AttributeRepository {
  const { table, linkTable, linkColumn } = TABLES[kind]

  function getForUser(userId: number, id: number): RecipeAttribute | undefined {
    const row = getDb()
      .prepare<[number, number], AttributeRow>(`SELECT * FROM ${table} WHERE id = ? AND user_id = ?`)
      .get(id, userId)
    return row ? toAttribute(row) : undefined
  }

  return {
    kind,

    listForUser(userId, options = {}) {
      const sql = options.assignedOnly
        ? `SELECT DISTINCT a.* FROM ${table} a
             JOIN ${linkTable} l ON l.${linkColumn} = a.id
           WHERE a.user_id = ? ORDER BY a.name DESC, a.id DESC`
        : `SELECT * FROM ${table} WHERE user_id = ? ORDER BY name DESC, id DESC`
      return getDb().prepare<[number], AttributeRow>(sql).all(userId).map(toAttribute)
    },

    getForUser,

    getOrCreate(userId, name) {
      const db = getDb()
      const existing = db
        .prepare<[number, string], AttributeRow>(`SELECT * FROM ${table} WHERE user_id = ? AND name = ?`)
        .get(userId, name)
      if (existing) return { item: toAttribute(existing), created: false }

      const result = db
        .prepare<[number, string]>(`INSERT INTO ${table} (user_id, name) VALUES (?, ?)`)
        .run(userId, name)
      return {
        item: { id: Number(result.lastInsertRowid), userId, name },
        created: true,
      }
    },

    rename(userId, id, name) {
      try {
        const result = getDb()
          .prepare<[string, number, number]>(`UPDATE ${table} SET name = ? WHERE id = ? AND user_id = ?`)
          .run(name, id, userId)
        if (result.changes === 0) return undefined
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new ValidationError({ name: [`A ${kind} with this name already exists.`] })
        }
        throw err
      }
      return getForUser(userId, id)
    },

    remove(userId, id) {
      const result = getDb()
        .prepare<[number, number]>(`DELETE FROM ${table} WHERE id = ? AND user_id = ?`)
        .run(id, userId)
      return result.changes > 0
    },

    attachToRecipe(recipeId, id) {
      getDb()
        .prepare<[number, number]>(`INSERT OR IGNORE INTO ${linkTable} (recipe_id, ${linkColumn}) VALUES (?, ?)`)
        .run(recipeId, id)
    },

    clearFromRecipe(recipeId) {
      getDb().prepare<[number]>(`DELETE FROM ${linkTable} WHERE recipe_id = ?`).run(recipeId)
    },

    listForRecipes(recipeIds) {
      const byRecipe = new Map<number, RecipeAttribute[]>()
      if (recipeIds.length === 0) return byRecipe

      const placeholders = recipeIds.map(() => '?').join(', ')
      const rows = getDb()
        .prepare<number[], LinkedAttributeRow>(
          `SELECT a.*, l.recipe_id FROM ${table} a
             JOIN ${linkTable} l ON l.${linkColumn} = a.id
           WHERE l.recipe_id IN (${placeholders})
           ORDER BY a.id`,
        )
        .all(...recipeIds)

      for (const row of rows) {
        const list = byRecipe.get(row.recipe_id) ?? []
        list.push(toAttribute(row))
        byRecipe.set(row.recipe_id, list)
      }
      return byRecipe
    },
  }
}

export const tagRepository = createAttributeRepository('tag')
export const ingredientRepository = createAttributeRepository('ingredient')
