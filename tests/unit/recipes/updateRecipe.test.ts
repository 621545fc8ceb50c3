import { beforeEach, describe, expect, it } from 'vitest'
import type { Recipe } from '@domain/models/Recipe.ts'
import { createRecipe } from '@application/recipes/createRecipe.ts'
import { updateRecipe } from '@application/recipes/updateRecipe.ts'
import { closeDatabase } from '@infrastructure/db/database.ts'
import { ingredientRepository, tagRepository } from '@infrastructure/db/attributeRepository.ts'
import { createTestUser, type TestUser } from '../helpers.ts'

let owner: TestUser

function sampleRecipe(overrides: Partial<Parameters<typeof createRecipe>[1]> = {}): Recipe {
  return createRecipe(owner.user.id, {
    title: 'Sample recipe title',
    timeMinutes: 22,
    price: '5.25',
    link: 'https://example.com/recipe.pdf',
    description: 'Sample description',
    ...overrides,
  })
}

beforeEach(() => {
  closeDatabase()
  owner = createTestUser()
})

describe('updateRecipe', () => {
  it('creates a tag named in the update', () => {
    const recipe = sampleRecipe()

    const updated = updateRecipe(owner.user.id, recipe, { tags: [{ name: 'Lunch' }] })

    expect(updated.tags).toEqual([{ id: 1, userId: owner.user.id, name: 'Lunch' }])
  })

  it('replaces the tag set with an existing tag', () => {
    const recipe = sampleRecipe({ tags: [{ name: 'Breakfast' }] })
    const { item: lunch } = tagRepository.getOrCreate(owner.user.id, 'Lunch')

    const updated = updateRecipe(owner.user.id, recipe, { tags: [{ name: 'Lunch' }] })

    expect(updated.tags).toEqual([lunch])
    // the unlinked tag still belongs to the user
    expect(tagRepository.listForUser(owner.user.id).map((t) => t.name)).toEqual(['Lunch', 'Breakfast'])
  })

  it('clears tags when given an empty list', () => {
    const recipe = sampleRecipe({ tags: [{ name: 'Dessert' }] })

    const updated = updateRecipe(owner.user.id, recipe, { tags: [] })

    expect(updated.tags).toEqual([])
  })

  it('leaves collections alone when they are absent', () => {
    const recipe = sampleRecipe({ tags: [{ name: 'Dessert' }], ingredients: [{ name: 'Sugar' }] })

    const updated = updateRecipe(owner.user.id, recipe, { title: 'New recipe title' })

    expect(updated.title).toBe('New recipe title')
    expect(updated.link).toBe('https://example.com/recipe.pdf')
    expect(updated.tags.map((t) => t.name)).toEqual(['Dessert'])
    expect(updated.ingredients.map((i) => i.name)).toEqual(['Sugar'])
  })

  it('replaces ingredients and keeps a reused one', () => {
    const recipe = sampleRecipe({ ingredients: [{ name: 'Pepper' }] })
    const { item: chili } = ingredientRepository.getOrCreate(owner.user.id, 'Chili')

    const updated = updateRecipe(owner.user.id, recipe, { ingredients: [{ name: 'Chili' }, { name: 'Limes' }] })

    expect(updated.ingredients.map((i) => i.name)).toEqual(['Chili', 'Limes'])
    expect(updated.ingredients[0].id).toBe(chili.id)
  })

  it('updates every field at once', () => {
    const recipe = sampleRecipe()

    const updated = updateRecipe(owner.user.id, recipe, {
      title: 'New title',
      link: 'https://example.com/new-recipe.pdf',
      description: 'New description',
      timeMinutes: 10,
      price: '2.50',
    })

    expect(updated).toMatchObject({
      title: 'New title',
      link: 'https://example.com/new-recipe.pdf',
      description: 'New description',
      timeMinutes: 10,
      price: '2.50',
      userId: owner.user.id,
    })
  })
})
