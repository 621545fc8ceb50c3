import { z } from 'zod'
import type { NewRecipeInput, RecipeInput } from '@domain/models/Recipe.ts'

const MAX_NAME = 255
const MAX_INTEGER = 2147483647
const PRICE_PATTERN = /^\d{1,3}(\.\d{1,2})?$/

/** Fixed two-place decimal string, e.g. 5.5 -> "5.50" */
export function formatPrice(value: string): string {
  const [whole, fraction = ''] = value.split('.')
  return `${Number(whole)}.${fraction.padEnd(2, '0')}`
}

const integerField = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z
    .number({ invalid_type_error: 'A valid integer is required.' })
    .int('A valid integer is required.')
    .min(0, 'Ensure this value is greater than or equal to 0.')
    .max(MAX_INTEGER, `Ensure this value is less than or equal to ${MAX_INTEGER}.`),
)

const priceField = z
  .union([z.string().trim(), z.number().nonnegative()], {
    errorMap: () => ({ message: 'A valid number is required.' }),
  })
  .transform((value) => (typeof value === 'number' ? String(value) : value))
  .refine((value) => PRICE_PATTERN.test(value), {
    message: 'Ensure there are no more than 3 digits before and 2 after the decimal point.',
  })
  .transform(formatPrice)

export const attributeSchema = z.object({
  name: z.string().trim().min(1, 'This field may not be blank.').max(MAX_NAME),
})

const recipeShape = {
  title: z.string().trim().min(1, 'This field may not be blank.').max(MAX_NAME),
  time_minutes: integerField,
  price: priceField,
  link: z.string().trim().max(MAX_NAME).optional(),
  description: z.string().optional(),
  tags: z.array(attributeSchema).optional(),
  ingredients: z.array(attributeSchema).optional(),
}

export const recipeCreateSchema = z.object(recipeShape)
export const recipePatchSchema = z.object(recipeShape).partial()

export type RecipeCreateBody = z.infer<typeof recipeCreateSchema>
export type RecipePatchBody = z.infer<typeof recipePatchSchema>

/** Map a validated snake_case body onto the domain input, keeping only provided keys */
export function toRecipeInput(body: RecipePatchBody): RecipeInput {
  const input: RecipeInput = {}
  if (body.title !== undefined) input.title = body.title
  if (body.time_minutes !== undefined) input.timeMinutes = body.time_minutes
  if (body.price !== undefined) input.price = body.price
  if (body.link !== undefined) input.link = body.link
  if (body.description !== undefined) input.description = body.description
  if (body.tags !== undefined) input.tags = body.tags
  if (body.ingredients !== undefined) input.ingredients = body.ingredients
  return input
}

export function toNewRecipeInput(body: RecipeCreateBody): NewRecipeInput {
  return {
    ...toRecipeInput(body),
    title: body.title,
    timeMinutes: body.time_minutes,
    price: body.price,
  }
}

const idList = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter(Boolean))
  .refine((parts) => parts.every((part) => /^\d+$/.test(part)), {
    message: 'Expected a comma-separated list of ids.',
  })
  .transform((parts) => parts.map(Number))

export const recipeListQuerySchema = z.object({
  tags: idList.optional(),
  ingredients: idList.optional(),
})

export const attributeListQuerySchema = z.object({
  assigned_only: z
    .enum(['0', '1'], { errorMap: () => ({ message: 'Expected 0 or 1.' }) })
    .optional()
    .transform((value) => value === '1'),
})

export const idParamSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .refine((id) => id > 0 && Number.isSafeInteger(id))

export const imageUploadSchema = z.object({
  image: z.string({ required_error: 'No file was submitted.' }).min(1, 'The submitted file is empty.'),
})

const userShape = {
  email: z.string().trim().email('Enter a valid email address.').max(MAX_NAME),
  password: z.string().min(5, 'Ensure this field has at least 5 characters.'),
  name: z.string().trim().min(1, 'This field may not be blank.').max(MAX_NAME),
}

export const userCreateSchema = z.object(userShape)
export const userPatchSchema = z.object(userShape).partial()

export const tokenRequestSchema = z.object({
  email: z.string().trim().email('Enter a valid email address.'),
  password: z.string().min(1, 'This field may not be blank.'),
})
