import type { z } from 'zod'
import { ValidationError, type FieldErrors } from '@domain/errors.ts'

const NON_FIELD = 'non_field_errors'

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {}
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : NON_FIELD
    const messages = fields[key] ?? []
    messages.push(issue.message)
    fields[key] = messages
  }
  return fields
}

/** Parse untrusted input, turning zod issues into a ValidationError */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error))
  }
  return result.data
}
