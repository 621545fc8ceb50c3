export interface Ingredient {
  id: number
  userId: number
  name: string
}
