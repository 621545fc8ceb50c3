export interface Tag {
  id: number
  userId: number
  name: string
}
