export interface User {
  id: number
  email: string
  name: string
  /** scrypt$<salt>$<hash> */
  password: string
  isActive: boolean
  isStaff: boolean
  createdAt: string
}

export interface AuthToken {
  key: string
  userId: number
  createdAt: string
}
