import { toDate, type Queryable } from './queryable.js'

export interface User {
  id: string
  email: string
  billingCustomerId: string | null
  createdAt: Date
  updatedAt: Date
}

export interface CreateUserInput {
  email: string
  billingCustomerId?: string | null
}

type UserRow = {
  id: string
  email: string
  billing_customer_id: string | null
  created_at: Date | string
  updated_at: Date | string
}

const mapUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email,
  billingCustomerId: row.billing_customer_id,
  createdAt: toDate(row.created_at),
  updatedAt: toDate(row.updated_at),
})

export class UsersRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateUserInput): Promise<User> {
    const result = await this.db.query<UserRow>(
      `
      INSERT INTO users (email, billing_customer_id)
      VALUES ($1, $2)
      RETURNING id, email, billing_customer_id, created_at, updated_at
      `,
      [input.email, input.billingCustomerId ?? null]
    )

    return mapUser(result.rows[0])
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `
      SELECT id, email, billing_customer_id, created_at, updated_at
      FROM users
      WHERE id = $1
      `,
      [id]
    )

    return result.rows[0] ? mapUser(result.rows[0]) : null
  }
}
