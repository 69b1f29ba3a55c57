import type { Pool } from "pg";
import type { NewUser, UserRow } from "../types";

export interface UserRepository {
  findByEmail(email: string): Promise<UserRow | null>;
  /** Resolves to null when the email is already taken. */
  create(user: NewUser): Promise<UserRow | null>;
}

const USER_COLUMNS = `
  id,
  email,
  hashed_password,
  default_company_name,
  default_document_type,
  to_char(default_submission_date, 'YYYY-MM-DD') AS default_submission_date,
  is_active
`;

export class PgUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async findByEmail(email: string): Promise<UserRow | null> {
    const result = await this.pool.query<UserRow>(
      `
      SELECT ${USER_COLUMNS}
      FROM users
      WHERE email = $1
      LIMIT 1
      `,
      [email]
    );
    return result.rows[0] ?? null;
  }

  async create(user: NewUser): Promise<UserRow | null> {
    // ON CONFLICT covers the race between the caller's existence check and this insert
    const result = await this.pool.query<UserRow>(
      `
      INSERT INTO users (
        email,
        hashed_password,
        default_company_name,
        default_document_type,
        default_submission_date
      )
      VALUES ($1, $2, $3, COALESCE($4, 'Proposal'), $5::date)
      ON CONFLICT (email) DO NOTHING
      RETURNING ${USER_COLUMNS}
      `,
      [
        user.email,
        user.hashed_password,
        user.default_company_name ?? null,
        user.default_document_type ?? null,
        user.default_submission_date ?? null,
      ]
    );
    return result.rows[0] ?? null;
  }
}
