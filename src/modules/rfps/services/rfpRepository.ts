import type { Pool } from "pg";
import type { NewRfp, RfpRow, RfpUpdate } from "../types";

/**
 * Every read and write is scoped by owner. Mutations are single conditional
 * UPDATE statements, so the ownership check and the write cannot interleave
 * with another request.
 */
export interface RfpRepository {
  create(rfp: NewRfp): Promise<RfpRow>;
  listByOwner(userId: number): Promise<RfpRow[]>;
  findOwned(id: number, userId: number): Promise<RfpRow | null>;
  saveDraft(id: number, userId: number, draftText: string): Promise<RfpRow | null>;
  update(id: number, userId: number, fields: RfpUpdate): Promise<RfpRow | null>;
}

const RFP_COLUMNS = `
  id,
  title,
  original_filename,
  storage_key,
  file_sha256,
  file_size_bytes,
  draft_text,
  company_name,
  document_type,
  to_char(submission_date, 'YYYY-MM-DD') AS submission_date,
  user_id
`;

export class PgRfpRepository implements RfpRepository {
  constructor(private readonly pool: Pool) {}

  async create(rfp: NewRfp): Promise<RfpRow> {
    const { rows } = await this.pool.query<RfpRow>(
      `
      INSERT INTO rfps (
        title,
        original_filename,
        storage_key,
        file_sha256,
        file_size_bytes,
        company_name,
        document_type,
        submission_date,
        user_id
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8::date, $9)
      RETURNING ${RFP_COLUMNS}
      `,
      [
        rfp.title,
        rfp.original_filename,
        rfp.storage_key,
        rfp.file_sha256,
        rfp.file_size_bytes,
        rfp.company_name,
        rfp.document_type,
        rfp.submission_date,
        rfp.user_id,
      ]
    );
    return rows[0];
  }

  // No ORDER BY: callers must not rely on ordering
  async listByOwner(userId: number): Promise<RfpRow[]> {
    const { rows } = await this.pool.query<RfpRow>(
      `SELECT ${RFP_COLUMNS} FROM rfps WHERE user_id = $1`,
      [userId]
    );
    return rows;
  }

  async findOwned(id: number, userId: number): Promise<RfpRow | null> {
    const { rows } = await this.pool.query<RfpRow>(
      `
      SELECT ${RFP_COLUMNS}
      FROM rfps
      WHERE id = $1 AND user_id = $2
      LIMIT 1
      `,
      [id, userId]
    );
    return rows[0] ?? null;
  }

  async saveDraft(
    id: number,
    userId: number,
    draftText: string
  ): Promise<RfpRow | null> {
    const { rows } = await this.pool.query<RfpRow>(
      `
      UPDATE rfps
      SET
        draft_text = $3,
        updated_at = now()
      WHERE id = $1 AND user_id = $2
      RETURNING ${RFP_COLUMNS}
      `,
      [id, userId, draftText]
    );
    return rows[0] ?? null;
  }

  async update(
    id: number,
    userId: number,
    fields: RfpUpdate
  ): Promise<RfpRow | null> {
    const { rows } = await this.pool.query<RfpRow>(
      `
      UPDATE rfps
      SET
        draft_text = $3,
        company_name = $4,
        document_type = $5,
        submission_date = $6::date,
        updated_at = now()
      WHERE id = $1 AND user_id = $2
      RETURNING ${RFP_COLUMNS}
      `,
      [
        id,
        userId,
        fields.draft_text,
        fields.company_name,
        fields.document_type,
        fields.submission_date,
      ]
    );
    return rows[0] ?? null;
  }
}
