import { isUniqueViolation } from '../../connections/db/connection';
import type { Database } from '../../connections/db/connection';
import type { ContactRow, CreateContactInput, UpdateContactInput } from '../../connections/db/models/contact.model';
import type { PaginationQuery, SearchQuery } from '../../types/request.types';
import type { PaginatedResult } from '../../types/response.types';
import { ConflictError } from '../../utils/errors';

/**
 * Owner-scoped contact persistence. A contact owned by someone else behaves
 * exactly like a missing one.
 */
export interface ContactRepository {
  create(userId: string, input: CreateContactInput): Promise<ContactRow>;
  findById(userId: string, id: string): Promise<ContactRow | null>;
  update(userId: string, id: string, input: UpdateContactInput): Promise<ContactRow | null>;
  delete(userId: string, id: string): Promise<boolean>;
  list(userId: string, query: PaginationQuery): Promise<PaginatedResult<ContactRow>>;
  search(userId: string, query: SearchQuery): Promise<PaginatedResult<ContactRow>>;
  /** Contacts whose birth_date month-day is one of `keys` (`MM-DD`) */
  findByBirthdayKeys(userId: string, keys: string[]): Promise<ContactRow[]>;
}

const CONTACT_COLUMNS =
  'id, user_id, first_name, last_name, email, phone, birth_date, notes, created_at, updated_at';

const UPDATABLE_COLUMNS = ['first_name', 'last_name', 'email', 'phone', 'birth_date', 'notes'] as const;

/**
 * Escape LIKE wildcards so the query matches literally
 */
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, match => `\\${match}`);

const duplicateEmail = () => new ConflictError('Contact with this email already exists');

export class PgContactRepository implements ContactRepository {
  constructor(private readonly db: Database) {}

  async create(userId: string, input: CreateContactInput): Promise<ContactRow> {
    try {
      const result = await this.db.query<ContactRow>(
        `INSERT INTO contacts (user_id, first_name, last_name, email, phone, birth_date, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${CONTACT_COLUMNS}`,
        [
          userId,
          input.first_name,
          input.last_name,
          input.email,
          input.phone ?? null,
          input.birth_date,
          input.notes ?? null,
        ]
      );
      return result.rows[0];
    } catch (error) {
      if (isUniqueViolation(error)) throw duplicateEmail();
      throw error;
    }
  }

  async findById(userId: string, id: string): Promise<ContactRow | null> {
    const result = await this.db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1 AND user_id = $2`,
      [id, userId]
    );
    return result.rows[0] ?? null;
  }

  async update(userId: string, id: string, input: UpdateContactInput): Promise<ContactRow | null> {
    const assignments: string[] = [];
    const values: unknown[] = [id, userId];

    for (const column of UPDATABLE_COLUMNS) {
      const value = input[column];
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }

    if (assignments.length === 0) {
      return this.findById(userId, id);
    }

    try {
      const result = await this.db.query<ContactRow>(
        `UPDATE contacts SET ${assignments.join(', ')}, updated_at = NOW()
         WHERE id = $1 AND user_id = $2
         RETURNING ${CONTACT_COLUMNS}`,
        values
      );
      return result.rows[0] ?? null;
    } catch (error) {
      if (isUniqueViolation(error)) throw duplicateEmail();
      throw error;
    }
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM contacts WHERE id = $1 AND user_id = $2', [id, userId]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(userId: string, { page, limit }: PaginationQuery): Promise<PaginatedResult<ContactRow>> {
    const [rows, count] = await Promise.all([
      this.db.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts
         WHERE user_id = $1
         ORDER BY created_at, id
         LIMIT $2 OFFSET $3`,
        [userId, limit, (page - 1) * limit]
      ),
      this.db.query<{ total: string }>('SELECT COUNT(*) AS total FROM contacts WHERE user_id = $1', [userId]),
    ]);

    return { items: rows.rows, total: Number.parseInt(count.rows[0]?.total ?? '0', 10) };
  }

  async search(userId: string, { q, page, limit }: SearchQuery): Promise<PaginatedResult<ContactRow>> {
    const pattern = `%${escapeLikePattern(q)}%`;
    const where = `user_id = $1 AND (first_name ILIKE $2 OR last_name ILIKE $2 OR email ILIKE $2)`;

    const [rows, count] = await Promise.all([
      this.db.query<ContactRow>(
        `SELECT ${CONTACT_COLUMNS} FROM contacts
         WHERE ${where}
         ORDER BY created_at, id
         LIMIT $3 OFFSET $4`,
        [userId, pattern, limit, (page - 1) * limit]
      ),
      this.db.query<{ total: string }>(`SELECT COUNT(*) AS total FROM contacts WHERE ${where}`, [userId, pattern]),
    ]);

    return { items: rows.rows, total: Number.parseInt(count.rows[0]?.total ?? '0', 10) };
  }

  async findByBirthdayKeys(userId: string, keys: string[]): Promise<ContactRow[]> {
    const result = await this.db.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts
       WHERE user_id = $1 AND to_char(birth_date, 'MM-DD') = ANY($2::text[])
       ORDER BY created_at, id`,
      [userId, keys]
    );
    return result.rows;
  }
}
