import { isUniqueViolation, withTransaction } from '../../connections/db/connection';
import type { Database, DatabaseClient } from '../../connections/db/connection';
import type { User, CreateUserInput } from '../../connections/db/models/user.model';
import type { CreateAuthTokenInput, StoredTokenPurpose } from '../../connections/db/models/auth-token.model';
import { ConflictError } from '../../utils/errors';

export type NewUser = CreateUserInput & { id: string };

export type NewToken = Omit<CreateAuthTokenInput, 'user_id'>;

/**
 * Credential store: user records plus the issued refresh / verify-email /
 * reset-password token records that make those tokens revocable and single-use.
 * Every multi-row change runs in one transaction or one statement.
 */
export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Inserts the user together with its first verify-email token. Throws EMAIL_TAKEN on a duplicate email. */
  createWithToken(user: NewUser, token: NewToken): Promise<User>;
  updateAvatar(userId: string, avatarUrl: string): Promise<User | null>;
  saveToken(token: CreateAuthTokenInput): Promise<void>;
  /** Revokes every unused token of `purpose` for the user and records `token` in its place */
  replaceToken(token: CreateAuthTokenInput): Promise<void>;
  revokeToken(jti: string, purpose: StoredTokenPurpose): Promise<boolean>;
  revokeTokens(userId: string, purpose: StoredTokenPurpose): Promise<number>;
  /** Redeems a verify-email token and activates its user. Null when the token is unknown, used, revoked or expired. */
  verifyEmailWithToken(jti: string, userId: string): Promise<User | null>;
  /** Marks `oldJti` used and records `next`. False when `oldJti` was not redeemable. */
  rotateRefreshToken(oldJti: string, next: CreateAuthTokenInput): Promise<boolean>;
  /**
   * Redeems a reset-password token, replaces the hash, bumps token_version and
   * revokes every refresh token of the user. Null when the token is not redeemable.
   */
  resetPasswordWithToken(jti: string, userId: string, passwordHash: string): Promise<User | null>;
}

const USER_COLUMNS = `id, email, password_hash, name, role, is_verified, avatar_url, token_version, created_at, updated_at`;

const REDEEM_TOKEN_SQL = `
  UPDATE auth_tokens SET is_used = TRUE, used_at = NOW()
  WHERE id = $1 AND user_id = $2 AND purpose = $3 AND is_used = FALSE AND expires_at > NOW()
  RETURNING user_id
`;

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<User>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`,
      [email]
    );
    return result.rows[0] ?? null;
  }

  async createWithToken(user: NewUser, token: NewToken): Promise<User> {
    try {
      return await withTransaction(this.db, async client => {
        const result = await client.query<User>(
          `INSERT INTO users (id, email, password_hash, name, role, is_verified)
           VALUES ($1, LOWER($2), $3, $4, $5, FALSE)
           RETURNING ${USER_COLUMNS}`,
          [user.id, user.email, user.password_hash, user.name, user.role ?? 'user']
        );
        await this.insertToken(client, { ...token, user_id: user.id });
        return result.rows[0];
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists', 'EMAIL_TAKEN');
      }
      throw error;
    }
  }

  async updateAvatar(userId: string, avatarUrl: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `UPDATE users SET avatar_url = $2, updated_at = NOW() WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [userId, avatarUrl]
    );
    return result.rows[0] ?? null;
  }

  async saveToken(token: CreateAuthTokenInput): Promise<void> {
    await this.insertToken(this.db, token);
  }

  async replaceToken(token: CreateAuthTokenInput): Promise<void> {
    await withTransaction(this.db, async client => {
      await client.query(
        `UPDATE auth_tokens SET is_used = TRUE, used_at = NOW()
         WHERE user_id = $1 AND purpose = $2 AND is_used = FALSE`,
        [token.user_id, token.purpose]
      );
      await this.insertToken(client, token);
    });
  }

  async revokeToken(jti: string, purpose: StoredTokenPurpose): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE auth_tokens SET is_used = TRUE, used_at = NOW()
       WHERE id = $1 AND purpose = $2 AND is_used = FALSE`,
      [jti, purpose]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async revokeTokens(userId: string, purpose: StoredTokenPurpose): Promise<number> {
    const result = await this.db.query(
      `UPDATE auth_tokens SET is_used = TRUE, used_at = NOW()
       WHERE user_id = $1 AND purpose = $2 AND is_used = FALSE`,
      [userId, purpose]
    );
    return result.rowCount ?? 0;
  }

  async verifyEmailWithToken(jti: string, userId: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `WITH redeemed AS (${REDEEM_TOKEN_SQL})
       UPDATE users SET is_verified = TRUE, updated_at = NOW()
       FROM redeemed
       WHERE users.id = redeemed.user_id
       RETURNING ${USER_COLUMNS.split(', ').map(column => `users.${column}`).join(', ')}`,
      [jti, userId, 'verify-email']
    );
    return result.rows[0] ?? null;
  }

  async rotateRefreshToken(oldJti: string, next: CreateAuthTokenInput): Promise<boolean> {
    return withTransaction(this.db, async client => {
      const redeemed = await client.query(REDEEM_TOKEN_SQL, [oldJti, next.user_id, 'refresh']);
      if (redeemed.rows.length === 0) {
        return false;
      }
      await this.insertToken(client, next);
      return true;
    });
  }

  async resetPasswordWithToken(jti: string, userId: string, passwordHash: string): Promise<User | null> {
    return withTransaction(this.db, async client => {
      const redeemed = await client.query(REDEEM_TOKEN_SQL, [jti, userId, 'reset-password']);
      if (redeemed.rows.length === 0) {
        return null;
      }

      const result = await client.query<User>(
        `UPDATE users
         SET password_hash = $2, token_version = token_version + 1, updated_at = NOW()
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [userId, passwordHash]
      );

      await client.query(
        `UPDATE auth_tokens SET is_used = TRUE, used_at = NOW()
         WHERE user_id = $1 AND purpose IN ('refresh', 'reset-password') AND is_used = FALSE`,
        [userId]
      );

      return result.rows[0] ?? null;
    });
  }

  private async insertToken(db: DatabaseClient, token: CreateAuthTokenInput): Promise<void> {
    await db.query(
      `INSERT INTO auth_tokens (id, user_id, purpose, expires_at) VALUES ($1, $2, $3, $4)`,
      [token.id, token.user_id, token.purpose, token.expires_at]
    );
  }
}
