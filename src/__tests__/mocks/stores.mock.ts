/**
 * In-memory stand-ins for the Postgres repositories. They mirror the SQL:
 * case-insensitive unique emails, owner scoping, single-use token redemption.
 */

import { v4 as uuidv4 } from 'uuid';
import type { AuthToken, CreateAuthTokenInput, StoredTokenPurpose } from '../../connections/db/models/auth-token.model';
import type { ContactRow, CreateContactInput, UpdateContactInput } from '../../connections/db/models/contact.model';
import type { User } from '../../connections/db/models/user.model';
import type { NewToken, NewUser, UserRepository } from '../../modules/auth/auth.repository';
import type { ContactRepository } from '../../modules/contacts/contacts.repository';
import type { PaginationQuery, SearchQuery } from '../../types/request.types';
import type { PaginatedResult } from '../../types/response.types';
import { ConflictError } from '../../utils/errors';

export class InMemoryUserRepository implements UserRepository {
  readonly users: Map<string, User> = new Map();
  readonly tokens: Map<string, AuthToken> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const user = [...this.users.values()].find(candidate => candidate.email === email.toLowerCase());
    return user ? { ...user } : null;
  }

  async createWithToken(input: NewUser, token: NewToken): Promise<User> {
    if (await this.findByEmail(input.email)) {
      throw new ConflictError('User with this email already exists', 'EMAIL_TAKEN');
    }

    const now = this.now();
    const user: User = {
      id: input.id,
      email: input.email.toLowerCase(),
      password_hash: input.password_hash,
      name: input.name,
      role: input.role ?? 'user',
      is_verified: false,
      avatar_url: null,
      token_version: 0,
      created_at: now,
      updated_at: now,
    };
    this.users.set(user.id, user);
    this.insertToken({ ...token, user_id: user.id });
    return { ...user };
  }

  async updateAvatar(userId: string, avatarUrl: string): Promise<User | null> {
    return this.patchUser(userId, { avatar_url: avatarUrl });
  }

  async saveToken(token: CreateAuthTokenInput): Promise<void> {
    this.insertToken(token);
  }

  async replaceToken(token: CreateAuthTokenInput): Promise<void> {
    await this.revokeTokens(token.user_id, token.purpose);
    this.insertToken(token);
  }

  async revokeToken(jti: string, purpose: StoredTokenPurpose): Promise<boolean> {
    const token = this.tokens.get(jti);
    if (!token || token.purpose !== purpose || token.is_used) return false;
    this.markUsed(token);
    return true;
  }

  async revokeTokens(userId: string, purpose: StoredTokenPurpose): Promise<number> {
    let count = 0;
    for (const token of this.tokens.values()) {
      if (token.user_id === userId && token.purpose === purpose && !token.is_used) {
        this.markUsed(token);
        count++;
      }
    }
    return count;
  }

  async verifyEmailWithToken(jti: string, userId: string): Promise<User | null> {
    if (!this.redeem(jti, userId, 'verify-email')) return null;
    return this.patchUser(userId, { is_verified: true });
  }

  async rotateRefreshToken(oldJti: string, next: CreateAuthTokenInput): Promise<boolean> {
    if (!this.redeem(oldJti, next.user_id, 'refresh')) return false;
    this.insertToken(next);
    return true;
  }

  async resetPasswordWithToken(jti: string, userId: string, passwordHash: string): Promise<User | null> {
    if (!this.redeem(jti, userId, 'reset-password')) return null;

    const current = this.users.get(userId);
    if (!current) return null;

    const user = this.patchUser(userId, {
      password_hash: passwordHash,
      token_version: current.token_version + 1,
    });
    await this.revokeTokens(userId, 'refresh');
    await this.revokeTokens(userId, 'reset-password');
    return user;
  }

  tokensOf(userId: string, purpose: StoredTokenPurpose): AuthToken[] {
    return [...this.tokens.values()].filter(token => token.user_id === userId && token.purpose === purpose);
  }

  private redeem(jti: string, userId: string, purpose: StoredTokenPurpose): boolean {
    const token = this.tokens.get(jti);
    if (
      !token ||
      token.user_id !== userId ||
      token.purpose !== purpose ||
      token.is_used ||
      token.expires_at.getTime() <= this.now().getTime()
    ) {
      return false;
    }
    this.markUsed(token);
    return true;
  }

  private markUsed(token: AuthToken): void {
    token.is_used = true;
    token.used_at = this.now();
  }

  private insertToken(input: CreateAuthTokenInput): void {
    this.tokens.set(input.id, { ...input, is_used: false, used_at: null, created_at: this.now() });
  }

  private patchUser(userId: string, patch: Partial<User>): User | null {
    const current = this.users.get(userId);
    if (!current) return null;
    const updated: User = { ...current, ...patch, updated_at: this.now() };
    this.users.set(userId, updated);
    return { ...updated };
  }
}

const byCreation = (a: ContactRow, b: ContactRow): number =>
  a.created_at.getTime() - b.created_at.getTime() || a.id.localeCompare(b.id);

const paginate = <T>(rows: T[], { page, limit }: PaginationQuery): PaginatedResult<T> => ({
  items: rows.slice((page - 1) * limit, page * limit),
  total: rows.length,
});

export class InMemoryContactRepository implements ContactRepository {
  readonly rows: Map<string, ContactRow> = new Map();
  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(userId: string, input: CreateContactInput): Promise<ContactRow> {
    this.assertEmailFree(userId, input.email);

    // strictly increasing timestamps keep insertion order under a frozen clock
    const createdAt = new Date(this.now().getTime() + this.sequence++);
    const row: ContactRow = {
      id: uuidv4(),
      user_id: userId,
      first_name: input.first_name,
      last_name: input.last_name,
      email: input.email,
      phone: input.phone ?? null,
      birth_date: input.birth_date,
      notes: input.notes ?? null,
      created_at: createdAt,
      updated_at: createdAt,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(userId: string, id: string): Promise<ContactRow | null> {
    const row = this.rows.get(id);
    return row && row.user_id === userId ? { ...row } : null;
  }

  async update(userId: string, id: string, input: UpdateContactInput): Promise<ContactRow | null> {
    const current = this.rows.get(id);
    if (!current || current.user_id !== userId) return null;
    if (input.email !== undefined) {
      this.assertEmailFree(userId, input.email, id);
    }

    const updated: ContactRow = { ...current, updated_at: this.now() };
    if (input.first_name !== undefined) updated.first_name = input.first_name;
    if (input.last_name !== undefined) updated.last_name = input.last_name;
    if (input.email !== undefined) updated.email = input.email;
    if (input.phone !== undefined) updated.phone = input.phone;
    if (input.birth_date !== undefined) updated.birth_date = input.birth_date;
    if (input.notes !== undefined) updated.notes = input.notes;

    this.rows.set(id, updated);
    return { ...updated };
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const current = this.rows.get(id);
    if (!current || current.user_id !== userId) return false;
    return this.rows.delete(id);
  }

  async list(userId: string, query: PaginationQuery): Promise<PaginatedResult<ContactRow>> {
    return paginate(this.owned(userId), query);
  }

  async search(userId: string, query: SearchQuery): Promise<PaginatedResult<ContactRow>> {
    const needle = query.q.toLowerCase();
    const matches = this.owned(userId).filter(row =>
      [row.first_name, row.last_name, row.email].some(value => value.toLowerCase().includes(needle))
    );
    return paginate(matches, query);
  }

  async findByBirthdayKeys(userId: string, keys: string[]): Promise<ContactRow[]> {
    return this.owned(userId).filter(row => keys.includes(row.birth_date.slice(5)));
  }

  private owned(userId: string): ContactRow[] {
    return [...this.rows.values()]
      .filter(row => row.user_id === userId)
      .sort(byCreation)
      .map(row => ({ ...row }));
  }

  private assertEmailFree(userId: string, email: string, exceptId?: string): void {
    const taken = [...this.rows.values()].some(
      row => row.user_id === userId && row.id !== exceptId && row.email.toLowerCase() === email.toLowerCase()
    );
    if (taken) {
      throw new ConflictError('Contact with this email already exists');
    }
  }
}
