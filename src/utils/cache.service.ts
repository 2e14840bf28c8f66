import type { ZodType, ZodTypeDef } from 'zod';
import type { CacheClient } from '../connections/redis/cache.client';
import { UpstreamUnavailableError } from './errors';
import { logger, errorMessage } from './logging';

export const cacheKeys = {
  userGeneration: (userId: string) => `user:${userId}:gen`,
  user: (userId: string, generation: number) => `user:${userId}:${generation}`,
  contactsGeneration: (userId: string) => `contacts:${userId}:gen`,
  contactsPage: (userId: string, generation: number, page: number, limit: number) =>
    `contacts:${userId}:list:${generation}:${page}:${limit}`,
};

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

/**
 * JSON cache in front of the database. Reads never fail the request: a Redis
 * error or an unparseable entry counts as a miss. Invalidations are writes and
 * surface as UpstreamUnavailableError so a stale entry is never left silently.
 */
export class CacheService {
  constructor(private readonly client: CacheClient) {}

  async get<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (error) {
      logger.warn('[Cache] Read failed, falling back to store', { key, error: errorMessage(error) });
      return null;
    }

    if (raw === null) return null;

    const parsed = schema.safeParse(parseJson(raw));
    if (parsed.success) return parsed.data;

    logger.warn('[Cache] Discarding malformed entry', { key });
    await this.client.del(key).catch((error: unknown) => {
      logger.warn('[Cache] Failed to discard malformed entry', { key, error: errorMessage(error) });
    });
    return null;
  }

  /**
   * Populate an entry after a store read. Best-effort.
   */
  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.client.set(key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      logger.warn('[Cache] Write failed', { key, error: errorMessage(error) });
    }
  }

  async invalidate(...keys: string[]): Promise<void> {
    try {
      await this.client.del(...keys);
    } catch (error) {
      logger.error('[Cache] Invalidation failed', { keys, error: errorMessage(error) });
      throw new UpstreamUnavailableError('Cache');
    }
  }

  /**
   * Current generation of a key family, or null when the cache is unreachable
   */
  async getGeneration(key: string): Promise<number | null> {
    try {
      const raw = await this.client.get(key);
      const generation = raw === null ? 0 : Number.parseInt(raw, 10);
      return Number.isNaN(generation) ? 0 : generation;
    } catch (error) {
      logger.warn('[Cache] Generation read failed', { key, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Orphan every entry built on the previous generation
   */
  async bumpGeneration(key: string): Promise<void> {
    try {
      await this.client.incr(key);
    } catch (error) {
      logger.error('[Cache] Generation bump failed', { key, error: errorMessage(error) });
      throw new UpstreamUnavailableError('Cache');
    }
  }
}
