import { Pool, types } from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger, errorMessage } from '../../utils/logging';

// DATE stays a 'YYYY-MM-DD' string instead of a local-midnight Date
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

/**
 * The slice of a pg Pool / PoolClient the repositories use
 */
export interface DatabaseClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface Database extends DatabaseClient {
  connect(): Promise<DatabaseClient & { release(): void }>;
}

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
});

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: errorMessage(err) });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
        error: errorMessage(err),
      });
      await new Promise(resolve => setTimeout(resolve, retryDelay));
    }
  }
};

/**
 * Run `work` inside BEGIN/COMMIT on a single pooled client, rolling back on any error
 */
export const withTransaction = async <T>(
  db: Database,
  work: (client: DatabaseClient) => Promise<T>
): Promise<T> => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('Transaction rollback failed', { error: errorMessage(rollbackError) });
    });
    throw error;
  } finally {
    client.release();
  }
};

export const closeDatabase = async (): Promise<void> => {
  await pool.end();
};

/**
 * Postgres unique_violation (SQLSTATE 23505)
 */
export const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
