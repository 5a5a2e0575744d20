import pg from 'pg';
import { defaultLogger, Logger } from '../services/logger.js';

const { Pool } = pg;

/**
 * Minimal query surface the repositories depend on
 */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>>;
}

export interface Database extends Queryable {
  transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string, logger: Logger = defaultLogger): Database {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle client', { error: err.message });
  });

  return {
    async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
      text: string,
      params?: unknown[]
    ): Promise<pg.QueryResult<T>> {
      const start = Date.now();
      const result = await pool.query<T>(text, params);
      logger.debug('Executed query', { text, durationMs: Date.now() - start, rows: result.rowCount });
      return result;
    },

    async transaction<T>(callback: (client: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      const scoped: Queryable = {
        query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
          client.query<T>(text, params),
      };
      try {
        await client.query('BEGIN');
        const result = await callback(scoped);
        await client.query('COMMIT');
        return result;
      } catch (e) {
        await client.query('ROLLBACK');
        throw e;
      } finally {
        client.release();
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
