import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { resolveDatabaseConfig } from './config/server';
import { logEvent } from './lib/logger';

const databaseConfig = resolveDatabaseConfig();

export const pool = new Pool({
  connectionString: databaseConfig.connectionString,
  max: databaseConfig.poolMax
});

pool.on('error', (err) => {
  logEvent('error', 'db_pool_error', { message: err.message });
});

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return pool.query<T>(text, params);
}

export async function withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
