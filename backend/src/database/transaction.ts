import { TransactionError, isBackendUnavailable } from '../errors';
import { DatabaseClient, DatabasePool } from './pool';

/**
 * Run `work` on one pooled client between BEGIN and COMMIT.
 *
 * Any failure after BEGIN rolls the whole scope back and surfaces as a
 * TransactionError, except a lost connection, which is rethrown as is so
 * callers can tell the store is unavailable. Failing to acquire a client
 * propagates unchanged, since nothing was started. The client is released
 * on every path.
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  label: string,
  work: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let releaseError: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      // A connection that cannot roll back must not go back to the pool
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      console.error(`❌ Rollback failed for ${label}:`, rollbackError);
    }
    if (isBackendUnavailable(error)) {
      throw error;
    }
    throw new TransactionError(`${label} failed and was rolled back`, error);
  } finally {
    client.release(releaseError);
  }
}
