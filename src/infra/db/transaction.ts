import type { Pool, PoolClient } from 'pg';

/** The part of a pg client a transaction needs. */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Run `work` on one pooled client inside BEGIN/COMMIT.
 */
export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  return runTransaction(await pool.connect(), work);
}

/**
 * Any error rolls back and is rethrown. A client whose ROLLBACK fails is
 * released with that error so the pool discards it; the caller still sees
 * the error that aborted the work.
 */
export async function runTransaction<C extends TransactionClient, T>(
  client: C,
  work: (client: C) => Promise<T>
): Promise<T> {
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
      releaseError =
        rollbackError instanceof Error ? rollbackError : new Error('ROLLBACK failed');
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
}

/**
 * Postgres unique_violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === '23505'
  );
}
