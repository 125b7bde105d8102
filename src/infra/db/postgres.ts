import { Pool } from "pg";
import { describeError } from "../../domain/errors.js";

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
}

/** The part of `pg.PoolClient` a transaction needs. */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(error?: Error | boolean): void;
}

/**
 * Runs `work` between BEGIN and COMMIT on a pooled connection. The error from
 * `work` is always the one rethrown; when ROLLBACK fails as well, the
 * connection is destroyed instead of returned to the pool.
 */
export async function withTransaction<C extends TransactionClient, T>(
  connect: () => Promise<C>,
  work: (client: C) => Promise<T>,
): Promise<T> {
  const client = await connect();
  let brokenConnection: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      brokenConnection =
        rollbackError instanceof Error ? rollbackError : new Error(describeError(rollbackError));
    }
    throw error;
  } finally {
    client.release(brokenConnection);
  }
}
