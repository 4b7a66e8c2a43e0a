import { Pool, type PoolClient } from "pg";

export interface PostgresConfig {
  connectionString: string;
  max?: number;
}

export function createPostgresPool(config: PostgresConfig): Pool {
  return new Pool({
    connectionString: config.connectionString,
    max: config.max ?? 10,
  });
}

export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
