import { Pool, type PoolClient, type QueryResultRow } from "pg";

declare global {
  var linkshelfPool: Pool | undefined;
}

export const pool =
  globalThis.linkshelfPool ??
  new Pool({ connectionString: process.env.DATABASE_URL });

if (process.env.NODE_ENV !== "production") {
  globalThis.linkshelfPool = pool;
}

export const query = <Row extends QueryResultRow>(text: string, values: unknown[] = []) =>
  pool.query<Row>(text, values);

/** Runs `work` inside BEGIN/COMMIT, rolling back when it throws. */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK").catch((rollbackError: unknown) => {
      console.error("Failed to roll back transaction", rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
}
