import { Pool } from "pg";

export type QueryOutcome = {
  rowCount: number | null;
};

export type TransactionClient = {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
  release(): void;
};

export type ConnectionPool = {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
};

export const createPool = (connectionString: string, max = 5): Pool =>
  new Pool({
    connectionString,
    max
  });

export const withTransaction = async <T>(
  pool: ConnectionPool,
  fn: (client: TransactionClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
};
