import { withTransaction, type ConnectionPool } from "./client";

export type InsertableRow = Readonly<Record<string, string | number | boolean | null>>;

/** Raised for inserts that cannot succeed however often they are retried. */
export class StatementError extends Error {
  constructor(message = "Invalid insert statement") {
    super(message);
    this.name = "StatementError";
  }
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const quoteIdentifier = (name: string): string => {
  const parts = name.split(".");
  for (const part of parts) {
    if (!IDENTIFIER_PATTERN.test(part)) {
      throw new StatementError(`Invalid SQL identifier: ${name}`);
    }
  }
  return parts.map((part) => `"${part}"`).join(".");
};

/**
 * Builds one multi-row parameterized INSERT. Every row must carry the columns of
 * the first row; missing values are sent as NULL.
 */
export const buildInsertStatement = (
  table: string,
  rows: readonly InsertableRow[]
): { text: string; values: unknown[] } => {
  if (rows.length === 0) {
    throw new StatementError("Cannot build an insert without rows.");
  }
  const columns = Object.keys(rows[0]);
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = columns.map((column) => {
      values.push(row[column] ?? null);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  return {
    text: `INSERT INTO ${quoteIdentifier(table)} (${columns
      .map(quoteIdentifier)
      .join(", ")}) VALUES ${tuples.join(", ")}`,
    values
  };
};

export const createPgRowSink = (
  pool: ConnectionPool,
  { batchSize = 500 }: { batchSize?: number } = {}
) => ({
  insertRows: async (table: string, rows: readonly InsertableRow[]): Promise<number> => {
    if (rows.length === 0) {
      return 0;
    }
    return withTransaction(pool, async (client) => {
      let inserted = 0;
      for (let start = 0; start < rows.length; start += batchSize) {
        const statement = buildInsertStatement(table, rows.slice(start, start + batchSize));
        const result = await client.query(statement.text, statement.values);
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    });
  }
});
