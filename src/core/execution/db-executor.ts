// src/core/execution/db-executor.ts

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;

  /** Closes the underlying connection. Idempotent. */
  dispose(): Promise<void>;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

/**
 * Reads one named column out of the first result set, in row order.
 * An empty result set yields an empty list regardless of the column name.
 */
export function readColumn(results: QueryResult[], column: string): unknown[] {
  const [first] = results;
  if (!first || first.values.length === 0) {
    return [];
  }

  const index = first.columns.indexOf(column);
  if (index < 0) {
    throw new Error(`Column "${column}" is not part of the result (got: ${first.columns.join(', ')})`);
  }
  return first.values.map(row => row[index]);
}

/**
 * Minimal contract that most SQL clients can implement.
 */
export interface SimpleQueryRunner {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  close?(): Promise<void>;
}

/**
 * Generic factory: turn any SimpleQueryRunner into a DbExecutor.
 */
export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  let disposed = false;

  return {
    async executeSql(sql, params) {
      if (disposed) {
        throw new Error('Executor has been disposed');
      }
      const rows = await runner.query(sql, params);
      const result = rowsToQueryResult(rows);
      return [result];
    },
    async dispose() {
      if (disposed) return;
      disposed = true;
      await runner.close?.();
    },
  };
}
