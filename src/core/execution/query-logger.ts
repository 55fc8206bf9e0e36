import type { DbExecutor } from './db-executor.js';
import type { Logger } from '../logging/logger.js';

/**
 * Represents a single SQL query log entry
 */
export interface QueryLogEntry {
  /** The SQL query that was executed */
  sql: string;
  /** Parameters used in the query */
  params?: unknown[];
  /** Rows returned by the first result set */
  rowCount?: number;
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Adapts a Logger into a QueryLogger that reports at debug level.
 */
export const debugQueryLogger = (logger: Logger): QueryLogger => entry => {
  if (entry.rowCount === undefined) {
    logger.debug(`SQL: ${entry.sql}`);
    return;
  }
  logger.debug(`SQL returned ${entry.rowCount} row(s): ${entry.sql}`);
};

/**
 * Creates a wrapped database executor that logs all SQL queries
 * @param executor - Original database executor to wrap
 * @param logger - Receives the query log entries
 * @returns Wrapped executor that logs queries before and after execution
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger: QueryLogger
): DbExecutor => {
  const wrapped: DbExecutor = {
    async executeSql(sql, params) {
      logger({ sql, params });
      const results = await executor.executeSql(sql, params);
      logger({ sql, params, rowCount: results[0]?.values.length ?? 0 });
      return results;
    },
    dispose: () => executor.dispose(),
  };

  return wrapped;
};
