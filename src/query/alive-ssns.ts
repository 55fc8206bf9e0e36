import { readColumn, type DbExecutor } from '../core/execution/db-executor.js';
import {
  createPostgresExecutor,
  type PostgresClientLike,
  type PostgresConnectionSettings,
  type PostgresConnector
} from '../core/execution/executors/postgres-executor.js';
import { createQueryLoggingExecutor, debugQueryLogger } from '../core/execution/query-logger.js';
import { PIPELINE_ERROR_CODES, toPipelineError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';

export const ALIVE_SSNS_SQL = "select ssn from public.criminal_records where status='alive'";

/**
 * Body of the solve request.
 */
export type AliveSsnsPayload = {
  alive_ssns: string[];
};

/**
 * Collects the SSNs of every living record, in the order the server returns them.
 */
export async function queryAliveSsns(executor: DbExecutor): Promise<AliveSsnsPayload> {
  try {
    const results = await executor.executeSql(ALIVE_SSNS_SQL);
    const ssns = readColumn(results, 'ssn')
      .filter(value => value !== null && value !== undefined)
      .map(value => String(value));
    return { alive_ssns: ssns };
  } catch (error) {
    throw toPipelineError(error, PIPELINE_ERROR_CODES.QUERY_FAILED, 'Error while fetching data from PostgreSQL');
  }
}

export interface AliveSsnsQueryOptions {
  connect: PostgresConnector;
  settings: PostgresConnectionSettings;
  logger: Logger;
}

/**
 * Opens a connection to the restored database, runs the query and always closes the connection.
 */
export async function fetchAliveSsns(options: AliveSsnsQueryOptions): Promise<AliveSsnsPayload> {
  const { connect, settings, logger } = options;

  let client: PostgresClientLike;
  try {
    client = await connect(settings);
  } catch (error) {
    throw toPipelineError(
      error,
      PIPELINE_ERROR_CODES.QUERY_FAILED,
      `Could not connect to PostgreSQL at ${settings.host}:${settings.port}`
    );
  }

  const executor = createQueryLoggingExecutor(createPostgresExecutor(client), debugQueryLogger(logger));
  try {
    return await queryAliveSsns(executor);
  } finally {
    await executor.dispose();
    logger.debug('PostgreSQL connection is closed');
  }
}
