import { PIPELINE_ERROR_CODES, PipelineError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { POSTGRES_CONTAINER_PORT, type PostgresInstance } from '../container/postgres-instance.js';
import type { CommandResult } from '../container/command-runner.js';
import type { ContainerRuntime } from '../container/docker-runtime.js';

/**
 * psql invocation run inside the container; it talks to the server over the container's own loopback.
 */
export const psqlArgs = (database: string, user: string): string[] => [
  'psql',
  '-d', database,
  '-U', user,
  '-h', 'localhost',
  '-p', String(POSTGRES_CONTAINER_PORT),
];

/**
 * Feeds the plain-text dump to psql inside the instance.
 * @returns Combined psql output
 */
export async function restoreDump(
  runtime: ContainerRuntime,
  instance: PostgresInstance,
  dumpText: string,
  logger: Logger
): Promise<string> {
  logger.info(`Restoring PostgreSQL dump to ${instance.id}`);

  let result: CommandResult;
  try {
    result = await runtime.exec(
      instance.id,
      psqlArgs(instance.settings.database, instance.settings.user),
      { input: dumpText }
    );
  } catch (error) {
    throw new PipelineError(
      PIPELINE_ERROR_CODES.RESTORE_FAILED,
      `Failed to restore PostgreSQL dump to ${instance.id}: ${describeError(error)}`,
      { cause: error }
    );
  }

  if (result.code !== 0) {
    throw new PipelineError(
      PIPELINE_ERROR_CODES.RESTORE_FAILED,
      `Failed to restore PostgreSQL dump to ${instance.id} (psql exited with code ${result.code})`,
      { detail: result.output }
    );
  }

  logger.info(`Restored PostgreSQL dump to ${instance.id}`);
  return result.output;
}
