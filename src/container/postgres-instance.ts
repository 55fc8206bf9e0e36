import { describeError, PIPELINE_ERROR_CODES, toPipelineError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import type { PostgresConnectionSettings } from '../core/execution/executors/postgres-executor.js';
import { toImageTag } from '../dump/server-version.js';
import type { ContainerRuntime } from './docker-runtime.js';

/** Port the server listens on inside the container. */
export const POSTGRES_CONTAINER_PORT = 5432;

export type InstanceSettings = {
  /** Image repository, tagged with the dump's server version. */
  image: string;
  version: string;
  user: string;
  password: string;
  database: string;
  /** Host port the container port is published on. */
  port: number;
};

export interface PostgresInstance {
  readonly id: string;
  readonly image: string;
  readonly settings: InstanceSettings;
  /** Where the query side connects from the host. */
  readonly connection: PostgresConnectionSettings;

  /** Stops then removes the container. Idempotent. */
  release(): Promise<void>;
}

export const imageReference = (settings: Pick<InstanceSettings, 'image' | 'version'>): string =>
  `${settings.image}:${toImageTag(settings.version)}`;

/**
 * Starts a disposable PostgreSQL container. The caller owns the returned instance
 * and MUST release it.
 */
export async function provisionPostgresInstance(
  runtime: ContainerRuntime,
  settings: InstanceSettings,
  logger: Logger
): Promise<PostgresInstance> {
  const image = imageReference(settings);
  const id = await runtime.run({
    image,
    env: {
      POSTGRES_USER: settings.user,
      POSTGRES_DB: settings.database,
      POSTGRES_PASSWORD: settings.password,
    },
    ports: { [POSTGRES_CONTAINER_PORT]: settings.port },
  });
  logger.info(`Launched PostgreSQL container ${id} (${image})`);

  let released = false;
  return {
    id,
    image,
    settings,
    connection: {
      host: 'localhost',
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
    },
    release: async () => {
      if (released) return;
      released = true;

      let failure: unknown = null;
      logger.info(`Stopping PostgreSQL container ${id}`);
      try {
        await runtime.stop(id);
        logger.info(`Stopped PostgreSQL container ${id}`);
      } catch (error) {
        failure = error;
      }

      logger.info(`Removing PostgreSQL container ${id}`);
      try {
        await runtime.remove(id);
      } catch (error) {
        failure ??= error;
      }

      if (failure !== null) {
        throw toPipelineError(failure, PIPELINE_ERROR_CODES.CLEANUP_FAILED, `Failed to clean up container ${id}`);
      }
    },
  };
}

/**
 * Runs `action` against a fresh instance and releases it on every exit path.
 * Nothing is released when provisioning itself fails.
 */
export async function withPostgresInstance<T>(
  runtime: ContainerRuntime,
  settings: InstanceSettings,
  logger: Logger,
  action: (instance: PostgresInstance) => Promise<T>
): Promise<T> {
  const instance = await provisionPostgresInstance(runtime, settings, logger).catch((error: unknown) => {
    throw toPipelineError(error, PIPELINE_ERROR_CODES.PROVISION_FAILED, `Failed to start ${imageReference(settings)}`);
  });

  let result: T;
  try {
    result = await action(instance);
  } catch (error) {
    try {
      await instance.release();
    } catch (cleanupError) {
      // The stage failure is what gets reported.
      logger.error(describeError(cleanupError));
    }
    throw error;
  }

  await instance.release();
  return result;
}
