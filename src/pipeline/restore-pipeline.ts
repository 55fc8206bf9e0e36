import { ChallengeClient } from '../challenge/challenge-client.js';
import type { RunConfig } from '../config/run-config.js';
import { DockerCliRuntime, type ContainerRuntime } from '../container/docker-runtime.js';
import { withPostgresInstance, type InstanceSettings } from '../container/postgres-instance.js';
import { postgresProbe, sleep as defaultSleep, waitForReady, type ReadinessProbe, type Sleep } from '../container/readiness.js';
import { PIPELINE_ERROR_CODES, toPipelineError, type PipelineError } from '../core/errors.js';
import {
  connectPostgres,
  type PostgresConnectionSettings,
  type PostgresConnector
} from '../core/execution/executors/postgres-executor.js';
import type { Logger } from '../core/logging/logger.js';
import { decodeDump } from '../dump/dump-decoder.js';
import { extractServerVersion } from '../dump/server-version.js';
import { fetchAliveSsns, type AliveSsnsPayload } from '../query/alive-ssns.js';
import { restoreDump } from '../restore/dump-restorer.js';

/**
 * The two HTTP calls of the challenge.
 */
export interface ChallengeApi {
  fetchDump(accessToken: string): Promise<string>;
  submitSolution(accessToken: string, payload: AliveSsnsPayload): Promise<string>;
}

export interface PipelineDeps {
  logger: Logger;
  challenge?: ChallengeApi;
  runtime?: ContainerRuntime;
  connect?: PostgresConnector;
  /** Overrides the connection-based readiness probe. */
  probe?: (connection: PostgresConnectionSettings) => ReadinessProbe;
  sleep?: Sleep;
}

export type PipelineOutcome =
  | { ok: true; version: string; payload: AliveSsnsPayload; response: string }
  /** `response` is set when the answer was submitted before a later step failed. */
  | { ok: false; error: PipelineError; response?: string };

export const instanceSettingsFor = (config: RunConfig, version: string): InstanceSettings => ({
  image: config.image,
  version,
  user: config.user,
  password: config.password,
  database: config.database,
  port: config.port,
});

/**
 * fetch -> decode -> version -> provision -> ready -> restore -> query -> submit,
 * with the container released on every path once it exists.
 */
export async function runRestorePipeline(config: RunConfig, deps: PipelineDeps): Promise<PipelineOutcome> {
  const { logger } = deps;
  const challenge = deps.challenge ?? new ChallengeClient({
    baseUrl: config.baseUrl,
    playground: config.playground,
    logger,
  });
  const runtime = deps.runtime ?? new DockerCliRuntime({ bin: config.dockerBin });
  const connect = deps.connect ?? connectPostgres;
  const makeProbe = deps.probe ?? ((connection: PostgresConnectionSettings) => postgresProbe(connect, connection));
  let submitted: string | undefined;

  try {
    const encoded = await challenge.fetchDump(config.accessToken);

    logger.info('Decompressing and decoding dump');
    const dumpText = decodeDump(encoded);
    const version = extractServerVersion(dumpText);
    logger.info(`Dump was taken from PostgreSQL ${version}`);

    return await withPostgresInstance(runtime, instanceSettingsFor(config, version), logger, async instance => {
      const attempts = await waitForReady(makeProbe(instance.connection), {
        attempts: config.readyAttempts,
        sleep: deps.sleep ?? defaultSleep,
        logger,
      });
      logger.debug(`PostgreSQL container ${instance.id} ready after ${attempts} attempt(s)`);

      await restoreDump(runtime, instance, dumpText, logger);

      const payload = await fetchAliveSsns({ connect, settings: instance.connection, logger });
      logger.info(JSON.stringify(payload));

      const response = await challenge.submitSolution(config.accessToken, payload);
      submitted = response;
      return { ok: true as const, version, payload, response };
    });
  } catch (error) {
    return {
      ok: false,
      error: toPipelineError(error, PIPELINE_ERROR_CODES.UNEXPECTED, 'Unexpected failure'),
      response: submitted,
    };
  }
}
