import { PIPELINE_ERROR_CODES, PipelineError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import type { PostgresConnectionSettings, PostgresConnector } from '../core/execution/executors/postgres-executor.js';

export type ReadinessProbe = () => Promise<void>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export type ReadinessOptions = {
  /** Total number of probe attempts. */
  attempts: number;
  initialDelayMillis: number;
  maxDelayMillis: number;
  factor: number;
};

export const DEFAULT_READINESS_OPTIONS: ReadinessOptions = {
  attempts: 10,
  initialDelayMillis: 250,
  maxDelayMillis: 2_000,
  factor: 2,
};

/**
 * Delay before attempt `attempt + 1`, starting from the first retry (attempt = 1).
 */
export function backoffDelay(attempt: number, options: ReadinessOptions): number {
  const raw = options.initialDelayMillis * Math.pow(options.factor, Math.max(0, attempt - 1));
  return Math.min(options.maxDelayMillis, Math.round(raw));
}

export interface WaitForReadyOptions extends Partial<ReadinessOptions> {
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Polls the probe until it succeeds or the attempts run out.
 * @returns Number of attempts used
 * @throws PipelineError NOT_READY carrying the last probe failure
 */
export async function waitForReady(probe: ReadinessProbe, options: WaitForReadyOptions = {}): Promise<number> {
  const settings: ReadinessOptions = {
    attempts: options.attempts ?? DEFAULT_READINESS_OPTIONS.attempts,
    initialDelayMillis: options.initialDelayMillis ?? DEFAULT_READINESS_OPTIONS.initialDelayMillis,
    maxDelayMillis: options.maxDelayMillis ?? DEFAULT_READINESS_OPTIONS.maxDelayMillis,
    factor: options.factor ?? DEFAULT_READINESS_OPTIONS.factor,
  };
  const wait = options.sleep ?? sleep;
  const logger = options.logger ?? silentLogger;

  let lastError: unknown;
  for (let attempt = 1; attempt <= settings.attempts; attempt += 1) {
    try {
      await probe();
      return attempt;
    } catch (error) {
      lastError = error;
      if (attempt < settings.attempts) {
        const delay = backoffDelay(attempt, settings);
        logger.debug(`Not ready yet (attempt ${attempt}/${settings.attempts}): ${describeError(error)}; retrying in ${delay}ms`);
        await wait(delay);
      }
    }
  }

  throw new PipelineError(
    PIPELINE_ERROR_CODES.NOT_READY,
    `Database did not become ready after ${settings.attempts} attempt(s): ${describeError(lastError)}`,
    { cause: lastError }
  );
}

/**
 * Probe that succeeds once a connection can be opened and answer `select 1`.
 */
export const postgresProbe = (connect: PostgresConnector, settings: PostgresConnectionSettings): ReadinessProbe =>
  async () => {
    const client = await connect(settings);
    try {
      await client.query('select 1');
    } finally {
      await client.end?.();
    }
  };
