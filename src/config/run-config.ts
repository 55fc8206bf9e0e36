import { DEFAULT_CHALLENGE_BASE_URL } from '../challenge/challenge-client.js';
import { DEFAULT_READINESS_OPTIONS } from '../container/readiness.js';
import { PIPELINE_ERROR_CODES, PipelineError } from '../core/errors.js';
import { parseLogLevel, type LogLevel } from '../core/logging/logger.js';

export const DEFAULT_IMAGE = 'postgres';
export const DEFAULT_HOST_PORT = 5432;
export const DEFAULT_POSTGRES_USER = 'postgres';
export const DEFAULT_POSTGRES_DATABASE = 'postgres';

export interface RunConfig {
  accessToken: string;
  baseUrl: string;
  playground: boolean;
  image: string;
  port: number;
  dockerBin: string;
  readyAttempts: number;
  logLevel: LogLevel;
  user: string;
  /** Same as the user name, as the container is created with it. */
  password: string;
  database: string;
}

/** Values as they arrive from the command line. */
export interface RunConfigArgs {
  baseUrl?: string;
  playground?: boolean;
  image?: string;
  port?: string | number;
  dockerBin?: string;
  readyAttempts?: string | number;
  logLevel?: string;
}

export type RunConfigEnv = Readonly<Record<string, string | undefined>>;

const configError = (message: string) =>
  new PipelineError(PIPELINE_ERROR_CODES.CONFIGURATION_ERROR, message);

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseIntegerOption(value: string | number | undefined, field: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(num)) {
    throw configError(`${field} must be an integer (got '${value}')`);
  }
  return num;
}

function parseBooleanFlag(value: string | undefined, field: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw configError(`${field} must be a boolean flag (got '${value}')`);
}

function parseBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw configError(`baseUrl must be an absolute URL (got '${value}')`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw configError(`baseUrl must use http or https (got '${url.protocol}')`);
  }
  return value.replace(/\/+$/, '');
}

/**
 * Merges command-line values over environment variables over defaults.
 */
export function resolveRunConfig(accessToken: string, args: RunConfigArgs, env: RunConfigEnv): RunConfig {
  const token = toTrimmedString(accessToken);
  if (!token) {
    throw configError('access token must not be empty');
  }

  const baseUrl = parseBaseUrl(
    toTrimmedString(args.baseUrl) ?? toTrimmedString(env.CHALLENGE_BASE_URL) ?? DEFAULT_CHALLENGE_BASE_URL
  );

  // commander reports `--no-playground` as playground=false and leaves it true otherwise.
  const playground = args.playground === false
    ? false
    : parseBooleanFlag(toTrimmedString(env.CHALLENGE_PLAYGROUND), 'CHALLENGE_PLAYGROUND') ?? true;

  const port = parseIntegerOption(args.port ?? toTrimmedString(env.PGBR_PORT), 'port') ?? DEFAULT_HOST_PORT;
  if (port < 1 || port > 65_535) {
    throw configError(`port must be between 1 and 65535 (got ${port})`);
  }

  const readyAttempts = parseIntegerOption(
    args.readyAttempts ?? toTrimmedString(env.PGBR_READY_ATTEMPTS),
    'readyAttempts'
  ) ?? DEFAULT_READINESS_OPTIONS.attempts;
  if (readyAttempts < 1) {
    throw configError(`readyAttempts must be >= 1 (got ${readyAttempts})`);
  }

  const logLevel = parseLogLevel(toTrimmedString(args.logLevel) ?? toTrimmedString(env.LOG_LEVEL) ?? 'info');

  return {
    accessToken: token,
    baseUrl,
    playground,
    image: toTrimmedString(args.image) ?? toTrimmedString(env.PGBR_IMAGE) ?? DEFAULT_IMAGE,
    port,
    dockerBin: toTrimmedString(args.dockerBin) ?? toTrimmedString(env.PGBR_DOCKER_BIN) ?? 'docker',
    readyAttempts,
    logLevel,
    user: DEFAULT_POSTGRES_USER,
    password: DEFAULT_POSTGRES_USER,
    database: DEFAULT_POSTGRES_DATABASE,
  };
}
