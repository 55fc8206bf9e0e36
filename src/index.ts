/**
 * pg-backup-restore exports.
 * Fetches a PostgreSQL dump, restores it into a throw-away container and reports the query result.
 */
export * from './core/errors.js';
export * from './core/logging/logger.js';
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/query-logger.js';
export * from './challenge/challenge-client.js';
export * from './dump/dump-decoder.js';
export * from './dump/server-version.js';
export * from './container/command-runner.js';
export * from './container/docker-runtime.js';
export * from './container/readiness.js';
export * from './container/postgres-instance.js';
export * from './restore/dump-restorer.js';
export * from './query/alive-ssns.js';
export * from './config/run-config.js';
export * from './pipeline/restore-pipeline.js';
export { createProgram, runCli, type CliIo } from './cli/program.js';
