import { Command, CommanderError } from 'commander';

import { resolveRunConfig, type RunConfig, type RunConfigArgs, type RunConfigEnv } from '../config/run-config.js';
import { describeError, exitCodeFor, isPipelineError, type PipelineError } from '../core/errors.js';
import { createConsoleLogger, createStreamSink, type LogSink } from '../core/logging/logger.js';
import { runRestorePipeline, type PipelineDeps } from '../pipeline/restore-pipeline.js';

export interface CliIo {
  env: RunConfigEnv;
  writeOut(text: string): void;
  writeErr(text: string): void;
  /** Replaces the console sink, mostly for tests. */
  logSink?: LogSink;
  deps?: Omit<PipelineDeps, 'logger'>;
}

type CliOptions = RunConfigArgs;

const reportFailure = (io: CliIo, error: PipelineError) => {
  io.writeErr(`${error.code}: ${error.message}\n`);
  if (error.detail) {
    io.writeErr(`${error.detail.trimEnd()}\n`);
  }
};

export function createProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('pg-backup-restore')
    .description('Restore the challenge dump into a throw-away PostgreSQL container and submit the alive SSNs')
    .argument('<access-token>', 'challenge access token')
    .option('--base-url <url>', 'challenge service base URL (env CHALLENGE_BASE_URL)')
    .option('--no-playground', 'submit without playground=1 (env CHALLENGE_PLAYGROUND=0)')
    .option('--port <port>', 'host port published for PostgreSQL (env PGBR_PORT)')
    .option('--image <name>', 'image repository, tagged with the dump version (env PGBR_IMAGE)')
    .option('--docker-bin <path>', 'docker binary (env PGBR_DOCKER_BIN)')
    .option('--ready-attempts <n>', 'readiness probe attempts (env PGBR_READY_ATTEMPTS)')
    .option('--log-level <level>', 'debug|info|warn|error (env LOG_LEVEL)')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.writeOut(text),
      writeErr: text => io.writeErr(text),
    })
    .action(async (accessToken: string, opts: CliOptions) => {
      let config: RunConfig;
      try {
        config = resolveRunConfig(accessToken, opts, io.env);
      } catch (error) {
        if (!isPipelineError(error)) throw error;
        reportFailure(io, error);
        setExitCode(exitCodeFor(error));
        return;
      }

      const sink = io.logSink ?? createStreamSink(text => io.writeOut(text), text => io.writeErr(text));
      const logger = createConsoleLogger({ level: config.logLevel, sink });

      const outcome = await runRestorePipeline(config, { ...io.deps, logger });
      if (outcome.ok) {
        io.writeOut(`${outcome.response}\n`);
        setExitCode(exitCodeFor(null));
        return;
      }

      if (outcome.response !== undefined) {
        io.writeOut(`${outcome.response}\n`);
      }
      logger.error(`${outcome.error.code}: ${outcome.error.message}`);
      if (outcome.error.detail) {
        logger.error(outcome.error.detail.trimEnd());
      }
      setExitCode(exitCodeFor(outcome.error));
    });

  return program;
}

/**
 * Parses argv (without the node and script entries) and runs the restore.
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version land here with exitCode 0.
      return error.exitCode;
    }
    io.writeErr(`UNEXPECTED: ${describeError(error)}\n`);
    return 1;
  }
  return exitCode;
}
