import { PIPELINE_ERROR_CODES, PipelineError, describeError, type PipelineErrorCode } from '../core/errors.js';
import { spawnCommand, type CommandOptions, type CommandResult, type CommandRunner } from './command-runner.js';

export interface ContainerSpec {
  image: string;
  env: Record<string, string>;
  /** Container port -> host port. */
  ports: Record<number, number>;
}

/**
 * Lifecycle operations the restore run needs from a container engine.
 */
export interface ContainerRuntime {
  run(spec: ContainerSpec): Promise<string>;
  exec(containerId: string, argv: string[], options?: CommandOptions): Promise<CommandResult>;
  stop(containerId: string): Promise<void>;
  remove(containerId: string): Promise<void>;
}

export interface DockerCliRuntimeOptions {
  bin?: string;
  runner?: CommandRunner;
}

/**
 * ContainerRuntime backed by the docker command line.
 */
export class DockerCliRuntime implements ContainerRuntime {
  readonly bin: string;
  private readonly runner: CommandRunner;

  constructor(options: DockerCliRuntimeOptions = {}) {
    this.bin = options.bin ?? 'docker';
    this.runner = options.runner ?? spawnCommand;
  }

  static runArgs(spec: ContainerSpec): string[] {
    const args = ['run', '-d'];
    for (const [key, value] of Object.entries(spec.env)) {
      args.push('-e', `${key}=${value}`);
    }
    for (const [containerPort, hostPort] of Object.entries(spec.ports)) {
      args.push('-p', `${hostPort}:${containerPort}`);
    }
    args.push(spec.image);
    return args;
  }

  async run(spec: ContainerSpec): Promise<string> {
    const result = await this.invoke(DockerCliRuntime.runArgs(spec), PIPELINE_ERROR_CODES.PROVISION_FAILED);
    if (result.code !== 0) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.PROVISION_FAILED,
        `docker run ${spec.image} exited with code ${result.code}`,
        { detail: result.output }
      );
    }

    // docker may print pull progress on stdout before the id; the id is the last line.
    const id = result.stdout.trim().split(/\r?\n/).pop()?.trim() ?? '';
    if (!id) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.PROVISION_FAILED,
        `docker run ${spec.image} did not report a container id`,
        { detail: result.output }
      );
    }
    return id;
  }

  exec(containerId: string, argv: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return this.runner(this.bin, ['exec', '-i', containerId, ...argv], options);
  }

  async stop(containerId: string): Promise<void> {
    await this.expectSuccess(['stop', containerId]);
  }

  async remove(containerId: string): Promise<void> {
    await this.expectSuccess(['rm', containerId]);
  }

  private async expectSuccess(args: string[]): Promise<void> {
    const result = await this.invoke(args, PIPELINE_ERROR_CODES.CLEANUP_FAILED);
    if (result.code !== 0) {
      throw new PipelineError(
        PIPELINE_ERROR_CODES.CLEANUP_FAILED,
        `docker ${args.join(' ')} exited with code ${result.code}`,
        { detail: result.output }
      );
    }
  }

  private async invoke(args: string[], code: PipelineErrorCode): Promise<CommandResult> {
    try {
      return await this.runner(this.bin, args);
    } catch (error) {
      throw new PipelineError(code, `Failed to run ${this.bin}: ${describeError(error)}`, { cause: error });
    }
  }
}
