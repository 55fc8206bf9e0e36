import { spawn } from 'node:child_process';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
};

export interface CommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export type CommandRunner = (bin: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

/**
 * Runs a binary without a shell and collects its output.
 * Rejects only when the process cannot be started.
 */
export const spawnCommand: CommandRunner = (bin, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(bin, args, {
      shell: false,
      env: { ...process.env, NO_COLOR: '1' },
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let output = '';
    let settled = false;

    // Decoders keep a multi-byte character split across chunks intact.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (text: string) => {
      stdout += text;
      output += text;
    });
    child.stderr.on('data', (text: string) => {
      stderr += text;
      output += text;
    });
    // The child may exit before reading all of its input; the exit code reports that case.
    child.stdin.on('error', (err: Error) => {
      const text = `stdin: ${err.message}\n`;
      stderr += text;
      output += text;
    });

    child.on('error', err => {
      if (settled) return;
      settled = true;
      reject(err);
    });
    child.on('close', code => {
      if (settled) return;
      settled = true;
      resolve({ code: code ?? 1, stdout, stderr, output });
    });

    child.stdin.end(options.input ?? '');
  });
