import { spawn } from 'node:child_process';

import { isErrnoException } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';

/** How a subprocess' stdout/stderr are handled. */
export type OutputMode = 'capture' | 'inherit';

export interface RunOptions {
  /** Defaults to `capture`: output is buffered and returned, never streamed. */
  output?: OutputMode;
  cwd?: string;
}

/** Completed subprocess outcome; a non-zero `exitCode` is not thrown. */
export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Thrown when the operating system cannot start the program at all
 * (typically `ENOENT`). Callers translate this into a stage-specific failure.
 */
export class SpawnError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: Error) {
    super(`Unable to start '${command}': ${cause.message}`, { cause });
    this.name = 'SpawnError';
    this.command = command;
    this.code = isErrnoException(cause) ? cause.code : undefined;
  }
}

/** Capability used by every stage that shells out; tests substitute fakes. */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/** `ProcessRunner` backed by `child_process.spawn`, without timeouts. */
export class SpawnProcessRunner implements ProcessRunner {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const output = options.output ?? 'capture';
    this.logger.debug('Spawning process', { command, args: [...args], output });

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: output === 'capture' ? ['ignore', 'pipe', 'pipe'] : 'inherit'
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.once('error', (error) => {
        reject(new SpawnError(command, error));
      });

      child.once('close', (exitCode, signal) => {
        this.logger.debug('Process exited', { command, exitCode, signal });
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8')
        });
      });
    });
  }
}
