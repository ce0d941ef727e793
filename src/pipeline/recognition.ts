import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';

import {
  ArtifactNotFoundError,
  ExecutableNotFoundError,
  RecognitionFailedError
} from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { SpawnError, type ProcessResult, type ProcessRunner } from '../process/process-runner.js';

/** Runs optical music recognition on one scan and returns the notation file it produced. */
export interface OmrRunner {
  recognize(inputFile: string, outputDir: string): Promise<string>;
}

/** Notation extensions probed after recognition, in priority order. */
export const NOTATION_EXTENSIONS = ['.xml', '.mxl'] as const;

export interface AudiverisRunnerOptions {
  runner: ProcessRunner;
  executable?: string;
  logger?: Logger;
}

/** `OmrRunner` driving the Audiveris command line in batch mode. */
export class AudiverisRunner implements OmrRunner {
  private readonly runner: ProcessRunner;
  private readonly executable: string;
  private readonly logger: Logger;

  constructor(options: AudiverisRunnerOptions) {
    this.runner = options.runner;
    this.executable = options.executable ?? 'audiveris';
    this.logger = options.logger ?? silentLogger;
  }

  async recognize(inputFile: string, outputDir: string): Promise<string> {
    await mkdir(outputDir, { recursive: true });

    const args = ['-batch', inputFile, '-export', '-output', outputDir];
    this.logger.debug('Running Audiveris', { inputFile, outputDir });

    let result: ProcessResult;
    try {
      result = await this.runner.run(this.executable, args, { output: 'capture' });
    } catch (error) {
      if (error instanceof SpawnError && error.code === 'ENOENT') {
        throw new ExecutableNotFoundError(
          'Audiveris',
          [this.executable],
          'Audiveris executable not found. Please install Audiveris and ensure it is on your PATH.'
        );
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      throw new RecognitionFailedError(inputFile, result.exitCode, result.stderr);
    }

    const stem = path.parse(inputFile).name;
    const notation = await findNotationArtifact(outputDir, stem);
    if (!notation) {
      throw new ArtifactNotFoundError(inputFile, outputDir);
    }

    this.logger.debug('Located notation artifact', { notation });
    return notation;
  }
}

/**
 * Search `outputDir` recursively for `<stem>*.xml`, then `<stem>*.mxl`.
 * Within one extension a file named exactly `<stem><ext>` wins over longer
 * names sharing the prefix; remaining ties go to the lexicographically
 * smallest path (relative to `outputDir`, `/`-separated), independent of
 * directory traversal order.
 */
export async function findNotationArtifact(outputDir: string, stem: string): Promise<string | undefined> {
  const files = await listFilesRecursive(outputDir);

  for (const extension of NOTATION_EXTENSIONS) {
    const exactName = `${stem}${extension}`;
    const rank = (relative: string): number => (baseName(relative) === exactName ? 0 : 1);
    const matches = files
      .filter((relative) => {
        const name = baseName(relative);
        return name.length >= exactName.length && name.startsWith(stem) && name.endsWith(extension);
      })
      .sort((left, right) => rank(left) - rank(right) || (left < right ? -1 : left > right ? 1 : 0));

    const first = matches[0];
    if (first !== undefined) {
      return path.join(outputDir, ...first.split('/'));
    }
  }

  return undefined;
}

function baseName(relative: string): string {
  return relative.slice(relative.lastIndexOf('/') + 1);
}

/** All regular files below `root`, as `/`-separated paths relative to it. */
async function listFilesRecursive(root: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const entries = await readdir(path.join(root, ...relativeDir.split('/').filter(Boolean)), {
      withFileTypes: true
    });
    for (const entry of entries) {
      const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(relative);
      } else if (entry.isFile()) {
        found.push(relative);
      }
    }
  }

  await walk('');
  return found;
}
