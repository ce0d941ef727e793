import { silentLogger, type Logger } from '../core/logger.js';
import { findFirstExecutable, type ExecutableLocator } from '../process/executable-locator.js';
import { SpawnError, type ProcessRunner } from '../process/process-runner.js';
import type { NotationExporter } from './notation-export.js';

/** Which rendering, if any, was put in front of the user. */
export type ReviewOutcome = 'notation' | 'pdf' | 'skipped';

/** Interactive check of one processed file's artifacts. */
export interface Reviewer {
  review(notationFile: string, pdfFile: string): Promise<ReviewOutcome>;
}

export interface DesktopReviewerOptions {
  exporter: NotationExporter;
  runner: ProcessRunner;
  locator: ExecutableLocator;
  /** PDF viewer executables tried when the notation cannot be shown. */
  viewers?: readonly string[];
  logger?: Logger;
}

/**
 * Shows the notation through the exporter's viewer; on any failure opens the
 * PDF with the first viewer found, and skips review when there is none.
 */
export class DesktopReviewer implements Reviewer {
  private readonly exporter: NotationExporter;
  private readonly runner: ProcessRunner;
  private readonly locator: ExecutableLocator;
  private readonly viewers: readonly string[];
  private readonly logger: Logger;

  constructor(options: DesktopReviewerOptions) {
    this.exporter = options.exporter;
    this.runner = options.runner;
    this.locator = options.locator;
    this.viewers = options.viewers ?? ['mscore', 'musescore'];
    this.logger = options.logger ?? silentLogger;
  }

  async review(notationFile: string, pdfFile: string): Promise<ReviewOutcome> {
    try {
      await this.exporter.show(notationFile);
      return 'notation';
    } catch (error) {
      this.logger.debug('Interactive notation view unavailable; falling back to PDF', {
        notationFile,
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    const viewer = await findFirstExecutable(this.locator, this.viewers);
    if (!viewer) {
      return 'skipped';
    }

    try {
      const result = await this.runner.run(viewer.path, [pdfFile], { output: 'inherit' });
      if (result.exitCode !== 0) {
        this.logger.warn('PDF viewer exited with an error', { viewer: viewer.name, exitCode: result.exitCode });
      }
      return 'pdf';
    } catch (error) {
      if (error instanceof SpawnError) {
        this.logger.warn('PDF viewer could not be started', { viewer: viewer.name, reason: error.message });
        return 'skipped';
      }
      throw error;
    }
  }
}
