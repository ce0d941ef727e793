import { access } from 'node:fs/promises';

import { formatDiagnostic } from '../core/diagnostics.js';
import { ExecutableNotFoundError, PdfRenderError, ProcessExitError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { writeMidiFile } from '../notation/midi-file.js';
import { loadNotation } from '../notation/notation-loader.js';
import type { LoadedScore } from '../notation/score.js';
import { findFirstExecutable, type ExecutableLocator } from '../process/executable-locator.js';
import type { ProcessResult, ProcessRunner } from '../process/process-runner.js';

/** Turns a recognized notation file into engraved and playable renderings. */
export interface NotationExporter {
  renderPdf(notationFile: string, pdfFile: string): Promise<void>;
  renderMidi(notationFile: string, midiFile: string): Promise<void>;
  /** Open the notation interactively and wait for the viewer to close. */
  show(notationFile: string): Promise<void>;
}

export interface MuseScoreExporterOptions {
  runner: ProcessRunner;
  locator: ExecutableLocator;
  /** Candidate MuseScore executable names, probed in order. */
  executables?: readonly string[];
  logger?: Logger;
  load?: (notationFile: string) => Promise<LoadedScore>;
}

const MUSESCORE_GUIDANCE = 'MuseScore executable not found. Please install MuseScore and ensure it is on your PATH.';

/**
 * `NotationExporter` that loads scores in process, writes MIDI itself and
 * hands PDF engraving and interactive display to MuseScore.
 */
export class MuseScoreExporter implements NotationExporter {
  private readonly runner: ProcessRunner;
  private readonly locator: ExecutableLocator;
  private readonly executables: readonly string[];
  private readonly logger: Logger;
  private readonly load: (notationFile: string) => Promise<LoadedScore>;

  constructor(options: MuseScoreExporterOptions) {
    this.runner = options.runner;
    this.locator = options.locator;
    this.executables = options.executables ?? ['mscore', 'musescore'];
    this.logger = options.logger ?? silentLogger;
    this.load = options.load ?? loadNotation;
  }

  async renderPdf(notationFile: string, pdfFile: string): Promise<void> {
    // Checked before loading so a missing MuseScore fails fast.
    const musescore = await this.requireMuseScore();
    await this.loadScore(notationFile);

    let result: ProcessResult;
    try {
      result = await this.runner.run(musescore, ['-o', pdfFile, notationFile], { output: 'capture' });
    } catch (error) {
      throw new PdfRenderError(notationFile, { cause: error });
    }

    if (result.exitCode !== 0) {
      throw new PdfRenderError(notationFile, {
        cause: new ProcessExitError(musescore, ['-o', pdfFile, notationFile], result.exitCode, result.stderr)
      });
    }

    try {
      await access(pdfFile);
    } catch (error) {
      throw new PdfRenderError(notationFile, { cause: error });
    }
  }

  async renderMidi(notationFile: string, midiFile: string): Promise<void> {
    const score = await this.loadScore(notationFile);
    await writeMidiFile(score, midiFile);
  }

  async show(notationFile: string): Promise<void> {
    const musescore = await this.requireMuseScore();
    const result = await this.runner.run(musescore, [notationFile], { output: 'inherit' });
    if (result.exitCode !== 0) {
      throw new ProcessExitError(musescore, [notationFile], result.exitCode, result.stderr);
    }
  }

  private async requireMuseScore(): Promise<string> {
    const found = await findFirstExecutable(this.locator, this.executables);
    if (!found) {
      throw new ExecutableNotFoundError('MuseScore', this.executables, MUSESCORE_GUIDANCE);
    }
    return found.path;
  }

  private async loadScore(notationFile: string): Promise<LoadedScore> {
    const score = await this.load(notationFile);
    for (const diagnostic of score.diagnostics) {
      if (diagnostic.severity !== 'info') {
        this.logger.warn(formatDiagnostic(diagnostic), { notationFile });
      }
    }
    this.logger.debug('Loaded notation', {
      notationFile,
      parts: score.parts.length,
      notes: score.parts.reduce((sum, part) => sum + part.notes.length, 0)
    });
    return score;
  }
}
