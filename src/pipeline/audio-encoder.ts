import { rm } from 'node:fs/promises';
import path from 'node:path';

import { ExecutableNotFoundError, ProcessExitError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { ExecutableLocator } from '../process/executable-locator.js';
import type { ProcessRunner } from '../process/process-runner.js';

/** Converts a MIDI file into compressed audio. */
export interface AudioEncoder {
  encodeMp3(midiFile: string, mp3File: string): Promise<void>;
}

export interface SynthTranscodeEncoderOptions {
  runner: ProcessRunner;
  locator: ExecutableLocator;
  synthesizer?: string;
  transcoder?: string;
  logger?: Logger;
}

/** Path of the intermediate waveform: the MIDI path with a `.wav` extension. */
export function waveformPathFor(midiFile: string): string {
  const parsed = path.parse(midiFile);
  return path.join(parsed.dir, `${parsed.name}.wav`);
}

/**
 * `AudioEncoder` rendering MIDI to WAV with a synthesizer (TiMidity++) and
 * compressing WAV to MP3 with a transcoder (ffmpeg). The waveform is removed
 * once the transcoder has been attempted, successful or not.
 */
export class SynthTranscodeEncoder implements AudioEncoder {
  private readonly runner: ProcessRunner;
  private readonly locator: ExecutableLocator;
  private readonly synthesizer: string;
  private readonly transcoder: string;
  private readonly logger: Logger;

  constructor(options: SynthTranscodeEncoderOptions) {
    this.runner = options.runner;
    this.locator = options.locator;
    this.synthesizer = options.synthesizer ?? 'timidity';
    this.transcoder = options.transcoder ?? 'ffmpeg';
    this.logger = options.logger ?? silentLogger;
  }

  async encodeMp3(midiFile: string, mp3File: string): Promise<void> {
    const waveFile = waveformPathFor(midiFile);

    const synthesizer = await this.locator.find(this.synthesizer);
    const transcoder = await this.locator.find(this.transcoder);
    if (!synthesizer || !transcoder) {
      const missing = [!synthesizer ? this.synthesizer : undefined, !transcoder ? this.transcoder : undefined].filter(
        (name): name is string => name !== undefined
      );
      throw new ExecutableNotFoundError(
        'audio tools',
        missing,
        `Audio conversion requires ${this.synthesizer} and ${this.transcoder}; ` +
          `not found on PATH: ${missing.join(', ')}. Please install them and try again.`
      );
    }

    try {
      await this.runChecked(synthesizer, [midiFile, '-Ow', '-o', waveFile]);
      await this.runChecked(transcoder, ['-y', '-i', waveFile, mp3File]);
    } finally {
      await removeIfPresent(waveFile);
      this.logger.debug('Removed intermediate waveform', { waveFile });
    }
  }

  private async runChecked(command: string, args: string[]): Promise<void> {
    const result = await this.runner.run(command, args, { output: 'capture' });
    if (result.exitCode !== 0) {
      throw new ProcessExitError(command, args, result.exitCode, result.stderr);
    }
  }
}

/** Delete `filePath`; a file that is already gone is not an error. */
async function removeIfPresent(filePath: string): Promise<void> {
  // `force` ignores ENOENT only; permission and directory errors still propagate.
  await rm(filePath, { force: true });
}
