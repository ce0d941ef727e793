import path from 'node:path';

import type { OutputLayout } from '../core/config.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { AudioEncoder } from './audio-encoder.js';
import type { NotationExporter } from './notation-export.js';
import type { OmrRunner } from './recognition.js';
import type { Reviewer } from './review.js';

/** Artifact kinds in the order they are produced and reported. */
export type ArtifactKind = 'notation' | 'pdf' | 'midi' | 'mp3';

/** Paths of everything generated for one input file. */
export interface ProcessedFile {
  input: string;
  notation: string;
  pdf: string;
  midi: string;
  mp3: string;
}

/** External capabilities the pipeline drives, one per stage. */
export interface PipelineServices {
  recognizer: OmrRunner;
  exporter: NotationExporter;
  encoder: AudioEncoder;
  reviewer?: Reviewer;
}

export interface PipelineOptions {
  outputDir: string;
  layout?: OutputLayout;
  /** Open each result for review; requires `services.reviewer`. */
  review?: boolean;
  /** Called as soon as each artifact exists. */
  onArtifact?: (kind: ArtifactKind, filePath: string) => void;
  logger?: Logger;
}

/**
 * Run every input through recognize → PDF → MIDI → MP3 (→ review), strictly
 * one file after another. The first failure aborts the whole batch.
 */
export async function processFiles(
  files: readonly string[],
  services: PipelineServices,
  options: PipelineOptions
): Promise<ProcessedFile[]> {
  const processed: ProcessedFile[] = [];
  for (const file of files) {
    processed.push(await processFile(file, services, options));
  }
  return processed;
}

/** Run one input through all stages. */
export async function processFile(
  inputFile: string,
  services: PipelineServices,
  options: PipelineOptions
): Promise<ProcessedFile> {
  const logger = (options.logger ?? silentLogger).child({ input: inputFile });
  const report = options.onArtifact ?? (() => undefined);
  const artifactDir = artifactDirectoryFor(inputFile, options.outputDir, options.layout ?? 'flat');

  logger.info('Recognizing score');
  const notation = await services.recognizer.recognize(inputFile, artifactDir);
  report('notation', notation);

  const stem = path.parse(notation).name;
  const pdf = path.join(artifactDir, `${stem}.pdf`);
  const midi = path.join(artifactDir, `${stem}.mid`);
  const mp3 = path.join(artifactDir, `${stem}.mp3`);

  logger.info('Rendering PDF', { notation });
  await services.exporter.renderPdf(notation, pdf);
  report('pdf', pdf);

  logger.info('Rendering MIDI', { notation });
  await services.exporter.renderMidi(notation, midi);
  report('midi', midi);

  logger.info('Encoding MP3', { midi });
  await services.encoder.encodeMp3(midi, mp3);
  report('mp3', mp3);

  if (options.review) {
    if (services.reviewer) {
      const outcome = await services.reviewer.review(notation, pdf);
      logger.debug('Review finished', { outcome });
    } else {
      logger.warn('Review requested but no reviewer is configured');
    }
  }

  return { input: inputFile, notation, pdf, midi, mp3 };
}

/**
 * Directory that receives one input's artifacts: the output directory itself
 * for the flat layout, or `<outputDir>/<input-stem>` for the per-input layout.
 */
export function artifactDirectoryFor(inputFile: string, outputDir: string, layout: OutputLayout): string {
  return layout === 'per-input' ? path.join(outputDir, path.parse(inputFile).name) : outputDir;
}
