import type { ToolConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { PathExecutableLocator, type ExecutableLocator } from '../process/executable-locator.js';
import { SpawnProcessRunner, type ProcessRunner } from '../process/process-runner.js';
import { SynthTranscodeEncoder } from './audio-encoder.js';
import type { PipelineServices } from './driver.js';
import { MuseScoreExporter } from './notation-export.js';
import { AudiverisRunner } from './recognition.js';
import { DesktopReviewer } from './review.js';

export interface ServiceOverrides {
  runner?: ProcessRunner;
  locator?: ExecutableLocator;
}

/** Wire the default Audiveris/MuseScore/TiMidity++/ffmpeg stages from tool settings. */
export function createPipelineServices(
  tools: ToolConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): PipelineServices {
  const runner = overrides.runner ?? new SpawnProcessRunner(logger.child({ component: 'process' }));
  const locator = overrides.locator ?? new PathExecutableLocator();

  const exporter = new MuseScoreExporter({
    runner,
    locator,
    executables: tools.musescore,
    logger: logger.child({ component: 'musescore' })
  });

  return {
    recognizer: new AudiverisRunner({
      runner,
      executable: tools.audiveris,
      logger: logger.child({ component: 'audiveris' })
    }),
    exporter,
    encoder: new SynthTranscodeEncoder({
      runner,
      locator,
      synthesizer: tools.synthesizer,
      transcoder: tools.transcoder,
      logger: logger.child({ component: 'audio' })
    }),
    reviewer: new DesktopReviewer({
      exporter,
      runner,
      locator,
      viewers: tools.viewer,
      logger: logger.child({ component: 'review' })
    })
  };
}
