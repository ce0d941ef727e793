export { runCli, reportFailure, type CliDependencies, type CliIo } from '../cli/main.js';
export {
  defaultConfig,
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG_FILENAME,
  type LoadedConfig,
  type OutputLayout,
  type ScorescanConfig,
  type ToolConfig
} from '../core/config.js';
export type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
export {
  ArtifactNotFoundError,
  ConfigError,
  ExecutableNotFoundError,
  InputNotFoundError,
  NotationLoadError,
  PdfRenderError,
  ProcessExitError,
  RecognitionFailedError,
  ScorescanError
} from '../core/errors.js';
export { createLogger, type Logger, type LoggerOptions, type LogFormat, type LogLevel } from '../core/logger.js';
export { encodeMidiFile, writeMidiFile } from '../notation/midi-file.js';
export { loadNotation, parseNotationText } from '../notation/notation-loader.js';
export type { LoadedScore, ScorePart, SoundingNote, TempoChange } from '../notation/score.js';
export { PathExecutableLocator, type ExecutableLocator } from '../process/executable-locator.js';
export {
  SpawnError,
  SpawnProcessRunner,
  type ProcessResult,
  type ProcessRunner,
  type RunOptions
} from '../process/process-runner.js';
export { SynthTranscodeEncoder, waveformPathFor, type AudioEncoder } from '../pipeline/audio-encoder.js';
export {
  artifactDirectoryFor,
  processFile,
  processFiles,
  type ArtifactKind,
  type PipelineOptions,
  type PipelineServices,
  type ProcessedFile
} from '../pipeline/driver.js';
export { isSupportedInput, resolveInputs, SUPPORTED_EXTENSIONS } from '../pipeline/input-resolver.js';
export { MuseScoreExporter, type NotationExporter } from '../pipeline/notation-export.js';
export { AudiverisRunner, findNotationArtifact, type OmrRunner } from '../pipeline/recognition.js';
export { DesktopReviewer, type ReviewOutcome, type Reviewer } from '../pipeline/review.js';
export { createPipelineServices } from '../pipeline/services.js';
