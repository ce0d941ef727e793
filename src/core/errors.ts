/**
 * Failure hierarchy for the conversion pipeline.
 *
 * Every error carries a `guided` flag. Guided failures have a known cause and
 * a remediation message the CLI prints as-is; unguided failures are reported
 * with their raw stack. Both end the run with exit code 1.
 */
export abstract class ScorescanError extends Error {
  abstract readonly guided: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required external program could not be found on the search path. */
export class ExecutableNotFoundError extends ScorescanError {
  readonly guided = true;
  readonly tool: string;
  readonly candidates: readonly string[];

  constructor(tool: string, candidates: readonly string[], guidance?: string) {
    super(
      guidance ??
        `${tool} executable not found (looked for ${candidates.join(', ')}). ` +
          `Please install ${tool} and ensure it is on your PATH.`
    );
    this.tool = tool;
    this.candidates = candidates;
  }
}

/** The input path given on the command line does not exist. */
export class InputNotFoundError extends ScorescanError {
  readonly guided = true;
  readonly inputPath: string;

  constructor(inputPath: string) {
    super(`Input path '${inputPath}' does not exist.`);
    this.inputPath = inputPath;
  }
}

/** The OMR engine ran but reported failure through its exit status. */
export class RecognitionFailedError extends ScorescanError {
  readonly guided = true;
  readonly inputFile: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(inputFile: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim();
    super(
      `Audiveris failed on ${inputFile} (exit code ${exitCode ?? 'unknown'}).` +
        (detail.length > 0 ? `\n${detail}` : '')
    );
    this.inputFile = inputFile;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** The OMR engine succeeded but left no notation file behind. */
export class ArtifactNotFoundError extends ScorescanError {
  readonly guided = false;
  readonly inputFile: string;
  readonly outputDir: string;

  constructor(inputFile: string, outputDir: string) {
    super(`Audiveris did not produce a MusicXML file for ${inputFile} in ${outputDir}`);
    this.inputFile = inputFile;
    this.outputDir = outputDir;
  }
}

/** MuseScore could not engrave the PDF. */
export class PdfRenderError extends ScorescanError {
  readonly guided = true;
  readonly notationFile: string;

  constructor(notationFile: string, options?: { cause?: unknown }) {
    super(
      'Failed to render PDF with MuseScore. Please ensure MuseScore is installed and on your PATH.',
      options
    );
    this.notationFile = notationFile;
  }
}

/** A notation file could not be read into a score. */
export class NotationLoadError extends ScorescanError {
  readonly guided = false;
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Unable to load notation from ${filePath}: ${reason}`, options);
    this.filePath = filePath;
  }
}

/** A subprocess whose failure has no dedicated remediation exited non-zero. */
export class ProcessExitError extends ScorescanError {
  readonly guided = false;
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number | null, stderr: string) {
    super(
      `Command '${[command, ...args].join(' ')}' exited with status ${exitCode ?? 'unknown'}` +
        (stderr.trim().length > 0 ? `\n${stderr.trim()}` : '')
    );
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** Malformed configuration file contents. */
export class ConfigError extends ScorescanError {
  readonly guided = true;
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Configuration error in ${filePath}: ${message}`);
    this.filePath = filePath;
  }
}

/** Narrow an unknown thrown value to a Node.js system error carrying `code`. */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
