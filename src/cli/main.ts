import { Command, CommanderError, Option } from 'commander';

import { loadConfig, OUTPUT_LAYOUTS, type OutputLayout } from '../core/config.js';
import { ScorescanError } from '../core/errors.js';
import { createLogger, LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from '../core/logger.js';
import { processFiles } from '../pipeline/driver.js';
import { resolveInputs } from '../pipeline/input-resolver.js';
import { createPipelineServices, type ServiceOverrides } from '../pipeline/services.js';

/** Line-oriented output streams; stdout carries only the artifact report. */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDependencies extends ServiceOverrides {
  io?: CliIo;
  /** Directory used to discover `scorescan.config.yaml`. */
  cwd?: string;
}

interface CliFlags {
  outputDir: string;
  review?: boolean;
  config?: string;
  layout?: OutputLayout;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

function buildProgram(io: CliIo): Command {
  return new Command()
    .name('scorescan')
    .description('Convert scanned sheet music to MusicXML, PDF, MIDI and MP3')
    .argument('<input>', 'image/PDF file or directory of files')
    .option('-o, --output-dir <dir>', 'directory for generated files', 'output')
    .option('--review', 'open each result for review after it is generated')
    .option('--config <file>', 'YAML configuration file')
    .addOption(new Option('--layout <layout>', 'artifact layout in the output directory').choices(OUTPUT_LAYOUTS))
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(LOG_LEVELS))
    .addOption(new Option('--log-format <format>', 'log line format').choices(LOG_FORMATS))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd())
    });
}

/**
 * Parse `argv` (without the node and script entries), run the pipeline and
 * return the process exit code. All failures end up here: guided ones print
 * their remediation message, anything else prints its stack.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const program = buildProgram(io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const [input] = program.processedArgs;
  const flags = program.opts<CliFlags>();

  try {
    if (typeof input !== 'string') {
      throw new TypeError('input argument is required');
    }

    const { config, filePath } = await loadConfig(flags.config, deps.cwd);
    const logger = createLogger({
      level: flags.logLevel ?? config.logging.level,
      format: flags.logFormat ?? config.logging.format,
      write: io.stderr
    });
    if (filePath) {
      logger.debug('Loaded configuration', { filePath });
    }

    const files = await resolveInputs(input);
    if (files.length === 0) {
      logger.warn('No supported input files found', { input });
    }

    const services = createPipelineServices(config.tools, logger, deps);
    await processFiles(files, services, {
      outputDir: flags.outputDir,
      layout: flags.layout ?? config.output.layout,
      review: flags.review === true,
      logger,
      onArtifact: (_kind, filePath) => io.stdout(`Generated ${filePath}`)
    });
    return 0;
  } catch (error) {
    reportFailure(error, io);
    return 1;
  }
}

/** Print a failure the way its tier asks for. */
export function reportFailure(error: unknown, io: CliIo): void {
  if (error instanceof ScorescanError && error.guided) {
    io.stderr(error.message);
    return;
  }

  if (error instanceof Error) {
    io.stderr(error.stack ?? `${error.name}: ${error.message}`);
    return;
  }

  io.stderr(String(error));
}
