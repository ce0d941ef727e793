import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { ConfigError, isErrnoException } from './errors.js';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './logger.js';

/** Where rendered artifacts land relative to the output directory. */
export type OutputLayout = 'flat' | 'per-input';

export const OUTPUT_LAYOUTS: readonly OutputLayout[] = ['flat', 'per-input'];

/** Executable names for every external program the pipeline drives. */
export interface ToolConfig {
  audiveris: string;
  /** Candidate MuseScore executables, probed in order. */
  musescore: string[];
  synthesizer: string;
  transcoder: string;
  /** Candidate PDF viewers used when interactive review falls back. */
  viewer: string[];
}

export interface ScorescanConfig {
  tools: ToolConfig;
  output: { layout: OutputLayout };
  logging: { level: LogLevel; format: LogFormat };
}

/** Result of config discovery; `filePath` is unset when defaults were used. */
export interface LoadedConfig {
  config: ScorescanConfig;
  filePath?: string;
}

export const DEFAULT_CONFIG_FILENAME = 'scorescan.config.yaml';

export function defaultConfig(): ScorescanConfig {
  return {
    tools: {
      audiveris: 'audiveris',
      musescore: ['mscore', 'musescore'],
      synthesizer: 'timidity',
      transcoder: 'ffmpeg',
      viewer: ['mscore', 'musescore']
    },
    output: { layout: 'flat' },
    logging: { level: 'info', format: 'pretty' }
  };
}

/**
 * Load configuration from `explicitPath`, or from `scorescan.config.yaml` in
 * `cwd` when that file exists. Missing optional fields take their defaults.
 */
export async function loadConfig(explicitPath?: string, cwd: string = process.cwd()): Promise<LoadedConfig> {
  const filePath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, DEFAULT_CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      if (explicitPath) {
        throw new ConfigError(filePath, 'file not found');
      }
      return { config: defaultConfig() };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'invalid YAML');
  }

  return { config: parseConfig(filePath, parsed), filePath };
}

/** Validate parsed YAML and merge it over the defaults. */
export function parseConfig(filePath: string, input: unknown): ScorescanConfig {
  const config = defaultConfig();
  if (input === null || input === undefined) {
    return config;
  }

  const root = readSection(filePath, input, 'config');
  const tools = readOptionalSection(filePath, root, 'tools');
  if (tools) {
    config.tools.audiveris = readOptionalString(filePath, tools, 'tools.audiveris') ?? config.tools.audiveris;
    config.tools.musescore = readOptionalNameList(filePath, tools, 'tools.musescore') ?? config.tools.musescore;
    config.tools.synthesizer =
      readOptionalString(filePath, tools, 'tools.synthesizer') ?? config.tools.synthesizer;
    config.tools.transcoder = readOptionalString(filePath, tools, 'tools.transcoder') ?? config.tools.transcoder;
    config.tools.viewer = readOptionalNameList(filePath, tools, 'tools.viewer') ?? config.tools.viewer;
  }

  const output = readOptionalSection(filePath, root, 'output');
  if (output) {
    config.output.layout = readOptionalEnum(filePath, output, 'output.layout', OUTPUT_LAYOUTS) ?? config.output.layout;
  }

  const logging = readOptionalSection(filePath, root, 'logging');
  if (logging) {
    config.logging.level = readOptionalEnum(filePath, logging, 'logging.level', LOG_LEVELS) ?? config.logging.level;
    config.logging.format =
      readOptionalEnum(filePath, logging, 'logging.format', LOG_FORMATS) ?? config.logging.format;
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Last segment of a dotted key, used to index into its section. */
function leafKey(key: string): string {
  return key.slice(key.lastIndexOf('.') + 1);
}

function readSection(filePath: string, value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(filePath, `'${label}' must be a YAML mapping`);
  }
  return value;
}

function readOptionalSection(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return readSection(filePath, value, key);
}

function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[leafKey(key)];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(filePath, `'${key}' must be a non-empty string`);
  }

  return value;
}

/** Accept either one executable name or a non-empty list of them. */
function readOptionalNameList(filePath: string, obj: Record<string, unknown>, key: string): string[] | undefined {
  const value = obj[leafKey(key)];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    return [value];
  }

  if (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item): item is string => typeof item === 'string' && item.trim() !== '')
  ) {
    return [...value];
  }

  throw new ConfigError(filePath, `'${key}' must be an executable name or a non-empty list of names`);
}

function readOptionalEnum<T extends string>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | undefined {
  const value = obj[leafKey(key)];
  if (value === undefined || value === null) {
    return undefined;
  }

  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(filePath, `'${key}' must be one of ${allowed.map((item) => `'${item}'`).join(', ')}`);
  }

  return match;
}
