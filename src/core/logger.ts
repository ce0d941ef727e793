/**
 * Leveled logger for pipeline progress.
 *
 * Output always goes to stderr (or the injected sink) so stdout stays reserved
 * for the `Generated <path>` report lines. Pretty output is colourized for
 * terminals; JSON output writes one object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json'];

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Receives each formatted line; defaults to `process.stderr`. */
  write?: (line: string) => void;
  /** Clock override, used by tests for stable timestamps. */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  const timestamp = COLORS.dim + entry.timestamp + COLORS.reset;

  let output = `${timestamp} ${color}${levelUpper}${COLORS.reset} ${entry.message}`;

  if (entry.context) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${COLORS.cyan}${k}${COLORS.reset}=${JSON.stringify(v)}`)
      .join(' ');
    output += ` ${COLORS.dim}[${contextStr}]${COLORS.reset}`;
  }

  if (entry.error) {
    output += `\n  ${COLORS.red}${entry.error.name}: ${entry.error.message}${COLORS.reset}`;
  }

  return output;
}

/** Create a logger; `child()` loggers share level, format and sink. */
export function createLogger(options: LoggerOptions = {}, baseContext: LogContext = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const format = options.format ?? 'pretty';
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string, error?: Error, context?: LogContext): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }

    const merged = Object.fromEntries(
      Object.entries({ ...baseContext, ...context }).filter(([, v]) => v !== undefined)
    );

    const entry: LogEntry = {
      level,
      message,
      timestamp: now().toISOString()
    };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message };
    }

    write(format === 'json' ? formatJson(entry) : formatPretty(entry));
  };

  return {
    debug: (message, context) => log('debug', message, undefined, context),
    info: (message, context) => log('info', message, undefined, context),
    warn: (message, context) => log('warn', message, undefined, context),
    error: (message, error, context) => log('error', message, error, context),
    child: (context) => createLogger(options, { ...baseContext, ...context })
  };
}

/** Logger that drops everything; the default for library callers. */
export const silentLogger: Logger = createLogger({ level: 'error', write: () => undefined });
