import { describe, expect, it } from 'vitest';

import { createLogger } from '../../src/core/logger.js';

const fixedClock = (): Date => new Date('2024-05-01T12:00:00.000Z');

describe('logger', () => {
  it('writes one JSON object per entry', () => {
    const lines: string[] = [];
    const logger = createLogger({ format: 'json', write: (line) => lines.push(line), now: fixedClock });

    logger.info('Processing input', { inputFile: 'a.pdf', skipped: undefined });
    logger.error('Pipeline failed', new TypeError('bad value'));

    expect(lines).toEqual([
      '{"level":"info","message":"Processing input","timestamp":"2024-05-01T12:00:00.000Z","context":{"inputFile":"a.pdf"}}',
      '{"level":"error","message":"Pipeline failed","timestamp":"2024-05-01T12:00:00.000Z","error":{"name":"TypeError","message":"bad value"}}'
    ]);
  });

  it('drops entries below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', format: 'json', write: (line) => lines.push(line), now: fixedClock });

    logger.debug('noise');
    logger.info('progress');
    logger.warn('careful');

    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      { level: 'warn', message: 'careful', timestamp: '2024-05-01T12:00:00.000Z' }
    ]);
  });

  it('merges child context under call context', () => {
    const lines: string[] = [];
    const logger = createLogger({ format: 'json', write: (line) => lines.push(line), now: fixedClock });

    logger.child({ stage: 'audio', inputFile: 'a.pdf' }).info('Encoding', { inputFile: 'b.pdf' });

    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ context: { stage: 'audio', inputFile: 'b.pdf' } });
  });

  it('formats pretty lines with level, message and context', () => {
    const lines: string[] = [];
    const logger = createLogger({ write: (line) => lines.push(line), now: fixedClock });

    logger.warn('Slow tool', { tool: 'ffmpeg' });

    expect(lines).toEqual([
      '\x1b[2m2024-05-01T12:00:00.000Z\x1b[0m \x1b[33mWARN \x1b[0m Slow tool \x1b[2m[\x1b[36mtool\x1b[0m="ffmpeg"]\x1b[0m'
    ]);
  });
});
