import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  ExecutableNotFoundError,
  NotationLoadError,
  PdfRenderError,
  ProcessExitError
} from '../../src/core/errors.js';
import { createLogger } from '../../src/core/logger.js';
import type { LoadedScore } from '../../src/notation/score.js';
import { MuseScoreExporter } from '../../src/pipeline/notation-export.js';
import { FakeExecutableLocator, FakeProcessRunner, MINIMAL_SCORE, fakeToolchain } from '../helpers/fake-tools.js';

async function notationFixture(content = MINIMAL_SCORE): Promise<{ dir: string; notation: string }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'scorescan-export-'));
  const notation = path.join(dir, 'piece.xml');
  await writeFile(notation, content, 'utf8');
  return { dir, notation };
}

describe('MuseScore exporter', () => {
  it('renders a PDF through the first MuseScore executable found', async () => {
    const { dir, notation } = await notationFixture();
    const toolchain = fakeToolchain();
    const runner = new FakeProcessRunner({ musescore: toolchain.mscore });
    const locator = new FakeExecutableLocator(['musescore']);
    const pdf = path.join(dir, 'piece.pdf');
    const loaded: string[] = [];
    const exporter = new MuseScoreExporter({
      runner,
      locator,
      executables: ['mscore', 'musescore'],
      load: async (file) => {
        loaded.push(file);
        return emptyScore(file);
      }
    });

    await exporter.renderPdf(notation, pdf);

    expect(locator.lookups).toEqual(['mscore', 'musescore']);
    expect(loaded).toEqual([notation]);
    expect(runner.calls).toEqual([
      { command: '/usr/bin/musescore', args: ['-o', pdf, notation], output: 'capture' }
    ]);
  });

  it('writes the PDF MuseScore produced', async () => {
    const { dir, notation } = await notationFixture();
    const runner = new FakeProcessRunner(fakeToolchain());
    const exporter = new MuseScoreExporter({ runner, locator: new FakeExecutableLocator(['mscore']) });
    const pdf = path.join(dir, 'piece.pdf');

    await exporter.renderPdf(notation, pdf);

    expect(await readFile(pdf, 'utf8')).toBe('%PDF-1.4 piece.xml');
  });

  it('fails before loading the notation when MuseScore is missing', async () => {
    const { dir, notation } = await notationFixture();
    const runner = new FakeProcessRunner(fakeToolchain());
    const loaded: string[] = [];
    const exporter = new MuseScoreExporter({
      runner,
      locator: new FakeExecutableLocator([]),
      load: async (file) => {
        loaded.push(file);
        return emptyScore(file);
      }
    });

    const failure = exporter.renderPdf(notation, path.join(dir, 'piece.pdf'));

    await expect(failure).rejects.toBeInstanceOf(ExecutableNotFoundError);
    await expect(failure).rejects.toThrow(
      'MuseScore executable not found. Please install MuseScore and ensure it is on your PATH.'
    );
    expect(loaded).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it('turns a failing MuseScore run into a guided render failure', async () => {
    const { dir, notation } = await notationFixture();
    const runner = new FakeProcessRunner(fakeToolchain({ musescoreExitCode: 1 }));
    const exporter = new MuseScoreExporter({ runner, locator: new FakeExecutableLocator(['mscore']) });

    const failure = exporter.renderPdf(notation, path.join(dir, 'piece.pdf'));

    await expect(failure).rejects.toBeInstanceOf(PdfRenderError);
    await expect(failure).rejects.toMatchObject({
      guided: true,
      message: 'Failed to render PDF with MuseScore. Please ensure MuseScore is installed and on your PATH.'
    });
    const error = await failure.catch((caught: unknown) => caught);
    expect(error instanceof PdfRenderError && error.cause instanceof ProcessExitError).toBe(true);
  });

  it('treats a zero exit without a PDF on disk as a render failure', async () => {
    const { dir, notation } = await notationFixture();
    const runner = new FakeProcessRunner({ mscore: async () => ({}) });
    const exporter = new MuseScoreExporter({ runner, locator: new FakeExecutableLocator(['mscore']) });

    await expect(exporter.renderPdf(notation, path.join(dir, 'piece.pdf'))).rejects.toBeInstanceOf(PdfRenderError);
  });

  it('writes a Standard MIDI File without needing MuseScore', async () => {
    const { dir, notation } = await notationFixture();
    const runner = new FakeProcessRunner({});
    const exporter = new MuseScoreExporter({ runner, locator: new FakeExecutableLocator([]) });
    const midi = path.join(dir, 'piece.mid');

    await exporter.renderMidi(notation, midi);

    const bytes = await readFile(midi);
    expect(bytes.subarray(0, 4).toString('latin1')).toBe('MThd');
    expect(runner.calls).toEqual([]);
  });

  it('lets notation load failures escape MIDI rendering unguided', async () => {
    const { dir, notation } = await notationFixture('<score-partwise><part-list/>');
    const exporter = new MuseScoreExporter({
      runner: new FakeProcessRunner({}),
      locator: new FakeExecutableLocator([])
    });

    const failure = exporter.renderMidi(notation, path.join(dir, 'piece.mid'));

    await expect(failure).rejects.toBeInstanceOf(NotationLoadError);
    await expect(failure).rejects.toMatchObject({ guided: false, filePath: notation });
  });

  it('logs loader warnings', async () => {
    const { dir, notation } = await notationFixture(
      MINIMAL_SCORE.replace('<score-part id="P1">', '<score-part id="P9">')
    );
    const lines: string[] = [];
    const exporter = new MuseScoreExporter({
      runner: new FakeProcessRunner({}),
      locator: new FakeExecutableLocator([]),
      logger: createLogger({ format: 'json', write: (line) => lines.push(line) })
    });

    await exporter.renderMidi(notation, path.join(dir, 'piece.mid'));

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '{}');
    expect(entry).toMatchObject({ level: 'warn', context: { notationFile: notation } });
    expect(entry).toHaveProperty(
      'message',
      expect.stringMatching(
        /^\[PART_NOT_IN_PART_LIST\] Part 'P1' has no <score-part> entry\. at \/score-partwise\[1\]\/part\[1\] \(10:\d+\)$/
      )
    );
  });

  it('shows the notation in MuseScore and waits for it', async () => {
    const { notation } = await notationFixture();
    const runner = new FakeProcessRunner(fakeToolchain());
    const exporter = new MuseScoreExporter({ runner, locator: new FakeExecutableLocator(['mscore']) });

    await exporter.show(notation);

    expect(runner.calls).toEqual([{ command: '/usr/bin/mscore', args: [notation], output: 'inherit' }]);
  });
});

function emptyScore(sourcePath: string): LoadedScore {
  return {
    sourcePath,
    format: 'musicxml',
    ticksPerQuarter: 480,
    parts: [],
    tempos: [{ tick: 0, bpm: 120 }],
    diagnostics: []
  };
}
