import { describe, expect, it } from 'vitest';

import { createLogger } from '../../src/core/logger.js';
import type { NotationExporter } from '../../src/pipeline/notation-export.js';
import { DesktopReviewer } from '../../src/pipeline/review.js';
import { FakeExecutableLocator, FakeProcessRunner } from '../helpers/fake-tools.js';

class StubExporter implements NotationExporter {
  readonly shown: string[] = [];

  constructor(private readonly showFailure?: Error) {}

  async renderPdf(): Promise<void> {}

  async renderMidi(): Promise<void> {}

  async show(notationFile: string): Promise<void> {
    this.shown.push(notationFile);
    if (this.showFailure) {
      throw this.showFailure;
    }
  }
}

describe('desktop reviewer', () => {
  it('shows the notation when the exporter can', async () => {
    const exporter = new StubExporter();
    const runner = new FakeProcessRunner({});
    const reviewer = new DesktopReviewer({ exporter, runner, locator: new FakeExecutableLocator(['mscore']) });

    expect(await reviewer.review('/out/a.xml', '/out/a.pdf')).toBe('notation');
    expect(exporter.shown).toEqual(['/out/a.xml']);
    expect(runner.calls).toEqual([]);
  });

  it('falls back to opening the PDF with the first viewer found', async () => {
    const exporter = new StubExporter(new Error('no display'));
    const runner = new FakeProcessRunner({ evince: async () => ({}) });
    const locator = new FakeExecutableLocator(['evince', 'xdg-open']);
    const reviewer = new DesktopReviewer({ exporter, runner, locator, viewers: ['mscore', 'evince', 'xdg-open'] });

    expect(await reviewer.review('/out/a.xml', '/out/a.pdf')).toBe('pdf');
    expect(locator.lookups).toEqual(['mscore', 'evince']);
    expect(runner.calls).toEqual([{ command: '/usr/bin/evince', args: ['/out/a.pdf'], output: 'inherit' }]);
  });

  it('still counts a viewer that exits non-zero as a PDF review and warns', async () => {
    const lines: string[] = [];
    const reviewer = new DesktopReviewer({
      exporter: new StubExporter(new Error('no display')),
      runner: new FakeProcessRunner({ evince: async () => ({ exitCode: 4 }) }),
      locator: new FakeExecutableLocator(['evince']),
      viewers: ['evince'],
      logger: createLogger({ format: 'json', level: 'warn', write: (line) => lines.push(line) })
    });

    expect(await reviewer.review('/out/a.xml', '/out/a.pdf')).toBe('pdf');
    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      expect.objectContaining({
        level: 'warn',
        message: 'PDF viewer exited with an error',
        context: { viewer: 'evince', exitCode: 4 }
      })
    ]);
  });

  it('skips review when no viewer is installed', async () => {
    const runner = new FakeProcessRunner({});
    const reviewer = new DesktopReviewer({
      exporter: new StubExporter(new Error('MuseScore missing')),
      runner,
      locator: new FakeExecutableLocator([])
    });

    expect(await reviewer.review('/out/a.xml', '/out/a.pdf')).toBe('skipped');
    expect(runner.calls).toEqual([]);
  });

  it('skips review when the viewer cannot be started', async () => {
    const reviewer = new DesktopReviewer({
      exporter: new StubExporter(new Error('MuseScore missing')),
      runner: new FakeProcessRunner({}),
      locator: new FakeExecutableLocator(['mscore'])
    });

    expect(await reviewer.review('/out/a.xml', '/out/a.pdf')).toBe('skipped');
  });
});
