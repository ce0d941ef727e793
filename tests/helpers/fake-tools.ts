import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ExecutableLocator } from '../../src/process/executable-locator.js';
import {
  SpawnError,
  type OutputMode,
  type ProcessResult,
  type ProcessRunner,
  type RunOptions
} from '../../src/process/process-runner.js';

/** One invocation seen by `FakeProcessRunner`. */
export interface RecordedCall {
  command: string;
  args: string[];
  output: OutputMode;
}

export type FakeHandler = (args: string[]) => Promise<Partial<ProcessResult>>;

/**
 * In-process stand-in for external programs. Handlers are keyed by the
 * command's base name, so resolved paths like `/usr/bin/mscore` match `mscore`.
 * Unknown commands fail like a missing executable.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers: Record<string, FakeHandler>;

  constructor(handlers: Record<string, FakeHandler>) {
    this.handlers = handlers;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    this.calls.push({ command, args: [...args], output: options.output ?? 'capture' });

    const handler = this.handlers[path.basename(command)];
    if (!handler) {
      throw new SpawnError(command, Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' }));
    }

    const result = await handler([...args]);
    return { exitCode: 0, signal: null, stdout: '', stderr: '', ...result };
  }

  commandsRun(): string[] {
    return this.calls.map((call) => path.basename(call.command));
  }
}

/** Locator that "installs" exactly the given names under `/usr/bin`. */
export class FakeExecutableLocator implements ExecutableLocator {
  readonly lookups: string[] = [];
  private readonly available: Set<string>;

  constructor(available: readonly string[]) {
    this.available = new Set(available);
  }

  async find(name: string): Promise<string | undefined> {
    this.lookups.push(name);
    return this.available.has(name) ? `/usr/bin/${name}` : undefined;
  }
}

export const MINIMAL_SCORE = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE score-partwise PUBLIC "-//Recordare//DTD MusicXML 4.0 Partwise//EN" "http://www.musicxml.org/dtds/partwise.dtd">
<score-partwise version="4.0">
  <work><work-title>Test Piece</work-title></work>
  <part-list>
    <score-part id="P1">
      <part-name>Piano</part-name>
    </score-part>
  </part-list>
  <part id="P1">
    <measure number="1">
      <attributes>
        <divisions>1</divisions>
        <time><beats>4</beats><beat-type>4</beat-type></time>
      </attributes>
      <note>
        <pitch><step>C</step><octave>4</octave></pitch>
        <duration>4</duration>
        <voice>1</voice>
        <type>whole</type>
      </note>
    </measure>
  </part>
</score-partwise>`;

export interface FakeToolchainOptions {
  /** Notation path written by the fake OMR engine, relative to its output dir. */
  notationName?: (stem: string) => string;
  notationContent?: string;
  audiverisExitCode?: number;
  audiverisStderr?: string;
  /** When false the fake OMR engine exits 0 without writing anything. */
  writeNotation?: boolean;
  musescoreExitCode?: number;
  synthesizerExitCode?: number;
  transcoderExitCode?: number;
}

/**
 * Handlers that behave like Audiveris, MuseScore, TiMidity++ and ffmpeg by
 * writing small placeholder files where the real programs would.
 */
export interface FakeToolchain {
  [command: string]: FakeHandler;
  audiveris: FakeHandler;
  mscore: FakeHandler;
  timidity: FakeHandler;
  ffmpeg: FakeHandler;
}

export function fakeToolchain(options: FakeToolchainOptions = {}): FakeToolchain {
  const notationName = options.notationName ?? ((stem: string) => `${stem}.xml`);

  return {
    audiveris: async (args) => {
      const input = args[1] ?? '';
      const outputDir = args[4] ?? '';
      if (options.audiverisExitCode !== undefined && options.audiverisExitCode !== 0) {
        return { exitCode: options.audiverisExitCode, stderr: options.audiverisStderr ?? '' };
      }
      if (options.writeNotation !== false) {
        const target = path.join(outputDir, notationName(path.parse(input).name));
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, options.notationContent ?? MINIMAL_SCORE, 'utf8');
      }
      return { stdout: 'INFO  Export done' };
    },
    mscore: async (args) => {
      if (options.musescoreExitCode !== undefined && options.musescoreExitCode !== 0) {
        return { exitCode: options.musescoreExitCode, stderr: 'engraving failed' };
      }
      const pdf = args[1];
      if (args[0] === '-o' && pdf) {
        await writeFile(pdf, `%PDF-1.4 ${path.basename(args[2] ?? '')}`, 'utf8');
      }
      return {};
    },
    timidity: async (args) => {
      const wav = args[3];
      if (wav) {
        await writeFile(wav, 'RIFF', 'utf8');
      }
      return { exitCode: options.synthesizerExitCode ?? 0 };
    },
    ffmpeg: async (args) => {
      if (options.transcoderExitCode !== undefined && options.transcoderExitCode !== 0) {
        return { exitCode: options.transcoderExitCode, stderr: 'encoder error' };
      }
      const mp3 = args[3];
      if (mp3) {
        await writeFile(mp3, `ID3 ${path.basename(args[2] ?? '')}`, 'utf8');
      }
      return {};
    }
  };
}

/** Names a complete installation resolves. */
export const ALL_TOOLS = ['audiveris', 'mscore', 'timidity', 'ffmpeg'];
