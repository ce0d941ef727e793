import type { Diagnostic } from '../core/diagnostics.js';

/** Timeline resolution every loaded score is normalized to. */
export const TICKS_PER_QUARTER = 480;

/** Tempo used when the notation carries no `<sound tempo>`. */
export const DEFAULT_TEMPO_BPM = 120;

/** Velocity used until a `<sound dynamics>` says otherwise. */
export const DEFAULT_VELOCITY = 80;

/** In-memory score read from a MusicXML or MXL file. */
export interface LoadedScore {
  sourcePath: string;
  format: 'musicxml' | 'mxl';
  title?: string;
  ticksPerQuarter: number;
  parts: ScorePart[];
  /** Tempo changes sorted by tick, at most one per tick. */
  tempos: TempoChange[];
  diagnostics: Diagnostic[];
}

/** One `<score-part>` with its sounding notes on an absolute timeline. */
export interface ScorePart {
  id: string;
  name?: string;
  /** 1-based MIDI channel from `<midi-instrument>`. */
  channel?: number;
  /** 1-based General MIDI program from `<midi-instrument>`. */
  program?: number;
  notes: SoundingNote[];
}

/** A note as heard: tied notes are already merged into one. */
export interface SoundingNote {
  key: number;
  startTick: number;
  durationTicks: number;
  velocity: number;
}

export interface TempoChange {
  tick: number;
  bpm: number;
}
