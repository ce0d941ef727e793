import { writeFile } from 'node:fs/promises';

import tonejsMidi from '@tonejs/midi';

import type { LoadedScore, ScorePart } from './score.js';

// The package ships a CommonJS bundle, so its classes come off the default export.
const { Midi } = tonejsMidi;

const PERCUSSION_CHANNEL = 9;
const CHANNEL_COUNT = 16;

/**
 * Encode a score as a format-1 Standard MIDI File: a conductor track holding
 * the title and tempo changes, then one track per part.
 */
export function encodeMidiFile(score: LoadedScore): Uint8Array {
  const midi = new Midi();
  const toFileTicks = (tick: number): number => Math.round((tick * midi.header.ppq) / score.ticksPerQuarter);

  midi.header.name = score.title ?? '';
  for (const tempo of score.tempos) {
    midi.header.tempos.push({ ticks: toFileTicks(tempo.tick), bpm: tempo.bpm });
  }
  midi.header.update();

  const channels = assignChannels(score.parts);
  score.parts.forEach((part, index) => {
    const track = midi.addTrack();
    track.name = part.name ?? '';
    track.channel = channels[index] ?? 0;
    if (part.program !== undefined) {
      track.instrument.number = part.program - 1;
    }

    for (const note of part.notes) {
      if (note.durationTicks <= 0) {
        continue;
      }
      track.addNote({
        midi: note.key,
        ticks: toFileTicks(note.startTick),
        durationTicks: toFileTicks(note.durationTicks),
        velocity: normalizedVelocity(note.velocity)
      });
    }
  });

  return midi.toArray();
}

/** Encode `score` and write it to `filePath`, replacing any existing file. */
export async function writeMidiFile(score: LoadedScore, filePath: string): Promise<void> {
  await writeFile(filePath, encodeMidiFile(score));
}

/**
 * Zero-based channel per part: the declared `<midi-channel>` when present,
 * otherwise the next channel that is neither percussion nor declared by
 * another part. Numbering wraps after the last channel.
 */
export function assignChannels(parts: readonly ScorePart[]): number[] {
  const declared = new Set<number>();
  for (const part of parts) {
    if (part.channel !== undefined) {
      declared.add(part.channel - 1);
    }
  }

  let next = 0;
  const take = (free: (channel: number) => boolean): number | undefined => {
    for (let step = 0; step < CHANNEL_COUNT; step++) {
      const candidate = (next + step) % CHANNEL_COUNT;
      if (candidate !== PERCUSSION_CHANNEL && free(candidate)) {
        next = (candidate + 1) % CHANNEL_COUNT;
        return candidate;
      }
    }
    return undefined;
  };

  return parts.map((part) => {
    if (part.channel !== undefined) {
      return part.channel - 1;
    }
    // Once every melodic channel is declared, undeclared parts share them.
    return take((channel) => !declared.has(channel)) ?? take(() => true) ?? 0;
  });
}

/**
 * The writer stores velocity as a 0-1 fraction and truncates it back to
 * 0-127; the half step keeps the written value equal to `velocity`.
 */
function normalizedVelocity(velocity: number): number {
  return Math.min(127, velocity + 0.5) / 127;
}
