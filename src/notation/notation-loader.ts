import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
import { NotationLoadError } from '../core/errors.js';
import { looksLikeZip, readMxlScore } from './mxl.js';
import {
  DEFAULT_TEMPO_BPM,
  DEFAULT_VELOCITY,
  TICKS_PER_QUARTER,
  type LoadedScore,
  type ScorePart,
  type SoundingNote,
  type TempoChange
} from './score.js';
import { parseXmlDocument, XmlSyntaxError, type XmlElement } from './xml-ast.js';
import {
  attributeOf,
  childrenNamed,
  childText,
  firstChild,
  parseOptionalFloat,
  parseOptionalInt
} from './xml-utils.js';

const STEP_SEMITONES: Record<string, number> = { C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11 };

/** Diagnostics sink shared by the loading passes of one file. */
interface LoadContext {
  diagnostics: Diagnostic[];
  tempos: Map<number, number>;
}

function addDiagnostic(
  ctx: LoadContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  element?: XmlElement
): void {
  ctx.diagnostics.push({ code, severity, message, source: element?.location, xmlPath: element?.path });
}

/** Running state while one part's measures are walked in document order. */
interface PartCursor {
  divisions: number;
  sawDivisions: boolean;
  warnedMissingDivisions: boolean;
  measureTicks: number;
  velocity: number;
  /** Notes whose tie is still open, keyed by MIDI key. */
  openTies: Map<number, SoundingNote>;
}

/**
 * Read a MusicXML (`.xml`, `.musicxml`) or compressed MusicXML (`.mxl`) file
 * into a `LoadedScore`. Anything that prevents building a score is thrown as
 * `NotationLoadError`; recoverable oddities land in `diagnostics`.
 */
export async function loadNotation(filePath: string): Promise<LoadedScore> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw new NotationLoadError(filePath, error instanceof Error ? error.message : 'unreadable file', {
      cause: error
    });
  }

  const isMxl = path.extname(filePath).toLowerCase() === '.mxl' || looksLikeZip(data);
  const diagnostics: Diagnostic[] = [];
  let xmlText: string;

  if (isMxl) {
    try {
      const extracted = readMxlScore(data);
      diagnostics.push(...extracted.diagnostics);
      xmlText = extracted.xmlText;
    } catch (error) {
      throw new NotationLoadError(filePath, error instanceof Error ? error.message : 'invalid MXL archive', {
        cause: error
      });
    }
  } else {
    xmlText = data.toString('utf8');
  }

  const score = parseNotationText(xmlText, filePath);
  return {
    ...score,
    format: isMxl ? 'mxl' : 'musicxml',
    diagnostics: [...diagnostics, ...score.diagnostics]
  };
}

/** Build a score from `score-partwise` MusicXML text. */
export function parseNotationText(xmlText: string, sourcePath: string): LoadedScore {
  let root: XmlElement;
  try {
    root = parseXmlDocument(xmlText, sourcePath);
  } catch (error) {
    if (error instanceof XmlSyntaxError) {
      const where = error.location ? ` at ${error.location.line}:${error.location.column}` : '';
      throw new NotationLoadError(sourcePath, `XML is not well-formed${where}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  if (root.name === 'score-timewise') {
    throw new NotationLoadError(sourcePath, 'score-timewise documents are not supported');
  }
  if (root.name !== 'score-partwise') {
    throw new NotationLoadError(sourcePath, `unsupported root element '${root.name}', expected 'score-partwise'`);
  }

  const partNodes = childrenNamed(root, 'part');
  if (partNodes.length === 0) {
    throw new NotationLoadError(sourcePath, 'score-partwise contains no <part> elements');
  }

  const ctx: LoadContext = { diagnostics: [], tempos: new Map() };
  const definitions = readPartList(firstChild(root, 'part-list'), ctx);

  const parts = partNodes.map((partNode, index) => {
    const id = attributeOf(partNode, 'id') ?? `P${index + 1}`;
    const definition = definitions.get(id);
    if (!definition) {
      addDiagnostic(ctx, 'PART_NOT_IN_PART_LIST', 'warning', `Part '${id}' has no <score-part> entry.`, partNode);
    }
    return { ...(definition ?? { id }), notes: readPartNotes(partNode, ctx) };
  });

  const tempos: TempoChange[] = [...ctx.tempos.entries()]
    .map(([tick, bpm]) => ({ tick, bpm }))
    .sort((left, right) => left.tick - right.tick);

  return {
    sourcePath,
    format: 'musicxml',
    title: readTitle(root),
    ticksPerQuarter: TICKS_PER_QUARTER,
    parts,
    tempos: tempos.length > 0 ? tempos : [{ tick: 0, bpm: DEFAULT_TEMPO_BPM }],
    diagnostics: ctx.diagnostics
  };
}

function readTitle(root: XmlElement): string | undefined {
  return childText(firstChild(root, 'work'), 'work-title') ?? childText(root, 'movement-title');
}

function readPartList(partList: XmlElement | undefined, ctx: LoadContext): Map<string, Omit<ScorePart, 'notes'>> {
  const definitions = new Map<string, Omit<ScorePart, 'notes'>>();

  for (const scorePart of childrenNamed(partList, 'score-part')) {
    const id = attributeOf(scorePart, 'id');
    if (!id) {
      addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', '<score-part> is missing its id attribute.', scorePart);
      continue;
    }

    const instrument = firstChild(scorePart, 'midi-instrument');
    definitions.set(id, {
      id,
      name: childText(scorePart, 'part-name'),
      channel: clampOptional(parseOptionalInt(childText(instrument, 'midi-channel')), 1, 16),
      program: clampOptional(parseOptionalInt(childText(instrument, 'midi-program')), 1, 128)
    });
  }

  return definitions;
}

/** Walk every measure of one part, turning notes into absolute-tick sounding notes. */
function readPartNotes(partNode: XmlElement, ctx: LoadContext): SoundingNote[] {
  const notes: SoundingNote[] = [];
  const cursor: PartCursor = {
    divisions: 1,
    sawDivisions: false,
    warnedMissingDivisions: false,
    measureTicks: 0,
    velocity: DEFAULT_VELOCITY,
    openTies: new Map()
  };
  let measureStart = 0;

  for (const measure of childrenNamed(partNode, 'measure')) {
    // backup/forward move this measure-relative position; `<chord/>` reuses the last onset.
    let position = 0;
    let lastOnset = 0;
    let hasBaseNote = false;
    let measureEnd = 0;

    for (const child of measure.children) {
      switch (child.name) {
        case 'attributes':
          readAttributes(child, cursor);
          break;
        case 'note': {
          if (firstChild(child, 'grace')) {
            break;
          }
          const duration = durationTicks(child, cursor, ctx);
          const isChord = firstChild(child, 'chord') !== undefined;
          if (isChord && !hasBaseNote) {
            addDiagnostic(ctx, 'CHORD_WITHOUT_BASE_NOTE', 'warning', '<chord/> note has no preceding note.', child);
          }

          const onset = isChord && hasBaseNote ? lastOnset : position;
          if (!isChord || !hasBaseNote) {
            position += duration;
          }
          lastOnset = onset;
          hasBaseNote = true;

          if (!firstChild(child, 'rest')) {
            addSoundingNote(child, measureStart + onset, duration, cursor, notes, ctx);
          }
          break;
        }
        case 'backup':
          position = Math.max(0, position - durationTicks(child, cursor, ctx));
          hasBaseNote = false;
          break;
        case 'forward':
          position += durationTicks(child, cursor, ctx);
          hasBaseNote = false;
          break;
        case 'direction':
          readSound(firstChild(child, 'sound'), measureStart + position, cursor, ctx);
          break;
        case 'sound':
          readSound(child, measureStart + position, cursor, ctx);
          break;
        default:
          break;
      }
      measureEnd = Math.max(measureEnd, position);
    }

    measureStart += measureEnd > 0 ? measureEnd : cursor.measureTicks;
  }

  return notes.sort((left, right) => left.startTick - right.startTick || left.key - right.key);
}

function readAttributes(attributes: XmlElement, cursor: PartCursor): void {
  const divisions = parseOptionalFloat(childText(attributes, 'divisions'));
  if (divisions !== undefined && divisions > 0) {
    cursor.divisions = divisions;
    cursor.sawDivisions = true;
  }

  const time = firstChild(attributes, 'time');
  const beats = parseOptionalInt(childText(time, 'beats'));
  const beatType = parseOptionalInt(childText(time, 'beat-type'));
  if (beats !== undefined && beatType !== undefined && beats > 0 && beatType > 0) {
    cursor.measureTicks = Math.round((beats * 4 * TICKS_PER_QUARTER) / beatType);
  }
}

function durationTicks(element: XmlElement, cursor: PartCursor, ctx: LoadContext): number {
  const duration = parseOptionalFloat(childText(element, 'duration'));
  if (duration === undefined || duration < 0) {
    return 0;
  }

  if (!cursor.sawDivisions && !cursor.warnedMissingDivisions) {
    cursor.warnedMissingDivisions = true;
    addDiagnostic(ctx, 'MISSING_DIVISIONS', 'info', 'No <divisions> declared before first duration; assuming 1.', element);
  }

  return Math.round((duration * TICKS_PER_QUARTER) / cursor.divisions);
}

function addSoundingNote(
  noteNode: XmlElement,
  startTick: number,
  duration: number,
  cursor: PartCursor,
  notes: SoundingNote[],
  ctx: LoadContext
): void {
  const key = midiKey(firstChild(noteNode, 'pitch'));
  if (key === undefined) {
    if (!firstChild(noteNode, 'unpitched')) {
      addDiagnostic(ctx, 'NOTE_WITHOUT_PITCH', 'warning', '<note> has no usable <pitch>.', noteNode);
    }
    return;
  }

  const ties = childrenNamed(noteNode, 'tie').map((tie) => attributeOf(tie, 'type'));
  const continued = ties.includes('stop') ? cursor.openTies.get(key) : undefined;

  let note: SoundingNote;
  if (continued && continued.startTick + continued.durationTicks === startTick) {
    continued.durationTicks += duration;
    note = continued;
  } else {
    note = { key, startTick, durationTicks: duration, velocity: cursor.velocity };
    notes.push(note);
  }

  if (ties.includes('start')) {
    cursor.openTies.set(key, note);
  } else {
    cursor.openTies.delete(key);
  }
}

/** MIDI key number for a `<pitch>`; alters are rounded to the nearest semitone. */
export function midiKey(pitch: XmlElement | undefined): number | undefined {
  const step = childText(pitch, 'step');
  const octave = parseOptionalInt(childText(pitch, 'octave'));
  const semitone = step === undefined ? undefined : STEP_SEMITONES[step];
  if (semitone === undefined || octave === undefined) {
    return undefined;
  }

  const alter = Math.round(parseOptionalFloat(childText(pitch, 'alter')) ?? 0);
  const key = (octave + 1) * 12 + semitone + alter;
  return key >= 0 && key <= 127 ? key : undefined;
}

function readSound(sound: XmlElement | undefined, tick: number, cursor: PartCursor, ctx: LoadContext): void {
  if (!sound) {
    return;
  }

  const tempo = parseOptionalFloat(attributeOf(sound, 'tempo'));
  if (tempo !== undefined && tempo > 0) {
    ctx.tempos.set(tick, tempo);
  }

  const dynamics = parseOptionalFloat(attributeOf(sound, 'dynamics'));
  if (dynamics !== undefined && dynamics >= 0) {
    cursor.velocity = Math.min(127, Math.max(1, Math.round(dynamics * 0.9)));
  }
}

function clampOptional(value: number | undefined, min: number, max: number): number | undefined {
  return value === undefined ? undefined : Math.min(max, Math.max(min, value));
}
