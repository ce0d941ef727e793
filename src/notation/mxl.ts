import { inflateRawSync } from 'node:zlib';

import type { Diagnostic } from '../core/diagnostics.js';
import { parseXmlDocument, XmlSyntaxError } from './xml-ast.js';
import { attributeOf, firstChild } from './xml-utils.js';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;
const END_OF_CENTRAL_DIRECTORY_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;

const CONTAINER_PATH = 'META-INF/container.xml';

interface ArchiveEntry {
  name: string;
  method: number;
  compressedSize: number;
  localHeaderOffset: number;
}

/** Score document pulled out of a compressed MusicXML container. */
export interface MxlScore {
  entryName: string;
  xmlText: string;
  diagnostics: Diagnostic[];
}

/** True when `data` starts with the ZIP local-header magic `PK\x03\x04`. */
export function looksLikeZip(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b && data[2] === 0x03 && data[3] === 0x04;
}

/**
 * Extract the score XML from an `.mxl` archive.
 * `META-INF/container.xml` decides the rootfile; without it the first
 * `.musicxml` entry wins, then the first `.xml` entry.
 */
export function readMxlScore(data: Uint8Array): MxlScore {
  const archive = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const entries = readCentralDirectory(archive);
  const byName = new Map(entries.map((entry) => [entry.name.toLowerCase(), entry]));
  const diagnostics: Diagnostic[] = [];

  let scorePath: string | undefined;
  const container = byName.get(CONTAINER_PATH.toLowerCase());
  if (container) {
    scorePath = readRootfilePath(inflateEntry(archive, container).toString('utf8'), diagnostics);
  } else {
    diagnostics.push({
      code: 'MXL_CONTAINER_MISSING',
      severity: 'warning',
      message: `${CONTAINER_PATH} not found; using the first score entry in the archive.`
    });
  }

  const scoreEntry = scorePath ? byName.get(normalizeEntryName(scorePath).toLowerCase()) : fallbackScoreEntry(entries);
  if (!scoreEntry) {
    throw new Error(
      scorePath ? `rootfile '${scorePath}' is not present in the archive` : 'archive contains no score XML entry'
    );
  }

  return {
    entryName: scoreEntry.name,
    xmlText: inflateEntry(archive, scoreEntry).toString('utf8'),
    diagnostics
  };
}

function readCentralDirectory(archive: Buffer): ArchiveEntry[] {
  const eocd = findEndOfCentralDirectory(archive);
  const entryCount = archive.readUInt16LE(eocd + 10);
  let cursor = archive.readUInt32LE(eocd + 16);

  const entries: ArchiveEntry[] = [];
  for (let index = 0; index < entryCount; index += 1) {
    if (archive.readUInt32LE(cursor) !== CENTRAL_HEADER_SIGNATURE) {
      throw new Error('corrupt ZIP central directory');
    }

    const nameLength = archive.readUInt16LE(cursor + 28);
    const extraLength = archive.readUInt16LE(cursor + 30);
    const commentLength = archive.readUInt16LE(cursor + 32);
    const nameStart = cursor + 46;
    if (nameStart + nameLength > archive.length) {
      throw new Error('corrupt ZIP central directory');
    }

    entries.push({
      name: normalizeEntryName(archive.toString('utf8', nameStart, nameStart + nameLength)),
      method: archive.readUInt16LE(cursor + 10),
      compressedSize: archive.readUInt32LE(cursor + 20),
      localHeaderOffset: archive.readUInt32LE(cursor + 42)
    });

    cursor = nameStart + nameLength + extraLength + commentLength;
  }

  return entries;
}

/** Scan backwards for the end-of-central-directory record. */
function findEndOfCentralDirectory(archive: Buffer): number {
  const lowest = Math.max(0, archive.length - END_OF_CENTRAL_DIRECTORY_SIZE - MAX_COMMENT_LENGTH);
  for (let offset = archive.length - END_OF_CENTRAL_DIRECTORY_SIZE; offset >= lowest; offset -= 1) {
    if (archive.readUInt32LE(offset) === END_OF_CENTRAL_DIRECTORY_SIGNATURE) {
      return offset;
    }
  }
  throw new Error('not a ZIP archive (end of central directory not found)');
}

function inflateEntry(archive: Buffer, entry: ArchiveEntry): Buffer {
  const header = entry.localHeaderOffset;
  if (archive.readUInt32LE(header) !== LOCAL_HEADER_SIGNATURE) {
    throw new Error(`corrupt local header for '${entry.name}'`);
  }

  const start = header + 30 + archive.readUInt16LE(header + 26) + archive.readUInt16LE(header + 28);
  const end = start + entry.compressedSize;
  if (end > archive.length) {
    throw new Error(`entry '${entry.name}' exceeds archive bounds`);
  }

  const payload = archive.subarray(start, end);
  switch (entry.method) {
    case 0:
      return payload;
    case 8:
      return inflateRawSync(payload);
    default:
      throw new Error(`unsupported compression method ${entry.method} for '${entry.name}'`);
  }
}

function readRootfilePath(containerXml: string, diagnostics: Diagnostic[]): string | undefined {
  try {
    const root = parseXmlDocument(containerXml, CONTAINER_PATH);
    const fullPath = attributeOf(firstChild(firstChild(root, 'rootfiles'), 'rootfile'), 'full-path');
    if (!fullPath) {
      diagnostics.push({
        code: 'MXL_CONTAINER_INVALID',
        severity: 'warning',
        message: `${CONTAINER_PATH} has no rootfile full-path; using the first score entry in the archive.`
      });
    }
    return fullPath;
  } catch (error) {
    if (!(error instanceof XmlSyntaxError)) {
      throw error;
    }
    diagnostics.push({
      code: 'MXL_CONTAINER_INVALID',
      severity: 'warning',
      message: `${CONTAINER_PATH} is malformed (${error.message}); using the first score entry in the archive.`,
      source: error.location
    });
    return undefined;
  }
}

function fallbackScoreEntry(entries: ArchiveEntry[]): ArchiveEntry | undefined {
  const candidates = entries.filter((entry) => entry.name.toLowerCase() !== CONTAINER_PATH.toLowerCase());
  return (
    candidates.find((entry) => entry.name.toLowerCase().endsWith('.musicxml')) ??
    candidates.find((entry) => entry.name.toLowerCase().endsWith('.xml'))
  );
}

function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\/+/, '');
}
