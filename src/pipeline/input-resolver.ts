import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { InputNotFoundError, isErrnoException } from '../core/errors.js';

/** Scan and document formats the OMR engine accepts, lower-case with dot. */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf', '.png', '.jpg', '.jpeg', '.tif', '.tiff']);

/** Case-insensitive extension check against `SUPPORTED_EXTENSIONS`. */
export function isSupportedInput(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Expand an input path into the files to process.
 *
 * A directory yields its immediate child files with a supported extension,
 * sorted by name; subdirectories are never descended into. Any other path is
 * returned as-is, whatever its extension.
 */
export async function resolveInputs(inputPath: string): Promise<string[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputPath)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new InputNotFoundError(inputPath);
    }
    throw error;
  }

  if (!isDirectory) {
    return [inputPath];
  }

  const entries = await readdir(inputPath, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (!isSupportedInput(entry.name)) {
      continue;
    }

    const fullPath = path.join(inputPath, entry.name);
    if (entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(fullPath)))) {
      files.push(fullPath);
    }
  }

  return files.sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    // Dangling links are skipped.
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
