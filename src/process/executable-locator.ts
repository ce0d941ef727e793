import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';

/** Resolves program names against the search path. */
export interface ExecutableLocator {
  /** Absolute path of `name`, or `undefined` when it is not installed. */
  find(name: string): Promise<string | undefined>;
}

/** Return the first candidate the locator can resolve, with its resolved path. */
export async function findFirstExecutable(
  locator: ExecutableLocator,
  candidates: readonly string[]
): Promise<{ name: string; path: string } | undefined> {
  for (const name of candidates) {
    const resolved = await locator.find(name);
    if (resolved) {
      return { name, path: resolved };
    }
  }

  return undefined;
}

export interface PathLocatorOptions {
  /** Search path; defaults to `process.env.PATH`. */
  searchPath?: string;
  /** Extensions tried on Windows; defaults to `process.env.PATHEXT`. */
  pathExt?: string;
  platform?: NodeJS.Platform;
}

/** `ExecutableLocator` that walks `PATH` entries like a shell's `which`. */
export class PathExecutableLocator implements ExecutableLocator {
  private readonly directories: string[];
  private readonly extensions: string[];
  private readonly platform: NodeJS.Platform;

  constructor(options: PathLocatorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    const delimiter = this.platform === 'win32' ? ';' : ':';
    this.directories = (options.searchPath ?? process.env.PATH ?? '')
      .split(delimiter)
      .filter((entry) => entry.length > 0);
    this.extensions =
      this.platform === 'win32'
        ? ['', ...(options.pathExt ?? process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
        : [''];
  }

  async find(name: string): Promise<string | undefined> {
    // Names with a directory component are checked as given.
    if (name.includes('/') || name.includes(path.sep)) {
      return (await this.isExecutable(name)) ? path.resolve(name) : undefined;
    }

    for (const directory of this.directories) {
      for (const extension of this.extensions) {
        const candidate = path.join(directory, `${name}${extension}`);
        if (await this.isExecutable(candidate)) {
          return candidate;
        }
      }
    }

    return undefined;
  }

  private async isExecutable(candidate: string): Promise<boolean> {
    try {
      const info = await stat(candidate);
      if (!info.isFile()) {
        return false;
      }
      if (this.platform !== 'win32') {
        await access(candidate, constants.X_OK);
      }
      return true;
    } catch {
      return false;
    }
  }
}
