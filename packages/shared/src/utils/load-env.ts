/**
 * .env discovery for the simulator
 *
 * The CLI can be started from the repository root, from a package directory
 * or through a workspace script, so the file is looked up from the working
 * directory first and then from where this module lives.
 */

import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

export const ENV_FILE_NAME = '.env';

export interface LoadEnvOptions {
  /** Directories to search upwards from, in order */
  searchFrom?: string[];
  fileName?: string;
}

/**
 * Outcome of loadEnvFromRoot()
 */
export interface LoadedEnv {
  /** Absolute path of the file that was read, null when none was found */
  path: string | null;
  /** Names defined in the file, in file order */
  variables: string[];
}

/**
 * Walk up from `startDir` to the filesystem root and return the first
 * `fileName` found
 */
export function findEnvFile(startDir: string, fileName: string = ENV_FILE_NAME): string | null {
  let current = resolve(startDir);

  for (;;) {
    const candidate = join(current, fileName);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load the nearest .env into process.env
 *
 * Variables already set in the environment keep their values. A file that
 * exists but cannot be read throws.
 */
export function loadEnvFromRoot(options: LoadEnvOptions = {}): LoadedEnv {
  const fileName = options.fileName ?? ENV_FILE_NAME;
  const searchFrom = options.searchFrom ?? [process.cwd(), dirname(fileURLToPath(import.meta.url))];

  for (const dir of searchFrom) {
    const path = findEnvFile(dir, fileName);
    if (!path) continue;

    const result = dotenv.config({ path });
    if (result.error) {
      throw new Error(`Could not load ${path}: ${result.error.message}`);
    }
    return { path, variables: Object.keys(result.parsed ?? {}) };
  }

  return { path: null, variables: [] };
}
