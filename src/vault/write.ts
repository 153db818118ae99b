import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { withCounter } from './filenames.js';

/** Upper bound on collision suffixes tried before giving up on a name. */
const MAX_COLLISION_COUNTER = 1000;

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write a new vault file without ever overwriting an existing one.
 *
 * Starts from `fileName` and appends " (1)", " (2)", ... while the name is
 * taken, either on disk or according to `isTaken` (names claimed by other
 * files in the scanned vault). Returns the file name actually written.
 */
export function writeNewFile(
  directory: string,
  fileName: string,
  content: string,
  isTaken: (name: string) => boolean = () => false,
): string {
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  for (let counter = 0; counter <= MAX_COLLISION_COUNTER; counter++) {
    const candidate = withCounter(fileName, counter);
    if (isTaken(candidate)) continue;

    try {
      // 'wx' fails if the file exists, so a name is never overwritten
      writeFileSync(join(directory, candidate), content, { encoding: 'utf-8', flag: 'wx' });
      return candidate;
    } catch (error) {
      if (isAlreadyExists(error)) continue;
      throw error;
    }
  }

  throw new Error(`No free file name for "${fileName}" after ${MAX_COLLISION_COUNTER} attempts`);
}
