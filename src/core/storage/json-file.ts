/**
 * File helpers for the JSON-backed repositories.
 *
 * Documents are replaced atomically: written to a sibling temp file, then
 * renamed over the target, so a crash leaves either the old or the new copy.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Read and parse a JSON document; null when the file does not exist
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function writeJsonFileAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
  await rename(tempPath, path);
}

export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
