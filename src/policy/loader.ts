/**
 * Read policy definitions from JSON files on disk.
 * A file holds either one policy object or an array of them.
 */

import { readFile } from 'fs/promises';
import { SchemaInvalidError, describeError } from '../core/errors.js';

export async function loadPolicyFile(path: string): Promise<readonly unknown[]> {
  const raw = await readFile(path, 'utf8');

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new SchemaInvalidError(`policy file ${path}`, [`not valid JSON: ${describeError(error)}`]);
  }

  if (Array.isArray(document)) {
    const entries: readonly unknown[] = document;
    return entries;
  }

  if (typeof document === 'object' && document !== null) {
    return [document];
  }

  throw new SchemaInvalidError(`policy file ${path}`, ['expected a policy object or an array of policies']);
}
