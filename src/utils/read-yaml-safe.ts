/**
 * Safe YAML File Reading
 *
 * Distinguishes "file not found" (returns default) from "file corrupted" (throws).
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { isNotFoundError, toErrorMessage } from './errors.js';

/**
 * Read and parse a YAML file.
 *
 * - If file doesn't exist, or holds only whitespace/comments: returns `defaultValue`
 * - If file exists but is invalid YAML: throws Error
 * - Otherwise: returns the parsed document (not yet validated)
 */
export async function readYamlSafe(filepath: string, defaultValue: unknown): Promise<unknown> {
  let data: string;
  try {
    data = await readFile(filepath, 'utf-8');
  } catch (e) {
    if (isNotFoundError(e)) {
      return defaultValue;
    }
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(data);
  } catch (parseError) {
    throw new Error(`Corrupted YAML file: ${filepath} - ${toErrorMessage(parseError)}`);
  }

  // An empty document parses to null
  return parsed ?? defaultValue;
}
