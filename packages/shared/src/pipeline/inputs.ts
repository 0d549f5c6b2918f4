/**
 * Input Resolution
 *
 * Turns user-supplied paths into the list of files handed to the OCR engine.
 */

import fs from 'fs/promises';
import path from 'path';
import { InputNotFoundError } from '../errors';

export const SUPPORTED_SUFFIXES: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.pdf',
  '.tif',
  '.tiff',
]);

export function isSupportedInput(filePath: string): boolean {
  return SUPPORTED_SUFFIXES.has(path.extname(filePath).toLowerCase());
}

// fs errors may come from another realm, so match on the code rather than the class
function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

async function statOrThrow(inputPath: string) {
  try {
    return await fs.stat(inputPath);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new InputNotFoundError(inputPath);
    }
    throw err;
  }
}

/**
 * Resolve a path or list of paths. Every path must exist; directories expand
 * to their supported files, sorted by name.
 *
 * @throws InputNotFoundError when a path does not exist
 */
export async function resolveInputs(inputs: string | readonly string[]): Promise<string[]> {
  const items = typeof inputs === 'string' ? [inputs] : inputs;
  const resolved: string[] = [];

  for (const item of items) {
    const stats = await statOrThrow(item);

    if (stats.isDirectory()) {
      const entries = await fs.readdir(item, { withFileTypes: true });
      const files = entries
        .filter((entry) => entry.isFile() && isSupportedInput(entry.name))
        .map((entry) => entry.name)
        .sort();
      resolved.push(...files.map((name) => path.join(item, name)));
    } else {
      resolved.push(item);
    }
  }

  return resolved;
}
