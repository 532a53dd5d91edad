import {
  writeFileSync,
  renameSync,
  mkdirSync,
  readFileSync,
  unlinkSync,
  existsSync,
} from 'fs';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';

/**
 * Atomic JSON file write using write-then-rename pattern.
 * Readers see either the previous record or the new one, never a mix.
 */
export function atomicWriteJson(filePath: string, data: unknown): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });

  const tmpPath = join(dir, `.tmp-${randomUUID()}`);
  writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf8');

  try {
    renameSync(tmpPath, filePath);
  } catch {
    // Windows fallback: rename fails when target exists
    if (existsSync(filePath)) unlinkSync(filePath);
    renameSync(tmpPath, filePath);
  }
}

/**
 * Read and parse a JSON file. Returns null if the file doesn't exist,
 * can't be read, or isn't valid JSON. Callers validate the shape.
 */
export function readJsonFile(filePath: string): unknown {
  try {
    const content = readFileSync(filePath, 'utf8');
    return JSON.parse(content);
  } catch {
    return null;
  }
}
