import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { IoError } from '../errors';

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** Reads a UTF-8 file, returning `null` when it does not exist. */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissing(error)) return null;
    throw new IoError('read', path, error);
  }
}

export async function writeText(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
  } catch (error) {
    throw new IoError('write', path, error);
  }
}

export async function copyText(source: string, target: string): Promise<void> {
  try {
    await copyFile(source, target);
  } catch (error) {
    throw new IoError('backup', source, error);
  }
}
