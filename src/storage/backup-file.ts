/**
 * Single-file JSON persistence with a rolling backup
 *
 * Before the primary file is replaced it is copied to `<file>.backup`; the
 * backup is removed once the new primary is on disk.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError } from '../schemas/errors.js';
import { createLogger } from '../utils/logger.js';
import { serializeJson } from './json-file-store.js';

const logger = createLogger('BackupFile');

export function backupPathFor(filePath: string): string {
  return `${filePath}.backup`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeJsonWithBackup(filePath: string, data: unknown): Promise<void> {
  const backupPath = backupPathFor(filePath);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    if (await exists(filePath)) {
      await fs.copyFile(filePath, backupPath);
    }
    await fs.writeFile(filePath, serializeJson(data), 'utf8');
  } catch (error) {
    throw new PersistenceError('save', filePath, error);
  }

  try {
    await fs.rm(backupPath, { force: true });
  } catch (error) {
    logger.warn(`Could not remove backup ${backupPath}`, error instanceof Error ? error : { error });
  }
}

/**
 * Read and parse a JSON file. Resolves undefined when the file does not
 * exist; unreadable or malformed files reject with PersistenceError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new PersistenceError('load', filePath, error);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError('load', filePath, error);
  }
}
