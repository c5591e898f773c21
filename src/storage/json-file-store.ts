/**
 * JSON file storage adapter
 * One pretty-printed `<id>.json` per document, replaced atomically through
 * a temp file and rename.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError, ValidationError } from '../schemas/errors.js';
import { validateStorageKey } from '../schemas/validation.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { EntityStore, LoadedDocument } from './storage-interface.js';

export interface JsonFileStoreOptions {
  directory: string;
  /** Label used in log lines, e.g. "agent" */
  entity: string;
}

const FILE_EXTENSION = '.json';
const TEMP_SUFFIX = '.tmp';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export class JsonFileStore<T> implements EntityStore<T> {
  readonly directory: string;
  private readonly entity: string;
  private readonly logger: Logger;
  private queues: Map<string, Promise<void>> = new Map(); // id -> tail of pending operations

  constructor(options: JsonFileStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.entity = options.entity;
    this.logger = createLogger(`JsonFileStore:${options.entity}`);
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new PersistenceError('save', this.directory, error);
    }
  }

  pathFor(id: string): string {
    const error = validateStorageKey(id);
    if (error) {
      throw new ValidationError([error]);
    }
    return path.join(this.directory, `${id}${FILE_EXTENSION}`);
  }

  async write(id: string, data: T): Promise<void> {
    const filePath = this.pathFor(id);
    return this.enqueue(id, async () => {
      const tempPath = `${filePath}${TEMP_SUFFIX}`;
      try {
        await fs.mkdir(this.directory, { recursive: true });
        await fs.writeFile(tempPath, serializeJson(data), 'utf8');
        await fs.rename(tempPath, filePath);
      } catch (error) {
        throw new PersistenceError('save', filePath, error);
      }
      this.logger.debug(`Saved ${this.entity} ${id}`);
    });
  }

  async read(id: string): Promise<unknown> {
    const filePath = this.pathFor(id);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError('load', filePath, error);
    }
    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError('load', filePath, error);
    }
  }

  async remove(id: string): Promise<boolean> {
    const filePath = this.pathFor(id);
    return this.enqueue(id, async () => {
      try {
        await fs.unlink(filePath);
      } catch (error) {
        if (isMissingFile(error)) return false;
        throw new PersistenceError('delete', filePath, error);
      }
      this.logger.debug(`Deleted ${this.entity} ${id}`);
      return true;
    });
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new PersistenceError('list', this.directory, error);
    }
    return entries
      .filter((name) => name.endsWith(FILE_EXTENSION))
      .map((name) => name.slice(0, -FILE_EXTENSION.length))
      .sort();
  }

  async readAll(): Promise<LoadedDocument[]> {
    const ids = await this.list();
    const documents: LoadedDocument[] = [];
    for (const id of ids) {
      try {
        documents.push({ id, ok: true, data: await this.read(id) });
      } catch (error) {
        documents.push({ id, ok: false, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }
    return documents;
  }

  /**
   * Run `task` after every earlier operation on the same id has settled.
   */
  private enqueue<R>(id: string, task: () => Promise<R>): Promise<R> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const result = previous.then(task);
    // Earlier failures were already delivered to their own callers
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(id, tail);
    void tail.then(() => {
      if (this.queues.get(id) === tail) {
        this.queues.delete(id);
      }
    });
    return result;
  }
}
