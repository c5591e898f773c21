/**
 * Storage contract for documents keyed by id
 */

export type LoadedDocument =
  | { id: string; ok: true; data: unknown }
  | { id: string; ok: false; error: Error };

export interface EntityStore<T> {
  /** Directory holding one `<id>.json` per document */
  readonly directory: string;

  init(): Promise<void>;

  /** Replace the document for `id`. Writes for the same id never interleave. */
  write(id: string, data: T): Promise<void>;

  /** The decoded JSON, or null when no document exists */
  read(id: string): Promise<unknown>;

  /** Resolves false when there was nothing to remove */
  remove(id: string): Promise<boolean>;

  list(): Promise<string[]>;

  /** Every stored document; unreadable ones are reported, not dropped */
  readAll(): Promise<LoadedDocument[]>;

  pathFor(id: string): string;
}
