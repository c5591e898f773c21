/**
 * ContentItem - shared base for inbox and todo entries
 *
 * Content is sanitized and validated on every write. `updatedAt` never moves
 * backwards and never precedes `createdAt`.
 */

import { v4 as uuid } from 'uuid';
import { ChangeNotifier } from '../core/change-notifier.js';
import { InvalidContentError, ValidationError } from '../schemas/errors.js';
import { ContentType, Priority } from '../schemas/models.js';
import {
  ValidationLimits,
  sanitizeContent,
  validateContent,
  validateId,
} from '../schemas/validation.js';
import { cloneJsonObject, type JsonObject, type JsonValue } from './types.js';

export interface ContentItemInit {
  id?: string;
  content: string;
  priority?: Priority;
  createdAt?: Date;
  updatedAt?: Date;
  metadata?: JsonObject;
}

/** Sanitize then validate, throwing InvalidContentError when nothing usable remains */
export function prepareContent(raw: string): string {
  const sanitized = sanitizeContent(raw);
  const error = validateContent(sanitized);
  if (error) {
    throw new InvalidContentError([error]);
  }
  return sanitized;
}

export abstract class ContentItem extends ChangeNotifier {
  readonly id: string;
  readonly createdAt: Date;
  abstract readonly contentType: ContentType;

  private _content: string;
  private _priority: Priority;
  private _updatedAt: Date;
  private _metadata: JsonObject;

  protected constructor(init: ContentItemInit) {
    super();
    const now = new Date();
    this.id = init.id ?? uuid();
    this._content = prepareContent(init.content);
    this._priority = init.priority ?? Priority.MEDIUM;
    this.createdAt = init.createdAt ?? now;
    this._updatedAt = init.updatedAt ?? this.createdAt;
    this._metadata = init.metadata ? cloneJsonObject(init.metadata) : {};

    if (this._updatedAt.getTime() < this.createdAt.getTime()) {
      throw ValidationError.single('updatedAt', 'updatedAt cannot precede createdAt', 'INVALID_TIMESTAMP');
    }
  }

  get content(): string {
    return this._content;
  }

  get priority(): Priority {
    return this._priority;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get metadata(): JsonObject {
    return cloneJsonObject(this._metadata);
  }

  /**
   * Replace the content. Throws InvalidContentError (and changes nothing)
   * when the sanitized text fails validation.
   */
  updateContent(raw: string): void {
    this._content = prepareContent(raw);
    this.markModified();
  }

  updatePriority(priority: Priority): void {
    this._priority = priority;
    this.markModified();
  }

  getMetadata(key: string): JsonValue | undefined {
    const value = this._metadata[key];
    return value === undefined ? undefined : structuredClone(value);
  }

  setMetadata(key: string, value: JsonValue): void {
    this._metadata[key] = structuredClone(value);
    this.markModified();
  }

  removeMetadata(key: string): void {
    delete this._metadata[key];
    this.markModified();
  }

  /** First `maxLines` lines of the content, or all of it when shorter */
  getPreview(maxLines: number = ValidationLimits.PREVIEW_DEFAULT_LINES): string {
    return this.getPreviewLines(maxLines).join('\n');
  }

  getPreviewLines(maxLines: number = ValidationLimits.PREVIEW_DEFAULT_LINES): string[] {
    return this._content.split('\n').slice(0, Math.max(0, maxLines));
  }

  /**
   * Check the stored state: well-formed id, valid content and sane
   * timestamps (createdAt no later than now plus one second of skew).
   */
  validate(): boolean {
    if (validateId(this.id) || validateContent(this._content)) {
      return false;
    }
    const latest = Date.now() + ValidationLimits.CLOCK_SKEW_MS;
    return this.createdAt.getTime() <= latest && this._updatedAt.getTime() >= this.createdAt.getTime();
  }

  /** Bump `updatedAt` and notify observers */
  protected markModified(): void {
    const now = Date.now();
    if (now > this._updatedAt.getTime()) {
      this._updatedAt = new Date(now);
    }
    this.notifyListeners();
  }

  protected baseJSON() {
    return {
      id: this.id,
      content: this._content,
      priority: this._priority,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
      metadata: cloneJsonObject(this._metadata),
    };
  }

  toString(): string {
    const preview = this._content.length > 50 ? `${this._content.slice(0, 50)}...` : this._content;
    return `${this.constructor.name}(${this.id}, ${this._priority}, "${preview}")`;
  }
}
