/**
 * NotepadContent - free-form scratch text owned by one agent
 *
 * Unlike inbox and todo items the notepad may be empty. Word, line and
 * character counts are computed lazily and dropped on every write.
 */

import { v4 as uuid } from 'uuid';
import { ChangeNotifier } from '../core/change-notifier.js';
import { notepadJsonSchema, parseWithSchema, type NotepadJson } from '../schemas/persistence.js';
import { ValidationLimits } from '../schemas/validation.js';

export interface NotepadInit {
  id?: string;
  agentId: string;
  content?: string;
  createdAt?: Date;
  lastModified?: Date;
}

interface NotepadStats {
  wordCount?: number;
  lineCount?: number;
  characterCount?: number;
}

export class NotepadContent extends ChangeNotifier {
  readonly id: string;
  readonly agentId: string;
  readonly createdAt: Date;
  private _content: string;
  private _lastModified: Date;
  private stats: NotepadStats = {};

  constructor(init: NotepadInit) {
    super();
    this.id = init.id ?? uuid();
    this.agentId = init.agentId;
    this._content = init.content ?? '';
    this.createdAt = init.createdAt ?? new Date();
    this._lastModified = init.lastModified ?? this.createdAt;
  }

  get content(): string {
    return this._content;
  }

  get lastModified(): Date {
    return this._lastModified;
  }

  get isEmpty(): boolean {
    return this._content.trim().length === 0;
  }

  get wordCount(): number {
    if (this.stats.wordCount === undefined) {
      const trimmed = this._content.trim();
      this.stats.wordCount = trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
    }
    return this.stats.wordCount;
  }

  get lineCount(): number {
    if (this.stats.lineCount === undefined) {
      this.stats.lineCount = this._content.length === 0 ? 1 : this._content.split('\n').length;
    }
    return this.stats.lineCount;
  }

  get characterCount(): number {
    if (this.stats.characterCount === undefined) {
      this.stats.characterCount = this._content.length;
    }
    return this.stats.characterCount;
  }

  updateContent(content: string): void {
    this.write(content);
  }

  appendContent(text: string): void {
    this.write(this._content + text);
  }

  prependContent(text: string): void {
    this.write(text + this._content);
  }

  clearContent(): void {
    this.write('');
  }

  getContentLines(): string[] {
    return this._content.length === 0 ? [''] : this._content.split('\n');
  }

  getContentPreview(maxLines: number = ValidationLimits.NOTEPAD_PREVIEW_DEFAULT_LINES): string {
    return this.getContentLines().slice(0, Math.max(0, maxLines)).join('\n');
  }

  private write(content: string): void {
    this._content = content;
    this.stats = {};
    const now = Date.now();
    if (now > this._lastModified.getTime()) {
      this._lastModified = new Date(now);
    }
    this.notifyListeners();
  }

  toJSON(): NotepadJson {
    return {
      id: this.id,
      agentId: this.agentId,
      content: this._content,
      createdAt: this.createdAt.toISOString(),
      lastModified: this._lastModified.toISOString(),
    };
  }

  static fromJSON(data: unknown): NotepadContent {
    const json = parseWithSchema(notepadJsonSchema, data);
    return new NotepadContent({
      id: json.id,
      agentId: json.agentId,
      content: json.content,
      createdAt: new Date(json.createdAt),
      lastModified: new Date(json.lastModified),
    });
  }
}
