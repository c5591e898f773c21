/**
 * TodoItem - a task on an agent's todo list
 *
 * `completedAt` is set exactly when the item is completed. Tags are trimmed,
 * non-empty and unique.
 */

import { ContentType } from '../schemas/models.js';
import { parseWithSchema, todoItemJsonSchema, type TodoItemJson } from '../schemas/persistence.js';
import { ContentItem, type ContentItemInit } from './content-item.js';

export interface TodoItemInit extends ContentItemInit {
  isCompleted?: boolean;
  dueDate?: Date;
  completedAt?: Date;
  tags?: string[];
}

function normalizeTags(tags: string[]): string[] {
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed.length > 0 && !result.includes(trimmed)) {
      result.push(trimmed);
    }
  }
  return result;
}

export class TodoItem extends ContentItem {
  readonly contentType = ContentType.TODO;
  private _isCompleted: boolean;
  private _dueDate?: Date;
  private _completedAt?: Date;
  private _tags: string[];

  constructor(init: TodoItemInit) {
    super(init);
    this._isCompleted = init.isCompleted ?? false;
    this._dueDate = init.dueDate;
    // A completed item without a completion stamp takes its last update time
    this._completedAt = this._isCompleted ? (init.completedAt ?? this.updatedAt) : undefined;
    this._tags = normalizeTags(init.tags ?? []);
  }

  get isCompleted(): boolean {
    return this._isCompleted;
  }

  get dueDate(): Date | undefined {
    return this._dueDate;
  }

  get completedAt(): Date | undefined {
    return this._completedAt;
  }

  get tags(): readonly string[] {
    return [...this._tags];
  }

  markAsCompleted(): void {
    if (this._isCompleted) return;
    this._isCompleted = true;
    this._completedAt = new Date();
    this.markModified();
  }

  markAsIncomplete(): void {
    if (!this._isCompleted) return;
    this._isCompleted = false;
    this._completedAt = undefined;
    this.markModified();
  }

  /** Pass undefined to clear the due date */
  setDueDate(dueDate: Date | undefined): void {
    this._dueDate = dueDate;
    this.markModified();
  }

  /** Blank and duplicate tags are ignored */
  addTag(tag: string): void {
    const trimmed = tag.trim();
    if (trimmed.length === 0 || this._tags.includes(trimmed)) return;
    this._tags.push(trimmed);
    this.markModified();
  }

  removeTag(tag: string): void {
    const index = this._tags.indexOf(tag);
    if (index === -1) return;
    this._tags.splice(index, 1);
    this.markModified();
  }

  hasTag(tag: string): boolean {
    return this._tags.includes(tag.trim());
  }

  isOverdue(now: Date = new Date()): boolean {
    return this._dueDate !== undefined && !this._isCompleted && now.getTime() > this._dueDate.getTime();
  }

  /**
   * Milliseconds left until the due date; null without a due date or once
   * it has passed.
   */
  timeUntilDue(now: Date = new Date()): number | null {
    if (!this._dueDate) return null;
    const remaining = this._dueDate.getTime() - now.getTime();
    return remaining > 0 ? remaining : null;
  }

  validate(): boolean {
    if (!super.validate()) return false;
    if (this._isCompleted !== (this._completedAt !== undefined)) return false;
    if (this._completedAt && this._completedAt.getTime() < this.createdAt.getTime()) return false;
    return true;
  }

  toJSON(): TodoItemJson {
    return {
      ...this.baseJSON(),
      contentType: this.contentType,
      isCompleted: this._isCompleted,
      dueDate: this._dueDate?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      tags: [...this._tags],
    };
  }

  static fromJSON(data: unknown): TodoItem {
    const json = parseWithSchema(todoItemJsonSchema, data);
    return new TodoItem({
      id: json.id,
      content: json.content,
      priority: json.priority,
      createdAt: new Date(json.createdAt),
      updatedAt: new Date(json.updatedAt),
      metadata: json.metadata,
      isCompleted: json.isCompleted,
      dueDate: json.dueDate ? new Date(json.dueDate) : undefined,
      completedAt: json.completedAt ? new Date(json.completedAt) : undefined,
      tags: json.tags,
    });
  }
}
