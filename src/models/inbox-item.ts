/**
 * InboxItem - a message delivered to an agent's inbox
 */

import { ContentType, type Priority } from '../schemas/models.js';
import { inboxItemJsonSchema, parseWithSchema, type InboxItemJson } from '../schemas/persistence.js';
import { ValidationLimits } from '../schemas/validation.js';
import { ContentItem, type ContentItemInit } from './content-item.js';

export interface InboxItemInit extends ContentItemInit {
  isRead?: boolean;
  sender?: string;
  dateReceived?: Date;
}

export class InboxItem extends ContentItem {
  readonly contentType = ContentType.INBOX;
  readonly dateReceived: Date;
  readonly sender?: string;
  private _isRead: boolean;

  constructor(init: InboxItemInit) {
    super(init);
    this._isRead = init.isRead ?? false;
    this.sender = init.sender;
    this.dateReceived = init.dateReceived ?? this.createdAt;
  }

  get isRead(): boolean {
    return this._isRead;
  }

  /** No-op (and no notification) when already read */
  markAsRead(): void {
    if (this._isRead) return;
    this._isRead = true;
    this.markModified();
  }

  markAsUnread(): void {
    if (!this._isRead) return;
    this._isRead = false;
    this.markModified();
  }

  setPriority(priority: Priority): void {
    this.updatePriority(priority);
  }

  validate(): boolean {
    if (!super.validate()) return false;
    return this.dateReceived.getTime() <= Date.now() + ValidationLimits.CLOCK_SKEW_MS;
  }

  toJSON(): InboxItemJson {
    return {
      ...this.baseJSON(),
      contentType: this.contentType,
      isRead: this._isRead,
      sender: this.sender ?? null,
      dateReceived: this.dateReceived.toISOString(),
    };
  }

  static fromJSON(data: unknown): InboxItem {
    const json = parseWithSchema(inboxItemJsonSchema, data);
    return new InboxItem({
      id: json.id,
      content: json.content,
      priority: json.priority,
      createdAt: new Date(json.createdAt),
      updatedAt: new Date(json.updatedAt),
      metadata: json.metadata,
      isRead: json.isRead,
      sender: json.sender ?? undefined,
      dateReceived: json.dateReceived ? new Date(json.dateReceived) : undefined,
    });
  }
}
