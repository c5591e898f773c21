/**
 * ContentCollection - the inbox, todo list and notepad owned by one agent
 *
 * Items are owned exclusively by the collection. Every child is subscribed
 * while it is held, so a change to any item surfaces as a change of the
 * collection; removal and dispose() release those subscriptions.
 */

import type { Unsubscribe } from '../core/change-notifier.js';
import { ChangeNotifier } from '../core/change-notifier.js';
import { ConflictError, NotFoundError } from '../schemas/errors.js';
import type { Priority } from '../schemas/models.js';
import {
  contentCollectionJsonSchema,
  parseWithSchema,
  type ContentCollectionJson,
} from '../schemas/persistence.js';
import type { ContentItem } from './content-item.js';
import { InboxItem } from './inbox-item.js';
import { NotepadContent } from './notepad-content.js';
import { TodoItem } from './todo-item.js';

export interface ContentCounts {
  inbox: number;
  unread: number;
  todos: number;
  pending: number;
  overdue: number;
  notepadWords: number;
}

export interface ContentCollectionInit {
  agentId: string;
  notepad?: NotepadContent;
  inboxItems?: InboxItem[];
  todoItems?: TodoItem[];
}

export class ContentCollection extends ChangeNotifier {
  readonly agentId: string;
  readonly notepad: NotepadContent;
  private inbox: InboxItem[] = [];
  private todos: TodoItem[] = [];
  private itemSubscriptions: Map<string, Unsubscribe> = new Map(); // item id -> unsubscribe
  private unsubscribeNotepad: Unsubscribe;

  constructor(init: ContentCollectionInit) {
    super();
    this.agentId = init.agentId;
    this.notepad = init.notepad ?? new NotepadContent({ agentId: init.agentId });
    this.unsubscribeNotepad = this.notepad.subscribe(() => this.notifyListeners());

    for (const item of init.inboxItems ?? []) {
      this.attach(item);
      this.inbox.push(item);
    }
    for (const item of init.todoItems ?? []) {
      this.attach(item);
      this.todos.push(item);
    }
  }

  get inboxItems(): readonly InboxItem[] {
    return [...this.inbox];
  }

  get todoItems(): readonly TodoItem[] {
    return [...this.todos];
  }

  // ============================================================================
  // INBOX
  // ============================================================================

  addInboxItem(item: InboxItem): void {
    this.attach(item);
    this.inbox.push(item);
    this.notifyListeners();
  }

  /**
   * Remove an inbox item by id. Unknown ids are ignored.
   */
  removeInboxItem(id: string): boolean {
    const index = this.inbox.findIndex((item) => item.id === id);
    if (index === -1) return false;
    this.inbox.splice(index, 1);
    this.detach(id);
    this.notifyListeners();
    return true;
  }

  getInboxItem(id: string): InboxItem | undefined {
    return this.inbox.find((item) => item.id === id);
  }

  getUnreadInboxItems(): InboxItem[] {
    return this.inbox.filter((item) => !item.isRead);
  }

  // ============================================================================
  // TODOS
  // ============================================================================

  addTodoItem(item: TodoItem): void {
    this.attach(item);
    this.todos.push(item);
    this.notifyListeners();
  }

  /**
   * Remove a todo item by id. Unknown ids are ignored.
   */
  removeTodoItem(id: string): boolean {
    const index = this.todos.findIndex((item) => item.id === id);
    if (index === -1) return false;
    this.todos.splice(index, 1);
    this.detach(id);
    this.notifyListeners();
    return true;
  }

  getTodoItem(id: string): TodoItem | undefined {
    return this.todos.find((item) => item.id === id);
  }

  /**
   * Put the listed todos first, in the given order; the rest keep their
   * relative order after them. Throws NotFoundError for an unknown id.
   */
  reorderTodoItems(orderedIds: string[]): void {
    const byId = new Map(this.todos.map((item) => [item.id, item]));
    const reordered: TodoItem[] = [];
    const placed = new Set<string>();

    for (const id of orderedIds) {
      const item = byId.get(id);
      if (!item) {
        throw new NotFoundError('todo_item', id);
      }
      if (placed.has(id)) continue;
      placed.add(id);
      reordered.push(item);
    }

    for (const item of this.todos) {
      if (!placed.has(item.id)) {
        reordered.push(item);
      }
    }

    this.todos = reordered;
    this.notifyListeners();
  }

  getPendingTodos(): TodoItem[] {
    return this.todos.filter((item) => !item.isCompleted);
  }

  getOverdueTodos(now: Date = new Date()): TodoItem[] {
    return this.todos.filter((item) => item.isOverdue(now));
  }

  getTodosByPriority(priority: Priority): TodoItem[] {
    return this.todos.filter((item) => item.priority === priority);
  }

  getCounts(now: Date = new Date()): ContentCounts {
    return {
      inbox: this.inbox.length,
      unread: this.getUnreadInboxItems().length,
      todos: this.todos.length,
      pending: this.getPendingTodos().length,
      overdue: this.getOverdueTodos(now).length,
      notepadWords: this.notepad.wordCount,
    };
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  private attach(item: ContentItem): void {
    if (this.itemSubscriptions.has(item.id)) {
      throw new ConflictError(
        item instanceof InboxItem ? 'inbox_item' : 'todo_item',
        `Content item ${item.id} is already in the collection for agent ${this.agentId}`,
        item.id
      );
    }
    this.itemSubscriptions.set(item.id, item.subscribe(() => this.notifyListeners()));
  }

  private detach(id: string): void {
    this.itemSubscriptions.get(id)?.();
    this.itemSubscriptions.delete(id);
  }

  /**
   * Release every child subscription before dropping the items.
   */
  dispose(): void {
    for (const unsubscribe of this.itemSubscriptions.values()) {
      unsubscribe();
    }
    this.itemSubscriptions.clear();
    this.unsubscribeNotepad();
    this.inbox = [];
    this.todos = [];
    super.dispose();
  }

  toJSON(): ContentCollectionJson {
    return {
      agentId: this.agentId,
      notepad: this.notepad.toJSON(),
      inboxItems: this.inbox.map((item) => item.toJSON()),
      todoItems: this.todos.map((item) => item.toJSON()),
    };
  }

  static fromJSON(data: unknown): ContentCollection {
    const json = parseWithSchema(contentCollectionJsonSchema, data);
    return new ContentCollection({
      agentId: json.agentId,
      notepad: json.notepad ? NotepadContent.fromJSON(json.notepad) : undefined,
      inboxItems: json.inboxItems.map((item) => InboxItem.fromJSON(item)),
      todoItems: json.todoItems.map((item) => TodoItem.fromJSON(item)),
    });
  }
}
