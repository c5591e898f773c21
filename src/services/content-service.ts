/**
 * ContentService - inbox, todo and notepad operations for a given agent
 *
 * Every mutating call persists the owning agent before returning.
 */

import { InboxItem } from '../models/inbox-item.js';
import { TodoItem } from '../models/todo-item.js';
import type { ContentCounts } from '../models/content-collection.js';
import type { AgentModel } from '../models/agent-model.js';
import { NotFoundError } from '../schemas/errors.js';
import type { Priority } from '../schemas/models.js';
import type { JsonObject } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import type { AgentService } from './agent-service.js';

const logger = createLogger('ContentService');

export interface InboxMessageInput {
  content: string;
  sender?: string;
  priority?: Priority;
  metadata?: JsonObject;
}

export interface TodoInput {
  content: string;
  priority?: Priority;
  dueDate?: Date;
  tags?: string[];
  metadata?: JsonObject;
}

export interface ContentSummary extends ContentCounts {
  agentId: string;
  notepadPreview: string;
}

export class ContentService {
  private agentService: AgentService;

  constructor(agentService: AgentService) {
    this.agentService = agentService;
  }

  // ============================================================================
  // INBOX
  // ============================================================================

  async deliverInboxMessage(agentId: string, input: InboxMessageInput): Promise<InboxItem> {
    const agent = this.agentService.require(agentId);
    const item = new InboxItem({
      content: input.content,
      sender: input.sender,
      priority: input.priority,
      metadata: input.metadata,
    });
    agent.content.addInboxItem(item);
    await this.agentService.saveAgent(agentId);

    logger.info(`Delivered inbox item ${item.id} to agent ${agentId}${input.sender ? ` from ${input.sender}` : ''}`);
    return item;
  }

  async setInboxItemRead(agentId: string, itemId: string, read: boolean): Promise<InboxItem> {
    const agent = this.agentService.require(agentId);
    const item = this.requireInboxItem(agent, itemId);
    if (read) {
      item.markAsRead();
    } else {
      item.markAsUnread();
    }
    await this.agentService.saveAgent(agentId);
    return item;
  }

  /** Unknown item ids are ignored; resolves whether anything was removed */
  async removeInboxItem(agentId: string, itemId: string): Promise<boolean> {
    const agent = this.agentService.require(agentId);
    const removed = agent.content.removeInboxItem(itemId);
    if (removed) {
      await this.agentService.saveAgent(agentId);
    }
    return removed;
  }

  // ============================================================================
  // TODOS
  // ============================================================================

  async addTodo(agentId: string, input: TodoInput): Promise<TodoItem> {
    const agent = this.agentService.require(agentId);
    const item = new TodoItem({
      content: input.content,
      priority: input.priority,
      dueDate: input.dueDate,
      tags: input.tags,
      metadata: input.metadata,
    });
    agent.content.addTodoItem(item);
    await this.agentService.saveAgent(agentId);
    return item;
  }

  async setTodoCompleted(agentId: string, itemId: string, completed: boolean): Promise<TodoItem> {
    const agent = this.agentService.require(agentId);
    const item = this.requireTodoItem(agent, itemId);
    if (completed) {
      item.markAsCompleted();
    } else {
      item.markAsIncomplete();
    }
    await this.agentService.saveAgent(agentId);
    return item;
  }

  async removeTodo(agentId: string, itemId: string): Promise<boolean> {
    const agent = this.agentService.require(agentId);
    const removed = agent.content.removeTodoItem(itemId);
    if (removed) {
      await this.agentService.saveAgent(agentId);
    }
    return removed;
  }

  async reorderTodos(agentId: string, orderedIds: string[]): Promise<TodoItem[]> {
    const agent = this.agentService.require(agentId);
    agent.content.reorderTodoItems(orderedIds);
    await this.agentService.saveAgent(agentId);
    return [...agent.content.todoItems];
  }

  // ============================================================================
  // NOTEPAD
  // ============================================================================

  async replaceNotepad(agentId: string, content: string): Promise<string> {
    const agent = this.agentService.require(agentId);
    agent.content.notepad.updateContent(content);
    await this.agentService.saveAgent(agentId);
    return agent.content.notepad.content;
  }

  async appendNotepad(agentId: string, text: string): Promise<string> {
    const agent = this.agentService.require(agentId);
    agent.content.notepad.appendContent(text);
    await this.agentService.saveAgent(agentId);
    return agent.content.notepad.content;
  }

  getSummary(agentId: string, now: Date = new Date()): ContentSummary {
    const agent = this.agentService.require(agentId);
    return {
      agentId,
      ...agent.content.getCounts(now),
      notepadPreview: agent.content.notepad.getContentPreview(),
    };
  }

  private requireInboxItem(agent: AgentModel, itemId: string): InboxItem {
    const item = agent.content.getInboxItem(itemId);
    if (!item) {
      throw new NotFoundError('inbox_item', itemId);
    }
    return item;
  }

  private requireTodoItem(agent: AgentModel, itemId: string): TodoItem {
    const item = agent.content.getTodoItem(itemId);
    if (!item) {
      throw new NotFoundError('todo_item', itemId);
    }
    return item;
  }
}
