import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AgentModel } from '../models/agent-model.js';
import { AgentService } from '../services/agent-service.js';
import { ContentService } from '../services/content-service.js';
import { ErrorCode, InvalidContentError, NotFoundError } from '../schemas/errors.js';
import { Priority } from '../schemas/models.js';
import { contentCollectionJsonSchema, parseWithSchema, type AgentJson } from '../schemas/persistence.js';
import { MemoryStore } from './helpers.js';

describe('ContentService', () => {
  let store: MemoryStore<AgentJson>;
  let agents: AgentService;
  let content: ContentService;
  let agent: AgentModel;

  async function storedContent() {
    const document = await store.read(agent.id);
    const mcpContent =
      typeof document === 'object' && document !== null && 'mcpContent' in document ? document.mcpContent : undefined;
    return parseWithSchema(contentCollectionJsonSchema, mcpContent);
  }

  beforeEach(async () => {
    store = new MemoryStore<AgentJson>();
    agents = new AgentService(store);
    content = new ContentService(agents);
    agent = await agents.createAgent({ name: 'Worker', systemPrompt: 'Do the work.' });
  });

  afterEach(() => {
    agents.dispose();
  });

  describe('inbox', () => {
    it('should deliver a message and persist the agent', async () => {
      const item = await content.deliverInboxMessage(agent.id, {
        content: 'Please review the parser',
        sender: 'lead',
        priority: Priority.HIGH,
      });

      expect(agent.content.inboxItems).toEqual([item]);
      expect(store.writes).toBe(2);
      const saved = await storedContent();
      expect(saved.inboxItems[0]).toMatchObject({
        id: item.id,
        content: 'Please review the parser',
        sender: 'lead',
        priority: 'high',
        isRead: false,
      });
    });

    it('should reject dangerous content without writing', async () => {
      await expect(content.deliverInboxMessage(agent.id, { content: '<script>x</script>' })).rejects.toBeInstanceOf(
        InvalidContentError
      );
      expect(store.writes).toBe(1);
      expect(agent.content.inboxItems).toHaveLength(0);
    });

    it('should mark items read and unread', async () => {
      const item = await content.deliverInboxMessage(agent.id, { content: 'ping' });

      await content.setInboxItemRead(agent.id, item.id, true);
      expect((await storedContent()).inboxItems[0].isRead).toBe(true);

      await content.setInboxItemRead(agent.id, item.id, false);
      expect(item.isRead).toBe(false);
    });

    it('should raise not found for an unknown agent or item', async () => {
      await expect(content.deliverInboxMessage('missing', { content: 'x' })).rejects.toMatchObject({
        code: ErrorCode.AGENT_NOT_FOUND,
      });
      await expect(content.setInboxItemRead(agent.id, 'missing', true)).rejects.toMatchObject({
        code: ErrorCode.CONTENT_NOT_FOUND,
      });
    });

    it('should report false for removing an unknown item', async () => {
      expect(await content.removeInboxItem(agent.id, 'missing')).toBe(false);
      expect(store.writes).toBe(1);
    });

    it('should remove a delivered item', async () => {
      const item = await content.deliverInboxMessage(agent.id, { content: 'ping' });
      expect(await content.removeInboxItem(agent.id, item.id)).toBe(true);
      expect((await storedContent()).inboxItems).toEqual([]);
    });
  });

  describe('todos', () => {
    it('should add, reorder and complete todos', async () => {
      const first = await content.addTodo(agent.id, { content: 'first' });
      const second = await content.addTodo(agent.id, { content: 'second', tags: ['api'] });
      const third = await content.addTodo(agent.id, { content: 'third', priority: Priority.URGENT });

      const ordered = await content.reorderTodos(agent.id, [third.id, first.id]);
      expect(ordered.map((todo) => todo.content)).toEqual(['third', 'first', 'second']);

      await content.setTodoCompleted(agent.id, second.id, true);
      const saved = await storedContent();
      expect(saved.todoItems.map((todo) => todo.content)).toEqual(['third', 'first', 'second']);
      expect(saved.todoItems[2].isCompleted).toBe(true);
      expect(saved.todoItems[2].tags).toEqual(['api']);
    });

    it('should raise not found for an unknown todo', async () => {
      await expect(content.setTodoCompleted(agent.id, 'missing', true)).rejects.toBeInstanceOf(NotFoundError);
      await expect(content.reorderTodos(agent.id, ['missing'])).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should remove a todo', async () => {
      const todo = await content.addTodo(agent.id, { content: 'temporary' });
      expect(await content.removeTodo(agent.id, todo.id)).toBe(true);
      expect(await content.removeTodo(agent.id, todo.id)).toBe(false);
    });
  });

  describe('notepad', () => {
    it('should replace and append', async () => {
      expect(await content.replaceNotepad(agent.id, 'plan')).toBe('plan');
      expect(await content.appendNotepad(agent.id, ' more')).toBe('plan more');
      expect((await storedContent()).notepad?.content).toBe('plan more');
    });
  });

  it('should summarize the collection', async () => {
    await content.deliverInboxMessage(agent.id, { content: 'one' });
    const read = await content.deliverInboxMessage(agent.id, { content: 'two' });
    await content.setInboxItemRead(agent.id, read.id, true);
    const overdue = await content.addTodo(agent.id, { content: 'late', dueDate: new Date('2025-01-01T00:00:00.000Z') });
    await content.addTodo(agent.id, { content: 'done' }).then((todo) => content.setTodoCompleted(agent.id, todo.id, true));
    await content.replaceNotepad(agent.id, 'line one\nline two');

    expect(content.getSummary(agent.id, new Date('2025-02-01T00:00:00.000Z'))).toEqual({
      agentId: agent.id,
      inbox: 2,
      unread: 1,
      todos: 2,
      pending: 1,
      overdue: 1,
      notepadWords: 4,
      notepadPreview: 'line one\nline two',
    });
    expect(overdue.isOverdue(new Date('2025-02-01T00:00:00.000Z'))).toBe(true);
  });
});
