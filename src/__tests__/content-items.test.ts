import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InboxItem } from '../models/inbox-item.js';
import { TodoItem } from '../models/todo-item.js';
import { NotepadContent } from '../models/notepad-content.js';
import { ErrorCode, InvalidContentError, ValidationError } from '../schemas/errors.js';
import { Priority } from '../schemas/models.js';

const T0 = new Date('2025-03-01T10:00:00.000Z');
const HOUR = 60 * 60 * 1000;

describe('InboxItem', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should sanitize content and apply defaults', () => {
    const item = new InboxItem({ content: '  Build\u0000 the parser  ' });

    expect(item.content).toBe('Build the parser');
    expect(item.priority).toBe(Priority.MEDIUM);
    expect(item.isRead).toBe(false);
    expect(item.sender).toBeUndefined();
    expect(item.createdAt).toEqual(T0);
    expect(item.updatedAt).toEqual(T0);
    expect(item.dateReceived).toEqual(T0);
    expect(item.validate()).toBe(true);
  });

  it('should reject content that is empty after sanitizing', () => {
    expect(() => new InboxItem({ content: ' \u0001\u0002  ' })).toThrow(InvalidContentError);
  });

  it('should reject dangerous content with the invalid-content code', () => {
    let caught: unknown;
    try {
      new InboxItem({ content: 'see <script>alert(1)</script>' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidContentError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONTENT, status: 400 });
  });

  it('should leave content unchanged when an update is rejected', () => {
    const item = new InboxItem({ content: 'original' });
    expect(() => item.updateContent('   ')).toThrow(InvalidContentError);
    expect(item.content).toBe('original');
  });

  it('should reject updatedAt before createdAt', () => {
    expect(
      () => new InboxItem({ content: 'x', createdAt: T0, updatedAt: new Date(T0.getTime() - 1) })
    ).toThrow(ValidationError);
  });

  it('should notify and bump updatedAt only when the read flag changes', () => {
    const item = new InboxItem({ content: 'hello' });
    const listener = vi.fn();
    item.subscribe(listener);

    vi.setSystemTime(T0.getTime() + 1000);
    item.markAsRead();
    item.markAsRead();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(item.isRead).toBe(true);
    expect(item.updatedAt).toEqual(new Date(T0.getTime() + 1000));

    item.markAsUnread();
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('should never move updatedAt backwards', () => {
    const item = new InboxItem({ content: 'hello', createdAt: T0, updatedAt: new Date(T0.getTime() + 5000) });
    item.setPriority(Priority.HIGH);
    expect(item.updatedAt).toEqual(new Date(T0.getTime() + 5000));
  });

  it('should copy metadata in and out', () => {
    const item = new InboxItem({ content: 'hello' });
    const listener = vi.fn();
    item.subscribe(listener);
    const labels = ['review'];

    item.setMetadata('labels', labels);
    labels.push('later');

    expect(item.getMetadata('labels')).toEqual(['review']);
    item.removeMetadata('labels');
    expect(item.getMetadata('labels')).toBeUndefined();
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('should preview the first lines', () => {
    const item = new InboxItem({ content: 'l1\nl2\nl3\nl4\nl5\nl6' });
    expect(item.getPreview()).toBe('l1\nl2\nl3\nl4\nl5');
    expect(item.getPreviewLines(2)).toEqual(['l1', 'l2']);
  });

  it('should return shorter content whole from the preview', () => {
    const item = new InboxItem({ content: 'first line\nsecond line\nthird line' });
    expect(item.getPreview(5)).toBe('first line\nsecond line\nthird line');
    expect(item.getPreviewLines(5)).toEqual(['first line', 'second line', 'third line']);
  });

  it('should fail validation for a malformed id or a future creation time', () => {
    expect(new InboxItem({ id: 'not-a-uuid', content: 'x' }).validate()).toBe(false);
    const future = new Date(T0.getTime() + 5000);
    expect(new InboxItem({ content: 'x', createdAt: future }).validate()).toBe(false);
  });

  it('should accept a creation time within one second of now', () => {
    const nearFuture = new Date(T0.getTime() + 900);
    expect(new InboxItem({ content: 'x', createdAt: nearFuture }).validate()).toBe(true);
  });

  it('should write a null sender and read it back', () => {
    const item = new InboxItem({ content: 'ping', priority: Priority.URGENT, metadata: { thread: 7 } });
    const json = item.toJSON();

    expect(json).toEqual({
      id: item.id,
      content: 'ping',
      priority: 'urgent',
      createdAt: T0.toISOString(),
      updatedAt: T0.toISOString(),
      metadata: { thread: 7 },
      contentType: 'inbox',
      isRead: false,
      sender: null,
      dateReceived: T0.toISOString(),
    });

    const restored = InboxItem.fromJSON(JSON.parse(JSON.stringify(json)));
    expect(restored.id).toBe(item.id);
    expect(restored.sender).toBeUndefined();
    expect(restored.priority).toBe(Priority.URGENT);
    expect(restored.getMetadata('thread')).toBe(7);
  });

  it('should decode an unknown priority as medium', () => {
    const item = InboxItem.fromJSON({
      id: '123e4567-e89b-42d3-a456-426614174000',
      contentType: 'inbox',
      content: 'legacy',
      priority: 'critical',
      createdAt: T0.toISOString(),
      updatedAt: T0.toISOString(),
    });
    expect(item.priority).toBe(Priority.MEDIUM);
    expect(item.metadata).toEqual({});
  });

  it('should reject a document of another content type', () => {
    const json = { ...new TodoItem({ content: 'task' }).toJSON() };
    expect(() => InboxItem.fromJSON(json)).toThrow(ValidationError);
  });
});

describe('TodoItem', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should stamp and clear completedAt with the completed flag', () => {
    const todo = new TodoItem({ content: 'write tests' });
    vi.setSystemTime(T0.getTime() + HOUR);

    todo.markAsCompleted();
    expect(todo.isCompleted).toBe(true);
    expect(todo.completedAt).toEqual(new Date(T0.getTime() + HOUR));
    expect(todo.validate()).toBe(true);

    todo.markAsIncomplete();
    expect(todo.isCompleted).toBe(false);
    expect(todo.completedAt).toBeUndefined();
    expect(todo.validate()).toBe(true);
  });

  it('should not notify when completing twice', () => {
    const todo = new TodoItem({ content: 'once' });
    const listener = vi.fn();
    todo.subscribe(listener);

    todo.markAsCompleted();
    todo.markAsCompleted();

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should give a completed item without a stamp its update time', () => {
    const updatedAt = new Date(T0.getTime() + 2000);
    const todo = new TodoItem({ content: 'done', isCompleted: true, createdAt: T0, updatedAt });
    expect(todo.completedAt).toEqual(updatedAt);
  });

  it('should normalize tags', () => {
    const todo = new TodoItem({ content: 'tags', tags: [' api ', 'api', '', 'docs'] });
    expect(todo.tags).toEqual(['api', 'docs']);
    expect(todo.hasTag(' docs ')).toBe(true);
  });

  it('should ignore blank and duplicate tags and unknown removals', () => {
    const todo = new TodoItem({ content: 'tags', tags: ['api'] });
    const listener = vi.fn();
    todo.subscribe(listener);

    todo.addTag('   ');
    todo.addTag('api');
    todo.removeTag('missing');
    expect(listener).not.toHaveBeenCalled();

    todo.addTag(' ui ');
    todo.removeTag('api');
    expect(listener).toHaveBeenCalledTimes(2);
    expect(todo.tags).toEqual(['ui']);
  });

  it('should report overdue only while incomplete', () => {
    const todo = new TodoItem({ content: 'ship', dueDate: new Date(T0.getTime() + HOUR) });
    const later = new Date(T0.getTime() + 2 * HOUR);

    expect(todo.isOverdue(T0)).toBe(false);
    expect(todo.isOverdue(later)).toBe(true);

    todo.markAsCompleted();
    expect(todo.isOverdue(later)).toBe(false);
  });

  it('should report time until due', () => {
    const todo = new TodoItem({ content: 'ship', dueDate: new Date(T0.getTime() + HOUR) });
    expect(todo.timeUntilDue(T0)).toBe(HOUR);
    expect(todo.timeUntilDue(new Date(T0.getTime() + 2 * HOUR))).toBeNull();
    expect(new TodoItem({ content: 'no date' }).timeUntilDue(T0)).toBeNull();
  });

  it('should stay valid with a due date in the past', () => {
    const todo = new TodoItem({ content: 'late', dueDate: new Date(T0.getTime() - HOUR) });
    expect(todo.validate()).toBe(true);
  });

  it('should round trip through JSON', () => {
    const todo = new TodoItem({
      content: 'refactor',
      priority: Priority.HIGH,
      dueDate: new Date(T0.getTime() + HOUR),
      tags: ['core'],
    });
    const json = todo.toJSON();

    expect(json.dueDate).toBe(new Date(T0.getTime() + HOUR).toISOString());
    expect(json.completedAt).toBeNull();

    const restored = TodoItem.fromJSON(JSON.parse(JSON.stringify(json)));
    expect(restored.toJSON()).toEqual(json);
  });
});

describe('NotepadContent', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should describe an empty notepad', () => {
    const notepad = new NotepadContent({ agentId: 'agent-1' });
    expect(notepad.isEmpty).toBe(true);
    expect(notepad.wordCount).toBe(0);
    expect(notepad.lineCount).toBe(1);
    expect(notepad.characterCount).toBe(0);
    expect(notepad.getContentLines()).toEqual(['']);
  });

  it('should count words, lines and characters', () => {
    const notepad = new NotepadContent({ agentId: 'agent-1', content: 'hello world\nsecond line' });
    expect(notepad.wordCount).toBe(4);
    expect(notepad.lineCount).toBe(2);
    expect(notepad.characterCount).toBe(23);
  });

  it('should recompute counts after each write', () => {
    const notepad = new NotepadContent({ agentId: 'agent-1', content: 'one' });
    expect(notepad.wordCount).toBe(1);

    notepad.appendContent(' two');
    notepad.prependContent('zero ');
    expect(notepad.content).toBe('zero one two');
    expect(notepad.wordCount).toBe(3);

    notepad.clearContent();
    expect(notepad.wordCount).toBe(0);
    expect(notepad.isEmpty).toBe(true);
  });

  it('should notify and bump lastModified on every write', () => {
    const notepad = new NotepadContent({ agentId: 'agent-1' });
    const listener = vi.fn();
    notepad.subscribe(listener);

    vi.setSystemTime(T0.getTime() + 500);
    notepad.updateContent('draft');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(notepad.lastModified).toEqual(new Date(T0.getTime() + 500));
  });

  it('should preview the first ten lines', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `line ${i + 1}`);
    const notepad = new NotepadContent({ agentId: 'agent-1', content: lines.join('\n') });
    expect(notepad.getContentPreview()).toBe(lines.slice(0, 10).join('\n'));
    expect(notepad.getContentPreview(1)).toBe('line 1');
  });

  it('should round trip through JSON', () => {
    const notepad = new NotepadContent({ agentId: 'agent-1', content: 'notes' });
    const restored = NotepadContent.fromJSON(JSON.parse(JSON.stringify(notepad.toJSON())));
    expect(restored.toJSON()).toEqual({
      id: notepad.id,
      agentId: 'agent-1',
      content: 'notes',
      createdAt: T0.toISOString(),
      lastModified: T0.toISOString(),
    });
  });
});
