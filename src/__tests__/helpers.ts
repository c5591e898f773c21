import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type {
  AgentRuntime,
  AgentRuntimeConfig,
  ConversationMessage,
  RuntimeResponse,
  SendMessageOptions,
} from '../mcp/agent-runtime.js';
import type { MCPTransport } from '../mcp/transport.js';
import type { MCPServerType, ServerCapabilities, ServerConnectionConfig } from '../schemas/models.js';
import type { EntityStore, LoadedDocument } from '../storage/storage-interface.js';

export async function makeTempDir(prefix = 'vibecoder-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Keeps documents in memory, round-tripped through JSON like the file store */
export class MemoryStore<T> implements EntityStore<T> {
  readonly directory = 'memory';
  readonly documents: Map<string, string> = new Map();
  writes = 0;

  async init(): Promise<void> {}

  async write(id: string, data: T): Promise<void> {
    this.writes++;
    this.documents.set(id, JSON.stringify(data));
  }

  async read(id: string): Promise<unknown> {
    const raw = this.documents.get(id);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async remove(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }

  async list(): Promise<string[]> {
    return Array.from(this.documents.keys()).sort();
  }

  async readAll(): Promise<LoadedDocument[]> {
    const ids = await this.list();
    return Promise.all(ids.map(async (id): Promise<LoadedDocument> => ({ id, ok: true, data: await this.read(id) })));
  }

  pathFor(id: string): string {
    return `memory/${id}.json`;
  }
}

/**
 * Scripted runtime: answers with `reply: <text>`, optionally leaves
 * `toolRounds` rounds of pending tool calls, or fails with `failWith`.
 */
export class FakeRuntime implements AgentRuntime {
  readonly history: ConversationMessage[] = [];
  readonly sendOptions: SendMessageOptions[] = [];
  toolRounds = 0;
  continueCalls = 0;
  failWith?: Error;
  disposed = false;

  constructor(readonly config: AgentRuntimeConfig) {}

  get hasUnprocessedToolCalls(): boolean {
    return this.toolRounds > 0;
  }

  async sendUserMessageAndGetResponse(text: string, options: SendMessageOptions = {}): Promise<RuntimeResponse> {
    this.sendOptions.push(options);
    if (this.failWith) throw this.failWith;
    this.addUserMessage(text);
    const content = `reply: ${text}`;
    this.addAssistantMessage(content);
    return { content };
  }

  async processAndContinue(): Promise<RuntimeResponse> {
    this.continueCalls++;
    this.toolRounds = Math.max(0, this.toolRounds - 1);
    return { content: `continued ${this.continueCalls}`, toolCallCount: 1 };
  }

  getHistory(): ConversationMessage[] {
    return [...this.history];
  }

  addUserMessage(text: string): void {
    this.history.push({ role: 'user', content: text, timestamp: new Date() });
  }

  addAssistantMessage(text: string): void {
    this.history.push({ role: 'assistant', content: text, timestamp: new Date() });
  }

  addSystemMessage(text: string): void {
    this.history.push({ role: 'system', content: text, timestamp: new Date() });
  }

  dispose(): void {
    this.disposed = true;
  }
}

/** Records every runtime it creates */
export function fakeRuntimeFactory(): { factory: (config: AgentRuntimeConfig) => FakeRuntime; created: FakeRuntime[] } {
  const created: FakeRuntime[] = [];
  return {
    created,
    factory: (config) => {
      const runtime = new FakeRuntime(config);
      created.push(runtime);
      return runtime;
    },
  };
}

/** Transport that reports fixed capabilities per server name, or fails */
export class FakeTransport implements MCPTransport {
  readonly connected: Set<string> = new Set();
  readonly configs: ServerConnectionConfig[] = [];
  failWith?: Error;

  constructor(
    private readonly supportedTypes: MCPServerType[],
    private readonly capabilities: ServerCapabilities
  ) {}

  supports(type: MCPServerType): boolean {
    return this.supportedTypes.includes(type);
  }

  async connect(serverId: string, config: ServerConnectionConfig): Promise<ServerCapabilities> {
    this.configs.push(config);
    if (this.failWith) throw this.failWith;
    this.connected.add(serverId);
    return this.capabilities;
  }

  async disconnect(serverId: string): Promise<void> {
    this.connected.delete(serverId);
  }
}
