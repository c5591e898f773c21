import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { VibeCoderServer } from '../server.js';
import { ErrorCode } from '../schemas/errors.js';
import { MCPServerType } from '../schemas/models.js';
import { FakeTransport, fakeRuntimeFactory, makeTempDir, removeDir } from './helpers.js';

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown(),
  error: z.object({ code: z.string(), message: z.string(), status: z.number() }).optional(),
});

const withIdSchema = z.object({ id: z.string() });

interface ApiResult {
  status: number;
  body: z.infer<typeof envelopeSchema>;
}

describe('REST API', () => {
  let dir: string;
  let server: VibeCoderServer;
  let runtimes: ReturnType<typeof fakeRuntimeFactory>;

  async function call(method: string, route: string, body?: unknown): Promise<ApiResult> {
    const response = await fetch(`http://127.0.0.1:${server.port}/api/v1${route}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    return { status: response.status, body: envelopeSchema.parse(await response.json()) };
  }

  async function createAgent(name = 'Coder'): Promise<string> {
    const result = await call('POST', '/agents', { name, systemPrompt: 'You write code.' });
    return withIdSchema.parse(result.body.data).id;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    runtimes = fakeRuntimeFactory();
    server = new VibeCoderServer({
      config: {
        port: 0,
        rootDir: dir,
        agentsDir: path.join(dir, 'agents'),
        serversDir: path.join(dir, 'servers'),
        preferencesPath: path.join(dir, 'layout_preferences.json'),
      },
      runtimeFactory: runtimes.factory,
      transport: new FakeTransport([MCPServerType.STDIO], {
        tools: [{ name: 'read_file', inputSchema: {} }],
        resources: [],
        prompts: [],
      }),
    });
    await server.start();
  });

  afterEach(async () => {
    await server.stop();
    await removeDir(dir);
  });

  it('should report health', async () => {
    const result = await call('GET', '/health');

    expect(result.status).toBe(200);
    expect(result.body.data).toMatchObject({
      status: 'healthy',
      stats: { agents: 0, activeAgents: 0, servers: 0, connectedServers: 0, tools: 0 },
    });
  });

  describe('agents', () => {
    it('should create an agent and write its file', async () => {
      const result = await call('POST', '/agents', { name: 'Coder', systemPrompt: 'You write code.' });

      expect(result.status).toBe(201);
      expect(result.body.data).toMatchObject({ name: 'Coder', temperature: 0.7, maxTokens: 4000 });
      const { id } = withIdSchema.parse(result.body.data);
      const saved = JSON.parse(await fs.readFile(path.join(dir, 'agents', `${id}.json`), 'utf8'));
      expect(saved.name).toBe('Coder');
    });

    it('should answer a duplicate name with 409', async () => {
      await createAgent();
      const result = await call('POST', '/agents', { name: 'Coder', systemPrompt: 'again' });

      expect(result.status).toBe(409);
      expect(result.body.error?.code).toBe(ErrorCode.AGENT_ALREADY_EXISTS);
    });

    it('should answer an unknown agent with 404', async () => {
      const result = await call('GET', '/agents/missing');

      expect(result.status).toBe(404);
      expect(result.body.success).toBe(false);
      expect(result.body.error?.code).toBe(ErrorCode.AGENT_NOT_FOUND);
    });

    it('should list every validation failure', async () => {
      const result = await call('POST', '/agents', { name: 'Hot', systemPrompt: 'x', temperature: 5, maxTokens: 50 });

      expect(result.status).toBe(400);
      expect(result.body.error).toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Validation failed: Temperature must be between 0.0 and 2.0, Max tokens must be between 100 and 32000',
      });
    });

    it('should update and delete', async () => {
      const id = await createAgent();

      const updated = await call('PATCH', `/agents/${id}`, { temperature: 1.5, isActive: false });
      expect(updated.body.data).toMatchObject({ temperature: 1.5, isActive: false });

      const deleted = await call('DELETE', `/agents/${id}`);
      expect(deleted.body.data).toEqual({ id, deleted: true });
      expect((await call('GET', `/agents/${id}`)).status).toBe(404);
    });
  });

  describe('conversation', () => {
    it('should relay a message through the runtime', async () => {
      const id = await createAgent();

      const result = await call('POST', `/agents/${id}/messages`, { message: 'hello' });

      expect(result.status).toBe(200);
      expect(result.body.data).toEqual({ response: 'reply: hello', status: 'idle' });
      expect(runtimes.created[0].sendOptions[0].enabledTools).toEqual([]);
      const history = await call('GET', `/agents/${id}/history`);
      expect(history.body.data).toHaveLength(2);
    });

    it('should persist the error status when the runtime fails', async () => {
      const id = await createAgent();
      await call('POST', `/agents/${id}/messages`, { message: 'warm up' });
      runtimes.created[0].failWith = new Error('model offline');

      const result = await call('POST', `/agents/${id}/messages`, { message: 'hello' });

      expect(result.status).toBe(502);
      expect(result.body.error?.code).toBe(ErrorCode.RUNTIME_ERROR);
      const saved = JSON.parse(await fs.readFile(path.join(dir, 'agents', `${id}.json`), 'utf8'));
      expect(saved.processingStatus).toMatchObject({ status: 'error', errorMessage: 'model offline' });
    });

    it('should answer with the runtime failure when saving the status also fails', async () => {
      const id = await createAgent();
      await call('POST', `/agents/${id}/messages`, { message: 'warm up' });
      runtimes.created[0].failWith = new Error('model offline');
      const agentsDir = path.join(dir, 'agents');
      await fs.rm(agentsDir, { recursive: true, force: true });
      await fs.writeFile(agentsDir, 'not a directory');

      const result = await call('POST', `/agents/${id}/messages`, { message: 'hello' });

      expect(result.status).toBe(502);
      expect(result.body.error).toMatchObject({
        code: ErrorCode.RUNTIME_ERROR,
        message: `Runtime failed for agent ${id}: model offline`,
      });
    });

    it('should offer only tools the agent has enabled', async () => {
      const id = await createAgent();
      await call('POST', '/servers/import', { mcpServers: { filesystem: { command: 'fs-server' } } });
      await call('POST', '/servers/filesystem/connect');

      expect((await call('GET', `/agents/${id}/tools`)).body.data).toHaveLength(1);
      await call('PUT', `/agents/${id}/preferences/tools/filesystem:read_file`, { enabled: false });
      await call('POST', `/agents/${id}/messages`, { message: 'hello' });

      expect(runtimes.created[0].sendOptions[0].enabledTools).toEqual([]);
      expect((await call('GET', `/agents/${id}/preferences`)).body.data).toEqual({
        servers: {},
        tools: { 'filesystem:read_file': false },
      });
    });
  });

  describe('content', () => {
    it('should deliver inbox items and summarize', async () => {
      const id = await createAgent();

      const posted = await call('POST', `/agents/${id}/inbox`, { content: 'Review the diff', sender: 'lead' });
      expect(posted.status).toBe(201);
      expect(posted.body.data).toMatchObject({ content: 'Review the diff', sender: 'lead', isRead: false });

      await call('POST', `/agents/${id}/todos`, { content: 'Ship it', priority: 'high' });
      await call('PUT', `/agents/${id}/notepad`, { content: 'two words' });

      const summary = await call('GET', `/agents/${id}/content`);
      expect(summary.body.data).toMatchObject({ inbox: 1, unread: 1, todos: 1, pending: 1, notepadWords: 2 });
    });

    it('should reject dangerous content with 400', async () => {
      const id = await createAgent();
      const result = await call('POST', `/agents/${id}/inbox`, { content: '<script>alert(1)</script>' });

      expect(result.status).toBe(400);
      expect(result.body.error?.code).toBe(ErrorCode.INVALID_CONTENT);
    });

    it('should answer an unknown todo with 404', async () => {
      const id = await createAgent();
      const result = await call('PATCH', `/agents/${id}/todos/missing`, { isCompleted: true });

      expect(result.status).toBe(404);
      expect(result.body.error?.code).toBe(ErrorCode.CONTENT_NOT_FOUND);
    });
  });

  describe('servers', () => {
    it('should import, connect and list tools', async () => {
      const imported = await call('POST', '/servers/import', {
        mcpServers: { filesystem: { command: 'fs-server' }, remote: { url: 'http://localhost:9000/sse' } },
      });
      expect(imported.body.data).toEqual({ created: ['filesystem', 'remote'], updated: [] });

      const connected = await call('POST', '/servers/filesystem/connect');
      expect(connected.body.data).toEqual({ name: 'filesystem', status: 'connected', tools: 1, resources: 0, prompts: 0 });

      const remote = await call('POST', '/servers/remote/connect');
      expect(remote.body.data).toMatchObject({ status: 'unsupported' });

      const tools = await call('GET', '/tools');
      expect(tools.body.data).toEqual([
        { uniqueId: 'filesystem:read_file', serverName: 'filesystem', serverId: expect.any(String), tool: { name: 'read_file', inputSchema: {} } },
      ]);
    });

    it('should answer an unknown server with 404', async () => {
      const result = await call('POST', '/servers/missing/connect');
      expect(result.status).toBe(404);
      expect(result.body.error?.code).toBe(ErrorCode.SERVER_NOT_FOUND);
    });
  });

  describe('layout preferences', () => {
    it('should apply a patch and report rejected widths', async () => {
      const result = await call('PATCH', '/preferences/layout', { theme: 'light', leftWidth: 900 });

      expect(result.body.data).toMatchObject({
        currentTheme: 'light',
        widthsAccepted: false,
        panelLayout: { leftWidth: 250 },
      });
      const saved = JSON.parse(await fs.readFile(path.join(dir, 'layout_preferences.json'), 'utf8'));
      expect(saved.currentTheme).toBe('light');
    });

    it('should reset to defaults', async () => {
      await call('PATCH', '/preferences/layout', { theme: 'system', selectedAgentId: 'agent-1' });
      const result = await call('POST', '/preferences/layout/reset');
      expect(result.body.data).toMatchObject({ currentTheme: 'dark', selectedAgentId: null });
    });
  });

  it('should answer malformed JSON with a validation error', async () => {
    const result = await call('POST', '/agents', '{ "name": ');

    expect(result.status).toBe(400);
    expect(result.body.error).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Validation failed: Malformed JSON body',
    });
  });

  it('should answer an unknown endpoint with 404', async () => {
    const result = await call('GET', '/nope');

    expect(result.status).toBe(404);
    expect(result.body.error?.code).toBe(ErrorCode.ENDPOINT_NOT_FOUND);
  });
});
