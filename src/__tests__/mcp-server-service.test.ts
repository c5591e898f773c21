import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AgentModel } from '../models/agent-model.js';
import { MCPServerModel } from '../models/mcp-server-model.js';
import { McpServerService } from '../services/mcp-server-service.js';
import { ConflictError, ErrorCode, TransportError, ValidationError } from '../schemas/errors.js';
import { MCPServerStatus, MCPServerType, type ServerCapabilities } from '../schemas/models.js';
import type { MCPServerJson } from '../schemas/persistence.js';
import { FakeTransport, MemoryStore } from './helpers.js';

const capabilities: ServerCapabilities = {
  tools: [
    { name: 'read_file', description: 'Read a file', inputSchema: { type: 'object' } },
    { name: 'write_file', inputSchema: { type: 'object' } },
  ],
  resources: [{ uri: 'file:///workspace', name: 'workspace' }],
  prompts: [],
};

const configuration = {
  mcpServers: {
    filesystem: { command: 'fs-server', args: ['--root', '/workspace'] },
    remote: { url: 'http://localhost:9000/sse', displayName: 'Remote Tools' },
  },
};

describe('McpServerService', () => {
  let store: MemoryStore<MCPServerJson>;
  let transport: FakeTransport;
  let service: McpServerService;

  beforeEach(async () => {
    store = new MemoryStore<MCPServerJson>();
    transport = new FakeTransport([MCPServerType.STDIO], capabilities);
    service = new McpServerService(store, transport);
    await service.initializeServers();
  });

  afterEach(() => {
    service.dispose();
  });

  describe('importConfiguration', () => {
    it('should create servers by name and then update them in place', async () => {
      expect(await service.importConfiguration(configuration)).toEqual({
        created: ['filesystem', 'remote'],
        updated: [],
      });
      const original = service.requireByName('filesystem');

      const result = await service.importConfiguration({
        mcpServers: { filesystem: { command: 'fs-server-v2' } },
      });

      expect(result).toEqual({ created: [], updated: ['filesystem'] });
      expect(service.requireByName('filesystem')).toBe(original);
      expect(original.command).toBe('fs-server-v2');
      expect(original.args).toEqual([]);
      expect(service.requireByName('remote').displayName).toBe('Remote Tools');
      expect(await store.list()).toHaveLength(2);
    });

    it('should refuse to change the transport type of an existing server', async () => {
      await service.importConfiguration(configuration);
      const filesystem = service.requireByName('filesystem');

      const attempt = service.importConfiguration({
        mcpServers: { extra: { command: 'extra-server' }, filesystem: { url: 'http://localhost:9100/sse' } },
      });

      await expect(attempt).rejects.toMatchObject({
        message: 'Validation failed: Server "filesystem" is stdio and cannot be changed to sse',
      });
      expect(filesystem.type).toBe(MCPServerType.STDIO);
      expect(filesystem.command).toBe('fs-server');
      expect(service.getByName('extra')).toBeUndefined();
    });

    it('should reject an entry with neither command nor url', async () => {
      await expect(service.importConfiguration({ mcpServers: { broken: {} } })).rejects.toBeInstanceOf(ValidationError);
      expect(service.getAll()).toEqual([]);
    });
  });

  it('should refuse a second server with the same name', async () => {
    await service.addServer(MCPServerModel.stdio({ name: 'git', command: 'git-server' }));
    await expect(service.addServer(MCPServerModel.stdio({ name: 'git', command: 'other' }))).rejects.toBeInstanceOf(
      ConflictError
    );
  });

  describe('connect', () => {
    beforeEach(async () => {
      await service.importConfiguration(configuration);
    });

    it('should take the capabilities reported by the transport', async () => {
      const server = await service.connect('filesystem');

      expect(server.status).toBe(MCPServerStatus.CONNECTED);
      expect(server.capabilityCounts).toEqual({ tools: 2, resources: 1, prompts: 0 });
      expect(transport.configs).toEqual([
        { type: MCPServerType.STDIO, command: 'fs-server', args: ['--root', '/workspace'], env: {} },
      ]);
      expect(await store.read(server.id)).toMatchObject({ status: 'connected' });
    });

    it('should mark a server without a transport as unsupported', async () => {
      const server = await service.connect('remote');
      expect(server.status).toBe(MCPServerStatus.UNSUPPORTED);
      expect(transport.configs).toEqual([]);
    });

    it('should record a failed connection', async () => {
      transport.failWith = new Error('spawn ENOENT');

      await expect(service.connect('filesystem')).rejects.toBeInstanceOf(TransportError);

      const server = service.requireByName('filesystem');
      expect(server.status).toBe(MCPServerStatus.ERROR);
      expect(server.metadata.lastError).toBe('spawn ENOENT');
    });

    it('should clear the last error after a successful retry', async () => {
      transport.failWith = new Error('spawn ENOENT');
      await expect(service.connect('filesystem')).rejects.toThrow('Transport failed for server filesystem: spawn ENOENT');

      transport.failWith = undefined;
      const server = await service.connect('filesystem');

      expect(server.metadata).toEqual({});
    });

    it('should raise not found for an unknown name', async () => {
      await expect(service.connect('missing')).rejects.toMatchObject({ code: ErrorCode.SERVER_NOT_FOUND });
    });

    it('should disconnect through the transport', async () => {
      const server = await service.connect('filesystem');
      expect(transport.connected.has(server.id)).toBe(true);

      await service.disconnect('filesystem');

      expect(transport.connected.has(server.id)).toBe(false);
      expect(server.status).toBe(MCPServerStatus.DISCONNECTED);
    });
  });

  describe('tool registry', () => {
    beforeEach(async () => {
      await service.importConfiguration(configuration);
      await service.connect('filesystem');
      await service.connect('remote');
    });

    it('should list tools of connected servers by unique id', () => {
      expect(service.getAllTools().map((entry) => entry.uniqueId)).toEqual([
        'filesystem:read_file',
        'filesystem:write_file',
      ]);
      expect(service.findServerForTool('write_file')).toBe('filesystem');
      expect(service.findServerForTool('delete_file')).toBeUndefined();
    });

    it('should apply agent preferences', () => {
      const agent = new AgentModel({ name: 'Coder', systemPrompt: 'x' });
      agent.setMCPToolPreference('filesystem:write_file', false);
      expect(service.getToolsForAgent(agent).map((entry) => entry.uniqueId)).toEqual(['filesystem:read_file']);

      agent.setMCPServerPreference('filesystem', false);
      expect(service.getToolsForAgent(agent)).toEqual([]);
    });

    it('should summarize the registry', () => {
      const filesystem = service.requireByName('filesystem');
      const info = service.getServerInfo();

      expect(info.connectedCount).toBe(1);
      expect(info.totalCount).toBe(2);
      expect(info.toolCount).toBe(2);
      expect(info.servers[0]).toEqual({
        id: filesystem.id,
        name: 'filesystem',
        displayName: 'filesystem',
        type: MCPServerType.STDIO,
        status: MCPServerStatus.CONNECTED,
        tools: 2,
        resources: 1,
        prompts: 0,
      });
      expect(info.servers[1].status).toBe(MCPServerStatus.UNSUPPORTED);
    });

    it('should disconnect and forget a removed server', async () => {
      const filesystem = service.requireByName('filesystem');
      const events: string[] = [];
      service.onServerChange((kind, server) => events.push(`${kind}:${server.name}:${server.status}`));

      await service.removeServer(filesystem.id);

      expect(events).toEqual(['updated:filesystem:disconnected', 'deleted:filesystem:disconnected']);
      expect(transport.connected.size).toBe(0);
      expect(await store.read(filesystem.id)).toBeNull();
      expect(service.getByName('filesystem')).toBeUndefined();
      expect(service.getAllTools()).toEqual([]);
    });
  });

  it('should load saved servers as disconnected', async () => {
    await service.importConfiguration(configuration);
    await service.connect('filesystem');

    const reloaded = new McpServerService(store, transport);
    const result = await reloaded.initializeServers();

    expect(result).toEqual({ loaded: 2, failed: [] });
    const filesystem = reloaded.requireByName('filesystem');
    expect(filesystem.status).toBe(MCPServerStatus.DISCONNECTED);
    expect(filesystem.availableTools).toHaveLength(2);
    reloaded.dispose();
  });
});
