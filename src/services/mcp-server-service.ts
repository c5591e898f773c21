/**
 * McpServerService - MCP server registry and tool index
 *
 * Tracks configured servers, imports `{ "mcpServers": { ... } }`
 * configuration documents, and drives connections through an injected
 * transport. Tools of connected servers are addressed as `<server>:<tool>`.
 */

import { ChangeNotifier } from '../core/change-notifier.js';
import type { MCPTransport } from '../mcp/transport.js';
import type { AgentModel } from '../models/agent-model.js';
import { MCPServerModel } from '../models/mcp-server-model.js';
import { ConflictError, NotFoundError, TransportError, ValidationError, getErrorMessage } from '../schemas/errors.js';
import { MCPServerStatus, MCPServerType, type MCPTool } from '../schemas/models.js';
import { mcpConfigurationSchema, parseWithSchema, type MCPServerJson } from '../schemas/persistence.js';
import type { EntityStore } from '../storage/storage-interface.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('McpServerService');

export interface ToolRegistryEntry {
  /** `<server>:<tool>` */
  uniqueId: string;
  serverName: string;
  serverId: string;
  tool: MCPTool;
}

export interface ServerInfoSummary {
  servers: Array<{
    id: string;
    name: string;
    displayName: string;
    type: MCPServerType;
    status: MCPServerStatus;
    tools: number;
    resources: number;
    prompts: number;
  }>;
  connectedCount: number;
  totalCount: number;
  toolCount: number;
}

export interface ImportResult {
  created: string[];
  updated: string[];
}

export function toolUniqueId(serverName: string, toolName: string): string {
  return `${serverName}:${toolName}`;
}

export type ServerChangeListener = (kind: 'updated' | 'deleted', server: MCPServerModel) => void;

export class McpServerService extends ChangeNotifier {
  private servers: Map<string, MCPServerModel> = new Map();
  private nameIndex: Map<string, string> = new Map(); // name -> id
  private serverSubscriptions: Map<string, () => void> = new Map(); // id -> unsubscribe
  private changeListeners: Set<ServerChangeListener> = new Set();
  private store: EntityStore<MCPServerJson>;
  private transport?: MCPTransport;

  constructor(store: EntityStore<MCPServerJson>, transport?: MCPTransport) {
    super();
    this.store = store;
    this.transport = transport;
  }

  /**
   * Load every server file. Unreadable files are logged and reported back;
   * servers always start disconnected.
   */
  async initializeServers(): Promise<{ loaded: number; failed: Array<{ id: string; error: Error }> }> {
    await this.store.init();
    const documents = await this.store.readAll();
    const failed: Array<{ id: string; error: Error }> = [];
    let loaded = 0;

    for (const document of documents) {
      if (!document.ok) {
        failed.push({ id: document.id, error: document.error });
        continue;
      }
      try {
        const server = MCPServerModel.fromJSON(document.data, { store: this.store });
        server.updateStatus(MCPServerStatus.DISCONNECTED);
        this.track(server);
        loaded++;
      } catch (error) {
        failed.push({ id: document.id, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }

    for (const failure of failed) {
      logger.error(`Failed to load server ${failure.id}: ${failure.error.message}`);
    }
    logger.info(`Loaded ${loaded} MCP servers from ${this.store.directory}`);
    return { loaded, failed };
  }

  /**
   * Register a new server; the name must be unused.
   */
  async addServer(server: MCPServerModel): Promise<MCPServerModel> {
    if (this.nameIndex.has(server.name)) {
      throw new ConflictError('server', `Server with name "${server.name}" already exists`, this.nameIndex.get(server.name));
    }
    const persisted = MCPServerModel.fromJSON(server.toJSON(), { store: this.store });
    await persisted.save();
    this.track(persisted);
    this.emitChange('updated', persisted);
    return persisted;
  }

  /**
   * Create or update servers from a configuration document. Existing
   * servers are matched by name and keep their id.
   */
  async importConfiguration(document: unknown): Promise<ImportResult> {
    const config = parseWithSchema(mcpConfigurationSchema, document);
    const result: ImportResult = { created: [], updated: [] };

    // An existing server keeps its transport type; checked before anything is written
    const typeChanges = Object.entries(config.mcpServers).flatMap(([name, entry]) => {
      const existing = this.getByName(name);
      const type = 'command' in entry ? MCPServerType.STDIO : MCPServerType.SSE;
      if (!existing || existing.type === type) return [];
      return [
        {
          field: `mcpServers.${name}`,
          message: `Server "${name}" is ${existing.type} and cannot be changed to ${type}`,
          code: 'SERVER_TYPE_CHANGE',
          value: type,
        },
      ];
    });
    if (typeChanges.length > 0) {
      throw new ValidationError(typeChanges);
    }

    for (const [name, entry] of Object.entries(config.mcpServers)) {
      const existing = this.getByName(name);
      if (existing) {
        if ('command' in entry) {
          existing.updateConfiguration({
            command: entry.command,
            args: entry.args,
            env: entry.env,
            description: entry.description,
            displayName: entry.displayName,
          });
        } else {
          existing.updateConfiguration({ url: entry.url, description: entry.description, displayName: entry.displayName });
        }
        await existing.save();
        this.emitChange('updated', existing);
        result.updated.push(name);
        continue;
      }

      const server =
        'command' in entry
          ? MCPServerModel.stdio(
              {
                name,
                displayName: entry.displayName,
                description: entry.description,
                command: entry.command,
                args: entry.args,
                env: entry.env,
              },
              { store: this.store }
            )
          : MCPServerModel.sse(
              { name, displayName: entry.displayName, description: entry.description, url: entry.url },
              { store: this.store }
            );
      await server.save();
      this.track(server);
      this.emitChange('updated', server);
      result.created.push(name);
    }

    logger.info(`Imported MCP configuration: ${result.created.length} created, ${result.updated.length} updated`);
    return result;
  }

  getById(id: string): MCPServerModel | undefined {
    return this.servers.get(id);
  }

  getByName(name: string): MCPServerModel | undefined {
    const id = this.nameIndex.get(name);
    return id ? this.servers.get(id) : undefined;
  }

  requireByName(name: string): MCPServerModel {
    const server = this.getByName(name);
    if (!server) {
      throw new NotFoundError('server', name, 'name');
    }
    return server;
  }

  getAll(): MCPServerModel[] {
    return Array.from(this.servers.values());
  }

  getConnected(): MCPServerModel[] {
    return this.getAll().filter((server) => server.isConnected);
  }

  async removeServer(id: string): Promise<void> {
    const server = this.servers.get(id);
    if (!server) {
      throw new NotFoundError('server', id);
    }
    if (server.isConnected && this.transport) {
      await this.disconnect(server.name);
    }
    await server.delete();
    this.untrack(server);
    this.emitChange('deleted', server);
    server.dispose();
  }

  // ============================================================================
  // CONNECTIONS
  // ============================================================================

  /**
   * Connect through the transport and replace the server's capability
   * lists with what it reports. Failures leave the server in `error` with
   * `metadata.lastError` set, and are rethrown as TransportError.
   */
  async connect(name: string): Promise<MCPServerModel> {
    const server = this.requireByName(name);
    server.validate();

    if (!this.transport || !this.transport.supports(server.type)) {
      server.updateStatus(MCPServerStatus.UNSUPPORTED);
      logger.warn(`No transport available for ${server.type} server ${name}`);
      return server;
    }

    server.updateStatus(MCPServerStatus.CONNECTING);
    try {
      const capabilities = await this.transport.connect(server.id, server.connectionConfig);
      server.updateTools(capabilities.tools);
      server.updateResources(capabilities.resources);
      server.updatePrompts(capabilities.prompts);
      server.removeMetadata('lastError');
      server.updateStatus(MCPServerStatus.CONNECTED);
    } catch (error) {
      server.setMetadata('lastError', getErrorMessage(error));
      server.updateStatus(MCPServerStatus.ERROR);
      logger.error(`Failed to connect to ${name}`, error instanceof Error ? error : { error });
      throw new TransportError(name, error);
    }

    await server.save();
    this.emitChange('updated', server);
    logger.info(`Connected to ${name}: ${server.capabilityCounts.tools} tools`);
    return server;
  }

  async disconnect(name: string): Promise<MCPServerModel> {
    const server = this.requireByName(name);
    if (this.transport && server.status !== MCPServerStatus.DISCONNECTED) {
      try {
        await this.transport.disconnect(server.id);
      } catch (error) {
        server.setMetadata('lastError', getErrorMessage(error));
        server.updateStatus(MCPServerStatus.ERROR);
        throw new TransportError(name, error);
      }
    }
    server.updateStatus(MCPServerStatus.DISCONNECTED);
    this.emitChange('updated', server);
    return server;
  }

  // ============================================================================
  // TOOL REGISTRY
  // ============================================================================

  /** Tools of every connected server */
  getAllTools(): ToolRegistryEntry[] {
    return this.getConnected().flatMap((server) =>
      server.availableTools.map((tool) => ({
        uniqueId: toolUniqueId(server.name, tool.name),
        serverName: server.name,
        serverId: server.id,
        tool,
      }))
    );
  }

  /** Name of the first connected server offering `toolName` */
  findServerForTool(toolName: string): string | undefined {
    return this.getAllTools().find((entry) => entry.tool.name === toolName)?.serverName;
  }

  /**
   * Tools the agent may use: servers it has not disabled, minus tools it
   * has disabled.
   */
  getToolsForAgent(agent: AgentModel): ToolRegistryEntry[] {
    return this.getAllTools().filter(
      (entry) => agent.getMCPServerPreference(entry.serverName) && agent.getMCPToolPreference(entry.uniqueId)
    );
  }

  getServerInfo(): ServerInfoSummary {
    const servers = this.getAll();
    return {
      servers: servers.map((server) => ({
        id: server.id,
        name: server.name,
        displayName: server.displayName,
        type: server.type,
        status: server.status,
        ...server.capabilityCounts,
      })),
      connectedCount: servers.filter((server) => server.isConnected).length,
      totalCount: servers.length,
      toolCount: this.getAllTools().length,
    };
  }

  // ============================================================================
  // CHANGE EVENTS
  // ============================================================================

  onServerChange(listener: ServerChangeListener): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  private emitChange(kind: 'updated' | 'deleted', server: MCPServerModel): void {
    for (const listener of this.changeListeners) {
      try {
        listener(kind, server);
      } catch (error) {
        logger.error(`Server change listener threw for ${server.id}`, error instanceof Error ? error : { error });
      }
    }
    this.notifyListeners();
  }

  private track(server: MCPServerModel): void {
    this.servers.set(server.id, server);
    this.nameIndex.set(server.name, server.id);
    this.serverSubscriptions.set(
      server.id,
      server.subscribe(() => this.notifyListeners())
    );
  }

  private untrack(server: MCPServerModel): void {
    this.serverSubscriptions.get(server.id)?.();
    this.serverSubscriptions.delete(server.id);
    this.servers.delete(server.id);
    if (this.nameIndex.get(server.name) === server.id) {
      this.nameIndex.delete(server.name);
    }
  }

  dispose(): void {
    for (const server of this.servers.values()) {
      this.serverSubscriptions.get(server.id)?.();
      server.dispose();
    }
    this.serverSubscriptions.clear();
    this.servers.clear();
    this.nameIndex.clear();
    this.changeListeners.clear();
    super.dispose();
  }
}
