/**
 * MCPServerModel - a configured MCP server and what it offers
 *
 * STDIO servers are launched from a command line; SSE servers are reached
 * by URL. The capability lists are replaced wholesale whenever the transport
 * reports them.
 */

import { v4 as uuid } from 'uuid';
import { ChangeNotifier } from '../core/change-notifier.js';
import { PersistenceError, ServerValidationError } from '../schemas/errors.js';
import {
  MCPServerStatus,
  MCPServerType,
  type CapabilityCounts,
  type MCPPrompt,
  type MCPResource,
  type MCPTool,
  type ServerConnectionConfig,
} from '../schemas/models.js';
import { mcpServerJsonSchema, parseWithSchema, type MCPServerJson } from '../schemas/persistence.js';
import { toValidationResult, validateRequired, validateUrl } from '../schemas/validation.js';
import type { EntityStore } from '../storage/storage-interface.js';
import { createLogger } from '../utils/logger.js';
import { cloneJsonObject, type JsonObject, type JsonValue } from './types.js';

const logger = createLogger('MCPServerModel');

export interface MCPServerInit {
  id?: string;
  name: string;
  displayName?: string;
  description?: string;
  type: MCPServerType;
  status?: MCPServerStatus;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  url?: string;
  availableTools?: MCPTool[];
  availableResources?: MCPResource[];
  availablePrompts?: MCPPrompt[];
  createdAt?: Date;
  updatedAt?: Date;
  lastConnectedAt?: Date;
  metadata?: JsonObject;
}

export interface MCPServerDependencies {
  store?: EntityStore<MCPServerJson>;
}

export type StdioServerInit = Omit<MCPServerInit, 'type' | 'url'> & { command: string };
export type SseServerInit = Omit<MCPServerInit, 'type' | 'command' | 'args' | 'env'> & { url: string };

export class MCPServerModel extends ChangeNotifier {
  readonly id: string;
  readonly createdAt: Date;
  readonly name: string;
  readonly type: MCPServerType;

  private _displayName: string;
  private _description?: string;
  private _command?: string;
  private _args?: string[];
  private _env?: Record<string, string>;
  private _url?: string;
  private _status: MCPServerStatus;
  private _tools: MCPTool[];
  private _resources: MCPResource[];
  private _prompts: MCPPrompt[];
  private _updatedAt: Date;
  private _lastConnectedAt?: Date;
  private _metadata: JsonObject;
  private readonly deps: MCPServerDependencies;

  constructor(init: MCPServerInit, deps: MCPServerDependencies = {}) {
    super();
    const now = new Date();
    this.id = init.id ?? uuid();
    this.name = init.name;
    this._displayName = init.displayName ?? init.name;
    this._description = init.description;
    this.type = init.type;
    this._command = init.command;
    this._args = init.args ? [...init.args] : undefined;
    this._env = init.env ? { ...init.env } : undefined;
    this._url = init.url;
    this._status = init.status ?? MCPServerStatus.DISCONNECTED;
    this._tools = [...(init.availableTools ?? [])];
    this._resources = [...(init.availableResources ?? [])];
    this._prompts = [...(init.availablePrompts ?? [])];
    this.createdAt = init.createdAt ?? now;
    this._updatedAt = init.updatedAt ?? this.createdAt;
    this._lastConnectedAt = init.lastConnectedAt;
    this._metadata = init.metadata ? cloneJsonObject(init.metadata) : {};
    this.deps = deps;
  }

  static stdio(init: StdioServerInit, deps: MCPServerDependencies = {}): MCPServerModel {
    return new MCPServerModel({ ...init, type: MCPServerType.STDIO }, deps);
  }

  static sse(init: SseServerInit, deps: MCPServerDependencies = {}): MCPServerModel {
    return new MCPServerModel({ ...init, type: MCPServerType.SSE }, deps);
  }

  get displayName(): string {
    return this._displayName;
  }

  get description(): string | undefined {
    return this._description;
  }

  get command(): string | undefined {
    return this._command;
  }

  get args(): readonly string[] | undefined {
    return this._args;
  }

  get env(): Readonly<Record<string, string>> | undefined {
    return this._env;
  }

  get url(): string | undefined {
    return this._url;
  }

  get status(): MCPServerStatus {
    return this._status;
  }

  get isConnected(): boolean {
    return this._status === MCPServerStatus.CONNECTED;
  }

  get availableTools(): readonly MCPTool[] {
    return this._tools;
  }

  get availableResources(): readonly MCPResource[] {
    return this._resources;
  }

  get availablePrompts(): readonly MCPPrompt[] {
    return this._prompts;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get lastConnectedAt(): Date | undefined {
    return this._lastConnectedAt;
  }

  get metadata(): JsonObject {
    return cloneJsonObject(this._metadata);
  }

  get capabilityCounts(): CapabilityCounts {
    return {
      tools: this._tools.length,
      resources: this._resources.length,
      prompts: this._prompts.length,
    };
  }

  /**
   * What a transport needs to reach the server. Call validate() first;
   * missing fields fall back to empty values here.
   */
  get connectionConfig(): ServerConnectionConfig {
    if (this.type === MCPServerType.SSE) {
      return { type: MCPServerType.SSE, url: this.url ?? '' };
    }
    return {
      type: MCPServerType.STDIO,
      command: this.command ?? '',
      args: [...(this.args ?? [])],
      env: { ...(this.env ?? {}) },
    };
  }

  // ============================================================================
  // MUTATIONS
  // ============================================================================

  /**
   * No-op when the status is unchanged. Entering `connected` stamps
   * lastConnectedAt.
   */
  updateStatus(status: MCPServerStatus): void {
    if (this._status === status) return;
    logger.debug(`Server ${this.name}: ${this._status} -> ${status}`);
    this._status = status;
    if (status === MCPServerStatus.CONNECTED) {
      this._lastConnectedAt = new Date();
    }
    this.markModified();
  }

  updateTools(tools: MCPTool[]): void {
    this._tools = [...tools];
    this.markModified();
  }

  updateResources(resources: MCPResource[]): void {
    this._resources = [...resources];
    this.markModified();
  }

  updatePrompts(prompts: MCPPrompt[]): void {
    this._prompts = [...prompts];
    this.markModified();
  }

  setMetadata(key: string, value: JsonValue): void {
    this._metadata[key] = structuredClone(value);
    this.markModified();
  }

  removeMetadata(key: string): void {
    if (!(key in this._metadata)) return;
    delete this._metadata[key];
    this.markModified();
  }

  /** Apply changed connection settings in place */
  updateConfiguration(changes: Partial<Pick<MCPServerInit, 'displayName' | 'description' | 'command' | 'args' | 'env' | 'url'>>): void {
    if (changes.displayName !== undefined) this._displayName = changes.displayName;
    if (changes.description !== undefined) this._description = changes.description;
    if (changes.command !== undefined) this._command = changes.command;
    if (changes.args !== undefined) this._args = [...changes.args];
    if (changes.env !== undefined) this._env = { ...changes.env };
    if (changes.url !== undefined) this._url = changes.url;
    this.markModified();
  }

  private markModified(): void {
    const now = Date.now();
    if (now > this._updatedAt.getTime()) {
      this._updatedAt = new Date(now);
    }
    this.notifyListeners();
  }

  // ============================================================================
  // VALIDATION & PERSISTENCE
  // ============================================================================

  /**
   * Collects every violation and throws ServerValidationError when there
   * is at least one.
   */
  validate(): true {
    const errors = [
      validateRequired(this.name, 'name', 'Server name cannot be empty'),
      validateRequired(this.displayName, 'displayName', 'Display name cannot be empty'),
    ];

    if (this.type === MCPServerType.STDIO) {
      errors.push(validateRequired(this.command, 'command', 'STDIO servers require command'));
    } else {
      const missingUrl = validateRequired(this.url, 'url', 'SSE servers require URL');
      errors.push(missingUrl ?? validateUrl(this.url ?? '', 'url'));
    }

    const result = toValidationResult(errors);
    if (!result.valid) {
      throw new ServerValidationError(result.errors);
    }
    return true;
  }

  private requireStore(operation: 'save' | 'delete'): EntityStore<MCPServerJson> {
    if (!this.deps.store) {
      throw new PersistenceError(operation, `server ${this.id}`, new Error('No server store is configured'));
    }
    return this.deps.store;
  }

  async save(): Promise<void> {
    this.validate();
    const store = this.requireStore('save');
    const now = Date.now();
    if (now > this._updatedAt.getTime()) {
      this._updatedAt = new Date(now);
    }
    await store.write(this.id, this.toJSON());
    logger.info(`Saved server ${this.name} (${this.id})`);
    this.notifyListeners();
  }

  async delete(): Promise<void> {
    const store = this.requireStore('delete');
    await store.remove(this.id);
    logger.info(`Deleted server ${this.name} (${this.id})`);
    this.notifyListeners();
  }

  // ============================================================================
  // SERIALIZATION
  // ============================================================================

  toJSON(): MCPServerJson {
    return {
      id: this.id,
      name: this.name,
      displayName: this.displayName,
      description: this.description ?? null,
      type: this.type,
      status: this._status,
      command: this.command ?? null,
      args: this.args ? [...this.args] : null,
      env: this.env ? { ...this.env } : null,
      url: this.url ?? null,
      availableTools: structuredClone(this._tools),
      availableResources: structuredClone(this._resources),
      availablePrompts: structuredClone(this._prompts),
      createdAt: this.createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
      lastConnectedAt: this._lastConnectedAt?.toISOString() ?? null,
      metadata: cloneJsonObject(this._metadata),
    };
  }

  static fromJSON(data: unknown, deps: MCPServerDependencies = {}): MCPServerModel {
    const json = parseWithSchema(mcpServerJsonSchema, data);
    return new MCPServerModel(
      {
        id: json.id,
        name: json.name,
        displayName: json.displayName,
        description: json.description ?? undefined,
        type: json.type,
        status: json.status,
        command: json.command ?? undefined,
        args: json.args ?? undefined,
        env: json.env ?? undefined,
        url: json.url ?? undefined,
        availableTools: json.availableTools,
        availableResources: json.availableResources,
        availablePrompts: json.availablePrompts,
        createdAt: new Date(json.createdAt),
        updatedAt: new Date(json.updatedAt),
        lastConnectedAt: json.lastConnectedAt ? new Date(json.lastConnectedAt) : undefined,
        metadata: json.metadata,
      },
      deps
    );
  }
}
