/**
 * AgentService - agent creation, lookup, persistence and lifecycle
 */

import { ChangeNotifier } from '../core/change-notifier.js';
import type { AgentRuntimeFactory } from '../mcp/agent-runtime.js';
import { AgentModel, type AgentSettingsUpdate } from '../models/agent-model.js';
import { ConflictError, NotFoundError, ValidationError } from '../schemas/errors.js';
import type { AgentProcessingStatus } from '../schemas/models.js';
import type { AgentJson } from '../schemas/persistence.js';
import type { EntityStore } from '../storage/storage-interface.js';
import { createLogger } from '../utils/logger.js';
import type { JsonObject } from '../models/types.js';

const logger = createLogger('AgentService');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AgentCreateInput {
  name: string;
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
  useBetaFeatures?: boolean;
  useReasonerModel?: boolean;
  mcpConfigPath?: string;
  supervisorId?: string;
  contextFiles?: string[];
  metadata?: JsonObject;
}

export interface AgentUpdateInput extends AgentSettingsUpdate {
  isActive?: boolean;
}

export interface AgentLoadFailure {
  id: string;
  error: Error;
}

export interface AgentLoadResult {
  loaded: number;
  failed: AgentLoadFailure[];
}

export interface AgentStatistics {
  totalAgents: number;
  activeAgents: number;
  processingAgents: number;
  totalMessages: number;
  agentsWithConversations: number;
  averageMessagesPerAgent: number;
}

export type AgentChangeKind = 'created' | 'updated' | 'deleted';
export type AgentChangeListener = (kind: AgentChangeKind, agent: AgentModel) => void;

export class AgentService extends ChangeNotifier {
  private agents: Map<string, AgentModel> = new Map();
  private nameIndex: Map<string, string> = new Map(); // name -> id
  private changeListeners: Set<AgentChangeListener> = new Set();
  private store: EntityStore<AgentJson>;
  private runtimeFactory?: AgentRuntimeFactory;

  constructor(store: EntityStore<AgentJson>, runtimeFactory?: AgentRuntimeFactory) {
    super();
    this.store = store;
    this.runtimeFactory = runtimeFactory;
  }

  /**
   * Load every agent file. Files that fail to read or decode are returned
   * in `failed`; the rest are tracked.
   */
  async initializeAgents(): Promise<AgentLoadResult> {
    await this.store.init();
    const documents = await this.store.readAll();
    const failed: AgentLoadFailure[] = [];
    let loaded = 0;

    for (const document of documents) {
      if (!document.ok) {
        failed.push({ id: document.id, error: document.error });
        continue;
      }
      try {
        const agent = AgentModel.fromJSON(document.data, {
          store: this.store,
          runtimeFactory: this.runtimeFactory,
        });
        this.track(agent);
        loaded++;
      } catch (error) {
        failed.push({ id: document.id, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }

    for (const failure of failed) {
      logger.error(`Failed to load agent ${failure.id}: ${failure.error.message}`);
    }
    logger.info(`Loaded ${loaded} agents from ${this.store.directory}`);
    if (loaded > 0) this.notifyListeners();
    return { loaded, failed };
  }

  /**
   * Create, validate and persist a new agent. Names are unique.
   */
  async createAgent(input: AgentCreateInput): Promise<AgentModel> {
    const name = input.name.trim();
    if (this.nameIndex.has(name)) {
      throw new ConflictError('agent', `Agent with name "${name}" already exists`, this.nameIndex.get(name));
    }

    const agent = new AgentModel(
      { ...input, name },
      { store: this.store, runtimeFactory: this.runtimeFactory }
    );
    // Hold the name while the file is written so a concurrent create sees it
    this.nameIndex.set(name, agent.id);
    try {
      await agent.save();
    } catch (error) {
      this.nameIndex.delete(name);
      agent.dispose();
      throw error;
    }
    this.track(agent);

    logger.info(`Created agent: ${agent.name} (${agent.id})`);
    this.emitChange('created', agent);
    return agent;
  }

  getById(id: string): AgentModel | undefined {
    return this.agents.get(id);
  }

  getByName(name: string): AgentModel | undefined {
    const id = this.nameIndex.get(name);
    return id ? this.agents.get(id) : undefined;
  }

  /** Like getById, but throws NotFoundError */
  require(id: string): AgentModel {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new NotFoundError('agent', id);
    }
    return agent;
  }

  getAll(): AgentModel[] {
    return Array.from(this.agents.values());
  }

  getActive(): AgentModel[] {
    return this.getAll().filter((agent) => agent.isActive);
  }

  getByStatus(status: AgentProcessingStatus): AgentModel[] {
    return this.getAll().filter((agent) => agent.status === status);
  }

  /** Agents active since `since` (default: the last 24 hours), most recent first */
  getRecentlyActive(since: Date = new Date(Date.now() - DAY_MS)): AgentModel[] {
    return this.getAll()
      .filter((agent) => agent.lastActiveAt.getTime() >= since.getTime())
      .sort((a, b) => b.lastActiveAt.getTime() - a.lastActiveAt.getTime());
  }

  getCount(): number {
    return this.agents.size;
  }

  /**
   * Apply settings and persist. A rename to a name held by another agent
   * is a conflict; invalid values are rejected before the agent changes.
   */
  async updateAgent(id: string, changes: AgentUpdateInput): Promise<AgentModel> {
    const agent = this.require(id);
    const { isActive, ...settings } = changes;

    const newName = settings.name?.trim();
    if (newName !== undefined) {
      const holder = this.nameIndex.get(newName);
      if (holder && holder !== id) {
        throw new ConflictError('agent', `Agent with name "${newName}" already exists`, holder);
      }
      if (newName.length === 0) {
        throw ValidationError.single('name', 'Agent name cannot be empty', 'MISSING_REQUIRED_FIELD');
      }
    }

    const patch = newName === undefined ? settings : { ...settings, name: newName };
    const check = agent.validateSettings(patch);
    if (!check.valid) {
      throw new ValidationError(check.errors);
    }

    const previousName = agent.name;
    agent.updateSettings(patch);
    if (isActive !== undefined) agent.setActive(isActive);
    if (previousName !== agent.name) {
      this.nameIndex.delete(previousName);
      this.nameIndex.set(agent.name, agent.id);
    }
    await agent.save();

    logger.info(`Updated agent: ${agent.name} (${agent.id})`);
    this.emitChange('updated', agent);
    return agent;
  }

  /** Persist an agent after content or preference changes */
  async saveAgent(id: string): Promise<AgentModel> {
    const agent = this.require(id);
    await agent.save();
    this.emitChange('updated', agent);
    return agent;
  }

  /**
   * Delete the agent's file and dispose the model.
   */
  async deleteAgent(id: string): Promise<void> {
    const agent = this.require(id);
    await agent.delete();

    this.untrack(agent);
    this.emitChange('deleted', agent);
    agent.dispose();
    logger.info(`Deleted agent: ${agent.name} (${id})`);
  }

  getStatistics(): AgentStatistics {
    const agents = this.getAll();
    const messageCounts = agents.map((agent) => agent.messageCount);
    const totalMessages = messageCounts.reduce((sum, count) => sum + count, 0);

    return {
      totalAgents: agents.length,
      activeAgents: agents.filter((agent) => agent.isActive).length,
      processingAgents: agents.filter((agent) => agent.isProcessing).length,
      totalMessages,
      agentsWithConversations: messageCounts.filter((count) => count > 0).length,
      averageMessagesPerAgent: agents.length > 0 ? totalMessages / agents.length : 0,
    };
  }

  /**
   * Observe agent lifecycle events with the affected agent. Plain
   * subscribe() only signals that the set of agents changed.
   */
  onAgentChange(listener: AgentChangeListener): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  private emitChange(kind: AgentChangeKind, agent: AgentModel): void {
    for (const listener of this.changeListeners) {
      try {
        listener(kind, agent);
      } catch (error) {
        logger.error(`Agent change listener threw for ${agent.id}`, error instanceof Error ? error : { error });
      }
    }
    this.notifyListeners();
  }

  private track(agent: AgentModel): void {
    const existing = this.nameIndex.get(agent.name);
    if (existing && existing !== agent.id) {
      throw new ConflictError('agent', `Agent with name "${agent.name}" already exists`, existing);
    }
    this.agents.set(agent.id, agent);
    this.nameIndex.set(agent.name, agent.id);
  }

  private untrack(agent: AgentModel): void {
    this.agents.delete(agent.id);
    if (this.nameIndex.get(agent.name) === agent.id) {
      this.nameIndex.delete(agent.name);
    }
  }

  dispose(): void {
    for (const agent of this.agents.values()) {
      agent.dispose();
    }
    this.agents.clear();
    this.nameIndex.clear();
    this.changeListeners.clear();
    super.dispose();
  }
}
