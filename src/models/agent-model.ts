/**
 * AgentModel - a configured conversational agent
 *
 * Holds the agent's settings, processing status, MCP preferences and its
 * content collection. Conversation handling is delegated to an AgentRuntime
 * created on first use; persistence goes through the injected store.
 */

import { v4 as uuid } from 'uuid';
import { ChangeNotifier } from '../core/change-notifier.js';
import type {
  AgentRuntime,
  AgentRuntimeConfig,
  AgentRuntimeFactory,
  ConversationMessage,
  RuntimeResponse,
  SendMessageOptions,
} from '../mcp/agent-runtime.js';
import {
  PersistenceError,
  RuntimeDelegationError,
  ValidationError,
  getErrorMessage,
} from '../schemas/errors.js';
import { AgentProcessingStatus } from '../schemas/models.js';
import { agentJsonSchema, parseWithSchema, type AgentJson } from '../schemas/persistence.js';
import {
  ValidationLimits,
  toValidationResult,
  validateRange,
  validateRequired,
  type ValidationResult,
} from '../schemas/validation.js';
import type { EntityStore } from '../storage/storage-interface.js';
import { createLogger } from '../utils/logger.js';
import { ContentCollection } from './content-collection.js';
import { cloneJsonObject, type JsonObject, type JsonValue } from './types.js';

const logger = createLogger('AgentModel');

/** Upper bound on tool-call rounds drained after a single user message */
export const MAX_TOOL_ROUNDS = 10;

export interface ProcessingState {
  status: AgentProcessingStatus;
  lastActivity: Date;
  lastStatusChange: Date;
  errorMessage?: string;
}

export interface AgentSettings {
  name: string;
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  useBetaFeatures: boolean;
  useReasonerModel: boolean;
  mcpConfigPath?: string;
  supervisorId?: string;
  contextFiles: string[];
}

/** Fields accepted by updateSettings(); null clears an optional field */
export type AgentSettingsUpdate = Partial<Omit<AgentSettings, 'mcpConfigPath' | 'supervisorId'>> & {
  mcpConfigPath?: string | null;
  supervisorId?: string | null;
};

export interface AgentInit extends Partial<AgentSettings> {
  id?: string;
  name: string;
  systemPrompt: string;
  isActive?: boolean;
  createdAt?: Date;
  lastActiveAt?: Date;
  processingState?: ProcessingState;
  mcpServerPreferences?: Record<string, boolean>;
  mcpToolPreferences?: Record<string, boolean>;
  content?: ContentCollection;
  metadata?: JsonObject;
}

export interface AgentModelDependencies {
  store?: EntityStore<AgentJson>;
  runtimeFactory?: AgentRuntimeFactory;
}

export class AgentModel extends ChangeNotifier {
  readonly id: string;
  readonly createdAt: Date;
  readonly content: ContentCollection;

  private settings: AgentSettings;
  private active: boolean;
  private _lastActiveAt: Date;
  private processing: ProcessingState;
  private serverPreferences: Map<string, boolean>;
  private toolPreferences: Map<string, boolean>;
  private _metadata: JsonObject;
  private runtime?: AgentRuntime;
  private readonly unsubscribeContent: () => void;
  private readonly deps: AgentModelDependencies;

  constructor(init: AgentInit, deps: AgentModelDependencies = {}) {
    super();
    const now = new Date();
    this.id = init.id ?? uuid();
    this.createdAt = init.createdAt ?? now;
    this._lastActiveAt = init.lastActiveAt ?? this.createdAt;
    this.active = init.isActive ?? true;
    this.settings = {
      name: init.name,
      systemPrompt: init.systemPrompt,
      temperature: init.temperature ?? ValidationLimits.DEFAULT_TEMPERATURE,
      maxTokens: init.maxTokens ?? ValidationLimits.DEFAULT_MAX_TOKENS,
      useBetaFeatures: init.useBetaFeatures ?? false,
      useReasonerModel: init.useReasonerModel ?? false,
      mcpConfigPath: init.mcpConfigPath,
      supervisorId: init.supervisorId,
      contextFiles: [...(init.contextFiles ?? [])],
    };
    this.processing = init.processingState
      ? { ...init.processingState }
      : { status: AgentProcessingStatus.IDLE, lastActivity: now, lastStatusChange: now };
    this.serverPreferences = new Map(Object.entries(init.mcpServerPreferences ?? {}));
    this.toolPreferences = new Map(Object.entries(init.mcpToolPreferences ?? {}));
    this._metadata = init.metadata ? cloneJsonObject(init.metadata) : {};
    this.deps = deps;

    if (init.content && init.content.agentId !== this.id) {
      throw ValidationError.single(
        'content.agentId',
        `Content collection belongs to agent ${init.content.agentId}`,
        'CONTENT_OWNER_MISMATCH',
        init.content.agentId
      );
    }
    this.content = init.content ?? new ContentCollection({ agentId: this.id });
    this.unsubscribeContent = this.content.subscribe(() => {
      this.touch();
      this.notifyListeners();
    });
  }

  // ============================================================================
  // ACCESSORS
  // ============================================================================

  get name(): string {
    return this.settings.name;
  }

  get systemPrompt(): string {
    return this.settings.systemPrompt;
  }

  get temperature(): number {
    return this.settings.temperature;
  }

  get maxTokens(): number {
    return this.settings.maxTokens;
  }

  get useBetaFeatures(): boolean {
    return this.settings.useBetaFeatures;
  }

  get useReasonerModel(): boolean {
    return this.settings.useReasonerModel;
  }

  get mcpConfigPath(): string | undefined {
    return this.settings.mcpConfigPath;
  }

  get supervisorId(): string | undefined {
    return this.settings.supervisorId;
  }

  get contextFiles(): readonly string[] {
    return [...this.settings.contextFiles];
  }

  get isActive(): boolean {
    return this.active;
  }

  get lastActiveAt(): Date {
    return this._lastActiveAt;
  }

  get status(): AgentProcessingStatus {
    return this.processing.status;
  }

  get processingState(): Readonly<ProcessingState> {
    return { ...this.processing };
  }

  /** Legacy flag kept in sync with `status` */
  get isProcessing(): boolean {
    return this.processing.status === AgentProcessingStatus.PROCESSING;
  }

  get errorMessage(): string | undefined {
    return this.processing.errorMessage;
  }

  get metadata(): JsonObject {
    return cloneJsonObject(this._metadata);
  }

  get conversationHistory(): ConversationMessage[] {
    return this.runtime?.getHistory() ?? [];
  }

  get messageCount(): number {
    return this.conversationHistory.length;
  }

  get hasConversation(): boolean {
    return this.messageCount > 0;
  }

  get displaySummary(): string {
    const count = this.messageCount;
    const messages = count > 0 ? `${count} messages` : 'No messages';
    return `${this.name} (${this.active ? 'Active' : 'Inactive'}) - ${messages}`;
  }

  // ============================================================================
  // SETTINGS
  // ============================================================================

  /**
   * Apply a settings patch. Values are checked by validate() before the
   * next save, not here.
   */
  updateSettings(patch: AgentSettingsUpdate): void {
    this.settings = this.mergeSettings(patch);
    this.markModified();
  }

  /** Check the settings `patch` would produce, without applying it */
  validateSettings(patch: AgentSettingsUpdate): ValidationResult {
    return AgentModel.checkSettings(this.id, this.mergeSettings(patch));
  }

  private mergeSettings(patch: AgentSettingsUpdate): AgentSettings {
    const current = this.settings;
    return {
      name: patch.name ?? current.name,
      systemPrompt: patch.systemPrompt ?? current.systemPrompt,
      temperature: patch.temperature ?? current.temperature,
      maxTokens: patch.maxTokens ?? current.maxTokens,
      useBetaFeatures: patch.useBetaFeatures ?? current.useBetaFeatures,
      useReasonerModel: patch.useReasonerModel ?? current.useReasonerModel,
      mcpConfigPath: patch.mcpConfigPath === undefined ? current.mcpConfigPath : (patch.mcpConfigPath ?? undefined),
      supervisorId: patch.supervisorId === undefined ? current.supervisorId : (patch.supervisorId ?? undefined),
      contextFiles: patch.contextFiles ? [...patch.contextFiles] : [...current.contextFiles],
    };
  }

  setActive(active: boolean): void {
    if (this.active === active) return;
    this.active = active;
    this.markModified();
  }

  addContextFile(filePath: string): void {
    if (this.settings.contextFiles.includes(filePath)) return;
    this.settings.contextFiles.push(filePath);
    this.markModified();
  }

  removeContextFile(filePath: string): void {
    const index = this.settings.contextFiles.indexOf(filePath);
    if (index === -1) return;
    this.settings.contextFiles.splice(index, 1);
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

  // ============================================================================
  // PROCESSING STATUS
  // ============================================================================

  /** No-op when already processing */
  setProcessingStatus(): void {
    if (this.processing.status === AgentProcessingStatus.PROCESSING) return;
    this.transition(AgentProcessingStatus.PROCESSING);
  }

  /** No-op when already idle */
  setIdleStatus(): void {
    if (this.processing.status === AgentProcessingStatus.IDLE) return;
    this.transition(AgentProcessingStatus.IDLE);
  }

  /**
   * Always applies and notifies, even when already in error, so a new
   * message replaces the old one.
   */
  setErrorStatus(message: string): void {
    this.transition(AgentProcessingStatus.ERROR, message);
  }

  private transition(status: AgentProcessingStatus, errorMessage?: string): void {
    const now = new Date();
    this.processing = { status, lastActivity: now, lastStatusChange: now, errorMessage };
    this.markModified();
  }

  // ============================================================================
  // MCP PREFERENCES
  // ============================================================================

  /** Servers without an explicit preference are enabled */
  getMCPServerPreference(serverName: string): boolean {
    return this.serverPreferences.get(serverName) ?? true;
  }

  setMCPServerPreference(serverName: string, enabled: boolean): void {
    if (this.serverPreferences.get(serverName) === enabled) return;
    this.serverPreferences.set(serverName, enabled);
    this.markModified();
  }

  /** Applies every name, then notifies exactly once */
  setAllMCPServerPreferences(serverNames: string[], enabled: boolean): void {
    for (const name of serverNames) {
      this.serverPreferences.set(name, enabled);
    }
    this.markModified();
  }

  /** Tools without an explicit preference are enabled */
  getMCPToolPreference(toolId: string): boolean {
    return this.toolPreferences.get(toolId) ?? true;
  }

  setMCPToolPreference(toolId: string, enabled: boolean): void {
    if (this.toolPreferences.get(toolId) === enabled) return;
    this.toolPreferences.set(toolId, enabled);
    this.markModified();
  }

  setAllMCPToolPreferences(toolIds: string[], enabled: boolean): void {
    for (const id of toolIds) {
      this.toolPreferences.set(id, enabled);
    }
    this.markModified();
  }

  filterEnabledServers(serverNames: string[]): string[] {
    return serverNames.filter((name) => this.getMCPServerPreference(name));
  }

  filterEnabledTools(toolIds: string[]): string[] {
    return toolIds.filter((id) => this.getMCPToolPreference(id));
  }

  get mcpServerPreferences(): Record<string, boolean> {
    return Object.fromEntries(this.serverPreferences);
  }

  get mcpToolPreferences(): Record<string, boolean> {
    return Object.fromEntries(this.toolPreferences);
  }

  // ============================================================================
  // RUNTIME DELEGATION
  // ============================================================================

  get runtimeConfig(): AgentRuntimeConfig {
    return {
      agentId: this.id,
      name: this.settings.name,
      systemPrompt: this.settings.systemPrompt,
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
      useBetaFeatures: this.settings.useBetaFeatures,
      useReasonerModel: this.settings.useReasonerModel,
      mcpConfigPath: this.settings.mcpConfigPath,
      contextFiles: [...this.settings.contextFiles],
    };
  }

  private getRuntime(): AgentRuntime {
    if (!this.runtime) {
      if (!this.deps.runtimeFactory) {
        throw new Error('No conversation runtime is configured');
      }
      this.runtime = this.deps.runtimeFactory(this.runtimeConfig);
      logger.debug(`Created runtime for agent ${this.id}`);
    }
    return this.runtime;
  }

  /**
   * Send a user message through the runtime. Status moves to processing,
   * then back to idle, or to error with the failure message; failures are
   * rethrown as RuntimeDelegationError.
   */
  async sendMessage(text: string, options: SendMessageOptions = {}): Promise<RuntimeResponse> {
    const message = text.trim();
    if (message.length === 0) {
      throw ValidationError.single('message', 'Message cannot be empty', 'MISSING_REQUIRED_FIELD');
    }

    this.setProcessingStatus();
    try {
      const runtime = this.getRuntime();
      const callOptions: SendMessageOptions = {
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
        useReasonerModel: this.settings.useReasonerModel,
        ...options,
      };

      let response = await runtime.sendUserMessageAndGetResponse(message, callOptions);
      for (let round = 0; runtime.hasUnprocessedToolCalls && round < MAX_TOOL_ROUNDS; round++) {
        response = await runtime.processAndContinue(callOptions);
      }

      this.setIdleStatus();
      return response;
    } catch (error) {
      this.setErrorStatus(getErrorMessage(error));
      logger.error(`Message handling failed for agent ${this.id}`, error instanceof Error ? error : { error });
      throw new RuntimeDelegationError(this.id, error);
    }
  }

  // ============================================================================
  // VALIDATION & PERSISTENCE
  // ============================================================================

  validate(): ValidationResult {
    return AgentModel.checkSettings(this.id, this.settings);
  }

  private static checkSettings(id: string, settings: AgentSettings): ValidationResult {
    return toValidationResult([
      validateRequired(id, 'id', 'Agent ID cannot be empty'),
      validateRequired(settings.name, 'name', 'Agent name cannot be empty'),
      validateRequired(settings.systemPrompt, 'systemPrompt', 'System prompt cannot be empty'),
      validateRange(
        settings.temperature,
        ValidationLimits.TEMPERATURE_MIN,
        ValidationLimits.TEMPERATURE_MAX,
        'temperature',
        'Temperature must be between 0.0 and 2.0'
      ),
      validateRange(
        settings.maxTokens,
        ValidationLimits.MAX_TOKENS_MIN,
        ValidationLimits.MAX_TOKENS_MAX,
        'maxTokens',
        'Max tokens must be between 100 and 32000'
      ),
    ]);
  }

  /** Throws ValidationError listing every violation */
  assertValid(): void {
    const result = this.validate();
    if (!result.valid) {
      throw new ValidationError(result.errors);
    }
  }

  private requireStore(operation: 'save' | 'delete'): EntityStore<AgentJson> {
    if (!this.deps.store) {
      throw new PersistenceError(operation, `agent ${this.id}`, new Error('No agent store is configured'));
    }
    return this.deps.store;
  }

  /**
   * Validate, then write `<id>.json`. Nothing touches the disk when
   * validation fails.
   */
  async save(): Promise<void> {
    this.assertValid();
    const store = this.requireStore('save');
    this.touch();
    await store.write(this.id, this.toJSON());
    logger.info(`Saved agent ${this.settings.name} (${this.id})`);
    this.notifyListeners();
  }

  /** Remove the persisted file; a missing file is not an error */
  async delete(): Promise<void> {
    const store = this.requireStore('delete');
    await store.remove(this.id);
    logger.info(`Deleted agent ${this.settings.name} (${this.id})`);
    this.notifyListeners();
  }

  private touch(): void {
    const now = Date.now();
    if (now > this._lastActiveAt.getTime()) {
      this._lastActiveAt = new Date(now);
    }
  }

  private markModified(): void {
    this.touch();
    this.notifyListeners();
  }

  /**
   * Release the runtime and every content subscription.
   */
  dispose(): void {
    this.unsubscribeContent();
    this.content.dispose();
    this.runtime?.dispose();
    this.runtime = undefined;
    super.dispose();
  }

  // ============================================================================
  // SERIALIZATION
  // ============================================================================

  toJSON(): AgentJson {
    return {
      id: this.id,
      name: this.settings.name,
      systemPrompt: this.settings.systemPrompt,
      isActive: this.active,
      isProcessing: this.isProcessing,
      createdAt: this.createdAt.toISOString(),
      lastActiveAt: this._lastActiveAt.toISOString(),
      processingStatus: {
        status: this.processing.status,
        lastActivity: this.processing.lastActivity.toISOString(),
        lastStatusChange: this.processing.lastStatusChange.toISOString(),
        errorMessage: this.processing.errorMessage ?? null,
      },
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
      useBetaFeatures: this.settings.useBetaFeatures,
      useReasonerModel: this.settings.useReasonerModel,
      mcpConfigPath: this.settings.mcpConfigPath ?? null,
      supervisorId: this.settings.supervisorId ?? null,
      contextFiles: [...this.settings.contextFiles],
      mcpServerPreferences: this.mcpServerPreferences,
      mcpToolPreferences: this.mcpToolPreferences,
      mcpContent: this.content.toJSON(),
      metadata: cloneJsonObject(this._metadata),
    };
  }

  static fromJSON(data: unknown, deps: AgentModelDependencies = {}): AgentModel {
    const json = parseWithSchema(agentJsonSchema, data);
    const lastActiveAt = new Date(json.lastActiveAt);
    // Files written before the status record existed only carry isProcessing
    const processingState: ProcessingState = json.processingStatus
      ? {
          status: json.processingStatus.status,
          lastActivity: new Date(json.processingStatus.lastActivity),
          lastStatusChange: new Date(json.processingStatus.lastStatusChange),
          errorMessage: json.processingStatus.errorMessage ?? undefined,
        }
      : {
          status: json.isProcessing ? AgentProcessingStatus.PROCESSING : AgentProcessingStatus.IDLE,
          lastActivity: lastActiveAt,
          lastStatusChange: lastActiveAt,
        };

    return new AgentModel(
      {
        id: json.id,
        name: json.name,
        systemPrompt: json.systemPrompt,
        isActive: json.isActive,
        createdAt: new Date(json.createdAt),
        lastActiveAt,
        processingState,
        temperature: json.temperature,
        maxTokens: json.maxTokens,
        useBetaFeatures: json.useBetaFeatures,
        useReasonerModel: json.useReasonerModel,
        mcpConfigPath: json.mcpConfigPath ?? undefined,
        supervisorId: json.supervisorId ?? undefined,
        contextFiles: json.contextFiles,
        mcpServerPreferences: json.mcpServerPreferences,
        mcpToolPreferences: json.mcpToolPreferences,
        content: json.mcpContent ? ContentCollection.fromJSON(json.mcpContent) : undefined,
        metadata: json.metadata,
      },
      deps
    );
  }
}
