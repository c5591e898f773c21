/**
 * VibeCoder - agent workspace with inbox, todos, notepad and an MCP server registry
 *
 * @packageDocumentation
 */

// Server
export { VibeCoderServer } from './server.js';
export type { VibeCoderServerOptions } from './server.js';
export { getConfigFromEnv, DEFAULT_PORT } from './config.js';
export type { VibeCoderConfig } from './config.js';

// Core
export { ChangeNotifier } from './core/change-notifier.js';
export type { ChangeListener, Unsubscribe } from './core/change-notifier.js';

// Models
export { ContentItem, prepareContent } from './models/content-item.js';
export { InboxItem } from './models/inbox-item.js';
export { TodoItem } from './models/todo-item.js';
export { NotepadContent } from './models/notepad-content.js';
export { ContentCollection } from './models/content-collection.js';
export type { ContentCounts } from './models/content-collection.js';
export { AgentModel, MAX_TOOL_ROUNDS } from './models/agent-model.js';
export type {
  AgentInit,
  AgentModelDependencies,
  AgentSettings,
  AgentSettingsUpdate,
  ProcessingState,
} from './models/agent-model.js';
export { MCPServerModel } from './models/mcp-server-model.js';
export type { MCPServerInit, MCPServerDependencies } from './models/mcp-server-model.js';
export {
  LayoutPreferencesModel,
  PREFERENCES_VERSION,
  defaultPanelLayout,
  isValidPanelLayout,
  parsePanelLayout,
} from './models/layout-preferences.js';
export type { LayoutPreferencesOptions } from './models/layout-preferences.js';
export type {
  ChangeFeedEventType,
  ChangeFeedTopic,
  JsonObject,
  JsonValue,
  Timestamp,
  UUID,
  WSMessage,
} from './models/types.js';

// Collaborator contracts
export type {
  AgentRuntime,
  AgentRuntimeConfig,
  AgentRuntimeFactory,
  ConversationMessage,
  ConversationRole,
  RuntimeResponse,
  SendMessageOptions,
} from './mcp/agent-runtime.js';
export type { MCPTransport } from './mcp/transport.js';

// Services
export { AgentService } from './services/agent-service.js';
export type { AgentCreateInput, AgentStatistics, AgentUpdateInput } from './services/agent-service.js';
export { ContentService } from './services/content-service.js';
export type { ContentSummary, InboxMessageInput, TodoInput } from './services/content-service.js';
export { McpServerService, toolUniqueId } from './services/mcp-server-service.js';
export type { ImportResult, ServerInfoSummary, ToolRegistryEntry } from './services/mcp-server-service.js';

// Storage
export * from './storage/index.js';

// Relay & API
export { ChangeFeedRelay, connectChangeFeed, CHANGE_FEED_PATH } from './relay/change-feed-relay.js';
export type { FeedSocket } from './relay/change-feed-relay.js';
export { createRoutes } from './api/routes.js';
export type { RouteServices } from './api/routes.js';

// Schemas
export * from './schemas/models.js';
export * from './schemas/errors.js';
export * from './schemas/validation.js';
export * from './schemas/persistence.js';
