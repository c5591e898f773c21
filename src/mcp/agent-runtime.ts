/**
 * Conversation runtime contract
 *
 * An agent hands every user message to a runtime that owns the conversation
 * history, talks to the language model and executes MCP tool calls. The
 * runtime is created lazily, on the first message, through a factory the
 * host supplies.
 */

export type ConversationRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ConversationMessage {
  role: ConversationRole;
  content: string;
  /** Set on tool results: `<server>:<tool>` */
  toolId?: string;
  timestamp: Date;
}

export interface RuntimeResponse {
  content: string;
  /** Number of tool calls the model requested in this turn */
  toolCallCount?: number;
}

export interface SendMessageOptions {
  temperature?: number;
  maxTokens?: number;
  useReasonerModel?: boolean;
  /** `<server>:<tool>` ids the runtime may call */
  enabledTools?: string[];
}

export interface AgentRuntime {
  sendUserMessageAndGetResponse(text: string, options?: SendMessageOptions): Promise<RuntimeResponse>;
  getHistory(): ConversationMessage[];
  addUserMessage(text: string): void;
  addAssistantMessage(text: string): void;
  addSystemMessage(text: string): void;
  /** True while the last turn left tool calls that still need executing */
  readonly hasUnprocessedToolCalls: boolean;
  processAndContinue(options?: SendMessageOptions): Promise<RuntimeResponse>;
  dispose(): void;
}

/** What a runtime needs to know about the agent it serves */
export interface AgentRuntimeConfig {
  agentId: string;
  name: string;
  systemPrompt: string;
  temperature: number;
  maxTokens: number;
  useBetaFeatures: boolean;
  useReasonerModel: boolean;
  mcpConfigPath?: string;
  contextFiles: string[];
}

export type AgentRuntimeFactory = (config: AgentRuntimeConfig) => AgentRuntime;
