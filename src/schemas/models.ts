/**
 * VibeCoder Data Models
 *
 * Enumerations and plain record types shared by the model classes, the
 * persisted JSON schemas and the REST surface.
 */

import type { JsonObject } from '../models/types.js';

// ============================================================================
// CONTENT MODEL
// ============================================================================

export enum ContentType {
  INBOX = 'inbox',
  TODO = 'todo',
  NOTEPAD = 'notepad',
}

export enum Priority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  URGENT = 'urgent',
}

/** Ordinal level of each priority, low = 1 through urgent = 4 */
export const PriorityLevel: Record<Priority, number> = {
  [Priority.LOW]: 1,
  [Priority.MEDIUM]: 2,
  [Priority.HIGH]: 3,
  [Priority.URGENT]: 4,
};

function isEnumValue<T extends string>(values: Record<string, T>, value: string): value is T {
  return Object.values<string>(values).includes(value);
}

/** Unknown priority strings decode to medium */
export function parsePriority(value: string | null | undefined): Priority {
  if (value && isEnumValue(Priority, value)) {
    return value;
  }
  return Priority.MEDIUM;
}

export function parseContentType(value: string): ContentType | null {
  return isEnumValue(ContentType, value) ? value : null;
}

/** Negative when a ranks below b */
export function comparePriority(a: Priority, b: Priority): number {
  return PriorityLevel[a] - PriorityLevel[b];
}

export function isHigherPriority(a: Priority, b: Priority): boolean {
  return comparePriority(a, b) > 0;
}

// ============================================================================
// AGENT MODEL
// ============================================================================

export enum AgentProcessingStatus {
  IDLE = 'idle',
  PROCESSING = 'processing',
  ERROR = 'error',
}

/** Unknown status strings decode to idle */
export function parseProcessingStatus(value: string | null | undefined): AgentProcessingStatus {
  if (value && isEnumValue(AgentProcessingStatus, value)) {
    return value;
  }
  return AgentProcessingStatus.IDLE;
}

// ============================================================================
// MCP SERVER MODEL
// ============================================================================

export enum MCPServerType {
  STDIO = 'stdio',
  SSE = 'sse',
}

export enum MCPServerStatus {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  ERROR = 'error',
  UNSUPPORTED = 'unsupported',
}

/** Unknown status strings decode to disconnected */
export function parseServerStatus(value: string | null | undefined): MCPServerStatus {
  if (value && isEnumValue(MCPServerStatus, value)) {
    return value;
  }
  return MCPServerStatus.DISCONNECTED;
}

export interface MCPToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface MCPTool {
  name: string;
  description?: string;
  /** JSON Schema describing the tool arguments */
  inputSchema: JsonObject;
  annotations?: MCPToolAnnotations;
}

export interface MCPResource {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface MCPPromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface MCPPrompt {
  name: string;
  description?: string;
  arguments?: MCPPromptArgument[];
}

export interface StdioConnectionConfig {
  type: MCPServerType.STDIO;
  command: string;
  args: string[];
  env: Record<string, string>;
}

export interface SseConnectionConfig {
  type: MCPServerType.SSE;
  url: string;
}

export type ServerConnectionConfig = StdioConnectionConfig | SseConnectionConfig;

export interface ServerCapabilities {
  tools: MCPTool[];
  resources: MCPResource[];
  prompts: MCPPrompt[];
}

export interface CapabilityCounts {
  tools: number;
  resources: number;
  prompts: number;
}

// ============================================================================
// LAYOUT MODEL
// ============================================================================

export enum AppTheme {
  DARK = 'dark',
  LIGHT = 'light',
  SYSTEM = 'system',
}

/** Unknown theme strings decode to dark */
export function parseTheme(value: string | null | undefined): AppTheme {
  if (value && isEnumValue(AppTheme, value)) {
    return value;
  }
  return AppTheme.DARK;
}

export interface PanelLayout {
  leftWidth: number;
  rightWidth: number;
  leftCollapsed: boolean;
  rightCollapsed: boolean;
  minWidth: number;
  maxWidth: number;
}

export interface WindowSize {
  width: number;
  height: number;
}
