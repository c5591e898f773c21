/**
 * VibeCoder Core Data Types
 *
 * Shared primitives used by the models, services and outer surfaces.
 */

/** Canonical 8-4-4-4-12 hex identifier */
export type UUID = string;

/** ISO 8601 timestamp as written to disk and over the wire */
export type Timestamp = string;

/** Any value that survives a JSON round trip */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function cloneJsonObject(value: JsonObject): JsonObject {
  return structuredClone(value);
}

// ============================================================================
// CHANGE FEED TYPES
// ============================================================================

/** Topics a change-feed client can subscribe to */
export type ChangeFeedTopic = 'agents' | 'servers' | 'preferences' | `agent:${string}`;

export type ChangeFeedEventType =
  | 'agent.created'
  | 'agent.updated'
  | 'agent.deleted'
  | 'server.updated'
  | 'server.deleted'
  | 'preferences.updated';

/** WebSocket frame exchanged with change-feed clients */
export interface WSMessage {
  type: 'event' | 'subscribe' | 'unsubscribe' | 'ack' | 'error';
  event?: ChangeFeedEventType;
  topic?: string;
  data?: unknown;
  correlationId?: string;
  timestamp: number;
}
