/**
 * ChangeFeedRelay - pushes model changes to WebSocket clients
 *
 * Clients send `subscribe` / `unsubscribe` frames naming a topic
 * (`agents`, `servers`, `preferences` or `agent:<id>`) and receive `event`
 * frames for that topic until they unsubscribe or disconnect.
 */

import { EventEmitter } from 'events';
import type { Server } from 'http';
import { v4 as uuid } from 'uuid';
import { WebSocketServer, type WebSocket } from 'ws';
import { z } from 'zod';
import type { LayoutPreferencesModel } from '../models/layout-preferences.js';
import type { ChangeFeedEventType, ChangeFeedTopic, WSMessage } from '../models/types.js';
import type { AgentModel } from '../models/agent-model.js';
import type { MCPServerModel } from '../models/mcp-server-model.js';
import type { AgentChangeKind, AgentService } from '../services/agent-service.js';
import type { McpServerService } from '../services/mcp-server-service.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Relay');

export const CHANGE_FEED_PATH = '/ws';

const SOCKET_OPEN = 1;

/** The part of a WebSocket the relay writes to */
export interface FeedSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

const topicSchema = z
  .string()
  .refine(
    (topic) => topic === 'agents' || topic === 'servers' || topic === 'preferences' || /^agent:.+$/.test(topic),
    { message: 'Unknown topic' }
  );

const clientFrameSchema = z.object({
  type: z.enum(['subscribe', 'unsubscribe']),
  topic: topicSchema,
  correlationId: z.string().optional(),
});

export function isChangeFeedTopic(topic: string): topic is ChangeFeedTopic {
  return topicSchema.safeParse(topic).success;
}

export interface ChangeFeedRelayOptions {
  /** HTTP server to attach to; the feed is served on /ws */
  server?: Server;
}

export class ChangeFeedRelay extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private connections: Map<string, FeedSocket> = new Map(); // connectionId -> socket
  private subscriptions: Map<string, Set<string>> = new Map(); // topic -> Set<connectionId>
  private httpServer?: Server;

  constructor(options: ChangeFeedRelayOptions = {}) {
    super();
    this.httpServer = options.server;
  }

  /**
   * Attach the WebSocket server to the HTTP server
   */
  start(): void {
    if (!this.httpServer) {
      throw new Error('ChangeFeedRelay needs an HTTP server to attach to');
    }
    this.wss = new WebSocketServer({ server: this.httpServer, path: CHANGE_FEED_PATH });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
    this.wss.on('error', (error) => {
      logger.error('WebSocket server error', error);
    });
    logger.info(`WebSocket attached to HTTP server on ${CHANGE_FEED_PATH}`);
  }

  async stop(): Promise<void> {
    for (const [connectionId, socket] of this.connections) {
      socket.close(1000, 'Server shutting down');
      this.detach(connectionId);
    }
    const wss = this.wss;
    this.wss = null;
    if (!wss) return;

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('WebSocket server stopped');
  }

  private handleConnection(ws: WebSocket): void {
    const connectionId = this.attach(ws);

    ws.on('message', (data) => {
      this.receive(connectionId, data.toString());
    });
    ws.on('close', () => {
      this.detach(connectionId);
    });
    ws.on('error', (error) => {
      logger.error(`Connection error ${connectionId}`, error);
    });
  }

  // ============================================================================
  // CONNECTIONS
  // ============================================================================

  /** Track a socket; returns its connection id */
  attach(socket: FeedSocket): string {
    const connectionId = uuid();
    this.connections.set(connectionId, socket);
    logger.debug(`New connection: ${connectionId}`);
    this.emit('connection', connectionId);
    return connectionId;
  }

  /** Forget a socket and all of its subscriptions */
  detach(connectionId: string): void {
    if (!this.connections.delete(connectionId)) return;
    for (const [topic, subscribers] of this.subscriptions) {
      subscribers.delete(connectionId);
      if (subscribers.size === 0) {
        this.subscriptions.delete(topic);
      }
    }
    logger.debug(`Connection closed: ${connectionId}`);
    this.emit('disconnect', connectionId);
  }

  /**
   * Handle one raw frame from a client. Malformed frames get an `error`
   * frame back and change nothing.
   */
  receive(connectionId: string, raw: string): void {
    const socket = this.connections.get(connectionId);
    if (!socket) return;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.sendError(socket, 'INVALID_FORMAT', 'Invalid message format');
      return;
    }

    const frame = clientFrameSchema.safeParse(payload);
    if (!frame.success) {
      const issue = frame.error.issues[0];
      this.sendError(socket, 'INVALID_MESSAGE', issue ? issue.message : 'Invalid message');
      return;
    }

    const { type, topic, correlationId } = frame.data;
    if (type === 'subscribe') {
      this.subscribe(connectionId, topic);
    } else {
      this.unsubscribe(connectionId, topic);
    }
    this.sendAck(socket, topic, correlationId);
  }

  subscribe(connectionId: string, topic: string): void {
    let subscribers = this.subscriptions.get(topic);
    if (!subscribers) {
      subscribers = new Set();
      this.subscriptions.set(topic, subscribers);
    }
    subscribers.add(connectionId);
    logger.debug(`Connection ${connectionId} subscribed to ${topic}`);
  }

  unsubscribe(connectionId: string, topic: string): void {
    const subscribers = this.subscriptions.get(topic);
    if (!subscribers) return;
    subscribers.delete(connectionId);
    if (subscribers.size === 0) {
      this.subscriptions.delete(topic);
    }
  }

  // ============================================================================
  // DELIVERY
  // ============================================================================

  /** Send an event frame to every subscriber of `topic` */
  publish(topic: ChangeFeedTopic, event: ChangeFeedEventType, data: unknown): number {
    const subscribers = this.subscriptions.get(topic);
    if (!subscribers) return 0;

    const frame: WSMessage = { type: 'event', event, topic, data, timestamp: Date.now() };
    let delivered = 0;
    for (const connectionId of subscribers) {
      const socket = this.connections.get(connectionId);
      if (socket && this.send(socket, frame)) delivered++;
    }
    return delivered;
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getTopicSubscribers(topic: string): string[] {
    return Array.from(this.subscriptions.get(topic) ?? []);
  }

  private send(socket: FeedSocket, message: WSMessage): boolean {
    if (socket.readyState !== SOCKET_OPEN) return false;
    socket.send(JSON.stringify(message));
    return true;
  }

  private sendAck(socket: FeedSocket, topic: string, correlationId?: string): void {
    if (!correlationId) return;
    this.send(socket, { type: 'ack', topic, correlationId, data: { success: true }, timestamp: Date.now() });
  }

  private sendError(socket: FeedSocket, code: string, message: string): void {
    this.send(socket, { type: 'error', data: { code, message }, timestamp: Date.now() });
  }
}

export interface ChangeFeedSources {
  agents: AgentService;
  servers: McpServerService;
  preferences: LayoutPreferencesModel;
}

interface WatchedModel {
  readonly id: string;
  subscribe(listener: () => void): () => void;
}

/** Keeps one change subscription per live model, keyed by id */
class ModelWatch<T extends WatchedModel> {
  private subscriptions: Map<string, () => void> = new Map();
  private onChange: (model: T) => void;

  constructor(onChange: (model: T) => void) {
    this.onChange = onChange;
  }

  /** Returns false when the model was already watched */
  add(model: T): boolean {
    if (this.subscriptions.has(model.id)) return false;
    this.subscriptions.set(model.id, model.subscribe(() => this.onChange(model)));
    return true;
  }

  remove(id: string): void {
    this.subscriptions.get(id)?.();
    this.subscriptions.delete(id);
  }

  /** Watch every model in `models` and drop the ones no longer there */
  sync(models: T[]): void {
    const live = new Set(models.map((model) => model.id));
    for (const id of Array.from(this.subscriptions.keys())) {
      if (!live.has(id)) this.remove(id);
    }
    for (const model of models) this.add(model);
  }

  clear(): void {
    for (const unsubscribe of this.subscriptions.values()) unsubscribe();
    this.subscriptions.clear();
  }
}

/**
 * Forward model and service changes to the relay. Every notification of a
 * tracked agent or server is published as `agent.updated` /
 * `server.updated`; creation and deletion come from the services. Agent
 * events go to both `agents` and `agent:<id>`. Returns a function that
 * detaches every listener.
 */
export function connectChangeFeed(relay: ChangeFeedRelay, sources: ChangeFeedSources): () => void {
  const publishAgent = (kind: AgentChangeKind, agent: AgentModel): void => {
    const data = agent.toJSON();
    relay.publish('agents', `agent.${kind}`, data);
    relay.publish(`agent:${agent.id}`, `agent.${kind}`, data);
  };
  const publishServer = (kind: 'updated' | 'deleted', server: MCPServerModel): void => {
    relay.publish('servers', `server.${kind}`, server.toJSON());
  };

  const agentWatch = new ModelWatch<AgentModel>((agent) => publishAgent('updated', agent));
  const serverWatch = new ModelWatch<MCPServerModel>((server) => publishServer('updated', server));
  agentWatch.sync(sources.agents.getAll());
  serverWatch.sync(sources.servers.getAll());

  const detachers = [
    sources.agents.onAgentChange((kind, agent) => {
      if (kind === 'deleted') {
        agentWatch.remove(agent.id);
        publishAgent(kind, agent);
        return;
      }
      // Updates of a watched agent were already published by its own notification
      if (agentWatch.add(agent) || kind === 'created') publishAgent(kind, agent);
    }),
    // Picks up agents loaded in bulk, which raise no lifecycle event
    sources.agents.subscribe(() => agentWatch.sync(sources.agents.getAll())),
    sources.servers.onServerChange((kind, server) => {
      if (kind === 'deleted') {
        serverWatch.remove(server.id);
        publishServer(kind, server);
        return;
      }
      if (serverWatch.add(server)) publishServer(kind, server);
    }),
    sources.servers.subscribe(() => serverWatch.sync(sources.servers.getAll())),
    sources.preferences.subscribe(() => {
      relay.publish('preferences', 'preferences.updated', sources.preferences.toJSON());
    }),
  ];
  return () => {
    for (const detach of detachers) detach();
    agentWatch.clear();
    serverWatch.clear();
  };
}
