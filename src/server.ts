/**
 * VibeCoder Server
 * Composition root: stores, services, REST API under /api/v1 and the
 * WebSocket change feed on /ws, all on one port.
 */

import express from 'express';
import http from 'http';
import cors from 'cors';
import { createRoutes } from './api/routes.js';
import { getConfigFromEnv, type VibeCoderConfig } from './config.js';
import type { AgentRuntimeFactory } from './mcp/agent-runtime.js';
import type { MCPTransport } from './mcp/transport.js';
import { LayoutPreferencesModel } from './models/layout-preferences.js';
import { ChangeFeedRelay, connectChangeFeed } from './relay/change-feed-relay.js';
import { createNotFoundError, createValidationError, toErrorResponse } from './schemas/errors.js';
import type { AgentJson, MCPServerJson } from './schemas/persistence.js';
import { AgentService } from './services/agent-service.js';
import { ContentService } from './services/content-service.js';
import { McpServerService } from './services/mcp-server-service.js';
import { JsonFileStore } from './storage/json-file-store.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Server');
const httpLogger = createLogger('HTTP');

export interface VibeCoderServerOptions {
  /** Overrides on top of the environment configuration */
  config?: Partial<VibeCoderConfig>;
  /** Creates the conversation runtime behind each agent */
  runtimeFactory?: AgentRuntimeFactory;
  /** Reaches MCP servers; without one, connects report `unsupported` */
  transport?: MCPTransport;
}

export class VibeCoderServer {
  readonly config: VibeCoderConfig;
  readonly app: express.Application;
  readonly agentService: AgentService;
  readonly contentService: ContentService;
  readonly serverService: McpServerService;
  readonly preferences: LayoutPreferencesModel;

  private server?: http.Server;
  private relay?: ChangeFeedRelay;
  private detachFeed?: () => void;

  constructor(options: VibeCoderServerOptions = {}) {
    this.config = { ...getConfigFromEnv(), ...options.config };

    this.agentService = new AgentService(
      new JsonFileStore<AgentJson>({ directory: this.config.agentsDir, entity: 'agent' }),
      options.runtimeFactory
    );
    this.contentService = new ContentService(this.agentService);
    this.serverService = new McpServerService(
      new JsonFileStore<MCPServerJson>({ directory: this.config.serversDir, entity: 'server' }),
      options.transport
    );
    this.preferences = new LayoutPreferencesModel({ filePath: this.config.preferencesPath });

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    // Request logging
    this.app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        httpLogger.info(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
      });
      next();
    });
  }

  /**
   * Set up API routes
   */
  private setupRoutes(): void {
    const routes = createRoutes({
      agentService: this.agentService,
      contentService: this.contentService,
      serverService: this.serverService,
      preferences: this.preferences,
    });

    this.app.use('/api/v1', routes);

    this.app.get('/', (req, res) => {
      res.json({
        name: 'VibeCoder',
        description: 'Agent workspace with MCP server registry',
        api: '/api/v1/health',
        changeFeed: '/ws',
      });
    });

    // 404 handler
    this.app.use((req, res) => {
      res.status(404).json(createNotFoundError('endpoint', req.path));
    });

    // Error handler (malformed JSON bodies land here)
    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const body =
        err instanceof SyntaxError
          ? createValidationError([{ field: '(body)', message: 'Malformed JSON body', code: 'INVALID_JSON' }])
          : toErrorResponse(err);
      if (body.error.status >= 500) {
        logger.error('Unhandled request error', err instanceof Error ? err : { error: err });
      }
      res.status(body.error.status).json(body);
    });
  }

  /**
   * Load persisted state, then start listening
   */
  async start(): Promise<void> {
    const agents = await this.agentService.initializeAgents();
    const servers = await this.serverService.initializeServers();
    const source = await this.preferences.loadPreferences();
    logger.info(
      `Loaded ${agents.loaded} agents (${agents.failed.length} failed), ` +
        `${servers.loaded} servers (${servers.failed.length} failed), preferences from ${source}`
    );

    const server = http.createServer(this.app);
    this.server = server;
    this.relay = new ChangeFeedRelay({ server });
    this.relay.start();
    this.detachFeed = connectChangeFeed(this.relay, {
      agents: this.agentService,
      servers: this.serverService,
      preferences: this.preferences,
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, () => {
        server.off('error', reject);
        resolve();
      });
    });

    logger.info(`HTTP API on http://localhost:${this.port}/api/v1, change feed on ws://localhost:${this.port}/ws`);
  }

  /** The bound port; differs from config.port when that was 0 */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  /**
   * Stop accepting connections and flush pending preference writes
   */
  async stop(): Promise<void> {
    this.detachFeed?.();
    this.detachFeed = undefined;
    await this.relay?.stop();
    this.relay = undefined;
    await this.preferences.flush();

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    this.agentService.dispose();
    this.serverService.dispose();
    this.preferences.dispose();
    logger.info('Stopped');
  }
}

// CLI entry point
if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  const server = new VibeCoderServer();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : { error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.start().catch((error: unknown) => {
    logger.error('Failed to start', error instanceof Error ? error : { error });
    process.exit(1);
  });
}

export default VibeCoderServer;
