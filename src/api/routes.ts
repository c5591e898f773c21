/**
 * VibeCoder REST API Routes
 *
 * Mounted under /api/v1. Request bodies are decoded with zod; every failure
 * is rendered through toErrorResponse with the error's own status.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { RuntimeResponse } from '../mcp/agent-runtime.js';
import type { AgentModel } from '../models/agent-model.js';
import type { LayoutPreferencesModel } from '../models/layout-preferences.js';
import type { AgentService } from '../services/agent-service.js';
import type { ContentService } from '../services/content-service.js';
import type { McpServerService } from '../services/mcp-server-service.js';
import { toErrorResponse } from '../schemas/errors.js';
import { AppTheme, Priority } from '../schemas/models.js';
import { jsonObjectSchema, parseWithSchema } from '../schemas/persistence.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('API');

// Helper to safely get string from params/query
const str = (val: string | string[] | undefined): string => (Array.isArray(val) ? val[0] : val || '');

export interface RouteServices {
  agentService: AgentService;
  contentService: ContentService;
  serverService: McpServerService;
  preferences: LayoutPreferencesModel;
}

// ============================================================================
// REQUEST BODIES
// ============================================================================

const agentCreateBody = z.object({
  name: z.string(),
  systemPrompt: z.string(),
  temperature: z.number().optional(),
  maxTokens: z.number().int().optional(),
  useBetaFeatures: z.boolean().optional(),
  useReasonerModel: z.boolean().optional(),
  mcpConfigPath: z.string().optional(),
  supervisorId: z.string().optional(),
  contextFiles: z.array(z.string()).optional(),
  metadata: jsonObjectSchema.optional(),
});

const agentUpdateBody = z.object({
  name: z.string().optional(),
  systemPrompt: z.string().optional(),
  temperature: z.number().optional(),
  maxTokens: z.number().int().optional(),
  useBetaFeatures: z.boolean().optional(),
  useReasonerModel: z.boolean().optional(),
  mcpConfigPath: z.string().nullable().optional(),
  supervisorId: z.string().nullable().optional(),
  contextFiles: z.array(z.string()).optional(),
  isActive: z.boolean().optional(),
});

const sendMessageBody = z.object({
  message: z.string(),
  temperature: z.number().optional(),
  maxTokens: z.number().int().optional(),
  useReasonerModel: z.boolean().optional(),
});

const enabledBody = z.object({ enabled: z.boolean() });

const dueDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date value' })
  .transform((value) => new Date(value));

const inboxBody = z.object({
  content: z.string(),
  sender: z.string().optional(),
  priority: z.nativeEnum(Priority).optional(),
  metadata: jsonObjectSchema.optional(),
});

const inboxPatchBody = z.object({ isRead: z.boolean() });

const todoBody = z.object({
  content: z.string(),
  priority: z.nativeEnum(Priority).optional(),
  dueDate: dueDateSchema.optional(),
  tags: z.array(z.string()).optional(),
  metadata: jsonObjectSchema.optional(),
});

const todoPatchBody = z.object({ isCompleted: z.boolean() });

const todoOrderBody = z.object({ ids: z.array(z.string()) });

const notepadBody = z.object({ content: z.string() });

const notepadAppendBody = z.object({ text: z.string() });

const layoutPatchBody = z.object({
  theme: z.nativeEnum(AppTheme).optional(),
  leftSidebarCollapsed: z.boolean().optional(),
  rightSidebarCollapsed: z.boolean().optional(),
  leftWidth: z.number().optional(),
  rightWidth: z.number().optional(),
  selectedAgentId: z.string().nullable().optional(),
  windowSize: z.object({ width: z.number().positive(), height: z.number().positive() }).nullable().optional(),
});

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

function sendError(res: Response, error: unknown): void {
  const body = toErrorResponse(error);
  if (body.error.status >= 500) {
    logger.error(`Request failed: ${body.error.message}`, error instanceof Error ? error : { error });
  }
  res.status(body.error.status).json(body);
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

/** Run a handler, rendering anything it throws as an error response */
function handle(handler: Handler): (req: Request, res: Response) => Promise<void> {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      sendError(res, error);
    }
  };
}

function agentSummary(agent: AgentModel) {
  return {
    id: agent.id,
    name: agent.name,
    isActive: agent.isActive,
    status: agent.status,
    errorMessage: agent.errorMessage ?? null,
    lastActiveAt: agent.lastActiveAt.toISOString(),
    messageCount: agent.messageCount,
    summary: agent.displaySummary,
  };
}

export function createRoutes(services: RouteServices): Router {
  const router = Router();
  const { agentService, contentService, serverService, preferences } = services;

  // Health check
  router.get('/health', (req: Request, res: Response) => {
    const info = serverService.getServerInfo();
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        stats: {
          agents: agentService.getCount(),
          activeAgents: agentService.getActive().length,
          servers: info.totalCount,
          connectedServers: info.connectedCount,
          tools: info.toolCount,
        },
      },
    });
  });

  // ============================================================================
  // AGENT ROUTES
  // ============================================================================

  router.get('/agents', (req: Request, res: Response) => {
    res.json({ success: true, data: agentService.getAll().map(agentSummary) });
  });

  router.get('/agents/stats', (req: Request, res: Response) => {
    res.json({ success: true, data: agentService.getStatistics() });
  });

  router.post(
    '/agents',
    handle(async (req, res) => {
      const body = parseWithSchema(agentCreateBody, req.body);
      const agent = await agentService.createAgent(body);
      res.status(201).json({ success: true, data: agent.toJSON() });
    })
  );

  router.get(
    '/agents/:id',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({ success: true, data: agent.toJSON() });
    })
  );

  router.patch(
    '/agents/:id',
    handle(async (req, res) => {
      const body = parseWithSchema(agentUpdateBody, req.body);
      const agent = await agentService.updateAgent(str(req.params.id), body);
      res.json({ success: true, data: agent.toJSON() });
    })
  );

  router.delete(
    '/agents/:id',
    handle(async (req, res) => {
      const id = str(req.params.id);
      await agentService.deleteAgent(id);
      res.json({ success: true, data: { id, deleted: true } });
    })
  );

  // ============================================================================
  // CONVERSATION ROUTES
  // ============================================================================

  router.post(
    '/agents/:id/messages',
    handle(async (req, res) => {
      const agent = agentService.require(str(req.params.id));
      const { message, ...options } = parseWithSchema(sendMessageBody, req.body);
      const enabledTools = serverService.getToolsForAgent(agent).map((entry) => entry.uniqueId);

      const persistStatus = async (): Promise<void> => {
        if (agentService.getById(agent.id)) {
          await agentService.saveAgent(agent.id);
        }
      };

      let response: RuntimeResponse;
      try {
        response = await agent.sendMessage(message, { ...options, enabledTools });
      } catch (error) {
        // The runtime failure is the answer; a failed status save is only logged
        await persistStatus().catch((saveError: unknown) => {
          logger.error(
            `Failed to save error status of agent ${agent.id}`,
            saveError instanceof Error ? saveError : { error: saveError }
          );
        });
        throw error;
      }
      await persistStatus();
      res.json({ success: true, data: { response: response.content, status: agent.status } });
    })
  );

  router.get(
    '/agents/:id/history',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({
        success: true,
        data: agent.conversationHistory.map((entry) => ({ ...entry, timestamp: entry.timestamp.toISOString() })),
      });
    })
  );

  // ============================================================================
  // MCP PREFERENCE ROUTES
  // ============================================================================

  router.get(
    '/agents/:id/preferences',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({
        success: true,
        data: { servers: agent.mcpServerPreferences, tools: agent.mcpToolPreferences },
      });
    })
  );

  router.put(
    '/agents/:id/preferences/servers/:name',
    handle(async (req, res) => {
      const agent = agentService.require(str(req.params.id));
      const { enabled } = parseWithSchema(enabledBody, req.body);
      agent.setMCPServerPreference(str(req.params.name), enabled);
      await agentService.saveAgent(agent.id);
      res.json({ success: true, data: { servers: agent.mcpServerPreferences } });
    })
  );

  router.put(
    '/agents/:id/preferences/tools/:toolId',
    handle(async (req, res) => {
      const agent = agentService.require(str(req.params.id));
      const { enabled } = parseWithSchema(enabledBody, req.body);
      agent.setMCPToolPreference(str(req.params.toolId), enabled);
      await agentService.saveAgent(agent.id);
      res.json({ success: true, data: { tools: agent.mcpToolPreferences } });
    })
  );

  router.get(
    '/agents/:id/tools',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({ success: true, data: serverService.getToolsForAgent(agent) });
    })
  );

  // ============================================================================
  // CONTENT ROUTES
  // ============================================================================

  router.get(
    '/agents/:id/content',
    handle((req, res) => {
      res.json({ success: true, data: contentService.getSummary(str(req.params.id)) });
    })
  );

  router.get(
    '/agents/:id/inbox',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({ success: true, data: agent.content.inboxItems.map((item) => item.toJSON()) });
    })
  );

  router.post(
    '/agents/:id/inbox',
    handle(async (req, res) => {
      const body = parseWithSchema(inboxBody, req.body);
      const item = await contentService.deliverInboxMessage(str(req.params.id), body);
      res.status(201).json({ success: true, data: item.toJSON() });
    })
  );

  router.patch(
    '/agents/:id/inbox/:itemId',
    handle(async (req, res) => {
      const { isRead } = parseWithSchema(inboxPatchBody, req.body);
      const item = await contentService.setInboxItemRead(str(req.params.id), str(req.params.itemId), isRead);
      res.json({ success: true, data: item.toJSON() });
    })
  );

  router.delete(
    '/agents/:id/inbox/:itemId',
    handle(async (req, res) => {
      const removed = await contentService.removeInboxItem(str(req.params.id), str(req.params.itemId));
      res.json({ success: true, data: { removed } });
    })
  );

  router.get(
    '/agents/:id/todos',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({ success: true, data: agent.content.todoItems.map((item) => item.toJSON()) });
    })
  );

  router.post(
    '/agents/:id/todos',
    handle(async (req, res) => {
      const body = parseWithSchema(todoBody, req.body);
      const item = await contentService.addTodo(str(req.params.id), body);
      res.status(201).json({ success: true, data: item.toJSON() });
    })
  );

  router.put(
    '/agents/:id/todos/order',
    handle(async (req, res) => {
      const { ids } = parseWithSchema(todoOrderBody, req.body);
      const todos = await contentService.reorderTodos(str(req.params.id), ids);
      res.json({ success: true, data: todos.map((item) => item.id) });
    })
  );

  router.patch(
    '/agents/:id/todos/:itemId',
    handle(async (req, res) => {
      const { isCompleted } = parseWithSchema(todoPatchBody, req.body);
      const item = await contentService.setTodoCompleted(str(req.params.id), str(req.params.itemId), isCompleted);
      res.json({ success: true, data: item.toJSON() });
    })
  );

  router.delete(
    '/agents/:id/todos/:itemId',
    handle(async (req, res) => {
      const removed = await contentService.removeTodo(str(req.params.id), str(req.params.itemId));
      res.json({ success: true, data: { removed } });
    })
  );

  router.get(
    '/agents/:id/notepad',
    handle((req, res) => {
      const agent = agentService.require(str(req.params.id));
      res.json({ success: true, data: agent.content.notepad.toJSON() });
    })
  );

  router.put(
    '/agents/:id/notepad',
    handle(async (req, res) => {
      const { content } = parseWithSchema(notepadBody, req.body);
      const updated = await contentService.replaceNotepad(str(req.params.id), content);
      res.json({ success: true, data: { content: updated } });
    })
  );

  router.post(
    '/agents/:id/notepad/append',
    handle(async (req, res) => {
      const { text } = parseWithSchema(notepadAppendBody, req.body);
      const updated = await contentService.appendNotepad(str(req.params.id), text);
      res.json({ success: true, data: { content: updated } });
    })
  );

  // ============================================================================
  // MCP SERVER ROUTES
  // ============================================================================

  router.get('/servers', (req: Request, res: Response) => {
    res.json({ success: true, data: serverService.getServerInfo() });
  });

  router.post(
    '/servers/import',
    handle(async (req, res) => {
      const result = await serverService.importConfiguration(req.body);
      res.json({ success: true, data: result });
    })
  );

  router.get(
    '/servers/:name',
    handle((req, res) => {
      const server = serverService.requireByName(str(req.params.name));
      res.json({ success: true, data: server.toJSON() });
    })
  );

  router.post(
    '/servers/:name/connect',
    handle(async (req, res) => {
      const server = await serverService.connect(str(req.params.name));
      res.json({ success: true, data: { name: server.name, status: server.status, ...server.capabilityCounts } });
    })
  );

  router.post(
    '/servers/:name/disconnect',
    handle(async (req, res) => {
      const server = await serverService.disconnect(str(req.params.name));
      res.json({ success: true, data: { name: server.name, status: server.status } });
    })
  );

  router.delete(
    '/servers/:name',
    handle(async (req, res) => {
      const server = serverService.requireByName(str(req.params.name));
      await serverService.removeServer(server.id);
      res.json({ success: true, data: { name: server.name, deleted: true } });
    })
  );

  router.get('/tools', (req: Request, res: Response) => {
    res.json({ success: true, data: serverService.getAllTools() });
  });

  // ============================================================================
  // LAYOUT PREFERENCE ROUTES
  // ============================================================================

  router.get('/preferences/layout', (req: Request, res: Response) => {
    res.json({ success: true, data: preferences.toJSON() });
  });

  router.patch(
    '/preferences/layout',
    handle(async (req, res) => {
      const body = parseWithSchema(layoutPatchBody, req.body);

      if (body.theme !== undefined) preferences.setTheme(body.theme);
      if (body.leftSidebarCollapsed !== undefined) preferences.setLeftSidebarCollapsed(body.leftSidebarCollapsed);
      if (body.rightSidebarCollapsed !== undefined) preferences.setRightSidebarCollapsed(body.rightSidebarCollapsed);
      const widthsAccepted =
        body.leftWidth === undefined && body.rightWidth === undefined
          ? true
          : preferences.updatePanelWidths({ leftWidth: body.leftWidth, rightWidth: body.rightWidth });
      if (body.selectedAgentId !== undefined) preferences.setSelectedAgent(body.selectedAgentId ?? undefined);
      if (body.windowSize !== undefined) preferences.updateWindowSize(body.windowSize ?? undefined);

      await preferences.flush();
      res.json({ success: true, data: { ...preferences.toJSON(), widthsAccepted } });
    })
  );

  router.post(
    '/preferences/layout/reset',
    handle(async (req, res) => {
      preferences.resetToDefaults();
      await preferences.flush();
      res.json({ success: true, data: preferences.toJSON() });
    })
  );

  return router;
}
