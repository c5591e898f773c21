/**
 * VibeCoder Persisted JSON Schemas
 *
 * zod schemas for every document written to disk. Decoding goes through
 * parseWithSchema() so malformed files surface as ValidationError with one
 * entry per offending field.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '../models/types.js';
import { ValidationError, type ValidationFieldError } from './errors.js';
import {
  ContentType,
  MCPServerType,
  parsePriority,
  parseProcessingStatus,
  parseServerStatus,
  parseTheme,
} from './models.js';

// ============================================================================
// PRIMITIVES
// ============================================================================

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const isoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date value' });

/** Absent and null both decode to undefined */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalDate = isoDateSchema.nullish().transform((value) => value ?? null);

// ============================================================================
// CONTENT
// ============================================================================

const contentItemBaseSchema = z.object({
  id: z.string(),
  content: z.string(),
  priority: z.string().nullish().transform(parsePriority),
  createdAt: isoDateSchema,
  updatedAt: isoDateSchema,
  metadata: jsonObjectSchema.default({}),
});

export const inboxItemJsonSchema = contentItemBaseSchema.extend({
  contentType: z.literal(ContentType.INBOX),
  isRead: z.boolean().default(false),
  sender: z.string().nullish().transform((value) => value ?? null),
  dateReceived: isoDateSchema.optional(),
});

export const todoItemJsonSchema = contentItemBaseSchema.extend({
  contentType: z.literal(ContentType.TODO),
  isCompleted: z.boolean().default(false),
  dueDate: optionalDate,
  completedAt: optionalDate,
  tags: z.array(z.string()).default([]),
});

export const notepadJsonSchema = z.object({
  id: z.string(),
  agentId: z.string(),
  content: z.string().default(''),
  createdAt: isoDateSchema,
  lastModified: isoDateSchema,
});

export const contentCollectionJsonSchema = z.object({
  agentId: z.string(),
  notepad: notepadJsonSchema.optional(),
  inboxItems: z.array(inboxItemJsonSchema).default([]),
  todoItems: z.array(todoItemJsonSchema).default([]),
});

export type InboxItemJson = z.input<typeof inboxItemJsonSchema>;
export type TodoItemJson = z.input<typeof todoItemJsonSchema>;
export type NotepadJson = z.input<typeof notepadJsonSchema>;
export type ContentCollectionJson = z.input<typeof contentCollectionJsonSchema>;

// ============================================================================
// AGENT
// ============================================================================

export const processingStatusJsonSchema = z.object({
  status: z.string().nullish().transform(parseProcessingStatus),
  lastActivity: isoDateSchema,
  lastStatusChange: isoDateSchema,
  errorMessage: z.string().nullish().transform((value) => value ?? null),
});

export const agentJsonSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  systemPrompt: z.string(),
  isActive: z.boolean().default(true),
  isProcessing: z.boolean().default(false),
  createdAt: isoDateSchema,
  lastActiveAt: isoDateSchema,
  processingStatus: processingStatusJsonSchema.optional(),
  temperature: z.number().default(0.7),
  maxTokens: z.number().int().default(4000),
  useBetaFeatures: z.boolean().default(false),
  useReasonerModel: z.boolean().default(false),
  mcpConfigPath: z.string().nullish().transform((value) => value ?? null),
  supervisorId: z.string().nullish().transform((value) => value ?? null),
  contextFiles: z.array(z.string()).default([]),
  mcpServerPreferences: z.record(z.boolean()).default({}),
  mcpToolPreferences: z.record(z.boolean()).default({}),
  mcpContent: contentCollectionJsonSchema.optional(),
  metadata: jsonObjectSchema.default({}),
});

export type ProcessingStatusJson = z.input<typeof processingStatusJsonSchema>;
export type AgentJson = z.input<typeof agentJsonSchema>;

// ============================================================================
// MCP SERVER
// ============================================================================

export const mcpToolSchema = z.object({
  name: z.string().min(1),
  description: optionalString,
  inputSchema: jsonObjectSchema.default({}),
  annotations: z
    .object({
      title: optionalString,
      readOnlyHint: z.boolean().optional(),
      destructiveHint: z.boolean().optional(),
      idempotentHint: z.boolean().optional(),
      openWorldHint: z.boolean().optional(),
    })
    .nullish()
    .transform((value) => value ?? undefined),
});

export const mcpResourceSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: optionalString,
  mimeType: optionalString,
});

export const mcpPromptSchema = z.object({
  name: z.string(),
  description: optionalString,
  arguments: z
    .array(
      z.object({
        name: z.string(),
        description: optionalString,
        required: z.boolean().optional(),
      })
    )
    .nullish()
    .transform((value) => value ?? undefined),
});

export const mcpServerJsonSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  displayName: z.string().nullish().transform((value) => value ?? undefined),
  description: z.string().nullish().transform((value) => value ?? null),
  type: z.nativeEnum(MCPServerType),
  status: z.string().nullish().transform(parseServerStatus),
  command: z.string().nullish().transform((value) => value ?? null),
  args: z.array(z.string()).nullish().transform((value) => value ?? null),
  env: z.record(z.string()).nullish().transform((value) => value ?? null),
  url: z.string().nullish().transform((value) => value ?? null),
  availableTools: z.array(mcpToolSchema).default([]),
  availableResources: z.array(mcpResourceSchema).default([]),
  availablePrompts: z.array(mcpPromptSchema).default([]),
  createdAt: isoDateSchema,
  updatedAt: isoDateSchema,
  lastConnectedAt: optionalDate,
  metadata: jsonObjectSchema.default({}),
});

export type MCPServerJson = z.input<typeof mcpServerJsonSchema>;

/** The `{ "mcpServers": { ... } }` document accepted by the registry import */
export const mcpConfigurationSchema = z.object({
  mcpServers: z.record(
    z.union([
      z.object({
        command: z.string().min(1),
        args: z.array(z.string()).default([]),
        env: z.record(z.string()).default({}),
        description: z.string().optional(),
        displayName: z.string().optional(),
      }),
      z.object({
        url: z.string().min(1),
        type: z.literal(MCPServerType.SSE).optional(),
        description: z.string().optional(),
        displayName: z.string().optional(),
      }),
    ])
  ),
});

export type MCPConfiguration = z.infer<typeof mcpConfigurationSchema>;

// ============================================================================
// LAYOUT PREFERENCES
// ============================================================================

export const panelLayoutJsonSchema = z.object({
  leftWidth: z.number().default(250),
  rightWidth: z.number().default(300),
  leftCollapsed: z.boolean().default(false),
  rightCollapsed: z.boolean().default(false),
  minWidth: z.number().default(200),
  maxWidth: z.number().default(500),
});

export const windowSizeJsonSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

export const layoutPreferencesJsonSchema = z.object({
  currentTheme: z.string().nullish().transform(parseTheme),
  panelLayout: z.unknown().optional(),
  selectedAgentId: z.string().nullish().transform((value) => value ?? null),
  // An unusable size is dropped rather than failing the whole file
  windowSize: windowSizeJsonSchema
    .nullish()
    .catch(null)
    .transform((value) => value ?? undefined),
  version: z.number().default(1),
});

export type LayoutPreferencesJson = {
  currentTheme: string;
  panelLayout: z.input<typeof panelLayoutJsonSchema>;
  selectedAgentId: string | null;
  windowSize: z.input<typeof windowSizeJsonSchema> | null;
  version: number;
};

// ============================================================================
// DECODING
// ============================================================================

function toFieldErrors(error: z.ZodError): ValidationFieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Decode an unknown value, throwing ValidationError with one field error per
 * zod issue.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}
