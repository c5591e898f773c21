/**
 * VibeCoder Error Types
 *
 * Error classes thrown by the models and services, plus the standardized
 * error response envelope rendered by the REST API.
 */

import { v4 as uuid } from 'uuid';
import type { UUID, Timestamp } from '../models/types.js';

// ============================================================================
// ERROR CODES
// ============================================================================

export enum ErrorCode {
  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  AGENT_NOT_FOUND = 'AGENT_NOT_FOUND',
  SERVER_NOT_FOUND = 'SERVER_NOT_FOUND',
  CONTENT_NOT_FOUND = 'CONTENT_NOT_FOUND',
  ENDPOINT_NOT_FOUND = 'ENDPOINT_NOT_FOUND',

  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_CONTENT = 'INVALID_CONTENT',
  INVALID_REQUEST = 'INVALID_REQUEST',
  SERVER_VALIDATION_ERROR = 'SERVER_VALIDATION_ERROR',

  // Conflict errors (409)
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  AGENT_ALREADY_EXISTS = 'AGENT_ALREADY_EXISTS',
  SERVER_ALREADY_EXISTS = 'SERVER_ALREADY_EXISTS',
  DUPLICATE_CONTENT_ITEM = 'DUPLICATE_CONTENT_ITEM',

  // Collaborator errors (502)
  RUNTIME_ERROR = 'RUNTIME_ERROR',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',

  // Server errors (500)
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ============================================================================
// ERROR RESPONSE STRUCTURE
// ============================================================================

export interface ErrorResponse {
  /** Whether the request succeeded (always false for errors) */
  success: false;
  /** Error details */
  error: ErrorDetail;
  /** Request metadata */
  metadata: {
    requestId: UUID;
    timestamp: Timestamp;
  };
}

export interface ErrorDetail {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** HTTP status code */
  status: number;
  /** Additional error details */
  details?: ErrorDetails;
  /** Whether the client should retry */
  retryable: boolean;
}

export type ErrorDetails =
  | ValidationErrorDetails
  | NotFoundErrorDetails
  | ConflictErrorDetails
  | PersistenceErrorDetails;

// ============================================================================
// SPECIFIC ERROR DETAILS
// ============================================================================

export type ResourceType = 'agent' | 'server' | 'inbox_item' | 'todo_item' | 'endpoint';

export interface ValidationErrorDetails {
  type: 'validation';
  /** List of validation failures */
  errors: ValidationFieldError[];
}

export interface ValidationFieldError {
  /** Field path (e.g., "temperature" or "panelLayout.leftWidth") */
  field: string;
  /** Validation error message */
  message: string;
  /** Validation error code */
  code: string;
  /** The invalid value (if safe to expose) */
  value?: unknown;
}

export interface NotFoundErrorDetails {
  type: 'not_found';
  /** The type of resource that wasn't found */
  resourceType: ResourceType;
  /** The identifier that was searched for */
  identifier: string;
  /** The type of identifier (id, name, etc.) */
  identifierType: 'id' | 'name';
}

export interface ConflictErrorDetails {
  type: 'conflict';
  /** The conflicting resource */
  resourceType: ResourceType;
  /** The existing resource's ID */
  existingResourceId?: string;
  /** Description of the conflict */
  description: string;
}

export type PersistenceOperation = 'save' | 'delete' | 'load' | 'list';

export interface PersistenceErrorDetails {
  type: 'persistence';
  operation: PersistenceOperation;
  path: string;
}

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class VibeCoderError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details?: ErrorDetails;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    status: number,
    details?: ErrorDetails,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'VibeCoderError';
    this.code = code;
    this.status = status;
    this.details = details;
    this.retryable = options.retryable ?? false;
  }
}

function describeFieldErrors(errors: ValidationFieldError[]): string {
  return `Validation failed: ${errors.map((e) => e.message).join(', ')}`;
}

/**
 * One or more field constraints were violated. Every violation found is
 * listed, not just the first.
 */
export class ValidationError extends VibeCoderError {
  readonly errors: ValidationFieldError[];

  constructor(errors: ValidationFieldError[], code: ErrorCode = ErrorCode.VALIDATION_ERROR) {
    super(describeFieldErrors(errors), code, 400, { type: 'validation', errors });
    this.name = 'ValidationError';
    this.errors = errors;
  }

  static single(field: string, message: string, code: string, value?: unknown): ValidationError {
    return new ValidationError([{ field, message, code, value }]);
  }
}

/** Content failed validation after sanitization */
export class InvalidContentError extends ValidationError {
  constructor(errors: ValidationFieldError[]) {
    super(errors, ErrorCode.INVALID_CONTENT);
    this.name = 'InvalidContentError';
  }
}

/** Raised by MCPServerModel.validate() with every violation of the server configuration */
export class ServerValidationError extends ValidationError {
  constructor(errors: ValidationFieldError[]) {
    super(errors, ErrorCode.SERVER_VALIDATION_ERROR);
    this.name = 'ServerValidationError';
  }
}

const notFoundCodes: Partial<Record<ResourceType, ErrorCode>> = {
  agent: ErrorCode.AGENT_NOT_FOUND,
  server: ErrorCode.SERVER_NOT_FOUND,
  inbox_item: ErrorCode.CONTENT_NOT_FOUND,
  todo_item: ErrorCode.CONTENT_NOT_FOUND,
  endpoint: ErrorCode.ENDPOINT_NOT_FOUND,
};

export class NotFoundError extends VibeCoderError {
  readonly resourceType: ResourceType;
  readonly identifier: string;

  constructor(resourceType: ResourceType, identifier: string, identifierType: 'id' | 'name' = 'id') {
    super(
      `${resourceType} not found: ${identifier}`,
      notFoundCodes[resourceType] ?? ErrorCode.NOT_FOUND,
      404,
      { type: 'not_found', resourceType, identifier, identifierType }
    );
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.identifier = identifier;
  }
}

const conflictCodes: Partial<Record<ResourceType, ErrorCode>> = {
  agent: ErrorCode.AGENT_ALREADY_EXISTS,
  server: ErrorCode.SERVER_ALREADY_EXISTS,
  inbox_item: ErrorCode.DUPLICATE_CONTENT_ITEM,
  todo_item: ErrorCode.DUPLICATE_CONTENT_ITEM,
};

export class ConflictError extends VibeCoderError {
  readonly resourceType: ResourceType;

  constructor(resourceType: ResourceType, description: string, existingResourceId?: string) {
    super(description, conflictCodes[resourceType] ?? ErrorCode.ALREADY_EXISTS, 409, {
      type: 'conflict',
      resourceType,
      existingResourceId,
      description,
    });
    this.name = 'ConflictError';
    this.resourceType = resourceType;
  }
}

/** A filesystem operation failed; the original error is kept as `cause` */
export class PersistenceError extends VibeCoderError {
  readonly operation: PersistenceOperation;
  readonly path: string;

  constructor(operation: PersistenceOperation, path: string, cause?: unknown) {
    super(
      `Failed to ${operation} ${path}${cause === undefined ? '' : `: ${getErrorMessage(cause)}`}`,
      ErrorCode.PERSISTENCE_ERROR,
      500,
      { type: 'persistence', operation, path },
      { retryable: true, cause }
    );
    this.name = 'PersistenceError';
    this.operation = operation;
    this.path = path;
  }
}

/** The conversation runtime failed while handling a message for an agent */
export class RuntimeDelegationError extends VibeCoderError {
  readonly agentId: string;

  constructor(agentId: string, cause: unknown) {
    super(`Runtime failed for agent ${agentId}: ${getErrorMessage(cause)}`, ErrorCode.RUNTIME_ERROR, 502, undefined, {
      retryable: true,
      cause,
    });
    this.name = 'RuntimeDelegationError';
    this.agentId = agentId;
  }
}

/** The MCP transport failed to reach a server */
export class TransportError extends VibeCoderError {
  readonly serverName: string;

  constructor(serverName: string, cause: unknown) {
    super(`Transport failed for server ${serverName}: ${getErrorMessage(cause)}`, ErrorCode.TRANSPORT_ERROR, 502, undefined, {
      retryable: true,
      cause,
    });
    this.name = 'TransportError';
    this.serverName = serverName;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============================================================================
// ERROR FACTORY FUNCTIONS
// ============================================================================

function responseMetadata(): ErrorResponse['metadata'] {
  return {
    requestId: uuid(),
    timestamp: new Date().toISOString(),
  };
}

export function createValidationError(errors: ValidationFieldError[]): ErrorResponse {
  return {
    success: false,
    error: {
      code: ErrorCode.VALIDATION_ERROR,
      message: describeFieldErrors(errors),
      status: 400,
      details: { type: 'validation', errors },
      retryable: false,
    },
    metadata: responseMetadata(),
  };
}

export function createNotFoundError(
  resourceType: ResourceType,
  identifier: string,
  identifierType: 'id' | 'name' = 'id'
): ErrorResponse {
  return toErrorResponse(new NotFoundError(resourceType, identifier, identifierType));
}

export function createConflictError(
  resourceType: ResourceType,
  description: string,
  existingResourceId?: string
): ErrorResponse {
  return toErrorResponse(new ConflictError(resourceType, description, existingResourceId));
}

export function createInternalError(message: string = 'An internal error occurred'): ErrorResponse {
  return {
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message,
      status: 500,
      retryable: true,
    },
    metadata: responseMetadata(),
  };
}

/**
 * Render any thrown value as an error response. Library errors keep their
 * code and status; anything else becomes a 500 carrying the original message.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof VibeCoderError) {
    return {
      success: false,
      error: {
        code: error.code,
        message: error.message,
        status: error.status,
        details: error.details,
        retryable: error.retryable,
      },
      metadata: responseMetadata(),
    };
  }
  return createInternalError(getErrorMessage(error));
}
