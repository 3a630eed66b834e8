/**
 * Shared error taxonomy
 * Every failure that crosses a module boundary is one of these classes
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

/**
 * Base error class for triage operations
 */
export class TriageError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TriageError';
  }

  /**
   * Convert to MCP SDK error format
   */
  toMcpError(): McpError {
    return new McpError(ErrorCode.InternalError, this.message);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.InvalidParams, this.message);
  }
}

/**
 * Error for API communication failures
 */
export class ApiError extends TriageError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseData?: unknown,
    cause?: Error
  ) {
    super(message, 'API_ERROR', cause);
    this.name = 'ApiError';
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error for a lookup that matched nothing
 */
export class NotFoundError extends TriageError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.InvalidParams, this.message);
  }
}

/**
 * Error for a failed or timed out LLM round-trip
 */
export class LlmInvocationError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmInvocationError';
  }
}

/**
 * Error for result store reads/writes - the one failure that aborts an analysis
 */
export class ResultStoreError extends TriageError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_ERROR', cause);
    this.name = 'ResultStoreError';
  }
}

/**
 * Error for a tool name the server does not expose
 */
export class MethodNotFoundError extends TriageError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'METHOD_NOT_FOUND');
    this.name = 'MethodNotFoundError';
  }

  toMcpError(): McpError {
    return new McpError(ErrorCode.MethodNotFound, this.message);
  }
}

// ============================================
// Error Handling Utilities
// ============================================

/**
 * Wrap an async handler with error handling
 * Catches errors and converts them to appropriate MCP errors
 */
export async function withErrorHandling<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }

    if (error instanceof TriageError) {
      throw error.toMcpError();
    }

    throw new McpError(ErrorCode.InternalError, `Error: ${getErrorMessage(error)}`);
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

interface AxiosLikeError {
  response?: {
    status?: number;
    data?: unknown;
  };
}

function isAxiosLike(error: unknown): error is AxiosLikeError {
  return typeof error === 'object' && error !== null && 'response' in error;
}

function messageFromData(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  if (typeof data === 'object' && data !== null) {
    if ('message' in data && typeof data.message === 'string') {
      return data.message;
    }
    if ('error' in data && typeof data.error === 'string') {
      return data.error;
    }
  }
  return undefined;
}

/**
 * Extract API error details from axios-like error responses
 */
export function extractApiErrorDetails(error: unknown): {
  message: string;
  statusCode?: number;
  data?: unknown;
} {
  const baseMessage = getErrorMessage(error);

  if (isAxiosLike(error) && error.response) {
    const { status, data } = error.response;
    return {
      message: messageFromData(data) ?? baseMessage,
      statusCode: status,
      data,
    };
  }

  return { message: baseMessage };
}

/**
 * Create an API error from an axios-like error
 */
export function createApiError(error: unknown, context: string): ApiError {
  const details = extractApiErrorDetails(error);
  return new ApiError(
    `${context}: ${details.message}`,
    details.statusCode,
    details.data,
    error instanceof Error ? error : undefined
  );
}
