/**
 * Base Handler for Common MCP Tool Operations
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  MCPResponse,
  NotFoundError,
  ValidationError,
  createTextResponse,
  getErrorMessage,
} from '@card-triage/shared';

export type ToolArguments = Record<string, unknown>;

export abstract class BaseHandler {
  /**
   * Read a required, non-empty string argument
   */
  protected requireString(args: ToolArguments, name: string): string {
    const value = args[name];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new McpError(ErrorCode.InvalidParams, `${name} is required`);
    }
    return value.trim();
  }

  /**
   * Optional string argument; an empty string means "clear" and reads as null
   */
  protected clearableString(args: ToolArguments, name: string): string | null | undefined {
    const value = args[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw new McpError(ErrorCode.InvalidParams, `${name} must be a string`);
    }
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }

  protected optionalBoolean(args: ToolArguments, name: string): boolean | undefined {
    const value = args[name];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
      throw new McpError(ErrorCode.InvalidParams, `${name} must be a boolean`);
    }
    return value;
  }

  /**
   * Handle errors consistently
   */
  protected handleError(error: unknown, operation: string): never {
    if (error instanceof McpError) {
      throw error;
    }

    const code =
      error instanceof ValidationError || error instanceof NotFoundError
        ? ErrorCode.InvalidParams
        : ErrorCode.InternalError;
    throw new McpError(code, `Failed to ${operation}: ${getErrorMessage(error)}`);
  }

  protected formatResponse(text: string): MCPResponse {
    return createTextResponse(text);
  }
}
