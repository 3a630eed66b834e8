/**
 * @card-triage/shared
 * Shared utilities and types for the triage servers
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  getEnvOrThrow,
  getEnvInt,
  getEnvBool,
  type EnvLoaderOptions,
} from './env-loader.js';

// Logging
export { createLogger, type Logger } from './logger.js';

// Types
export {
  // Config types
  type TrelloConfig,
  type OllamaConfig,
  type ChromaConfig,
  // MCP types
  type MCPTextContent,
  type MCPResponse,
  type MCPTool,
  // Response helpers
  createTextResponse,
  createSuccessResponse,
} from './types.js';

// Error handling
export {
  TriageError,
  ValidationError,
  ApiError,
  ConfigurationError,
  NotFoundError,
  LlmInvocationError,
  ResultStoreError,
  MethodNotFoundError,
  withErrorHandling,
  toError,
  getErrorMessage,
  extractApiErrorDetails,
  createApiError,
} from './errors.js';
