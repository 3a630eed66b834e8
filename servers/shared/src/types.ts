/**
 * Shared type definitions
 * Contains API configuration shapes and MCP response helpers
 */

// ============================================
// API Configuration Types
// ============================================

/**
 * Trello REST API configuration
 */
export interface TrelloConfig {
  baseUrl: string;
  apiKey: string;
  token: string;
}

/**
 * Local Ollama server configuration
 */
export interface OllamaConfig {
  baseUrl: string;
  model: string;
  embedModel: string;
}

/**
 * Chroma vector store configuration
 */
export interface ChromaConfig {
  baseUrl: string;
  documentsCollection: string;
  historyCollection: string;
}

// ============================================
// MCP Response Types
// ============================================

/**
 * Standard MCP text content item
 */
export type MCPTextContent = {
  type: 'text';
  text: string;
};

/**
 * Standard MCP response structure
 */
export type MCPResponse = {
  content: MCPTextContent[];
};

/**
 * MCP tool definition structure
 */
export type MCPTool = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

// ============================================
// Common Response Formatting Utilities
// ============================================

/**
 * Create a standard MCP text response
 */
export function createTextResponse(text: string): MCPResponse {
  return {
    content: [{ type: 'text', text }]
  };
}

/**
 * Create a success response with optional content
 */
export function createSuccessResponse(message: string, content?: string): MCPResponse {
  const text = content ? `${message}:\n\n${content}` : message;
  return createTextResponse(text);
}
