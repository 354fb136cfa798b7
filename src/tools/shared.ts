/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { MCPError, formatErrorResponse, pathIsDirectoryError, pathNotFoundError } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response
 */
export function formatResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return formatResponse(formatErrorResponse(mcpError));
}

/** Document text plus where it came from */
export interface DocumentSource {
  source: 'text' | 'file';
  file_path?: string;
  text: string;
}

/**
 * Resolve the document for tools that take exactly one of text / file_path
 *
 * @throws MCPError PATH_NOT_FOUND or PATH_IS_DIRECTORY
 */
export function readDocumentSource(input: { text?: string; file_path?: string }): DocumentSource {
  if (input.text !== undefined) {
    return { source: 'text', text: input.text };
  }

  const filePath = resolve(input.file_path ?? '');
  if (!existsSync(filePath)) {
    throw pathNotFoundError(filePath);
  }
  if (statSync(filePath).isDirectory()) {
    throw pathIsDirectoryError(filePath);
  }
  return { source: 'file', file_path: filePath, text: readFileSync(filePath, 'utf-8') };
}
