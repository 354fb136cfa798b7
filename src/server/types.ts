/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { ErrorCategory } from './errors.js';
import type { AnnotationEngine } from '../services/annotation/types.js';
import type { ChunkRange, Mention } from '../models/mention.js';
import type { ExtractionStats } from '../services/entities/pipeline.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error structure for failed tool operations
 */
export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Failed tool result
 */
export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

/**
 * Union type for all tool results
 */
export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

/**
 * Helper to create failure result
 */
export function failureResult(
  category: ErrorCategory,
  message: string,
  details?: Record<string, unknown>
): ToolResultFailure {
  return {
    success: false,
    error: { category, message, details },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Maximum characters per annotation chunk (default: 100000) */
  maxChunkSize: number;

  /** Characters searched backward for a sentence/paragraph break (default: 200) */
  boundaryWindow: number;

  /** "gazetteer" or a spaCy model name (default: en_core_web_trf) */
  engineProfile: string;

  /** Run the whole-document coreference pass */
  coreference: boolean;

  /** Python interpreter for the spaCy worker */
  pythonPath: string;

  /** Kill the worker after this many milliseconds */
  workerTimeoutMs: number;

  /** Term file for the gazetteer profile */
  gazetteerPath: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;

  /** Engine built from the current configuration, created on first use */
  engine: AnnotationEngine | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chunk range as reported by the tools (text omitted)
 */
export interface ChunkPlanItem {
  index: number;
  start_offset: number;
  end_offset: number;
  length: number;
}

/**
 * Result of entity_extract
 */
export interface EntityExtractResult {
  source: 'text' | 'file';
  file_path?: string;
  mention_count: number;
  mentions: Mention[];
  stats: ExtractionStats;
  chunks?: ChunkPlanItem[];
}

/**
 * Result of entity_chunk_plan
 */
export interface ChunkPlanResult {
  source: 'text' | 'file';
  file_path?: string;
  document_length: number;
  max_chunk_size: number;
  boundary_window: number;
  chunk_count: number;
  chunks: ChunkPlanItem[];
}

/**
 * Drop the chunk text for reporting
 */
export function toChunkPlanItem(chunk: ChunkRange): ChunkPlanItem {
  return {
    index: chunk.index,
    start_offset: chunk.startOffset,
    end_offset: chunk.endOffset,
    length: chunk.endOffset - chunk.startOffset,
  };
}
