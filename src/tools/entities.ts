/**
 * Entity Extraction MCP Tools
 *
 * Tools: entity_extract, entity_chunk_plan
 *
 * Per-call options override the server configuration for that call only.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/entities
 */

import { z } from 'zod';
import {
  getAnnotationEngine,
  getConfig,
  successResult,
  toChunkPlanItem,
  type ChunkPlanResult,
  type EntityExtractResult,
} from '../server/index.js';
import { extractEntities } from '../services/entities/index.js';
import { planChunks } from '../services/chunking/index.js';
import { validateInput, EntityExtractInput, ChunkPlanInput } from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  readDocumentSource,
  type ToolResponse,
  type ToolDefinition,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle entity_extract - annotate a document and return its stitched mention list
 */
export async function handleEntityExtract(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(EntityExtractInput, params);
    const config = getConfig();
    const doc = readDocumentSource(input);

    console.error(
      `[ENTITY] entity_extract: ${doc.source === 'file' ? doc.file_path : 'inline text'} (${doc.text.length} chars)`
    );

    const result = await extractEntities(doc.text, getAnnotationEngine(), {
      maxChunkSize: input.max_chunk_size ?? config.maxChunkSize,
      boundaryWindow: input.boundary_window ?? config.boundaryWindow,
      coreference: input.coreference ?? config.coreference,
    });

    const data: EntityExtractResult = {
      source: doc.source,
      ...(doc.file_path ? { file_path: doc.file_path } : {}),
      mention_count: result.mentions.length,
      mentions: result.mentions,
      stats: result.stats,
      ...(input.include_chunks ? { chunks: result.chunks.map(toChunkPlanItem) } : {}),
    };
    return formatResponse(successResult(data));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle entity_chunk_plan - show where a document would be split, without annotating
 */
export async function handleChunkPlan(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ChunkPlanInput, params);
    const config = getConfig();
    const doc = readDocumentSource(input);

    const maxChunkSize = input.max_chunk_size ?? config.maxChunkSize;
    const boundaryWindow = input.boundary_window ?? config.boundaryWindow;
    const chunks = planChunks(doc.text, maxChunkSize, boundaryWindow);

    const data: ChunkPlanResult = {
      source: doc.source,
      ...(doc.file_path ? { file_path: doc.file_path } : {}),
      document_length: doc.text.length,
      max_chunk_size: maxChunkSize,
      boundary_window: boundaryWindow,
      chunk_count: chunks.length,
      chunks: chunks.map(toChunkPlanItem),
    };
    return formatResponse(successResult(data));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

const sourceSchema = {
  text: z.string().optional().describe('Document text (provide this or file_path)'),
  file_path: z.string().optional().describe('Path to a UTF-8 text file (provide this or text)'),
  max_chunk_size: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Maximum characters per annotation chunk (default: server config)'),
  boundary_window: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Characters searched backward for a sentence or paragraph break (default: server config)'),
};

/**
 * Entity tools collection for MCP server registration
 */
export const entityTools: Record<string, ToolDefinition> = {
  entity_extract: {
    description:
      'Extract named-entity mentions from a document. Long documents are split at sentence or paragraph breaks, ' +
      'annotated chunk by chunk, and coreference chains from a whole-document pass are labeled with their ' +
      'entity type. Returns mentions with document-level character offsets.',
    inputSchema: {
      ...sourceSchema,
      coreference: z
        .boolean()
        .optional()
        .describe('Run the whole-document coreference pass (default: server config)'),
      include_chunks: z.boolean().default(false).describe('Include the chunk ranges used'),
    },
    handler: handleEntityExtract,
  },
  entity_chunk_plan: {
    description: 'Preview the chunk ranges a document would be split into, without annotating it',
    inputSchema: sourceSchema,
    handler: handleChunkPlan,
  },
};
