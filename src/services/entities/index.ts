/**
 * Entity Reconciliation Module Exports
 *
 * @module services/entities
 */

export {
  extractEntities,
  extractMentions,
  type ExtractionResult,
  type ExtractionStats,
  type ExtractionPath,
} from './pipeline.js';
export {
  stitchChunkChains,
  resolveChainLabel,
  alignInChunk,
  cachedChainLabel,
  ownSpanLabel,
  representativeLabel,
  LABEL_STRATEGIES,
  type LabelStrategy,
  type LabelStrategyName,
  type LabelContext,
  type LabelResolution,
} from './stitcher.js';
export {
  createRunContext,
  emitMention,
  isProcessed,
  type ExtractionRunContext,
  type RunCounters,
  type MentionSource,
} from './run-context.js';
export { toGlobal, toLocal, isInChunk, isWithinDocument } from './offsets.js';
