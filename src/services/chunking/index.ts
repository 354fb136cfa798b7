/**
 * Chunking Service Module Exports
 *
 * Public API for annotation chunk planning.
 *
 * @module services/chunking
 */

export { selectBoundary, planChunks, BOUNDARY_DELIMITERS } from './chunker.js';

// Re-export model types for convenience
export type { ChunkRange } from '../../models/mention.js';
