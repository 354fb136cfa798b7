/**
 * Offset reconciliation between chunk-local and document-global positions.
 *
 * @module services/entities/offsets
 */

import type { ChunkRange } from '../../models/mention.js';

export function toGlobal(offset: number, chunkStart: number): number {
  return offset + chunkStart;
}

export function toLocal(offset: number, chunkStart: number): number {
  return offset - chunkStart;
}

/**
 * A global start offset belongs to the chunk whose text contains it.
 * Each chain mention is therefore attempted in exactly one chunk.
 */
export function isInChunk(start: number, chunk: Pick<ChunkRange, 'startOffset' | 'text'>): boolean {
  return chunk.startOffset <= start && start < chunk.startOffset + chunk.text.length;
}

/** 0 <= start < end <= documentLength */
export function isWithinDocument(start: number, end: number, documentLength: number): boolean {
  return start >= 0 && start < end && end <= documentLength;
}
