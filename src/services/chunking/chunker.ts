/**
 * Annotation Chunk Planner
 *
 * Splits a document into contiguous chunks no longer than maxChunkSize,
 * pulling each cut back to the nearest sentence end or paragraph break
 * inside the boundary window so multi-token entities are not severed.
 *
 * @module services/chunking/chunker
 */

import type { ChunkRange } from '../../models/mention.js';

/** Delimiters a chunk may end on. Paragraph breaks must fit the window whole. */
export const BOUNDARY_DELIMITERS = ['.', '?', '!', '\n\n'] as const;

/**
 * Find a safe chunk end at or before searchEnd.
 *
 * Searches [max(searchEnd - window, floor), searchEnd) for the rightmost
 * delimiter. A hit at p ends the chunk at p + 1 (delimiter included);
 * no hit is a hard cut at searchEnd.
 *
 * @param floor - Start of the chunk being cut; the result is always > floor
 *   when a delimiter is found, so planning advances.
 *
 * @example
 * selectBoundary('One. Two three', 12, 10); // 4
 */
export function selectBoundary(
  text: string,
  searchEnd: number,
  window: number,
  floor: number = 0
): number {
  const lo = Math.max(searchEnd - window, floor, 0);
  if (lo >= searchEnd) {
    return searchEnd;
  }

  const region = text.slice(lo, searchEnd);
  let best = -1;
  for (const delimiter of BOUNDARY_DELIMITERS) {
    const pos = region.lastIndexOf(delimiter);
    if (pos > best) best = pos;
  }

  return best >= 0 ? lo + best + 1 : searchEnd;
}

/**
 * Partition text into chunk ranges in offset order.
 *
 * Each chunk starts where the previous one ended. The last chunk always
 * runs to the end of the text.
 */
export function planChunks(text: string, maxChunkSize: number, window: number): ChunkRange[] {
  if (text.length === 0) {
    return [];
  }

  const chunks: ChunkRange[] = [];
  let startOffset = 0;

  while (startOffset < text.length) {
    const tentativeEnd = startOffset + maxChunkSize;
    const endOffset =
      tentativeEnd >= text.length
        ? text.length
        : selectBoundary(text, tentativeEnd, window, startOffset);

    chunks.push({
      index: chunks.length,
      startOffset,
      endOffset,
      text: text.slice(startOffset, endOffset),
    });
    startOffset = endOffset;
  }

  return chunks;
}
