/**
 * Mention, Chain and Chunk Models
 *
 * All offsets are half-open JavaScript string indices (UTF-16 code units).
 * Mentions and chains carry document-global offsets; engine output carries
 * offsets local to the text the engine was given.
 *
 * @module models/mention
 */

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Label for a coreference mention whose entity type could not be determined */
export const CORE_LABEL = 'CORE';

/** Default engine profile (spaCy transformer pipeline) */
export const DEFAULT_ENGINE_PROFILE = 'en_core_web_trf';

// ═══════════════════════════════════════════════════════════════════════════════
// MENTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One occurrence of a named entity, document-global.
 * Identified by its (start, end) pair.
 */
export interface Mention {
  text: string;
  label: string;
  start: number;
  end: number;
}

/** Tuple form of a mention: (text, label, start, end) */
export type MentionTuple = [text: string, label: string, start: number, end: number];

export function toMentionTuple(mention: Mention): MentionTuple {
  return [mention.text, mention.label, mention.start, mention.end];
}

/** Identity key of a mention's offset pair */
export function mentionKey(start: number, end: number): string {
  return `${start}:${end}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COREFERENCE CHAINS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChainMention {
  start: number;
  end: number;
  text: string;
}

/**
 * Mentions the engine believes refer to the same entity.
 * Read-only after the whole-document pass.
 */
export interface CoreferenceChain {
  id: number;
  mentions: ChainMention[];
  /** Index into mentions of the representative (label source of last resort) */
  representativeIndex: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKS
// ═══════════════════════════════════════════════════════════════════════════════

/** A contiguous slice of the document submitted to the engine in one call */
export interface ChunkRange {
  index: number;
  startOffset: number;
  endOffset: number;
  text: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractionOptions {
  /** Maximum characters per chunk; documents at or below this run as one chunk */
  maxChunkSize: number;
  /** Characters searched backward from a tentative chunk end for a safe cut */
  boundaryWindow: number;
  /** Run the whole-document coreference pass (false = plain entity extraction) */
  coreference: boolean;
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  maxChunkSize: 100_000,
  boundaryWindow: 200,
  coreference: true,
};
