/**
 * Annotation Engine Contract
 *
 * The engine is a capability, not a class hierarchy: any object with these
 * operations can drive the pipeline (spaCy bridge, gazetteer, test doubles).
 * Offsets in everything an engine returns are local to the text it was given.
 *
 * @module services/annotation/types
 */

import type { CoreferenceChain } from '../../models/mention.js';

/** A token's character range */
export interface TokenSpan {
  start: number;
  end: number;
}

/** An entity the engine recognized */
export interface EntitySpan {
  text: string;
  label: string;
  start: number;
  end: number;
}

/** Engine output for one text: tokens and entities, in document order */
export interface EngineParse {
  tokens: TokenSpan[];
  entities: EntitySpan[];
}

/** Engine output for a whole-document call, with coreference chains */
export interface WholeDocumentParse extends EngineParse {
  chains: CoreferenceChain[];
}

export interface AnnotationEngine {
  /** Profile identifier the engine was built for (e.g. a spaCy model name) */
  readonly profile: string;

  /** Tokens and entities for one chunk */
  annotateChunk(text: string): Promise<EngineParse>;

  /** Tokens, entities and coreference chains for a full document */
  annotateWholeDocument(text: string): Promise<WholeDocumentParse>;

  /** Release engine resources */
  close(): Promise<void>;
}
