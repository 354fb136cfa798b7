/**
 * Test engines for the extraction pipeline
 *
 * Built on the gazetteer engine so tokens and entities are real; chains and
 * failures are scripted per test.
 */

import { GazetteerAnnotationEngine, type GazetteerTerms } from '../../../src/services/annotation/gazetteer.js';
import { AnnotationError } from '../../../src/services/annotation/errors.js';
import type { EngineParse, WholeDocumentParse } from '../../../src/services/annotation/types.js';
import type { CoreferenceChain } from '../../../src/models/mention.js';

export const TEST_TERMS: GazetteerTerms = {
  'Apple Inc.': 'ORG',
  Apple: 'ORG',
  Google: 'ORG',
  NASA: 'ORG',
  'John Smith': 'PERSON',
  Boston: 'GPE',
  American: 'NORP',
  '1958': 'DATE',
};

/** Gazetteer engine that returns fixed coreference chains and counts its calls */
export class ScriptedCorefEngine extends GazetteerAnnotationEngine {
  readonly calls = { chunk: 0, wholeDocument: 0 };
  readonly chunkTexts: string[] = [];

  constructor(
    private readonly chains: CoreferenceChain[],
    terms: GazetteerTerms = TEST_TERMS
  ) {
    super(terms);
  }

  async annotateChunk(text: string): Promise<EngineParse> {
    this.calls.chunk++;
    this.chunkTexts.push(text);
    return this.parse(text);
  }

  async annotateWholeDocument(text: string): Promise<WholeDocumentParse> {
    this.calls.wholeDocument++;
    return { ...this.parse(text), chains: this.chains };
  }
}

/** Engine whose chunk call number `failOnCall` (1-based) rejects */
export class FailingChunkEngine extends ScriptedCorefEngine {
  constructor(
    private readonly failOnCall: number,
    private readonly failure: unknown = new AnnotationError('model crashed', 'ANNOTATION_FAILED')
  ) {
    super([]);
  }

  async annotateChunk(text: string): Promise<EngineParse> {
    if (this.calls.chunk + 1 === this.failOnCall) {
      this.calls.chunk++;
      throw this.failure;
    }
    return super.annotateChunk(text);
  }
}

/** Chain mention helper: offsets of `needle`'s nth occurrence in `text` */
export function mentionOf(text: string, needle: string, occurrence = 0): { start: number; end: number; text: string } {
  let start = -1;
  for (let i = 0; i <= occurrence; i++) {
    start = text.indexOf(needle, start + 1);
    if (start === -1) {
      throw new Error(`"${needle}" occurrence ${occurrence} not found`);
    }
  }
  return { start, end: start + needle.length, text: needle };
}
