/**
 * Gazetteer Annotation Engine
 *
 * Deterministic, in-process engine: word/punctuation tokenizer plus a
 * term → label table matched at token boundaries, longest term first,
 * case-sensitive, without overlaps. Reports no coreference chains.
 *
 * Used as the offline engine profile and as the base for test engines.
 *
 * @module services/annotation/gazetteer
 */

import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { safeValidateInput } from '../../utils/validation.js';
import { AnnotationError } from './errors.js';
import type { AnnotationEngine, EngineParse, EntitySpan, TokenSpan, WholeDocumentParse } from './types.js';

export const GAZETTEER_PROFILE = 'gazetteer';

/** Gazetteer file format: { "terms": { "Apple Inc.": "ORG", ... } } */
export const GazetteerFileSchema = z.object({
  terms: z.record(z.string().min(1), z.string().min(1)),
});

export type GazetteerTerms = Record<string, string>;

const TOKEN_PATTERN = /[\p{L}\p{N}]+|[^\s\p{L}\p{N}]/gu;

/**
 * Split text into word and single-character punctuation tokens
 */
export function tokenize(text: string): TokenSpan[] {
  const tokens: TokenSpan[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ start, end: start + match[0].length });
  }
  return tokens;
}

export class GazetteerAnnotationEngine implements AnnotationEngine {
  readonly profile: string = GAZETTEER_PROFILE;
  private readonly terms: Array<[string, string]>;

  constructor(terms: GazetteerTerms) {
    // Longest first so "Apple Inc." claims its span before "Apple"
    this.terms = Object.entries(terms).sort((a, b) => b[0].length - a[0].length);
  }

  /**
   * Load terms from a JSON gazetteer file
   *
   * @throws AnnotationError ENGINE_NOT_AVAILABLE if the file is missing or malformed
   */
  static fromFile(filePath: string): GazetteerAnnotationEngine {
    if (!existsSync(filePath)) {
      throw new AnnotationError(`Gazetteer file not found: ${filePath}`, 'ENGINE_NOT_AVAILABLE', {
        filePath,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new AnnotationError(
        `Gazetteer file is not valid JSON: ${filePath}`,
        'ENGINE_NOT_AVAILABLE',
        { filePath, cause: error instanceof Error ? error.message : String(error) }
      );
    }

    const parsed = safeValidateInput(GazetteerFileSchema, raw);
    if (!parsed.success) {
      throw new AnnotationError(
        `Gazetteer file has an invalid shape: ${filePath}`,
        'ENGINE_NOT_AVAILABLE',
        { filePath, issues: parsed.error.message }
      );
    }

    return new GazetteerAnnotationEngine(parsed.data.terms);
  }

  async annotateChunk(text: string): Promise<EngineParse> {
    return this.parse(text);
  }

  async annotateWholeDocument(text: string): Promise<WholeDocumentParse> {
    return { ...this.parse(text), chains: [] };
  }

  async close(): Promise<void> {
    // Nothing held open
  }

  protected parse(text: string): EngineParse {
    const tokens = tokenize(text);
    const tokenStarts = new Set(tokens.map((t) => t.start));
    const tokenEnds = new Set(tokens.map((t) => t.end));
    const claimed = new Uint8Array(text.length);
    const entities: EntitySpan[] = [];

    for (const [term, label] of this.terms) {
      let from = 0;
      while (from <= text.length - term.length) {
        const start = text.indexOf(term, from);
        if (start === -1) break;
        const end = start + term.length;

        if (tokenStarts.has(start) && tokenEnds.has(end) && !claimed.subarray(start, end).includes(1)) {
          claimed.fill(1, start, end);
          entities.push({ text: term, label, start, end });
          from = end;
        } else {
          from = start + 1;
        }
      }
    }

    entities.sort((a, b) => a.start - b.start);
    return { tokens, entities };
  }
}
