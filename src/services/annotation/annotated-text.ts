/**
 * AnnotatedText - a text plus one engine parse of it
 *
 * Provides expand-mode alignment: a requested character range is widened to
 * the boundaries of every token it touches. A range that touches no token,
 * is empty, or falls outside the text has no alignment (null), which callers
 * treat as a silent miss.
 *
 * @module services/annotation/annotated-text
 */

import type { EngineParse, EntitySpan, TokenSpan } from './types.js';

/** A token-aligned span of an AnnotatedText */
export interface AlignedSpan {
  start: number;
  end: number;
  text: string;
  /** Entities lying completely inside the span, in document order */
  ents: EntitySpan[];
}

/** Index of the first item whose key is >= target (items sorted by key) */
function lowerBound<T>(items: T[], target: number, key: (item: T) => number): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (key(items[mid]) < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export class AnnotatedText {
  readonly text: string;
  private readonly tokens: TokenSpan[];
  private readonly ents: EntitySpan[];

  constructor(text: string, parse: EngineParse) {
    this.text = text;
    this.tokens = [...parse.tokens].sort((a, b) => a.start - b.start);
    this.ents = [...parse.entities].sort((a, b) => a.start - b.start || a.end - b.end);
  }

  /** Entities of the whole text, in document order */
  get entities(): readonly EntitySpan[] {
    return this.ents;
  }

  /**
   * Align [start, end) to token boundaries (expand mode)
   *
   * @returns The aligned span, or null when no token overlaps the range
   */
  charSpan(start: number, end: number): AlignedSpan | null {
    if (start < 0 || end > this.text.length || start >= end) {
      return null;
    }

    // First token ending after start is the first one that can overlap
    const first = lowerBound(this.tokens, start + 1, (t) => t.end);
    if (first >= this.tokens.length || this.tokens[first].start >= end) {
      return null;
    }

    let last = first;
    while (last + 1 < this.tokens.length && this.tokens[last + 1].start < end) {
      last++;
    }

    const spanStart = this.tokens[first].start;
    const spanEnd = this.tokens[last].end;

    const ents: EntitySpan[] = [];
    for (let i = lowerBound(this.ents, spanStart, (e) => e.start); i < this.ents.length; i++) {
      const ent = this.ents[i];
      if (ent.start >= spanEnd) break;
      if (ent.end <= spanEnd) ents.push(ent);
    }

    return {
      start: spanStart,
      end: spanEnd,
      text: this.text.slice(spanStart, spanEnd),
      ents,
    };
  }
}
