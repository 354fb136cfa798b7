/**
 * Per-document run state and the deduplicating merge.
 *
 * A context is created for one document and discarded with it. Nothing here
 * is shared between runs, so documents can be processed concurrently.
 *
 * @module services/entities/run-context
 */

import { mentionKey, type Mention } from '../../models/mention.js';

export interface RunCounters {
  chainMentions: number;
  entityMentions: number;
  duplicatesSkipped: number;
  alignmentMisses: number;
}

export interface ExtractionRunContext {
  /** Chain id -> label, written once per chain */
  readonly chainLabels: Map<number, string>;
  /** (start, end) keys already emitted; only grows */
  readonly processed: Set<string>;
  /** Emitted mentions in order of first emission */
  readonly mentions: Mention[];
  readonly counters: RunCounters;
}

export type MentionSource = 'chain' | 'entity';

export function createRunContext(): ExtractionRunContext {
  return {
    chainLabels: new Map(),
    processed: new Set(),
    mentions: [],
    counters: { chainMentions: 0, entityMentions: 0, duplicatesSkipped: 0, alignmentMisses: 0 },
  };
}

export function isProcessed(run: ExtractionRunContext, start: number, end: number): boolean {
  return run.processed.has(mentionKey(start, end));
}

/**
 * Append a mention unless its offset pair was already emitted.
 * First write wins; a later duplicate is dropped silently.
 *
 * @returns true when the mention was appended
 */
export function emitMention(run: ExtractionRunContext, mention: Mention, source: MentionSource): boolean {
  const key = mentionKey(mention.start, mention.end);
  if (run.processed.has(key)) {
    run.counters.duplicatesSkipped++;
    return false;
  }

  run.processed.add(key);
  run.mentions.push(mention);
  if (source === 'chain') run.counters.chainMentions++;
  else run.counters.entityMentions++;
  return true;
}
