/**
 * Coreference Chain Stitcher
 *
 * Chains come from one whole-document pass; their mentions are labeled
 * chunk by chunk against each chunk's own parse. A chain's label is cached
 * the first time any chunk yields real evidence for it, and every later
 * mention of the chain reuses it.
 *
 * Label resolution is an ordered strategy list, first match wins:
 *   1. cachedChainLabel     - label already cached for the chain
 *   2. ownSpanLabel         - entity inside the mention's own aligned span
 *   3. representativeLabel  - entity inside the representative's span, when
 *                             the representative starts in this chunk
 *   fallback: CORE, never cached, so a later chunk can still resolve the chain
 *
 * @module services/entities/stitcher
 */

import { CORE_LABEL, type ChunkRange, type CoreferenceChain } from '../../models/mention.js';
import type { AlignedSpan, AnnotatedText } from '../annotation/annotated-text.js';
import { isInChunk, isWithinDocument, toLocal } from './offsets.js';
import { emitMention, isProcessed, type ExtractionRunContext } from './run-context.js';

/**
 * Align a global range against a chunk's parse. A mention that starts in the
 * chunk but runs past its end is aligned on the part inside the chunk.
 */
export function alignInChunk(
  parse: AnnotatedText,
  chunk: ChunkRange,
  start: number,
  end: number
): AlignedSpan | null {
  const localEnd = Math.min(toLocal(end, chunk.startOffset), chunk.text.length);
  return parse.charSpan(toLocal(start, chunk.startOffset), localEnd);
}

// ═══════════════════════════════════════════════════════════════════════════════
// LABEL STRATEGIES
// ═══════════════════════════════════════════════════════════════════════════════

export type LabelStrategyName = 'cachedChainLabel' | 'ownSpanLabel' | 'representativeLabel' | 'fallback';

/** Everything a strategy may look at for one chain mention */
export interface LabelContext {
  chain: CoreferenceChain;
  /** The mention's own span aligned against the current chunk's parse */
  ownSpan: AlignedSpan;
  chunk: ChunkRange;
  parse: AnnotatedText;
  documentLength: number;
  chainLabels: ReadonlyMap<number, string>;
}

export interface LabelResolution {
  label: string;
  /** Whether the label is cached for the chain */
  cache: boolean;
  strategy: LabelStrategyName;
}

export interface LabelStrategy {
  name: LabelStrategyName;
  resolve(ctx: LabelContext): LabelResolution | null;
}

export const cachedChainLabel: LabelStrategy = {
  name: 'cachedChainLabel',
  resolve(ctx) {
    const label = ctx.chainLabels.get(ctx.chain.id);
    return label === undefined ? null : { label, cache: false, strategy: 'cachedChainLabel' };
  },
};

export const ownSpanLabel: LabelStrategy = {
  name: 'ownSpanLabel',
  resolve(ctx) {
    const ent = ctx.ownSpan.ents[0];
    return ent ? { label: ent.label, cache: true, strategy: 'ownSpanLabel' } : null;
  },
};

export const representativeLabel: LabelStrategy = {
  name: 'representativeLabel',
  resolve(ctx) {
    const representative = ctx.chain.mentions[ctx.chain.representativeIndex];
    if (
      !representative ||
      !isWithinDocument(representative.start, representative.end, ctx.documentLength) ||
      !isInChunk(representative.start, ctx.chunk)
    ) {
      return null;
    }

    const span = alignInChunk(ctx.parse, ctx.chunk, representative.start, representative.end);
    const ent = span?.ents[0];
    return ent ? { label: ent.label, cache: true, strategy: 'representativeLabel' } : null;
  },
};

export const LABEL_STRATEGIES: readonly LabelStrategy[] = [
  cachedChainLabel,
  ownSpanLabel,
  representativeLabel,
];

/**
 * Resolve a chain mention's label and cache it for the chain when the
 * winning strategy found real evidence.
 */
export function resolveChainLabel(
  ctx: LabelContext,
  chainLabels: Map<number, string>,
  strategies: readonly LabelStrategy[] = LABEL_STRATEGIES
): LabelResolution {
  for (const strategy of strategies) {
    const resolution = strategy.resolve(ctx);
    if (resolution) {
      if (resolution.cache && !chainLabels.has(ctx.chain.id)) {
        chainLabels.set(ctx.chain.id, resolution.label);
      }
      return resolution;
    }
  }
  return { label: CORE_LABEL, cache: false, strategy: 'fallback' };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNK STITCHING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Emit every chain mention that starts in this chunk, labeled.
 * Must run before the chunk's plain entities so chain entries win duplicates.
 */
export function stitchChunkChains(
  run: ExtractionRunContext,
  chains: readonly CoreferenceChain[],
  chunk: ChunkRange,
  parse: AnnotatedText,
  documentLength: number,
  strategies: readonly LabelStrategy[] = LABEL_STRATEGIES
): void {
  for (const chain of chains) {
    for (const mention of chain.mentions) {
      if (!isInChunk(mention.start, chunk)) continue;

      if (!isWithinDocument(mention.start, mention.end, documentLength)) {
        run.counters.alignmentMisses++;
        continue;
      }

      const ownSpan = alignInChunk(parse, chunk, mention.start, mention.end);
      if (!ownSpan) {
        run.counters.alignmentMisses++;
        continue;
      }

      if (isProcessed(run, mention.start, mention.end)) {
        run.counters.duplicatesSkipped++;
        continue;
      }

      const { label } = resolveChainLabel(
        { chain, ownSpan, chunk, parse, documentLength, chainLabels: run.chainLabels },
        run.chainLabels,
        strategies
      );

      emitMention(run, { text: mention.text, label, start: mention.start, end: mention.end }, 'chain');
    }
  }
}
