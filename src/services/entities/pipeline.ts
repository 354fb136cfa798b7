/**
 * Entity Extraction Pipeline
 *
 * Drives one document through the engine:
 *
 *   Init -> WholeDocumentCoref -> SingleChunk | ChunkIterate(0..n) -> Done
 *
 * The whole-document pass runs once and supplies the coreference chains.
 * A document that fits in one chunk reuses that parse; a longer one is
 * planned into chunks that are annotated strictly in offset order, because
 * chain labels cached in chunk i are read by chunk i+1.
 *
 * Any engine failure aborts the document. There is no partial result.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/entities/pipeline
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  type ChunkRange,
  type CoreferenceChain,
  type ExtractionOptions,
  type Mention,
} from '../../models/mention.js';
import { planChunks } from '../chunking/chunker.js';
import { AnnotatedText } from '../annotation/annotated-text.js';
import { AnnotationError } from '../annotation/errors.js';
import type { AnnotationEngine, EngineParse } from '../annotation/types.js';
import { ExtractionOptionsSchema, validateInput } from '../../utils/validation.js';
import { toGlobal } from './offsets.js';
import { createRunContext, emitMention, type ExtractionRunContext, type RunCounters } from './run-context.js';
import { stitchChunkChains } from './stitcher.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ExtractionPath = 'empty' | 'single' | 'chunked';

export interface ExtractionStats extends RunCounters {
  /** Identifies this run in log lines */
  runId: string;
  path: ExtractionPath;
  profile: string;
  documentLength: number;
  chunkCount: number;
  chainCount: number;
  elapsedMs: number;
}

export interface ExtractionResult {
  /** Mentions in order of first emission (not re-sorted) */
  mentions: Mention[];
  chunks: ChunkRange[];
  stats: ExtractionStats;
}

type AnnotationPhase = 'whole_document' | 'chunk';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run one engine call; a failure becomes an AnnotationError naming the phase
 */
async function annotatePhase<T>(
  phase: AnnotationPhase,
  chunkIndex: number | null,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    const where = chunkIndex === null ? phase : `${phase} ${chunkIndex}`;
    console.error(
      `[ENTITY] Annotation failed in ${where}, aborting document: ${error instanceof Error ? error.message : String(error)}`
    );

    if (error instanceof AnnotationError) {
      throw new AnnotationError(error.message, error.code, { ...error.details, phase, chunkIndex });
    }
    throw new AnnotationError(
      `Annotation engine failed: ${error instanceof Error ? error.message : String(error)}`,
      'ANNOTATION_FAILED',
      {
        phase,
        chunkIndex,
        originalName: error instanceof Error ? error.name : typeof error,
      }
    );
  }
}

/**
 * Fold one chunk into the run: chain mentions first, then plain entities
 */
function processChunk(
  run: ExtractionRunContext,
  chunk: ChunkRange,
  parse: EngineParse,
  chains: readonly CoreferenceChain[],
  documentLength: number
): void {
  const annotated = new AnnotatedText(chunk.text, parse);

  if (chains.length > 0) {
    stitchChunkChains(run, chains, chunk, annotated, documentLength);
  }

  for (const ent of annotated.entities) {
    emitMention(
      run,
      {
        text: ent.text,
        label: ent.label,
        start: toGlobal(ent.start, chunk.startOffset),
        end: toGlobal(ent.end, chunk.startOffset),
      },
      'entity'
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extract a de-duplicated, coreference-stitched mention list from a document
 *
 * @throws ValidationError on invalid options
 * @throws AnnotationError when any engine call fails
 */
export async function extractEntities(
  text: string,
  engine: AnnotationEngine,
  options: Partial<ExtractionOptions> = {}
): Promise<ExtractionResult> {
  const startedAt = Date.now();
  const runId = uuidv4();
  const opts = validateInput(ExtractionOptionsSchema, {
    maxChunkSize: options.maxChunkSize ?? DEFAULT_EXTRACTION_OPTIONS.maxChunkSize,
    boundaryWindow: options.boundaryWindow ?? DEFAULT_EXTRACTION_OPTIONS.boundaryWindow,
    coreference: options.coreference ?? DEFAULT_EXTRACTION_OPTIONS.coreference,
  });
  const run = createRunContext();
  const documentLength = text.length;

  const finish = (path: ExtractionPath, chunks: ChunkRange[], chainCount: number): ExtractionResult => {
    const stats: ExtractionStats = {
      runId,
      path,
      profile: engine.profile,
      documentLength,
      chunkCount: chunks.length,
      chainCount,
      ...run.counters,
      elapsedMs: Date.now() - startedAt,
    };
    return { mentions: run.mentions, chunks, stats };
  };

  if (documentLength === 0) {
    return finish('empty', [], 0);
  }

  let chains: CoreferenceChain[] = [];
  let wholeParse: EngineParse | null = null;

  if (opts.coreference) {
    console.error(`[ENTITY] ${runId}: whole-document coreference pass (${documentLength} chars)`);
    const parse = await annotatePhase('whole_document', null, () => engine.annotateWholeDocument(text));
    chains = parse.chains;
    wholeParse = parse;
    console.error(`[ENTITY] ${runId}: found ${chains.length} coreference chains`);
  }

  if (documentLength <= opts.maxChunkSize) {
    const chunk: ChunkRange = { index: 0, startOffset: 0, endOffset: documentLength, text };
    const parse = wholeParse ?? (await annotatePhase('chunk', 0, () => engine.annotateChunk(text)));
    processChunk(run, chunk, parse, chains, documentLength);
    return finish('single', [chunk], chains.length);
  }

  const chunks = planChunks(text, opts.maxChunkSize, opts.boundaryWindow);
  console.error(`[ENTITY] ${runId}: processing ${chunks.length} chunks (max ${opts.maxChunkSize} chars)`);

  for (const chunk of chunks) {
    const parse = await annotatePhase('chunk', chunk.index, () => engine.annotateChunk(chunk.text));
    processChunk(run, chunk, parse, chains, documentLength);
  }

  const result = finish('chunked', chunks, chains.length);
  console.error(
    `[ENTITY] ${runId}: ${result.mentions.length} mentions (${result.stats.chainMentions} from chains, ` +
      `${result.stats.duplicatesSkipped} duplicates skipped) in ${result.stats.elapsedMs}ms`
  );
  return result;
}

/**
 * Mention list only
 */
export async function extractMentions(
  text: string,
  engine: AnnotationEngine,
  options: Partial<ExtractionOptions> = {}
): Promise<Mention[]> {
  const { mentions } = await extractEntities(text, engine, options);
  return mentions;
}
