/**
 * Extraction Pipeline Tests
 *
 * End-to-end document runs against the gazetteer engine and a scripted
 * coreference engine. Expected offsets are worked out by hand.
 */

import { describe, it, expect } from 'vitest';
import { extractEntities, extractMentions } from '../../../src/services/entities/pipeline.js';
import { AnnotationError } from '../../../src/services/annotation/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';
import type { WholeDocumentParse } from '../../../src/services/annotation/types.js';
import { mentionKey } from '../../../src/models/mention.js';
import { FailingChunkEngine, ScriptedCorefEngine, mentionOf } from './helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** 30 characters per sentence */
const NASA_SENTENCE = 'NASA was established in 1958. ';

// John Smith(0,10) Google(20,26) He(28,30); length 54
const JOHN_TEXT = 'John Smith works at Google. He is a software engineer.';
const JOHN_CHAIN = {
  id: 0,
  representativeIndex: 0,
  mentions: [mentionOf(JOHN_TEXT, 'John Smith'), mentionOf(JOHN_TEXT, 'He')],
};

// ═══════════════════════════════════════════════════════════════════════════════
// SINGLE-CHUNK DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('extractEntities - single chunk', () => {
  it('should return the longest entity without a duplicate for its head word', async () => {
    const engine = new ScriptedCorefEngine([]);
    const result = await extractEntities('Apple Inc. is an American company.', engine);

    expect(result.mentions).toEqual([
      { text: 'Apple Inc.', label: 'ORG', start: 0, end: 10 },
      { text: 'American', label: 'NORP', start: 17, end: 25 },
    ]);
    expect(result.stats.path).toBe('single');
    expect(result.stats.chunkCount).toBe(1);
  });

  it('should reuse the whole-document parse and make one engine call', async () => {
    const engine = new ScriptedCorefEngine([]);
    await extractEntities('Apple Inc. is an American company.', engine);
    expect(engine.calls).toEqual({ chunk: 0, wholeDocument: 1 });
  });

  it('should label a pronoun with its antecedent entity type', async () => {
    const engine = new ScriptedCorefEngine([JOHN_CHAIN]);
    const result = await extractEntities(JOHN_TEXT, engine);

    expect(result.mentions).toEqual([
      { text: 'John Smith', label: 'PERSON', start: 0, end: 10 },
      { text: 'He', label: 'PERSON', start: 28, end: 30 },
      { text: 'Google', label: 'ORG', start: 20, end: 26 },
    ]);
    expect(result.stats).toMatchObject({
      chainCount: 1,
      chainMentions: 2,
      entityMentions: 1,
      duplicatesSkipped: 1,
      alignmentMisses: 0,
    });
  });

  it('should skip chains and make one chunk call when coreference is off', async () => {
    const engine = new ScriptedCorefEngine([JOHN_CHAIN]);
    const result = await extractEntities(JOHN_TEXT, engine, { coreference: false });

    expect(result.mentions).toEqual([
      { text: 'John Smith', label: 'PERSON', start: 0, end: 10 },
      { text: 'Google', label: 'ORG', start: 20, end: 26 },
    ]);
    expect(engine.calls).toEqual({ chunk: 1, wholeDocument: 0 });
    expect(result.stats.chainCount).toBe(0);
  });

  it('should return no mentions for text without entities', async () => {
    const result = await extractEntities('the quick brown fox jumps.', new ScriptedCorefEngine([]));
    expect(result.mentions).toEqual([]);
    expect(result.stats.path).toBe('single');
  });

  it('should not call the engine for empty text', async () => {
    const engine = new ScriptedCorefEngine([]);
    const result = await extractEntities('', engine);

    expect(result.mentions).toEqual([]);
    expect(result.chunks).toEqual([]);
    expect(result.stats.path).toBe('empty');
    expect(engine.calls).toEqual({ chunk: 0, wholeDocument: 0 });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKED DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('extractEntities - chunked', () => {
  it('should keep every repeated entity across chunks with one label', async () => {
    const text = NASA_SENTENCE.repeat(500);
    const engine = new ScriptedCorefEngine([]);
    const result = await extractEntities(text, engine, { maxChunkSize: 2000 });

    const nasa = result.mentions.filter((m) => m.text.includes('NASA'));
    const years = result.mentions.filter((m) => m.text.includes('1958'));
    expect(nasa).toHaveLength(500);
    expect(years).toHaveLength(500);
    expect(new Set(nasa.map((m) => m.label))).toEqual(new Set(['ORG']));
    expect(new Set(years.map((m) => m.label))).toEqual(new Set(['DATE']));

    expect(result.stats.path).toBe('chunked');
    expect(result.stats.chunkCount).toBe(8);
    expect(result.chunks[0].endOffset).toBe(1979);
    expect(engine.calls).toEqual({ chunk: 8, wholeDocument: 1 });
  });

  it('should report document-global offsets for entities in later chunks', async () => {
    const text = NASA_SENTENCE.repeat(500);
    const result = await extractEntities(text, new ScriptedCorefEngine([]), { maxChunkSize: 2000 });

    // Sentence 66 starts at 1980, inside the second chunk [1979, 3959)
    expect(result.mentions).toContainEqual({ text: 'NASA', label: 'ORG', start: 1980, end: 1984 });
    expect(result.mentions).toContainEqual({ text: '1958', label: 'DATE', start: 2004, end: 2008 });
    for (const mention of result.mentions) {
      expect(text.slice(mention.start, mention.end)).toBe(mention.text);
    }
  });

  it('should carry a chain label into the chunk holding the pronoun', async () => {
    const engine = new ScriptedCorefEngine([JOHN_CHAIN]);
    const result = await extractEntities(JOHN_TEXT, engine, { maxChunkSize: 30, boundaryWindow: 10 });

    expect(engine.chunkTexts).toEqual(['John Smith works at Google.', ' He is a software engineer.']);
    expect(result.mentions).toEqual([
      { text: 'John Smith', label: 'PERSON', start: 0, end: 10 },
      { text: 'Google', label: 'ORG', start: 20, end: 26 },
      { text: 'He', label: 'PERSON', start: 28, end: 30 },
    ]);
  });

  it('should label early chain mentions CORE and later ones with the label found downstream', async () => {
    // The firm(0,8) | It(20,22) | Google(36,42) it(50,52); length 53
    const text = 'The firm grew fast. It hired staff. Google bought it.';
    const firmChain = {
      id: 0,
      representativeIndex: 2,
      mentions: [
        mentionOf(text, 'The firm'),
        mentionOf(text, 'It'),
        mentionOf(text, 'Google'),
        mentionOf(text, 'it'),
      ],
    };
    const engine = new ScriptedCorefEngine([firmChain]);
    const result = await extractEntities(text, engine, { maxChunkSize: 20, boundaryWindow: 10 });

    expect(engine.chunkTexts).toEqual(['The firm grew fast.', ' It hired staff.', ' Google bought it.']);
    expect(result.mentions).toEqual([
      { text: 'The firm', label: 'CORE', start: 0, end: 8 },
      { text: 'It', label: 'CORE', start: 20, end: 22 },
      { text: 'Google', label: 'ORG', start: 36, end: 42 },
      { text: 'it', label: 'ORG', start: 50, end: 52 },
    ]);
    expect(result.stats).toMatchObject({
      path: 'chunked',
      chunkCount: 3,
      chainCount: 1,
      chainMentions: 4,
      entityMentions: 0,
      // The plain Google entity repeats the chain mention
      duplicatesSkipped: 1,
      alignmentMisses: 0,
    });
  });

  it('should give the same mentions chunked and unchunked when cuts fall between sentences', async () => {
    const text = NASA_SENTENCE.repeat(20);
    const single = await extractMentions(text, new ScriptedCorefEngine([]));
    const chunked = await extractMentions(text, new ScriptedCorefEngine([]), { maxChunkSize: 100 });
    expect(chunked).toEqual(single);
  });

  it('should keep mention texts and labels of a prefix when another document is appended', async () => {
    const first = 'John Smith works at Google. Apple Inc. is in Boston. '.repeat(10);
    const second = 'NASA was founded in 1958. '.repeat(10);

    const alone = await extractMentions(first, new ScriptedCorefEngine([]), { maxChunkSize: 120 });
    const combined = await extractMentions(first + second, new ScriptedCorefEngine([]), { maxChunkSize: 120 });
    const prefix = combined.filter((m) => m.end <= first.length);

    expect(prefix.map((m) => [m.text, m.label])).toEqual(alone.map((m) => [m.text, m.label]));
  });

  it('should never emit two mentions with the same offsets', async () => {
    const text = `${JOHN_TEXT} ${NASA_SENTENCE.repeat(10)}`;
    const engine = new ScriptedCorefEngine([JOHN_CHAIN]);
    const mentions = await extractMentions(text, engine, { maxChunkSize: 64, boundaryWindow: 40 });
    const keys = mentions.map((m) => mentionKey(m.start, m.end));
    expect(new Set(keys).size).toBe(keys.length);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════════

describe('extractEntities - failures', () => {
  it('should abort with the failing chunk index', async () => {
    const text = NASA_SENTENCE.repeat(100);
    const promise = extractEntities(text, new FailingChunkEngine(2), { maxChunkSize: 1000 });

    await expect(promise).rejects.toBeInstanceOf(AnnotationError);
    await expect(promise).rejects.toMatchObject({
      message: 'model crashed',
      code: 'ANNOTATION_FAILED',
      details: { phase: 'chunk', chunkIndex: 1 },
    });
  });

  it('should wrap non-annotation failures', async () => {
    const text = NASA_SENTENCE.repeat(100);
    const engine = new FailingChunkEngine(1, new TypeError('bad tensor'));
    await expect(extractEntities(text, engine, { maxChunkSize: 1000 })).rejects.toMatchObject({
      name: 'AnnotationError',
      message: 'Annotation engine failed: bad tensor',
      code: 'ANNOTATION_FAILED',
      details: { phase: 'chunk', chunkIndex: 0, originalName: 'TypeError' },
    });
  });

  it('should name the whole-document phase when the coreference pass fails', async () => {
    class BrokenCorefEngine extends ScriptedCorefEngine {
      async annotateWholeDocument(): Promise<WholeDocumentParse> {
        throw new AnnotationError('Annotation worker timeout after 1000ms', 'WORKER_TIMEOUT');
      }
    }

    await expect(extractEntities(JOHN_TEXT, new BrokenCorefEngine([]))).rejects.toMatchObject({
      code: 'WORKER_TIMEOUT',
      details: { phase: 'whole_document', chunkIndex: null },
    });
  });

  it('should reject invalid options before calling the engine', async () => {
    const engine = new ScriptedCorefEngine([]);
    await expect(extractEntities(JOHN_TEXT, engine, { maxChunkSize: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(extractEntities(JOHN_TEXT, engine, { boundaryWindow: -5 })).rejects.toThrow(
      /boundary_window cannot be negative/
    );
    expect(engine.calls).toEqual({ chunk: 0, wholeDocument: 0 });
  });
});

describe('extractEntities - stats', () => {
  it('should describe the run', async () => {
    const result = await extractEntities(JOHN_TEXT, new ScriptedCorefEngine([]));
    expect(result.stats.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(result.stats).toMatchObject({ profile: 'gazetteer', documentLength: 54, chunkCount: 1 });
    expect(result.stats.elapsedMs).toBeGreaterThanOrEqual(0);
  });
});
