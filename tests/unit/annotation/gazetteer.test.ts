/**
 * Gazetteer Annotation Engine Tests
 *
 * Tokenizer, term matching rules and term file loading.
 * Uses real temp files for fromFile().
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { GazetteerAnnotationEngine, tokenize, GAZETTEER_PROFILE } from '../../../src/services/annotation/gazetteer.js';
import { AnnotationError } from '../../../src/services/annotation/errors.js';

const BUNDLED_GAZETTEER = resolve(dirname(fileURLToPath(import.meta.url)), '../../../data/gazetteer.json');

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOKENIZER
// ═══════════════════════════════════════════════════════════════════════════════

describe('tokenize', () => {
  it('should split words and single punctuation characters', () => {
    expect(tokenize('Hello, world!')).toEqual([
      { start: 0, end: 5 },
      { start: 5, end: 6 },
      { start: 7, end: 12 },
      { start: 12, end: 13 },
    ]);
  });

  it('should keep letters and digits together and skip whitespace', () => {
    expect(tokenize('  A1b2 \n 99')).toEqual([
      { start: 2, end: 6 },
      { start: 9, end: 11 },
    ]);
  });

  it('should return no tokens for whitespace', () => {
    expect(tokenize(' \n\t ')).toEqual([]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

describe('GazetteerAnnotationEngine matching', () => {
  it('should report the gazetteer profile', () => {
    expect(new GazetteerAnnotationEngine({}).profile).toBe(GAZETTEER_PROFILE);
  });

  it('should prefer the longest term and not overlap it', async () => {
    const engine = new GazetteerAnnotationEngine({ Apple: 'ORG', 'Apple Inc.': 'ORG' });
    const parse = await engine.annotateChunk('Apple Inc. and Apple');
    expect(parse.entities).toEqual([
      { text: 'Apple Inc.', label: 'ORG', start: 0, end: 10 },
      { text: 'Apple', label: 'ORG', start: 15, end: 20 },
    ]);
  });

  it('should only match at token boundaries', async () => {
    const engine = new GazetteerAnnotationEngine({ MIT: 'ORG' });
    const parse = await engine.annotateChunk('SMITHS and MIT');
    expect(parse.entities).toEqual([{ text: 'MIT', label: 'ORG', start: 11, end: 14 }]);
  });

  it('should match case-sensitively', async () => {
    const engine = new GazetteerAnnotationEngine({ NASA: 'ORG' });
    const parse = await engine.annotateChunk('nasa and NASA');
    expect(parse.entities).toEqual([{ text: 'NASA', label: 'ORG', start: 9, end: 13 }]);
  });

  it('should find every occurrence', async () => {
    const engine = new GazetteerAnnotationEngine({ NASA: 'ORG' });
    const parse = await engine.annotateChunk('NASA, NASA. NASA');
    expect(parse.entities.map((e) => e.start)).toEqual([0, 6, 12]);
  });

  it('should return tokens with the parse', async () => {
    const parse = await new GazetteerAnnotationEngine({}).annotateChunk('Hi there.');
    expect(parse.tokens).toEqual([
      { start: 0, end: 2 },
      { start: 3, end: 8 },
      { start: 8, end: 9 },
    ]);
    expect(parse.entities).toEqual([]);
  });

  it('should report no coreference chains for the whole document', async () => {
    const engine = new GazetteerAnnotationEngine({ Boston: 'GPE' });
    const parse = await engine.annotateWholeDocument('He lives in Boston.');
    expect(parse.chains).toEqual([]);
    expect(parse.entities).toEqual([{ text: 'Boston', label: 'GPE', start: 12, end: 18 }]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TERM FILES
// ═══════════════════════════════════════════════════════════════════════════════

describe('GazetteerAnnotationEngine.fromFile', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = mkdtempSync(join(tmpdir(), 'gazetteer-test-'));
  });

  afterAll(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should load terms from a file', async () => {
    const filePath = join(testDir, 'terms.json');
    writeFileSync(filePath, JSON.stringify({ terms: { Acme: 'ORG' } }));

    const parse = await GazetteerAnnotationEngine.fromFile(filePath).annotateChunk('Acme ships.');
    expect(parse.entities).toEqual([{ text: 'Acme', label: 'ORG', start: 0, end: 4 }]);
  });

  it('should load the bundled term file', async () => {
    const engine = GazetteerAnnotationEngine.fromFile(BUNDLED_GAZETTEER);
    const parse = await engine.annotateChunk('Jane Doe visited Boston.');
    expect(parse.entities.map((e) => [e.text, e.label])).toEqual([
      ['Jane Doe', 'PERSON'],
      ['Boston', 'GPE'],
    ]);
  });

  it('should throw ENGINE_NOT_AVAILABLE for a missing file', () => {
    const filePath = join(testDir, 'missing.json');
    const error = catchError(() => GazetteerAnnotationEngine.fromFile(filePath));
    expect(error).toBeInstanceOf(AnnotationError);
    expect(error).toMatchObject({ code: 'ENGINE_NOT_AVAILABLE', details: { filePath } });
  });

  it('should throw for a file that is not JSON', () => {
    const filePath = join(testDir, 'broken.json');
    writeFileSync(filePath, '{ terms: ');
    expect(() => GazetteerAnnotationEngine.fromFile(filePath)).toThrow(/not valid JSON/);
  });

  it('should throw for a file with the wrong shape', () => {
    const filePath = join(testDir, 'shape.json');
    writeFileSync(filePath, JSON.stringify({ terms: { Acme: 1 } }));
    expect(() => GazetteerAnnotationEngine.fromFile(filePath)).toThrow(/invalid shape/);
    expect(catchError(() => GazetteerAnnotationEngine.fromFile(filePath))).toMatchObject({
      code: 'ENGINE_NOT_AVAILABLE',
      details: { filePath, issues: 'terms.Acme: Expected string, received number' },
    });
  });
});
