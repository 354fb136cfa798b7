#!/usr/bin/env npx tsx
/**
 * Extract Entities From a Text File
 *
 * Runs the extraction pipeline outside the MCP server and prints the mention
 * list as JSON [text, label, start, end] tuples on stdout. Progress goes to stderr.
 *
 * Usage:
 *   npx tsx scripts/extract-entities.ts report.txt
 *   npx tsx scripts/extract-entities.ts report.txt --chunk-size 50000 --window 300
 *   npx tsx scripts/extract-entities.ts report.txt --profile gazetteer --no-coref
 */

import dotenv from 'dotenv';
dotenv.config();

import { existsSync, readFileSync, statSync } from 'fs';
import { loadConfigFromEnv } from '../src/server/state.js';
import { createAnnotationEngine } from '../src/services/annotation/factory.js';
import { extractEntities } from '../src/services/entities/pipeline.js';
import { toMentionTuple } from '../src/models/mention.js';

// Parse CLI args
const args = process.argv.slice(2);
const VALUE_FLAGS = ['--chunk-size', '--window', '--profile'];
const valueOf = (flag: string): string | undefined => args.find((_, i) => args[i - 1] === flag);
const filePath = args.find((arg, i) => !arg.startsWith('--') && !VALUE_FLAGS.includes(args[i - 1] ?? ''));

function parseIntFlag(flag: string): number | undefined {
  const raw = valueOf(flag);
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

async function main() {
  if (!filePath) {
    console.error(
      'Usage: npx tsx scripts/extract-entities.ts <file> [--chunk-size N] [--window N] [--profile P] [--no-coref]'
    );
    process.exit(1);
  }
  if (!existsSync(filePath) || statSync(filePath).isDirectory()) {
    console.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  const config = loadConfigFromEnv();
  const profile = valueOf('--profile') ?? config.engineProfile;
  const engine = createAnnotationEngine(profile, {
    pythonPath: config.pythonPath,
    workerTimeoutMs: config.workerTimeoutMs,
    gazetteerPath: config.gazetteerPath,
  });

  try {
    const text = readFileSync(filePath, 'utf-8');
    const result = await extractEntities(text, engine, {
      maxChunkSize: parseIntFlag('--chunk-size') ?? config.maxChunkSize,
      boundaryWindow: parseIntFlag('--window') ?? config.boundaryWindow,
      coreference: args.includes('--no-coref') ? false : config.coreference,
    });

    console.error(
      `[ENTITY] ${filePath}: ${result.mentions.length} mentions, ${result.stats.chunkCount} chunk(s), ` +
        `${result.stats.elapsedMs}ms (${profile})`
    );
    // One [text, label, start, end] tuple per line
    console.log(`[\n${result.mentions.map((m) => `  ${JSON.stringify(toMentionTuple(m))}`).join(',\n')}\n]`);
  } finally {
    await engine.close();
  }
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
