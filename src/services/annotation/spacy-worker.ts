/**
 * SpacyAnnotationEngine - TypeScript bridge to python/annotation_worker.py
 *
 * One worker invocation per call. Text goes in on stdin as a JSON string;
 * the result is the last JSON line on stdout. Offsets come back as UTF-16
 * indices so they line up with JavaScript strings.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/annotation/spacy-worker
 */

import { PythonShell, Options as PythonShellOptions } from 'python-shell';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { AnnotationError, classifyAnnotationError } from './errors.js';
import type { AnnotationEngine, EngineParse, WholeDocumentParse } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

/** Default worker timeout: 15 minutes (transformer models on long documents) */
export const DEFAULT_WORKER_TIMEOUT_MS = 900_000;

// ═══════════════════════════════════════════════════════════════════════════════
// WORKER RESPONSE SCHEMA (matches python/annotation_worker.py AnnotationResult)
// ═══════════════════════════════════════════════════════════════════════════════

const Offset = z.number().int().nonnegative();

export const WorkerResponseSchema = z.object({
  success: z.boolean(),
  model: z.string(),
  elapsed_ms: z.number(),
  tokens: z.array(z.tuple([Offset, Offset])),
  entities: z.array(
    z.object({
      text: z.string(),
      label: z.string(),
      start: Offset,
      end: Offset,
    })
  ),
  chains: z
    .array(
      z.object({
        id: z.number().int(),
        representative: z.number().int().nonnegative(),
        mentions: z.array(z.tuple([Offset, Offset, z.string()])),
      })
    )
    .nullable(),
  error: z.string().nullable(),
});

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;

/**
 * Parse worker stdout: the last line that is valid JSON wins
 * (spaCy and torch may print warnings to stdout before it).
 *
 * @throws AnnotationError PARSE_ERROR when no line parses or the shape is wrong
 */
export function parseWorkerOutput(output: string): WorkerResponse {
  const lines = output.trim().split('\n').filter((l) => l.trim());
  if (lines.length === 0) {
    throw new AnnotationError('Annotation worker produced no output', 'WORKER_ERROR');
  }

  let parsed: unknown;
  let found = false;
  for (let i = lines.length - 1; i >= 0; i--) {
    try {
      parsed = JSON.parse(lines[i]);
      found = true;
      break;
    } catch { /* not JSON, try previous line */ }
  }

  if (!found) {
    throw new AnnotationError('Failed to parse annotation worker output as JSON', 'PARSE_ERROR', {
      output: output.substring(0, 1000),
    });
  }

  const result = WorkerResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new AnnotationError('Annotation worker output has an unexpected shape', 'PARSE_ERROR', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/**
 * Convert a successful worker response into engine parse types
 */
export function toWholeDocumentParse(response: WorkerResponse): WholeDocumentParse {
  return {
    tokens: response.tokens.map(([start, end]) => ({ start, end })),
    entities: response.entities.map((e) => ({ ...e })),
    chains: (response.chains ?? []).map((c) => ({
      id: c.id,
      representativeIndex: c.representative,
      mentions: c.mentions.map(([start, end, text]) => ({ start, end, text })),
    })),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export interface SpacyEngineConfig {
  /** spaCy model name, e.g. en_core_web_trf */
  model: string;
  pythonPath?: string;
  workerPath?: string;
  timeoutMs?: number;
}

export class SpacyAnnotationEngine implements AnnotationEngine {
  readonly profile: string;
  private readonly pythonPath: string;
  private readonly workerPath: string;
  private readonly timeoutMs: number;

  constructor(config: SpacyEngineConfig) {
    this.profile = config.model;
    this.pythonPath = config.pythonPath ?? 'python3';
    this.workerPath = config.workerPath ?? resolve(__dirname, '../../../python/annotation_worker.py');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_WORKER_TIMEOUT_MS;
  }

  async annotateChunk(text: string): Promise<EngineParse> {
    const { tokens, entities } = await this.annotate(text, false);
    return { tokens, entities };
  }

  async annotateWholeDocument(text: string): Promise<WholeDocumentParse> {
    return this.annotate(text, true);
  }

  async close(): Promise<void> {
    // Each call spawns its own worker; nothing to release
  }

  private async annotate(text: string, coref: boolean): Promise<WholeDocumentParse> {
    const args = ['--stdin', '--model', this.profile, '--json'];
    if (coref) args.push('--coref');

    const response = await this.runWorker(args, JSON.stringify(text));

    if (!response.success) {
      throw new AnnotationError(
        response.error ?? 'Annotation failed with no error message',
        classifyAnnotationError(response.error),
        { model: response.model, textLength: text.length, coref, elapsed_ms: response.elapsed_ms }
      );
    }

    console.error(
      `[ANNOTATE] ${this.profile}: ${text.length} chars, ${response.entities.length} entities` +
        `${coref ? `, ${response.chains?.length ?? 0} chains` : ''} in ${response.elapsed_ms}ms`
    );
    return toWholeDocumentParse(response);
  }

  private runWorker(args: string[], stdin: string): Promise<WorkerResponse> {
    return new Promise((resolvePromise, reject) => {
      let settled = false;
      const options: PythonShellOptions = {
        mode: 'text',
        pythonPath: this.pythonPath,
        pythonOptions: ['-u'],
        args,
      };

      const shell = new PythonShell(this.workerPath, options);
      const outputChunks: string[] = [];
      let stderr = '';

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        try { shell.kill(); } catch { /* process already gone */ }
        reject(
          new AnnotationError(`Annotation worker timeout after ${this.timeoutMs}ms`, 'WORKER_TIMEOUT', {
            stderr: stderr.substring(0, 1000),
          })
        );
      }, this.timeoutMs);

      shell.on('message', (msg: string) => {
        outputChunks.push(msg);
      });

      shell.on('stderr', (err: string) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += err + '\n';
        }
      });

      // Spawn failures (missing interpreter) arrive here, not in the end callback
      shell.on('error', (err: Error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        console.error('[AnnotationWorker] Spawn error:', err.message);
        reject(
          new AnnotationError(`Worker error: ${err.message}`, classifyAnnotationError(err.message), {
            pythonPath: this.pythonPath,
            stderr: stderr.substring(0, 1000),
          })
        );
      });

      shell.send(stdin);
      shell.end((err?: Error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;

        const output = outputChunks.join('\n');

        if (err) {
          console.error('[AnnotationWorker] Error:', err.message);
          if (stderr) console.error('[AnnotationWorker] Stderr:', stderr.substring(0, 1000));

          // The worker reports structured failures on stdout before exiting non-zero
          try {
            const structured = parseWorkerOutput(output);
            if (!structured.success) {
              resolvePromise(structured);
              return;
            }
          } catch { /* no structured response, report the process error */ }

          reject(
            new AnnotationError(
              `Worker error: ${err.message}`,
              classifyAnnotationError(stderr || err.message),
              { stderr: stderr.substring(0, 1000), stack: err.stack }
            )
          );
          return;
        }

        try {
          resolvePromise(parseWorkerOutput(output));
        } catch (parseError) {
          reject(parseError);
        }
      });
    });
  }
}
