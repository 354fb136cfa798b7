/**
 * Annotation Engine Errors
 *
 * Any engine failure aborts the whole document run.
 *
 * @module services/annotation/errors
 */

export type AnnotationErrorCode =
  | 'ENGINE_NOT_AVAILABLE'
  | 'MODEL_NOT_FOUND'
  | 'ANNOTATION_FAILED'
  | 'PARSE_ERROR'
  | 'WORKER_ERROR'
  | 'WORKER_TIMEOUT';

export class AnnotationError extends Error {
  constructor(
    message: string,
    public readonly code: AnnotationErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AnnotationError';
    Error.captureStackTrace?.(this, AnnotationError);
  }
}

/**
 * Classify a worker error message into an AnnotationErrorCode
 */
export function classifyAnnotationError(error: string | null): AnnotationErrorCode {
  if (!error) return 'ANNOTATION_FAILED';

  const lower = error.toLowerCase();

  if (lower.includes("can't find model") || lower.includes('model not found') || lower.includes('e050')) {
    return 'MODEL_NOT_FOUND';
  }

  if (
    lower.includes('no module named') ||
    lower.includes('command not found') ||
    lower.includes('enoent')
  ) {
    return 'ENGINE_NOT_AVAILABLE';
  }

  return 'ANNOTATION_FAILED';
}
