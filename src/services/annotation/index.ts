/**
 * Annotation Module Exports
 *
 * @module services/annotation
 */

export type { AnnotationEngine, EngineParse, WholeDocumentParse, EntitySpan, TokenSpan } from './types.js';
export { AnnotatedText, type AlignedSpan } from './annotated-text.js';
export { AnnotationError, classifyAnnotationError, type AnnotationErrorCode } from './errors.js';
export {
  GazetteerAnnotationEngine,
  GazetteerFileSchema,
  GAZETTEER_PROFILE,
  tokenize,
  type GazetteerTerms,
} from './gazetteer.js';
export {
  SpacyAnnotationEngine,
  parseWorkerOutput,
  toWholeDocumentParse,
  DEFAULT_WORKER_TIMEOUT_MS,
  type SpacyEngineConfig,
  type WorkerResponse,
} from './spacy-worker.js';
export { createAnnotationEngine, type EngineFactoryOptions } from './factory.js';
