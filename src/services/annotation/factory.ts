/**
 * Annotation engine selection by profile identifier.
 *
 * @module services/annotation/factory
 */

import { GazetteerAnnotationEngine, GAZETTEER_PROFILE } from './gazetteer.js';
import { SpacyAnnotationEngine } from './spacy-worker.js';
import type { AnnotationEngine } from './types.js';

export interface EngineFactoryOptions {
  pythonPath?: string;
  workerTimeoutMs?: number;
  /** Term file for the gazetteer profile */
  gazetteerPath?: string;
}

/**
 * Build the engine for a profile: "gazetteer" selects the rule-based engine,
 * anything else is taken as a spaCy model name for the Python worker.
 */
export function createAnnotationEngine(
  profile: string,
  options: EngineFactoryOptions = {}
): AnnotationEngine {
  if (profile === GAZETTEER_PROFILE) {
    if (!options.gazetteerPath) {
      return new GazetteerAnnotationEngine({});
    }
    return GazetteerAnnotationEngine.fromFile(options.gazetteerPath);
  }

  return new SpacyAnnotationEngine({
    model: profile,
    pythonPath: options.pythonPath,
    timeoutMs: options.workerTimeoutMs,
  });
}
