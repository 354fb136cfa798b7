/**
 * MCP Server State Management
 *
 * Manages global server state: configuration and the annotation engine built
 * from it. The engine is created on first use and dropped whenever a setting
 * it was built from changes.
 *
 * @module server/state
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import {
  createAnnotationEngine,
  DEFAULT_WORKER_TIMEOUT_MS,
  type AnnotationEngine,
} from '../services/annotation/index.js';
import { DEFAULT_ENGINE_PROFILE, DEFAULT_EXTRACTION_OPTIONS } from '../models/mention.js';
import { ConfigKey, ServerConfigSchema, validateInput, type ConfigKeyName } from '../utils/validation.js';
import { validationError } from './errors.js';
import type { ServerState, ServerConfig } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Bundled term file, relative to the project root */
export const DEFAULT_GAZETTEER_PATH = resolve(__dirname, '../../data/gazetteer.json');

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Built-in defaults, before environment overrides
 */
const builtinConfig: ServerConfig = {
  maxChunkSize: DEFAULT_EXTRACTION_OPTIONS.maxChunkSize,
  boundaryWindow: DEFAULT_EXTRACTION_OPTIONS.boundaryWindow,
  engineProfile: DEFAULT_ENGINE_PROFILE,
  coreference: DEFAULT_EXTRACTION_OPTIONS.coreference,
  pythonPath: 'python3',
  workerTimeoutMs: DEFAULT_WORKER_TIMEOUT_MS,
  gazetteerPath: DEFAULT_GAZETTEER_PATH,
};

/** Environment variable per config key */
export const CONFIG_ENV_VARS: Record<ConfigKeyName, string> = {
  max_chunk_size: 'ENTITY_MAX_CHUNK_SIZE',
  boundary_window: 'ENTITY_BOUNDARY_WINDOW',
  engine_profile: 'ENTITY_ENGINE_PROFILE',
  coreference: 'ENTITY_COREFERENCE',
  python_path: 'PYTHON_PATH',
  worker_timeout_ms: 'ENTITY_WORKER_TIMEOUT_MS',
  gazetteer_path: 'ENTITY_GAZETTEER_PATH',
};

/** Map config keys to their state property names */
export const CONFIG_KEY_MAP: Record<ConfigKeyName, keyof ServerConfig> = {
  max_chunk_size: 'maxChunkSize',
  boundary_window: 'boundaryWindow',
  engine_profile: 'engineProfile',
  coreference: 'coreference',
  python_path: 'pythonPath',
  worker_timeout_ms: 'workerTimeoutMs',
  gazetteer_path: 'gazetteerPath',
};

/** Settings the cached engine was built from */
const ENGINE_FIELDS: ReadonlySet<keyof ServerConfig> = new Set<keyof ServerConfig>([
  'engineProfile',
  'pythonPath',
  'workerTimeoutMs',
  'gazetteerPath',
]);

function parseEnvValue(key: ConfigKeyName, raw: string): string | number | boolean {
  const field = CONFIG_KEY_MAP[key];
  switch (typeof builtinConfig[field]) {
    case 'number': {
      const value = Number(raw.trim());
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw validationError(`${CONFIG_ENV_VARS[key]} must be a number, got "${raw}"`, { key, raw });
      }
      return value;
    }
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1') return true;
      if (normalized === 'false' || normalized === '0') return false;
      throw validationError(`${CONFIG_ENV_VARS[key]} must be true/false or 1/0, got "${raw}"`, { key, raw });
    }
    default:
      return raw;
  }
}

/**
 * Build a configuration from the built-in defaults and environment overrides
 *
 * @throws MCPError or ValidationError when an override is malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const overrides: Partial<Record<keyof ServerConfig, string | number | boolean>> = {};
  for (const key of ConfigKey.options) {
    const raw = env[CONFIG_ENV_VARS[key]];
    if (raw === undefined || raw === '') continue;
    overrides[CONFIG_KEY_MAP[key]] = parseEnvValue(key, raw);
  }
  return validateInput(ServerConfigSchema, { ...builtinConfig, ...overrides });
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state. Environment overrides are applied by initConfig.
 */
export const state: ServerState = {
  config: { ...builtinConfig },
  engine: null,
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration. Drops the cached engine when a setting it
 * was built from changes.
 */
export async function updateConfig(updates: Partial<ServerConfig>): Promise<void> {
  const previous = state.config;
  state.config = { ...state.config, ...updates };

  const engineChanged = [...ENGINE_FIELDS].some((field) => previous[field] !== state.config[field]);
  if (engineChanged) {
    await resetAnnotationEngine();
  }
}

/**
 * Apply environment overrides at startup
 *
 * @throws MCPError or ValidationError when an override is malformed; state is left unchanged
 */
export function initConfig(env: NodeJS.ProcessEnv = process.env): void {
  state.config = loadConfigFromEnv(env);
}

/**
 * Reset configuration to defaults (environment overrides included)
 */
export async function resetConfig(): Promise<void> {
  state.config = loadConfigFromEnv();
  await resetAnnotationEngine();
}

// ═══════════════════════════════════════════════════════════════════════════════
// ANNOTATION ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Engine for the current configuration, created on first use
 *
 * @throws AnnotationError when the engine cannot be built (e.g. missing term file)
 */
export function getAnnotationEngine(): AnnotationEngine {
  if (!state.engine) {
    const { engineProfile, pythonPath, workerTimeoutMs, gazetteerPath } = state.config;
    state.engine = createAnnotationEngine(engineProfile, { pythonPath, workerTimeoutMs, gazetteerPath });
    console.error(`[STATE] Annotation engine ready: ${engineProfile}`);
  }
  return state.engine;
}

/**
 * Install a specific engine (tests, embedding callers)
 */
export function setAnnotationEngine(engine: AnnotationEngine): void {
  state.engine = engine;
}

/**
 * Close and drop the cached engine
 */
export async function resetAnnotationEngine(): Promise<void> {
  const engine = state.engine;
  state.engine = null;
  if (engine) {
    await engine.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export async function resetState(): Promise<void> {
  await resetAnnotationEngine();
  state.config = loadConfigFromEnv();
}
