/**
 * MCP Server Module Exports
 *
 * Re-exports all server components for external use.
 *
 * @module server
 */

// Error handling
export {
  MCPError,
  formatErrorResponse,
  validationError,
  pathNotFoundError,
  pathIsDirectoryError,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

// Type definitions
export {
  type ToolResult,
  type ToolResultSuccess,
  type ToolResultFailure,
  type ToolError,
  type ServerConfig,
  type ServerState,
  type ChunkPlanItem,
  type EntityExtractResult,
  type ChunkPlanResult,
  successResult,
  failureResult,
  toChunkPlanItem,
} from './types.js';

// State management
export {
  state,
  getConfig,
  updateConfig,
  resetConfig,
  initConfig,
  loadConfigFromEnv,
  getAnnotationEngine,
  setAnnotationEngine,
  resetAnnotationEngine,
  resetState,
  CONFIG_KEY_MAP,
  CONFIG_ENV_VARS,
  DEFAULT_GAZETTEER_PATH,
} from './state.js';
