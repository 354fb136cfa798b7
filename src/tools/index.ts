/**
 * MCP Tool Module Exports
 *
 * Barrel export for all tool modules.
 *
 * @module tools
 */

import { configTools } from './config.js';
import { entityTools } from './entities.js';
import type { ToolDefinition } from './shared.js';

export * from './shared.js';
export * from './entities.js';
export * from './config.js';

/** Every tool the server registers */
export const allTools: Record<string, ToolDefinition> = {
  ...entityTools,
  ...configTools,
};
