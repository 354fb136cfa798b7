/**
 * Configuration Management MCP Tools
 *
 * Tools: entity_config_get, entity_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { CONFIG_KEY_MAP, getConfig, state, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import {
  validateInput,
  ConfigGetInput,
  ConfigSetInput,
  ConfigKey,
  ServerConfigSchema,
  type ConfigKeyName,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

/**
 * Configuration as reported to clients, keyed by config key
 */
function toConfigView(config: ServerConfig): Record<ConfigKeyName, string | number | boolean> {
  return {
    max_chunk_size: config.maxChunkSize,
    boundary_window: config.boundaryWindow,
    engine_profile: config.engineProfile,
    coreference: config.coreference,
    python_path: config.pythonPath,
    worker_timeout_ms: config.workerTimeoutMs,
    gazetteer_path: config.gazetteerPath,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const view = toConfigView(getConfig());

    // Return specific key if requested
    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: view[input.key] }));
    }

    return formatResponse(
      successResult({
        ...view,
        engine_loaded: state.engine !== null,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    // Validate the whole resulting config so the value is checked against its field's type
    const next = validateInput(ServerConfigSchema, {
      ...getConfig(),
      [CONFIG_KEY_MAP[input.key]]: input.value,
    });
    await updateConfig(next);

    console.error(`[CONFIG] ${input.key} set to ${JSON.stringify(input.value)}`);
    return formatResponse(
      successResult({
        key: input.key,
        value: toConfigView(next)[input.key],
        updated: true,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  entity_config_get: {
    description: 'Get current extraction configuration',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  entity_config_set: {
    description:
      'Update an extraction setting. Changing engine_profile, python_path, worker_timeout_ms or ' +
      'gazetteer_path rebuilds the annotation engine on the next call.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
