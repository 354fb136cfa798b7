#!/usr/bin/env node
/**
 * Entity Stitch MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes entity extraction, chunk planning and configuration tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

// Must load before the server state reads its environment overrides
import 'dotenv/config';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { getConfig, initConfig, resetAnnotationEngine } from './server/state.js';
import { allTools } from './tools/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'entity-stitch-mcp',
  version: '1.0.0',
});

for (const [name, tool] of Object.entries(allTools)) {
  server.tool(name, tool.description, tool.inputSchema, async (params) => tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

async function shutdown(signal: string): Promise<void> {
  console.error(`[SERVER] ${signal} received, shutting down`);
  await resetAnnotationEngine();
  await server.close();
  process.exit(0);
}

async function main() {
  initConfig();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const config = getConfig();
  console.error('Entity Stitch MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(allTools).length}`);
  console.error(
    `[SERVER] engine=${config.engineProfile} max_chunk_size=${config.maxChunkSize} coreference=${config.coreference}`
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('[SERVER] Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
