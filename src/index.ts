/**
 * Grant Graph MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes grant award graph building, query, statistics and visualization
 * tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. GRANT_GRAPH_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.GRANT_GRAPH_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { ToolDefinition } from './tools/shared.js';
import { applyEnvironmentConfig, getConfig, loadGraphFromSnapshot } from './server/state.js';
import { MCPError } from './server/errors.js';
import { ingestionTools } from './tools/ingestion.js';
import { grantGraphTools } from './tools/grant-graph.js';
import { visualizationTools } from './tools/visualization.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'grant-graph-mcp',
  version: '1.0.0',
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

// All tool modules in registration order
const allToolModules: Record<string, ToolDefinition>[] = [
  ingestionTools, // 4 tools
  grantGraphTools, // 12 tools
  visualizationTools, // 2 tools
];

// Register tools with duplicate detection
const registeredToolNames = new Set<string>();
let toolCount = 0;

for (const toolModule of allToolModules) {
  for (const [name, tool] of Object.entries(toolModule)) {
    if (registeredToolNames.has(name)) {
      console.error(
        `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
      );
      process.exit(1);
    }
    registeredToolNames.add(name);
    server.tool(name, tool.description, tool.inputSchema, tool.handler);
    toolCount++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Apply configuration and load the startup snapshot.
 * Fail-fast: a corrupt or foreign snapshot aborts startup; a missing one
 * only warns, since the graph can still be built through grant_graph_build.
 */
function prepareStartupState(): void {
  for (const variable of applyEnvironmentConfig()) {
    console.error(`[Config] ${variable}=${process.env[variable]}`);
  }

  const snapshotPath = path.resolve(getConfig().snapshotPath);
  if (!fs.existsSync(snapshotPath)) {
    console.error('=== STARTUP WARNINGS ===');
    console.error(`  - No snapshot at ${snapshotPath}. Use grant_graph_build to ingest an award table.`);
    console.error('========================');
    return;
  }

  try {
    loadGraphFromSnapshot(snapshotPath);
  } catch (error) {
    const mcpError = MCPError.fromUnknown(error);
    console.error(`[FATAL] Failed to load snapshot ${snapshotPath}: ${mcpError.category}: ${mcpError.message}`);
    console.error('Rebuild the graph from the award table to repair it.');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  prepareStartupState();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Grant Graph MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
}

// Log memory usage every 5 minutes for observability (stderr only - safe for MCP)
setInterval(() => {
  const mem = process.memoryUsage();
  console.error(
    `[Memory] RSS=${(mem.rss / 1024 / 1024).toFixed(1)}MB ` +
      `Heap=${(mem.heapUsed / 1024 / 1024).toFixed(1)}/${(mem.heapTotal / 1024 / 1024).toFixed(1)}MB`
  );
}, 300_000).unref();

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
