/**
 * Ingestion and Persistence MCP Tools
 *
 * Tools: grant_graph_build, grant_graph_load, grant_graph_save,
 *        grant_graph_export
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import { z } from 'zod';
import { existsSync } from 'fs';
import { resolve } from 'path';

import { readAwardTable } from '../services/ingestion/award-table.js';
import { buildGrantGraph } from '../services/grant-graph/graph-builder.js';
import { exportGraphML, exportStatistics } from '../services/grant-graph/export-service.js';
import { loadGraphFromSnapshot, requireGraph, saveCurrentGraph, setGraph, state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { sourceNotFoundError } from '../server/errors.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const BuildInput = z.object({
  file_path: z.string().min(1).describe('Path to the award export CSV'),
  save: z.boolean().default(false).describe('Write a snapshot after building'),
  snapshot_path: z.string().optional().describe('Snapshot path (default: configured snapshot path)'),
});

const LoadInput = z.object({
  snapshot_path: z.string().optional().describe('Snapshot path (default: configured snapshot path)'),
});

const SaveInput = z.object({
  snapshot_path: z.string().optional().describe('Snapshot path (default: configured snapshot path)'),
});

const ExportInput = z.object({
  format: z.enum(['graphml', 'statistics']).describe('graphml for external graph tools, statistics for a JSON summary'),
  output_path: z.string().min(1).describe('File to write'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle grant_graph_build - Ingest an award table and make the graph current
 */
async function handleBuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(BuildInput, params);
    const filePath = resolve(input.file_path);
    if (!existsSync(filePath)) {
      throw sourceNotFoundError(filePath);
    }

    const table = readAwardTable(filePath);
    const result = buildGrantGraph(table.records, {
      onProgress: (processed, total) => {
        console.error(`[GraphBuilder] Processing row ${processed}/${total}...`);
      },
    });
    setGraph(result.store, filePath);

    const snapshotPath = input.save ? saveCurrentGraph(input.snapshot_path) : null;

    return formatResponse(
      successResult({
        source: filePath,
        rows_processed: result.rows_processed,
        rows_skipped: result.rows_skipped,
        parse_warnings: table.parse_warnings,
        total_nodes: result.total_nodes,
        total_edges: result.total_edges,
        node_counts: result.node_counts,
        edge_counts: result.edge_counts,
        snapshot_path: snapshotPath,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_load - Replace the current graph with a snapshot
 */
async function handleLoad(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(LoadInput, params);
    const graph = loadGraphFromSnapshot(input.snapshot_path);

    return formatResponse(
      successResult({
        snapshot_path: state.currentSource,
        total_nodes: graph.nodeCount,
        total_edges: graph.edgeCount,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_save - Write the current graph as a snapshot
 */
async function handleSave(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SaveInput, params);
    const graph = requireGraph();
    const snapshotPath = saveCurrentGraph(input.snapshot_path);

    return formatResponse(
      successResult({
        snapshot_path: snapshotPath,
        total_nodes: graph.nodeCount,
        total_edges: graph.edgeCount,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_export - GraphML or statistics export
 */
async function handleExport(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExportInput, params);
    const graph = requireGraph();
    const outputPath = resolve(input.output_path);

    if (input.format === 'graphml') {
      exportGraphML(graph, outputPath);
      return formatResponse(
        successResult({
          format: input.format,
          output_path: outputPath,
          total_nodes: graph.nodeCount,
          total_edges: graph.edgeCount,
        })
      );
    }

    const statistics = exportStatistics(graph, outputPath);
    return formatResponse(successResult({ format: input.format, output_path: outputPath, statistics }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Ingestion tools collection for MCP server registration
 */
export const ingestionTools: Record<string, ToolDefinition> = {
  grant_graph_build: {
    description:
      'Build the grant graph from an award export CSV and make it the current graph. Rows without an Award ID are skipped',
    inputSchema: BuildInput.shape,
    handler: handleBuild,
  },
  grant_graph_load: {
    description: 'Load a grant graph snapshot and make it the current graph',
    inputSchema: LoadInput.shape,
    handler: handleLoad,
  },
  grant_graph_save: {
    description: 'Save the current grant graph as a snapshot',
    inputSchema: SaveInput.shape,
    handler: handleSave,
  },
  grant_graph_export: {
    description: 'Export the current grant graph as GraphML or write its statistics as JSON',
    inputSchema: ExportInput.shape,
    handler: handleExport,
  },
};
