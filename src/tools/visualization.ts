/**
 * Visualization MCP Tools
 *
 * Tools: grant_graph_visualize, grant_graph_visualize_status
 *
 * grant_graph_visualize returns as soon as the job is queued; callers poll
 * grant_graph_visualize_status (optionally waiting for the job to finish).
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/visualization
 */

import { z } from 'zod';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { validateInput } from '../utils/validation.js';
import { getJobRegistry, requireGraph } from '../server/state.js';
import { successResult } from '../server/types.js';
import { jobNotFoundError, nodeNotFoundError } from '../server/errors.js';
import { resolveDepth } from './grant-graph.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const VisualizeInput = z.object({
  node_id: z.string().min(1).describe('Center node ID'),
  depth: z.number().int().min(1).optional().describe('Expansion rounds (default: server default depth)'),
});

const VisualizeStatusInput = z.object({
  job_id: z.string().min(1).describe('Job ID returned by grant_graph_visualize'),
  wait: z.boolean().default(false).describe('Wait for the job to finish before answering'),
  include_events: z.boolean().default(false).describe('Include every progress event, not just the latest'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle grant_graph_visualize - Queue an interactive HTML rendering
 */
async function handleVisualize(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(VisualizeInput, params);
    const graph = requireGraph();
    const depth = resolveDepth(input.depth);
    if (!graph.hasNode(input.node_id)) {
      throw nodeNotFoundError(input.node_id);
    }

    const submitted = getJobRegistry().submit(input.node_id, depth);
    return formatResponse(successResult({ ...submitted, status: 'starting', depth }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle grant_graph_visualize_status - Latest progress of a visualization job
 */
async function handleVisualizeStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(VisualizeStatusInput, params);
    const registry = getJobRegistry();

    // The job record is updated in place, so it already holds the terminal
    // event once the wait resolves, even if retention evicts it meanwhile.
    const job = registry.get(input.job_id);
    if (!job) {
      throw jobNotFoundError(input.job_id);
    }
    if (input.wait) {
      await registry.waitFor(job.id);
    }

    return formatResponse(
      successResult({
        center: job.center,
        depth: job.depth,
        output_path: job.output_path,
        created_at: job.created_at,
        finished_at: job.finished_at,
        ...job.latest,
        events: input.include_events ? job.events : undefined,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Visualization tools collection for MCP server registration
 */
export const visualizationTools: Record<string, ToolDefinition> = {
  grant_graph_visualize: {
    description:
      'Start rendering an interactive HTML visualization of the neighborhood around a node. Returns a job ID and the page URL',
    inputSchema: VisualizeInput.shape,
    handler: handleVisualize,
  },
  grant_graph_visualize_status: {
    description: 'Get the progress of a visualization job: stage, percentage, message and node count',
    inputSchema: VisualizeStatusInput.shape,
    handler: handleVisualizeStatus,
  },
};
