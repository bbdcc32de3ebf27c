/**
 * Unit Tests for Visualization MCP Tools
 *
 * @module tests/unit/tools/visualization
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { visualizationTools } from '../../../src/tools/visualization.js';
import { resetState, setGraph, updateConfig } from '../../../src/server/state.js';
import { buildGrantGraph } from '../../../src/services/grant-graph/graph-builder.js';
import { SAMPLE_RECORDS } from '../../fixtures/sample-records.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

const tempDirs: string[] = [];

afterAll(() => {
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

async function callTool(name: string, params: Record<string, unknown> = {}): Promise<ToolResponse> {
  const tool = visualizationTools[name];
  if (!tool) {
    throw new Error(`Unknown tool ${name}`);
  }
  return parseResponse(await tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('visualization tools', () => {
  let outputDir: string;

  beforeEach(() => {
    resetState();
    outputDir = mkdtempSync(join(tmpdir(), 'grant-viz-tool-'));
    tempDirs.push(outputDir);
    updateConfig({ outputDir });
    setGraph(buildGrantGraph(SAMPLE_RECORDS).store, 'fixture');
  });

  afterEach(() => {
    resetState();
  });

  it('queues a job and reports its progress until complete', async () => {
    const submitted = await callTool('grant_graph_visualize', { node_id: 'Jane Doe' });
    expect(submitted.data).toMatchObject({ url: '/static/viz_Jane_Doe_1.html', status: 'starting', depth: 1 });

    const status = await callTool('grant_graph_visualize_status', { job_id: submitted.data?.job_id, wait: true });
    expect(status.data).toMatchObject({
      job_id: submitted.data?.job_id,
      center: 'Jane Doe',
      depth: 1,
      status: 'complete',
      stage: 'complete',
      progress: 100,
      total_nodes: 3,
    });
    expect(status.data).not.toHaveProperty('events');
    expect(existsSync(join(outputDir, 'viz_Jane_Doe_1.html'))).toBe(true);
  });

  it('includes the event history on request', async () => {
    const submitted = await callTool('grant_graph_visualize', { node_id: 'Ohio', depth: 2 });
    const status = await callTool('grant_graph_visualize_status', {
      job_id: submitted.data?.job_id,
      wait: true,
      include_events: true,
    });

    expect(status.data?.events).toHaveLength(12);
    expect(status.data?.total_nodes).toBe(8);
  });

  it('reports the terminal state when finished jobs are not retained', async () => {
    updateConfig({ jobRetentionMs: 0 });
    const submitted = await callTool('grant_graph_visualize', { node_id: 'Jane Doe' });

    const status = await callTool('grant_graph_visualize_status', { job_id: submitted.data?.job_id, wait: true });
    expect(status.success).toBe(true);
    expect(status.data).toMatchObject({ job_id: submitted.data?.job_id, status: 'complete', progress: 100 });
  });

  it('rejects unknown centers before queueing', async () => {
    const result = await callTool('grant_graph_visualize', { node_id: 'Nobody' });
    expect(result.error?.category).toBe('NODE_NOT_FOUND');
  });

  it('rejects depths beyond the configured maximum', async () => {
    const result = await callTool('grant_graph_visualize', { node_id: 'Jane Doe', depth: 9 });
    expect(result.error?.category).toBe('VALIDATION_ERROR');
  });

  it('requires a loaded graph', async () => {
    resetState();
    const result = await callTool('grant_graph_visualize', { node_id: 'Jane Doe' });
    expect(result.error?.category).toBe('GRAPH_NOT_LOADED');
  });

  it('reports unknown jobs', async () => {
    const result = await callTool('grant_graph_visualize_status', { job_id: 'no-such-job' });
    expect(result.error).toMatchObject({
      category: 'JOB_NOT_FOUND',
      message: 'Visualization job "no-such-job" not found or expired',
    });
  });
});
