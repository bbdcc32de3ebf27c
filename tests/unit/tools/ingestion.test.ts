/**
 * Unit Tests for Ingestion and Persistence MCP Tools
 *
 * @module tests/unit/tools/ingestion
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ingestionTools } from '../../../src/tools/ingestion.js';
import { hasGraph, requireGraph, resetState, state } from '../../../src/server/state.js';

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

const FIXTURE_PATH = fileURLToPath(new URL('../../fixtures/awards-sample.csv', import.meta.url));

const tempDirs: string[] = [];

afterAll(() => {
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'grant-ingest-'));
  tempDirs.push(dir);
  return dir;
}

function parseResponse(response: { content: Array<{ type: string; text: string }> }): ToolResponse {
  return JSON.parse(response.content[0].text);
}

async function callTool(name: string, params: Record<string, unknown> = {}): Promise<ToolResponse> {
  const tool = ingestionTools[name];
  if (!tool) {
    throw new Error(`Unknown tool ${name}`);
  }
  return parseResponse(await tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ingestion tools', () => {
  let tempDir: string;

  beforeEach(() => {
    resetState();
    tempDir = createTempDir();
  });

  afterEach(() => {
    resetState();
  });

  describe('grant_graph_build', () => {
    it('builds the graph from the award table and makes it current', async () => {
      const result = await callTool('grant_graph_build', { file_path: FIXTURE_PATH });

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        source: FIXTURE_PATH,
        rows_processed: 4,
        rows_skipped: 1,
        parse_warnings: 0,
        total_nodes: 23,
        total_edges: 26,
        snapshot_path: null,
      });
      expect(requireGraph().nodeCount).toBe(23);
      expect(state.currentSource).toBe(FIXTURE_PATH);
    });

    it('saves a snapshot when asked', async () => {
      const snapshotPath = join(tempDir, 'built.json');
      const result = await callTool('grant_graph_build', {
        file_path: FIXTURE_PATH,
        save: true,
        snapshot_path: snapshotPath,
      });

      expect(result.data?.snapshot_path).toBe(snapshotPath);
      expect(existsSync(snapshotPath)).toBe(true);
    });

    it('reports a missing award table', async () => {
      const missing = join(tempDir, 'missing.csv');
      const result = await callTool('grant_graph_build', { file_path: missing });

      expect(result.error).toMatchObject({
        category: 'SOURCE_NOT_FOUND',
        message: `Award table does not exist: ${missing}`,
      });
      expect(hasGraph()).toBe(false);
    });

    it('rejects a table without award identifiers', async () => {
      const filePath = join(tempDir, 'wrong.csv');
      writeFileSync(filePath, 'Title,Amount\nX,1\n', 'utf-8');

      const result = await callTool('grant_graph_build', { file_path: filePath });
      expect(result.error?.category).toBe('INTERNAL_ERROR');
      expect(result.error?.message).toBe('Award table has no "Award ID" column');
    });

    it('validates its input', async () => {
      const result = await callTool('grant_graph_build', {});
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('grant_graph_save and grant_graph_load', () => {
    it('round-trips the current graph', async () => {
      const snapshotPath = join(tempDir, 'graph.json');
      await callTool('grant_graph_build', { file_path: FIXTURE_PATH });

      const saved = await callTool('grant_graph_save', { snapshot_path: snapshotPath });
      expect(saved.data).toEqual({ snapshot_path: snapshotPath, total_nodes: 23, total_edges: 26 });

      resetState();
      const loaded = await callTool('grant_graph_load', { snapshot_path: snapshotPath });
      expect(loaded.data).toEqual({ snapshot_path: snapshotPath, total_nodes: 23, total_edges: 26 });
      expect(state.currentSource).toBe(snapshotPath);
    });

    it('refuses to save without a graph', async () => {
      const result = await callTool('grant_graph_save', { snapshot_path: join(tempDir, 'none.json') });
      expect(result.error?.category).toBe('GRAPH_NOT_LOADED');
    });

    it('reports a missing snapshot', async () => {
      const result = await callTool('grant_graph_load', { snapshot_path: join(tempDir, 'absent.json') });
      expect(result.error?.category).toBe('PATH_NOT_FOUND');
    });

    it('reports a corrupt snapshot', async () => {
      const snapshotPath = join(tempDir, 'corrupt.json');
      writeFileSync(snapshotPath, '{"attributes":{}}', 'utf-8');

      const result = await callTool('grant_graph_load', { snapshot_path: snapshotPath });
      expect(result.error?.category).toBe('SNAPSHOT_INVALID');
      expect(result.error?.details?.path).toBe(snapshotPath);
    });
  });

  describe('grant_graph_export', () => {
    beforeEach(async () => {
      await callTool('grant_graph_build', { file_path: FIXTURE_PATH });
    });

    it('writes GraphML', async () => {
      const outputPath = join(tempDir, 'graph.graphml');
      const result = await callTool('grant_graph_export', { format: 'graphml', output_path: outputPath });

      expect(result.data).toEqual({ format: 'graphml', output_path: outputPath, total_nodes: 23, total_edges: 26 });
      expect(readFileSync(outputPath, 'utf-8').startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
    });

    it('writes statistics', async () => {
      const outputPath = join(tempDir, 'stats.json');
      const result = await callTool('grant_graph_export', { format: 'statistics', output_path: outputPath });

      expect(result.data?.statistics).toMatchObject({ total_nodes: 23, total_edges: 26 });
      expect(JSON.parse(readFileSync(outputPath, 'utf-8'))).toEqual(result.data?.statistics);
    });

    it('rejects unknown formats', async () => {
      const result = await callTool('grant_graph_export', { format: 'gexf', output_path: join(tempDir, 'x') });
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });
});
