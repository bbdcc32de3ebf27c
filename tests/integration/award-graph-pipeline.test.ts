/**
 * Integration test: award table to queryable snapshot
 *
 * Reads the sample CSV, builds the graph, persists it, reloads it in a
 * fresh store and checks that every query answers the same way.
 *
 * @module tests/integration/award-graph-pipeline
 */

import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { readAwardTable } from '../../src/services/ingestion/award-table.js';
import { buildGrantGraph } from '../../src/services/grant-graph/graph-builder.js';
import { loadSnapshot, saveSnapshot } from '../../src/services/grant-graph/snapshot-codec.js';
import { exportGraphML } from '../../src/services/grant-graph/export-service.js';
import { rankOrganizations, rankStates, findCollaborators } from '../../src/services/grant-graph/aggregate-queries.js';
import { findPaths, getGraphSummary, queryByFundingRange } from '../../src/services/grant-graph/graph-queries.js';
import { extractNeighborhood } from '../../src/services/grant-graph/neighborhood.js';

const FIXTURE_PATH = fileURLToPath(new URL('../fixtures/awards-sample.csv', import.meta.url));

const tempDir = mkdtempSync(join(tmpdir(), 'grant-pipeline-'));

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('award graph pipeline', () => {
  const table = readAwardTable(FIXTURE_PATH);
  const built = buildGrantGraph(table.records);
  const snapshotPath = join(tempDir, 'grant-graph.json');
  saveSnapshot(built.store, snapshotPath);
  const reloaded = loadSnapshot(snapshotPath);

  it('keeps the graph shape across a snapshot', () => {
    expect(getGraphSummary(reloaded)).toEqual(getGraphSummary(built.store));
    expect(reloaded.getAllEdges()).toEqual(built.store.getAllEdges());
  });

  it('answers aggregates the same way after reload', () => {
    expect(rankOrganizations(reloaded)).toEqual(rankOrganizations(built.store));
    expect(rankStates(reloaded)).toEqual(rankStates(built.store));
    expect(findCollaborators(reloaded, 'Alice Smith')).toEqual(['Bob Jones']);
  });

  it('answers traversals the same way after reload', () => {
    expect(findPaths(reloaded, 'Jane Doe', 'Ohio')).toEqual(findPaths(built.store, 'Jane Doe', 'Ohio'));
    expect(extractNeighborhood(reloaded, 'State University', 2)?.nodes.length).toBe(11);
    expect(queryByFundingRange(reloaded, 0, 300000).awards.map((award) => award.award_id)).toEqual(['AW-003']);
  });

  it('exports the reloaded graph as GraphML', () => {
    const outputPath = join(tempDir, 'grant-graph.graphml');
    exportGraphML(reloaded, outputPath);

    const graphml = readFileSync(outputPath, 'utf-8');
    expect(graphml.match(/<node /g)).toHaveLength(23);
    expect(graphml.match(/<edge /g)).toHaveLength(26);
  });
});
