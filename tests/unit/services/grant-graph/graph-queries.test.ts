/**
 * Unit tests for lookup, traversal and summary queries
 *
 * @module tests/unit/services/grant-graph/graph-queries
 */

import { describe, it, expect } from 'vitest';
import { buildGrantGraph } from '../../../../src/services/grant-graph/graph-builder.js';
import { GrantGraphStore } from '../../../../src/services/grant-graph/graph-store.js';
import {
  MAX_CONNECTIONS,
  computeStatistics,
  findConnections,
  findPaths,
  getGraphSummary,
  getMostConnectedNodes,
  getNodeDetails,
  queryByFundingRange,
  searchNodes,
} from '../../../../src/services/grant-graph/graph-queries.js';
import { SAMPLE_RECORDS } from '../../../fixtures/sample-records.js';

const { store } = buildGrantGraph(SAMPLE_RECORDS);

describe('searchNodes', () => {
  it('matches identifiers case-insensitively', () => {
    expect(searchNodes(store, 'doe')).toEqual([{ id: 'Jane Doe', type: 'Person', properties: { role: 'PI' } }]);
  });

  it('filters by type and stops at the limit', () => {
    expect(searchNodes(store, 'program', 'Program', 2).map((hit) => hit.id)).toEqual([
      'Program Alpha',
      'Program Beta',
    ]);
  });

  it('finds counties by their state suffix', () => {
    expect(searchNodes(store, 'ohio', 'County').map((hit) => hit.id)).toEqual(['Franklin, Ohio', 'Cuyahoga, Ohio']);
  });

  it('returns nothing when nothing matches', () => {
    expect(searchNodes(store, 'zzz')).toEqual([]);
  });
});

describe('getNodeDetails', () => {
  it('lists labelled connections in both directions', () => {
    expect(getNodeDetails(store, 'State University')).toEqual({
      id: 'State University',
      type: 'Organization',
      attributes: {},
      incoming_connections: [
        { from: 'AW-001', relationship: 'AWARDED_TO', type: 'Award' },
        { from: 'AW-002', relationship: 'AWARDED_TO', type: 'Award' },
      ],
      outgoing_connections: [
        { to: 'Ohio', relationship: 'LOCATED_IN_STATE', type: 'State' },
        { to: 'Franklin, Ohio', relationship: 'LOCATED_IN_COUNTY', type: 'County' },
      ],
      total_incoming: 2,
      total_outgoing: 2,
    });
  });

  it('returns null for an unknown node', () => {
    expect(getNodeDetails(store, 'Nobody')).toBeNull();
  });
});

describe('findConnections', () => {
  it('lists every outgoing edge', () => {
    expect(findConnections(store, 'AW-001')?.count).toBe(5);
  });

  it('filters by relationship', () => {
    const result = findConnections(store, 'AW-001', undefined, 'FUNDED_BY');
    expect(result?.connections.map((connection) => connection.to)).toEqual(['Program Alpha', 'Program Beta']);
  });

  it('filters by target', () => {
    expect(findConnections(store, 'AW-001', 'Energy')).toEqual({
      count: 1,
      connections: [{ from: 'AW-001', to: 'Energy', relationship: 'INVOLVES_TECH', to_type: 'Technology_Area' }],
    });
  });

  it('caps the list but reports the full count', () => {
    const hub = new GrantGraphStore();
    hub.upsertNode({
      id: 'HUB',
      type: 'Award',
      attributes: {
        title: 'Hub',
        amount: null,
        award_date: 'N/A',
        start_date: 'N/A',
        end_date: 'N/A',
        active: 'N/A',
        url: '',
      },
    });
    for (let i = 0; i < 120; i++) {
      hub.upsertNode({ id: `P${i}`, type: 'Program', attributes: {} });
      hub.upsertEdge('HUB', `P${i}`, 'FUNDED_BY');
    }

    const result = findConnections(hub, 'HUB');
    expect(result?.count).toBe(120);
    expect(result?.connections).toHaveLength(MAX_CONNECTIONS);
  });

  it('returns null for an unknown source', () => {
    expect(findConnections(store, 'Nobody')).toBeNull();
  });
});

describe('findPaths', () => {
  it('finds every simple directed path within the length bound', () => {
    expect(findPaths(store, 'Jane Doe', 'Ohio', 3)).toEqual([
      ['Jane Doe', 'AW-001', 'State University', 'Ohio'],
      ['Jane Doe', 'AW-002', 'State University', 'Ohio'],
    ]);
  });

  it('returns no paths when the bound is too short', () => {
    expect(findPaths(store, 'Jane Doe', 'Ohio', 2)).toEqual([]);
  });

  it('follows edge direction only', () => {
    expect(findPaths(store, 'Ohio', 'Jane Doe', 5)).toEqual([]);
  });

  it('stops after the path limit', () => {
    expect(findPaths(store, 'Jane Doe', 'Ohio', 3, 1)).toHaveLength(1);
  });

  it('returns no paths from a node to itself', () => {
    expect(findPaths(store, 'Jane Doe', 'Jane Doe')).toEqual([]);
  });

  it('returns null when an endpoint is missing', () => {
    expect(findPaths(store, 'Jane Doe', 'Nobody')).toBeNull();
    expect(findPaths(store, 'Nobody', 'Ohio')).toBeNull();
  });
});

describe('getMostConnectedNodes', () => {
  it('ranks by total labelled degree', () => {
    expect(getMostConnectedNodes(store, undefined, 1)).toEqual([
      { id: 'AW-001', type: 'Award', degree: 7, in_degree: 2, out_degree: 5 },
    ]);
  });

  it('restricts the ranking to one type', () => {
    expect(getMostConnectedNodes(store, 'Award', 2).map((entry) => entry.id)).toEqual(['AW-001', 'AW-003']);
  });

  it('ranks by outgoing degree', () => {
    const [top] = getMostConnectedNodes(store, 'Organization', 1, 'out');
    expect(top).toEqual({ id: 'State University', type: 'Organization', degree: 2, in_degree: 2, out_degree: 2 });
  });
});

describe('queryByFundingRange', () => {
  it('returns parseable amounts in range, largest first', () => {
    expect(queryByFundingRange(store, 0, 2000000)).toEqual({
      count: 3,
      awards: [
        { award_id: 'AW-001', amount: 1000000, title: 'Solar Cell Research' },
        { award_id: 'AW-002', amount: 500000, title: 'Battery Storage' },
        { award_id: 'AW-003', amount: 250000, title: 'Sensor Networks' },
      ],
    });
  });

  it('treats both bounds as inclusive', () => {
    expect(queryByFundingRange(store, 500000, 1000000).awards.map((award) => award.award_id)).toEqual([
      'AW-001',
      'AW-002',
    ]);
  });

  it('limits the list but keeps the full count', () => {
    const result = queryByFundingRange(store, 0, 2000000, 1);
    expect(result.count).toBe(3);
    expect(result.awards).toHaveLength(1);
  });
});

describe('summaries', () => {
  it('summarizes node and relationship types', () => {
    const summary = getGraphSummary(store);
    expect(summary.total_nodes).toBe(23);
    expect(summary.total_edges).toBe(26);
    expect(summary.node_types.Award).toBe(4);
    expect(summary.relationship_types.INVOLVES_TECH).toBe(6);
  });

  it('omits types with no members', () => {
    expect(getGraphSummary(new GrantGraphStore())).toEqual({
      total_nodes: 0,
      total_edges: 0,
      node_types: {},
      relationship_types: {},
    });
  });

  it('computes directed density', () => {
    expect(computeStatistics(store).density).toBeCloseTo(26 / (23 * 22));
    expect(computeStatistics(new GrantGraphStore()).density).toBe(0);
  });
});
