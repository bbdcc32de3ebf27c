/**
 * Unit tests for GrantGraphStore
 *
 * @module tests/unit/services/grant-graph/graph-store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GrantGraphStore } from '../../../../src/services/grant-graph/graph-store.js';

const AWARD_ATTRIBUTES = {
  title: 'Test Award',
  amount: 1000,
  award_date: 'N/A',
  start_date: 'N/A',
  end_date: 'N/A',
  active: 'Yes',
  url: '',
};

describe('GrantGraphStore', () => {
  let store: GrantGraphStore;

  beforeEach(() => {
    store = new GrantGraphStore();
    store.upsertNode({ id: 'A1', type: 'Award', attributes: AWARD_ATTRIBUTES });
    store.upsertNode({ id: 'Jane Doe', type: 'Person', attributes: { role: 'PI' } });
    store.upsertNode({ id: 'Org', type: 'Organization', attributes: {} });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // NODES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('upsertNode', () => {
    it('keeps the first-seen type and attributes', () => {
      expect(store.upsertNode({ id: 'Jane Doe', type: 'Person', attributes: { role: 'CoPI' } })).toBe(false);
      expect(store.upsertNode({ id: 'Jane Doe', type: 'Organization', attributes: {} })).toBe(false);
      expect(store.getNode('Jane Doe')).toEqual({ id: 'Jane Doe', type: 'Person', attributes: { role: 'PI' } });
      expect(store.nodeCount).toBe(3);
    });

    it('counts nodes per type', () => {
      expect(store.getNodeCounts()).toEqual({
        Award: 1,
        Person: 1,
        Organization: 1,
        State: 0,
        County: 0,
        Program: 0,
        Technology_Area: 0,
      });
    });

    it('returns counter copies', () => {
      const counts = store.getNodeCounts();
      counts.Award = 99;
      expect(store.getNodeCounts().Award).toBe(1);
    });
  });

  describe('typed lookups', () => {
    it('narrows by type and rejects mismatches', () => {
      expect(store.getNodeOfType('A1', 'Award')?.attributes.amount).toBe(1000);
      expect(store.getNodeOfType('A1', 'Person')).toBeUndefined();
      expect(store.getNodeOfType('missing', 'Award')).toBeUndefined();
    });

    it('lists nodes of one type in insertion order', () => {
      store.upsertNode({ id: 'John Roe', type: 'Person', attributes: { role: 'CoPI' } });
      expect(store.getNodesByType('Person').map((node) => node.id)).toEqual(['Jane Doe', 'John Roe']);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // EDGES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('upsertEdge', () => {
    it('rejects edges to unknown endpoints', () => {
      expect(() => store.upsertEdge('ghost', 'A1', 'LEADS')).toThrow('Source node "ghost" does not exist');
      expect(() => store.upsertEdge('A1', 'ghost', 'AWARDED_TO')).toThrow('Target node "ghost" does not exist');
    });

    it('deduplicates the exact triple', () => {
      expect(store.upsertEdge('Jane Doe', 'A1', 'LEADS')).toBe(true);
      expect(store.upsertEdge('Jane Doe', 'A1', 'LEADS')).toBe(false);
      expect(store.edgeCount).toBe(1);
    });

    it('allows parallel edges with different relationships', () => {
      store.upsertEdge('Jane Doe', 'A1', 'LEADS');
      store.upsertEdge('Jane Doe', 'A1', 'CO_LEADS');

      expect(store.edgeCount).toBe(2);
      expect(store.getRelationships('Jane Doe', 'A1')).toEqual(['LEADS', 'CO_LEADS']);
      expect(store.getSuccessors('Jane Doe')).toEqual(['A1']);
      expect(store.outDegree('Jane Doe')).toBe(2);
      expect(store.inDegree('A1')).toBe(2);
      expect(store.getRelationshipCounts().CO_LEADS).toBe(1);
    });

    it('answers hasEdge with or without a relationship', () => {
      store.upsertEdge('A1', 'Org', 'AWARDED_TO');
      expect(store.hasEdge('A1', 'Org')).toBe(true);
      expect(store.hasEdge('A1', 'Org', 'AWARDED_TO')).toBe(true);
      expect(store.hasEdge('A1', 'Org', 'FUNDED_BY')).toBe(false);
      expect(store.hasEdge('Org', 'A1')).toBe(false);
    });
  });

  describe('adjacency', () => {
    beforeEach(() => {
      store.upsertEdge('Jane Doe', 'A1', 'LEADS');
      store.upsertEdge('A1', 'Org', 'AWARDED_TO');
    });

    it('reports neighbors in both directions', () => {
      expect(store.getNeighbors('A1')).toEqual(new Set(['Org', 'Jane Doe']));
      expect(store.getPredecessors('Org')).toEqual(['A1']);
    });

    it('filters edges by relationship', () => {
      expect(store.getOutgoingEdges('A1', ['FUNDED_BY'])).toEqual([]);
      expect(store.getIncomingEdges('A1', ['LEADS'])).toEqual([
        { source: 'Jane Doe', target: 'A1', relationship: 'LEADS' },
      ]);
    });

    it('filters predecessors by type and relationship', () => {
      expect(store.getPredecessorsOfType('A1', 'Person').map((node) => node.id)).toEqual(['Jane Doe']);
      expect(store.getPredecessorsOfType('A1', 'Person', ['CO_LEADS'])).toEqual([]);
      expect(store.getPredecessorsOfType('A1', 'Organization')).toEqual([]);
    });

    it('returns empty adjacency for unknown nodes', () => {
      expect(store.getSuccessors('missing')).toEqual([]);
      expect(store.inDegree('missing')).toBe(0);
    });
  });
});
