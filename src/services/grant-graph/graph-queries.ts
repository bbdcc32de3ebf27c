/**
 * Grant Graph Queries
 *
 * Lookup and traversal queries used by the tool layer: search, node
 * detail, connections, paths, degree ranking, funding ranges and
 * graph-wide summaries.
 *
 * @module services/grant-graph/graph-queries
 */

import {
  tryParseAmount,
  type GraphNode,
  type NodeType,
  type RelationshipType,
} from '../../models/grant-graph.js';
import type { GrantGraphStore } from './graph-store.js';

export const DEFAULT_SEARCH_LIMIT = 20;
export const MAX_CONNECTIONS = 100;
export const DEFAULT_PATH_LENGTH = 3;
export const DEFAULT_MAX_PATHS = 100;
export const DEFAULT_FUNDING_LIMIT = 50;

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH AND DETAIL
// ═══════════════════════════════════════════════════════════════════════════════

export interface SearchHit {
  id: string;
  type: NodeType;
  properties: GraphNode['attributes'];
}

/**
 * Case-insensitive substring match on node identifiers, in graph order,
 * stopping after `limit` hits.
 */
export function searchNodes(
  store: GrantGraphStore,
  query: string,
  nodeType?: NodeType,
  limit: number = DEFAULT_SEARCH_LIMIT
): SearchHit[] {
  const needle = query.toLowerCase();
  const hits: SearchHit[] = [];
  for (const node of store.getAllNodes()) {
    if (hits.length >= limit) break;
    if (nodeType && node.type !== nodeType) continue;
    if (node.id.toLowerCase().includes(needle)) {
      hits.push({ id: node.id, type: node.type, properties: node.attributes });
    }
  }
  return hits;
}

export interface IncomingConnection {
  from: string;
  relationship: RelationshipType;
  type: NodeType;
}

export interface OutgoingConnection {
  to: string;
  relationship: RelationshipType;
  type: NodeType;
}

export interface NodeDetails {
  id: string;
  type: NodeType;
  attributes: GraphNode['attributes'];
  incoming_connections: IncomingConnection[];
  outgoing_connections: OutgoingConnection[];
  total_incoming: number;
  total_outgoing: number;
}

/**
 * Attributes plus every labelled incoming and outgoing edge.
 *
 * @returns null when the node does not exist
 */
export function getNodeDetails(store: GrantGraphStore, id: string): NodeDetails | null {
  const node = store.getNode(id);
  if (!node) {
    return null;
  }

  const incoming: IncomingConnection[] = [];
  for (const edge of store.getIncomingEdges(id)) {
    const source = store.getNode(edge.source);
    if (source) {
      incoming.push({ from: edge.source, relationship: edge.relationship, type: source.type });
    }
  }

  const outgoing: OutgoingConnection[] = [];
  for (const edge of store.getOutgoingEdges(id)) {
    const target = store.getNode(edge.target);
    if (target) {
      outgoing.push({ to: edge.target, relationship: edge.relationship, type: target.type });
    }
  }

  return {
    id,
    type: node.type,
    attributes: node.attributes,
    incoming_connections: incoming,
    outgoing_connections: outgoing,
    total_incoming: incoming.length,
    total_outgoing: outgoing.length,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONNECTIONS AND PATHS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Connection {
  from: string;
  to: string;
  relationship: RelationshipType;
  to_type: NodeType;
}

export interface ConnectionsResult {
  /** Matching connections before the cap */
  count: number;
  connections: Connection[];
}

/**
 * Outgoing labelled edges of `source`, optionally restricted to one target
 * and one relationship. The list is capped at MAX_CONNECTIONS; `count`
 * reports the full total.
 *
 * @returns null when the source does not exist
 */
export function findConnections(
  store: GrantGraphStore,
  source: string,
  target?: string,
  relationship?: RelationshipType
): ConnectionsResult | null {
  if (!store.hasNode(source)) {
    return null;
  }

  const connections: Connection[] = [];
  const filter = relationship ? [relationship] : undefined;
  for (const edge of store.getOutgoingEdges(source, filter)) {
    if (target !== undefined && edge.target !== target) continue;
    const targetNode = store.getNode(edge.target);
    if (!targetNode) continue;
    connections.push({
      from: source,
      to: edge.target,
      relationship: edge.relationship,
      to_type: targetNode.type,
    });
  }

  return { count: connections.length, connections: connections.slice(0, MAX_CONNECTIONS) };
}

/**
 * All simple directed paths from `source` to `target` with at most
 * `maxLength` edges, found depth-first along successors. Parallel edges
 * collapse into one hop. Stops after `maxPaths` paths.
 *
 * @returns null when either endpoint does not exist
 */
export function findPaths(
  store: GrantGraphStore,
  source: string,
  target: string,
  maxLength: number = DEFAULT_PATH_LENGTH,
  maxPaths: number = DEFAULT_MAX_PATHS
): string[][] | null {
  if (!store.hasNode(source) || !store.hasNode(target)) {
    return null;
  }
  if (source === target) {
    return [];
  }

  const paths: string[][] = [];
  const path = [source];
  const onPath = new Set<string>([source]);

  const walk = (current: string): void => {
    if (paths.length >= maxPaths || path.length > maxLength) return;
    for (const next of store.getSuccessors(current)) {
      if (paths.length >= maxPaths) return;
      if (next === target) {
        paths.push([...path, next]);
        continue;
      }
      if (onPath.has(next)) continue;
      path.push(next);
      onPath.add(next);
      walk(next);
      path.pop();
      onPath.delete(next);
    }
  };

  walk(source);
  return paths;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RANKINGS AND RANGES
// ═══════════════════════════════════════════════════════════════════════════════

export type DegreeMode = 'total' | 'in' | 'out';

export interface DegreeEntry {
  id: string;
  type: NodeType;
  degree: number;
  in_degree: number;
  out_degree: number;
}

/** Nodes ranked by labelled-edge degree, ties kept in graph order */
export function getMostConnectedNodes(
  store: GrantGraphStore,
  nodeType?: NodeType,
  topN = 10,
  by: DegreeMode = 'total'
): DegreeEntry[] {
  const entries: DegreeEntry[] = [];
  for (const node of store.getAllNodes()) {
    if (nodeType && node.type !== nodeType) continue;
    const inDegree = store.inDegree(node.id);
    const outDegree = store.outDegree(node.id);
    const degree = by === 'in' ? inDegree : by === 'out' ? outDegree : inDegree + outDegree;
    entries.push({ id: node.id, type: node.type, degree, in_degree: inDegree, out_degree: outDegree });
  }
  return entries.sort((a, b) => b.degree - a.degree).slice(0, topN);
}

export interface FundedAward {
  award_id: string;
  amount: number;
  title: string;
}

export interface FundingRangeResult {
  count: number;
  awards: FundedAward[];
}

/**
 * Awards whose amount lies in [minAmount, maxAmount], largest first.
 * Awards without a parseable amount are left out.
 */
export function queryByFundingRange(
  store: GrantGraphStore,
  minAmount: number,
  maxAmount: number,
  limit: number = DEFAULT_FUNDING_LIMIT
): FundingRangeResult {
  const awards: FundedAward[] = [];
  for (const award of store.getNodesByType('Award')) {
    const amount = tryParseAmount(award.attributes.amount);
    if (amount !== null && amount >= minAmount && amount <= maxAmount) {
      awards.push({ award_id: award.id, amount, title: award.attributes.title });
    }
  }
  awards.sort((a, b) => b.amount - a.amount);
  return { count: awards.length, awards: awards.slice(0, limit) };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARIES
// ═══════════════════════════════════════════════════════════════════════════════

export interface GraphSummary {
  total_nodes: number;
  total_edges: number;
  node_types: Partial<Record<NodeType, number>>;
  relationship_types: Partial<Record<RelationshipType, number>>;
}

export interface GraphStatistics {
  total_nodes: number;
  total_edges: number;
  node_counts: Partial<Record<NodeType, number>>;
  edge_counts: Partial<Record<RelationshipType, number>>;
  density: number;
}

function nonZero<K extends string>(counts: Record<K, number>): Partial<Record<K, number>> {
  const result: Partial<Record<K, number>> = {};
  for (const key of Object.keys(counts)) {
    if (isKeyOf(counts, key) && counts[key] > 0) {
      result[key] = counts[key];
    }
  }
  return result;
}

function isKeyOf<K extends string>(record: Record<K, number>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/** Node and edge histograms, listing only types present in the graph */
export function getGraphSummary(store: GrantGraphStore): GraphSummary {
  return {
    total_nodes: store.nodeCount,
    total_edges: store.edgeCount,
    node_types: nonZero(store.getNodeCounts()),
    relationship_types: nonZero(store.getRelationshipCounts()),
  };
}

/** Summary plus directed density m / (n (n - 1)) */
export function computeStatistics(store: GrantGraphStore): GraphStatistics {
  const n = store.nodeCount;
  const m = store.edgeCount;
  return {
    total_nodes: n,
    total_edges: m,
    node_counts: nonZero(store.getNodeCounts()),
    edge_counts: nonZero(store.getRelationshipCounts()),
    density: n > 1 ? m / (n * (n - 1)) : 0,
  };
}
