/**
 * Neighborhood Extractor
 *
 * Bounded breadth-first expansion around a center node. Direction and
 * relationship are ignored while expanding. State and County nodes are
 * kept in the result but never join the next frontier, so a shared
 * region does not pull in unrelated organizations.
 *
 * @module services/grant-graph/neighborhood
 */

import { TERMINAL_NODE_TYPES, type GraphEdge, type GraphNode } from '../../models/grant-graph.js';
import type { GrantGraphStore } from './graph-store.js';

export interface Neighborhood {
  center: string;
  depth: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/**
 * Node identifiers within `depth` rounds of `center`.
 *
 * @returns null when the center does not exist
 */
export function extractNeighborhoodIds(store: GrantGraphStore, center: string, depth: number): Set<string> | null {
  if (!store.hasNode(center)) {
    return null;
  }

  const visited = new Set<string>([center]);
  // The center always expands, whatever its type.
  let frontier = [center];

  for (let round = 0; round < depth && frontier.length > 0; round++) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const neighbor of store.getNeighbors(id)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        const node = store.getNode(neighbor);
        if (node && !TERMINAL_NODE_TYPES.has(node.type)) {
          next.push(neighbor);
        }
      }
    }
    frontier = next;
  }

  return visited;
}

/** Every edge of the store whose endpoints are both in `ids` */
export function inducedEdges(store: GrantGraphStore, ids: ReadonlySet<string>): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const id of ids) {
    for (const edge of store.getOutgoingEdges(id)) {
      if (ids.has(edge.target)) {
        edges.push(edge);
      }
    }
  }
  return edges;
}

/**
 * Induced subgraph around `center`.
 *
 * @returns null when the center does not exist
 */
export function extractNeighborhood(store: GrantGraphStore, center: string, depth: number): Neighborhood | null {
  const ids = extractNeighborhoodIds(store, center, depth);
  if (!ids) {
    return null;
  }

  const nodes: GraphNode[] = [];
  for (const id of ids) {
    const node = store.getNode(id);
    if (node) nodes.push(node);
  }

  return { center, depth, nodes, edges: inducedEdges(store, ids) };
}
