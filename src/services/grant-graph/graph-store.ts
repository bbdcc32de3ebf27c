/**
 * Grant Graph Store - in-memory directed multi-relationship graph
 *
 * Nodes are keyed by canonical identifier. Edges are keyed by the
 * (source, target, relationship) triple: parallel edges between the same
 * ordered pair are allowed only when their relationships differ.
 *
 * Adjacency is kept as source -> target -> relationship set in both
 * directions, so neighbor lookups see one adjacency per pair while every
 * relationship stays inspectable.
 *
 * @module services/grant-graph/graph-store
 */

import {
  isNodeOfType,
  type GraphEdge,
  type GraphNode,
  type NodeType,
  type RelationshipType,
} from '../../models/grant-graph.js';

type AdjacencyMap = Map<string, Map<string, Set<RelationshipType>>>;

export type NodeTypeCounts = Record<NodeType, number>;
export type RelationshipCounts = Record<RelationshipType, number>;

function emptyNodeCounts(): NodeTypeCounts {
  return {
    Award: 0,
    Person: 0,
    Organization: 0,
    State: 0,
    County: 0,
    Program: 0,
    Technology_Area: 0,
  };
}

function emptyRelationshipCounts(): RelationshipCounts {
  return {
    LEADS: 0,
    CO_LEADS: 0,
    AWARDED_TO: 0,
    LOCATED_IN_STATE: 0,
    LOCATED_IN_COUNTY: 0,
    FUNDED_BY: 0,
    INVOLVES_TECH: 0,
  };
}

function edgeKey(source: string, target: string, relationship: RelationshipType): string {
  return `${source}\u0000${target}\u0000${relationship}`;
}

export class GrantGraphStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges: GraphEdge[] = [];
  private readonly edgeIndex = new Set<string>();
  private readonly outgoing: AdjacencyMap = new Map();
  private readonly incoming: AdjacencyMap = new Map();
  private readonly nodeCounts = emptyNodeCounts();
  private readonly relationshipCounts = emptyRelationshipCounts();

  // ─────────────────────────────────────────────────────────────────────────────
  // Mutation (ingestion only)
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Insert a node unless its identifier is already known. An existing node
   * keeps its first-seen type and attributes.
   *
   * @returns true when the node was created
   */
  upsertNode(node: GraphNode): boolean {
    if (this.nodes.has(node.id)) {
      return false;
    }
    this.nodes.set(node.id, node);
    this.outgoing.set(node.id, new Map());
    this.incoming.set(node.id, new Map());
    this.nodeCounts[node.type]++;
    return true;
  }

  /**
   * Insert an edge unless the exact (source, target, relationship) triple
   * already exists.
   *
   * @returns true when the edge was created
   * @throws Error if either endpoint is not in the graph
   */
  upsertEdge(source: string, target: string, relationship: RelationshipType): boolean {
    const sourceOut = this.outgoing.get(source);
    const targetIn = this.incoming.get(target);
    if (!sourceOut) {
      throw new Error(`Source node "${source}" does not exist`);
    }
    if (!targetIn) {
      throw new Error(`Target node "${target}" does not exist`);
    }

    const key = edgeKey(source, target, relationship);
    if (this.edgeIndex.has(key)) {
      return false;
    }

    this.edgeIndex.add(key);
    this.edges.push({ source, target, relationship });
    addRelationship(sourceOut, target, relationship);
    addRelationship(targetIn, source, relationship);
    this.relationshipCounts[relationship]++;
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Node reads
  // ─────────────────────────────────────────────────────────────────────────────

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  getNodeOfType<T extends NodeType>(id: string, type: T): Extract<GraphNode, { type: T }> | undefined {
    const node = this.nodes.get(id);
    return isNodeOfType(node, type) ? node : undefined;
  }

  /** All nodes in insertion order */
  getAllNodes(): GraphNode[] {
    return [...this.nodes.values()];
  }

  getNodesByType<T extends NodeType>(type: T): Array<Extract<GraphNode, { type: T }>> {
    const result: Array<Extract<GraphNode, { type: T }>> = [];
    for (const node of this.nodes.values()) {
      if (isNodeOfType(node, type)) {
        result.push(node);
      }
    }
    return result;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Edge reads
  // ─────────────────────────────────────────────────────────────────────────────

  hasEdge(source: string, target: string, relationship?: RelationshipType): boolean {
    const relationships = this.outgoing.get(source)?.get(target);
    if (!relationships) return false;
    return relationship === undefined ? relationships.size > 0 : relationships.has(relationship);
  }

  /** Relationships from source to target, in insertion order */
  getRelationships(source: string, target: string): RelationshipType[] {
    return [...(this.outgoing.get(source)?.get(target) ?? [])];
  }

  /** All edges in insertion order */
  getAllEdges(): GraphEdge[] {
    return [...this.edges];
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  getOutgoingEdges(id: string, relationships?: readonly RelationshipType[]): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [target, labels] of this.outgoing.get(id) ?? []) {
      for (const relationship of labels) {
        if (!relationships || relationships.includes(relationship)) {
          edges.push({ source: id, target, relationship });
        }
      }
    }
    return edges;
  }

  getIncomingEdges(id: string, relationships?: readonly RelationshipType[]): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [source, labels] of this.incoming.get(id) ?? []) {
      for (const relationship of labels) {
        if (!relationships || relationships.includes(relationship)) {
          edges.push({ source, target: id, relationship });
        }
      }
    }
    return edges;
  }

  /** Distinct targets of outgoing edges */
  getSuccessors(id: string): string[] {
    return [...(this.outgoing.get(id)?.keys() ?? [])];
  }

  /** Distinct sources of incoming edges */
  getPredecessors(id: string): string[] {
    return [...(this.incoming.get(id)?.keys() ?? [])];
  }

  /**
   * Predecessors connected through one of the given relationships whose
   * type matches. Each predecessor appears once.
   */
  getPredecessorsOfType<T extends NodeType>(
    id: string,
    type: T,
    relationships?: readonly RelationshipType[]
  ): Array<Extract<GraphNode, { type: T }>> {
    const result: Array<Extract<GraphNode, { type: T }>> = [];
    for (const [source, labels] of this.incoming.get(id) ?? []) {
      if (relationships && ![...labels].some((label) => relationships.includes(label))) {
        continue;
      }
      const node = this.nodes.get(source);
      if (isNodeOfType(node, type)) {
        result.push(node);
      }
    }
    return result;
  }

  /** Successors and predecessors, ignoring direction and relationship */
  getNeighbors(id: string): Set<string> {
    return new Set([...this.getSuccessors(id), ...this.getPredecessors(id)]);
  }

  /** Number of incoming labelled edges */
  inDegree(id: string): number {
    let degree = 0;
    for (const labels of this.incoming.get(id)?.values() ?? []) {
      degree += labels.size;
    }
    return degree;
  }

  /** Number of outgoing labelled edges */
  outDegree(id: string): number {
    let degree = 0;
    for (const labels of this.outgoing.get(id)?.values() ?? []) {
      degree += labels.size;
    }
    return degree;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Counters
  // ─────────────────────────────────────────────────────────────────────────────

  getNodeCounts(): NodeTypeCounts {
    return { ...this.nodeCounts };
  }

  getRelationshipCounts(): RelationshipCounts {
    return { ...this.relationshipCounts };
  }
}

function addRelationship(
  adjacency: Map<string, Set<RelationshipType>>,
  neighbor: string,
  relationship: RelationshipType
): void {
  const labels = adjacency.get(neighbor);
  if (labels) {
    labels.add(relationship);
  } else {
    adjacency.set(neighbor, new Set([relationship]));
  }
}
