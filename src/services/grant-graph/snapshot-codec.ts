/**
 * Grant Graph Snapshot Codec
 *
 * Snapshots are graphology serialized-graph JSON of a directed multigraph.
 * Every node carries a mandatory `type` attribute next to its type's
 * attribute fields; every edge carries a mandatory `relationship`.
 * Loading validates the whole document before anything reaches the store.
 *
 * @module services/grant-graph/snapshot-codec
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { MultiDirectedGraph } from 'graphology';
import type { SerializedGraph } from 'graphology-types';
import { z } from 'zod';
import { PERSON_ROLES, RELATIONSHIP_TYPES, type GraphNode } from '../../models/grant-graph.js';
import { GrantGraphStore } from './graph-store.js';

export const SNAPSHOT_FORMAT_VERSION = 1;

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const AmountSchema = z.union([z.number(), z.string(), z.null()]);

const NodeAttributesSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Award'),
    title: z.string(),
    amount: AmountSchema,
    award_date: z.string(),
    start_date: z.string(),
    end_date: z.string(),
    active: z.string(),
    url: z.string(),
  }),
  z.object({ type: z.literal('Person'), role: z.enum(PERSON_ROLES) }),
  z.object({ type: z.literal('Organization') }),
  z.object({ type: z.literal('State') }),
  z.object({ type: z.literal('County'), state: z.string() }),
  z.object({ type: z.literal('Program') }),
  z.object({ type: z.literal('Technology_Area') }),
]);

export type SnapshotNodeAttributes = z.infer<typeof NodeAttributesSchema>;

const EdgeAttributesSchema = z.object({
  relationship: z.enum(RELATIONSHIP_TYPES),
});

export type SnapshotEdgeAttributes = z.infer<typeof EdgeAttributesSchema>;

const GraphAttributesSchema = z.object({
  format_version: z.number().int().positive(),
});

export type SnapshotGraphAttributes = z.infer<typeof GraphAttributesSchema>;

const SnapshotSchema = z.object({
  attributes: GraphAttributesSchema,
  options: z.object({
    type: z.literal('directed'),
    multi: z.literal(true),
    allowSelfLoops: z.boolean().optional(),
  }),
  nodes: z.array(
    z.object({
      key: z.string().min(1),
      attributes: NodeAttributesSchema,
    })
  ),
  edges: z.array(
    z.object({
      key: z.string().optional(),
      source: z.string(),
      target: z.string(),
      attributes: EdgeAttributesSchema,
    })
  ),
});

export type GrantGraphSnapshot = SerializedGraph<
  SnapshotNodeAttributes,
  SnapshotEdgeAttributes,
  SnapshotGraphAttributes
>;

/**
 * Raised when a snapshot is unreadable, corrupt, or uses a foreign schema.
 */
export class SnapshotFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

function toNodeAttributes(node: GraphNode): SnapshotNodeAttributes {
  switch (node.type) {
    case 'Award':
      return { type: node.type, ...node.attributes };
    case 'Person':
      return { type: node.type, role: node.attributes.role };
    case 'County':
      return { type: node.type, state: node.attributes.state };
    default:
      return { type: node.type };
  }
}

function toGraphNode(id: string, attributes: SnapshotNodeAttributes): GraphNode {
  switch (attributes.type) {
    case 'Award': {
      const { type, ...award } = attributes;
      return { id, type, attributes: award };
    }
    case 'Person':
      return { id, type: attributes.type, attributes: { role: attributes.role } };
    case 'County':
      return { id, type: attributes.type, attributes: { state: attributes.state } };
    default:
      return { id, type: attributes.type, attributes: {} };
  }
}

function toGraphology(
  store: GrantGraphStore
): MultiDirectedGraph<SnapshotNodeAttributes, SnapshotEdgeAttributes, SnapshotGraphAttributes> {
  const graph = new MultiDirectedGraph<SnapshotNodeAttributes, SnapshotEdgeAttributes, SnapshotGraphAttributes>();
  graph.replaceAttributes({ format_version: SNAPSHOT_FORMAT_VERSION });
  for (const node of store.getAllNodes()) {
    graph.addNode(node.id, toNodeAttributes(node));
  }
  for (const edge of store.getAllEdges()) {
    graph.addEdge(edge.source, edge.target, { relationship: edge.relationship });
  }
  return graph;
}

/** Serialize the store to graphology's JSON form */
export function serializeGraph(store: GrantGraphStore): GrantGraphSnapshot {
  return toGraphology(store).export();
}

/**
 * Rebuild a store from parsed snapshot JSON.
 *
 * @throws SnapshotFormatError when the document does not match the schema
 *   or references unknown nodes
 */
export function deserializeGraph(data: unknown): GrantGraphStore {
  const parsed = SnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new SnapshotFormatError(`Snapshot does not match the grant graph schema`, issues);
  }

  const graph = new MultiDirectedGraph<SnapshotNodeAttributes, SnapshotEdgeAttributes, SnapshotGraphAttributes>();
  try {
    graph.import(parsed.data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SnapshotFormatError(`Snapshot graph is inconsistent: ${message}`);
  }

  const store = new GrantGraphStore();
  graph.forEachNode((key, attributes) => {
    store.upsertNode(toGraphNode(key, attributes));
  });
  graph.forEachEdge((_edge, attributes, source, target) => {
    store.upsertEdge(source, target, attributes.relationship);
  });
  return store;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════════

export function saveSnapshot(store: GrantGraphStore, filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(serializeGraph(store), null, 2), 'utf-8');
  console.error(`[Snapshot] Saved ${store.nodeCount} nodes, ${store.edgeCount} edges to ${filePath}`);
}

/**
 * @throws Error when the file does not exist
 * @throws SnapshotFormatError when the file is not valid snapshot JSON
 */
export function loadSnapshot(filePath: string): GrantGraphStore {
  if (!existsSync(filePath)) {
    throw new Error(`Snapshot file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SnapshotFormatError(`Snapshot is not valid JSON: ${message}`);
  }

  const store = deserializeGraph(data);
  console.error(`[Snapshot] Loaded ${store.nodeCount} nodes, ${store.edgeCount} edges from ${filePath}`);
  return store;
}
