/**
 * MCP Server Types
 *
 * Server configuration schema, mutable server state and the success
 * envelope shared by every tool response.
 *
 * @module server/types
 */

import { z } from 'zod';
import type { GrantGraphStore } from '../services/grant-graph/graph-store.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const ServerConfigSchema = z.object({
  /** Snapshot loaded at startup and used by grant_graph_load/save by default */
  snapshotPath: z.string().min(1).default('./data/grant-graph.json'),
  /** Directory for generated visualization pages */
  outputDir: z.string().min(1).default('./static'),
  defaultDepth: z.number().int().min(1).default(1),
  maxDepth: z.number().int().min(1).max(10).default(4),
  /** How long finished visualization jobs stay queryable */
  jobRetentionMs: z.number().int().min(0).default(10 * 60 * 1000),
  searchLimit: z.number().int().min(1).default(20),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  /** Graph every query runs against; null until built or loaded */
  currentGraph: GrantGraphStore | null;
  /** Where the current graph came from (snapshot path or award table path) */
  currentSource: string | null;
  /** ISO timestamp of the last build/load */
  loadedAt: string | null;
  config: ServerConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Wrap tool output in the success envelope
 */
export function successResult<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}
